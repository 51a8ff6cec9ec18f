import fs from 'fs';
import os from 'os';
import path from 'path';

import { createEngineConfig, EngineConfigOverrides } from '../../config';
import { Logger } from '../../io';
import { LogLevel } from '../../models';
import { ModuleRegistry } from '../registry';
import { BuildContext, DeclareContext, ModuleKind, TargetSpec } from '../types';
import { Workspace } from '../workspace';

export function createTempDir(): string {
  return fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), 'stagetree-')));
}

export function removeTempDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function writeDeclaration(dir: string, declaration: Record<string, unknown> = {}): string {
  fs.mkdirSync(dir, { recursive: true });
  fs.writeFileSync(path.join(dir, 'stage.json'), JSON.stringify(declaration), 'utf-8');
  return dir;
}

export function writeFile(fileName: string, content = 'data'): string {
  fs.mkdirSync(path.dirname(fileName), { recursive: true });
  fs.writeFileSync(fileName, content, 'utf-8');
  return fileName;
}

export function silentLogger(messages: Array<{ level: LogLevel; text: string }> = []): Logger {
  return new Logger({
    level: LogLevel.trace,
    noColor: true,
    logMethod: (level, ...params) => messages.push({ level, text: params.map(String).join(' ') }),
  });
}

/**
 * Build action writing `content` (default: the target name) to the artifact.
 */
export function writeAction(content?: string) {
  return jest.fn(async (context: BuildContext) => {
    fs.writeFileSync(context.target.path, content ?? context.target.name, 'utf-8');
  });
}

export function defineKind(
  name: string,
  declareTargets: (context: DeclareContext) => ReadonlyArray<TargetSpec>,
  root = false
): ModuleKind {
  return { name, root, declareTargets };
}

export function createTestWorkspace(
  root: string,
  kinds: ReadonlyArray<ModuleKind>,
  overrides: EngineConfigOverrides = {},
  logger: Logger = silentLogger()
): Workspace {
  return new Workspace({
    config: createEngineConfig({ searchBoundary: root, lockTimeoutMs: 2000 }, overrides),
    registry: new ModuleRegistry().register(...kinds),
    logger,
    cwd: root,
  });
}
