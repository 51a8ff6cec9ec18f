import path from 'path';

import { createEngineConfig, EngineConfig, EngineConfigOverrides, engineConfigFromEnv } from '../config';
import { ModuleRegistry, Workspace } from '../engine';
import { Logger } from '../io';
import { LogLevel } from '../models';
import { registerStdModules } from '../modules';

export interface GlobalOptions {
  boundary?: string;
  declarationFile?: string;
  stateDir?: string;
  trackDeclarations?: boolean;
  plugin?: Array<string>;
  color?: boolean;
  silent?: boolean;
  verbose?: boolean;
  json?: boolean;
}

export function getLogLevel(cliOptions: GlobalOptions): LogLevel | undefined {
  if (cliOptions.json) {
    return LogLevel.error;
  }
  if (cliOptions.silent) {
    return LogLevel.warn;
  }
  if (cliOptions.verbose) {
    return LogLevel.trace;
  }
  return undefined;
}

/**
 * Defaults, then `STAGETREE_*` variables, then the flags given on the command line.
 */
export function toEngineConfig(cliOptions: GlobalOptions, env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const flags: EngineConfigOverrides = {
    declarationFile: cliOptions.declarationFile,
    stateDirName: cliOptions.stateDir,
    searchBoundary: cliOptions.boundary,
    trackDeclarations: cliOptions.trackDeclarations,
    logLevel: getLogLevel(cliOptions),
  };
  return createEngineConfig(engineConfigFromEnv(env), flags);
}

/**
 * A plugin is a CommonJS module exporting `register(registry)`, which adds module kinds.
 */
export function loadPlugin(registry: ModuleRegistry, fileName: string, cwd: string = process.cwd()): void {
  const pluginPath = path.resolve(cwd, fileName);
  // eslint-disable-next-line @typescript-eslint/no-var-requires
  const loaded: unknown = require(pluginPath);
  const candidates = [loaded, isObject(loaded) ? loaded.default : undefined];
  for (const candidate of candidates) {
    if (isObject(candidate) && typeof candidate.register === 'function') {
      candidate.register(registry);
      return;
    }
  }
  throw new Error(`Plugin ${pluginPath} does not export a register(registry) function`);
}

function isObject(value: unknown): value is Record<string, unknown> {
  return !!value && (typeof value === 'object' || typeof value === 'function');
}

export function createCliWorkspace(cliOptions: GlobalOptions): Workspace {
  const config = toEngineConfig(cliOptions);
  const registry = registerStdModules(new ModuleRegistry());
  for (const plugin of cliOptions.plugin || []) {
    loadPlugin(registry, plugin);
  }
  const logger = new Logger({ level: config.logLevel, noColor: cliOptions.color === false });
  return new Workspace({ config, registry, logger });
}
