import { Command } from 'commander';
import { join } from 'path';

import { isStageTreeError } from '../engine';
import * as utils from '../utils';
import {
  cleanCommand,
  gitignoreCommand,
  makeCommand,
  pipelineCommand,
  runCommand,
  scanCommand,
  statusCommand,
} from './commands';

async function readVersion(): Promise<string> {
  const packageJson = await utils.parseJson(join(__dirname, '../../package.json'));
  if (packageJson && typeof packageJson === 'object' && 'version' in packageJson) {
    return String(packageJson.version);
  }
  return '0.0.1';
}

export async function createProgram() {
  const program = new Command('stagetree')
    .description('filesystem-native build engine for multi-stage data pipelines')
    .option('--boundary <dir>', 'never search for module declarations above this directory')
    .option('--declaration-file <name>', 'file that makes a directory a module (default: stage.json)')
    .option('--state-dir <name>', 'per-module directory for build markers (default: .stagetree)')
    .option('--track-declarations', 'rebuild targets when their module declaration changes')
    .option('--plugin <files...>', 'CommonJS modules exporting register(registry)')
    .option('--no-color', 'disable color support')
    .option('-s, --silent', 'log only warnings and errors')
    .option('-v, --verbose', 'make the operation more talkative')
    .addCommand(makeCommand())
    .addCommand(scanCommand())
    .addCommand(runCommand())
    .addCommand(statusCommand())
    .addCommand(cleanCommand())
    .addCommand(pipelineCommand())
    .addCommand(gitignoreCommand());
  program.version(await readVersion());
  return program;
}

export async function execute(rawArgs: string[]): Promise<void> {
  try {
    const program = await createProgram();
    await program.parseAsync(rawArgs);
  } catch (err) {
    console.error(isStageTreeError(err) ? err.message : err);
    if (!process.exitCode) {
      process.exitCode = 1;
    }
  } finally {
    // build actions may leave handles open
    // eslint-disable-next-line node/no-process-exit
    process.exit();
  }
}
