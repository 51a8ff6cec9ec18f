import { default as chalk } from 'chalk';
import { Command } from 'commander';

import { CleanOutcome } from '../../engine';
import { createCliWorkspace, GlobalOptions } from '../options';

export interface CleanCommandOptions extends GlobalOptions {
  target?: Array<string>;
}

export function cleanCommand() {
  return new Command('clean')
    .description('remove built artifacts of a module (dependents are left alone)')
    .argument('[module]', 'module directory or any path inside it', '.')
    .option('-t, --target <names...>', 'targets to clean (default: every target)')
    .action(execute);
}

export function formatCleanOutcome(outcome: CleanOutcome): string {
  switch (outcome.status) {
    case 'removed':
      return `${chalk.green('removed')} ${outcome.target.name}: ${outcome.paths.join(', ')}`;
    case 'absent':
      return `${chalk.gray('absent')} ${outcome.target.name}`;
    default:
      return `${chalk.yellow('skipped')} ${outcome.target.name}: ${outcome.reason}`;
  }
}

async function execute(modulePath: string, _options: CleanCommandOptions, command: Command): Promise<void> {
  const options = command.optsWithGlobals<CleanCommandOptions>();
  const workspace = createCliWorkspace(options);
  const module = workspace.resolve(modulePath);
  for (const outcome of workspace.engine.clean(module, options.target)) {
    if (!options.silent || outcome.status === 'removed') {
      console.info(formatCleanOutcome(outcome));
    }
  }
}
