import { default as chalk } from 'chalk';
import { Command } from 'commander';

import { Module, Target } from '../../engine';
import { createCliWorkspace, GlobalOptions } from '../options';

export interface MakeCommandOptions extends GlobalOptions {
  target?: Array<string>;
  recurse?: boolean;
  force?: boolean;
}

export function makeCommand() {
  return new Command('make')
    .description('make targets of one module, stale prerequisites first')
    .argument('[module]', 'module directory or any path inside it', '.')
    .option('-t, --target <names...>', 'targets to make (default: the primary targets)')
    .option('--no-recurse', 'fail when a prerequisite is stale instead of making it')
    .option('-f, --force', 'rebuild the named targets even when up to date')
    .action(execute);
}

/**
 * Named targets, else the primary ones, else every target of the module.
 */
export function selectTargets(module: Module, names: ReadonlyArray<string> = []): Target[] {
  if (names.length > 0) {
    return names.map(name => module.target(name));
  }
  const primary = module.targetsOf(target => target.primary);
  return primary.length > 0 ? primary : [...module.targets.values()];
}

async function execute(modulePath: string, _options: MakeCommandOptions, command: Command): Promise<void> {
  const options = command.optsWithGlobals<MakeCommandOptions>();
  const workspace = createCliWorkspace(options);
  const module = workspace.resolve(modulePath);
  const targets = selectTargets(module, options.target);

  let built = 0;
  let upToDate = 0;
  for (const target of targets) {
    const report = await workspace.engine.make(target, { recurse: options.recurse !== false, force: !!options.force });
    built += report.built.length;
    upToDate += report.upToDate.length;
  }
  if (!options.silent) {
    console.info(`${chalk.green(`${built} made`)}, ${chalk.gray(`${upToDate} up to date`)} (${module.path})`);
  }
}
