import { default as chalk } from 'chalk';
import { Command } from 'commander';

import { Module, Target, TargetState, Workspace } from '../../engine';
import { createCliWorkspace, GlobalOptions } from '../options';

export interface StatusCommandOptions extends GlobalOptions {
  recursive?: boolean;
}

export function statusCommand() {
  return new Command('status')
    .description('show the state of every target of a module tree')
    .argument('[module]', 'module directory or any path inside it', '.')
    .option('-r, --recursive', 'include every module below')
    .option('--json', 'print the states as json')
    .action(execute);
}

const stateColors: Record<TargetState, (text: string) => string> = {
  up_to_date: chalk.green,
  stale: chalk.red,
  touched: chalk.yellow,
  building: chalk.cyan,
  unknown: chalk.gray,
};

export function formatTargetLine(target: Target, state: TargetState): string {
  const color = stateColors[state];
  return `  ${color(target.name)} ${chalk.dim(`[${target.depth}@${target.parallelizable}] (${target.kind})`)} ${color(state)}`;
}

async function execute(modulePath: string, _options: StatusCommandOptions, command: Command): Promise<void> {
  const options = command.optsWithGlobals<StatusCommandOptions>();
  const workspace = createCliWorkspace(options);
  const modules = workspace.modules(modulePath, !!options.recursive);

  if (options.json) {
    console.info(JSON.stringify(modules.map(module => toJsonModule(workspace, module)), null, 2));
    return;
  }
  for (const module of modules) {
    console.info(`${chalk.bold(module.codenamePipeline())} ${chalk.gray(module.path)}`);
    for (const target of module.targets.values()) {
      console.info(formatTargetLine(target, workspace.engine.state(target)));
    }
  }
}

function toJsonModule(workspace: Workspace, module: Module) {
  return {
    path: module.path,
    kind: module.kind,
    targets: [...module.targets.values()].map(target => ({
      name: target.name,
      kind: target.kind,
      path: target.path,
      depth: target.depth,
      parallelizable: target.parallelizable,
      primary: target.primary,
      state: workspace.engine.state(target),
    })),
  };
}
