import { default as chalk } from 'chalk';
import { Command } from 'commander';

import { createCliWorkspace, GlobalOptions } from '../options';

export function pipelineCommand() {
  return new Command('pipeline')
    .description('show the chain of modules a module derives from, root first')
    .argument('[module]', 'module directory or any path inside it', '.')
    .action(execute);
}

async function execute(modulePath: string, _options: GlobalOptions, command: Command): Promise<void> {
  const options = command.optsWithGlobals<GlobalOptions>();
  const workspace = createCliWorkspace(options);
  const module = workspace.resolve(modulePath);
  console.info(chalk.bold(module.codenamePipeline()));
  module.enumeratePipeline().forEach((stage, index) => {
    const primary = stage.targetsPrimaryNames();
    console.info(
      `${'  '.repeat(index)}${stage.name} ${chalk.dim(`(${stage.kind})`)}${primary.length > 0 ? ` ${chalk.gray(primary.join(', '))}` : ''}`
    );
  });
}
