import { Command } from 'commander';

import { createCliWorkspace, GlobalOptions } from '../options';

export interface GitignoreCommandOptions extends GlobalOptions {
  recursive?: boolean;
}

export function gitignoreCommand() {
  return new Command('gitignore')
    .description('write a .gitignore listing the built artifacts of each module')
    .argument('[module]', 'module directory or any path inside it', '.')
    .option('-r, --recursive', 'include every module below')
    .action(execute);
}

async function execute(modulePath: string, _options: GitignoreCommandOptions, command: Command): Promise<void> {
  const options = command.optsWithGlobals<GitignoreCommandOptions>();
  const workspace = createCliWorkspace(options);
  for (const module of workspace.modules(modulePath, !!options.recursive)) {
    const written = workspace.writeGitignore(module);
    if (!options.silent) {
      console.info(written);
    }
  }
}
