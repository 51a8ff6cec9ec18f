import { Command } from 'commander';

import { createCliWorkspace, GlobalOptions } from '../options';
import { renderParallelScript } from '../planScript';

export interface ScanCommandOptions extends GlobalOptions {
  recursive?: boolean;
  force?: boolean;
  prerequisites?: boolean;
  keepGoing?: boolean;
  executable?: string;
}

export function scanCommand() {
  return new Command('scan')
    .description('print the execution plan of a module tree as a GNU parallel script')
    .argument('[module]', 'module directory or any path inside it', '.')
    .option('-r, --recursive', 'include every module below')
    .option('-f, --force', 'schedule up-to-date targets of the scanned modules too')
    .option('--no-prerequisites', 'do not schedule stale prerequisites outside the scanned modules')
    .option('-k, --keep-going', 'let a batch continue after one of its jobs failed')
    .option('--executable <command>', 'command that runs stagetree in the script', 'stagetree')
    .option('--json', 'print the structured plan as json')
    .action(execute);
}

async function execute(modulePath: string, _options: ScanCommandOptions, command: Command): Promise<void> {
  const options = command.optsWithGlobals<ScanCommandOptions>();
  const workspace = createCliWorkspace(options);
  const plan = workspace.scan(modulePath, {
    recursive: !!options.recursive,
    force: !!options.force,
    includePrerequisites: options.prerequisites !== false,
  });
  if (options.json) {
    console.info(JSON.stringify(plan, null, 2));
    return;
  }
  process.stdout.write(
    renderParallelScript(plan, { executable: options.executable, keepGoing: !!options.keepGoing })
  );
}
