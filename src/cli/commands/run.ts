import { default as chalk } from 'chalk';
import { Command } from 'commander';

import { ExecutionResult, formatDuration, InvocationResult } from '../../engine';
import { createCliWorkspace, GlobalOptions } from '../options';
import { BuildProgressBar, shouldShowProgressBar } from '../progressBar';

export interface RunCommandOptions extends GlobalOptions {
  recursive?: boolean;
  force?: boolean;
  prerequisites?: boolean;
  keepGoing?: boolean;
}

export function runCommand() {
  return new Command('run')
    .description('scan a module tree and build the plan in this process')
    .argument('[module]', 'module directory or any path inside it', '.')
    .option('-r, --recursive', 'include every module below')
    .option('-f, --force', 'rebuild up-to-date targets of the scanned modules too')
    .option('--no-prerequisites', 'do not build stale prerequisites outside the scanned modules')
    .option('-k, --keep-going', 'keep building what does not depend on a failure (default: stop after the failing depth)')
    .option('--json', 'print the results as json')
    .action(execute);
}

async function execute(modulePath: string, _options: RunCommandOptions, command: Command): Promise<void> {
  const options = command.optsWithGlobals<RunCommandOptions>();
  const workspace = createCliWorkspace(options);
  const plan = workspace.scan(modulePath, {
    recursive: !!options.recursive,
    force: !!options.force,
    includePrerequisites: options.prerequisites !== false,
  });

  const showProgress = shouldShowProgressBar(options);
  const progressBar = new BuildProgressBar(plan.stats.scheduled, showProgress);
  if (showProgress) {
    workspace.logger.collectMessages();
  }
  progressBar.start();
  const started = Date.now();
  let result: ExecutionResult;
  try {
    result = await workspace.execute(plan, {
      failurePolicy: options.keepGoing ? 'abort-affected' : 'abort-all',
      onResult: invocationResult => progressBar.update(invocationResult),
    });
  } finally {
    progressBar.stop();
    workspace.logger.flush();
  }

  if (options.json) {
    console.info(JSON.stringify({ plan: plan.stats, results: result.results.map(toJsonResult) }, null, 2));
  } else if (!options.silent) {
    printFailures(result.results);
    console.info(
      [
        chalk.green(`${result.built} built`),
        chalk.gray(`${plan.stats.upToDate + result.upToDate} up to date`),
        result.failed > 0 ? chalk.red(`${result.failed} failed`) : `${result.failed} failed`,
        result.blocked + plan.stats.blocked > 0
          ? chalk.yellow(`${result.blocked + plan.stats.blocked} blocked`)
          : '0 blocked',
      ].join(', ') + chalk.gray(` in ${formatDuration(Date.now() - started)}`)
    );
  }
  if (result.failed > 0 || result.blocked > 0 || plan.stats.blocked > 0) {
    process.exitCode = 1;
  }
}

function toJsonResult(result: InvocationResult) {
  return {
    target: result.invocation.targetId,
    status: result.status,
    reason: result.invocation.reason,
    durationMs: result.durationMs,
    error: result.error?.message,
  };
}

function printFailures(results: ReadonlyArray<InvocationResult>) {
  const failed = results.filter(result => result.status === 'failed');
  if (failed.length === 0) {
    return;
  }
  console.info(chalk.red.bold('═══ Build Failure ═══'));
  for (const result of failed) {
    console.info(chalk.red(`✗ ${result.invocation.targetName}`));
    console.info(chalk.gray(`  ${result.invocation.modulePath}`));
    if (result.error) {
      console.info(`  ${result.error.message.split('\n').join('\n  ')}`);
    }
  }
}
