import cliProgress from 'cli-progress';
import { default as chalk } from 'chalk';

import { InvocationResult } from '../engine';

export interface ProgressStats {
  built: number;
  upToDate: number;
  failed: number;
  blocked: number;
}

/**
 * Progress of one plan run. Counts every invocation once, whatever its outcome.
 */
export class BuildProgressBar {
  private bar: cliProgress.SingleBar | null = null;
  private stats: ProgressStats = { built: 0, upToDate: 0, failed: 0, blocked: 0 };
  private completed = 0;

  constructor(
    private total: number,
    private enabled: boolean
  ) {}

  start() {
    if (!this.enabled) return;

    this.bar = new cliProgress.SingleBar({
      format: 'Building... {bar} {percentage}% | {value}/{total} targets | {stats}',
      barCompleteChar: '█',
      barIncompleteChar: '░',
      hideCursor: true,
      clearOnComplete: false,
      stopOnComplete: false,
    });
    this.bar.start(this.total, 0, { stats: chalk.gray('starting...') });
  }

  update(result: InvocationResult) {
    this.completed++;
    switch (result.status) {
      case 'built':
        this.stats.built++;
        break;
      case 'up_to_date':
        this.stats.upToDate++;
        break;
      case 'failed':
        this.stats.failed++;
        break;
      default:
        this.stats.blocked++;
        break;
    }
    this.bar?.update(this.completed, { stats: this.formatStats() });
  }

  stop() {
    if (this.bar) {
      this.bar.stop();
    }
  }

  getStats(): ProgressStats {
    return { ...this.stats };
  }

  private formatStats(): string {
    const parts: string[] = [];
    if (this.stats.built > 0) parts.push(chalk.green(`${this.stats.built} ✓`));
    if (this.stats.upToDate > 0) parts.push(chalk.gray(`${this.stats.upToDate} =`));
    if (this.stats.failed > 0) parts.push(chalk.red(`${this.stats.failed} ✗`));
    if (this.stats.blocked > 0) parts.push(chalk.yellow(`${this.stats.blocked} ⊘`));
    return parts.join(' ') || chalk.gray('starting...');
  }
}

export interface ProgressBarOptions {
  json?: boolean;
  verbose?: boolean;
  silent?: boolean;
}

export function shouldShowProgressBar(options: ProgressBarOptions): boolean {
  if (options.json || options.silent || options.verbose) return false;
  return process.stdout.isTTY === true;
}
