import { ExecutionPlan, Invocation } from '../engine';

export interface PlanScriptOptions {
  /** Command that runs this CLI in the generated script. */
  executable?: string;
  /** Let a batch finish its other jobs when one of them fails. */
  keepGoing?: boolean;
}

const HEREDOC = 'STAGETREE_BATCH';

export function shellQuote(value: string): string {
  if (/^[A-Za-z0-9_/.:%+=@,-]+$/u.test(value)) {
    return value;
  }
  return `'${value.replace(/'/gu, `'\\''`)}'`;
}

export function renderInvocation(invocation: Invocation, executable = 'stagetree'): string {
  const parts = [executable, 'make', shellQuote(invocation.modulePath), '-t', shellQuote(invocation.targetName), '--no-recurse'];
  if (invocation.force) {
    parts.push('--force');
  }
  return parts.join(' ');
}

/**
 * Bash script for GNU parallel: one block per depth, a background `parallel --jobs <class>` per batch, and a wait
 * for every batch before the next depth starts.
 */
export function renderParallelScript(plan: ExecutionPlan, options: PlanScriptOptions = {}): string {
  const executable = options.executable || 'stagetree';
  const { stats } = plan;
  const lines = [
    '#!/usr/bin/env bash',
    `# plan for ${plan.rootPath}: ${stats.scheduled} scheduled, ${stats.upToDate} up to date, ${stats.blocked} blocked`,
    'set -euo pipefail',
    '',
    'wait_for_batches() {',
    '  local status=0',
    '  for job in $(jobs -p); do',
    '    wait "$job" || status=$?',
    '  done',
    '  return "$status"',
    '}',
  ];
  for (const blocked of plan.blocked) {
    lines.push(`# blocked: ${blocked.targetId} (${blocked.reason})`);
  }

  const halt = options.keepGoing ? '' : ' --halt now,fail=1';
  for (const layer of plan.layers) {
    lines.push('', `# depth ${layer.depth}`);
    for (const batch of layer.batches) {
      lines.push(`parallel --jobs ${shellQuote(batch.parallelizable)}${halt} <<'${HEREDOC}' &`);
      lines.push(...batch.invocations.map(invocation => renderInvocation(invocation, executable)));
      lines.push(HEREDOC);
    }
    lines.push('wait_for_batches');
  }
  return `${lines.join('\n')}\n`;
}
