import os from 'os';

import { Logger } from '../io';
import { promiseQueue } from '../utils';
import { BuildEngine } from './buildEngine';
import { toError } from './errors';
import { TargetGraph } from './targetGraph';
import { ExecutionPlan, Invocation, InvocationResult, TargetId } from './types';

/**
 * `abort-affected` blocks only what depends on a failure, `abort-all` stops after the layer that failed.
 */
export type FailurePolicy = 'abort-affected' | 'abort-all';

export interface ExecuteOptions {
  failurePolicy?: FailurePolicy;
  /** Concurrency ceiling of one batch; defaults to `parseConcurrency` against the CPU count. */
  concurrencyFor?: (parallelizable: string) => number;
  onResult?: (result: InvocationResult) => void;
}

export interface ExecutionRuntime {
  graph: TargetGraph;
  engine: BuildEngine;
  logger: Logger;
}

export interface ExecutionResult {
  results: InvocationResult[];
  built: number;
  upToDate: number;
  failed: number;
  blocked: number;
}

/**
 * Reads a GNU parallel `--jobs` value: `N`, `N%` of the CPUs, `+N`/`-N` relative to the CPUs. Anything else runs
 * one job at a time.
 */
export function parseConcurrency(parallelizable: string, cpuCount: number = os.cpus().length): number {
  const value = parallelizable.trim();
  const cpus = Math.max(1, cpuCount);
  let match = /^(\d+(?:\.\d+)?)%$/u.exec(value);
  if (match) {
    return Math.max(1, Math.floor((cpus * Number(match[1])) / 100));
  }
  match = /^([+-])(\d+)$/u.exec(value);
  if (match) {
    const delta = Number(match[2]);
    return Math.max(1, match[1] === '+' ? cpus + delta : cpus - delta);
  }
  match = /^(\d+)$/u.exec(value);
  if (match) {
    const jobs = Number(match[1]);
    return jobs === 0 ? cpus : jobs;
  }
  return 1;
}

/**
 * Runs a plan in this process: layers one after another, the batches of a layer side by side, each batch capped by
 * its class. Targets are made without recursion since their prerequisites come from earlier layers.
 */
export async function executePlan(
  plan: ExecutionPlan,
  runtime: ExecutionRuntime,
  options: ExecuteOptions = {}
): Promise<ExecutionResult> {
  const failurePolicy = options.failurePolicy || 'abort-affected';
  const concurrencyFor = options.concurrencyFor || ((parallelizable: string) => parseConcurrency(parallelizable));
  const failedOrBlocked = new Set<TargetId>();
  const results: InvocationResult[] = [];
  let aborted = false;

  const record = (result: InvocationResult) => {
    results.push(result);
    if (result.status === 'failed' || result.status === 'blocked') {
      failedOrBlocked.add(result.invocation.targetId);
    }
    options.onResult?.(result);
  };

  const dependsOnFailure = createFailureLookup(runtime.graph, failedOrBlocked);

  const run = async (invocation: Invocation): Promise<void> => {
    if (aborted) {
      record({ invocation, status: 'blocked' });
      return;
    }
    if (dependsOnFailure(invocation.targetId)) {
      runtime.logger.warn(`skipping ${invocation.targetId}: a prerequisite failed`);
      record({ invocation, status: 'blocked' });
      return;
    }
    const started = Date.now();
    try {
      const target = runtime.graph.require(invocation.targetId);
      const report = await runtime.engine.make(target, { recurse: false, force: invocation.force });
      record({
        invocation,
        status: report.built.includes(invocation.targetId) ? 'built' : 'up_to_date',
        durationMs: Date.now() - started,
      });
    } catch (err) {
      const error = toError(err);
      runtime.logger.error(error.message);
      record({ invocation, status: 'failed', error, durationMs: Date.now() - started });
    }
  };

  for (const layer of plan.layers) {
    await Promise.all(
      layer.batches.map(batch =>
        promiseQueue(
          concurrencyFor(batch.parallelizable),
          ...batch.invocations.map(invocation => () => run(invocation))
        )
      )
    );
    if (failurePolicy === 'abort-all' && results.some(result => result.status === 'failed')) {
      aborted = true;
    }
  }

  return {
    results,
    built: results.filter(result => result.status === 'built').length,
    upToDate: results.filter(result => result.status === 'up_to_date').length,
    failed: results.filter(result => result.status === 'failed').length,
    blocked: results.filter(result => result.status === 'blocked').length,
  };
}

function createFailureLookup(graph: TargetGraph, failedOrBlocked: ReadonlySet<TargetId>) {
  return (targetId: TargetId): boolean => {
    const seen = new Set<TargetId>();
    const queue = [...graph.require(targetId).depends];
    while (queue.length > 0) {
      const id = queue.pop();
      if (id === undefined || seen.has(id)) {
        continue;
      }
      seen.add(id);
      if (failedOrBlocked.has(id)) {
        return true;
      }
      queue.push(...graph.require(id).depends);
    }
    return false;
  };
}
