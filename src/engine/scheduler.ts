import { Logger } from '../io';
import { isStageTreeError, isStructuralError } from './errors';
import { Module } from './module';
import { PathModuleResolver } from './resolver';
import { StalenessEvaluator } from './staleness';
import { Target } from './target';
import { compareTargets, TargetGraph } from './targetGraph';
import {
  BlockedTarget,
  ExecutionPlan,
  Invocation,
  InvocationReason,
  PlanBatch,
  PlanLayer,
  ScanIssue,
  TargetId,
} from './types';

export interface ScanOptions {
  /** Descend into every sub-directory that is a module. */
  recursive?: boolean;
  /** Schedule up-to-date targets of the scanned modules too. */
  force?: boolean;
  /** Schedule stale prerequisites that live outside the scanned modules. */
  includePrerequisites?: boolean;
}

export interface SchedulerOptions {
  graph: TargetGraph;
  resolver: PathModuleResolver;
  evaluator: StalenessEvaluator;
  logger: Logger;
}

interface Candidate {
  target: Target;
  inScope: boolean;
}

/**
 * Turns a module tree into layers of batches: a layer per depth (a hard ordering barrier), a batch per
 * parallelizable class within it. Nothing is built.
 */
export class Scheduler {
  constructor(private readonly options: SchedulerOptions) {}

  scan(root: Module | string, options: ScanOptions = {}): ExecutionPlan {
    const { graph, resolver, evaluator, logger } = this.options;
    const force = !!options.force;
    const includePrerequisites = options.includePrerequisites ?? true;
    const rootModule = typeof root === 'string' ? resolver.resolve(root) : root;

    const issues: ScanIssue[] = [];
    const modules = this.collectModules(rootModule, !!options.recursive, issues);
    const candidates = collectCandidates(modules, graph, includePrerequisites);

    graph.clearTouched();
    const blocked = new Map<TargetId, BlockedTarget>();
    const scheduled: Array<{ target: Target; reason: InvocationReason }> = [];
    let upToDate = 0;

    const block = (target: Target, reason: string) => {
      blocked.set(target.id, { targetId: target.id, modulePath: target.modulePath, targetName: target.name, reason });
    };

    for (const { target, inScope } of candidates.values()) {
      const blockedBy = [...target.depends].find(id => blocked.has(id));
      if (blockedBy) {
        block(target, `prerequisite ${blockedBy} is blocked`);
        continue;
      }
      if (target.isDirect) {
        if (evaluator.isUpToDate(target)) {
          upToDate += 1;
        } else {
          block(target, `direct target ${target.path} is missing`);
        }
        continue;
      }

      const stale = !evaluator.isUpToDate(target);
      if (!stale && !(force && inScope)) {
        upToDate += 1;
        continue;
      }
      if (!includePrerequisites) {
        const outside = graph
          .dependenciesOf(target)
          .find(dependency => !candidates.has(dependency.id) && !evaluator.isUpToDate(dependency));
        if (outside) {
          block(target, `prerequisite ${outside.id} is stale and outside the scan`);
          continue;
        }
      }
      graph.markAsTouched(target.id);
      scheduled.push({ target, reason: inScope ? (stale ? 'stale' : 'forced') : 'prerequisite' });
    }

    const layers = toLayers(scheduled, force);
    const plan: ExecutionPlan = {
      rootPath: rootModule.path,
      force,
      layers,
      blocked: [...blocked.values()],
      issues,
      stats: {
        modules: modules.length,
        targets: candidates.size,
        scheduled: scheduled.length,
        upToDate,
        blocked: blocked.size,
        layers: layers.length,
        batches: layers.reduce((acc, layer) => acc + layer.batches.length, 0),
      },
    };
    logger.debug(
      `scanned ${plan.stats.modules} modules: ${plan.stats.scheduled} scheduled, ${plan.stats.upToDate} up to date, ${plan.stats.blocked} blocked`
    );
    return plan;
  }

  /**
   * Pre-order walk of the module tree, each module once even when symlinks lead back to it. A sub-module whose own
   * declaration code fails is reported and skipped; structural errors abort the scan.
   */
  collectModules(root: Module, recursive: boolean, issues: ScanIssue[] = []): Module[] {
    const { resolver, logger } = this.options;
    const modules: Module[] = [];
    const visited = new Set<string>();
    const visit = (module: Module) => {
      if (visited.has(module.path)) {
        logger.debug(`${module.path} was already visited`);
        return;
      }
      visited.add(module.path);
      modules.push(module);
      if (!recursive) {
        return;
      }
      for (const directory of resolver.childModuleDirectories(module)) {
        let child: Module;
        try {
          child = resolver.resolve(directory);
        } catch (err) {
          if (!isStageTreeError(err) || isStructuralError(err)) {
            throw err;
          }
          logger.warn(err.message);
          issues.push({ modulePath: directory, message: err.message });
          continue;
        }
        visit(child);
      }
    };
    visit(root);
    return modules;
  }
}

function collectCandidates(
  modules: ReadonlyArray<Module>,
  graph: TargetGraph,
  includePrerequisites: boolean
): Map<TargetId, Candidate> {
  const candidates = new Map<TargetId, Candidate>();
  for (const module of modules) {
    for (const target of module.targets.values()) {
      candidates.set(target.id, { target, inScope: true });
    }
  }
  if (includePrerequisites) {
    const queue = [...candidates.values()].map(candidate => candidate.target);
    while (queue.length > 0) {
      const target = queue.pop();
      if (!target) {
        break;
      }
      for (const dependency of graph.dependenciesOf(target)) {
        if (!candidates.has(dependency.id)) {
          candidates.set(dependency.id, { target: dependency, inScope: false });
          queue.push(dependency);
        }
      }
    }
  }
  // depth order guarantees every prerequisite is judged before its dependents
  return new Map([...candidates.entries()].sort(([, a], [, b]) => compareTargets(a.target, b.target)));
}

function toLayers(scheduled: ReadonlyArray<{ target: Target; reason: InvocationReason }>, force: boolean): PlanLayer[] {
  const byDepth = new Map<number, Map<string, Invocation[]>>();
  for (const { target, reason } of scheduled) {
    const batches = byDepth.get(target.depth) || new Map<string, Invocation[]>();
    byDepth.set(target.depth, batches);
    const invocations = batches.get(target.parallelizable) || [];
    batches.set(target.parallelizable, invocations);
    invocations.push({
      targetId: target.id,
      modulePath: target.modulePath,
      targetName: target.name,
      force: force && reason !== 'prerequisite',
      reason,
    });
  }

  return [...byDepth.entries()]
    .sort(([a], [b]) => a - b)
    .map(([depth, batches]) => ({
      depth,
      batches: [...batches.entries()]
        .sort(([a], [b]) => a.localeCompare(b))
        .map(
          ([parallelizable, invocations]): PlanBatch => ({
            parallelizable,
            invocations: invocations.sort(
              (a, b) => a.modulePath.localeCompare(b.modulePath) || a.targetName.localeCompare(b.targetName)
            ),
          })
        ),
    }));
}
