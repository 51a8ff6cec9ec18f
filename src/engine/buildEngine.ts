import fs from 'fs';
import path from 'path';

import { EngineConfig } from '../config';
import { Logger } from '../io';
import { statOrUndefined } from '../utils';
import { acquireArtifactLock } from './artifactLock';
import {
  BuildActionFailedError,
  describeTarget,
  DirectTargetNotBuildableError,
  MissingPrerequisiteError,
  TargetLockError,
} from './errors';
import { GenerationStore } from './generationStore';
import { Module } from './module';
import { PathModuleResolver } from './resolver';
import { StalenessEvaluator } from './staleness';
import { Target } from './target';
import { TargetGraph } from './targetGraph';
import { BuildContext, TargetId, TargetState } from './types';

export interface MakeOptions {
  /** Make stale prerequisites first. Without it a stale prerequisite is an error. */
  recurse?: boolean;
  /** Rebuild even when up to date. Prerequisites are still only made when stale. */
  force?: boolean;
}

export interface BuildReport {
  built: TargetId[];
  upToDate: TargetId[];
}

export type CleanOutcome =
  | { status: 'removed'; target: Target; paths: string[] }
  | { status: 'absent'; target: Target }
  | { status: 'unsupported'; target: Target; reason: string };

export interface BuildEngineOptions {
  config: EngineConfig;
  graph: TargetGraph;
  store: GenerationStore;
  evaluator: StalenessEvaluator;
  resolver: PathModuleResolver;
  logger: Logger;
}

export function formatDuration(durationMs: number): string {
  const minutes = Math.floor(durationMs / 60000);
  const seconds = (durationMs % 60000) / 1000;
  return `${minutes}min ${seconds.toFixed(2)}s`;
}

export class BuildEngine {
  private readonly inFlight = new Map<TargetId, Promise<void>>();

  constructor(private readonly options: BuildEngineOptions) {}

  private get logger() {
    return this.options.logger;
  }

  isBuilding(id: TargetId): boolean {
    return this.inFlight.has(id);
  }

  isUpToDate(target: Target): boolean {
    return this.options.evaluator.isUpToDate(target);
  }

  state(target: Target): TargetState {
    return this.options.evaluator.state(target, this.isBuilding(target.id));
  }

  markAsTouched(target: Target): void {
    this.options.graph.markAsTouched(target.id);
  }

  async make(target: Target, options: MakeOptions = {}): Promise<BuildReport> {
    const report: BuildReport = { built: [], upToDate: [] };
    await this.makeTarget(target, { recurse: options.recurse ?? true, force: options.force ?? false }, report);
    return report;
  }

  /**
   * At most one build per target: a second request joins the running one instead of starting the action again.
   */
  private makeTarget(target: Target, options: Required<MakeOptions>, report: BuildReport): Promise<void> {
    const running = this.inFlight.get(target.id);
    if (running) {
      this.logger.debug(`${target.id} is already being made, waiting for it`);
      return running.then(() => {
        report.upToDate.push(target.id);
      });
    }
    const promise = this.runMake(target, options, report).finally(() => this.inFlight.delete(target.id));
    this.inFlight.set(target.id, promise);
    return promise;
  }

  private async runMake(target: Target, { recurse, force }: Required<MakeOptions>, report: BuildReport) {
    const { evaluator, graph, store } = this.options;

    if (target.isDirect) {
      if (!statOrUndefined(target.path)) {
        throw new DirectTargetNotBuildableError(target.modulePath, target.name, target.path);
      }
      if (force) {
        this.logger.warn(`${describeTarget(target.modulePath, target.name)} is a direct target and is never rebuilt`);
      }
      report.upToDate.push(target.id);
      return;
    }

    const fresh = evaluator.isUpToDate(target);
    if (fresh && !force) {
      this.logger.debug(`${target.id} already made`);
      report.upToDate.push(target.id);
      return;
    }
    if (fresh) {
      this.logger.warn(`${describeTarget(target.modulePath, target.name)} is up to date, rebuilding it anyway`);
    }

    const dependencies = graph.dependenciesOf(target);
    if (recurse) {
      for (const dependency of dependencies) {
        await this.makeTarget(dependency, { recurse: true, force: false }, report);
      }
    } else {
      const stale = dependencies.find(dependency => !evaluator.isUpToDate(dependency));
      if (stale) {
        throw new MissingPrerequisiteError(target.modulePath, target.name, stale.id);
      }
    }

    const lock = await acquireArtifactLock(store.lockPath(target), this.options.config.lockTimeoutMs);
    if (!lock) {
      throw new TargetLockError(target.modulePath, target.name, store.lockPath(target));
    }
    try {
      if (!force && evaluator.isUpToDate(target)) {
        this.logger.info(`${target.id} was made by another process meanwhile`);
        report.upToDate.push(target.id);
        return;
      }
      await this.build(target, dependencies);
      report.built.push(target.id);
    } finally {
      lock.release();
    }
  }

  private async build(target: Target, dependencies: Target[]) {
    const { evaluator, graph, store, resolver } = this.options;
    const action = target.action;
    if (!action) {
      throw new DirectTargetNotBuildableError(target.modulePath, target.name, target.path);
    }

    const inputs: Record<TargetId, string> = {};
    let dependencyGeneration = 0;
    for (const dependency of dependencies) {
      const token = evaluator.inputToken(dependency);
      if (token === undefined) {
        throw new MissingPrerequisiteError(target.modulePath, target.name, dependency.id);
      }
      inputs[dependency.id] = token;
      dependencyGeneration = Math.max(dependencyGeneration, evaluator.generationOf(dependency));
    }

    const module = resolver.resolve(target.modulePath);
    const namedDependencies: Record<string, Target> = {};
    for (const [role, id] of Object.entries(target.dependencies)) {
      namedDependencies[role] = graph.require(id);
    }
    const logger = this.logger.child(`${module.name}/${target.name}`);
    const context: BuildContext = {
      target,
      module,
      dependencies: namedDependencies,
      dependency: role => {
        const dependency = namedDependencies[role];
        if (!dependency) {
          throw new Error(`${target.id} declares no dependency "${role}"`);
        }
        return dependency;
      },
      logger,
    };

    const generation = store.reserveGeneration(target, dependencyGeneration);
    // an interrupted build must not leave a fresh-looking artifact behind
    store.remove(target);
    fs.mkdirSync(path.dirname(target.path), { recursive: true });

    logger.info(`start making with ${dependencies.length} dependencies`);
    const started = Date.now();
    try {
      await action(context);
    } catch (err) {
      throw new BuildActionFailedError(target.modulePath, target.name, err);
    }
    if (!statOrUndefined(target.path)) {
      throw new BuildActionFailedError(
        target.modulePath,
        target.name,
        new Error(`build action did not produce ${target.path}`)
      );
    }

    store.write(target, {
      version: 1,
      target: target.id,
      generation,
      inputs,
      builtAt: new Date().toISOString(),
    });
    graph.clearTouched(target.id);
    logger.info(`made in ${formatDuration(Date.now() - started)}`);
  }

  /**
   * Removes the artifacts of the named targets (all targets of the module without names). Every name is checked
   * before anything is removed. Dependents are left alone.
   */
  clean(module: Module, names: ReadonlyArray<string> = []): CleanOutcome[] {
    const targets = names.length > 0 ? names.map(name => module.target(name)) : [...module.targets.values()];
    return targets.map(target => this.cleanTarget(target));
  }

  private cleanTarget(target: Target): CleanOutcome {
    if (target.isDirect) {
      return { status: 'unsupported', target, reason: 'direct targets are never removed' };
    }
    if (this.isBuilding(target.id)) {
      return { status: 'unsupported', target, reason: 'target is being built' };
    }
    const paths: string[] = [];
    if (statOrUndefined(target.path)) {
      fs.rmSync(target.path, { recursive: true, force: true });
      paths.push(target.path);
    }
    if (this.options.store.remove(target)) {
      paths.push(this.options.store.markerPath(target));
    }
    this.options.graph.clearTouched(target.id);
    this.logger.debug(`cleaned ${target.id}`);
    return paths.length > 0 ? { status: 'removed', target, paths } : { status: 'absent', target };
  }
}
