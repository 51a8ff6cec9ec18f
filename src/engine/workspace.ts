import path from 'path';

import { EngineConfig, createEngineConfig } from '../config';
import { Logger } from '../io';
import { atomicWriteFileSync, isSameOrInside } from '../utils';
import { BuildEngine } from './buildEngine';
import { executePlan, ExecuteOptions, ExecutionResult } from './executor';
import { GenerationStore } from './generationStore';
import { Module } from './module';
import { ModuleRegistry } from './registry';
import { PathModuleResolver } from './resolver';
import { ScanOptions, Scheduler } from './scheduler';
import { StalenessEvaluator } from './staleness';
import { TargetGraph } from './targetGraph';
import { ExecutionPlan, ScanIssue } from './types';

export interface WorkspaceOptions {
  config?: EngineConfig;
  registry: ModuleRegistry;
  logger?: Logger;
  cwd?: string;
}

/**
 * One independent engine instance. Workspaces share nothing, so several of them (with different configurations)
 * can live in one process.
 */
export class Workspace {
  readonly config: EngineConfig;
  readonly registry: ModuleRegistry;
  readonly logger: Logger;
  readonly graph: TargetGraph;
  readonly store: GenerationStore;
  readonly evaluator: StalenessEvaluator;
  readonly resolver: PathModuleResolver;
  readonly engine: BuildEngine;
  readonly scheduler: Scheduler;

  constructor(options: WorkspaceOptions) {
    this.config = options.config || createEngineConfig();
    this.registry = options.registry;
    this.logger = options.logger || new Logger({ level: this.config.logLevel });
    this.graph = new TargetGraph();
    this.store = new GenerationStore(this.config);
    this.evaluator = new StalenessEvaluator(this.graph, this.store, this.logger);
    this.resolver = new PathModuleResolver({
      config: this.config,
      registry: this.registry,
      graph: this.graph,
      logger: this.logger,
      cwd: options.cwd,
    });
    this.engine = new BuildEngine({
      config: this.config,
      graph: this.graph,
      store: this.store,
      evaluator: this.evaluator,
      resolver: this.resolver,
      logger: this.logger,
    });
    this.scheduler = new Scheduler({
      graph: this.graph,
      resolver: this.resolver,
      evaluator: this.evaluator,
      logger: this.logger,
    });
  }

  resolve(modulePath: string): Module {
    return this.resolver.resolve(modulePath);
  }

  scan(root: Module | string, options?: ScanOptions): ExecutionPlan {
    return this.scheduler.scan(root, options);
  }

  /**
   * The module at `root` and, when `recursive`, every module below it in pre-order.
   */
  modules(root: Module | string, recursive: boolean, issues?: ScanIssue[]): Module[] {
    return this.scheduler.collectModules(typeof root === 'string' ? this.resolve(root) : root, recursive, issues);
  }

  execute(plan: ExecutionPlan, options?: ExecuteOptions): Promise<ExecutionResult> {
    return executePlan(plan, { graph: this.graph, engine: this.engine, logger: this.logger }, options);
  }

  /**
   * Lines of the module's `.gitignore`: the built artifacts that live inside the module directory, the state
   * directory and whatever the module kind adds.
   */
  gitignoreEntries(module: Module): string[] {
    const entries = module
      .targetsOf(target => !target.isDirect && isSameOrInside(target.path, module.path) && target.path !== module.path)
      .map(target => toGitignorePath(path.relative(module.path, target.path)));
    entries.push(`${this.config.stateDirName}/`);
    const kind = this.registry.get(module.kind);
    if (kind?.extraGitignore) {
      entries.push(...kind.extraGitignore(module));
    }
    return [...new Set(entries)];
  }

  /**
   * Rewrites `<module>/.gitignore`. This is the only operation besides builds that writes into a module.
   */
  writeGitignore(module: Module): string {
    const gitignorePath = path.join(module.path, '.gitignore');
    atomicWriteFileSync(gitignorePath, `${this.gitignoreEntries(module).join('\n')}\n`);
    this.logger.debug(`wrote ${gitignorePath}`);
    return gitignorePath;
  }
}

function toGitignorePath(relativePath: string): string {
  return `/${relativePath.split(path.sep).join('/')}`;
}

export function createWorkspace(options: WorkspaceOptions): Workspace {
  return new Workspace(options);
}
