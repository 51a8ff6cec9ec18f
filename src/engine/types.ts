import type { Logger } from '../io';
import type { Module } from './module';
import type { Target } from './target';

/** `<module-path>#<target-name>` */
export type TargetId = string;

export type TargetKind = 'direct' | 'indirect';

export type TargetState = 'unknown' | 'up_to_date' | 'stale' | 'building' | 'touched';

export interface BuildContext {
  readonly target: Target;
  readonly module: Module;
  /** Prerequisites by the role they were declared under. */
  readonly dependencies: Readonly<Record<string, Target>>;
  dependency(role: string): Target;
  readonly logger: Logger;
}

export type BuildAction = (context: BuildContext) => void | Promise<void>;

/** A local target name of the same module, or a target already loaded from another module. */
export type TargetRef = string | Target;

export interface TargetSpec {
  name: string;
  /** Artifact location, relative to the module directory unless absolute. */
  path: string;
  /** Absent for direct targets. */
  action?: BuildAction;
  depends?: Readonly<Record<string, TargetRef>>;
  parallelizable?: string;
  primary?: boolean;
}

export interface DeclareContext {
  readonly modulePath: string;
  /** Directory name of the module. */
  readonly name: string;
  readonly declarationPath: string;
  readonly config: Readonly<Record<string, unknown>>;
  readonly parent?: Module;
  readonly ancestors: ReadonlyArray<Module>;
  readonly logger: Logger;
  requireParent(): Module;
  /** Resolves another module relative to this module's directory. */
  resolve(relativePath: string): Module;
}

export interface ModuleKind {
  readonly name: string;
  /** Modules of this kind end the ancestor search unless their declaration says otherwise. */
  readonly root?: boolean;
  declareTargets(context: DeclareContext): ReadonlyArray<TargetSpec>;
  extraGitignore?(module: Module): ReadonlyArray<string>;
}

export type InvocationReason = 'stale' | 'forced' | 'prerequisite';

export interface Invocation {
  targetId: TargetId;
  modulePath: string;
  targetName: string;
  force: boolean;
  reason: InvocationReason;
}

export interface PlanBatch {
  parallelizable: string;
  invocations: Invocation[];
}

export interface PlanLayer {
  depth: number;
  batches: PlanBatch[];
}

export interface BlockedTarget {
  targetId: TargetId;
  modulePath: string;
  targetName: string;
  reason: string;
}

export interface ScanIssue {
  modulePath: string;
  message: string;
}

export interface PlanStats {
  modules: number;
  targets: number;
  scheduled: number;
  upToDate: number;
  blocked: number;
  layers: number;
  batches: number;
}

export interface ExecutionPlan {
  rootPath: string;
  force: boolean;
  layers: PlanLayer[];
  blocked: BlockedTarget[];
  issues: ScanIssue[];
  stats: PlanStats;
}

export type InvocationStatus = 'built' | 'up_to_date' | 'failed' | 'blocked';

export interface InvocationResult {
  invocation: Invocation;
  status: InvocationStatus;
  error?: Error;
  durationMs?: number;
}
