import { types } from 'util';

export type StageTreeErrorCode =
  | 'MODULE_NOT_FOUND'
  | 'UNKNOWN_MODULE_KIND'
  | 'INVALID_DECLARATION'
  | 'MODULE_LOAD_FAILED'
  | 'UNKNOWN_TARGET'
  | 'DUPLICATE_TARGET'
  | 'CYCLIC_DEPENDENCY'
  | 'MISSING_PREREQUISITE'
  | 'DIRECT_TARGET_NOT_BUILDABLE'
  | 'BUILD_ACTION_FAILED'
  | 'TARGET_LOCKED';

export interface StageTreeErrorDetails {
  modulePath?: string;
  targetName?: string;
  cause?: unknown;
}

export abstract class StageTreeError extends Error {
  abstract readonly code: StageTreeErrorCode;
  /** Graph-structural errors abort the whole requested operation. */
  readonly structural: boolean = false;
  readonly modulePath?: string;
  readonly targetName?: string;

  constructor(message: string, details: StageTreeErrorDetails = {}) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = new.target.name;
    this.modulePath = details.modulePath;
    this.targetName = details.targetName;
  }
}

export function describeTarget(modulePath: string, targetName: string): string {
  return `${modulePath} -t ${targetName}`;
}

export class ModuleNotFoundError extends StageTreeError {
  readonly code = 'MODULE_NOT_FOUND';
  override readonly structural = true;

  constructor(readonly requestedPath: string, reason?: string) {
    super(`No module declaration found at or above ${requestedPath}${reason ? ` (${reason})` : ''}`, {
      modulePath: requestedPath,
    });
  }
}

export class UnknownModuleKindError extends StageTreeError {
  readonly code = 'UNKNOWN_MODULE_KIND';
  override readonly structural = true;

  constructor(
    modulePath: string,
    readonly kind: string,
    readonly knownKinds: ReadonlyArray<string>
  ) {
    super(
      `Module ${modulePath} declares kind "${kind}" which is not registered (known: ${knownKinds.join(', ') || 'none'})`,
      { modulePath }
    );
  }
}

export class DeclarationError extends StageTreeError {
  readonly code = 'INVALID_DECLARATION';
  override readonly structural = true;

  constructor(modulePath: string, readonly issues: ReadonlyArray<string>, cause?: unknown) {
    super(`Invalid module declaration in ${modulePath}: ${issues.join('; ')}`, { modulePath, cause });
  }
}

/**
 * A module kind's own declaration code threw. Not structural: a scan records it and carries on with other subtrees.
 */
export class ModuleLoadError extends StageTreeError {
  readonly code = 'MODULE_LOAD_FAILED';

  constructor(modulePath: string, cause: unknown) {
    super(`Loading module ${modulePath} failed: ${errorMessage(cause)}`, { modulePath, cause });
  }
}

export class UnknownTargetError extends StageTreeError {
  readonly code = 'UNKNOWN_TARGET';
  override readonly structural = true;

  constructor(modulePath: string, targetName: string, readonly knownTargets: ReadonlyArray<string> = []) {
    super(
      `Unknown target ${describeTarget(modulePath, targetName)}${
        knownTargets.length > 0 ? ` (declared: ${knownTargets.join(', ')})` : ''
      }`,
      { modulePath, targetName }
    );
  }
}

export class DuplicateTargetError extends StageTreeError {
  readonly code = 'DUPLICATE_TARGET';
  override readonly structural = true;

  constructor(modulePath: string, targetName: string, reason: string) {
    super(`Duplicate target ${describeTarget(modulePath, targetName)}: ${reason}`, { modulePath, targetName });
  }
}

export class CyclicDependencyError extends StageTreeError {
  readonly code = 'CYCLIC_DEPENDENCY';
  override readonly structural = true;

  constructor(readonly cycle: ReadonlyArray<string>, modulePath?: string, targetName?: string) {
    super(`Circular dependency: ${cycle.join(' → ')}`, { modulePath, targetName });
  }
}

export class MissingPrerequisiteError extends StageTreeError {
  readonly code = 'MISSING_PREREQUISITE';

  constructor(modulePath: string, targetName: string, readonly prerequisiteId: string) {
    super(
      `Cannot make ${describeTarget(modulePath, targetName)} without recursion: prerequisite ${prerequisiteId} is not up to date`,
      { modulePath, targetName }
    );
  }
}

export class DirectTargetNotBuildableError extends StageTreeError {
  readonly code = 'DIRECT_TARGET_NOT_BUILDABLE';

  constructor(modulePath: string, targetName: string, readonly artifactPath: string) {
    super(
      `Direct target ${describeTarget(modulePath, targetName)} is missing (${artifactPath}) and has no build action`,
      { modulePath, targetName }
    );
  }
}

export class BuildActionFailedError extends StageTreeError {
  readonly code = 'BUILD_ACTION_FAILED';

  constructor(modulePath: string, targetName: string, cause: unknown) {
    super(`Build of ${describeTarget(modulePath, targetName)} failed: ${errorMessage(cause)}`, {
      modulePath,
      targetName,
      cause,
    });
  }
}

export class TargetLockError extends StageTreeError {
  readonly code = 'TARGET_LOCKED';

  constructor(modulePath: string, targetName: string, readonly lockPath: string) {
    super(`Timed out waiting for the build lock of ${describeTarget(modulePath, targetName)} (${lockPath})`, {
      modulePath,
      targetName,
    });
  }
}

export function isStageTreeError(err: unknown): err is StageTreeError {
  return err instanceof StageTreeError;
}

export function isStructuralError(err: unknown): boolean {
  return isStageTreeError(err) && err.structural;
}

export function toError(err: unknown): Error {
  if (err instanceof Error || types.isNativeError(err)) {
    return err;
  }
  return new Error(String(err));
}

export function errorMessage(err: unknown): string {
  return toError(err).message;
}
