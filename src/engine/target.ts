import { BuildAction, TargetId, TargetKind } from './types';

export const DEFAULT_PARALLELIZABLE = '100%';
export const DECLARATION_TARGET = '__declaration__';

export function toTargetId(modulePath: string, targetName: string): TargetId {
  return `${modulePath}#${targetName}`;
}

export function splitTargetId(id: TargetId): { modulePath: string; targetName: string } {
  const index = id.lastIndexOf('#');
  if (index < 0) {
    return { modulePath: '', targetName: id };
  }
  return { modulePath: id.slice(0, index), targetName: id.slice(index + 1) };
}

/**
 * Names without a colon are primary; `name:variant` targets belong to the primary target `name`.
 */
export function isPrimaryName(name: string): boolean {
  return !name.includes(':');
}

export interface TargetInit {
  name: string;
  modulePath: string;
  path: string;
  action?: BuildAction;
  dependencies: Readonly<Record<string, TargetId>>;
  depth: number;
  parallelizable?: string;
  primary?: boolean;
}

/**
 * One declared output. Immutable after its module is loaded; the graph is kept as target ids, not references.
 */
export class Target {
  readonly id: TargetId;
  readonly name: string;
  readonly modulePath: string;
  readonly path: string;
  readonly kind: TargetKind;
  readonly action?: BuildAction;
  readonly dependencies: Readonly<Record<string, TargetId>>;
  readonly depends: ReadonlySet<TargetId>;
  readonly depth: number;
  readonly parallelizable: string;
  readonly primary: boolean;

  constructor(init: TargetInit) {
    this.id = toTargetId(init.modulePath, init.name);
    this.name = init.name;
    this.modulePath = init.modulePath;
    this.path = init.path;
    this.kind = init.action ? 'indirect' : 'direct';
    this.action = init.action;
    this.dependencies = Object.freeze({ ...init.dependencies });
    this.depends = new Set(Object.values(init.dependencies));
    this.depth = init.depth;
    this.parallelizable = init.parallelizable || DEFAULT_PARALLELIZABLE;
    this.primary = init.primary ?? isPrimaryName(init.name);
    Object.freeze(this);
  }

  get isDirect(): boolean {
    return this.kind === 'direct';
  }

  toString(): string {
    return `${this.path} [${this.depth}@${this.parallelizable}] (${this.kind})`;
  }
}
