import path from 'path';

import { UnknownTargetError } from './errors';
import { Target } from './target';
import { ModuleDeclaration } from './declaration';

export interface ModuleInit {
  path: string;
  kind: string;
  declaration: ModuleDeclaration;
  declarationPath: string;
  isRoot: boolean;
  parent?: Module;
}

/**
 * A stage bound to one directory: a namespace of targets plus the chain of stages it derives from.
 *
 * Directory names follow `<kind>.<label>`; the label tells apart several stages of the same kind.
 */
export class Module {
  readonly path: string;
  readonly kind: string;
  readonly declaration: ModuleDeclaration;
  readonly declarationPath: string;
  readonly isRoot: boolean;
  readonly parent?: Module;
  readonly ancestors: ReadonlyArray<Module>;
  private readonly targetMap: ReadonlyMap<string, Target>;

  constructor(init: ModuleInit, targets: ReadonlyMap<string, Target>) {
    this.path = init.path;
    this.kind = init.kind;
    this.declaration = init.declaration;
    this.declarationPath = init.declarationPath;
    this.isRoot = init.isRoot;
    this.parent = init.parent;
    this.ancestors = Object.freeze(init.parent ? [...init.parent.ancestors, init.parent] : []);
    this.targetMap = targets;
  }

  get name(): string {
    return path.basename(this.path);
  }

  get label(): string | undefined {
    const index = this.name.indexOf('.');
    return index >= 0 ? this.name.slice(index + 1) : undefined;
  }

  get targets(): ReadonlyMap<string, Target> {
    return this.targetMap;
  }

  has(name: string): boolean {
    return this.targetMap.has(name);
  }

  target(name: string): Target {
    const target = this.targetMap.get(name);
    if (!target) {
      throw new UnknownTargetError(this.path, name, [...this.targetMap.keys()]);
    }
    return target;
  }

  targetsOf(predicate: (target: Target) => boolean): Target[] {
    return [...this.targetMap.values()].filter(predicate);
  }

  targetsPrimaryNames(): string[] {
    return this.targetsOf(target => target.primary).map(target => target.name);
  }

  /** Ancestors followed by this module, root first. */
  enumeratePipeline(): Module[] {
    return [...this.ancestors, this];
  }

  rootModule(): Module {
    return this.ancestors[0] || this;
  }

  requireParent(): Module {
    if (!this.parent) {
      throw new Error(`Module ${this.path} has no parent module`);
    }
    return this.parent;
  }

  /**
   * Nearest module in the pipeline (this one included) whose directory name or label equals `what`.
   */
  findAncestor(what: string): Module | undefined {
    return this.enumeratePipeline()
      .reverse()
      .find(module => module.name === what || module.label === what);
  }

  codename(): string {
    return this.name;
  }

  codenamePipeline(): string {
    return this.enumeratePipeline()
      .map(module => module.codename())
      .join('-');
  }

  toString(): string {
    return `Module ${this.kind} at ${this.path}`;
  }
}
