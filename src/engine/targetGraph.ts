import path from 'path';

import { CyclicDependencyError, DeclarationError, DuplicateTargetError, UnknownTargetError } from './errors';
import { splitTargetId, Target, toTargetId } from './target';
import { TargetId, TargetRef, TargetSpec } from './types';

/**
 * Every loaded target keyed by id, with forward and reverse adjacency.
 */
export class TargetGraph {
  private readonly targets = new Map<TargetId, Target>();
  private readonly dependents = new Map<TargetId, Set<TargetId>>();
  private readonly artifactOwners = new Map<string, TargetId>();
  private readonly touched = new Set<TargetId>();

  get size(): number {
    return this.targets.size;
  }

  get(id: TargetId): Target | undefined {
    return this.targets.get(id);
  }

  require(id: TargetId): Target {
    const target = this.targets.get(id);
    if (!target) {
      const { modulePath, targetName } = splitTargetId(id);
      throw new UnknownTargetError(modulePath, targetName);
    }
    return target;
  }

  /**
   * Prerequisites of `target`, shallowest first.
   */
  dependenciesOf(target: Target): Target[] {
    return [...target.depends].map(id => this.require(id)).sort(compareTargets);
  }

  dependentsOf(id: TargetId): Target[] {
    return [...(this.dependents.get(id) || [])].map(dependent => this.require(dependent)).sort(compareTargets);
  }

  /**
   * Registers the targets one module declares. Local references are resolved by name, references to other modules
   * must already be loaded. Depths are computed here, so an unresolvable order is reported as a cycle.
   */
  registerModuleTargets(
    modulePath: string,
    specs: ReadonlyArray<TargetSpec>,
    implicitDependencies: Readonly<Record<string, TargetRef>> = {}
  ): Map<string, Target> {
    const specByName = new Map<string, TargetSpec>();
    for (const spec of specs) {
      if (specByName.has(spec.name)) {
        throw new DuplicateTargetError(modulePath, spec.name, 'declared twice in the module');
      }
      if (!spec.name || spec.name.includes('#')) {
        throw new DeclarationError(modulePath, [`invalid target name "${spec.name}"`]);
      }
      if (!spec.action && spec.depends && Object.keys(spec.depends).length > 0) {
        throw new DeclarationError(modulePath, [`direct target "${spec.name}" cannot declare dependencies`]);
      }
      specByName.set(spec.name, spec);
    }

    const created = new Map<string, Target>();
    const visiting: string[] = [];

    const create = (name: string): Target => {
      const existing = created.get(name);
      if (existing) {
        return existing;
      }
      if (visiting.includes(name)) {
        const cycle = [...visiting.slice(visiting.indexOf(name)), name].map(n => toTargetId(modulePath, n));
        throw new CyclicDependencyError(cycle, modulePath, name);
      }
      const spec = specByName.get(name);
      if (!spec) {
        throw new UnknownTargetError(modulePath, name, [...specByName.keys()]);
      }
      visiting.push(name);

      const dependencies: Record<string, TargetId> = {};
      let depth = 0;
      const addDependency = (role: string, dependency: Target) => {
        dependencies[role] = dependency.id;
        depth = Math.max(depth, dependency.depth + 1);
      };
      for (const [role, ref] of Object.entries(spec.depends || {})) {
        addDependency(role, this.resolveRef(ref, create));
      }
      if (spec.action) {
        for (const [role, ref] of Object.entries(implicitDependencies)) {
          const refersToSelf = typeof ref === 'string' ? ref === name : ref.id === toTargetId(modulePath, name);
          if (!refersToSelf && !(role in dependencies)) {
            addDependency(role, this.resolveRef(ref, create));
          }
        }
      }

      const target = new Target({
        name,
        modulePath,
        path: path.resolve(modulePath, spec.path),
        action: spec.action,
        dependencies,
        depth,
        parallelizable: spec.parallelizable,
        primary: spec.primary,
      });
      visiting.pop();
      created.set(name, target);
      return target;
    };

    for (const spec of specs) {
      create(spec.name);
    }

    for (const target of created.values()) {
      if (this.targets.has(target.id)) {
        throw new DuplicateTargetError(modulePath, target.name, 'module loaded twice');
      }
      const owner = this.artifactOwners.get(target.path);
      if (owner) {
        throw new DuplicateTargetError(modulePath, target.name, `artifact ${target.path} already belongs to ${owner}`);
      }
    }
    const paths = new Set<string>();
    for (const target of created.values()) {
      if (paths.has(target.path)) {
        throw new DuplicateTargetError(modulePath, target.name, `artifact ${target.path} is declared twice`);
      }
      paths.add(target.path);
    }

    for (const target of created.values()) {
      this.add(target);
    }
    // keep declaration order
    return new Map(specs.map(spec => [spec.name, this.require(toTargetId(modulePath, spec.name))]));
  }

  private resolveRef(ref: TargetRef, create: (name: string) => Target): Target {
    if (typeof ref === 'string') {
      return create(ref);
    }
    const loaded = this.targets.get(ref.id);
    if (!loaded) {
      throw new UnknownTargetError(ref.modulePath, ref.name);
    }
    return loaded;
  }

  private add(target: Target) {
    this.targets.set(target.id, target);
    this.artifactOwners.set(target.path, target.id);
    for (const dependency of target.depends) {
      const list = this.dependents.get(dependency) || new Set<TargetId>();
      list.add(target.id);
      this.dependents.set(dependency, list);
    }
  }

  /**
   * Forgets the targets of one module. Dependents in other modules must be dropped by the caller as well.
   */
  removeModule(modulePath: string): void {
    for (const target of [...this.targets.values()]) {
      if (target.modulePath !== modulePath) {
        continue;
      }
      this.targets.delete(target.id);
      this.artifactOwners.delete(target.path);
      this.touched.delete(target.id);
      this.dependents.delete(target.id);
      for (const dependency of target.depends) {
        this.dependents.get(dependency)?.delete(target.id);
      }
    }
  }

  markAsTouched(id: TargetId): void {
    this.touched.add(id);
  }

  isTouched(id: TargetId): boolean {
    return this.touched.has(id);
  }

  clearTouched(id?: TargetId): void {
    if (id === undefined) {
      this.touched.clear();
    } else {
      this.touched.delete(id);
    }
  }
}

export function compareTargets(a: Target, b: Target): number {
  return a.depth - b.depth || a.id.localeCompare(b.id);
}
