import { ModuleKind } from './types';

/**
 * Module kinds by name. Replaces looking up classes by directory name at run time.
 */
export class ModuleRegistry {
  private readonly kinds = new Map<string, ModuleKind>();

  register(...kinds: ModuleKind[]): this {
    for (const kind of kinds) {
      if (this.kinds.has(kind.name)) {
        throw new Error(`Module kind "${kind.name}" is already registered`);
      }
      this.kinds.set(kind.name, kind);
    }
    return this;
  }

  get(name: string): ModuleKind | undefined {
    return this.kinds.get(name);
  }

  has(name: string): boolean {
    return this.kinds.has(name);
  }

  names(): string[] {
    return [...this.kinds.keys()].sort();
  }
}
