import fs from 'fs';
import path from 'path';

import { EngineConfig } from '../config';
import { Logger } from '../io';
import { canonicalPath, isDirectory, isErrnoException, isSameOrInside, statOrUndefined } from '../utils';
import { kindFromDirectoryName, readDeclaration } from './declaration';
import {
  CyclicDependencyError,
  isStageTreeError,
  ModuleLoadError,
  ModuleNotFoundError,
  UnknownModuleKindError,
} from './errors';
import { Module } from './module';
import { ModuleRegistry } from './registry';
import { DECLARATION_TARGET } from './target';
import { TargetGraph } from './targetGraph';
import { DeclareContext, TargetRef, TargetSpec } from './types';

export interface PathModuleResolverOptions {
  config: EngineConfig;
  registry: ModuleRegistry;
  graph: TargetGraph;
  logger: Logger;
  cwd?: string;
}

/**
 * Maps directories to loaded modules. One instance per canonical module directory for the resolver's lifetime.
 */
export class PathModuleResolver {
  private readonly modules = new Map<string, Module>();
  private readonly aliases = new Map<string, string>();
  private readonly loading: string[] = [];
  private readonly config: EngineConfig;
  private readonly registry: ModuleRegistry;
  private readonly graph: TargetGraph;
  private readonly logger: Logger;
  private readonly cwd: string;
  private readonly boundary?: string;

  constructor(options: PathModuleResolverOptions) {
    this.config = options.config;
    this.registry = options.registry;
    this.graph = options.graph;
    this.logger = options.logger;
    this.cwd = options.cwd || process.cwd();
    const boundary = this.config.searchBoundary;
    this.boundary = boundary && isDirectory(boundary) ? canonicalPath(boundary) : boundary;
  }

  resolve(requestedPath: string): Module {
    const canonical = this.canonicalize(requestedPath);
    const cached = this.modules.get(this.aliases.get(canonical) || canonical);
    if (cached) {
      this.logger.trace(`using cached module for ${requestedPath}`);
      return cached;
    }

    const moduleDir = this.findModuleDirectory(canonical);
    if (!moduleDir) {
      throw new ModuleNotFoundError(requestedPath);
    }
    const module = this.modules.get(moduleDir) || this.load(moduleDir);
    if (moduleDir !== canonical) {
      this.aliases.set(canonical, moduleDir);
    }
    return module;
  }

  canonicalize(requestedPath: string): string {
    try {
      return canonicalPath(requestedPath, this.cwd);
    } catch (err) {
      if (isErrnoException(err) && (err.code === 'ENOENT' || err.code === 'ENOTDIR')) {
        throw new ModuleNotFoundError(requestedPath, 'path does not exist');
      }
      throw err;
    }
  }

  isModuleDirectory(directory: string): boolean {
    return !!statOrUndefined(path.join(directory, this.config.declarationFile))?.isFile();
  }

  /**
   * Nearest directory at or above `start` holding a declaration, never leaving the search boundary.
   */
  findModuleDirectory(start: string): string | undefined {
    let directory = isDirectory(start) ? start : path.dirname(start);
    for (;;) {
      if (this.boundary && !isSameOrInside(directory, this.boundary)) {
        return undefined;
      }
      if (this.isModuleDirectory(directory)) {
        return directory;
      }
      const parent = path.dirname(directory);
      if (parent === directory) {
        return undefined;
      }
      directory = parent;
    }
  }

  /**
   * Sub-directories of `module` that are modules themselves, sorted by name. Excluded prefixes are skipped.
   */
  childModuleDirectories(module: Module): string[] {
    return fs
      .readdirSync(module.path, { withFileTypes: true })
      .filter(entry => entry.isDirectory() || (entry.isSymbolicLink() && isDirectory(path.join(module.path, entry.name))))
      .map(entry => entry.name)
      .filter(name => name !== this.config.stateDirName)
      .filter(name => !this.config.excludedPrefixes.some(prefix => name.startsWith(prefix)))
      .sort()
      .map(name => path.join(module.path, name))
      .filter(directory => this.isModuleDirectory(directory));
  }

  cachedModules(): Module[] {
    return [...this.modules.values()];
  }

  /**
   * Drops every cached module (`requestedPath` omitted) or the module at `requestedPath` together with every module
   * below it and every module whose targets depend on a dropped one.
   */
  invalidate(requestedPath?: string): void {
    if (requestedPath === undefined) {
      for (const module of this.modules.values()) {
        this.graph.removeModule(module.path);
      }
      this.modules.clear();
      this.aliases.clear();
      return;
    }

    const root = this.aliases.get(this.canonicalize(requestedPath)) || this.canonicalize(requestedPath);
    const dropped = new Set<string>();
    let changed = true;
    while (changed) {
      changed = false;
      for (const module of this.modules.values()) {
        if (dropped.has(module.path)) {
          continue;
        }
        const affected =
          isSameOrInside(module.path, root) ||
          module.ancestors.some(ancestor => dropped.has(ancestor.path)) ||
          [...module.targets.values()].some(target =>
            [...target.depends].some(id => dropped.has(this.graph.get(id)?.modulePath || ''))
          );
        if (affected) {
          dropped.add(module.path);
          changed = true;
        }
      }
    }

    for (const modulePath of dropped) {
      this.graph.removeModule(modulePath);
      this.modules.delete(modulePath);
      this.logger.debug(`invalidated module ${modulePath}`);
    }
    for (const [alias, modulePath] of [...this.aliases]) {
      if (dropped.has(modulePath)) {
        this.aliases.delete(alias);
      }
    }
  }

  private load(moduleDir: string): Module {
    if (this.loading.includes(moduleDir)) {
      throw new CyclicDependencyError([...this.loading.slice(this.loading.indexOf(moduleDir)), moduleDir], moduleDir);
    }
    this.loading.push(moduleDir);
    try {
      const declaration = readDeclaration(moduleDir, this.config.declarationFile);
      const kindName = declaration.kind || kindFromDirectoryName(moduleDir);
      const kind = this.registry.get(kindName);
      if (!kind) {
        throw new UnknownModuleKindError(moduleDir, kindName, this.registry.names());
      }
      const isRoot = declaration.root ?? kind.root ?? false;
      const parent = isRoot ? undefined : this.loadParent(moduleDir);
      const logger = this.logger.child(path.basename(moduleDir));

      const context: DeclareContext = {
        modulePath: moduleDir,
        name: path.basename(moduleDir),
        declarationPath: path.join(moduleDir, this.config.declarationFile),
        config: Object.freeze({ ...(declaration.config || {}) }),
        parent,
        ancestors: parent ? [...parent.ancestors, parent] : [],
        logger,
        requireParent: () => {
          if (!parent) {
            throw new Error(`Module ${moduleDir} of kind "${kindName}" needs a parent module`);
          }
          return parent;
        },
        resolve: relativePath => this.resolve(path.resolve(moduleDir, relativePath)),
      };

      let specs: ReadonlyArray<TargetSpec>;
      try {
        specs = kind.declareTargets(context);
      } catch (err) {
        if (isStageTreeError(err)) {
          throw err;
        }
        throw new ModuleLoadError(moduleDir, err);
      }

      const implicitDependencies: Record<string, TargetRef> = {};
      if (this.config.trackDeclarations && !specs.some(spec => spec.name === DECLARATION_TARGET)) {
        specs = [...specs, { name: DECLARATION_TARGET, path: this.config.declarationFile, primary: false }];
        implicitDependencies[DECLARATION_TARGET] = DECLARATION_TARGET;
      }

      const targets = this.graph.registerModuleTargets(moduleDir, specs, implicitDependencies);
      const module = new Module(
        {
          path: moduleDir,
          kind: kindName,
          declaration,
          declarationPath: path.join(moduleDir, this.config.declarationFile),
          isRoot,
          parent,
        },
        targets
      );
      this.modules.set(moduleDir, module);
      logger.debug(`loaded ${kindName} module with ${targets.size} targets`);
      return module;
    } finally {
      this.loading.pop();
    }
  }

  private loadParent(moduleDir: string): Module | undefined {
    const parentDir = path.dirname(moduleDir);
    if (parentDir === moduleDir) {
      return undefined;
    }
    const directory = this.findModuleDirectory(parentDir);
    if (!directory) {
      this.logger.debug(`module ${moduleDir} has no enclosing module`);
      return undefined;
    }
    return this.modules.get(directory) || this.load(directory);
  }
}
