import path from 'path';

import { LogLevel, toLogLevel } from '../models';

export interface EngineConfig {
  /** File whose presence makes a directory a module. */
  readonly declarationFile: string;
  /** Per-module directory holding build-generation markers and locks. */
  readonly stateDirName: string;
  /** Sub-directories starting with one of these are never visited as child modules. */
  readonly excludedPrefixes: ReadonlyArray<string>;
  /** Upward declaration search never leaves this directory. */
  readonly searchBoundary?: string;
  /** Indirect targets implicitly depend on their module's declaration file. */
  readonly trackDeclarations: boolean;
  readonly lockTimeoutMs: number;
  readonly logLevel: LogLevel;
}

export const defaultEngineConfig: EngineConfig = Object.freeze({
  declarationFile: 'stage.json',
  stateDirName: '.stagetree',
  excludedPrefixes: Object.freeze(['#', '_', '.']),
  trackDeclarations: false,
  lockTimeoutMs: 10 * 60 * 1000,
  logLevel: LogLevel.info,
});

export type EngineConfigOverrides = { -readonly [K in keyof EngineConfig]?: EngineConfig[K] };

export function createEngineConfig(...overrides: Array<EngineConfigOverrides | undefined>): EngineConfig {
  const merged: EngineConfigOverrides = { ...defaultEngineConfig };
  for (const override of overrides) {
    if (!override) {
      continue;
    }
    for (const [key, value] of Object.entries(override)) {
      if (value !== undefined) {
        Object.assign(merged, { [key]: value });
      }
    }
  }
  const config: EngineConfig = {
    declarationFile: merged.declarationFile ?? defaultEngineConfig.declarationFile,
    stateDirName: merged.stateDirName ?? defaultEngineConfig.stateDirName,
    excludedPrefixes: Object.freeze([...(merged.excludedPrefixes ?? defaultEngineConfig.excludedPrefixes)]),
    searchBoundary: merged.searchBoundary ? path.resolve(merged.searchBoundary) : undefined,
    trackDeclarations: merged.trackDeclarations ?? defaultEngineConfig.trackDeclarations,
    lockTimeoutMs: merged.lockTimeoutMs ?? defaultEngineConfig.lockTimeoutMs,
    logLevel: merged.logLevel ?? defaultEngineConfig.logLevel,
  };
  return Object.freeze(config);
}

/**
 * Reads the `STAGETREE_*` variables. Unset or unparsable variables are left out.
 */
export function engineConfigFromEnv(env: NodeJS.ProcessEnv = process.env): EngineConfigOverrides {
  const overrides: EngineConfigOverrides = {};
  if (env.STAGETREE_DECLARATION_FILE) {
    overrides.declarationFile = env.STAGETREE_DECLARATION_FILE;
  }
  if (env.STAGETREE_STATE_DIR) {
    overrides.stateDirName = env.STAGETREE_STATE_DIR;
  }
  if (env.STAGETREE_EXCLUDE) {
    overrides.excludedPrefixes = env.STAGETREE_EXCLUDE.split(',')
      .map(prefix => prefix.trim())
      .filter(Boolean);
  }
  if (env.STAGETREE_BOUNDARY) {
    overrides.searchBoundary = env.STAGETREE_BOUNDARY;
  }
  if (env.STAGETREE_TRACK_DECLARATIONS) {
    overrides.trackDeclarations = ['1', 'true', 'yes'].includes(env.STAGETREE_TRACK_DECLARATIONS.toLowerCase());
  }
  const lockTimeout = Number(env.STAGETREE_LOCK_TIMEOUT_MS);
  if (env.STAGETREE_LOCK_TIMEOUT_MS && Number.isFinite(lockTimeout)) {
    overrides.lockTimeoutMs = lockTimeout;
  }
  const logLevel = toLogLevel(env.STAGETREE_LOG_LEVEL);
  if (logLevel !== undefined) {
    overrides.logLevel = logLevel;
  }
  return overrides;
}
