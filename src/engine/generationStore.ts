import fs from 'fs';
import path from 'path';
import { z } from 'zod';

import { EngineConfig } from '../config';
import { atomicWriteFileSync, isErrnoException, statOrUndefined } from '../utils';
import { Target } from './target';

export const GenerationMarkerSchema = z.object({
  version: z.literal(1),
  target: z.string(),
  generation: z.number().int().nonnegative(),
  inputs: z.record(z.string()),
  builtAt: z.string(),
});

/**
 * Persisted next to the module after a successful build. `inputs` holds the token every prerequisite had when the
 * target was built; a differing token later means the prerequisite changed since.
 */
export type GenerationMarker = z.infer<typeof GenerationMarkerSchema>;

export class GenerationStore {
  constructor(private readonly config: EngineConfig) {}

  markerPath(target: Target): string {
    return path.join(target.modulePath, this.config.stateDirName, `${encodeURIComponent(target.name)}.json`);
  }

  lockPath(target: Target): string {
    return `${this.markerPath(target)}.lock`;
  }

  counterPath(target: Target): string {
    return path.join(target.modulePath, this.config.stateDirName, `${encodeURIComponent(target.name)}.gen`);
  }

  /**
   * Highest generation ever handed out to the target. Unlike the marker, the counter survives `clean` and failed
   * builds.
   */
  lastGeneration(target: Target): number {
    let counter = 0;
    try {
      const value = Number.parseInt(fs.readFileSync(this.counterPath(target), 'utf-8'), 10);
      counter = Number.isInteger(value) && value > 0 ? value : 0;
    } catch (err) {
      if (!isErrnoException(err) || err.code !== 'ENOENT') {
        throw err;
      }
    }
    return Math.max(counter, this.read(target)?.generation ?? 0);
  }

  /**
   * Claims the generation of the build about to start: above every generation the target ever had and above
   * `atLeast`. A rebuilt target therefore never repeats a generation a dependent has recorded.
   */
  reserveGeneration(target: Target, atLeast: number): number {
    const generation = Math.max(this.lastGeneration(target), atLeast) + 1;
    atomicWriteFileSync(this.counterPath(target), `${generation}\n`);
    return generation;
  }

  /**
   * The stored marker, or `undefined` when there is none or it cannot be parsed (an unreadable marker never counts
   * as fresh).
   */
  read(target: Target): GenerationMarker | undefined {
    let content: string;
    try {
      content = fs.readFileSync(this.markerPath(target), 'utf-8');
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') {
        return undefined;
      }
      throw err;
    }
    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch {
      return undefined;
    }
    const result = GenerationMarkerSchema.safeParse(raw);
    if (!result.success || result.data.target !== target.id) {
      return undefined;
    }
    return result.data;
  }

  write(target: Target, marker: GenerationMarker): void {
    atomicWriteFileSync(this.markerPath(target), JSON.stringify(marker, null, 2));
  }

  remove(target: Target): boolean {
    const markerPath = this.markerPath(target);
    const existed = !!statOrUndefined(markerPath);
    fs.rmSync(markerPath, { force: true });
    return existed;
  }
}

/**
 * Identity of a direct artifact as seen on disk: modification time and size, for directories the newest
 * modification time below it and the number of entries. Symlinks below a directory count as themselves, so a
 * dangling one is still an entry.
 */
export function artifactFingerprint(fileName: string): string | undefined {
  const stat = statOrUndefined(fileName);
  if (!stat) {
    return undefined;
  }
  if (!stat.isDirectory()) {
    return `f${stat.mtimeMs}:${stat.size}`;
  }
  let newest = stat.mtimeMs;
  let entries = 0;
  const walk = (directory: string) => {
    for (const entry of fs.readdirSync(directory, { withFileTypes: true })) {
      const entryPath = path.join(directory, entry.name);
      entries += 1;
      newest = Math.max(newest, fs.lstatSync(entryPath).mtimeMs);
      if (entry.isDirectory()) {
        walk(entryPath);
      }
    }
  };
  walk(fileName);
  return `d${newest}:${entries}`;
}
