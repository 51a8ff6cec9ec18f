import fs from 'fs';
import path from 'path';

import { isErrnoException } from '../utils';

export interface ArtifactLock {
  readonly lockPath: string;
  release(): void;
}

interface LockOwner {
  pid?: number;
  startedMs?: number;
}

function sleep(ms: number) {
  return new Promise(resolve => setTimeout(resolve, ms));
}

function backoff(attempt: number): number {
  return Math.min(50 * Math.pow(2, attempt), 1000);
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM: the process exists but belongs to someone else
    return isErrnoException(err) && err.code === 'EPERM';
  }
}

function readOwner(lockPath: string): LockOwner | undefined {
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(lockPath, 'utf-8'));
    if (parsed && typeof parsed === 'object') {
      const pid = 'pid' in parsed && typeof parsed.pid === 'number' ? parsed.pid : undefined;
      const startedMs = 'startedMs' in parsed && typeof parsed.startedMs === 'number' ? parsed.startedMs : undefined;
      return { pid, startedMs };
    }
    return {};
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') {
      return undefined;
    }
    // half-written by its owner; treat as held
    return {};
  }
}

/**
 * Exclusive per-artifact lock shared by every process building into the same module. A lock whose owner process is
 * gone is broken; otherwise the caller waits with exponential backoff until `timeoutMs`.
 */
export async function acquireArtifactLock(lockPath: string, timeoutMs: number): Promise<ArtifactLock | undefined> {
  fs.mkdirSync(path.dirname(lockPath), { recursive: true });
  const started = Date.now();
  let attempt = 0;

  for (;;) {
    try {
      const fd = fs.openSync(lockPath, 'wx');
      try {
        fs.writeSync(fd, JSON.stringify({ pid: process.pid, startedMs: Date.now() }));
      } finally {
        fs.closeSync(fd);
      }
      return {
        lockPath,
        release: () => fs.rmSync(lockPath, { force: true }),
      };
    } catch (err) {
      if (!isErrnoException(err) || err.code !== 'EEXIST') {
        throw err;
      }
    }

    const owner = readOwner(lockPath);
    if (!owner) {
      continue;
    }
    if (owner.pid !== undefined && owner.pid !== process.pid && !isProcessAlive(owner.pid)) {
      fs.rmSync(lockPath, { force: true });
      continue;
    }
    if (Date.now() - started >= timeoutMs) {
      return undefined;
    }
    await sleep(backoff(attempt));
    attempt += 1;
  }
}
