import { mkdir, readFile, writeFile, unlink } from 'node:fs/promises';
import path from 'node:path';

export interface LockHandle {
  path: string;
  release(): Promise<void>;
}

export class LockHeldError extends Error {
  constructor(readonly pid: number) {
    super(`Another dayplan scheduler is running (pid=${pid}).`);
    this.name = 'LockHeldError';
  }
}

/**
 * Cross-process lock file. Used by `serve` so only one refresh scheduler
 * runs per database. A lock left by a dead process is taken over.
 */
export async function acquireLock(dir: string, filename = 'scheduler.lock'): Promise<LockHandle> {
  await mkdir(dir, { recursive: true });
  const lockPath = path.join(dir, filename);

  const payload = JSON.stringify({ pid: process.pid, at: new Date().toISOString() }) + '\n';

  try {
    await writeFile(lockPath, payload, { flag: 'wx' });
  } catch (err) {
    if (!isFileExists(err)) throw err;

    const otherPid = await readLockPid(lockPath);
    if (otherPid !== undefined && otherPid !== process.pid && isProcessAlive(otherPid)) {
      throw new LockHeldError(otherPid);
    }

    // stale
    await writeFile(lockPath, payload, { flag: 'w' });
  }

  return {
    path: lockPath,
    release: async () => {
      await unlink(lockPath).catch((err: unknown) => {
        if (!isNotFound(err)) throw err;
      });
    },
  };
}

async function readLockPid(lockPath: string): Promise<number | undefined> {
  try {
    const parsed: unknown = JSON.parse(await readFile(lockPath, 'utf8'));
    if (typeof parsed === 'object' && parsed !== null && 'pid' in parsed && typeof parsed.pid === 'number') {
      return parsed.pid;
    }
    return undefined;
  } catch {
    // unreadable or half-written: treat as stale
    return undefined;
  }
}

function errnoCode(err: unknown): string | undefined {
  return typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string'
    ? err.code
    : undefined;
}

const isFileExists = (err: unknown) => errnoCode(err) === 'EEXIST';
const isNotFound = (err: unknown) => errnoCode(err) === 'ENOENT';

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch {
    return false;
  }
}

/**
 * In-process mutex keyed by string. Calls sharing a key run one after the
 * other; different keys never wait on each other.
 */
export class KeyedMutex {
  private tails = new Map<string, Promise<unknown>>();

  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const prev = this.tails.get(key) ?? Promise.resolve();
    const next = prev.then(fn, fn);
    const tail = next.catch(() => undefined);
    this.tails.set(key, tail);
    try {
      return await next;
    } finally {
      if (this.tails.get(key) === tail) this.tails.delete(key);
    }
  }

  get size(): number {
    return this.tails.size;
  }
}
