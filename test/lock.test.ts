import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { KeyedMutex, LockHeldError, acquireLock } from '../src/store/lock.js';

describe('KeyedMutex', () => {
  it('runs calls with the same key one at a time', async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];
    const job = (name: string, ms: number) =>
      mutex.run('k', async () => {
        events.push(`${name}:start`);
        await new Promise((r) => setTimeout(r, ms));
        events.push(`${name}:end`);
      });

    await Promise.all([job('a', 20), job('b', 1)]);
    expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end']);
    expect(mutex.size).toBe(0);
  });

  it('keeps going after a failed call', async () => {
    const mutex = new KeyedMutex();
    const failed = mutex.run('k', async () => {
      throw new Error('nope');
    });
    const next = mutex.run('k', async () => 'ok');
    await expect(failed).rejects.toThrow('nope');
    await expect(next).resolves.toBe('ok');
  });
});

describe('acquireLock', () => {
  let dir: string;
  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'dayplan-lock-'));
  });
  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes our pid and removes the file on release', async () => {
    const lock = await acquireLock(dir);
    const payload = JSON.parse(await readFile(lock.path, 'utf8'));
    expect(payload.pid).toBe(process.pid);

    await lock.release();
    await expect(readFile(lock.path, 'utf8')).rejects.toMatchObject({ code: 'ENOENT' });
    await lock.release();
  });

  it('takes over a lock left by a dead process', async () => {
    await writeFile(path.join(dir, 'scheduler.lock'), 'not json');
    const lock = await acquireLock(dir);
    expect(JSON.parse(await readFile(lock.path, 'utf8')).pid).toBe(process.pid);
  });

  it('refuses a lock held by a live process', async () => {
    // the parent of the test runner is alive for the whole run
    await writeFile(path.join(dir, 'scheduler.lock'), JSON.stringify({ pid: process.ppid }));
    await expect(acquireLock(dir)).rejects.toBeInstanceOf(LockHeldError);
  });
});
