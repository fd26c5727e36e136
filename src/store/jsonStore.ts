import { mkdir, readFile, writeFile, rename, copyFile, stat } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { DataError } from '../errors.js';
import { KeyedMutex } from './lock.js';

const StoredTaskSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  description: z.string().optional(),
  status: z.enum(['active', 'completed']).catch('active'),
  due_date: z.string().nullish(),
  priority: z.union([z.literal(1), z.literal(2), z.literal(3), z.literal(4)]).catch(2),
  project_id: z.string().nullish(),
  parent_id: z.string().nullish(),
  created_at: z.string().optional(),
  updated_at: z.string().optional(),
});

export type StoredTask = z.infer<typeof StoredTaskSchema>;

export interface TaskFile {
  /** File schema version. */
  version: 1;
  tasks: StoredTask[];
}

// v0 files are a bare array of tasks
const TaskFileSchema = z.union([
  z.object({ version: z.literal(1), tasks: z.array(StoredTaskSchema) }),
  z.array(StoredTaskSchema).transform((tasks) => ({ version: 1 as const, tasks })),
]);

function isNotFound(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}

const EMPTY: TaskFile = { version: 1, tasks: [] };

/**
 * One JSON file of tasks per user. Writes go to a temp file that is renamed
 * over the original, after copying the previous version to `.bak`.
 */
export class JsonTaskFileStore {
  private locks = new KeyedMutex();

  constructor(private dir: string) {}

  filePath(userId: string) {
    // user ids are emails or opaque ids; keep them filesystem safe
    const safe = userId.replace(/[^A-Za-z0-9@._-]/g, '_');
    return path.join(this.dir, safe, 'tasks.json');
  }

  exists(userId: string): Promise<boolean> {
    return this.existsAt(this.filePath(userId));
  }

  async load(userId: string): Promise<TaskFile> {
    let raw: string;
    try {
      raw = await readFile(this.filePath(userId), 'utf8');
    } catch (err) {
      if (isNotFound(err)) return structuredClone(EMPTY);
      throw err;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new DataError(`Task file ${this.filePath(userId)} is not valid JSON`, { cause: err });
    }
    const result = TaskFileSchema.safeParse(parsed);
    if (!result.success) {
      throw new DataError(`Task file ${this.filePath(userId)} is malformed: ${result.error.issues[0]?.message ?? 'unknown'}`);
    }
    return result.data;
  }

  private async backup(file: string): Promise<void> {
    if (!(await this.existsAt(file))) return;
    await copyFile(file, file + '.bak');
  }

  private async existsAt(file: string): Promise<boolean> {
    try {
      await stat(file);
      return true;
    } catch (err) {
      if (isNotFound(err)) return false;
      throw err;
    }
  }

  async save(userId: string, data: TaskFile): Promise<void> {
    const file = this.filePath(userId);
    await mkdir(path.dirname(file), { recursive: true });
    await this.backup(file);
    const tmp = file + '.tmp';
    await writeFile(tmp, JSON.stringify(data, null, 2) + '\n', 'utf8');
    await rename(tmp, file);
  }

  /** Load, apply `fn`, save. Returns whatever `fn` returns. */
  async update<T>(userId: string, fn: (data: TaskFile) => T): Promise<T> {
    return this.locks.run(userId, async () => {
      const data = await this.load(userId);
      const out = fn(data);
      await this.save(userId, data);
      return out;
    });
  }
}
