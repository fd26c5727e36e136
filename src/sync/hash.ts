import { createHash } from 'node:crypto';
import type { ProviderTask } from '../model.js';

export type HashedFields = Pick<
  ProviderTask,
  'title' | 'status' | 'dueDate' | 'priority' | 'projectId' | 'parentId' | 'sectionId'
>;

const HASHED_KEYS = ['dueDate', 'parentId', 'priority', 'projectId', 'sectionId', 'status', 'title'] as const;

/** Key-sorted JSON of the hashed fields, with absent values written as null. */
export function canonicalJson(task: HashedFields): string {
  const obj: Record<string, string | number | null> = {};
  for (const key of HASHED_KEYS) obj[key] = task[key] ?? null;
  return JSON.stringify(obj);
}

/** SHA-256 hex of the fields whose change means the task changed. */
export function contentHash(task: HashedFields): string {
  return createHash('sha256').update(canonicalJson(task)).digest('hex');
}
