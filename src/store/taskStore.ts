import { randomUUID } from 'node:crypto';
import { and, asc, count, eq, gt, gte, lt, lte, sql } from 'drizzle-orm';
import type { AccountIdentity, ListType, Priority, TaskRecord, TaskStatus } from '../model.js';
import { isTaskProvider } from '../model.js';
import { DataError, NotFoundError } from '../errors.js';
import type { Db } from './db.js';
import { tasks, type TaskRow } from './schema.js';

type Tx = Parameters<Parameters<Db['transaction']>[0]>[0];

/** Fields the provider owns. Everything else is local state. */
export interface TaskContent {
  title: string;
  description?: string;
  status: TaskStatus;
  dueDate?: string;
  priority: Priority;
  projectId?: string;
  projectName?: string;
  parentId?: string;
  sectionId?: string;
}

export interface TaskKey extends AccountIdentity {
  providerTaskId: string;
}

const PRIORITIES: readonly number[] = [1, 2, 3, 4];

function isPriority(n: number): n is Priority {
  return PRIORITIES.includes(n);
}

function toTaskRecord(row: TaskRow): TaskRecord {
  const { provider, status, listType, priority } = row;
  if (!isTaskProvider(provider)) throw new DataError(`Task ${row.id} has unknown provider "${provider}"`);
  if (status !== 'active' && status !== 'completed') throw new DataError(`Task ${row.id} has unknown status "${status}"`);
  if (listType !== 'prioritized' && listType !== 'unprioritized') {
    throw new DataError(`Task ${row.id} has unknown list type "${listType}"`);
  }
  if (!isPriority(priority)) throw new DataError(`Task ${row.id} has out-of-range priority ${priority}`);

  return {
    id: row.id,
    userId: row.userId,
    provider,
    accountEmail: row.accountEmail,
    providerTaskId: row.providerTaskId,
    title: row.title,
    description: row.description ?? undefined,
    status,
    dueDate: row.dueDate ?? undefined,
    priority,
    projectId: row.projectId ?? undefined,
    projectName: row.projectName ?? undefined,
    parentId: row.parentId ?? undefined,
    sectionId: row.sectionId ?? undefined,
    listType,
    position: row.position,
    contentHash: row.contentHash,
    lastSynced: row.lastSynced,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

function contentColumns(c: TaskContent) {
  return {
    title: c.title,
    description: c.description ?? null,
    status: c.status,
    dueDate: c.dueDate ?? null,
    priority: c.priority,
    projectId: c.projectId ?? null,
    projectName: c.projectName ?? null,
    parentId: c.parentId ?? null,
    sectionId: c.sectionId ?? null,
  };
}

function byAccount(identity: AccountIdentity) {
  return and(
    eq(tasks.userId, identity.userId),
    eq(tasks.provider, identity.provider),
    eq(tasks.accountEmail, identity.accountEmail),
  );
}

function inPartition(userId: string, listType: ListType) {
  return and(eq(tasks.userId, userId), eq(tasks.listType, listType));
}

function partitionSize(tx: Tx, userId: string, listType: ListType): number {
  const row = tx.select({ n: count() }).from(tasks).where(inPartition(userId, listType)).get();
  return row?.n ?? 0;
}

function clamp(n: number, lo: number, hi: number): number {
  return Math.min(Math.max(n, lo), hi);
}

/**
 * Local Task Record store. Positions are dense and zero-based per
 * `(userId, listType)`; every operation that moves more than one row runs
 * in a single transaction.
 */
export class TaskStore {
  private now: () => Date;

  constructor(
    private db: Db,
    opts: { now?: () => Date } = {},
  ) {
    this.now = opts.now ?? (() => new Date());
  }

  get(id: string): TaskRecord | undefined {
    const row = this.db.select().from(tasks).where(eq(tasks.id, id)).get();
    return row ? toTaskRecord(row) : undefined;
  }

  find(key: TaskKey): TaskRecord | undefined {
    const row = this.db
      .select()
      .from(tasks)
      .where(and(byAccount(key), eq(tasks.providerTaskId, key.providerTaskId)))
      .get();
    return row ? toTaskRecord(row) : undefined;
  }

  listForAccount(identity: AccountIdentity): TaskRecord[] {
    return this.db.select().from(tasks).where(byAccount(identity)).all().map(toTaskRecord);
  }

  /** Tasks of a user ordered by list then position. */
  listForUser(userId: string, listType?: ListType): TaskRecord[] {
    const where = listType ? inPartition(userId, listType) : eq(tasks.userId, userId);
    return this.db
      .select()
      .from(tasks)
      .where(where)
      .orderBy(asc(tasks.listType), asc(tasks.position))
      .all()
      .map(toTaskRecord);
  }

  /** New record in `unprioritized`, appended after the partition's last row. */
  insert(key: TaskKey, content: TaskContent, contentHash: string): TaskRecord {
    const now = this.now().toISOString();
    const id = randomUUID();
    const listType: ListType = 'unprioritized';

    this.db.transaction((tx) => {
      const position = partitionSize(tx, key.userId, listType);
      tx.insert(tasks)
        .values({
          id,
          userId: key.userId,
          provider: key.provider,
          accountEmail: key.accountEmail,
          providerTaskId: key.providerTaskId,
          ...contentColumns(content),
          listType,
          position,
          contentHash,
          lastSynced: now,
          createdAt: now,
          updatedAt: now,
        })
        .run();
    });

    return this.require(id);
  }

  /** Status fast path: status, hash and last-synced land in one statement. */
  updateStatus(id: string, status: TaskStatus, contentHash: string): void {
    const now = this.now().toISOString();
    this.db.update(tasks).set({ status, contentHash, lastSynced: now, updatedAt: now }).where(eq(tasks.id, id)).run();
  }

  updateContent(id: string, content: TaskContent, contentHash: string): void {
    const now = this.now().toISOString();
    this.db
      .update(tasks)
      .set({ ...contentColumns(content), contentHash, lastSynced: now, updatedAt: now })
      .where(eq(tasks.id, id))
      .run();
  }

  /** Delete one record and close the gap it leaves. */
  delete(id: string): boolean {
    return this.db.transaction((tx) => this.deleteIn(tx, id));
  }

  /**
   * Delete every record of `identity` whose provider id is not in `keep`.
   * Returns the number removed.
   */
  deleteMissing(identity: AccountIdentity, keep: ReadonlySet<string>): number {
    return this.db.transaction((tx) => {
      const stale = tx
        .select({ id: tasks.id, providerTaskId: tasks.providerTaskId })
        .from(tasks)
        .where(byAccount(identity))
        .all()
        .filter((r) => !keep.has(r.providerTaskId));
      for (const r of stale) this.deleteIn(tx, r.id);
      return stale.length;
    });
  }

  /**
   * Move a task to `destination` at `position` (end of list when omitted).
   * The position is clamped to the valid range of the destination.
   */
  move(taskId: string, destination: ListType, position?: number): TaskRecord {
    const now = this.now().toISOString();

    this.db.transaction((tx) => {
      const row = tx.select().from(tasks).where(eq(tasks.id, taskId)).get();
      if (!row) throw new NotFoundError(`Task ${taskId} not found`);
      const { userId, position: old } = row;
      const source = toTaskRecord(row).listType;

      if (source !== destination) {
        const size = partitionSize(tx, userId, destination);
        const target = clamp(position ?? size, 0, size);

        tx.update(tasks)
          .set({ position: sql`${tasks.position} + 1` })
          .where(and(inPartition(userId, destination), gte(tasks.position, target)))
          .run();
        tx.update(tasks)
          .set({ position: sql`${tasks.position} - 1` })
          .where(and(inPartition(userId, source), gt(tasks.position, old)))
          .run();
        tx.update(tasks).set({ listType: destination, position: target, updatedAt: now }).where(eq(tasks.id, taskId)).run();
        return;
      }

      const size = partitionSize(tx, userId, source);
      const target = clamp(position ?? size - 1, 0, size - 1);
      if (target === old) return;

      if (target < old) {
        tx.update(tasks)
          .set({ position: sql`${tasks.position} + 1` })
          .where(and(inPartition(userId, source), gte(tasks.position, target), lt(tasks.position, old)))
          .run();
      } else {
        tx.update(tasks)
          .set({ position: sql`${tasks.position} - 1` })
          .where(and(inPartition(userId, source), gt(tasks.position, old), lte(tasks.position, target)))
          .run();
      }
      tx.update(tasks).set({ position: target, updatedAt: now }).where(eq(tasks.id, taskId)).run();
    });

    return this.require(taskId);
  }

  /**
   * Rewrite a partition to the given order. Ids must belong to the
   * partition; rows not named keep their relative order after the named ones.
   */
  reorder(userId: string, listType: ListType, orderedIds: readonly string[]): TaskRecord[] {
    const now = this.now().toISOString();

    this.db.transaction((tx) => {
      const current = tx
        .select({ id: tasks.id })
        .from(tasks)
        .where(inPartition(userId, listType))
        .orderBy(asc(tasks.position))
        .all()
        .map((r) => r.id);

      const known = new Set(current);
      const unknown = orderedIds.filter((id) => !known.has(id));
      if (unknown.length) throw new NotFoundError(`Tasks not in ${listType} list of ${userId}: ${unknown.join(', ')}`);

      const named = new Set(orderedIds);
      const order = [...named, ...current.filter((id) => !named.has(id))];
      order.forEach((id, position) => {
        tx.update(tasks).set({ position, updatedAt: now }).where(eq(tasks.id, id)).run();
      });
    });

    return this.listForUser(userId, listType);
  }

  private deleteIn(tx: Tx, id: string): boolean {
    const row = tx
      .select({ userId: tasks.userId, listType: tasks.listType, position: tasks.position })
      .from(tasks)
      .where(eq(tasks.id, id))
      .get();
    if (!row) return false;

    tx.delete(tasks).where(eq(tasks.id, id)).run();
    tx.update(tasks)
      .set({ position: sql`${tasks.position} - 1` })
      .where(and(eq(tasks.userId, row.userId), eq(tasks.listType, row.listType), gt(tasks.position, row.position)))
      .run();
    return true;
  }

  private require(id: string): TaskRecord {
    const rec = this.get(id);
    if (!rec) throw new NotFoundError(`Task ${id} not found`);
    return rec;
  }
}
