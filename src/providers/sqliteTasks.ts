import { randomUUID } from 'node:crypto';
import { and, asc, eq, ne } from 'drizzle-orm';
import type { AccountIdentity, NewTaskInput, Priority, ProviderTask, TaskStatus } from '../model.js';
import { AI_INSTRUCTIONS_TITLE, type TaskProvider } from './provider.js';
import { DataError, NotFoundError, type NeedsInteractiveAuth } from '../errors.js';
import type { Db } from '../store/db.js';
import { localTasks, type LocalTaskRow } from '../store/schema.js';

function toProviderTask(row: LocalTaskRow): ProviderTask {
  const { status, priority } = row;
  if (status !== 'active' && status !== 'completed') throw new DataError(`Local task ${row.id} has status "${status}"`);
  if (priority !== 1 && priority !== 2 && priority !== 3 && priority !== 4) {
    throw new DataError(`Local task ${row.id} has priority ${priority}`);
  }
  const p: Priority = priority;
  return {
    id: row.id,
    title: row.title,
    description: row.description ?? undefined,
    status,
    dueDate: row.dueDate ?? undefined,
    priority: p,
    projectId: row.projectId ?? undefined,
    parentId: row.parentId ?? undefined,
  };
}

/** Tasks kept in the app's own database; needs no credentials. */
export class SqliteTaskProvider implements TaskProvider {
  readonly name = 'sqlite' as const;
  private now: () => Date;

  constructor(
    private db: Db,
    opts: { now?: () => Date } = {},
  ) {
    this.now = opts.now ?? (() => new Date());
  }

  async authenticate(_identity: AccountIdentity): Promise<NeedsInteractiveAuth | null> {
    return null;
  }

  async fetchItems(identity: AccountIdentity): Promise<ProviderTask[]> {
    return this.db
      .select()
      .from(localTasks)
      .where(and(eq(localTasks.userId, identity.userId), ne(localTasks.title, AI_INSTRUCTIONS_TITLE)))
      .orderBy(asc(localTasks.createdAt))
      .all()
      .map(toProviderTask);
  }

  async createItem(identity: AccountIdentity, data: NewTaskInput): Promise<ProviderTask> {
    const now = this.now().toISOString();
    const id = randomUUID();
    this.db
      .insert(localTasks)
      .values({
        id,
        userId: identity.userId,
        title: data.title,
        description: data.description ?? null,
        status: 'active',
        dueDate: data.dueDate ?? null,
        priority: data.priority ?? 2,
        projectId: data.projectId ?? null,
        parentId: data.parentId ?? null,
        createdAt: now,
        updatedAt: now,
      })
      .run();

    const row = this.db.select().from(localTasks).where(eq(localTasks.id, id)).get();
    if (!row) throw new NotFoundError(`Local task ${id} vanished after insert`);
    return toProviderTask(row);
  }

  async updateTaskStatus(identity: AccountIdentity, taskId: string, status: TaskStatus): Promise<void> {
    const res = this.db
      .update(localTasks)
      .set({ status, updatedAt: this.now().toISOString() })
      .where(and(eq(localTasks.id, taskId), eq(localTasks.userId, identity.userId)))
      .run();
    if (res.changes === 0) throw new NotFoundError(`Local task ${taskId} not found`);
  }

  private instructionsRow(userId: string): LocalTaskRow | undefined {
    return this.db
      .select()
      .from(localTasks)
      .where(and(eq(localTasks.userId, userId), eq(localTasks.title, AI_INSTRUCTIONS_TITLE)))
      .get();
  }

  async getAiInstructions(identity: AccountIdentity): Promise<string | undefined> {
    const row = this.instructionsRow(identity.userId);
    return row ? (row.description ?? '') : undefined;
  }

  async setAiInstructions(identity: AccountIdentity, instructions: string): Promise<void> {
    const now = this.now().toISOString();
    const existing = this.instructionsRow(identity.userId);
    if (existing) {
      this.db
        .update(localTasks)
        .set({ description: instructions, updatedAt: now })
        .where(eq(localTasks.id, existing.id))
        .run();
      return;
    }
    this.db
      .insert(localTasks)
      .values({
        id: randomUUID(),
        userId: identity.userId,
        title: AI_INSTRUCTIONS_TITLE,
        description: instructions,
        createdAt: now,
        updatedAt: now,
      })
      .run();
  }
}
