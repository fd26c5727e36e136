import type { AccountIdentity, ListType, ProviderTask, TaskRecord } from '../model.js';
import { isTaskProvider } from '../model.js';
import type { TaskProvider, CallOptions } from '../providers/provider.js';
import type { TaskContent, TaskStore } from '../store/taskStore.js';
import { DataError, errorMessage } from '../errors.js';
import { contentHash } from './hash.js';
import { createLogger, type Logger } from '../log.js';

export interface SkippedItem {
  providerTaskId: string;
  error: string;
}

export interface ReconcileResult {
  created: number;
  /** Full updates (content other than status changed). */
  updated: number;
  /** Status changes, including those also counted in `updated`. */
  statusChanged: number;
  unchanged: number;
  deleted: number;
  skipped: SkippedItem[];
}

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Canonical form of a provider due date: date-only values stay `YYYY-MM-DD`,
 * anything with a time becomes a UTC ISO timestamp.
 */
export function normalizeDueDate(raw: string | undefined): string | undefined {
  if (raw === undefined) return undefined;
  const value = raw.trim();
  if (!value) return undefined;

  if (DATE_ONLY.test(value)) {
    const d = new Date(`${value}T00:00:00Z`);
    if (Number.isNaN(d.getTime()) || d.toISOString().slice(0, 10) !== value) {
      throw new DataError(`Unparsable due date "${raw}"`);
    }
    return value;
  }

  const ms = Date.parse(value);
  if (Number.isNaN(ms)) throw new DataError(`Unparsable due date "${raw}"`);
  return new Date(ms).toISOString();
}

function toContent(item: ProviderTask): TaskContent {
  if (!item.id) throw new DataError('Provider task has no id');
  if (typeof item.title !== 'string') throw new DataError(`Task ${item.id} has no title`);
  return {
    title: item.title,
    description: item.description,
    status: item.status,
    dueDate: normalizeDueDate(item.dueDate),
    priority: item.priority,
    projectId: item.projectId,
    projectName: item.projectName,
    parentId: item.parentId,
    sectionId: item.sectionId,
  };
}

function emptyResult(): ReconcileResult {
  return { created: 0, updated: 0, statusChanged: 0, unchanged: 0, deleted: 0, skipped: [] };
}

/**
 * Merges provider snapshots into the Task Record store using content
 * hashes, and owns the ordering of the prioritized/unprioritized lists.
 */
export class ReconciliationEngine {
  private logger: Logger;

  constructor(
    private store: TaskStore,
    opts: { logger?: Logger } = {},
  ) {
    this.logger = (opts.logger ?? createLogger('silent')).child('reconcile');
  }

  /**
   * Apply one full snapshot of an account's tasks. Items are applied in
   * order; records of this account missing from `items` are deleted last.
   * Skipped items are kept, since they still exist at the provider.
   */
  reconcile(identity: AccountIdentity, items: readonly ProviderTask[]): ReconcileResult {
    if (!isTaskProvider(identity.provider)) {
      throw new DataError(`"${identity.provider}" is not a task provider`);
    }
    const result = emptyResult();
    const seen = new Set<string>();

    for (const item of items) {
      if (item.id) seen.add(item.id);
      try {
        this.apply(identity, item, result);
      } catch (err) {
        if (!(err instanceof DataError)) throw err;
        this.logger.warn('Skipping malformed task', { account: identity.accountEmail, task: item.id, error: err });
        result.skipped.push({ providerTaskId: item.id, error: errorMessage(err) });
      }
    }

    result.deleted = this.store.deleteMissing(identity, seen);
    this.logger.debug('Reconciled', {
      provider: identity.provider,
      account: identity.accountEmail,
      created: result.created,
      updated: result.updated,
      statusChanged: result.statusChanged,
      deleted: result.deleted,
      skipped: result.skipped.length,
    });
    return result;
  }

  /** Fetch the account's tasks from `provider` and reconcile them. */
  async syncAccount(identity: AccountIdentity, provider: TaskProvider, opts: CallOptions = {}): Promise<ReconcileResult> {
    const items = await provider.fetchItems(identity, opts);
    opts.signal?.throwIfAborted();
    return this.reconcile(identity, items);
  }

  private apply(identity: AccountIdentity, item: ProviderTask, result: ReconcileResult) {
    const content = toContent(item);
    const hash = contentHash(content);
    const key = { ...identity, providerTaskId: item.id };
    const existing = this.store.find(key);

    if (!existing) {
      this.store.insert(key, content, hash);
      result.created++;
      return;
    }

    let storedHash = existing.contentHash;
    if (existing.status !== content.status) {
      // status and hash are written together so the hash never lags the status
      storedHash = contentHash({ ...existing, status: content.status });
      this.store.updateStatus(existing.id, content.status, storedHash);
      result.statusChanged++;
    }

    if (storedHash !== hash) {
      this.store.updateContent(existing.id, content, hash);
      result.updated++;
    } else if (existing.status === content.status) {
      result.unchanged++;
    }
  }

  /** Move a task to `position` in `destination` (end of the list when omitted). */
  moveTask(taskId: string, destination: ListType, position?: number): TaskRecord {
    const moved = this.store.move(taskId, destination, position);
    this.logger.debug('Task moved', { task: taskId, listType: moved.listType, position: moved.position });
    return moved;
  }

  /** Rewrite a list to the given order. */
  reorder(userId: string, listType: ListType, orderedTaskIds: readonly string[]): TaskRecord[] {
    return this.store.reorder(userId, listType, orderedTaskIds);
  }

  /** Both lists of a user, each in position order. */
  lists(userId: string): Record<ListType, TaskRecord[]> {
    return {
      prioritized: this.store.listForUser(userId, 'prioritized'),
      unprioritized: this.store.listForUser(userId, 'unprioritized'),
    };
  }
}
