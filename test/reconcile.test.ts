import { afterEach, describe, expect, it } from 'vitest';
import { ReconciliationEngine, normalizeDueDate } from '../src/sync/reconcile.js';
import { TaskStore } from '../src/store/taskStore.js';
import { contentHash } from '../src/sync/hash.js';
import { DataError } from '../src/errors.js';
import { MockTaskProvider } from '../src/providers/mock.js';
import type { AccountIdentity, ProviderTask } from '../src/model.js';
import type { DatabaseHandle } from '../src/store/db.js';
import { memoryDb, tickingClock } from './helpers.js';

const account: AccountIdentity = { userId: 'u1', provider: 'todoist', accountEmail: 'u1@example.com' };

let handle: DatabaseHandle;
afterEach(() => handle?.close());

function setup() {
  handle = memoryDb();
  const store = new TaskStore(handle.db, { now: tickingClock('2026-03-01T09:00:00.000Z') });
  return { store, engine: new ReconciliationEngine(store) };
}

const task = (id: string, patch: Partial<ProviderTask> = {}): ProviderTask => ({
  id,
  title: `Task ${id}`,
  status: 'active',
  priority: 2,
  ...patch,
});

describe('normalizeDueDate', () => {
  it('keeps date-only values and converts datetimes to UTC', () => {
    expect(normalizeDueDate('2026-03-05')).toBe('2026-03-05');
    expect(normalizeDueDate('2026-03-05T10:00:00+02:00')).toBe('2026-03-05T08:00:00.000Z');
    expect(normalizeDueDate('  ')).toBeUndefined();
    expect(normalizeDueDate(undefined)).toBeUndefined();
  });

  it('rejects impossible dates', () => {
    expect(() => normalizeDueDate('2026-02-30')).toThrow(DataError);
    expect(() => normalizeDueDate('next tuesday')).toThrow('Unparsable due date "next tuesday"');
  });
});

describe('ReconciliationEngine', () => {
  it('creates, fast-paths a status change, then deletes', () => {
    const { store, engine } = setup();

    const first = engine.reconcile(account, [task('t1', { title: 'Write report' })]);
    expect(first).toEqual({ created: 1, updated: 0, statusChanged: 0, unchanged: 0, deleted: 0, skipped: [] });

    const [created] = store.listForAccount(account);
    expect(created?.listType).toBe('unprioritized');
    expect(created?.position).toBe(0);

    const second = engine.reconcile(account, [task('t1', { title: 'Write report', status: 'completed' })]);
    expect(second).toEqual({ created: 0, updated: 0, statusChanged: 1, unchanged: 0, deleted: 0, skipped: [] });

    const [done] = store.listForAccount(account);
    expect(done?.status).toBe('completed');
    expect(done?.contentHash).toBe(contentHash({ title: 'Write report', status: 'completed', priority: 2 }));

    const third = engine.reconcile(account, []);
    expect(third.deleted).toBe(1);
    expect(store.listForAccount(account)).toEqual([]);
  });

  it('counts unchanged items and applies content updates', () => {
    const { store, engine } = setup();
    engine.reconcile(account, [task('t1'), task('t2')]);

    const result = engine.reconcile(account, [task('t1'), task('t2', { title: 'Renamed', status: 'completed' })]);
    expect(result).toEqual({ created: 0, updated: 1, statusChanged: 1, unchanged: 1, deleted: 0, skipped: [] });

    const renamed = store.find({ ...account, providerTaskId: 't2' });
    expect(renamed?.title).toBe('Renamed');
    expect(renamed?.contentHash).toBe(contentHash({ title: 'Renamed', status: 'completed', priority: 2 }));
  });

  it('keeps the list placement of updated tasks', () => {
    const { store, engine } = setup();
    engine.reconcile(account, [task('t1'), task('t2')]);
    const t2 = store.find({ ...account, providerTaskId: 't2' });
    if (!t2) throw new Error('t2 missing');
    engine.moveTask(t2.id, 'prioritized');

    engine.reconcile(account, [task('t1'), task('t2', { title: 'Moved then renamed' })]);
    const lists = engine.lists('u1');
    expect(lists.prioritized.map((t) => t.title)).toEqual(['Moved then renamed']);
    expect(lists.unprioritized.map((t) => t.title)).toEqual(['Task t1']);
  });

  it('skips malformed items without deleting their records', () => {
    const { store, engine } = setup();
    engine.reconcile(account, [task('t1'), task('t2', { dueDate: '2026-03-05' })]);

    const result = engine.reconcile(account, [task('t1'), task('t2', { dueDate: 'soon' })]);
    expect(result.skipped).toEqual([{ providerTaskId: 't2', error: 'Unparsable due date "soon"' }]);
    expect(result.deleted).toBe(0);
    expect(store.find({ ...account, providerTaskId: 't2' })?.dueDate).toBe('2026-03-05');
  });

  it('leaves other accounts of the same user alone', () => {
    const { store, engine } = setup();
    const local: AccountIdentity = { userId: 'u1', provider: 'sqlite', accountEmail: 'u1@example.com' };
    engine.reconcile(local, [task('l1')]);
    engine.reconcile(account, [task('t1')]);

    expect(engine.reconcile(account, []).deleted).toBe(1);
    expect(store.listForAccount(local).map((t) => t.providerTaskId)).toEqual(['l1']);
  });

  it('refuses calendar accounts', () => {
    const { engine } = setup();
    expect(() => engine.reconcile({ ...account, provider: 'google' }, [])).toThrow(DataError);
  });

  it('syncs an account from its provider', async () => {
    const { engine } = setup();
    const provider = new MockTaskProvider({ name: 'todoist' });
    provider.seed(account, [
      task('t1'),
      task('t2'),
      task('ai', { title: 'AI Instructions', description: 'Mornings are for deep work' }),
    ]);

    const result = await engine.syncAccount(account, provider);
    expect(result.created).toBe(2);
    expect(engine.lists('u1').unprioritized.map((t) => t.providerTaskId)).toEqual(['t1', 't2']);
  });
});
