import { afterEach, describe, expect, it } from 'vitest';
import { TaskStore, type TaskContent } from '../src/store/taskStore.js';
import { NotFoundError } from '../src/errors.js';
import type { AccountIdentity, ListType, TaskRecord } from '../src/model.js';
import type { DatabaseHandle } from '../src/store/db.js';
import { memoryDb, tickingClock } from './helpers.js';

const account: AccountIdentity = { userId: 'u1', provider: 'sqlite', accountEmail: 'u1@example.com' };

let handle: DatabaseHandle;
afterEach(() => handle?.close());

function content(title: string): TaskContent {
  return { title, status: 'active', priority: 2 };
}

function setup(titles: string[]) {
  handle = memoryDb();
  const store = new TaskStore(handle.db, { now: tickingClock('2026-03-01T09:00:00.000Z') });
  const ids = new Map<string, string>();
  for (const title of titles) {
    const rec = store.insert({ ...account, providerTaskId: `p-${title}` }, content(title), `hash-${title}`);
    ids.set(title, rec.id);
  }
  const id = (title: string) => {
    const found = ids.get(title);
    if (!found) throw new Error(`no task ${title}`);
    return found;
  };
  const layout = (listType: ListType) =>
    store.listForUser('u1', listType).map((t: TaskRecord) => `${t.title}@${t.position}`);
  return { store, id, layout };
}

describe('TaskStore positions', () => {
  it('appends new tasks to the unprioritized list', () => {
    const { layout } = setup(['a', 'b', 'c']);
    expect(layout('unprioritized')).toEqual(['a@0', 'b@1', 'c@2']);
    expect(layout('prioritized')).toEqual([]);
  });

  it('moves across lists and closes the gap behind', () => {
    const { store, id, layout } = setup(['a', 'b', 'c']);
    store.move(id('a'), 'prioritized');
    store.move(id('c'), 'prioritized', 0);

    expect(layout('prioritized')).toEqual(['c@0', 'a@1']);
    expect(layout('unprioritized')).toEqual(['b@0']);
  });

  it('clamps the target position into range', () => {
    const { store, id, layout } = setup(['a', 'b', 'c']);
    store.move(id('a'), 'prioritized', 99);
    store.move(id('b'), 'prioritized', -5);
    expect(layout('prioritized')).toEqual(['b@0', 'a@1']);

    store.move(id('b'), 'prioritized', 42);
    expect(layout('prioritized')).toEqual(['a@0', 'b@1']);
  });

  it('moves up and down within one list', () => {
    const { store, id, layout } = setup(['a', 'b', 'c', 'd']);
    store.move(id('d'), 'unprioritized', 1);
    expect(layout('unprioritized')).toEqual(['a@0', 'd@1', 'b@2', 'c@3']);

    store.move(id('a'), 'unprioritized', 2);
    expect(layout('unprioritized')).toEqual(['d@0', 'b@1', 'a@2', 'c@3']);
  });

  it('throws NotFoundError when moving an unknown task', () => {
    const { store } = setup(['a']);
    expect(() => store.move('missing', 'prioritized')).toThrow(NotFoundError);
  });

  it('reorders a list, keeping unnamed rows after the named ones', () => {
    const { store, id, layout } = setup(['a', 'b', 'c', 'd']);
    store.reorder('u1', 'unprioritized', [id('c'), id('a')]);
    expect(layout('unprioritized')).toEqual(['c@0', 'a@1', 'b@2', 'd@3']);
  });

  it('rejects ids outside the list on reorder and leaves it untouched', () => {
    const { store, id, layout } = setup(['a', 'b']);
    store.move(id('a'), 'prioritized');
    expect(() => store.reorder('u1', 'unprioritized', [id('a'), id('b')])).toThrow(NotFoundError);
    expect(layout('unprioritized')).toEqual(['b@0']);
  });

  it('closes the gap when a task is deleted', () => {
    const { store, id, layout } = setup(['a', 'b', 'c']);
    expect(store.delete(id('b'))).toBe(true);
    expect(store.delete(id('b'))).toBe(false);
    expect(layout('unprioritized')).toEqual(['a@0', 'c@1']);
  });

  it('deletes only the missing tasks of one account', () => {
    const { store, layout } = setup(['a', 'b', 'c']);
    const otherAccount: AccountIdentity = { userId: 'u1', provider: 'todoist', accountEmail: 'u1@example.com' };
    store.insert({ ...otherAccount, providerTaskId: 'p-x' }, content('x'), 'hash-x');

    expect(store.deleteMissing(account, new Set(['p-b']))).toBe(2);
    expect(layout('unprioritized')).toEqual(['b@0', 'x@1']);
  });

  it('keeps both lists dense through a long mix of moves, reorders and deletes', () => {
    const titles = Array.from({ length: 12 }, (_, i) => `t${i}`);
    const { store } = setup(titles);
    // small LCG so the sequence is the same on every run
    let seed = 42;
    const rand = (n: number) => {
      seed = (seed * 16807) % 2147483647;
      return seed % n;
    };
    const lists: ListType[] = ['prioritized', 'unprioritized'];
    const positions = (listType: ListType) => store.listForUser('u1', listType).map((t) => t.position);
    let inserted = 0;

    for (let step = 0; step < 200; step++) {
      const all = store.listForUser('u1');
      const op = rand(10);
      if (all.length === 0 || op === 9) {
        store.insert({ ...account, providerTaskId: `p-new${inserted}` }, content(`new${inserted}`), 'hash-new');
        inserted++;
      } else if (op < 6) {
        const pick = all[rand(all.length)];
        if (pick) store.move(pick.id, lists[rand(2)] ?? 'prioritized', rand(all.length + 4) - 2);
      } else if (op < 8) {
        const listType = lists[rand(2)] ?? 'prioritized';
        const ids = store.listForUser('u1', listType).map((t) => t.id);
        const picked = ids.filter(() => rand(2) === 0).reverse();
        store.reorder('u1', listType, picked);
      } else {
        const pick = all[rand(all.length)];
        if (pick) store.delete(pick.id);
      }

      for (const listType of lists) {
        const found = positions(listType);
        expect(found, `step ${step} ${listType}`).toEqual(found.map((_, i) => i));
      }
    }
  });

  it('rolls a move back completely when it fails part way', () => {
    const { store, id, layout } = setup(['a', 'b', 'c', 'd']);
    store.move(id('c'), 'prioritized');
    store.move(id('d'), 'prioritized');
    // fails on the last write of a move, after the neighbours were shifted
    handle.sqlite.exec(
      "CREATE TRIGGER block_move BEFORE UPDATE OF updated_at ON tasks BEGIN SELECT RAISE(ABORT, 'move blocked'); END",
    );

    expect(() => store.move(id('a'), 'prioritized', 0)).toThrow('move blocked');
    expect(() => store.move(id('b'), 'unprioritized', 0)).toThrow('move blocked');
    expect(layout('prioritized')).toEqual(['c@0', 'd@1']);
    expect(layout('unprioritized')).toEqual(['a@0', 'b@1']);
  });
});
