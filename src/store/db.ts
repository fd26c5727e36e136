import { mkdirSync } from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema.js';
import { ALL_MIGRATIONS } from './migrations.js';

export type Db = BetterSQLite3Database<typeof schema>;

export interface DatabaseHandle {
  db: Db;
  sqlite: Database.Database;
  close(): void;
}

/** Apply pending migrations, tracked by `PRAGMA user_version`. Returns how many ran. */
export function migrate(sqlite: Database.Database): number {
  const current = Number(sqlite.pragma('user_version', { simple: true }));
  const pending = ALL_MIGRATIONS.slice(current);
  if (!pending.length) return 0;

  const apply = sqlite.transaction(() => {
    pending.forEach((sql, i) => {
      sqlite.exec(sql);
      sqlite.pragma(`user_version = ${current + i + 1}`);
    });
  });
  apply();
  return pending.length;
}

/**
 * Open (creating if needed) the SQLite database at `file`, or an in-memory
 * one for `:memory:`.
 */
export function openDatabase(file = ':memory:'): DatabaseHandle {
  if (file !== ':memory:') mkdirSync(path.dirname(file), { recursive: true });

  const sqlite = new Database(file);
  sqlite.pragma('journal_mode = WAL');
  sqlite.pragma('foreign_keys = ON');
  // Scheduler and request path share the file; wait rather than fail on a held lock.
  sqlite.pragma('busy_timeout = 5000');
  migrate(sqlite);

  const db = drizzle(sqlite, { schema });
  return {
    db,
    sqlite,
    close: () => sqlite.close(),
  };
}
