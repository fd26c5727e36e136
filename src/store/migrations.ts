/**
 * SQLite DDL, applied in order by `openDatabase`. Applied versions are
 * tracked with `PRAGMA user_version`, so entries must never be edited once
 * released; append a new one instead.
 */

export const MIGRATION_0001_ACCOUNTS = `
CREATE TABLE IF NOT EXISTS accounts (
  id TEXT PRIMARY KEY,
  user_id TEXT NOT NULL,
  provider TEXT NOT NULL,
  account_email TEXT NOT NULL,
  access_token TEXT,
  refresh_token TEXT,
  token_uri TEXT,
  client_id TEXT,
  client_secret TEXT,
  scopes TEXT,
  expires_at TEXT,
  api_key TEXT,
  last_sync TEXT,
  needs_reauth INTEGER NOT NULL DEFAULT 0,
  is_primary INTEGER NOT NULL DEFAULT 0,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
);
CREATE UNIQUE INDEX IF NOT EXISTS accounts_user_provider_email_idx
  ON accounts (user_id, provider, account_email);
CREATE INDEX IF NOT EXISTS accounts_last_sync_idx ON accounts (last_sync);
`;

export const MIGRATION_0002_TASKS = `
CREATE TABLE IF NOT EXISTS tasks (
  id TEXT PRIMARY KEY,
  user_id TEXT NOT NULL,
  provider TEXT NOT NULL,
  account_email TEXT NOT NULL,
  provider_task_id TEXT NOT NULL,
  title TEXT NOT NULL,
  description TEXT,
  status TEXT NOT NULL,
  due_date TEXT,
  priority INTEGER NOT NULL DEFAULT 2,
  project_id TEXT,
  project_name TEXT,
  parent_id TEXT,
  section_id TEXT,
  list_type TEXT NOT NULL DEFAULT 'unprioritized',
  position INTEGER NOT NULL DEFAULT 0,
  content_hash TEXT NOT NULL,
  last_synced TEXT NOT NULL,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
);
CREATE UNIQUE INDEX IF NOT EXISTS tasks_identity_idx
  ON tasks (user_id, provider, account_email, provider_task_id);
CREATE INDEX IF NOT EXISTS tasks_partition_idx ON tasks (user_id, list_type, position);
`;

export const MIGRATION_0003_LOCAL_TASKS = `
CREATE TABLE IF NOT EXISTS local_tasks (
  id TEXT PRIMARY KEY,
  user_id TEXT NOT NULL,
  title TEXT NOT NULL,
  description TEXT,
  status TEXT NOT NULL DEFAULT 'active',
  due_date TEXT,
  priority INTEGER NOT NULL DEFAULT 2,
  project_id TEXT,
  parent_id TEXT,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS local_tasks_user_idx ON local_tasks (user_id);
`;

export const ALL_MIGRATIONS: readonly string[] = [
  MIGRATION_0001_ACCOUNTS,
  MIGRATION_0002_TASKS,
  MIGRATION_0003_LOCAL_TASKS,
];
