import { sqliteTable, text, integer, uniqueIndex, index } from 'drizzle-orm/sqlite-core';

export const accounts = sqliteTable(
  'accounts',
  {
    id: text('id').primaryKey(),
    userId: text('user_id').notNull(),
    provider: text('provider').notNull(),
    accountEmail: text('account_email').notNull(),

    // OAuth
    accessToken: text('access_token'),
    refreshToken: text('refresh_token'),
    tokenUri: text('token_uri'),
    clientId: text('client_id'),
    clientSecret: text('client_secret'),
    /** Space-joined. */
    scopes: text('scopes'),
    expiresAt: text('expires_at'),

    // Flat API key
    apiKey: text('api_key'),

    lastSync: text('last_sync'),
    needsReauth: integer('needs_reauth', { mode: 'boolean' }).notNull().default(false),
    isPrimary: integer('is_primary', { mode: 'boolean' }).notNull().default(false),
    createdAt: text('created_at').notNull(),
    updatedAt: text('updated_at').notNull(),
  },
  (table) => [
    uniqueIndex('accounts_user_provider_email_idx').on(table.userId, table.provider, table.accountEmail),
    index('accounts_last_sync_idx').on(table.lastSync),
  ],
);

export const tasks = sqliteTable(
  'tasks',
  {
    id: text('id').primaryKey(),
    userId: text('user_id').notNull(),
    provider: text('provider').notNull(),
    accountEmail: text('account_email').notNull(),
    providerTaskId: text('provider_task_id').notNull(),

    title: text('title').notNull(),
    description: text('description'),
    status: text('status').notNull(),
    dueDate: text('due_date'),
    priority: integer('priority').notNull().default(2),

    projectId: text('project_id'),
    projectName: text('project_name'),
    parentId: text('parent_id'),
    sectionId: text('section_id'),

    listType: text('list_type').notNull().default('unprioritized'),
    position: integer('position').notNull().default(0),

    contentHash: text('content_hash').notNull(),
    lastSynced: text('last_synced').notNull(),
    createdAt: text('created_at').notNull(),
    updatedAt: text('updated_at').notNull(),
  },
  (table) => [
    uniqueIndex('tasks_identity_idx').on(table.userId, table.provider, table.accountEmail, table.providerTaskId),
    index('tasks_partition_idx').on(table.userId, table.listType, table.position),
  ],
);

/** Backing table of the local `sqlite` task provider. */
export const localTasks = sqliteTable(
  'local_tasks',
  {
    id: text('id').primaryKey(),
    userId: text('user_id').notNull(),
    title: text('title').notNull(),
    description: text('description'),
    status: text('status').notNull().default('active'),
    dueDate: text('due_date'),
    priority: integer('priority').notNull().default(2),
    projectId: text('project_id'),
    parentId: text('parent_id'),
    createdAt: text('created_at').notNull(),
    updatedAt: text('updated_at').notNull(),
  },
  (table) => [index('local_tasks_user_idx').on(table.userId)],
);

export type AccountRow = typeof accounts.$inferSelect;
export type NewAccountRow = typeof accounts.$inferInsert;
export type TaskRow = typeof tasks.$inferSelect;
export type NewTaskRow = typeof tasks.$inferInsert;
export type LocalTaskRow = typeof localTasks.$inferSelect;
