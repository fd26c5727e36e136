import { randomUUID } from 'node:crypto';
import { and, asc, eq, isNull, lt, or } from 'drizzle-orm';
import type { AccountIdentity, ProviderName } from '../model.js';
import { isCalendarProvider, isTaskProvider } from '../model.js';
import { DataError, FatalAuthFailure, NotFoundError } from '../errors.js';
import type { Db } from './db.js';
import { accounts, type AccountRow, type NewAccountRow } from './schema.js';

/**
 * Credential fields a caller may supply to `put`. Omitted (undefined) keys
 * are left untouched; `null` clears a column.
 */
export interface CredentialFields {
  accessToken?: string | null;
  refreshToken?: string | null;
  tokenUri?: string | null;
  clientId?: string | null;
  clientSecret?: string | null;
  /** List, or a space/comma joined string. Stored space-joined. */
  scopes?: string[] | string | null;
  expiresAt?: string | null;
  apiKey?: string | null;
  needsReauth?: boolean;
  /** Defaults to now. */
  lastSync?: string;
}

export interface CredentialRecord extends AccountIdentity {
  id: string;
  accessToken?: string;
  refreshToken?: string;
  tokenUri?: string;
  clientId?: string;
  clientSecret?: string;
  scopes: string[];
  expiresAt?: string;
  apiKey?: string;
  lastSync?: string;
  needsReauth: boolean;
  isPrimary: boolean;
  createdAt: string;
  updatedAt: string;
}

export interface PutOptions {
  /** Update `lastSync` (default true). */
  touch?: boolean;
}

export interface CredentialStore {
  get(identity: AccountIdentity): Promise<CredentialRecord | undefined>;
  put(identity: AccountIdentity, fields: CredentialFields, opts?: PutOptions): Promise<CredentialRecord>;
  /** Flag the account as unusable until the user re-authorizes it. */
  markNeedsReauth(identity: AccountIdentity): Promise<void>;
  /** Record a successful API call or refresh by bumping `lastSync`. The reauth flag is untouched. */
  markSynced(identity: AccountIdentity): Promise<void>;
  list(): Promise<CredentialRecord[]>;
  listForUser(userId: string): Promise<CredentialRecord[]>;
  /** Accounts never synced, or last synced before `olderThan`. */
  listDueForRefresh(olderThan: Date): Promise<CredentialRecord[]>;
  remove(identity: AccountIdentity): Promise<boolean>;
  setPrimary(identity: AccountIdentity): Promise<void>;
}

/* ------------------------------------------------------------------ */
/*  Scopes                                                             */
/* ------------------------------------------------------------------ */

export function normalizeScopes(scopes: CredentialFields['scopes']): string | null | undefined {
  if (scopes === undefined || scopes === null) return scopes;
  const parts = Array.isArray(scopes) ? scopes : scopes.split(/[\s,]+/);
  const cleaned = [...new Set(parts.map((s) => s.trim()).filter(Boolean))];
  return cleaned.length ? cleaned.join(' ') : null;
}

export function restoreScopes(stored: string | null): string[] {
  return stored ? stored.split(' ').filter(Boolean) : [];
}

/* ------------------------------------------------------------------ */
/*  Per-provider credential shapes                                     */
/* ------------------------------------------------------------------ */

export type CredentialKind = 'oauth' | 'api_key' | 'none';

export function credentialKind(provider: ProviderName): CredentialKind {
  if (provider === 'todoist') return 'api_key';
  if (provider === 'sqlite' || provider === 'file') return 'none';
  if (isCalendarProvider(provider) || isTaskProvider(provider)) return 'oauth';
  return 'none';
}

export interface OAuthCredential {
  kind: 'oauth';
  accessToken: string;
  refreshToken: string;
  tokenUri: string;
  clientId: string;
  clientSecret: string;
  scopes: string[];
  expiresAt?: string;
}

export interface ApiKeyCredential {
  kind: 'api_key';
  apiKey: string;
}

export type Credential = OAuthCredential | ApiKeyCredential | { kind: 'none' };

const OAUTH_FIELDS = ['accessToken', 'refreshToken', 'tokenUri', 'clientId', 'clientSecret'] as const;

/** Names of the fields `provider` needs that `record` lacks. */
export function missingFields(record: CredentialRecord): string[] {
  switch (credentialKind(record.provider)) {
    case 'oauth': {
      const missing: string[] = OAUTH_FIELDS.filter((f) => !record[f]);
      if (!record.scopes.length) missing.push('scopes');
      return missing;
    }
    case 'api_key':
      return record.apiKey ? [] : ['apiKey'];
    case 'none':
      return [];
  }
}

export function hasRequiredFields(record: CredentialRecord): boolean {
  return missingFields(record).length === 0;
}

/** The provider-shaped credential, or FatalAuthFailure when fields are missing. */
export function credentialOf(record: CredentialRecord): Credential {
  const missing = missingFields(record);
  if (missing.length) {
    throw new FatalAuthFailure(
      `Stored ${record.provider} credential for ${record.accountEmail} is missing: ${missing.join(', ')}`,
      record.provider,
    );
  }

  const kind = credentialKind(record.provider);
  if (kind === 'api_key' && record.apiKey) return { kind, apiKey: record.apiKey };
  if (
    kind === 'oauth' &&
    record.accessToken &&
    record.refreshToken &&
    record.tokenUri &&
    record.clientId &&
    record.clientSecret
  ) {
    return {
      kind,
      accessToken: record.accessToken,
      refreshToken: record.refreshToken,
      tokenUri: record.tokenUri,
      clientId: record.clientId,
      clientSecret: record.clientSecret,
      scopes: record.scopes,
      expiresAt: record.expiresAt,
    };
  }
  return { kind: 'none' };
}

/* ------------------------------------------------------------------ */
/*  SQLite implementation                                              */
/* ------------------------------------------------------------------ */

function toRecord(row: AccountRow): CredentialRecord {
  const provider = row.provider;
  if (!isCalendarProvider(provider) && !isTaskProvider(provider)) {
    throw new DataError(`Unknown provider "${provider}" on account ${row.id}`);
  }
  return {
    id: row.id,
    userId: row.userId,
    provider,
    accountEmail: row.accountEmail,
    accessToken: row.accessToken ?? undefined,
    refreshToken: row.refreshToken ?? undefined,
    tokenUri: row.tokenUri ?? undefined,
    clientId: row.clientId ?? undefined,
    clientSecret: row.clientSecret ?? undefined,
    scopes: restoreScopes(row.scopes),
    expiresAt: row.expiresAt ?? undefined,
    apiKey: row.apiKey ?? undefined,
    lastSync: row.lastSync ?? undefined,
    needsReauth: row.needsReauth,
    isPrimary: row.isPrimary,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

function toColumns(fields: CredentialFields): Partial<NewAccountRow> {
  const cols: Partial<NewAccountRow> = {};
  // untouched keys stay absent so the update stays partial
  if (fields.accessToken !== undefined) cols.accessToken = fields.accessToken;
  if (fields.refreshToken !== undefined) cols.refreshToken = fields.refreshToken;
  if (fields.tokenUri !== undefined) cols.tokenUri = fields.tokenUri;
  if (fields.clientId !== undefined) cols.clientId = fields.clientId;
  if (fields.clientSecret !== undefined) cols.clientSecret = fields.clientSecret;
  if (fields.scopes !== undefined) cols.scopes = normalizeScopes(fields.scopes);
  if (fields.expiresAt !== undefined) cols.expiresAt = fields.expiresAt;
  if (fields.apiKey !== undefined) cols.apiKey = fields.apiKey;
  if (fields.needsReauth !== undefined) cols.needsReauth = fields.needsReauth;
  return cols;
}

function matches(identity: AccountIdentity) {
  return and(
    eq(accounts.userId, identity.userId),
    eq(accounts.provider, identity.provider),
    eq(accounts.accountEmail, identity.accountEmail),
  );
}

export interface SqliteCredentialStoreOptions {
  /** Clock, injectable for tests. */
  now?: () => Date;
}

export class SqliteCredentialStore implements CredentialStore {
  private now: () => Date;

  constructor(
    private db: Db,
    opts: SqliteCredentialStoreOptions = {},
  ) {
    this.now = opts.now ?? (() => new Date());
  }

  async get(identity: AccountIdentity): Promise<CredentialRecord | undefined> {
    const row = this.db.select().from(accounts).where(matches(identity)).get();
    return row ? toRecord(row) : undefined;
  }

  async put(identity: AccountIdentity, fields: CredentialFields, opts: PutOptions = {}): Promise<CredentialRecord> {
    const now = this.now().toISOString();
    const touch = opts.touch ?? true;
    const cols = toColumns(fields);
    const lastSync = fields.lastSync ?? (touch ? now : undefined);

    const row = this.db.transaction((tx) => {
      const existing = tx.select().from(accounts).where(matches(identity)).get();

      if (existing) {
        tx.update(accounts)
          .set({ ...cols, ...(lastSync ? { lastSync } : {}), updatedAt: now })
          .where(eq(accounts.id, existing.id))
          .run();
        return tx.select().from(accounts).where(eq(accounts.id, existing.id)).get();
      }

      const primary = tx
        .select({ id: accounts.id })
        .from(accounts)
        .where(and(eq(accounts.userId, identity.userId), eq(accounts.isPrimary, true)))
        .get();

      const id = randomUUID();
      tx.insert(accounts)
        .values({
          ...cols,
          id,
          userId: identity.userId,
          provider: identity.provider,
          accountEmail: identity.accountEmail,
          isPrimary: !primary,
          lastSync: lastSync ?? null,
          createdAt: now,
          updatedAt: now,
        })
        .run();
      return tx.select().from(accounts).where(eq(accounts.id, id)).get();
    });

    if (!row) throw new NotFoundError(`Account ${identity.accountEmail} (${identity.provider}) vanished during write`);
    return toRecord(row);
  }

  async markNeedsReauth(identity: AccountIdentity): Promise<void> {
    if (!(await this.get(identity))) {
      throw new NotFoundError(`No ${identity.provider} account ${identity.accountEmail} for user ${identity.userId}`);
    }
    await this.put(identity, { needsReauth: true }, { touch: false });
  }

  async markSynced(identity: AccountIdentity): Promise<void> {
    if (!(await this.get(identity))) return;
    await this.put(identity, {});
  }

  async list(): Promise<CredentialRecord[]> {
    return this.db.select().from(accounts).orderBy(asc(accounts.createdAt)).all().map(toRecord);
  }

  async listForUser(userId: string): Promise<CredentialRecord[]> {
    return this.db
      .select()
      .from(accounts)
      .where(eq(accounts.userId, userId))
      .orderBy(asc(accounts.createdAt))
      .all()
      .map(toRecord);
  }

  async listDueForRefresh(olderThan: Date): Promise<CredentialRecord[]> {
    return this.db
      .select()
      .from(accounts)
      .where(or(isNull(accounts.lastSync), lt(accounts.lastSync, olderThan.toISOString())))
      .orderBy(asc(accounts.createdAt))
      .all()
      .map(toRecord);
  }

  async remove(identity: AccountIdentity): Promise<boolean> {
    const now = this.now().toISOString();
    return this.db.transaction((tx) => {
      const existing = tx.select().from(accounts).where(matches(identity)).get();
      if (!existing) return false;

      tx.delete(accounts).where(eq(accounts.id, existing.id)).run();

      if (existing.isPrimary) {
        const next = tx
          .select({ id: accounts.id })
          .from(accounts)
          .where(eq(accounts.userId, identity.userId))
          .orderBy(asc(accounts.createdAt))
          .limit(1)
          .get();
        if (next) tx.update(accounts).set({ isPrimary: true, updatedAt: now }).where(eq(accounts.id, next.id)).run();
      }
      return true;
    });
  }

  async setPrimary(identity: AccountIdentity): Promise<void> {
    const now = this.now().toISOString();
    this.db.transaction((tx) => {
      const target = tx.select({ id: accounts.id }).from(accounts).where(matches(identity)).get();
      if (!target) {
        throw new NotFoundError(`No ${identity.provider} account ${identity.accountEmail} for user ${identity.userId}`);
      }
      tx.update(accounts)
        .set({ isPrimary: false, updatedAt: now })
        .where(and(eq(accounts.userId, identity.userId), eq(accounts.isPrimary, true)))
        .run();
      tx.update(accounts).set({ isPrimary: true, updatedAt: now }).where(eq(accounts.id, target.id)).run();
    });
  }
}
