import type { AccountIdentity, TaskProviderName, TaskRecord, TaskStatus } from '../model.js';
import { identityKey, isTaskProvider } from '../model.js';
import type { ProviderRegistry } from '../providers/registry.js';
import type { CredentialStore } from '../store/credentialStore.js';
import type { TaskStore } from '../store/taskStore.js';
import type { ReconciliationEngine, ReconcileResult } from './reconcile.js';
import { contentHash } from './hash.js';
import {
  FatalAuthFailure,
  NotFoundError,
  TransientFailure,
  classifyError,
  type NeedsInteractiveAuth,
} from '../errors.js';
import { createLogger, type Logger } from '../log.js';

/**
 * Run `fn` with an AbortSignal that fires after `ms`. A timeout surfaces
 * as a TransientFailure; `fn` should pass the signal on to fetch.
 */
export async function withTimeout<T>(ms: number, fn: (signal: AbortSignal) => Promise<T>, label = 'Provider call'): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const err = new TransientFailure(`${label} timed out after ${ms} ms`);
      controller.abort(err);
      reject(err);
    }, ms);
  });
  try {
    return await Promise.race([fn(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export type AccountSyncStatus = 'success' | 'error' | 'needs_reauth';

export interface AccountSyncOutcome {
  provider: TaskProviderName;
  accountEmail: string;
  status: AccountSyncStatus;
  result?: ReconcileResult;
  error?: string;
  redirectTo?: string;
}

export type SyncStatus = 'success' | 'partial' | 'failed' | 'needs_reauth';

export interface UserSyncReport {
  userId: string;
  status: SyncStatus;
  accounts: AccountSyncOutcome[];
  durationMs: number;
}

export function overallStatus(accounts: readonly AccountSyncOutcome[]): SyncStatus {
  const ok = accounts.filter((a) => a.status === 'success').length;
  if (ok === accounts.length) return 'success';
  if (ok > 0) return 'partial';
  if (accounts.every((a) => a.status === 'needs_reauth')) return 'needs_reauth';
  return 'failed';
}

export interface SyncOrchestratorOptions {
  credentials: CredentialStore;
  tasks: TaskStore;
  engine: ReconciliationEngine;
  providers: ProviderRegistry;
  /** Per-account timeout (default 60 s). */
  timeoutMs?: number;
  logger?: Logger;
  now?: () => Date;
}

/**
 * Syncs every task account of a user. One account's failure never stops
 * the others; the report lists each account's outcome.
 */
export class SyncOrchestrator {
  private logger: Logger;
  private timeoutMs: number;
  private now: () => Date;

  constructor(private opts: SyncOrchestratorOptions) {
    this.logger = (opts.logger ?? createLogger('silent')).child('sync');
    this.timeoutMs = opts.timeoutMs ?? 60_000;
    this.now = opts.now ?? (() => new Date());
  }

  /** Task accounts of the user that have a registered provider. */
  async taskAccounts(userId: string): Promise<AccountIdentity[]> {
    const records = await this.opts.credentials.listForUser(userId);
    const out = new Map<string, AccountIdentity>();
    for (const record of records) {
      const identity = this.opts.providers.taskAccountOf(record);
      if (identity) out.set(identityKey(identity), identity);
    }
    return [...out.values()];
  }

  async syncUser(userId: string): Promise<UserSyncReport> {
    const started = this.now().getTime();
    const accounts = await this.taskAccounts(userId);
    const outcomes = await Promise.all(accounts.map((identity) => this.syncAccount(identity)));
    const report: UserSyncReport = {
      userId,
      status: overallStatus(outcomes),
      accounts: outcomes,
      durationMs: this.now().getTime() - started,
    };
    this.logger.info('User sync done', { user: userId, status: report.status, accounts: outcomes.length });
    return report;
  }

  /** Authenticate, fetch and reconcile one account. Provider failures become the outcome. */
  async syncAccount(identity: AccountIdentity): Promise<AccountSyncOutcome> {
    const base = { provider: taskProviderName(identity), accountEmail: identity.accountEmail };
    try {
      const provider = this.opts.providers.taskProvider(identity.provider);
      const auth = await withTimeout(this.timeoutMs, () => provider.authenticate(identity), 'Authentication');
      if (auth) return { ...base, ...needsReauthFields(auth) };

      const result = await withTimeout(
        this.timeoutMs,
        (signal) => this.opts.engine.syncAccount(identity, provider, { signal }),
        `Sync of ${identityKey(identity)}`,
      );
      return { ...base, status: 'success', result };
    } catch (err) {
      const classified = classifyError(err, identity.provider);
      if (classified instanceof FatalAuthFailure) {
        this.logger.warn('Account needs reauthorization', { account: identityKey(identity), error: classified });
        return { ...base, ...(await this.reauthTarget(identity)), error: classified.message };
      }
      this.logger.error('Account sync failed', { account: identityKey(identity), error: classified });
      return { ...base, status: 'error', error: classified.message };
    }
  }

  private async reauthTarget(identity: AccountIdentity): Promise<Pick<AccountSyncOutcome, 'status' | 'redirectTo'>> {
    try {
      const auth = await this.opts.providers.taskProvider(identity.provider).authenticate(identity);
      return auth ? needsReauthFields(auth) : { status: 'needs_reauth' };
    } catch (err) {
      this.logger.debug('No reauthorization target', { account: identityKey(identity), error: err });
      return { status: 'needs_reauth' };
    }
  }

  /**
   * Change a task's status at its provider, then locally. The stored hash is
   * recomputed with the new status.
   */
  async setTaskStatus(taskId: string, status: TaskStatus): Promise<TaskRecord> {
    const record = this.opts.tasks.get(taskId);
    if (!record) throw new NotFoundError(`Task ${taskId} not found`);
    const identity: AccountIdentity = { userId: record.userId, provider: record.provider, accountEmail: record.accountEmail };
    const provider = this.opts.providers.taskProvider(record.provider);

    await withTimeout(this.timeoutMs, (signal) =>
      provider.updateTaskStatus(identity, record.providerTaskId, status, { signal }),
    );
    this.opts.tasks.updateStatus(record.id, status, contentHash({ ...record, status }));

    const updated = this.opts.tasks.get(taskId);
    if (!updated) throw new NotFoundError(`Task ${taskId} vanished during update`);
    return updated;
  }
}

function taskProviderName(identity: AccountIdentity): TaskProviderName {
  if (!isTaskProvider(identity.provider)) throw new NotFoundError(`"${identity.provider}" is not a task provider`);
  return identity.provider;
}

function needsReauthFields(auth: NeedsInteractiveAuth): Pick<AccountSyncOutcome, 'status' | 'redirectTo' | 'error'> {
  return { status: 'needs_reauth', redirectTo: auth.redirectTo, ...(auth.reason ? { error: auth.reason } : {}) };
}
