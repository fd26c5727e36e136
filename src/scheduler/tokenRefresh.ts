import { setTimeout as sleep } from 'node:timers/promises';
import type { AccountIdentity } from '../model.js';
import { identityKey } from '../model.js';
import type { ProviderRegistry } from '../providers/registry.js';
import { credentialKind, type CredentialRecord, type CredentialStore } from '../store/credentialStore.js';
import { TransientFailure, classifyError } from '../errors.js';
import { withTimeout } from '../sync/orchestrator.js';
import { createLogger, type Logger } from '../log.js';

export interface TokenRefreshOptions {
  store: CredentialStore;
  providers: ProviderRegistry;
  /** Pause between passes (default 30 min). */
  intervalMs?: number;
  /** Accounts whose last sync is older than this are refreshed (default 45 min). */
  thresholdMs?: number;
  /** Per-refresh timeout (default 60 s). */
  timeoutMs?: number;
  logger?: Logger;
  now?: () => Date;
}

export interface RefreshPassResult {
  /** Accounts a refresh was attempted for. */
  selected: number;
  refreshed: number;
  /** Refreshes that flagged the account for reauthorization. */
  failed: number;
  /** Left for the next pass. */
  transient: number;
  /** Due, but flagged, without a refresh token, or with no provider. */
  skipped: number;
}

const MINUTE = 60_000;

/**
 * Background loop that refreshes OAuth tokens before they go stale.
 * One pass never stops on a single account's failure, and a failed pass
 * never stops the loop.
 */
export class TokenRefreshScheduler {
  private store: CredentialStore;
  private providers: ProviderRegistry;
  private intervalMs: number;
  private thresholdMs: number;
  private timeoutMs: number;
  private logger: Logger;
  private now: () => Date;
  private controller?: AbortController;
  private loop?: Promise<void>;

  constructor(opts: TokenRefreshOptions) {
    this.store = opts.store;
    this.providers = opts.providers;
    this.intervalMs = opts.intervalMs ?? 30 * MINUTE;
    this.thresholdMs = opts.thresholdMs ?? 45 * MINUTE;
    this.timeoutMs = opts.timeoutMs ?? 60_000;
    this.logger = (opts.logger ?? createLogger('silent')).child('refresh');
    this.now = opts.now ?? (() => new Date());
  }

  get running(): boolean {
    return this.loop !== undefined;
  }

  private skipReason(record: CredentialRecord): string | undefined {
    if (record.needsReauth) return 'needs_reauth';
    if (credentialKind(record.provider) !== 'oauth') return 'not_oauth';
    if (!record.refreshToken) return 'no_refresh_token';
    if (!this.providers.hasCalendarProvider(record.provider)) return 'no_provider';
    return undefined;
  }

  async runOnce(now: Date = this.now()): Promise<RefreshPassResult> {
    const cutoff = new Date(now.getTime() - this.thresholdMs);
    const due = await this.store.listDueForRefresh(cutoff);
    const result: RefreshPassResult = { selected: 0, refreshed: 0, failed: 0, transient: 0, skipped: 0 };

    const targets: CredentialRecord[] = [];
    for (const record of due) {
      const reason = this.skipReason(record);
      if (reason) {
        result.skipped++;
        this.logger.debug('Skipping account', { account: identityKey(record), reason });
      } else {
        targets.push(record);
      }
    }
    result.selected = targets.length;

    const outcomes = await Promise.allSettled(targets.map((record) => this.refreshOne(record)));
    outcomes.forEach((outcome, i) => {
      if (outcome.status === 'fulfilled') {
        result[outcome.value]++;
        return;
      }
      // refreshOne only rejects when flagging the account itself failed
      result.failed++;
      this.logger.error('Could not record refresh failure', { account: identityKey(targets[i]), error: outcome.reason });
    });

    this.logger.info('Refresh pass done', result);
    return result;
  }

  private async refreshOne(record: CredentialRecord): Promise<'refreshed' | 'failed' | 'transient'> {
    const identity: AccountIdentity = { userId: record.userId, provider: record.provider, accountEmail: record.accountEmail };
    const provider = this.providers.calendarProvider(record.provider);
    try {
      await withTimeout(this.timeoutMs, (signal) => provider.refreshToken(identity, { signal }));
      await this.store.markSynced(identity);
      return 'refreshed';
    } catch (err) {
      const classified = classifyError(err, record.provider);
      if (classified instanceof TransientFailure) {
        this.logger.warn('Transient refresh failure; retrying next pass', { account: identityKey(identity), error: classified });
        return 'transient';
      }
      const current = await this.store.get(identity);
      if (current && !current.needsReauth) await this.store.markNeedsReauth(identity);
      this.logger.warn('Refresh failed; account needs reauthorization', { account: identityKey(identity), error: classified });
      return 'failed';
    }
  }

  /** Run passes every `intervalMs` until `stop()`. */
  start(): void {
    if (this.loop) return;
    const controller = new AbortController();
    this.controller = controller;
    this.logger.info('Scheduler started', { intervalMs: this.intervalMs, thresholdMs: this.thresholdMs });

    this.loop = (async () => {
      while (!controller.signal.aborted) {
        try {
          await this.runOnce();
        } catch (err) {
          this.logger.error('Refresh pass failed', { error: err });
        }
        try {
          await sleep(this.intervalMs, undefined, { signal: controller.signal });
        } catch (err) {
          if (!controller.signal.aborted) throw err;
        }
      }
    })();
  }

  async stop(): Promise<void> {
    const loop = this.loop;
    if (!loop) return;
    this.controller?.abort();
    try {
      await loop;
    } finally {
      this.loop = undefined;
      this.controller = undefined;
      this.logger.info('Scheduler stopped');
    }
  }
}
