import type { AccountIdentity, CalendarProviderName, Meeting, NewMeetingInput } from '../model.js';
import { identityKey } from '../model.js';
import type { ProviderRegistry } from '../providers/registry.js';
import type { CredentialStore } from '../store/credentialStore.js';
import { withTimeout } from '../sync/orchestrator.js';
import { toOutcome, type NeedsInteractiveAuth, type Outcome } from '../errors.js';
import { createLogger, type Logger } from '../log.js';

export interface AccountMeetings {
  provider: CalendarProviderName;
  accountEmail: string;
  outcome: Outcome<Meeting[]>;
}

export interface CalendarAggregatorOptions {
  providers: ProviderRegistry;
  credentials: CredentialStore;
  timeoutMs?: number;
  logger?: Logger;
}

function byStart(a: Meeting, b: Meeting): number {
  return Date.parse(a.start) - Date.parse(b.start);
}

/**
 * Routes calendar operations to the provider named by the account. The
 * providers flag and unflag accounts through their OAuth session.
 */
export class CalendarAggregator {
  private logger: Logger;
  private timeoutMs: number;

  constructor(private opts: CalendarAggregatorOptions) {
    this.logger = (opts.logger ?? createLogger('silent')).child('calendar');
    this.timeoutMs = opts.timeoutMs ?? 60_000;
  }

  authenticate(identity: AccountIdentity): Promise<NeedsInteractiveAuth | null> {
    return this.opts.providers.calendarProvider(identity.provider).authenticate(identity);
  }

  /** Meetings of one account, ordered by start. */
  async getMeetings(identity: AccountIdentity): Promise<Meeting[]> {
    const provider = this.opts.providers.calendarProvider(identity.provider);
    const meetings = await withTimeout(this.timeoutMs, (signal) => provider.fetchItems(identity, { signal }));
    return meetings.sort(byStart);
  }

  createMeeting(identity: AccountIdentity, data: NewMeetingInput): Promise<Meeting> {
    const provider = this.opts.providers.calendarProvider(identity.provider);
    return withTimeout(this.timeoutMs, (signal) => provider.createItem(identity, data, { signal }));
  }

  createBusyBlock(identity: AccountIdentity, meeting: Pick<Meeting, 'start' | 'end'>, originalEventId: string): Promise<string> {
    const provider = this.opts.providers.calendarProvider(identity.provider);
    return withTimeout(this.timeoutMs, (signal) => provider.createBusyBlock(identity, meeting, originalEventId, { signal }));
  }

  /**
   * Meetings of every calendar account of the user. Each account gets its
   * own outcome; an account that needs reauthorization reports where to go.
   */
  async getMeetingsForUser(userId: string): Promise<AccountMeetings[]> {
    const records = await this.opts.credentials.listForUser(userId);
    const calendars = records.filter((r) => this.opts.providers.hasCalendarProvider(r.provider));

    return Promise.all(
      calendars.map(async (record): Promise<AccountMeetings> => {
        const identity: AccountIdentity = { userId, provider: record.provider, accountEmail: record.accountEmail };
        const provider = this.opts.providers.calendarProvider(record.provider);
        const head = { provider: provider.name, accountEmail: record.accountEmail };
        try {
          const auth = await this.authenticate(identity);
          if (auth) return { ...head, outcome: auth };
          return { ...head, outcome: { kind: 'ok', value: await this.getMeetings(identity) } };
        } catch (err) {
          const outcome = toOutcome<Meeting[]>(err, record.provider);
          this.logger.warn('Calendar fetch failed', { account: identityKey(identity), outcome: outcome.kind });
          if (outcome.kind === 'fatal_auth') {
            const auth = await this.authenticate(identity).catch((authErr: unknown) => {
              this.logger.debug('No reauthorization target', { account: identityKey(identity), error: authErr });
              return null;
            });
            if (auth) return { ...head, outcome: auth };
          }
          return { ...head, outcome };
        }
      }),
    );
  }

  /**
   * Mirror every real meeting of `source` as a busy block on `target`,
   * skipping meetings already mirrored there and busy blocks themselves.
   * Returns the ids of the created blocks.
   */
  async syncBusyBlocks(source: AccountIdentity, target: AccountIdentity): Promise<string[]> {
    const [from, to] = await Promise.all([this.getMeetings(source), this.getMeetings(target)]);
    const mirrored = new Set(to.map((m) => m.originalEventId).filter((id): id is string => Boolean(id)));
    const created: string[] = [];
    for (const meeting of from) {
      if (meeting.isSyncedBusy || !meeting.isRealMeeting || meeting.responseStatus === 'declined') continue;
      if (mirrored.has(meeting.id)) continue;
      created.push(await this.createBusyBlock(target, meeting, meeting.id));
    }
    this.logger.info('Busy blocks synced', { from: identityKey(source), to: identityKey(target), created: created.length });
    return created;
  }
}
