import type { AccountIdentity, Meeting, NewMeetingInput } from '../model.js';
import type { CalendarProvider, CallOptions } from './provider.js';
import type { OAuthSession } from './oauth.js';
import { requestJson, type FetchLike, type JsonRequestOptions } from '../http.js';
import { DataError, type NeedsInteractiveAuth } from '../errors.js';
import {
  BUSY_BLOCK_BODY,
  ORIGINAL_EVENT_PROPERTY,
  normalizeGoogleEvent,
  type GoogleEvent,
} from '../calendar/normalize.js';
import { createLogger, type Logger } from '../log.js';

export interface GoogleCalendarProviderOptions {
  session: OAuthSession;
  /** Calendar id (defaults to 'primary'). */
  calendarId?: string;
  /** Days ahead to fetch (default 7). */
  windowDays?: number;
  /** Inject fetch for tests */
  fetcher?: FetchLike;
  logger?: Logger;
  now?: () => Date;
}

interface GoogleEventsResponse {
  items?: GoogleEvent[];
  nextPageToken?: string;
}

const BASE = 'https://www.googleapis.com/calendar/v3';
const DAY = 86_400_000;

export class GoogleCalendarProvider implements CalendarProvider {
  readonly name = 'google' as const;

  private fetcher: FetchLike;
  private logger: Logger;
  private now: () => Date;

  constructor(private opts: GoogleCalendarProviderOptions) {
    this.fetcher = opts.fetcher ?? fetch;
    this.logger = (opts.logger ?? createLogger('silent')).child('google');
    this.now = opts.now ?? (() => new Date());
  }

  private get eventsPath() {
    return `/calendars/${encodeURIComponent(this.opts.calendarId ?? 'primary')}/events`;
  }

  private api<T>(identity: AccountIdentity, path: string, init: JsonRequestOptions = {}): Promise<T> {
    return this.opts.session.call(
      identity,
      (token) =>
        requestJson<T>(
          `${BASE}${path}`,
          { ...init, headers: { authorization: `Bearer ${token}`, ...(init.headers ?? {}) } },
          this.fetcher,
        ),
      init.signal,
    );
  }

  authenticate(identity: AccountIdentity): Promise<NeedsInteractiveAuth | null> {
    return this.opts.session.authenticate(identity);
  }

  refreshToken(identity: AccountIdentity, opts?: CallOptions): Promise<void> {
    return this.opts.session.refresh(identity, opts?.signal);
  }

  async fetchItems(identity: AccountIdentity, opts: CallOptions = {}): Promise<Meeting[]> {
    const from = this.now();
    const to = new Date(from.getTime() + (this.opts.windowDays ?? 7) * DAY);

    const events: GoogleEvent[] = [];
    let pageToken: string | undefined;
    do {
      const res = await this.api<GoogleEventsResponse>(identity, this.eventsPath, {
        query: {
          timeMin: from.toISOString(),
          timeMax: to.toISOString(),
          singleEvents: true,
          orderBy: 'startTime',
          maxResults: 250,
          pageToken,
        },
        signal: opts.signal,
      });
      events.push(...(res.items ?? []));
      pageToken = res.nextPageToken;
    } while (pageToken);

    const meetings: Meeting[] = [];
    for (const e of events) {
      if (e.status === 'cancelled') continue;
      try {
        meetings.push(normalizeGoogleEvent(e, identity.accountEmail));
      } catch (err) {
        if (!(err instanceof DataError)) throw err;
        this.logger.warn('Skipping malformed event', { id: e.id, error: err });
      }
    }
    this.logger.debug(`Fetched ${meetings.length} events`, { account: identity.accountEmail });
    return meetings;
  }

  async createItem(identity: AccountIdentity, data: NewMeetingInput, opts: CallOptions = {}): Promise<Meeting> {
    const timeZone = data.timeZone ?? 'UTC';
    const created = await this.api<GoogleEvent>(identity, this.eventsPath, {
      method: 'POST',
      body: {
        summary: data.title,
        description: data.description,
        location: data.location,
        start: { dateTime: data.start, timeZone },
        end: { dateTime: data.end, timeZone },
        attendees: data.attendees?.map((email) => ({ email })),
      },
      signal: opts.signal,
    });
    this.logger.info('Meeting created', { id: created.id, account: identity.accountEmail });
    return normalizeGoogleEvent(created, identity.accountEmail);
  }

  async createBusyBlock(
    identity: AccountIdentity,
    meeting: Pick<Meeting, 'start' | 'end'>,
    originalEventId: string,
    opts: CallOptions = {},
  ): Promise<string> {
    const created = await this.api<GoogleEvent>(identity, this.eventsPath, {
      method: 'POST',
      body: {
        summary: 'Busy',
        description: BUSY_BLOCK_BODY,
        start: { dateTime: meeting.start, timeZone: 'UTC' },
        end: { dateTime: meeting.end, timeZone: 'UTC' },
        transparency: 'opaque',
        visibility: 'private',
        extendedProperties: { private: { [ORIGINAL_EVENT_PROPERTY]: originalEventId } },
      },
      signal: opts.signal,
    });
    return created.id;
  }
}
