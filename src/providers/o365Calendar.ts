import type { AccountIdentity, Meeting, NewMeetingInput } from '../model.js';
import type { CalendarProvider, CallOptions } from './provider.js';
import type { OAuthSession } from './oauth.js';
import { requestJson, type FetchLike, type JsonRequestOptions } from '../http.js';
import { DataError, type NeedsInteractiveAuth } from '../errors.js';
import {
  BUSY_BLOCK_BODY,
  GRAPH_ORIGINAL_EVENT_PROPERTY_ID,
  normalizeGraphEvent,
  type GraphEvent,
} from '../calendar/normalize.js';
import { createLogger, type Logger } from '../log.js';

export interface O365CalendarProviderOptions {
  session: OAuthSession;
  /** Days ahead to fetch (default 7). */
  windowDays?: number;
  /**
   * Keep every event instead of only real meetings (more than one attendee)
   * and synced busy blocks.
   */
  includeAllEvents?: boolean;
  /** Inject fetch for tests */
  fetcher?: FetchLike;
  logger?: Logger;
  now?: () => Date;
}

interface GraphListEventsResponse {
  value: GraphEvent[];
  '@odata.nextLink'?: string;
}

const GRAPH = 'https://graph.microsoft.com/v1.0';
const DAY = 86_400_000;

const SELECT = [
  'id',
  'subject',
  'start',
  'end',
  'attendees',
  'organizer',
  'isOrganizer',
  'responseStatus',
  'body',
  'location',
].join(',');

export class O365CalendarProvider implements CalendarProvider {
  readonly name = 'o365' as const;

  private fetcher: FetchLike;
  private logger: Logger;
  private now: () => Date;

  constructor(private opts: O365CalendarProviderOptions) {
    this.fetcher = opts.fetcher ?? fetch;
    this.logger = (opts.logger ?? createLogger('silent')).child('o365');
    this.now = opts.now ?? (() => new Date());
  }

  private api<T>(identity: AccountIdentity, pathOrUrl: string, init: JsonRequestOptions = {}): Promise<T> {
    const url = pathOrUrl.startsWith('https://') ? pathOrUrl : `${GRAPH}${pathOrUrl}`;
    return this.opts.session.call(
      identity,
      (token) =>
        requestJson<T>(
          url,
          {
            ...init,
            headers: { authorization: `Bearer ${token}`, prefer: 'outlook.timezone="UTC"', ...(init.headers ?? {}) },
          },
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

    const events: GraphEvent[] = [];
    let res = await this.api<GraphListEventsResponse>(identity, '/me/calendarView', {
      query: {
        startDateTime: from.toISOString(),
        endDateTime: to.toISOString(),
        $select: SELECT,
        $expand: `singleValueExtendedProperties($filter=id eq '${GRAPH_ORIGINAL_EVENT_PROPERTY_ID}')`,
        $top: 250,
      },
      signal: opts.signal,
    });
    events.push(...res.value);

    let next = res['@odata.nextLink'];
    while (next) {
      res = await this.api<GraphListEventsResponse>(identity, next, { signal: opts.signal });
      events.push(...res.value);
      next = res['@odata.nextLink'];
    }

    const meetings: Meeting[] = [];
    for (const e of events) {
      let meeting: Meeting;
      try {
        meeting = normalizeGraphEvent(e, identity.accountEmail);
      } catch (err) {
        if (!(err instanceof DataError)) throw err;
        this.logger.warn('Skipping malformed event', { id: e.id, error: err });
        continue;
      }
      if (this.opts.includeAllEvents || meeting.isRealMeeting || meeting.isSyncedBusy) meetings.push(meeting);
    }
    this.logger.debug(`Fetched ${meetings.length} of ${events.length} events`, { account: identity.accountEmail });
    return meetings;
  }

  async createItem(identity: AccountIdentity, data: NewMeetingInput, opts: CallOptions = {}): Promise<Meeting> {
    const timeZone = data.timeZone ?? 'UTC';
    const created = await this.api<GraphEvent>(identity, '/me/events', {
      method: 'POST',
      body: {
        subject: data.title,
        body: { contentType: 'text', content: data.description ?? '' },
        start: { dateTime: data.start, timeZone },
        end: { dateTime: data.end, timeZone },
        ...(data.location ? { location: { displayName: data.location } } : {}),
        ...(data.attendees?.length
          ? { attendees: data.attendees.map((address) => ({ emailAddress: { address }, type: 'required' })) }
          : {}),
      },
      signal: opts.signal,
    });
    this.logger.info('Meeting created', { id: created.id, account: identity.accountEmail });
    return normalizeGraphEvent(created, identity.accountEmail);
  }

  async createBusyBlock(
    identity: AccountIdentity,
    meeting: Pick<Meeting, 'start' | 'end'>,
    originalEventId: string,
    opts: CallOptions = {},
  ): Promise<string> {
    const created = await this.api<GraphEvent>(identity, '/me/events', {
      method: 'POST',
      body: {
        subject: 'Busy',
        body: { contentType: 'text', content: BUSY_BLOCK_BODY },
        start: { dateTime: meeting.start, timeZone: 'UTC' },
        end: { dateTime: meeting.end, timeZone: 'UTC' },
        showAs: 'busy',
        sensitivity: 'private',
        singleValueExtendedProperties: [{ id: GRAPH_ORIGINAL_EVENT_PROPERTY_ID, value: originalEventId }],
      },
      signal: opts.signal,
    });
    return created.id;
  }
}
