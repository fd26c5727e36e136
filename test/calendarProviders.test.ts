import { afterEach, describe, expect, it } from 'vitest';
import { GoogleCalendarProvider } from '../src/providers/googleCalendar.js';
import { O365CalendarProvider } from '../src/providers/o365Calendar.js';
import { BUSY_BLOCK_BODY, GRAPH_ORIGINAL_EVENT_PROPERTY_ID } from '../src/calendar/normalize.js';
import type { AccountIdentity } from '../src/model.js';
import type { DatabaseHandle } from '../src/store/db.js';
import { jsonResponse, oauthAccount, TEST_NOW, type RecordedCall } from './helpers.js';

const gmail: AccountIdentity = { userId: 'u1', provider: 'google', accountEmail: 'me@example.com' };
const office: AccountIdentity = { userId: 'u1', provider: 'o365', accountEmail: 'me@corp.example.com' };

const attendees = [{ email: 'me@example.com', responseStatus: 'accepted' }, { email: 'pat@example.com' }];

function googleApi(call: RecordedCall): Response | undefined {
  if (!call.url.startsWith('https://www.googleapis.com/calendar/v3/calendars/primary/events')) return undefined;
  if (call.method === 'POST') return jsonResponse({ id: 'busy-1', start: { dateTime: 'x' }, end: { dateTime: 'y' } });
  if (new URL(call.url).searchParams.get('pageToken') === 'p2') {
    return jsonResponse({
      items: [{ id: 'e4', summary: 'Retro', start: { dateTime: '2026-03-03T16:00:00Z' }, end: { dateTime: '2026-03-03T17:00:00Z' }, attendees }],
    });
  }
  return jsonResponse({
    items: [
      { id: 'e1', summary: 'Standup', start: { dateTime: '2026-03-02T09:00:00Z' }, end: { dateTime: '2026-03-02T09:15:00Z' }, attendees },
      { id: 'e2', status: 'cancelled', start: { dateTime: '2026-03-02T10:00:00Z' }, end: { dateTime: '2026-03-02T11:00:00Z' } },
      { id: 'e3', summary: 'Broken', end: { dateTime: '2026-03-02T12:00:00Z' } },
    ],
    nextPageToken: 'p2',
  });
}

let handle: DatabaseHandle | undefined;
afterEach(() => handle?.close());

describe('GoogleCalendarProvider', () => {
  async function setup() {
    const account = await oauthAccount('google', gmail, googleApi);
    handle = account.handle;
    const provider = new GoogleCalendarProvider({ session: account.session, fetcher: account.fetcher, now: () => TEST_NOW });
    return { ...account, provider };
  }

  it('pages through the next week and skips cancelled or malformed events', async () => {
    const { provider, calls } = await setup();

    const meetings = await provider.fetchItems(gmail);

    expect(meetings.map((m) => [m.id, m.title, m.isRealMeeting])).toEqual([
      ['e1', 'Standup', true],
      ['e4', 'Retro', true],
    ]);
    const params = Object.fromEntries(new URL(calls[0]?.url ?? '').searchParams);
    expect(params).toEqual({
      timeMin: '2026-03-01T12:00:00.000Z',
      timeMax: '2026-03-08T12:00:00.000Z',
      singleEvents: 'true',
      orderBy: 'startTime',
      maxResults: '250',
    });
    expect(calls).toHaveLength(2);
  });

  it('creates private busy blocks tagged with the original event', async () => {
    const { provider, calls } = await setup();

    const id = await provider.createBusyBlock(
      gmail,
      { start: '2026-03-02T09:00:00Z', end: '2026-03-02T09:15:00Z' },
      'office-42',
    );

    expect(id).toBe('busy-1');
    expect(JSON.parse(calls[0]?.body ?? '')).toEqual({
      summary: 'Busy',
      description: BUSY_BLOCK_BODY,
      start: { dateTime: '2026-03-02T09:00:00Z', timeZone: 'UTC' },
      end: { dateTime: '2026-03-02T09:15:00Z', timeZone: 'UTC' },
      transparency: 'opaque',
      visibility: 'private',
      extendedProperties: { private: { original_event_id: 'office-42' } },
    });
  });
});

function graphApi(call: RecordedCall): Response | undefined {
  if (!call.url.startsWith('https://graph.microsoft.com/v1.0/me/calendarView')) return undefined;
  const utc = (dateTime: string) => ({ dateTime, timeZone: 'UTC' });
  return jsonResponse({
    value: [
      {
        id: 'g1',
        subject: 'Planning',
        start: utc('2026-03-02T13:00:00.0000000'),
        end: utc('2026-03-02T14:00:00.0000000'),
        attendees: [
          { emailAddress: { address: 'me@corp.example.com' }, status: { response: 'accepted' } },
          { emailAddress: { address: 'boss@corp.example.com' }, status: { response: 'organizer' } },
        ],
      },
      { id: 'g2', subject: 'Focus time', start: utc('2026-03-02T15:00:00.0000000'), end: utc('2026-03-02T16:00:00.0000000') },
      {
        id: 'g3',
        subject: 'Busy',
        body: { content: BUSY_BLOCK_BODY },
        start: utc('2026-03-02T09:00:00.0000000'),
        end: utc('2026-03-02T09:15:00.0000000'),
        singleValueExtendedProperties: [{ id: GRAPH_ORIGINAL_EVENT_PROPERTY_ID, value: 'e1' }],
      },
    ],
  });
}

describe('O365CalendarProvider', () => {
  it('keeps real meetings and busy blocks only', async () => {
    const account = await oauthAccount('o365', office, graphApi);
    handle = account.handle;
    const provider = new O365CalendarProvider({ session: account.session, fetcher: account.fetcher, now: () => TEST_NOW });

    const meetings = await provider.fetchItems(office);

    expect(meetings.map((m) => [m.id, m.start, m.isSyncedBusy, m.originalEventId])).toEqual([
      ['g1', '2026-03-02T13:00:00.000Z', false, undefined],
      ['g3', '2026-03-02T09:00:00.000Z', true, 'e1'],
    ]);
    expect(account.calls[0]?.headers.get('prefer')).toBe('outlook.timezone="UTC"');
  });

  it('keeps every event when asked to', async () => {
    const account = await oauthAccount('o365', office, graphApi);
    handle = account.handle;
    const provider = new O365CalendarProvider({
      session: account.session,
      fetcher: account.fetcher,
      now: () => TEST_NOW,
      includeAllEvents: true,
    });

    expect((await provider.fetchItems(office)).map((m) => m.id)).toEqual(['g1', 'g2', 'g3']);
  });
});
