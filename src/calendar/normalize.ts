import { DataError } from '../errors.js';
import { SYNCED_BUSY_MARKER, type Meeting, type ResponseStatus } from '../model.js';

/** Extended property carrying the id of the event a busy block mirrors. */
export const ORIGINAL_EVENT_PROPERTY = 'original_event_id';

/** Graph single-value extended property id for {@link ORIGINAL_EVENT_PROPERTY}. */
export const GRAPH_ORIGINAL_EVENT_PROPERTY_ID = `String {00020329-0000-0000-C000-000000000046} Name ${ORIGINAL_EVENT_PROPERTY}`;

export const BUSY_BLOCK_BODY = `${SYNCED_BUSY_MARKER} This event was synced from another calendar.`;

// ---------------------------------------------------------------- Google

export interface GoogleEventTime {
  dateTime?: string;
  date?: string;
  timeZone?: string;
}

export interface GoogleAttendee {
  email?: string;
  self?: boolean;
  organizer?: boolean;
  responseStatus?: string;
}

export interface GoogleEvent {
  id: string;
  summary?: string;
  description?: string;
  location?: string;
  status?: string;
  start?: GoogleEventTime;
  end?: GoogleEventTime;
  attendees?: GoogleAttendee[];
  organizer?: { email?: string; self?: boolean };
  extendedProperties?: { private?: Record<string, string>; shared?: Record<string, string> };
}

const GOOGLE_RESPONSES = new Map<string, ResponseStatus>([
  ['accepted', 'accepted'],
  ['declined', 'declined'],
  ['tentative', 'tentative'],
  ['needsAction', 'needsAction'],
]);

function googleTime(t: GoogleEventTime | undefined, field: string, id: string): string {
  const v = t?.dateTime ?? t?.date;
  if (!v) throw new DataError(`Google event ${id} has no ${field} time`);
  return v;
}

export function normalizeGoogleEvent(event: GoogleEvent, accountEmail: string): Meeting {
  const attendees = event.attendees ?? [];
  const email = accountEmail.toLowerCase();
  const me = attendees.find((a) => a.self || a.email?.toLowerCase() === email);
  const isOrganizer = Boolean(event.organizer?.self || event.organizer?.email?.toLowerCase() === email);

  let responseStatus: ResponseStatus = 'needsAction';
  if (me?.responseStatus) responseStatus = GOOGLE_RESPONSES.get(me.responseStatus) ?? 'needsAction';
  else if (isOrganizer) responseStatus = 'accepted';

  const original = event.extendedProperties?.private?.[ORIGINAL_EVENT_PROPERTY];

  return {
    id: event.id,
    title: event.summary || 'Untitled',
    start: googleTime(event.start, 'start', event.id),
    end: googleTime(event.end, 'end', event.id),
    responseStatus,
    isOrganizer,
    isRealMeeting: attendees.length > 1,
    isSyncedBusy: (event.description ?? '').includes(SYNCED_BUSY_MARKER),
    location: event.location || undefined,
    attendeeCount: attendees.length,
    ...(original ? { originalEventId: original } : {}),
  };
}

// ---------------------------------------------------------------- Graph

export interface GraphDateTimeTimeZone {
  dateTime: string;
  timeZone?: string;
}

export interface GraphEmailAddress {
  address?: string;
  name?: string;
}

export interface GraphAttendee {
  emailAddress?: GraphEmailAddress;
  status?: { response?: string };
  type?: string;
}

export interface GraphEvent {
  id: string;
  subject?: string;
  body?: { content?: string; contentType?: string };
  start?: GraphDateTimeTimeZone;
  end?: GraphDateTimeTimeZone;
  location?: { displayName?: string };
  attendees?: GraphAttendee[];
  organizer?: { emailAddress?: GraphEmailAddress };
  isOrganizer?: boolean;
  responseStatus?: { response?: string };
  singleValueExtendedProperties?: Array<{ id: string; value: string }>;
}

const GRAPH_RESPONSES = new Map<string, ResponseStatus>([
  ['accepted', 'accepted'],
  ['declined', 'declined'],
  ['tentativelyAccepted', 'tentative'],
  ['notResponded', 'needsAction'],
  ['none', 'needsAction'],
  ['organizer', 'accepted'],
]);

/**
 * Normalize fractional seconds in an ISO timestamp to 3 digits (milliseconds).
 * e.g. "2026-02-08T09:00:00.0000000Z" → "2026-02-08T09:00:00.000Z"
 */
function normalizeIsoPrecision(iso: string): string {
  return iso.replace(/\.(\d+)Z$/, (_match, frac: string) => `.${(frac + '000').slice(0, 3)}Z`);
}

/**
 * Graph returns `{ dateTime, timeZone }` with no offset on `dateTime`.
 * UTC values become RFC 3339 with `Z`; other zones are kept as given.
 */
export function normalizeGraphDate(dt?: GraphDateTimeTimeZone): string | undefined {
  if (!dt?.dateTime) return undefined;
  const raw = dt.dateTime;
  if (/[zZ]$/.test(raw) || /[+-]\d\d:\d\d$/.test(raw)) return normalizeIsoPrecision(raw);
  if (dt.timeZone?.toUpperCase() === 'UTC') return normalizeIsoPrecision(`${raw}Z`);
  return raw;
}

export function normalizeGraphEvent(event: GraphEvent, accountEmail: string): Meeting {
  const attendees = event.attendees ?? [];
  const email = accountEmail.toLowerCase();
  const isOrganizer =
    event.isOrganizer ?? event.organizer?.emailAddress?.address?.toLowerCase() === email;

  const me = attendees.find((a) => a.emailAddress?.address?.toLowerCase() === email);
  const raw = me?.status?.response ?? event.responseStatus?.response;
  const responseStatus = (raw && GRAPH_RESPONSES.get(raw)) || 'needsAction';

  const start = normalizeGraphDate(event.start);
  const end = normalizeGraphDate(event.end);
  if (!start) throw new DataError(`Graph event ${event.id} has no start time`);
  if (!end) throw new DataError(`Graph event ${event.id} has no end time`);

  const original = event.singleValueExtendedProperties?.find((p) =>
    p.id.includes(`Name ${ORIGINAL_EVENT_PROPERTY}`),
  )?.value;

  return {
    id: event.id,
    title: event.subject || 'Untitled',
    start,
    end,
    responseStatus,
    isOrganizer,
    isRealMeeting: attendees.length > 1,
    isSyncedBusy: (event.body?.content ?? '').includes(SYNCED_BUSY_MARKER),
    location: event.location?.displayName || undefined,
    attendeeCount: attendees.length,
    ...(original ? { originalEventId: original } : {}),
  };
}
