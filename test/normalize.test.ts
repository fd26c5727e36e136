import { describe, expect, it } from 'vitest';
import {
  BUSY_BLOCK_BODY,
  GRAPH_ORIGINAL_EVENT_PROPERTY_ID,
  normalizeGoogleEvent,
  normalizeGraphDate,
  normalizeGraphEvent,
} from '../src/calendar/normalize.js';
import { DataError } from '../src/errors.js';

describe('normalizeGoogleEvent', () => {
  it('maps an accepted meeting with several attendees', () => {
    const meeting = normalizeGoogleEvent(
      {
        id: 'ev1',
        summary: 'Design review',
        location: 'Room 4',
        start: { dateTime: '2026-03-02T10:00:00+01:00' },
        end: { dateTime: '2026-03-02T11:00:00+01:00' },
        organizer: { email: 'lead@example.com' },
        attendees: [
          { email: 'lead@example.com', organizer: true, responseStatus: 'accepted' },
          { email: 'Me@Example.com', responseStatus: 'tentative' },
        ],
      },
      'me@example.com',
    );

    expect(meeting).toEqual({
      id: 'ev1',
      title: 'Design review',
      start: '2026-03-02T10:00:00+01:00',
      end: '2026-03-02T11:00:00+01:00',
      responseStatus: 'tentative',
      isOrganizer: false,
      isRealMeeting: true,
      isSyncedBusy: false,
      location: 'Room 4',
      attendeeCount: 2,
    });
  });

  it('falls back to needsAction for unknown responses', () => {
    for (const response of ['constructor', 'toString', 'maybe']) {
      const meeting = normalizeGoogleEvent(
        {
          id: 'ev5',
          start: { dateTime: '2026-03-02T10:00:00Z' },
          end: { dateTime: '2026-03-02T11:00:00Z' },
          attendees: [{ email: 'me@example.com', responseStatus: response }],
        },
        'me@example.com',
      );
      expect(meeting.responseStatus).toBe('needsAction');
    }
  });

  it('treats the organizer of an event without attendees as accepted', () => {
    const meeting = normalizeGoogleEvent(
      {
        id: 'ev2',
        start: { date: '2026-03-03' },
        end: { date: '2026-03-04' },
        organizer: { self: true },
      },
      'me@example.com',
    );
    expect(meeting.title).toBe('Untitled');
    expect(meeting.responseStatus).toBe('accepted');
    expect(meeting.isRealMeeting).toBe(false);
    expect(meeting.start).toBe('2026-03-03');
  });

  it('recognizes mirrored busy blocks', () => {
    const meeting = normalizeGoogleEvent(
      {
        id: 'ev3',
        summary: 'Busy',
        description: BUSY_BLOCK_BODY,
        start: { dateTime: '2026-03-02T09:00:00Z' },
        end: { dateTime: '2026-03-02T09:30:00Z' },
        extendedProperties: { private: { original_event_id: 'src-1' } },
      },
      'me@example.com',
    );
    expect(meeting.isSyncedBusy).toBe(true);
    expect(meeting.originalEventId).toBe('src-1');
  });

  it('rejects events without a start', () => {
    expect(() => normalizeGoogleEvent({ id: 'ev4', end: { date: '2026-03-04' } }, 'me@example.com')).toThrow(
      new DataError('Google event ev4 has no start time'),
    );
  });
});

describe('normalizeGraphDate', () => {
  it('adds Z to UTC values and trims the fraction to milliseconds', () => {
    expect(normalizeGraphDate({ dateTime: '2026-02-08T09:00:00.0000000', timeZone: 'UTC' })).toBe(
      '2026-02-08T09:00:00.000Z',
    );
    expect(normalizeGraphDate({ dateTime: '2026-02-08T09:00:00.5Z' })).toBe('2026-02-08T09:00:00.500Z');
  });

  it('keeps other zones as given', () => {
    expect(normalizeGraphDate({ dateTime: '2026-02-08T09:00:00.0000000', timeZone: 'Pacific Standard Time' })).toBe(
      '2026-02-08T09:00:00.0000000',
    );
    expect(normalizeGraphDate(undefined)).toBeUndefined();
  });
});

describe('normalizeGraphEvent', () => {
  it('maps attendee responses and mirrored ids', () => {
    const meeting = normalizeGraphEvent(
      {
        id: 'g1',
        subject: 'Busy',
        body: { content: BUSY_BLOCK_BODY },
        start: { dateTime: '2026-03-02T09:00:00.0000000', timeZone: 'UTC' },
        end: { dateTime: '2026-03-02T09:30:00.0000000', timeZone: 'UTC' },
        isOrganizer: true,
        responseStatus: { response: 'organizer' },
        singleValueExtendedProperties: [{ id: GRAPH_ORIGINAL_EVENT_PROPERTY_ID, value: 'src-9' }],
      },
      'me@corp.example.com',
    );
    expect(meeting).toEqual({
      id: 'g1',
      title: 'Busy',
      start: '2026-03-02T09:00:00.000Z',
      end: '2026-03-02T09:30:00.000Z',
      responseStatus: 'accepted',
      isOrganizer: true,
      isRealMeeting: false,
      isSyncedBusy: true,
      location: undefined,
      attendeeCount: 0,
      originalEventId: 'src-9',
    });
  });

  it('reads my own attendee response', () => {
    const meeting = normalizeGraphEvent(
      {
        id: 'g2',
        subject: 'Planning',
        start: { dateTime: '2026-03-02T13:00:00.0000000', timeZone: 'UTC' },
        end: { dateTime: '2026-03-02T14:00:00.0000000', timeZone: 'UTC' },
        organizer: { emailAddress: { address: 'boss@corp.example.com' } },
        attendees: [
          { emailAddress: { address: 'boss@corp.example.com' }, status: { response: 'organizer' } },
          { emailAddress: { address: 'ME@corp.example.com' }, status: { response: 'tentativelyAccepted' } },
        ],
      },
      'me@corp.example.com',
    );
    expect(meeting.responseStatus).toBe('tentative');
    expect(meeting.isOrganizer).toBe(false);
    expect(meeting.isRealMeeting).toBe(true);
  });

  it('falls back to needsAction for unknown responses', () => {
    for (const response of ['constructor', '__proto__', 'hasOwnProperty']) {
      const meeting = normalizeGraphEvent(
        {
          id: 'g3',
          start: { dateTime: '2026-03-02T13:00:00.0000000', timeZone: 'UTC' },
          end: { dateTime: '2026-03-02T14:00:00.0000000', timeZone: 'UTC' },
          responseStatus: { response },
        },
        'me@corp.example.com',
      );
      expect(meeting.responseStatus).toBe('needsAction');
    }
  });
});
