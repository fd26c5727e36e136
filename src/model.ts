export type CalendarProviderName = 'google' | 'o365';

export type TaskProviderName = 'google_tasks' | 'outlook' | 'todoist' | 'sqlite' | 'file';

export type ProviderName = CalendarProviderName | TaskProviderName;

export const CALENDAR_PROVIDERS: readonly CalendarProviderName[] = ['google', 'o365'];

export const TASK_PROVIDERS: readonly TaskProviderName[] = [
  'google_tasks',
  'outlook',
  'todoist',
  'sqlite',
  'file',
];

/** Task provider that shares the OAuth credential of a calendar vendor. */
export const VENDOR_TASK_PROVIDER: Readonly<Record<CalendarProviderName, TaskProviderName>> = {
  google: 'google_tasks',
  o365: 'outlook',
};

export function isCalendarProvider(name: string): name is CalendarProviderName {
  return CALENDAR_PROVIDERS.some((p) => p === name);
}

export function isTaskProvider(name: string): name is TaskProviderName {
  return TASK_PROVIDERS.some((p) => p === name);
}

/** One provider account belonging to one application user. */
export interface AccountIdentity {
  userId: string;
  provider: ProviderName;
  /** Email of the account at the provider (or the app login for key/local providers). */
  accountEmail: string;
}

export function identityKey(id: AccountIdentity): string {
  return `${id.userId}/${id.provider}/${id.accountEmail}`;
}

export type TaskStatus = 'active' | 'completed';

export type ListType = 'prioritized' | 'unprioritized';

/**
 * 1 = low, 2 = normal, 3 = high, 4 = urgent. Todoist values are stored as
 * Todoist reports them, so its default priority (1) reads as low here.
 */
export type Priority = 1 | 2 | 3 | 4;

/** A task as a provider returns it, normalized across providers. */
export interface ProviderTask {
  /** Provider-local id (opaque). */
  id: string;
  title: string;
  description?: string;
  status: TaskStatus;
  /** ISO datetime. */
  dueDate?: string;
  priority: Priority;
  projectId?: string;
  projectName?: string;
  parentId?: string;
  sectionId?: string;
}

export interface NewTaskInput {
  title: string;
  description?: string;
  dueDate?: string;
  priority?: Priority;
  projectId?: string;
  parentId?: string;
}

/** Locally persisted view of a provider task. */
export interface TaskRecord {
  id: string;
  userId: string;
  provider: TaskProviderName;
  accountEmail: string;
  providerTaskId: string;
  title: string;
  description?: string;
  status: TaskStatus;
  dueDate?: string;
  priority: Priority;
  projectId?: string;
  projectName?: string;
  parentId?: string;
  sectionId?: string;
  listType: ListType;
  position: number;
  contentHash: string;
  lastSynced: string;
  createdAt: string;
  updatedAt: string;
}

export type ResponseStatus = 'accepted' | 'declined' | 'tentative' | 'needsAction';

/** Marker placed in the body of busy blocks mirrored from another calendar. */
export const SYNCED_BUSY_MARKER = '[SYNCED-BUSY]';

/** Calendar event normalized across providers. Fetched per request, never stored. */
export interface Meeting {
  id: string;
  title: string;
  /** ISO datetime, or a date for all-day events. */
  start: string;
  end: string;
  responseStatus: ResponseStatus;
  isOrganizer: boolean;
  /** More than one attendee. */
  isRealMeeting: boolean;
  /** Busy block mirrored from another calendar. */
  isSyncedBusy: boolean;
  location?: string;
  attendeeCount: number;
  /** Event this busy block mirrors, when it is one. */
  originalEventId?: string;
}

export interface NewMeetingInput {
  title: string;
  start: string;
  end: string;
  description?: string;
  location?: string;
  attendees?: string[];
  /** IANA zone for start/end without an offset. Default UTC. */
  timeZone?: string;
}
