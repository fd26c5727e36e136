import { randomUUID } from 'node:crypto';
import type {
  AccountIdentity,
  CalendarProviderName,
  Meeting,
  NewMeetingInput,
  NewTaskInput,
  ProviderTask,
  TaskProviderName,
  TaskStatus,
} from '../model.js';
import { identityKey, SYNCED_BUSY_MARKER } from '../model.js';
import { AI_INSTRUCTIONS_TITLE, type CalendarProvider, type TaskProvider } from './provider.js';
import { NotFoundError, type NeedsInteractiveAuth } from '../errors.js';

type AuthHook = (identity: AccountIdentity) => NeedsInteractiveAuth | null | Promise<NeedsInteractiveAuth | null>;
type FailHook = (identity: AccountIdentity) => Error | undefined;

/**
 * In-memory task provider for local dev and tests.
 *
 * - Tasks are kept per account.
 * - `failWith` makes calls for chosen accounts throw.
 */
export class MockTaskProvider implements TaskProvider {
  readonly name: TaskProviderName;
  private tasks = new Map<string, Map<string, ProviderTask>>();
  private auth?: AuthHook;
  private failWith?: FailHook;
  /** Number of fetchItems calls, per account key. */
  readonly fetchCalls = new Map<string, number>();

  constructor(opts: { name?: TaskProviderName; authenticate?: AuthHook; failWith?: FailHook } = {}) {
    this.name = opts.name ?? 'sqlite';
    this.auth = opts.authenticate;
    this.failWith = opts.failWith;
  }

  private bucket(identity: AccountIdentity): Map<string, ProviderTask> {
    const key = identityKey(identity);
    let b = this.tasks.get(key);
    if (!b) {
      b = new Map();
      this.tasks.set(key, b);
    }
    return b;
  }

  private check(identity: AccountIdentity) {
    const err = this.failWith?.(identity);
    if (err) throw err;
  }

  /** Replace the account's tasks. */
  seed(identity: AccountIdentity, tasks: ProviderTask[]): void {
    this.tasks.set(identityKey(identity), new Map(tasks.map((t) => [t.id, { ...t }])));
  }

  async authenticate(identity: AccountIdentity): Promise<NeedsInteractiveAuth | null> {
    return this.auth ? this.auth(identity) : null;
  }

  async fetchItems(identity: AccountIdentity): Promise<ProviderTask[]> {
    const key = identityKey(identity);
    this.fetchCalls.set(key, (this.fetchCalls.get(key) ?? 0) + 1);
    this.check(identity);
    return [...this.bucket(identity).values()]
      .filter((t) => t.title !== AI_INSTRUCTIONS_TITLE)
      .map((t) => ({ ...t }));
  }

  async createItem(identity: AccountIdentity, data: NewTaskInput): Promise<ProviderTask> {
    this.check(identity);
    const task: ProviderTask = {
      id: randomUUID(),
      title: data.title,
      description: data.description,
      status: 'active',
      dueDate: data.dueDate,
      priority: data.priority ?? 2,
      projectId: data.projectId,
      parentId: data.parentId,
    };
    this.bucket(identity).set(task.id, task);
    return { ...task };
  }

  async updateTaskStatus(identity: AccountIdentity, taskId: string, status: TaskStatus): Promise<void> {
    this.check(identity);
    const task = this.bucket(identity).get(taskId);
    if (!task) throw new NotFoundError(`Mock task ${taskId} not found`);
    task.status = status;
  }

  async getAiInstructions(identity: AccountIdentity): Promise<string | undefined> {
    this.check(identity);
    const found = [...this.bucket(identity).values()].find((t) => t.title === AI_INSTRUCTIONS_TITLE);
    return found ? (found.description ?? '') : undefined;
  }
}

/** In-memory calendar provider; `refresh` decides what a token refresh does. */
export class MockCalendarProvider implements CalendarProvider {
  readonly name: CalendarProviderName;
  private meetings = new Map<string, Meeting[]>();
  private auth?: AuthHook;
  private failWith?: FailHook;
  private refresh?: (identity: AccountIdentity) => Promise<void>;
  readonly refreshCalls: string[] = [];

  constructor(
    opts: {
      name?: CalendarProviderName;
      authenticate?: AuthHook;
      failWith?: FailHook;
      refresh?: (identity: AccountIdentity) => Promise<void>;
    } = {},
  ) {
    this.name = opts.name ?? 'google';
    this.auth = opts.authenticate;
    this.failWith = opts.failWith;
    this.refresh = opts.refresh;
  }

  private check(identity: AccountIdentity) {
    const err = this.failWith?.(identity);
    if (err) throw err;
  }

  seed(identity: AccountIdentity, meetings: Meeting[]): void {
    this.meetings.set(identityKey(identity), meetings.map((m) => ({ ...m })));
  }

  async authenticate(identity: AccountIdentity): Promise<NeedsInteractiveAuth | null> {
    return this.auth ? this.auth(identity) : null;
  }

  async refreshToken(identity: AccountIdentity): Promise<void> {
    this.refreshCalls.push(identity.accountEmail);
    if (this.refresh) await this.refresh(identity);
  }

  async fetchItems(identity: AccountIdentity): Promise<Meeting[]> {
    this.check(identity);
    return (this.meetings.get(identityKey(identity)) ?? []).map((m) => ({ ...m }));
  }

  async createItem(identity: AccountIdentity, data: NewMeetingInput): Promise<Meeting> {
    this.check(identity);
    const attendeeCount = data.attendees?.length ?? 0;
    const meeting: Meeting = {
      id: randomUUID(),
      title: data.title,
      start: data.start,
      end: data.end,
      responseStatus: 'accepted',
      isOrganizer: true,
      isRealMeeting: attendeeCount > 1,
      isSyncedBusy: (data.description ?? '').includes(SYNCED_BUSY_MARKER),
      location: data.location,
      attendeeCount,
    };
    const key = identityKey(identity);
    this.meetings.set(key, [...(this.meetings.get(key) ?? []), meeting]);
    return { ...meeting };
  }

  async createBusyBlock(
    identity: AccountIdentity,
    meeting: Pick<Meeting, 'start' | 'end'>,
    originalEventId: string,
  ): Promise<string> {
    this.check(identity);
    const block: Meeting = {
      id: randomUUID(),
      title: 'Busy',
      start: meeting.start,
      end: meeting.end,
      responseStatus: 'accepted',
      isOrganizer: true,
      isRealMeeting: false,
      isSyncedBusy: true,
      attendeeCount: 0,
      originalEventId,
    };
    const key = identityKey(identity);
    this.meetings.set(key, [...(this.meetings.get(key) ?? []), block]);
    return block.id;
  }
}
