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
import { DataError, type NeedsInteractiveAuth } from '../errors.js';

export interface CallOptions {
  signal?: AbortSignal;
}

/** Title of the task whose description holds the user's scheduling instructions. */
export const AI_INSTRUCTIONS_TITLE = 'AI Instructions';

interface ProviderBase {
  /**
   * `null` when the account can be used now (after refreshing its token if
   * needed), otherwise where the user must go to (re)authorize it.
   * Never throws for "needs auth".
   */
  authenticate(identity: AccountIdentity): Promise<NeedsInteractiveAuth | null>;
}

export interface TaskProvider extends ProviderBase {
  readonly name: TaskProviderName;

  /** Every task of the account. Throws on any failure; never returns a partial list. */
  fetchItems(identity: AccountIdentity, opts?: CallOptions): Promise<ProviderTask[]>;

  createItem(identity: AccountIdentity, data: NewTaskInput, opts?: CallOptions): Promise<ProviderTask>;

  updateTaskStatus(identity: AccountIdentity, taskId: string, status: TaskStatus, opts?: CallOptions): Promise<void>;

  /** Description of the "AI Instructions" task, if the account has one. */
  getAiInstructions(identity: AccountIdentity, opts?: CallOptions): Promise<string | undefined>;

  /** Create or replace the "AI Instructions" task (local providers). */
  setAiInstructions?(identity: AccountIdentity, instructions: string, opts?: CallOptions): Promise<void>;

  /** OAuth-backed providers only. */
  refreshToken?(identity: AccountIdentity, opts?: CallOptions): Promise<void>;
}

export interface CalendarProvider extends ProviderBase {
  readonly name: CalendarProviderName;

  fetchItems(identity: AccountIdentity, opts?: CallOptions): Promise<Meeting[]>;

  createItem(identity: AccountIdentity, data: NewMeetingInput, opts?: CallOptions): Promise<Meeting>;

  /** Mirror `meeting` as a private busy block. Returns the new event id. */
  createBusyBlock(
    identity: AccountIdentity,
    meeting: Pick<Meeting, 'start' | 'end'>,
    originalEventId: string,
    opts?: CallOptions,
  ): Promise<string>;

  /**
   * Throws FatalAuthFailure when the refresh token is missing or rejected,
   * TransientFailure on network, 429 or 5xx trouble.
   */
  refreshToken(identity: AccountIdentity, opts?: CallOptions): Promise<void>;
}

/** Task id for providers whose task ids are only unique within a list. */
export function listScopedId(listId: string, taskId: string): string {
  return `${listId}:${taskId}`;
}

export function parseListScopedId(id: string): { listId: string; taskId: string } {
  const i = id.indexOf(':');
  if (i <= 0 || i === id.length - 1) throw new DataError(`Task id "${id}" is not of the form <list>:<task>`);
  return { listId: id.slice(0, i), taskId: id.slice(i + 1) };
}
