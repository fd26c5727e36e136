import type { AccountIdentity, NewTaskInput, ProviderTask, TaskStatus } from '../model.js';
import {
  AI_INSTRUCTIONS_TITLE,
  listScopedId,
  parseListScopedId,
  type CallOptions,
  type TaskProvider,
} from './provider.js';
import type { OAuthSession } from './oauth.js';
import { requestJson, type FetchLike, type JsonRequestOptions } from '../http.js';
import { NotFoundError, type NeedsInteractiveAuth } from '../errors.js';
import { createLogger, type Logger } from '../log.js';

export interface GoogleTasksProviderOptions {
  /** Session of the `google` account with the same email. */
  session: OAuthSession;
  /** Inject fetch for tests */
  fetcher?: FetchLike;
  logger?: Logger;
}

interface GoogleTaskList {
  id: string;
  title: string;
}

interface GoogleTaskListsResponse {
  items?: GoogleTaskList[];
  nextPageToken?: string;
}

interface GoogleTask {
  id: string;
  title?: string;
  notes?: string;
  status: 'needsAction' | 'completed';
  due?: string;
  parent?: string;
  deleted?: boolean;
}

interface GoogleListTasksResponse {
  items?: GoogleTask[];
  nextPageToken?: string;
}

function toProviderTask(t: GoogleTask, list: GoogleTaskList): ProviderTask {
  return {
    id: listScopedId(list.id, t.id),
    title: t.title ?? '',
    description: t.notes || undefined,
    status: t.status === 'completed' ? 'completed' : 'active',
    dueDate: t.due,
    // Google Tasks has no priority
    priority: 2,
    projectId: list.id,
    projectName: list.title,
    parentId: t.parent ? listScopedId(list.id, t.parent) : undefined,
  };
}

/** Google Tasks, authorized through the user's Google (calendar) account. */
export class GoogleTasksProvider implements TaskProvider {
  readonly name = 'google_tasks' as const;

  private fetcher: FetchLike;
  private logger: Logger;

  constructor(private opts: GoogleTasksProviderOptions) {
    this.fetcher = opts.fetcher ?? fetch;
    this.logger = (opts.logger ?? createLogger('silent')).child('google_tasks');
  }

  private api<T>(identity: AccountIdentity, path: string, init: JsonRequestOptions = {}): Promise<T> {
    const base = `https://tasks.googleapis.com/tasks/v1`;
    return this.opts.session.call(
      identity,
      (token) =>
        requestJson<T>(
          `${base}${path}`,
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

  private async lists(identity: AccountIdentity, signal?: AbortSignal): Promise<GoogleTaskList[]> {
    const out: GoogleTaskList[] = [];
    let pageToken: string | undefined;
    do {
      const res = await this.api<GoogleTaskListsResponse>(identity, '/users/@me/lists', {
        query: { maxResults: 100, pageToken },
        signal,
      });
      out.push(...(res.items ?? []));
      pageToken = res.nextPageToken;
    } while (pageToken);
    return out;
  }

  private async tasksOf(identity: AccountIdentity, list: GoogleTaskList, signal?: AbortSignal): Promise<GoogleTask[]> {
    const out: GoogleTask[] = [];
    let pageToken: string | undefined;
    do {
      const res = await this.api<GoogleListTasksResponse>(identity, `/lists/${encodeURIComponent(list.id)}/tasks`, {
        query: { maxResults: 100, showCompleted: true, showHidden: true, pageToken },
        signal,
      });
      out.push(...(res.items ?? []).filter((t) => !t.deleted));
      pageToken = res.nextPageToken;
    } while (pageToken);
    return out;
  }

  async fetchItems(identity: AccountIdentity, opts: CallOptions = {}): Promise<ProviderTask[]> {
    const out: ProviderTask[] = [];
    for (const list of await this.lists(identity, opts.signal)) {
      for (const t of await this.tasksOf(identity, list, opts.signal)) {
        if (t.title === AI_INSTRUCTIONS_TITLE) continue;
        out.push(toProviderTask(t, list));
      }
    }
    this.logger.debug(`Fetched ${out.length} tasks`, { account: identity.accountEmail });
    return out;
  }

  async getAiInstructions(identity: AccountIdentity, opts: CallOptions = {}): Promise<string | undefined> {
    for (const list of await this.lists(identity, opts.signal)) {
      const found = (await this.tasksOf(identity, list, opts.signal)).find((t) => t.title === AI_INSTRUCTIONS_TITLE);
      if (found) return found.notes ?? '';
    }
    return undefined;
  }

  async createItem(identity: AccountIdentity, data: NewTaskInput, opts: CallOptions = {}): Promise<ProviderTask> {
    const lists = await this.lists(identity, opts.signal);
    const list = data.projectId ? lists.find((l) => l.id === data.projectId) : lists[0];
    if (!list) throw new NotFoundError(`Google task list ${data.projectId ?? '(default)'} not found`);
    const parent = data.parentId ? parseListScopedId(data.parentId).taskId : undefined;

    const created = await this.api<GoogleTask>(identity, `/lists/${encodeURIComponent(list.id)}/tasks`, {
      method: 'POST',
      query: { parent },
      body: { title: data.title, notes: data.description, due: data.dueDate, status: 'needsAction' },
      signal: opts.signal,
    });
    return toProviderTask(created, list);
  }

  async updateTaskStatus(
    identity: AccountIdentity,
    taskId: string,
    status: TaskStatus,
    opts: CallOptions = {},
  ): Promise<void> {
    const { listId, taskId: id } = parseListScopedId(taskId);
    await this.api<GoogleTask>(identity, `/lists/${encodeURIComponent(listId)}/tasks/${encodeURIComponent(id)}`, {
      method: 'PATCH',
      // reopening needs the completion timestamp cleared too
      body: status === 'completed' ? { status: 'completed' } : { status: 'needsAction', completed: null },
      signal: opts.signal,
    });
  }
}
