import type { AccountIdentity, NewTaskInput, Priority, ProviderTask, TaskStatus } from '../model.js';
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
import { normalizeGraphDate, type GraphDateTimeTimeZone } from '../calendar/normalize.js';
import { createLogger, type Logger } from '../log.js';

export interface OutlookTasksProviderOptions {
  /** Session of the `o365` account with the same email. */
  session: OAuthSession;
  /** Inject fetch for tests */
  fetcher?: FetchLike;
  logger?: Logger;
}

interface Page<T> {
  value: T[];
  '@odata.nextLink'?: string;
}

interface GraphTodoList {
  id: string;
  displayName: string;
  wellknownListName?: string;
}

interface GraphTask {
  id: string;
  title?: string;
  body?: { content?: string; contentType?: 'text' | 'html' };
  dueDateTime?: GraphDateTimeTimeZone;
  status?: 'notStarted' | 'inProgress' | 'completed' | 'waitingOnOthers' | 'deferred' | string;
  importance?: 'low' | 'normal' | 'high';
}

const IMPORTANCE_TO_PRIORITY: Record<string, Priority> = { low: 1, normal: 2, high: 3 };

function importanceOf(priority: Priority | undefined): 'low' | 'normal' | 'high' {
  if (priority === 1) return 'low';
  if (priority === 3 || priority === 4) return 'high';
  return 'normal';
}

function toProviderTask(t: GraphTask, list: GraphTodoList): ProviderTask {
  return {
    id: listScopedId(list.id, t.id),
    title: t.title ?? '',
    description: t.body?.content || undefined,
    // notStarted, inProgress, waitingOnOthers and deferred are all still open
    status: t.status === 'completed' ? 'completed' : 'active',
    dueDate: normalizeGraphDate(t.dueDateTime),
    priority: (t.importance && IMPORTANCE_TO_PRIORITY[t.importance]) || 2,
    projectId: list.id,
    projectName: list.displayName,
  };
}

/** Microsoft To Do through Graph, authorized through the user's Office 365 account. */
export class OutlookTasksProvider implements TaskProvider {
  readonly name = 'outlook' as const;

  private fetcher: FetchLike;
  private logger: Logger;

  constructor(private opts: OutlookTasksProviderOptions) {
    this.fetcher = opts.fetcher ?? fetch;
    this.logger = (opts.logger ?? createLogger('silent')).child('outlook');
  }

  private api<T>(identity: AccountIdentity, pathOrUrl: string, init: JsonRequestOptions = {}): Promise<T> {
    const base = `https://graph.microsoft.com/v1.0`;
    const url = pathOrUrl.startsWith('https://') ? pathOrUrl : `${base}${pathOrUrl}`;
    return this.opts.session.call(
      identity,
      (token) =>
        requestJson<T>(url, { ...init, headers: { authorization: `Bearer ${token}`, ...(init.headers ?? {}) } }, this.fetcher),
      init.signal,
    );
  }

  authenticate(identity: AccountIdentity): Promise<NeedsInteractiveAuth | null> {
    return this.opts.session.authenticate(identity);
  }

  refreshToken(identity: AccountIdentity, opts?: CallOptions): Promise<void> {
    return this.opts.session.refresh(identity, opts?.signal);
  }

  private async paged<T>(identity: AccountIdentity, first: string, signal?: AbortSignal): Promise<T[]> {
    const out: T[] = [];
    let next: string | undefined = first;
    while (next) {
      const res: Page<T> = await this.api<Page<T>>(identity, next, { signal });
      out.push(...(res.value ?? []));
      next = res['@odata.nextLink'];
    }
    return out;
  }

  private lists(identity: AccountIdentity, signal?: AbortSignal): Promise<GraphTodoList[]> {
    return this.paged<GraphTodoList>(identity, '/me/todo/lists', signal);
  }

  private tasksOf(identity: AccountIdentity, list: GraphTodoList, signal?: AbortSignal): Promise<GraphTask[]> {
    return this.paged<GraphTask>(
      identity,
      `/me/todo/lists/${encodeURIComponent(list.id)}/tasks?$top=100`,
      signal,
    );
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
      if (found) return found.body?.content ?? '';
    }
    return undefined;
  }

  async createItem(identity: AccountIdentity, data: NewTaskInput, opts: CallOptions = {}): Promise<ProviderTask> {
    const lists = await this.lists(identity, opts.signal);
    const list = data.projectId
      ? lists.find((l) => l.id === data.projectId)
      : (lists.find((l) => l.wellknownListName === 'defaultList') ?? lists[0]);
    if (!list) throw new NotFoundError(`Microsoft To Do list ${data.projectId ?? '(default)'} not found`);

    const payload: Record<string, unknown> = {
      title: data.title,
      importance: importanceOf(data.priority),
      status: 'notStarted',
    };
    if (data.description) payload.body = { contentType: 'text', content: data.description };
    if (data.dueDate) payload.dueDateTime = { dateTime: data.dueDate, timeZone: 'UTC' };

    const created = await this.api<GraphTask>(identity, `/me/todo/lists/${encodeURIComponent(list.id)}/tasks`, {
      method: 'POST',
      body: payload,
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
    // Graph expects status mutations, not completedDateTime writes.
    await this.api<GraphTask>(
      identity,
      `/me/todo/lists/${encodeURIComponent(listId)}/tasks/${encodeURIComponent(id)}`,
      { method: 'PATCH', body: { status: status === 'completed' ? 'completed' : 'notStarted' }, signal: opts.signal },
    );
  }
}
