import type { AccountIdentity, NewTaskInput, Priority, ProviderTask, TaskStatus } from '../model.js';
import { AI_INSTRUCTIONS_TITLE, type CallOptions, type TaskProvider } from './provider.js';
import { requestJson, type FetchLike, type JsonRequestOptions } from '../http.js';
import {
  FatalAuthFailure,
  classifyError,
  needsAuth,
  type NeedsInteractiveAuth,
} from '../errors.js';
import { credentialOf, type CredentialStore } from '../store/credentialStore.js';
import { createLogger, type Logger } from '../log.js';

export interface TodoistProviderOptions {
  store: CredentialStore;
  /** Where the user goes to paste an API token. */
  setupUrl: string;
  /** Inject fetch for tests */
  fetcher?: FetchLike;
  logger?: Logger;
}

interface TodoistDue {
  date: string;
  datetime?: string | null;
  string?: string;
}

interface TodoistTask {
  id: string;
  content: string;
  description?: string;
  project_id?: string;
  section_id?: string | null;
  parent_id?: string | null;
  priority?: number;
  due?: TodoistDue | null;
  is_completed?: boolean;
}

interface TodoistProject {
  id: string;
  name: string;
}

const BASE = 'https://api.todoist.com/rest/v2';

function priorityOf(p: number | undefined): Priority {
  return p === 1 || p === 2 || p === 3 || p === 4 ? p : 2;
}

function toProviderTask(t: TodoistTask, projects: Map<string, string>): ProviderTask {
  return {
    id: t.id,
    title: t.content,
    description: t.description || undefined,
    status: t.is_completed ? 'completed' : 'active',
    dueDate: t.due ? (t.due.datetime ?? t.due.date) : undefined,
    // Todoist's own 1 (lowest) .. 4 (urgent) scale is stored unchanged
    priority: priorityOf(t.priority),
    projectId: t.project_id,
    projectName: t.project_id ? projects.get(t.project_id) : undefined,
    parentId: t.parent_id ?? undefined,
    sectionId: t.section_id ?? undefined,
  };
}

/** Todoist REST API with a per-account personal API token. */
export class TodoistProvider implements TaskProvider {
  readonly name = 'todoist' as const;

  private fetcher: FetchLike;
  private logger: Logger;

  constructor(private opts: TodoistProviderOptions) {
    this.fetcher = opts.fetcher ?? fetch;
    this.logger = (opts.logger ?? createLogger('silent')).child('todoist');
  }

  private async apiKey(identity: AccountIdentity): Promise<string> {
    const record = await this.opts.store.get(identity);
    if (!record) throw new FatalAuthFailure(`No Todoist API key stored for ${identity.accountEmail}`, 'todoist');
    const cred = credentialOf(record);
    if (cred.kind !== 'api_key') throw new FatalAuthFailure('Todoist account has no API key', 'todoist');
    return cred.apiKey;
  }

  private async api<T>(identity: AccountIdentity, path: string, init: JsonRequestOptions = {}): Promise<T> {
    try {
      const key = await this.apiKey(identity);
      const res = await requestJson<T>(
        `${BASE}${path}`,
        { ...init, headers: { authorization: `Bearer ${key}`, ...(init.headers ?? {}) } },
        this.fetcher,
      );
      await this.opts.store.markSynced(identity);
      return res;
    } catch (err) {
      const classified = classifyError(err, 'todoist');
      if (classified instanceof FatalAuthFailure) {
        const record = await this.opts.store.get(identity);
        if (record && !record.needsReauth) await this.opts.store.markNeedsReauth(identity);
      }
      throw classified;
    }
  }

  /** Validates the stored key with a cheap call; an invalid key means the setup page again. */
  async authenticate(identity: AccountIdentity): Promise<NeedsInteractiveAuth | null> {
    const record = await this.opts.store.get(identity);
    if (!record?.apiKey) return needsAuth('todoist', this.opts.setupUrl, 'no_credentials');
    if (record.needsReauth) return needsAuth('todoist', this.opts.setupUrl, 'needs_reauth');

    try {
      await this.api<TodoistProject[]>(identity, '/projects');
      return null;
    } catch (err) {
      if (err instanceof FatalAuthFailure) {
        this.logger.warn('Todoist API key rejected', { account: identity.accountEmail });
        return needsAuth('todoist', this.opts.setupUrl, 'invalid_api_key');
      }
      throw err;
    }
  }

  private async projects(identity: AccountIdentity, signal?: AbortSignal): Promise<Map<string, string>> {
    const list = await this.api<TodoistProject[]>(identity, '/projects', { signal });
    return new Map(list.map((p) => [p.id, p.name]));
  }

  async fetchItems(identity: AccountIdentity, opts: CallOptions = {}): Promise<ProviderTask[]> {
    const projects = await this.projects(identity, opts.signal);
    const tasks = await this.api<TodoistTask[]>(identity, '/tasks', { signal: opts.signal });
    const out = tasks.filter((t) => t.content !== AI_INSTRUCTIONS_TITLE).map((t) => toProviderTask(t, projects));
    this.logger.debug(`Fetched ${out.length} tasks`, { account: identity.accountEmail });
    return out;
  }

  async getAiInstructions(identity: AccountIdentity, opts: CallOptions = {}): Promise<string | undefined> {
    const tasks = await this.api<TodoistTask[]>(identity, '/tasks', {
      query: { filter: `search:${AI_INSTRUCTIONS_TITLE}` },
      signal: opts.signal,
    });
    const found = tasks.find((t) => t.content === AI_INSTRUCTIONS_TITLE);
    return found ? (found.description ?? '') : undefined;
  }

  async createItem(identity: AccountIdentity, data: NewTaskInput, opts: CallOptions = {}): Promise<ProviderTask> {
    const body: Record<string, unknown> = {
      content: data.title,
      description: data.description,
      project_id: data.projectId,
      parent_id: data.parentId,
      priority: data.priority,
    };
    if (data.dueDate) body[/T\d/.test(data.dueDate) ? 'due_datetime' : 'due_date'] = data.dueDate;

    const created = await this.api<TodoistTask>(identity, '/tasks', { method: 'POST', body, signal: opts.signal });
    return toProviderTask(created, new Map());
  }

  async updateTaskStatus(
    identity: AccountIdentity,
    taskId: string,
    status: TaskStatus,
    opts: CallOptions = {},
  ): Promise<void> {
    const action = status === 'completed' ? 'close' : 'reopen';
    await this.api<void>(identity, `/tasks/${encodeURIComponent(taskId)}/${action}`, {
      method: 'POST',
      signal: opts.signal,
    });
  }
}
