import { randomUUID } from 'node:crypto';
import type { AccountIdentity, NewTaskInput, ProviderTask, TaskStatus } from '../model.js';
import { AI_INSTRUCTIONS_TITLE, type TaskProvider } from './provider.js';
import { NotFoundError, needsAuth, errorMessage, type NeedsInteractiveAuth } from '../errors.js';
import type { JsonTaskFileStore, StoredTask } from '../store/jsonStore.js';
import { createLogger, type Logger } from '../log.js';

function toProviderTask(t: StoredTask): ProviderTask {
  return {
    id: t.id,
    title: t.title,
    description: t.description || undefined,
    status: t.status,
    dueDate: t.due_date ?? undefined,
    priority: t.priority,
    projectId: t.project_id ?? undefined,
    parentId: t.parent_id ?? undefined,
  };
}

/** Legacy JSON-file task list, one file per user. */
export class FileTaskProvider implements TaskProvider {
  readonly name = 'file' as const;
  private logger: Logger;
  private now: () => Date;

  constructor(
    private files: JsonTaskFileStore,
    opts: { logger?: Logger; now?: () => Date } = {},
  ) {
    this.logger = (opts.logger ?? createLogger('silent')).child('file');
    this.now = opts.now ?? (() => new Date());
  }

  /** Creates the file on first use; an unreadable file sends the user to fix it. */
  async authenticate(identity: AccountIdentity): Promise<NeedsInteractiveAuth | null> {
    try {
      if (!(await this.files.exists(identity.userId))) {
        await this.files.save(identity.userId, { version: 1, tasks: [] });
      } else {
        await this.files.load(identity.userId);
      }
      return null;
    } catch (err) {
      this.logger.error('Task file unusable', { user: identity.userId, error: err });
      return needsAuth('file', `file://${this.files.filePath(identity.userId)}`, errorMessage(err));
    }
  }

  async fetchItems(identity: AccountIdentity): Promise<ProviderTask[]> {
    const { tasks } = await this.files.load(identity.userId);
    return tasks.filter((t) => t.title !== AI_INSTRUCTIONS_TITLE).map(toProviderTask);
  }

  async createItem(identity: AccountIdentity, data: NewTaskInput): Promise<ProviderTask> {
    const now = this.now().toISOString();
    const task: StoredTask = {
      id: randomUUID(),
      title: data.title,
      description: data.description,
      status: 'active',
      due_date: data.dueDate,
      priority: data.priority ?? 2,
      project_id: data.projectId,
      parent_id: data.parentId,
      created_at: now,
      updated_at: now,
    };
    await this.files.update(identity.userId, (file) => {
      file.tasks.push(task);
    });
    return toProviderTask(task);
  }

  async updateTaskStatus(identity: AccountIdentity, taskId: string, status: TaskStatus): Promise<void> {
    const now = this.now().toISOString();
    await this.files.update(identity.userId, (file) => {
      const task = file.tasks.find((t) => t.id === taskId);
      if (!task) throw new NotFoundError(`Task ${taskId} not found in ${this.files.filePath(identity.userId)}`);
      task.status = status;
      task.updated_at = now;
    });
  }

  async getAiInstructions(identity: AccountIdentity): Promise<string | undefined> {
    const { tasks } = await this.files.load(identity.userId);
    const found = tasks.find((t) => t.title === AI_INSTRUCTIONS_TITLE);
    return found ? (found.description ?? '') : undefined;
  }

  async setAiInstructions(identity: AccountIdentity, instructions: string): Promise<void> {
    const now = this.now().toISOString();
    await this.files.update(identity.userId, (file) => {
      const found = file.tasks.find((t) => t.title === AI_INSTRUCTIONS_TITLE);
      if (found) {
        found.description = instructions;
        found.updated_at = now;
        return;
      }
      file.tasks.push({
        id: randomUUID(),
        title: AI_INSTRUCTIONS_TITLE,
        description: instructions,
        status: 'active',
        priority: 2,
        created_at: now,
        updated_at: now,
      });
    });
  }
}
