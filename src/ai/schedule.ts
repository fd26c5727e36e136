import { z } from 'zod';
import type { TaskRecord } from '../model.js';
import { identityKey } from '../model.js';
import type { TextGenerator } from './textGenerator.js';
import type { TaskStore } from '../store/taskStore.js';
import type { CredentialStore } from '../store/credentialStore.js';
import type { ProviderRegistry } from '../providers/registry.js';
import { DataError } from '../errors.js';
import { createLogger, type Logger } from '../log.js';

export const SLOT_MINUTES = [30, 60, 120] as const;
export type SlotMinutes = (typeof SLOT_MINUTES)[number];

const ScheduleEntrySchema = z.object({
  time: z.string().min(1),
  activity: z.string(),
  task_id: z.string().nullish(),
  notes: z.string().nullish(),
});

const DailyScheduleSchema = z.object({
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  schedule: z.array(ScheduleEntrySchema),
});

export interface ScheduleEntry {
  time: string;
  activity: string;
  taskId?: string;
  notes?: string;
}

export interface DailySchedule {
  date: string;
  entries: ScheduleEntry[];
}

export interface PromptTask {
  id: string;
  title: string;
  project: string;
  priority: number;
  due_date: string | null;
}

export function promptTasks(tasks: readonly TaskRecord[]): PromptTask[] {
  return tasks.map((t) => ({
    id: t.id,
    title: t.title,
    project: t.projectName ?? 'No Project',
    priority: t.priority,
    due_date: t.dueDate ?? null,
  }));
}

function longDate(isoDate: string): string {
  return new Date(`${isoDate}T12:00:00Z`).toLocaleDateString('en-US', {
    weekday: 'long',
    year: 'numeric',
    month: 'long',
    day: '2-digit',
    timeZone: 'UTC',
  });
}

export function buildSchedulePrompt(
  tasks: readonly PromptTask[],
  opts: { date: string; slotMinutes: SlotMinutes; instructions?: string },
): string {
  const parts = [
    `I need to create a daily schedule for ${longDate(opts.date)} (${opts.date}).`,
    `Here are my prioritized tasks, most important first:\n${JSON.stringify(tasks, null, 2)}`,
  ];
  if (opts.instructions?.trim()) {
    parts.push(`Please consider these scheduling preferences:\n${opts.instructions.trim()}`);
  }
  parts.push(
    `Please create time slots with a duration of ${opts.slotMinutes} minutes each.`,
    [
      'Based on the tasks and preferences, create a schedule for the day that:',
      '1. Allocates time for each task based on its priority and due date',
      '2. Includes breaks and lunch',
      '3. Follows the scheduling preferences above',
      '4. Is realistic about what can be done in a day',
      '5. Starts at 9:00 AM and ends by 5:00 PM',
    ].join('\n'),
    [
      'Reply with only a JSON object of this shape:',
      '{"date": "YYYY-MM-DD", "schedule": [{"time": "HH:MM AM - HH:MM AM", "activity": "...", "task_id": "task id or null", "notes": "optional"}]}',
    ].join('\n'),
  );
  return parts.join('\n\n');
}

/** JSON inside a ``` fence, else the outermost {...}, else the whole reply. */
export function extractJson(reply: string): string {
  const fenced = /```(?:json)?\s*([\s\S]*?)\s*```/.exec(reply);
  if (fenced?.[1] !== undefined) return fenced[1];
  const start = reply.indexOf('{');
  const end = reply.lastIndexOf('}');
  if (start !== -1 && end > start) return reply.slice(start, end + 1);
  return reply;
}

export function parseScheduleReply(reply: string): DailySchedule {
  let raw: unknown;
  try {
    raw = JSON.parse(extractJson(reply));
  } catch (err) {
    throw new DataError('AI reply is not valid JSON', { cause: err });
  }
  const parsed = DailyScheduleSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new DataError(`AI reply has the wrong shape: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'unknown'}`);
  }
  return {
    date: parsed.data.date,
    entries: parsed.data.schedule.map((e) => ({
      time: e.time,
      activity: e.activity,
      ...(e.task_id ? { taskId: e.task_id } : {}),
      ...(e.notes ? { notes: e.notes } : {}),
    })),
  };
}

export interface ScheduleGeneratorOptions {
  text: TextGenerator;
  tasks: TaskStore;
  credentials: CredentialStore;
  providers: ProviderRegistry;
  logger?: Logger;
}

/** Daily plan from the user's prioritized list and their "AI Instructions" tasks. */
export class ScheduleGenerator {
  private logger: Logger;

  constructor(private opts: ScheduleGeneratorOptions) {
    this.logger = (opts.logger ?? createLogger('silent')).child('schedule');
  }

  /**
   * Instructions from every task account of the user that has them, primary
   * account first. Accounts that cannot be read are logged and left out.
   */
  async instructionsFor(userId: string): Promise<string | undefined> {
    const records = await this.opts.credentials.listForUser(userId);
    const ordered = [...records].sort((a, b) => Number(b.isPrimary) - Number(a.isPrimary));
    const found: string[] = [];

    const seen = new Set<string>();

    for (const record of ordered) {
      const identity = this.opts.providers.taskAccountOf(record);
      if (!identity || seen.has(identityKey(identity))) continue;
      seen.add(identityKey(identity));
      try {
        const text = await this.opts.providers.taskProvider(identity.provider).getAiInstructions(identity);
        if (text?.trim()) found.push(text.trim());
      } catch (err) {
        this.logger.warn('Could not read AI instructions', { account: identityKey(identity), error: err });
      }
    }
    return found.length ? found.join('\n\n') : undefined;
  }

  async generate(
    userId: string,
    opts: { date: string; slotMinutes?: SlotMinutes; instructions?: string; signal?: AbortSignal },
  ): Promise<DailySchedule> {
    const tasks = this.opts.tasks.listForUser(userId, 'prioritized');
    const instructions = opts.instructions ?? (await this.instructionsFor(userId));
    const prompt = buildSchedulePrompt(promptTasks(tasks), {
      date: opts.date,
      slotMinutes: opts.slotMinutes ?? 60,
      instructions,
    });
    this.logger.debug('Schedule prompt built', { user: userId, tasks: tasks.length, chars: prompt.length });

    const reply = await this.opts.text.generateText(prompt, { signal: opts.signal });
    return parseScheduleReply(reply);
  }
}
