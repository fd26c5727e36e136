import { afterEach, describe, expect, it } from 'vitest';
import { ScheduleGenerator, buildSchedulePrompt, parseScheduleReply, promptTasks } from '../src/ai/schedule.js';
import { TextGenerator } from '../src/ai/textGenerator.js';
import { TaskStore } from '../src/store/taskStore.js';
import { SqliteCredentialStore } from '../src/store/credentialStore.js';
import { ProviderRegistry } from '../src/providers/registry.js';
import { MockTaskProvider } from '../src/providers/mock.js';
import { DataError } from '../src/errors.js';
import type { AccountIdentity } from '../src/model.js';
import type { DatabaseHandle } from '../src/store/db.js';
import { memoryDb, tickingClock } from './helpers.js';

describe('buildSchedulePrompt', () => {
  const tasks = [{ id: 't1', title: 'Write report', project: 'Work', priority: 3, due_date: '2026-03-02' }];

  it('opens with the long date and asks for the slot length', () => {
    const parts = buildSchedulePrompt(tasks, { date: '2026-03-02', slotMinutes: 30 }).split('\n\n');
    expect(parts[0]).toBe('I need to create a daily schedule for Monday, March 02, 2026 (2026-03-02).');
    expect(parts[1]).toBe(`Here are my prioritized tasks, most important first:\n${JSON.stringify(tasks, null, 2)}`);
    expect(parts[2]).toBe('Please create time slots with a duration of 30 minutes each.');
  });

  it('adds the preferences when there are any', () => {
    const parts = buildSchedulePrompt(tasks, {
      date: '2026-03-02',
      slotMinutes: 60,
      instructions: '  No calls before 10  ',
    }).split('\n\n');
    expect(parts[2]).toBe('Please consider these scheduling preferences:\nNo calls before 10');
    expect(parts[3]).toBe('Please create time slots with a duration of 60 minutes each.');
  });
});

describe('parseScheduleReply', () => {
  it('reads JSON inside a code fence', () => {
    const reply = [
      'Here is your plan:',
      '```json',
      '{"date":"2026-03-02","schedule":[{"time":"09:00 AM - 10:00 AM","activity":"Write report","task_id":"t1","notes":null}]}',
      '```',
    ].join('\n');
    expect(parseScheduleReply(reply)).toEqual({
      date: '2026-03-02',
      entries: [{ time: '09:00 AM - 10:00 AM', activity: 'Write report', taskId: 't1' }],
    });
  });

  it('reads a bare object surrounded by chatter', () => {
    const reply =
      'Sure! {"date":"2026-03-02","schedule":[{"time":"12:00 PM - 01:00 PM","activity":"Lunch","task_id":null,"notes":"Step outside"}]} Enjoy.';
    expect(parseScheduleReply(reply).entries).toEqual([
      { time: '12:00 PM - 01:00 PM', activity: 'Lunch', notes: 'Step outside' },
    ]);
  });

  it('rejects replies without JSON', () => {
    expect(() => parseScheduleReply('I cannot help with that')).toThrow(new DataError('AI reply is not valid JSON'));
  });

  it('rejects JSON of the wrong shape', () => {
    expect(() => parseScheduleReply('{"date":"March 2","schedule":[]}')).toThrow(
      'AI reply has the wrong shape: date Invalid',
    );
  });
});

describe('ScheduleGenerator', () => {
  let handle: DatabaseHandle | undefined;
  afterEach(() => handle?.close());

  const local: AccountIdentity = { userId: 'u1', provider: 'sqlite', accountEmail: 'u1@example.com' };
  const todoist: AccountIdentity = { userId: 'u1', provider: 'todoist', accountEmail: 'u1@example.com' };
  const files: AccountIdentity = { userId: 'u1', provider: 'file', accountEmail: 'u1@example.com' };

  it('plans the prioritized list with every account instructions, primary first', async () => {
    handle = memoryDb();
    const now = tickingClock('2026-03-01T09:00:00.000Z');
    const credentials = new SqliteCredentialStore(handle.db, { now });
    const tasks = new TaskStore(handle.db, { now });
    await credentials.put(local, {});
    await credentials.put(todoist, { apiKey: 'test-key' });
    await credentials.put(files, {});
    await credentials.setPrimary(todoist);

    const sqliteMock = new MockTaskProvider({ name: 'sqlite' });
    sqliteMock.seed(local, [{ id: 'ai', title: 'AI Instructions', description: 'Gym at 7am', status: 'active', priority: 2 }]);
    const todoistMock = new MockTaskProvider({ name: 'todoist' });
    todoistMock.seed(todoist, [
      { id: 'ai', title: 'AI Instructions', description: 'Deep work mornings', status: 'active', priority: 2 },
    ]);
    const fileMock = new MockTaskProvider({ name: 'file', failWith: () => new Error('disk gone') });
    const providers = new ProviderRegistry({ tasks: [sqliteMock, todoistMock, fileMock] });

    const report = tasks.insert({ ...todoist, providerTaskId: 'r1' }, { title: 'Write report', status: 'active', priority: 4 }, 'h1');
    tasks.insert({ ...todoist, providerTaskId: 'r2' }, { title: 'Someday', status: 'active', priority: 1 }, 'h2');
    tasks.move(report.id, 'prioritized');

    const prompts: string[] = [];
    const text = new TextGenerator([
      {
        name: 'openai',
        generate: async (prompt) => {
          prompts.push(prompt);
          return `{"date":"2026-03-02","schedule":[{"time":"09:00 AM - 10:00 AM","activity":"Write report","task_id":"${report.id}"}]}`;
        },
      },
    ]);
    const schedule = new ScheduleGenerator({ text, tasks, credentials, providers });

    expect(await schedule.instructionsFor('u1')).toBe('Deep work mornings\n\nGym at 7am');

    const plan = await schedule.generate('u1', { date: '2026-03-02', slotMinutes: 120 });

    expect(plan).toEqual({
      date: '2026-03-02',
      entries: [{ time: '09:00 AM - 10:00 AM', activity: 'Write report', taskId: report.id }],
    });
    const prompt = prompts[0] ?? '';
    expect(prompt).toContain('Please consider these scheduling preferences:\nDeep work mornings\n\nGym at 7am');
    expect(prompt).toContain('"title": "Write report"');
    expect(prompt).not.toContain('Someday');
    expect(prompt).toContain('Please create time slots with a duration of 120 minutes each.');
  });

  it('reads the instructions of a Google account from Google Tasks', async () => {
    handle = memoryDb();
    const credentials = new SqliteCredentialStore(handle.db);
    const tasks = new TaskStore(handle.db);
    await credentials.put({ userId: 'u1', provider: 'google', accountEmail: 'me@example.com' }, {});

    const googleTasks = new MockTaskProvider({ name: 'google_tasks' });
    googleTasks.seed({ userId: 'u1', provider: 'google_tasks', accountEmail: 'me@example.com' }, [
      { id: 'ai', title: 'AI Instructions', description: 'Lunch at noon', status: 'active', priority: 2 },
    ]);
    const providers = new ProviderRegistry({ tasks: [googleTasks] });
    const schedule = new ScheduleGenerator({ text: new TextGenerator([]), tasks, credentials, providers });

    expect(await schedule.instructionsFor('u1')).toBe('Lunch at noon');
  });

  it('maps records onto the prompt shape', () => {
    expect(
      promptTasks([
        {
          id: 'rec-1',
          userId: 'u1',
          provider: 'todoist',
          accountEmail: 'u1@example.com',
          providerTaskId: 'r1',
          title: 'Write report',
          status: 'active',
          priority: 4,
          listType: 'prioritized',
          position: 0,
          contentHash: 'h1',
          lastSynced: '2026-03-01T09:00:00.000Z',
          createdAt: '2026-03-01T09:00:00.000Z',
          updatedAt: '2026-03-01T09:00:00.000Z',
        },
      ]),
    ).toEqual([{ id: 'rec-1', title: 'Write report', project: 'No Project', priority: 4, due_date: null }]);
  });
});
