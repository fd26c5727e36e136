import { afterEach, describe, expect, it } from 'vitest';
import { OutlookTasksProvider } from '../src/providers/outlookTasks.js';
import type { AccountIdentity } from '../src/model.js';
import type { DatabaseHandle } from '../src/store/db.js';
import { jsonResponse, oauthAccount, type RecordedCall } from './helpers.js';

const me: AccountIdentity = { userId: 'u1', provider: 'outlook', accountEmail: 'me@corp.example.com' };

const GRAPH = 'https://graph.microsoft.com/v1.0';

function graphApi(call: RecordedCall): Response | undefined {
  if (call.method === 'POST' && call.url === `${GRAPH}/me/todo/lists/A/tasks`) {
    return jsonResponse({ id: '9', title: 'Book flights', status: 'notStarted', importance: 'high' }, 201);
  }
  if (call.method === 'PATCH') return jsonResponse({ id: '1', status: 'completed' });
  switch (call.url) {
    case `${GRAPH}/me/todo/lists`:
      return jsonResponse({
        value: [
          { id: 'S', displayName: 'Shopping' },
          { id: 'A', displayName: 'Tasks', wellknownListName: 'defaultList' },
        ],
      });
    case `${GRAPH}/me/todo/lists/S/tasks?$top=100`:
      return jsonResponse({ value: [] });
    case `${GRAPH}/me/todo/lists/A/tasks?$top=100`:
      return jsonResponse({
        value: [
          {
            id: '1',
            title: 'Draft memo',
            status: 'inProgress',
            importance: 'high',
            body: { content: '', contentType: 'text' },
            dueDateTime: { dateTime: '2026-03-05T00:00:00.0000000', timeZone: 'UTC' },
          },
        ],
        '@odata.nextLink': `${GRAPH}/me/todo/lists/A/tasks?$skip=1`,
      });
    case `${GRAPH}/me/todo/lists/A/tasks?$skip=1`:
      return jsonResponse({
        value: [
          { id: '2', title: 'File expenses', status: 'completed', importance: 'low' },
          { id: '3', title: 'AI Instructions', status: 'notStarted', body: { content: 'Focus after lunch' } },
        ],
      });
    default:
      return undefined;
  }
}

let handle: DatabaseHandle | undefined;
afterEach(() => handle?.close());

async function setup() {
  const account = await oauthAccount('o365', me, graphApi);
  handle = account.handle;
  return { ...account, provider: new OutlookTasksProvider({ session: account.session, fetcher: account.fetcher }) };
}

describe('OutlookTasksProvider', () => {
  it('follows nextLink pages and maps importance', async () => {
    const { provider, calls } = await setup();

    const tasks = await provider.fetchItems(me);

    expect(tasks).toEqual([
      {
        id: 'A:1',
        title: 'Draft memo',
        status: 'active',
        dueDate: '2026-03-05T00:00:00.000Z',
        priority: 3,
        projectId: 'A',
        projectName: 'Tasks',
      },
      { id: 'A:2', title: 'File expenses', status: 'completed', priority: 1, projectId: 'A', projectName: 'Tasks' },
    ]);
    expect(calls).toHaveLength(4);
  });

  it('reads the AI instructions task', async () => {
    const { provider } = await setup();
    expect(await provider.getAiInstructions(me)).toBe('Focus after lunch');
  });

  it('creates tasks in the default list', async () => {
    const { provider, calls } = await setup();

    const created = await provider.createItem(me, { title: 'Book flights', priority: 4, dueDate: '2026-03-06' });

    expect(created).toEqual({
      id: 'A:9',
      title: 'Book flights',
      status: 'active',
      priority: 3,
      projectId: 'A',
      projectName: 'Tasks',
    });
    const post = calls.find((c) => c.method === 'POST');
    expect(post?.body).toBe(
      '{"title":"Book flights","importance":"high","status":"notStarted","dueDateTime":{"dateTime":"2026-03-06","timeZone":"UTC"}}',
    );
  });

  it('marks a task completed through its status', async () => {
    const { provider, calls } = await setup();
    await provider.updateTaskStatus(me, 'A:1', 'completed');
    expect(calls[0]?.method).toBe('PATCH');
    expect(calls[0]?.url).toBe(`${GRAPH}/me/todo/lists/A/tasks/1`);
    expect(calls[0]?.body).toBe('{"status":"completed"}');
  });
});
