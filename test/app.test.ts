import { describe, expect, it } from 'vitest';
import { createApp } from '../src/app.js';
import { readEnv, resolveSettings } from '../src/config.js';
import { NotFoundError } from '../src/errors.js';

function settings(env: NodeJS.ProcessEnv) {
  return { ...resolveSettings(readEnv(env), '/srv/app'), dbPath: ':memory:' };
}

describe('createApp', () => {
  it('registers only local and key providers without OAuth clients', () => {
    const app = createApp(settings({ DAYPLAN_LOG_LEVEL: 'silent' }), { generators: [] });
    try {
      expect(app.providers.taskProviderNames).toEqual(['todoist', 'sqlite', 'file']);
      expect(app.providers.calendarProviderNames).toEqual([]);
      expect(() => app.providers.session('google')).toThrow('google OAuth client is not configured');
      expect(() => app.providers.calendarProvider('o365')).toThrow(NotFoundError);
      expect(() => app.providers.taskProvider('google')).toThrow('No task provider registered for "google"');
      expect(app.text.providers).toEqual([]);
    } finally {
      app.close();
    }
  });

  it('wires vendor providers and AI generators from settings', () => {
    const app = createApp(
      settings({
        DAYPLAN_LOG_LEVEL: 'silent',
        DAYPLAN_GOOGLE_CLIENT_ID: 'client-id',
        DAYPLAN_GOOGLE_CLIENT_SECRET: 'test-secret',
        DAYPLAN_GOOGLE_REDIRECT_URI: 'http://localhost:8787/oauth/google',
        DAYPLAN_O365_CLIENT_ID: 'client-id',
        DAYPLAN_O365_CLIENT_SECRET: 'test-secret',
        DAYPLAN_O365_REDIRECT_URI: 'http://localhost:8787/oauth/o365',
        DAYPLAN_AI_PROVIDERS: 'grok,openai',
        DAYPLAN_OPENAI_API_KEY: 'test-key',
        DAYPLAN_XAI_API_KEY: 'test-key',
      }),
    );
    try {
      expect(app.providers.taskProviderNames).toEqual(['google_tasks', 'outlook', 'todoist', 'sqlite', 'file']);
      expect(app.providers.calendarProviderNames).toEqual(['google', 'o365']);
      expect(app.providers.session('o365').credentialProvider).toBe('o365');
      expect(app.text.providers).toEqual(['grok', 'openai']);
    } finally {
      app.close();
    }
  });
});
