import { readFileSync, existsSync } from 'node:fs';
import path from 'node:path';
import { z } from 'zod';

const str = z.string().min(1);

/** Comma or whitespace separated list. */
const list = z
  .string()
  .transform((v) => v.split(/[\s,]+/).map((s) => s.trim()).filter(Boolean));

export const AiProviderSchema = z.enum(['openai', 'grok']);
export type AiProviderName = z.infer<typeof AiProviderSchema>;

export const EnvSchema = z.object({
  // behavior
  DAYPLAN_LOG_LEVEL: z.enum(['silent', 'error', 'warn', 'info', 'debug']).optional(),
  DAYPLAN_DB_PATH: str.optional(),
  DAYPLAN_HTTP_RPS: z.coerce.number().positive().optional(),
  DAYPLAN_REFRESH_INTERVAL_MINUTES: z.coerce.number().positive().optional(),
  DAYPLAN_REFRESH_THRESHOLD_MINUTES: z.coerce.number().positive().optional(),
  DAYPLAN_PROVIDER_TIMEOUT_SECONDS: z.coerce.number().int().positive().optional(),
  DAYPLAN_FILE_TASKS_DIR: str.optional(),

  // Google (Calendar + Tasks)
  DAYPLAN_GOOGLE_CLIENT_ID: str.optional(),
  DAYPLAN_GOOGLE_CLIENT_SECRET: str.optional(),
  DAYPLAN_GOOGLE_REDIRECT_URI: str.url().optional(),
  DAYPLAN_GOOGLE_SCOPES: list.optional(),

  // Office 365 (Calendar + To Do)
  DAYPLAN_O365_CLIENT_ID: str.optional(),
  DAYPLAN_O365_CLIENT_SECRET: str.optional(),
  DAYPLAN_O365_TENANT_ID: str.optional(),
  DAYPLAN_O365_REDIRECT_URI: str.url().optional(),
  DAYPLAN_O365_SCOPES: list.optional(),

  // Todoist setup page shown when no API key is stored
  DAYPLAN_TODOIST_SETUP_URL: str.optional(),

  // AI
  DAYPLAN_AI_PROVIDERS: list.pipe(z.array(AiProviderSchema)).optional(),
  DAYPLAN_OPENAI_API_KEY: str.optional(),
  DAYPLAN_OPENAI_MODEL: str.optional(),
  DAYPLAN_XAI_API_KEY: str.optional(),
  DAYPLAN_XAI_MODEL: str.optional(),
});

export type EnvConfig = z.infer<typeof EnvSchema>;

export const DEFAULT_GOOGLE_SCOPES = [
  'openid',
  'email',
  'https://www.googleapis.com/auth/calendar',
  'https://www.googleapis.com/auth/tasks',
];

export const DEFAULT_O365_SCOPES = [
  'offline_access',
  'https://graph.microsoft.com/Calendars.ReadWrite',
  'https://graph.microsoft.com/Tasks.ReadWrite',
  'https://graph.microsoft.com/User.Read',
];

/**
 * Minimal .env loader.
 *
 * - Reads KEY=VALUE lines
 * - Ignores comments and empty lines
 * - Does not override existing process.env keys
 */
export function loadEnvFiles(
  filenames: string[] = ['.env', '.env.local'],
  cwd: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env,
): { loaded: string[] } {
  const loaded: string[] = [];

  for (const name of filenames) {
    const filePath = path.join(cwd, name);
    if (!existsSync(filePath)) continue;

    const raw = readFileSync(filePath, 'utf8');
    for (const line of raw.split(/\r?\n/)) {
      const trimmed = line.trim();
      if (!trimmed || trimmed.startsWith('#')) continue;

      const eq = trimmed.indexOf('=');
      if (eq === -1) continue;
      const key = trimmed.slice(0, eq).trim();
      let value = trimmed.slice(eq + 1).trim();

      if (
        (value.startsWith('"') && value.endsWith('"')) ||
        (value.startsWith("'") && value.endsWith("'"))
      ) {
        value = value.slice(1, -1);
      }

      if (!key || !value) continue;
      if (env[key] === undefined) env[key] = value;
    }

    loaded.push(name);
  }

  return { loaded };
}

export function readEnv(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  // Empty assignments in .env files mean "unset".
  const cleaned = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v !== ''));
  return EnvSchema.parse(cleaned);
}

export interface AppSettings {
  dbPath: string;
  logLevel: NonNullable<EnvConfig['DAYPLAN_LOG_LEVEL']>;
  refreshIntervalMs: number;
  refreshThresholdMs: number;
  providerTimeoutMs: number;
  fileTasksDir: string;
  google?: OAuthClientSettings;
  o365?: OAuthClientSettings & { tenantId: string };
  todoistSetupUrl: string;
  ai: {
    order: AiProviderName[];
    openai?: { apiKey: string; model: string };
    grok?: { apiKey: string; model: string };
  };
}

export interface OAuthClientSettings {
  clientId: string;
  clientSecret: string;
  redirectUri: string;
  scopes: string[];
}

const MINUTE = 60_000;

export function resolveSettings(env: EnvConfig = readEnv(), cwd: string = process.cwd()): AppSettings {
  const stateDir = path.join(cwd, '.dayplan');
  return {
    dbPath: env.DAYPLAN_DB_PATH ? path.resolve(cwd, env.DAYPLAN_DB_PATH) : path.join(stateDir, 'dayplan.db'),
    logLevel: env.DAYPLAN_LOG_LEVEL ?? 'info',
    refreshIntervalMs: (env.DAYPLAN_REFRESH_INTERVAL_MINUTES ?? 30) * MINUTE,
    refreshThresholdMs: (env.DAYPLAN_REFRESH_THRESHOLD_MINUTES ?? 45) * MINUTE,
    providerTimeoutMs: (env.DAYPLAN_PROVIDER_TIMEOUT_SECONDS ?? 60) * 1000,
    fileTasksDir: env.DAYPLAN_FILE_TASKS_DIR ? path.resolve(cwd, env.DAYPLAN_FILE_TASKS_DIR) : path.join(stateDir, 'tasks'),
    google:
      env.DAYPLAN_GOOGLE_CLIENT_ID && env.DAYPLAN_GOOGLE_CLIENT_SECRET && env.DAYPLAN_GOOGLE_REDIRECT_URI
        ? {
            clientId: env.DAYPLAN_GOOGLE_CLIENT_ID,
            clientSecret: env.DAYPLAN_GOOGLE_CLIENT_SECRET,
            redirectUri: env.DAYPLAN_GOOGLE_REDIRECT_URI,
            scopes: env.DAYPLAN_GOOGLE_SCOPES ?? DEFAULT_GOOGLE_SCOPES,
          }
        : undefined,
    o365:
      env.DAYPLAN_O365_CLIENT_ID && env.DAYPLAN_O365_CLIENT_SECRET && env.DAYPLAN_O365_REDIRECT_URI
        ? {
            clientId: env.DAYPLAN_O365_CLIENT_ID,
            clientSecret: env.DAYPLAN_O365_CLIENT_SECRET,
            redirectUri: env.DAYPLAN_O365_REDIRECT_URI,
            tenantId: env.DAYPLAN_O365_TENANT_ID ?? 'common',
            scopes: env.DAYPLAN_O365_SCOPES ?? DEFAULT_O365_SCOPES,
          }
        : undefined,
    todoistSetupUrl: env.DAYPLAN_TODOIST_SETUP_URL ?? 'https://app.todoist.com/app/settings/integrations/developer',
    ai: {
      order: env.DAYPLAN_AI_PROVIDERS ?? ['openai', 'grok'],
      openai: env.DAYPLAN_OPENAI_API_KEY
        ? { apiKey: env.DAYPLAN_OPENAI_API_KEY, model: env.DAYPLAN_OPENAI_MODEL ?? 'gpt-4o-mini' }
        : undefined,
      grok: env.DAYPLAN_XAI_API_KEY
        ? { apiKey: env.DAYPLAN_XAI_API_KEY, model: env.DAYPLAN_XAI_MODEL ?? 'grok-3-mini' }
        : undefined,
    },
  };
}

export function doctorReport(env: EnvConfig = readEnv()) {
  const missing: string[] = [];
  const notes: string[] = [];

  const google = [env.DAYPLAN_GOOGLE_CLIENT_ID, env.DAYPLAN_GOOGLE_CLIENT_SECRET, env.DAYPLAN_GOOGLE_REDIRECT_URI];
  if (google.some(Boolean) && !google.every(Boolean)) {
    if (!env.DAYPLAN_GOOGLE_CLIENT_ID) missing.push('DAYPLAN_GOOGLE_CLIENT_ID');
    if (!env.DAYPLAN_GOOGLE_CLIENT_SECRET) missing.push('DAYPLAN_GOOGLE_CLIENT_SECRET');
    if (!env.DAYPLAN_GOOGLE_REDIRECT_URI) missing.push('DAYPLAN_GOOGLE_REDIRECT_URI');
  } else if (!google.some(Boolean)) {
    notes.push('Google: not configured; google and google_tasks accounts cannot authenticate.');
  }

  const o365 = [env.DAYPLAN_O365_CLIENT_ID, env.DAYPLAN_O365_CLIENT_SECRET, env.DAYPLAN_O365_REDIRECT_URI];
  if (o365.some(Boolean) && !o365.every(Boolean)) {
    if (!env.DAYPLAN_O365_CLIENT_ID) missing.push('DAYPLAN_O365_CLIENT_ID');
    if (!env.DAYPLAN_O365_CLIENT_SECRET) missing.push('DAYPLAN_O365_CLIENT_SECRET');
    if (!env.DAYPLAN_O365_REDIRECT_URI) missing.push('DAYPLAN_O365_REDIRECT_URI');
  } else if (!o365.some(Boolean)) {
    notes.push('Office 365: not configured; o365 and outlook accounts cannot authenticate.');
  } else if (!env.DAYPLAN_O365_TENANT_ID) {
    notes.push('Office 365: DAYPLAN_O365_TENANT_ID optional (defaults to common).');
  }

  const order = env.DAYPLAN_AI_PROVIDERS ?? ['openai', 'grok'];
  const aiKeys: Record<AiProviderName, string | undefined> = {
    openai: env.DAYPLAN_OPENAI_API_KEY,
    grok: env.DAYPLAN_XAI_API_KEY,
  };
  const usable = order.filter((p) => aiKeys[p]);
  if (!usable.length) {
    missing.push(order.includes('openai') ? 'DAYPLAN_OPENAI_API_KEY' : 'DAYPLAN_XAI_API_KEY');
    notes.push('AI: schedule generation needs at least one provider key.');
  }

  return {
    aiProviders: usable,
    missing: [...new Set(missing)],
    notes: [...new Set(notes)],
  };
}
