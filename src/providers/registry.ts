import type { AccountIdentity, CalendarProviderName, ProviderName, TaskProviderName } from '../model.js';
import { VENDOR_TASK_PROVIDER, isCalendarProvider, isTaskProvider } from '../model.js';
import type { CalendarProvider, TaskProvider } from './provider.js';
import { NotFoundError } from '../errors.js';
import type { AppSettings } from '../config.js';
import type { FetchLike } from '../http.js';
import type { Db } from '../store/db.js';
import type { CredentialStore } from '../store/credentialStore.js';
import { JsonTaskFileStore } from '../store/jsonStore.js';
import { KeyedMutex } from '../store/lock.js';
import { OAuthClient, OAuthSession, googleOAuthConfig, o365OAuthConfig } from './oauth.js';
import { GoogleCalendarProvider } from './googleCalendar.js';
import { O365CalendarProvider } from './o365Calendar.js';
import { GoogleTasksProvider } from './googleTasks.js';
import { OutlookTasksProvider } from './outlookTasks.js';
import { TodoistProvider } from './todoist.js';
import { SqliteTaskProvider } from './sqliteTasks.js';
import { FileTaskProvider } from './fileTasks.js';
import { createLogger, type Logger } from '../log.js';

/** Providers by name, plus the OAuth sessions behind the calendar ones. */
export class ProviderRegistry {
  private tasks = new Map<TaskProviderName, TaskProvider>();
  private calendars = new Map<CalendarProviderName, CalendarProvider>();
  private sessions = new Map<CalendarProviderName, OAuthSession>();

  constructor(init: { tasks?: TaskProvider[]; calendars?: CalendarProvider[] } = {}) {
    for (const p of init.tasks ?? []) this.tasks.set(p.name, p);
    for (const p of init.calendars ?? []) this.calendars.set(p.name, p);
  }

  addTaskProvider(p: TaskProvider): this {
    this.tasks.set(p.name, p);
    return this;
  }

  addCalendarProvider(p: CalendarProvider): this {
    this.calendars.set(p.name, p);
    return this;
  }

  addSession(session: OAuthSession): this {
    this.sessions.set(session.credentialProvider, session);
    return this;
  }

  taskProvider(name: ProviderName): TaskProvider {
    const p = isTaskProvider(name) ? this.tasks.get(name) : undefined;
    if (!p) throw new NotFoundError(`No task provider registered for "${name}"`);
    return p;
  }

  calendarProvider(name: ProviderName): CalendarProvider {
    const p = isCalendarProvider(name) ? this.calendars.get(name) : undefined;
    if (!p) throw new NotFoundError(`No calendar provider registered for "${name}"`);
    return p;
  }

  hasTaskProvider(name: ProviderName): boolean {
    return isTaskProvider(name) && this.tasks.has(name);
  }

  hasCalendarProvider(name: ProviderName): boolean {
    return isCalendarProvider(name) && this.calendars.has(name);
  }

  /**
   * Task account behind a stored account, if its provider is registered. A
   * Google or Office 365 account stands for its vendor's task account.
   */
  taskAccountOf(account: AccountIdentity): AccountIdentity | undefined {
    const provider = isCalendarProvider(account.provider) ? VENDOR_TASK_PROVIDER[account.provider] : account.provider;
    if (!this.hasTaskProvider(provider)) return undefined;
    return { userId: account.userId, provider, accountEmail: account.accountEmail };
  }

  /** OAuth session of a calendar vendor (also used by its task provider). */
  session(name: CalendarProviderName): OAuthSession {
    const s = this.sessions.get(name);
    if (!s) throw new NotFoundError(`${name} OAuth client is not configured`);
    return s;
  }

  get taskProviderNames(): TaskProviderName[] {
    return [...this.tasks.keys()];
  }

  get calendarProviderNames(): CalendarProviderName[] {
    return [...this.calendars.keys()];
  }
}

export interface BuildProvidersOptions {
  settings: AppSettings;
  db: Db;
  store: CredentialStore;
  fetcher?: FetchLike;
  logger?: Logger;
  now?: () => Date;
}

/**
 * Wire every provider the settings allow. Google and Office 365 providers
 * are only registered when their OAuth client is configured; the sessions
 * share one lock map so no account is refreshed twice at once.
 */
export function buildProviders(opts: BuildProvidersOptions): ProviderRegistry {
  const { settings, db, store, fetcher, now } = opts;
  const logger = opts.logger ?? createLogger('silent');
  const locks = new KeyedMutex();
  const registry = new ProviderRegistry();

  if (settings.google) {
    const client = new OAuthClient(googleOAuthConfig(settings.google), { fetcher, now });
    const session = new OAuthSession({ client, store, logger: logger.child('oauth:google'), now, locks });
    registry
      .addSession(session)
      .addCalendarProvider(new GoogleCalendarProvider({ session, fetcher, logger, now }))
      .addTaskProvider(new GoogleTasksProvider({ session, fetcher, logger }));
  }

  if (settings.o365) {
    const client = new OAuthClient(o365OAuthConfig(settings.o365), { fetcher, now });
    const session = new OAuthSession({ client, store, logger: logger.child('oauth:o365'), now, locks });
    registry
      .addSession(session)
      .addCalendarProvider(new O365CalendarProvider({ session, fetcher, logger, now }))
      .addTaskProvider(new OutlookTasksProvider({ session, fetcher, logger }));
  }

  registry
    .addTaskProvider(new TodoistProvider({ store, setupUrl: settings.todoistSetupUrl, fetcher, logger }))
    .addTaskProvider(new SqliteTaskProvider(db, { now }))
    .addTaskProvider(new FileTaskProvider(new JsonTaskFileStore(settings.fileTasksDir), { logger, now }));

  return registry;
}
