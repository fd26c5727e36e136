import type { AppSettings } from './config.js';
import type { FetchLike } from './http.js';
import { openDatabase, type DatabaseHandle } from './store/db.js';
import { SqliteCredentialStore } from './store/credentialStore.js';
import { TaskStore } from './store/taskStore.js';
import { buildProviders, type ProviderRegistry } from './providers/registry.js';
import { ReconciliationEngine } from './sync/reconcile.js';
import { SyncOrchestrator } from './sync/orchestrator.js';
import { CalendarAggregator } from './calendar/aggregator.js';
import { TokenRefreshScheduler } from './scheduler/tokenRefresh.js';
import { TextGenerator, generatorsFromSettings, type NamedGenerator } from './ai/textGenerator.js';
import { ScheduleGenerator } from './ai/schedule.js';
import { createLogger, type Logger } from './log.js';

export interface App {
  settings: AppSettings;
  logger: Logger;
  database: DatabaseHandle;
  credentials: SqliteCredentialStore;
  tasks: TaskStore;
  providers: ProviderRegistry;
  engine: ReconciliationEngine;
  sync: SyncOrchestrator;
  calendar: CalendarAggregator;
  scheduler: TokenRefreshScheduler;
  text: TextGenerator;
  schedule: ScheduleGenerator;
  close(): void;
}

export interface CreateAppOptions {
  logger?: Logger;
  fetcher?: FetchLike;
  now?: () => Date;
  /** Replaces the generators built from `settings.ai`. */
  generators?: NamedGenerator[];
  /** Replaces the providers built from `settings`. */
  providers?: ProviderRegistry;
}

/** Open the database and wire every component from `settings`. */
export function createApp(settings: AppSettings, opts: CreateAppOptions = {}): App {
  const logger = opts.logger ?? createLogger(settings.logLevel);
  const { now, fetcher } = opts;

  const database = openDatabase(settings.dbPath);
  const credentials = new SqliteCredentialStore(database.db, { now });
  const tasks = new TaskStore(database.db, { now });
  const providers = opts.providers ?? buildProviders({ settings, db: database.db, store: credentials, fetcher, logger, now });
  const engine = new ReconciliationEngine(tasks, { logger });
  const text = new TextGenerator(opts.generators ?? generatorsFromSettings(settings.ai), { logger });

  return {
    settings,
    logger,
    database,
    credentials,
    tasks,
    providers,
    engine,
    sync: new SyncOrchestrator({ credentials, tasks, engine, providers, timeoutMs: settings.providerTimeoutMs, logger, now }),
    calendar: new CalendarAggregator({ providers, credentials, timeoutMs: settings.providerTimeoutMs, logger }),
    scheduler: new TokenRefreshScheduler({
      store: credentials,
      providers,
      intervalMs: settings.refreshIntervalMs,
      thresholdMs: settings.refreshThresholdMs,
      timeoutMs: settings.providerTimeoutMs,
      logger,
      now,
    }),
    text,
    schedule: new ScheduleGenerator({ text, tasks, credentials, providers, logger }),
    close: () => database.close(),
  };
}
