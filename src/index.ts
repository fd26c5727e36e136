export * from './model.js';
export * from './errors.js';
export { requestJson, HttpError, type FetchLike, type JsonRequestOptions } from './http.js';
export { createLogger, type Logger, type LogLevel } from './log.js';
export { resolveSettings, readEnv, loadEnvFiles, doctorReport, type AppSettings, type OAuthClientSettings } from './config.js';

export { openDatabase, migrate, type Db, type DatabaseHandle } from './store/db.js';
export * from './store/credentialStore.js';
export { TaskStore, type TaskContent, type TaskKey } from './store/taskStore.js';
export { JsonTaskFileStore, type TaskFile, type StoredTask } from './store/jsonStore.js';
export { acquireLock, KeyedMutex, LockHeldError, type LockHandle } from './store/lock.js';

export * from './providers/provider.js';
export * from './providers/oauth.js';
export { ProviderRegistry, buildProviders, type BuildProvidersOptions } from './providers/registry.js';
export { GoogleCalendarProvider } from './providers/googleCalendar.js';
export { O365CalendarProvider } from './providers/o365Calendar.js';
export { GoogleTasksProvider } from './providers/googleTasks.js';
export { OutlookTasksProvider } from './providers/outlookTasks.js';
export { TodoistProvider } from './providers/todoist.js';
export { SqliteTaskProvider } from './providers/sqliteTasks.js';
export { FileTaskProvider } from './providers/fileTasks.js';
export { MockTaskProvider, MockCalendarProvider } from './providers/mock.js';

export { contentHash } from './sync/hash.js';
export { ReconciliationEngine, normalizeDueDate, type ReconcileResult, type SkippedItem } from './sync/reconcile.js';
export * from './sync/orchestrator.js';
export * from './calendar/normalize.js';
export { CalendarAggregator, type AccountMeetings } from './calendar/aggregator.js';
export { TokenRefreshScheduler, type RefreshPassResult, type TokenRefreshOptions } from './scheduler/tokenRefresh.js';
export * from './ai/textGenerator.js';
export * from './ai/schedule.js';
export { TaskHierarchy, type FlattenedTask, type HierarchyTask } from './tasks/hierarchy.js';
export { createApp, type App, type CreateAppOptions } from './app.js';
