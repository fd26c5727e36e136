#!/usr/bin/env node
import path from 'node:path';
import { Command } from 'commander';
import { doctorReport, loadEnvFiles, readEnv, resolveSettings } from './config.js';
import { createApp, type App } from './app.js';
import { createLogger } from './log.js';
import type { AccountIdentity, ListType, TaskStatus } from './model.js';
import { isCalendarProvider, isTaskProvider, type ProviderName } from './model.js';
import { credentialKind } from './store/credentialStore.js';
import { acquireLock, LockHeldError, type LockHandle } from './store/lock.js';
import { decodeState } from './providers/oauth.js';
import { TaskHierarchy } from './tasks/hierarchy.js';
import { SLOT_MINUTES, type SlotMinutes } from './ai/schedule.js';
import type { UserSyncReport } from './sync/orchestrator.js';
import { errorMessage } from './errors.js';

loadEnvFiles();

const program = new Command();

program
  .name('dayplan')
  .description('Calendars and task lists from several providers, planned into a day')
  .version('0.1.0');

async function withApp(fn: (app: App) => Promise<void>): Promise<void> {
  const app = createApp(resolveSettings(readEnv()));
  try {
    await fn(app);
  } finally {
    app.close();
  }
}

function providerName(raw: string): ProviderName {
  if (isCalendarProvider(raw) || isTaskProvider(raw)) return raw;
  throw new Error(`Unknown provider "${raw}"`);
}

function listType(raw: string): ListType {
  if (raw === 'prioritized' || raw === 'unprioritized') return raw;
  throw new Error(`List must be prioritized or unprioritized, got "${raw}"`);
}

function taskStatus(raw: string): TaskStatus {
  if (raw === 'active' || raw === 'completed') return raw;
  throw new Error(`Status must be active or completed, got "${raw}"`);
}

function slotMinutes(raw: string): SlotMinutes {
  const n = Number(raw);
  const slot = SLOT_MINUTES.find((s) => s === n);
  if (slot === undefined) throw new Error(`Slot must be one of ${SLOT_MINUTES.join(', ')}`);
  return slot;
}

function today(): string {
  return new Date().toISOString().slice(0, 10);
}

program
  .command('doctor')
  .description('Check environment/config and print what is missing')
  .action(() => {
    const report = doctorReport();
    console.log('dayplan doctor');
    console.log('ai providers:', report.aiProviders.length ? report.aiProviders.join(', ') : '(none)');
    if (report.missing.length) {
      console.log('\nMissing env vars:');
      for (const k of report.missing) console.log(`- ${k}`);
    } else {
      console.log('\nNo missing env vars detected.');
    }

    if (report.notes.length) {
      console.log('\nNotes:');
      for (const n of report.notes) console.log(`- ${n}`);
    }

    if (report.missing.length) process.exitCode = 2;
  });

/* ------------------------------------------------------------------ */
/*  accounts                                                           */
/* ------------------------------------------------------------------ */

const accounts = program.command('accounts').description('Manage provider accounts');

accounts
  .command('list')
  .description('List stored accounts')
  .option('--user <id>', 'Only this user')
  .action((opts: { user?: string }) =>
    withApp(async (app) => {
      const records = opts.user ? await app.credentials.listForUser(opts.user) : await app.credentials.list();
      if (!records.length) {
        console.log('No accounts.');
        return;
      }
      for (const r of records) {
        const flags = [r.isPrimary ? 'primary' : '', r.needsReauth ? 'needs-reauth' : ''].filter(Boolean).join(',');
        console.log(`${r.userId}  ${r.provider}  ${r.accountEmail}  last-sync=${r.lastSync ?? '(never)'}${flags ? `  [${flags}]` : ''}`);
      }
    }),
  );

accounts
  .command('add-key')
  .description('Store an API key account (todoist)')
  .requiredOption('--user <id>', 'App user id')
  .requiredOption('--email <email>', 'Account email at the provider')
  .requiredOption('--key <key>', 'API key')
  .option('--provider <name>', 'Provider', 'todoist')
  .action((opts: { user: string; email: string; key: string; provider: string }) =>
    withApp(async (app) => {
      const provider = providerName(opts.provider);
      if (credentialKind(provider) !== 'api_key') throw new Error(`${provider} does not use an API key`);
      const identity: AccountIdentity = { userId: opts.user, provider, accountEmail: opts.email };
      await app.credentials.put(identity, { apiKey: opts.key, needsReauth: false });
      const auth = await app.providers.taskProvider(provider).authenticate(identity);
      console.log(auth ? `Stored, but the key was rejected: ${auth.reason ?? 'unknown'}` : 'Stored and verified.');
      if (auth) process.exitCode = 2;
    }),
  );

accounts
  .command('add-local')
  .description('Add a local task list account (sqlite or file)')
  .requiredOption('--user <id>', 'App user id')
  .option('--provider <name>', 'sqlite or file', 'sqlite')
  .option('--email <email>', 'Account label (defaults to the user id)')
  .action((opts: { user: string; provider: string; email?: string }) =>
    withApp(async (app) => {
      const provider = providerName(opts.provider);
      if (credentialKind(provider) !== 'none') throw new Error(`${provider} is not a local provider`);
      const identity: AccountIdentity = { userId: opts.user, provider, accountEmail: opts.email ?? opts.user };
      await app.credentials.put(identity, { needsReauth: false });
      const auth = await app.providers.taskProvider(provider).authenticate(identity);
      if (auth) {
        console.log(`Added, but not usable: ${auth.reason ?? auth.redirectTo}`);
        process.exitCode = 2;
        return;
      }
      console.log(`Added ${provider} account ${identity.accountEmail}.`);
    }),
  );

accounts
  .command('connect')
  .description('Print the authorization URL for a Google or Office 365 account')
  .requiredOption('--user <id>', 'App user id')
  .requiredOption('--provider <name>', 'google or o365')
  .option('--email <email>', 'Login hint / account to reauthorize', '')
  .option('--consent', 'Force the consent screen (needed to get a new refresh token)')
  .action((opts: { user: string; provider: string; email: string; consent?: boolean }) =>
    withApp(async (app) => {
      const provider = providerName(opts.provider);
      if (!isCalendarProvider(provider)) throw new Error('connect takes google or o365');
      const url = app.providers
        .session(provider)
        .authorizationUrl({ userId: opts.user, provider, accountEmail: opts.email }, !!opts.consent);
      console.log(url);
    }),
  );

accounts
  .command('authorize')
  .description('Finish authorization with the code from the redirect')
  .requiredOption('--code <code>', 'Authorization code')
  .option('--state <state>', 'State from the redirect (carries user and provider)')
  .option('--user <id>', 'App user id (when no state)')
  .option('--provider <name>', 'google or o365 (when no state)')
  .action((opts: { code: string; state?: string; user?: string; provider?: string }) =>
    withApp(async (app) => {
      const state = opts.state ? decodeState(opts.state) : undefined;
      if (opts.state && !state) throw new Error('State is malformed');
      const userId = state?.userId ?? opts.user;
      const provider = state?.provider ?? (opts.provider ? providerName(opts.provider) : undefined);
      if (!userId || !provider || !isCalendarProvider(provider)) {
        throw new Error('Need --state, or --user with --provider google|o365');
      }
      const record = await app.providers.session(provider).completeAuthorization(userId, opts.code);
      console.log(`Authorized ${record.provider} account ${record.accountEmail}${record.isPrimary ? ' (primary)' : ''}.`);
    }),
  );

accounts
  .command('remove')
  .description('Remove an account and its credentials')
  .requiredOption('--user <id>', 'App user id')
  .requiredOption('--provider <name>', 'Provider')
  .requiredOption('--email <email>', 'Account email')
  .action((opts: { user: string; provider: string; email: string }) =>
    withApp(async (app) => {
      const removed = await app.credentials.remove({ userId: opts.user, provider: providerName(opts.provider), accountEmail: opts.email });
      console.log(removed ? 'Removed.' : 'No such account.');
      if (!removed) process.exitCode = 1;
    }),
  );

accounts
  .command('primary')
  .description('Make an account the primary one of its user')
  .requiredOption('--user <id>', 'App user id')
  .requiredOption('--provider <name>', 'Provider')
  .requiredOption('--email <email>', 'Account email')
  .action((opts: { user: string; provider: string; email: string }) =>
    withApp(async (app) => {
      await app.credentials.setPrimary({ userId: opts.user, provider: providerName(opts.provider), accountEmail: opts.email });
      console.log('Primary account updated.');
    }),
  );

/* ------------------------------------------------------------------ */
/*  sync / refresh / serve                                             */
/* ------------------------------------------------------------------ */

function printSyncReport(report: UserSyncReport) {
  console.log(`dayplan sync report`);
  console.log(`user: ${report.userId}`);
  console.log(`status: ${report.status}`);
  console.log(`durationMs: ${report.durationMs}`);
  console.log('\naccounts:');
  for (const a of report.accounts) {
    const head = `- ${a.provider} ${a.accountEmail}: ${a.status}`;
    if (a.result) {
      const r = a.result;
      console.log(
        `${head} (created ${r.created}, updated ${r.updated}, status ${r.statusChanged}, unchanged ${r.unchanged}, deleted ${r.deleted}, skipped ${r.skipped.length})`,
      );
    } else {
      console.log(`${head}${a.error ? ` :: ${a.error}` : ''}${a.redirectTo ? `\n    reauthorize: ${a.redirectTo}` : ''}`);
    }
  }
}

program
  .command('sync')
  .description('Sync every task account of a user into the local task lists')
  .requiredOption('--user <id>', 'App user id')
  .option('--format <format>', 'Output format: pretty|json', 'pretty')
  .action((opts: { user: string; format: string }) =>
    withApp(async (app) => {
      const report = await app.sync.syncUser(opts.user);
      if (opts.format === 'json') console.log(JSON.stringify(report, null, 2));
      else printSyncReport(report);
      if (report.status !== 'success') process.exitCode = 2;
    }),
  );

program
  .command('refresh')
  .description('Refresh OAuth tokens that are about to go stale')
  .option('--once', 'Run a single pass and exit (default)')
  .action(() =>
    withApp(async (app) => {
      const result = await app.scheduler.runOnce();
      console.log(JSON.stringify(result));
      if (result.failed) process.exitCode = 2;
    }),
  );

program
  .command('serve')
  .description('Run the token refresh scheduler until interrupted')
  .action(() =>
    withApp(async (app) => {
      let lock: LockHandle;
      try {
        lock = await acquireLock(path.dirname(app.settings.dbPath));
      } catch (err) {
        if (err instanceof LockHeldError) {
          console.error(`Another scheduler (pid ${err.pid}) is running for this database.`);
          process.exitCode = 2;
          return;
        }
        throw err;
      }

      app.scheduler.start();
      await new Promise<void>((resolve) => {
        process.once('SIGINT', resolve);
        process.once('SIGTERM', resolve);
      });
      try {
        await app.scheduler.stop();
      } finally {
        await lock.release();
      }
    }),
  );

/* ------------------------------------------------------------------ */
/*  tasks                                                              */
/* ------------------------------------------------------------------ */

const tasks = program.command('tasks').description('Local task lists');

tasks
  .command('list')
  .description('Show the prioritized and unprioritized lists')
  .requiredOption('--user <id>', 'App user id')
  .option('--format <format>', 'Output format: pretty|json', 'pretty')
  .action((opts: { user: string; format: string }) =>
    withApp(async (app) => {
      const lists = app.engine.lists(opts.user);
      if (opts.format === 'json') {
        console.log(JSON.stringify(lists, null, 2));
        return;
      }
      for (const type of ['prioritized', 'unprioritized'] as const) {
        console.log(`${type}:`);
        const records = lists[type];
        const tree = new TaskHierarchy(records, (t) => t.providerTaskId);
        for (const { task, flattenedName } of tree.flatten()) {
          const done = task.status === 'completed' ? 'x' : ' ';
          console.log(`  ${task.position}. [${done}] ${flattenedName}  (${task.provider}, ${task.id})`);
        }
      }
    }),
  );

tasks
  .command('move')
  .description('Move a task to a list and position')
  .requiredOption('--task <id>', 'Task id')
  .requiredOption('--list <type>', 'prioritized or unprioritized')
  .option('--position <n>', 'Zero-based position (end of list when omitted)')
  .action((opts: { task: string; list: string; position?: string }) =>
    withApp(async (app) => {
      const position = opts.position === undefined ? undefined : Number.parseInt(opts.position, 10);
      if (position !== undefined && Number.isNaN(position)) throw new Error('Position must be an integer');
      const moved = app.engine.moveTask(opts.task, listType(opts.list), position);
      console.log(`${moved.title} -> ${moved.listType} #${moved.position}`);
    }),
  );

tasks
  .command('status')
  .description('Complete or reopen a task at its provider')
  .requiredOption('--task <id>', 'Task id')
  .requiredOption('--status <status>', 'active or completed')
  .action((opts: { task: string; status: string }) =>
    withApp(async (app) => {
      const updated = await app.sync.setTaskStatus(opts.task, taskStatus(opts.status));
      console.log(`${updated.title}: ${updated.status}`);
    }),
  );

tasks
  .command('instructions')
  .description('Show, or with --set replace, the AI Instructions of a task account')
  .requiredOption('--user <id>', 'App user id')
  .requiredOption('--provider <name>', 'Task provider')
  .option('--email <email>', 'Account email (defaults to the user id)')
  .option('--set <text>', 'New instructions (local providers only)')
  .action((opts: { user: string; provider: string; email?: string; set?: string }) =>
    withApp(async (app) => {
      const identity: AccountIdentity = { userId: opts.user, provider: providerName(opts.provider), accountEmail: opts.email ?? opts.user };
      const provider = app.providers.taskProvider(identity.provider);
      if (opts.set !== undefined) {
        if (!provider.setAiInstructions) throw new Error(`${provider.name} instructions are edited at the provider`);
        await provider.setAiInstructions(identity, opts.set);
        console.log('Instructions saved.');
        return;
      }
      console.log((await provider.getAiInstructions(identity)) ?? '(no AI Instructions task)');
    }),
  );

/* ------------------------------------------------------------------ */
/*  meetings / schedule                                                */
/* ------------------------------------------------------------------ */

program
  .command('meetings')
  .description('List upcoming meetings of every calendar account of a user')
  .requiredOption('--user <id>', 'App user id')
  .action((opts: { user: string }) =>
    withApp(async (app) => {
      const results = await app.calendar.getMeetingsForUser(opts.user);
      for (const { provider, accountEmail, outcome } of results) {
        console.log(`${provider} ${accountEmail}:`);
        switch (outcome.kind) {
          case 'ok':
            for (const m of outcome.value) console.log(`  ${m.start}  ${m.title}${m.isSyncedBusy ? ' (busy block)' : ''}`);
            if (!outcome.value.length) console.log('  (no meetings)');
            break;
          case 'needs_auth':
            console.log(`  needs reauthorization: ${outcome.redirectTo}`);
            break;
          default:
            console.log(`  ${outcome.kind}: ${outcome.error.message}`);
        }
      }
    }),
  );

program
  .command('schedule')
  .description('Generate a daily schedule from the prioritized list')
  .requiredOption('--user <id>', 'App user id')
  .option('--date <yyyy-mm-dd>', 'Day to plan (default today, UTC)')
  .option('--slot <minutes>', `Slot length: ${SLOT_MINUTES.join('|')}`, '60')
  .option('--instructions <text>', 'Override the AI Instructions tasks')
  .option('--format <format>', 'Output format: pretty|json', 'pretty')
  .action((opts: { user: string; date?: string; slot: string; instructions?: string; format: string }) =>
    withApp(async (app) => {
      const schedule = await app.schedule.generate(opts.user, {
        date: opts.date ?? today(),
        slotMinutes: slotMinutes(opts.slot),
        instructions: opts.instructions,
      });
      if (opts.format === 'json') {
        console.log(JSON.stringify(schedule, null, 2));
        return;
      }
      console.log(`schedule for ${schedule.date}`);
      for (const e of schedule.entries) {
        console.log(`- ${e.time}  ${e.activity}${e.notes ? `  (${e.notes})` : ''}`);
      }
    }),
  );

program.parseAsync(process.argv).catch((err: unknown) => {
  createLogger('error').error(errorMessage(err));
  process.exitCode = 1;
});
