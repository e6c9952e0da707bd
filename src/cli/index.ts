#!/usr/bin/env node

import { Command } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import { loadConfig, writeDefaultConfig, type Config } from '../shared/config.js';
import {
  installDefaultCompetitions,
  loadCompetitions,
  type Competition,
} from '../shared/competitions.js';
import { getFixtureCalDir, resolvePath } from '../shared/utils.js';
import { errorMessage } from '../shared/errors.js';
import { initDb, closeDb } from '../db/db.js';
import { runMigrations } from '../db/migrate.js';
import {
  createSqliteStore,
  deleteAndRenumber,
  getEventBySeq,
  getFixtureBySeq,
  listRecentEvents,
  listRecentFixtures,
} from '../store/calendarDb.js';
import { renderFeed, writeFeed } from '../calendar/feed.js';
import { formatChangeLog } from '../reconcile/reconcile.js';
import type { CandidateRecord } from '../reconcile/types.js';
import { runSync, type SyncOptions, type SyncStats } from '../sync/sync.js';
import { getLastRun } from '../sync/runDb.js';
import { startServer } from '../api/server.js';

const program = new Command();

program
  .name('fixturecal')
  .description('Sports fixture calendar feed: scrape, reconcile, publish as iCalendar')
  .version('0.1.0');

// === init ===
program
  .command('init')
  .description('Create config, competitions file and database')
  .action(async () => {
    const configPath = process.env['FIXTURECAL_CONFIG']
      ? resolvePath(process.env['FIXTURECAL_CONFIG'])
      : path.join(getFixtureCalDir(), 'config.yaml');

    // 1. Create config
    if (!fs.existsSync(configPath)) {
      writeDefaultConfig(configPath);
      log(`✓ ${configPath} created`);
    } else {
      log(`✓ ${configPath} already exists`);
    }

    const config = await loadConfig();

    // 2. Copy bundled competitions
    const competitionsPath = resolvePath(config.competitions_path);
    if (installDefaultCompetitions(competitionsPath)) {
      log(`✓ ${competitionsPath} created`);
    } else {
      log(`✓ ${competitionsPath} already exists`);
    }

    // 3. Init database
    const dbPath = resolvePath(config.db.path);
    const { applied } = runMigrations(initDb(dbPath));
    if (applied.length > 0) {
      log(`✓ ${dbPath} created (${applied.length} migrations applied)`);
    } else {
      log(`✓ ${dbPath} already up to date`);
    }

    closeDb();
  });

// === doctor ===
program
  .command('doctor')
  .description('Check config, competitions, database and last sync')
  .action(async () => {
    const results: string[] = [];

    try {
      const config = await loadConfig();
      results.push('Config: ok');

      try {
        const competitions = loadCompetitions(resolvePath(config.competitions_path));
        results.push(`Competitions: ${competitions.length}`);
      } catch (err) {
        results.push(`Competitions: error (${errorMessage(err)})`);
      }

      const dbPath = resolvePath(config.db.path);
      if (!fs.existsSync(dbPath)) {
        results.push('DB: missing (run fixturecal init)');
      } else {
        try {
          const db = initDb(dbPath);
          runMigrations(db);
          const lastRun = getLastRun(db);
          results.push('DB: ok');
          results.push(`Last sync: ${lastRun?.finished_at ?? 'never'}${lastRun?.error ? ' (failed)' : ''}`);
          closeDb();
        } catch (err) {
          results.push(`DB: error (${errorMessage(err)})`);
        }
      }

      const output = resolvePath(config.calendar.output_path);
      results.push(`Calendar: ${fs.existsSync(output) ? output : 'not written yet'}`);
    } catch (err) {
      results.push(`Config: error (${errorMessage(err)})`);
      process.exitCode = 1;
    }

    log(results.join(' | '));
  });

// === competitions ===
program
  .command('competitions')
  .description('List configured competitions')
  .action(async () => {
    const config = await loadConfig();
    const competitions = loadCompetitions(resolvePath(config.competitions_path));
    if (competitions.length === 0) {
      log('No competitions configured.');
      return;
    }
    for (const c of competitions) {
      log(`${c.id.padEnd(16)} ${c.label.padEnd(24)} season ${c.season}  league ${c.league_id}`);
    }
  });

// === sync ===
program
  .command('sync')
  .description('Fetch all competitions, reconcile, and rewrite the calendar on change')
  .option('-c, --competition <ids...>', 'Only these competition ids')
  .option('-f, --force', 'Rewrite the calendar even when nothing changed')
  .option('--exit-code', 'Exit 0 when records changed, 2 when nothing changed')
  .option('--no-fetch', 'Skip the upstream fetch')
  .option('--no-details', 'Skip the per-game detail lookup')
  .option('--json', 'Print stats as JSON')
  .action(
    async (opts: {
      competition?: string[];
      force?: boolean;
      exitCode?: boolean;
      fetch: boolean;
      details: boolean;
      json?: boolean;
    }) => {
      const { db, config, competitions, cleanup } = await getDb();
      try {
        const stats = await runSync(db, config, competitions, {
          competitionIds: opts.competition,
          force: opts.force ?? false,
          skipFetch: !opts.fetch,
          details: opts.details ? undefined : null,
        });

        if (opts.json) {
          log(JSON.stringify(stats, null, 2));
        } else {
          printSyncStats(stats);
        }

        if (opts.exitCode) {
          process.exitCode = stats.changed ? 0 : 2;
        }
      } finally {
        cleanup();
      }
    },
  );

// === list ===
program
  .command('list')
  .description('Show stored fixtures and events, newest first')
  .option('-l, --limit <n>', 'Max rows per kind', '10')
  .action(async (opts: { limit: string }) => {
    const { db, cleanup } = await getDb();
    try {
      const limit = parseInt(opts.limit, 10);

      const fixtures = listRecentFixtures(db, limit);
      log(`Fixtures (${fixtures.length}):`);
      for (const f of fixtures) {
        const when = `${f.date} ${f.time || '--:--'}`;
        const result = f.result ? `  ${f.result}` : '';
        log(`${String(f.seq).padStart(4)}  ${when}  ${f.home} vs ${f.guest}  [${f.competition}]${result}`);
      }

      const events = listRecentEvents(db, limit);
      log(`\nEvents (${events.length}):`);
      for (const e of events) {
        const when = `${e.date} ${e.time || '--:--'}`;
        log(`${String(e.seq).padStart(4)}  ${when}  ${e.title}`);
      }
    } finally {
      cleanup();
    }
  });

// === export ===
program
  .command('export')
  .description('Write the calendar file from the stored records')
  .option('-o, --out <path>', 'Output path (default: calendar.output_path)')
  .action(async (opts: { out?: string }) => {
    const { db, config, competitions, cleanup } = await getDb();
    try {
      const target = opts.out ?? config.calendar.output_path;
      const written = writeFeed(target, renderFeed(createSqliteStore(db), config, competitions));
      log(`✓ Calendar written to ${written}`);
    } finally {
      cleanup();
    }
  });

// === add-fixture ===
program
  .command('add-fixture')
  .description('Add or update a fixture by hand')
  .requiredOption('--home <name>', 'Home team')
  .requiredOption('--guest <name>', 'Guest team')
  .requiredOption('--date <date>', 'Date, e.g. 05.03.2025 or 2025-03-05')
  .option('--time <time>', 'Start time, e.g. 18:30')
  .option('--location <text>', 'Venue')
  .option('--result <text>', 'Result, e.g. 12:8')
  .option('--competition <id>', 'Competition tag', 'manual')
  .action(
    async (opts: {
      home: string;
      guest: string;
      date: string;
      time?: string;
      location?: string;
      result?: string;
      competition: string;
    }) => {
      await addManual({
        kind: 'fixture',
        home: opts.home,
        guest: opts.guest,
        date: opts.date,
        time: opts.time,
        location: opts.location,
        result: opts.result,
        competition: opts.competition,
      });
    },
  );

// === add-event ===
program
  .command('add-event')
  .description('Add or update a single-sided event by hand')
  .requiredOption('--title <title>', 'Event title')
  .requiredOption('--date <date>', 'Date, e.g. 05.03.2025 or 2025-03-05')
  .option('--time <time>', 'Start time, e.g. 18:30')
  .option('--location <text>', 'Venue')
  .option('--description <text>', 'Free-text description')
  .action(
    async (opts: {
      title: string;
      date: string;
      time?: string;
      location?: string;
      description?: string;
    }) => {
      await addManual({
        kind: 'event',
        title: opts.title,
        date: opts.date,
        time: opts.time,
        location: opts.location,
        description: opts.description,
      });
    },
  );

// === delete ===
program
  .command('delete <seqs...>')
  .description('Delete fixtures (or events with --event) by display number and renumber the rest')
  .option('-e, --event', 'Delete events instead of fixtures')
  .action(async (seqs: string[], opts: { event?: boolean }) => {
    const { db, config, competitions, cleanup } = await getDb();
    try {
      const table = opts.event ? 'events' : 'fixtures';
      const identities: string[] = [];

      for (const raw of seqs) {
        const seq = parseInt(raw, 10);
        const record = opts.event ? getEventBySeq(db, seq) : getFixtureBySeq(db, seq);
        if (!record) {
          log(`No ${opts.event ? 'event' : 'fixture'} with number ${raw}`);
          process.exitCode = 1;
          return;
        }
        identities.push(record.identity);
      }

      const removed = deleteAndRenumber(db, table, identities);
      log(`✓ ${removed} ${table} deleted`);

      const written = writeFeed(
        config.calendar.output_path,
        renderFeed(createSqliteStore(db), config, competitions),
      );
      log(`✓ Calendar written to ${written}`);
    } finally {
      cleanup();
    }
  });

// === serve ===
program
  .command('serve')
  .description('Serve the calendar feed and JSON API, syncing on schedule')
  .option('-p, --port <n>', 'Port number')
  .option('--no-schedule', 'Do not start the cron sync')
  .action(async (opts: { port?: string; schedule: boolean }) => {
    await startServer({
      port: opts.port ? parseInt(opts.port, 10) : undefined,
      schedule: opts.schedule,
    });
  });

async function addManual(candidate: CandidateRecord): Promise<void> {
  const { db, config, competitions, cleanup } = await getDb();
  try {
    const options: SyncOptions = {
      skipFetch: true,
      details: null,
      extraCandidates: [candidate],
    };
    const stats = await runSync(db, config, competitions, options);
    const { report } = stats;
    if (report.new.length + report.updated.length + report.unchanged.length === 0) {
      log('Entry rejected: missing name or unparseable date');
      process.exitCode = 1;
      return;
    }
    printSyncStats(stats);
  } finally {
    cleanup();
  }
}

function printSyncStats(stats: SyncStats): void {
  const { report } = stats;
  log(
    `✓ ${stats.candidates} candidates from ${stats.competitionsProcessed} competitions: ` +
      `${report.new.length} new, ${report.updated.length} updated, ${report.unchanged.length} unchanged`,
  );
  for (const line of formatChangeLog(report)) {
    log(line);
  }
  if (stats.calendarPath) {
    log(`✓ Calendar written to ${stats.calendarPath}`);
  } else {
    log('Calendar unchanged');
  }
}

// === Helper to get DB connection ===
async function getDb(): Promise<{
  db: ReturnType<typeof initDb>;
  config: Config;
  competitions: Competition[];
  cleanup: () => void;
}> {
  const config = await loadConfig();
  const dbPath = resolvePath(config.db.path);

  if (!fs.existsSync(dbPath)) {
    log('Database not found. Run fixturecal init first.');
    process.exit(1);
  }

  const competitions = loadCompetitions(resolvePath(config.competitions_path));
  const db = initDb(dbPath);
  runMigrations(db);

  return {
    db,
    config,
    competitions,
    cleanup: () => {
      closeDb();
    },
  };
}

function log(msg: string): void {
  // eslint-disable-next-line no-console
  console.log(msg);
}

program.parseAsync().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error(`Error: ${errorMessage(err)}`);
  process.exitCode = 1;
});
