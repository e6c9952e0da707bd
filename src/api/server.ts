import fs from 'node:fs';
import path from 'node:path';
import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { serve } from '@hono/node-server';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import type Database from 'better-sqlite3';
import type { Config } from '../shared/config.js';
import type { Competition } from '../shared/competitions.js';
import type { SyncOptions } from '../sync/sync.js';
import { FixtureCalError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { initDb, closeDb } from '../db/db.js';
import { runMigrations } from '../db/migrate.js';
import { loadConfig, writeDefaultConfig } from '../shared/config.js';
import { installDefaultCompetitions, loadCompetitions } from '../shared/competitions.js';
import { resolvePath, getFixtureCalDir } from '../shared/utils.js';
import { calendarRoutes } from './routes/calendar.js';
import { recordRoutes } from './routes/records.js';
import { syncRoutes } from './routes/sync.js';
import { systemRoutes } from './routes/system.js';
import { startScheduler, stopScheduler } from '../sync/scheduler.js';

export interface AppContext {
  db: Database.Database;
  config: Config;
  competitions: Competition[];
  /** Clock for DTSTAMP; tests pin it. */
  now?: () => Date;
  /** Merged into every sync started over HTTP. */
  syncOverrides?: Pick<SyncOptions, 'adapter' | 'details' | 'now' | 'noWrite'>;
}

export function createApp(ctx: AppContext): Hono {
  const app = new Hono();

  // Middleware
  app.use('*', cors());

  // Mount route groups
  app.route('/', calendarRoutes(ctx));
  app.route('/api', recordRoutes(ctx));
  app.route('/api', syncRoutes(ctx));
  app.route('/api', systemRoutes(ctx));

  // Global error handler
  app.onError((err, c) => {
    if (err instanceof FixtureCalError) {
      const status = errorCodeToHttpStatus(err.code);
      return c.json({ error: err.message, code: err.code, details: err.details }, status);
    }
    logger.error({ error: err.message, stack: err.stack }, 'Unhandled error');
    return c.json({ error: 'Internal server error' }, 500);
  });

  // 404 handler
  app.notFound((c) => {
    return c.json({ error: 'Not found' }, 404);
  });

  return app;
}

export function errorCodeToHttpStatus(code: string): ContentfulStatusCode {
  switch (code) {
    case 'CONFIG_ERROR':
      return 400;
    case 'SOURCE_ERROR':
      return 502;
    case 'CALENDAR_ERROR':
    case 'DB_ERROR':
      return 500;
    default:
      return 500;
  }
}

/**
 * Run first-time setup if ~/.fixturecal/ has no config yet.
 * Safe to call every time.
 */
function autoInit(): void {
  const configPath = path.join(getFixtureCalDir(), 'config.yaml');
  if (!process.env['FIXTURECAL_CONFIG'] && !fs.existsSync(configPath)) {
    writeDefaultConfig(configPath);
    logger.info('First run: created ~/.fixturecal/config.yaml');
  }
}

export async function startServer(opts: { port?: number; schedule?: boolean } = {}): Promise<void> {
  autoInit();

  const config = await loadConfig();
  const port = opts.port ?? config.server.port;
  const host = config.server.host;

  const competitionsPath = resolvePath(config.competitions_path);
  if (installDefaultCompetitions(competitionsPath)) {
    logger.info({ path: competitionsPath }, 'First run: installed default competitions');
  }
  const competitions = loadCompetitions(competitionsPath);

  const db = initDb(resolvePath(config.db.path));
  runMigrations(db);

  const app = createApp({ db, config, competitions });

  logger.info({ port, host }, 'Starting fixture calendar server');

  serve({ fetch: app.fetch, port, hostname: host }, (info) => {
    // eslint-disable-next-line no-console
    console.log(`\n  Calendar feed: http://${host}:${info.port}/calendar.ics\n`);
  });

  if (opts.schedule !== false) {
    startScheduler(db, config, competitions);
  }

  // Handle graceful shutdown
  const shutdown = () => {
    logger.info('Shutting down...');
    stopScheduler();
    closeDb();
    process.exit(0);
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}
