import { Hono } from 'hono';
import type { AppContext } from '../server.js';
import { getLastRun } from '../../sync/runDb.js';

export function systemRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  // GET /api/health: basic health check
  app.get('/health', (c) => {
    return c.json({
      status: 'ok',
      version: '0.1.0',
      uptime: process.uptime(),
    });
  });

  // GET /api/doctor: database and last sync
  app.get('/doctor', (c) => {
    const checks: Record<string, string> = {};

    try {
      ctx.db.prepare('SELECT 1').get();
      checks['db'] = 'ok';
    } catch {
      checks['db'] = 'error';
    }

    const lastRun = getLastRun(ctx.db);
    checks['last_sync'] = lastRun?.finished_at ?? 'never';
    if (lastRun?.error) {
      checks['last_sync_error'] = lastRun.error;
    }
    checks['competitions'] = `${ctx.competitions.length} configured`;

    return c.json(checks);
  });

  return app;
}
