import { Hono } from 'hono';
import type { AppContext } from '../server.js';
import { runSync } from '../../sync/sync.js';
import { getLastRun } from '../../sync/runDb.js';

interface SyncBody {
  force?: boolean;
  competitions?: string[];
}

export function syncRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  // POST /api/sync: run a sync now
  // Body: { force?: boolean, competitions?: string[] }
  app.post('/sync', async (c) => {
    const empty: SyncBody = {};
    const body = await c.req.json<SyncBody>().catch(() => empty);

    const stats = await runSync(ctx.db, ctx.config, ctx.competitions, {
      ...ctx.syncOverrides,
      force: body.force === true,
      competitionIds: body.competitions,
    });
    return c.json(stats);
  });

  // GET /api/sync/last: most recent run
  app.get('/sync/last', (c) => {
    const run = getLastRun(ctx.db);
    if (!run) {
      return c.json({ message: 'No sync has been run yet' }, 404);
    }
    return c.json(run);
  });

  return app;
}
