import { Hono } from 'hono';
import type { AppContext } from '../server.js';
import { createSqliteStore } from '../../store/calendarDb.js';

export function recordRoutes(ctx: AppContext): Hono {
  const app = new Hono();
  const store = createSqliteStore(ctx.db);

  // GET /api/fixtures: all fixtures by date
  app.get('/fixtures', (c) => {
    return c.json(store.fixtures.listAll());
  });

  // GET /api/events: all single-sided events by date
  app.get('/events', (c) => {
    return c.json(store.events.listAll());
  });

  // DELETE /api/fixtures/:identity: operator removal, renumbers the rest
  app.delete('/fixtures/:identity', (c) => {
    const removed = store.fixtures.deleteAndRenumber([c.req.param('identity')]);
    if (removed === 0) {
      return c.json({ error: 'Fixture not found' }, 404);
    }
    return c.json({ ok: true, removed });
  });

  // DELETE /api/events/:identity
  app.delete('/events/:identity', (c) => {
    const removed = store.events.deleteAndRenumber([c.req.param('identity')]);
    if (removed === 0) {
      return c.json({ error: 'Event not found' }, 404);
    }
    return c.json({ ok: true, removed });
  });

  return app;
}
