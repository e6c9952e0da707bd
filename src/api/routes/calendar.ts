import { Hono } from 'hono';
import type { AppContext } from '../server.js';
import { renderFeed } from '../../calendar/feed.js';
import { createSqliteStore } from '../../store/calendarDb.js';

export function calendarRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  // GET /calendar.ics: the subscribable feed, rendered from the current tables
  app.get('/calendar.ics', (c) => {
    const generatedAt = ctx.now ? ctx.now() : new Date();
    const body = renderFeed(createSqliteStore(ctx.db), ctx.config, ctx.competitions, generatedAt);
    return c.body(body, 200, {
      'Content-Type': 'text/calendar; charset=utf-8',
      'Cache-Control': 'no-cache',
    });
  });

  return app;
}
