import fs from 'node:fs';
import path from 'node:path';
import type { Config } from '../shared/config.js';
import type { Competition } from '../shared/competitions.js';
import type { CalendarStore } from '../store/store.js';
import { competitionLabels } from '../shared/competitions.js';
import { buildCalendar, type CalendarSettings } from './ics.js';
import { CalendarError, errorMessage } from '../shared/errors.js';
import { resolvePath } from '../shared/utils.js';
import { logger } from '../shared/logger.js';

export function calendarSettings(config: Config): CalendarSettings {
  return {
    name: config.calendar.name,
    description: config.calendar.description,
    timezone: config.calendar.timezone,
    prodId: config.calendar.prod_id,
    uidDomain: config.calendar.uid_domain,
  };
}

export function renderFeed(
  store: CalendarStore,
  config: Config,
  competitions: Competition[],
  generatedAt: Date = new Date(),
): string {
  return buildCalendar({
    fixtures: store.fixtures.listAll(),
    events: store.events.listAll(),
    generatedAt,
    settings: calendarSettings(config),
    competitionLabels: competitionLabels(competitions),
  });
}

/** Writes to `<path>.tmp`, then renames over the target. */
export function writeFeed(filePath: string, content: string): string {
  const resolved = resolvePath(filePath);
  const tmp = `${resolved}.tmp`;
  try {
    fs.mkdirSync(path.dirname(resolved), { recursive: true });
    fs.writeFileSync(tmp, content, 'utf-8');
    fs.renameSync(tmp, resolved);
  } catch (err) {
    throw new CalendarError(`Failed to write calendar file: ${resolved}`, {
      path: resolved,
      cause: errorMessage(err),
    });
  }
  logger.info({ path: resolved, bytes: Buffer.byteLength(content, 'utf8') }, 'Calendar written');
  return resolved;
}
