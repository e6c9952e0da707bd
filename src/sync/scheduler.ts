/**
 * Scheduler: node-cron job that re-runs the sync while the server is up.
 */

import cron from 'node-cron';
import type Database from 'better-sqlite3';
import type { Config } from '../shared/config.js';
import type { Competition } from '../shared/competitions.js';
import { errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { runSync } from './sync.js';

let syncTask: cron.ScheduledTask | null = null;
let running = false;

async function runScheduledSync(
  db: Database.Database,
  config: Config,
  competitions: Competition[],
): Promise<void> {
  if (running) {
    logger.warn('Previous scheduled sync still running, skipping this tick');
    return;
  }
  running = true;
  logger.info('Scheduled sync starting');
  try {
    const stats = await runSync(db, config, competitions);
    logger.info({ changed: stats.changed, runId: stats.runId }, 'Scheduled sync complete');
  } catch (e) {
    logger.error({ error: errorMessage(e) }, 'Scheduled sync failed');
  } finally {
    running = false;
  }
}

/**
 * Start the sync job. Returns false when `schedule.sync_cron` is empty or invalid.
 */
export function startScheduler(
  db: Database.Database,
  config: Config,
  competitions: Competition[],
): boolean {
  const syncCron = config.schedule.sync_cron;

  if (!syncCron) {
    logger.info('No sync_cron configured, scheduler disabled');
    return false;
  }

  if (!cron.validate(syncCron)) {
    logger.warn({ syncCron }, 'Invalid sync_cron expression, skipping scheduler');
    return false;
  }

  syncTask = cron.schedule(syncCron, () => {
    void runScheduledSync(db, config, competitions);
  });

  logger.info({ sync_cron: syncCron }, 'Scheduler started');
  return true;
}

/**
 * Stop the sync job (for graceful shutdown).
 */
export function stopScheduler(): void {
  syncTask?.stop();
  syncTask = null;
  logger.info('Scheduler stopped');
}
