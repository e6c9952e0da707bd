import fs from 'node:fs';
import type Database from 'better-sqlite3';
import type { Config } from '../shared/config.js';
import type { Competition } from '../shared/competitions.js';
import type { SourceAdapter } from '../source/adapter.js';
import type { CandidateRecord, ReconcileReport } from '../reconcile/types.js';
import { reconcileBatch, hasChanges, type DetailLookup } from '../reconcile/reconcile.js';
import { createNameNormalizer } from '../normalize/names.js';
import { createSqliteStore } from '../store/calendarDb.js';
import { renderFeed, writeFeed } from '../calendar/feed.js';
import { DsvAdapter } from '../source/dsv.js';
import { DsvDetailLookup } from '../source/detail.js';
import { startRun, finishRun, failRun } from './runDb.js';
import { generateId, resolvePath } from '../shared/utils.js';
import { errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export interface SyncOptions {
  /** Only these competition ids; all when empty. */
  competitionIds?: string[];
  /** Entries added by hand, reconciled with the scraped ones. */
  extraCandidates?: CandidateRecord[];
  /** Skip the upstream fetch entirely. */
  skipFetch?: boolean;
  /** Rewrite the calendar file even when nothing changed. */
  force?: boolean;
  /** Leave the calendar file alone. */
  noWrite?: boolean;
  adapter?: SourceAdapter;
  details?: DetailLookup | null;
  now?: () => Date;
}

export interface SyncStats {
  runId: string;
  competitionsProcessed: number;
  candidates: number;
  report: ReconcileReport;
  changed: boolean;
  calendarPath: string | null;
  durationMs: number;
}

type SyncOutcome = Omit<SyncStats, 'runId' | 'durationMs'>;

function defaultDetails(config: Config): DetailLookup | undefined {
  if (!config.source.fetch_details) return undefined;
  return new DsvDetailLookup({
    timeoutMs: config.source.fetch_timeout_ms,
    userAgent: config.source.user_agent,
  });
}

function selectCompetitions(competitions: Competition[], ids: string[] | undefined): Competition[] {
  if (!ids || ids.length === 0) return competitions;
  const wanted = new Set(ids);
  return competitions.filter((c) => wanted.has(c.id));
}

async function syncOnce(
  db: Database.Database,
  config: Config,
  competitions: Competition[],
  options: SyncOptions,
): Promise<SyncOutcome> {
  const adapter =
    options.adapter ??
    new DsvAdapter({
      baseUrl: config.source.base_url,
      club: config.source.club,
      timeoutMs: config.source.fetch_timeout_ms,
      userAgent: config.source.user_agent,
    });

  const selected = options.skipFetch ? [] : selectCompetitions(competitions, options.competitionIds);
  const candidates: CandidateRecord[] = [];
  for (const competition of selected) {
    const found = await adapter.fetch(competition);
    logger.info({ competition: competition.id, candidates: found.length }, 'Competition fetched');
    candidates.push(...found);
  }
  candidates.push(...(options.extraCandidates ?? []));

  const store = createSqliteStore(db);
  const report = await reconcileBatch(store, candidates, {
    normalizeName: createNameNormalizer(config.normalize.club_aliases),
    details: options.details === null ? undefined : (options.details ?? defaultDetails(config)),
    now: options.now,
  });
  const changed = hasChanges(report);

  let calendarPath: string | null = null;
  if (!options.noWrite) {
    const target = resolvePath(config.calendar.output_path);
    if (changed || options.force || !fs.existsSync(target)) {
      const generatedAt = options.now ? options.now() : new Date();
      calendarPath = writeFeed(target, renderFeed(store, config, competitions, generatedAt));
    }
  }

  return {
    competitionsProcessed: selected.length,
    candidates: candidates.length,
    report,
    changed,
    calendarPath,
  };
}

/**
 * One unit of work: fetch every competition, reconcile the candidates, and
 * rewrite the calendar file when something changed (or it does not exist yet).
 * `changed` in the result is the signal automation uses to decide on
 * republishing. A run that throws is closed with its error before the error
 * propagates.
 */
export async function runSync(
  db: Database.Database,
  config: Config,
  competitions: Competition[],
  options: SyncOptions = {},
): Promise<SyncStats> {
  const startTime = Date.now();
  const runId = generateId();
  startRun(db, runId);

  let outcome: SyncOutcome;
  try {
    outcome = await syncOnce(db, config, competitions, options);
  } catch (err) {
    failRun(db, runId, errorMessage(err));
    logger.error({ runId, error: errorMessage(err) }, 'Sync failed');
    throw err;
  }
  const { report, changed, calendarPath } = outcome;

  finishRun(db, runId, {
    newCount: report.new.length,
    updatedCount: report.updated.length,
    unchangedCount: report.unchanged.length,
    calendarWritten: calendarPath !== null,
  });

  const stats: SyncStats = {
    runId,
    ...outcome,
    durationMs: Date.now() - startTime,
  };

  logger.info(
    {
      runId,
      new: report.new.length,
      updated: report.updated.length,
      unchanged: report.unchanged.length,
      changed,
      durationMs: stats.durationMs,
    },
    'Sync complete',
  );

  return stats;
}
