import type Database from 'better-sqlite3';
import { nowISO } from '../shared/utils.js';

/**
 * Database row shape for the sync_runs table.
 */
export interface SyncRunRow {
  id: string;
  started_at: string;
  finished_at: string | null;
  new_count: number;
  updated_count: number;
  unchanged_count: number;
  calendar_written: number;
  error: string | null;
}

export function startRun(db: Database.Database, id: string): void {
  db.prepare('INSERT INTO sync_runs (id, started_at) VALUES (?, ?)').run(id, nowISO());
}

export function finishRun(
  db: Database.Database,
  id: string,
  counts: { newCount: number; updatedCount: number; unchangedCount: number; calendarWritten: boolean },
): void {
  db.prepare(
    `UPDATE sync_runs
     SET finished_at = ?, new_count = ?, updated_count = ?, unchanged_count = ?, calendar_written = ?
     WHERE id = ?`,
  ).run(
    nowISO(),
    counts.newCount,
    counts.updatedCount,
    counts.unchangedCount,
    counts.calendarWritten ? 1 : 0,
    id,
  );
}

/** Close a run that threw, keeping the counts at zero. */
export function failRun(db: Database.Database, id: string, error: string): void {
  db.prepare('UPDATE sync_runs SET finished_at = ?, error = ? WHERE id = ?').run(nowISO(), error, id);
}

export function getRun(db: Database.Database, id: string): SyncRunRow | undefined {
  return db.prepare('SELECT * FROM sync_runs WHERE id = ?').get(id) as SyncRunRow | undefined;
}

export function getLastRun(db: Database.Database): SyncRunRow | undefined {
  return db
    .prepare('SELECT * FROM sync_runs ORDER BY started_at DESC, rowid DESC LIMIT 1')
    .get() as SyncRunRow | undefined;
}
