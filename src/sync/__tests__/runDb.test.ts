import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { runMigrations } from '../../db/migrate.js';
import { failRun, finishRun, getLastRun, getRun, startRun } from '../runDb.js';

let db: Database.Database;

beforeEach(() => {
  db = new Database(':memory:');
  runMigrations(db);
});

afterEach(() => {
  db.close();
});

describe('sync run records', () => {
  it('starts unfinished and records counts on finish', () => {
    startRun(db, 'run-1');
    expect(getRun(db, 'run-1')?.finished_at).toBeNull();

    finishRun(db, 'run-1', { newCount: 2, updatedCount: 1, unchangedCount: 5, calendarWritten: true });

    const run = getRun(db, 'run-1');
    expect(run?.finished_at).toMatch(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/);
    expect(run?.new_count).toBe(2);
    expect(run?.updated_count).toBe(1);
    expect(run?.unchanged_count).toBe(5);
    expect(run?.calendar_written).toBe(1);
  });

  it('returns the latest run', () => {
    expect(getLastRun(db)).toBeUndefined();
    startRun(db, 'run-1');
    startRun(db, 'run-2');
    expect(getLastRun(db)?.id).toBe('run-2');
  });

  it('records the error of a failed run', () => {
    startRun(db, 'run-1');
    failRun(db, 'run-1', 'disk full');

    const run = getRun(db, 'run-1');
    expect(run?.finished_at).not.toBeNull();
    expect(run?.error).toBe('disk full');
  });
});
