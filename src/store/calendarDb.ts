import type Database from 'better-sqlite3';
import type { CanonicalEvent, CanonicalFixture } from '../reconcile/types.js';
import type { CalendarStore } from './store.js';
import { DbError, errorMessage } from '../shared/errors.js';

export type FixtureRow = Omit<CanonicalFixture, 'seq'>;
export type EventRow = Omit<CanonicalEvent, 'seq'>;
type Table = 'fixtures' | 'events';

// ================================================================
// Fixtures
// ================================================================

export function getFixture(db: Database.Database, identity: string): CanonicalFixture | undefined {
  return db.prepare('SELECT * FROM fixtures WHERE identity = ?').get(identity) as
    | CanonicalFixture
    | undefined;
}

export function getFixtureBySeq(db: Database.Database, seq: number): CanonicalFixture | undefined {
  return db.prepare('SELECT * FROM fixtures WHERE seq = ?').get(seq) as CanonicalFixture | undefined;
}

export function upsertFixture(db: Database.Database, row: FixtureRow): CanonicalFixture {
  try {
    db.prepare(
      `INSERT INTO fixtures
       (identity, seq, home, guest, date, time, location, venue, map_url, result, officials, quarters,
        description, competition, detail_ref, last_modified, created_at)
       VALUES (@identity, (SELECT COALESCE(MAX(seq), 0) + 1 FROM fixtures), @home, @guest, @date, @time,
        @location, @venue, @map_url, @result, @officials, @quarters, @description, @competition, @detail_ref,
        @last_modified, @created_at)
       ON CONFLICT(identity) DO UPDATE SET
         home = excluded.home,
         guest = excluded.guest,
         date = excluded.date,
         time = excluded.time,
         location = excluded.location,
         venue = excluded.venue,
         map_url = excluded.map_url,
         result = excluded.result,
         officials = excluded.officials,
         quarters = excluded.quarters,
         description = excluded.description,
         competition = excluded.competition,
         detail_ref = excluded.detail_ref,
         last_modified = excluded.last_modified`,
    ).run({
      identity: row.identity,
      home: row.home,
      guest: row.guest,
      date: row.date,
      time: row.time,
      location: row.location,
      venue: row.venue,
      map_url: row.map_url,
      result: row.result,
      officials: row.officials,
      quarters: row.quarters,
      description: row.description,
      competition: row.competition,
      detail_ref: row.detail_ref,
      last_modified: row.last_modified,
      created_at: row.created_at,
    });
  } catch (err) {
    throw new DbError(`Failed to upsert fixture: ${errorMessage(err)}`, { identity: row.identity });
  }

  const stored = getFixture(db, row.identity);
  if (!stored) {
    throw new DbError('Fixture missing after upsert', { identity: row.identity });
  }
  return stored;
}

export function listFixtures(db: Database.Database): CanonicalFixture[] {
  return db
    .prepare('SELECT * FROM fixtures ORDER BY date, time, identity')
    .all() as CanonicalFixture[];
}

export function listRecentFixtures(db: Database.Database, limit = 10): CanonicalFixture[] {
  return db
    .prepare('SELECT * FROM fixtures ORDER BY date DESC, time DESC LIMIT ?')
    .all(limit) as CanonicalFixture[];
}

// ================================================================
// Events
// ================================================================

export function getEvent(db: Database.Database, identity: string): CanonicalEvent | undefined {
  return db.prepare('SELECT * FROM events WHERE identity = ?').get(identity) as
    | CanonicalEvent
    | undefined;
}

export function getEventBySeq(db: Database.Database, seq: number): CanonicalEvent | undefined {
  return db.prepare('SELECT * FROM events WHERE seq = ?').get(seq) as CanonicalEvent | undefined;
}

export function upsertEvent(db: Database.Database, row: EventRow): CanonicalEvent {
  try {
    db.prepare(
      `INSERT INTO events
       (identity, seq, title, date, time, location, description, last_modified, created_at)
       VALUES (@identity, (SELECT COALESCE(MAX(seq), 0) + 1 FROM events), @title, @date, @time,
        @location, @description, @last_modified, @created_at)
       ON CONFLICT(identity) DO UPDATE SET
         title = excluded.title,
         date = excluded.date,
         time = excluded.time,
         location = excluded.location,
         description = excluded.description,
         last_modified = excluded.last_modified`,
    ).run({
      identity: row.identity,
      title: row.title,
      date: row.date,
      time: row.time,
      location: row.location,
      description: row.description,
      last_modified: row.last_modified,
      created_at: row.created_at,
    });
  } catch (err) {
    throw new DbError(`Failed to upsert event: ${errorMessage(err)}`, { identity: row.identity });
  }

  const stored = getEvent(db, row.identity);
  if (!stored) {
    throw new DbError('Event missing after upsert', { identity: row.identity });
  }
  return stored;
}

export function listEvents(db: Database.Database): CanonicalEvent[] {
  return db.prepare('SELECT * FROM events ORDER BY date, time, identity').all() as CanonicalEvent[];
}

export function listRecentEvents(db: Database.Database, limit = 10): CanonicalEvent[] {
  return db
    .prepare('SELECT * FROM events ORDER BY date DESC, time DESC LIMIT ?')
    .all(limit) as CanonicalEvent[];
}

// ================================================================
// Deletion
// ================================================================

/**
 * Delete rows by identity and close the gaps in `seq`, so the next insert
 * continues from the new maximum. Runs in one transaction.
 */
export function deleteAndRenumber(db: Database.Database, table: Table, identities: string[]): number {
  if (identities.length === 0) return 0;

  const remove = db.prepare(`DELETE FROM ${table} WHERE identity = ?`);
  const renumber = db.prepare(`UPDATE ${table} SET seq = ? WHERE identity = ?`);

  const run = db.transaction((ids: string[]): number => {
    let removed = 0;
    for (const id of ids) {
      removed += remove.run(id).changes;
    }
    const remaining = db
      .prepare(`SELECT identity FROM ${table} ORDER BY seq`)
      .all() as Array<{ identity: string }>;
    remaining.forEach((row, i) => {
      renumber.run(i + 1, row.identity);
    });
    return removed;
  });

  try {
    return run(identities);
  } catch (err) {
    throw new DbError(`Failed to delete from ${table}: ${errorMessage(err)}`, { identities });
  }
}

/**
 * CalendarStore backed by the SQLite tables above.
 */
export function createSqliteStore(db: Database.Database): CalendarStore {
  return {
    fixtures: {
      get: (identity) => getFixture(db, identity),
      upsert: (record) => upsertFixture(db, record),
      listAll: () => listFixtures(db),
      deleteAndRenumber: (identities) => deleteAndRenumber(db, 'fixtures', identities),
    },
    events: {
      get: (identity) => getEvent(db, identity),
      upsert: (record) => upsertEvent(db, record),
      listAll: () => listEvents(db),
      deleteAndRenumber: (identities) => deleteAndRenumber(db, 'events', identities),
    },
  };
}
