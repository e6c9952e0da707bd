import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import Database from 'better-sqlite3';
import { runMigrations } from '../../db/migrate.js';
import { createSqliteStore } from '../../store/calendarDb.js';
import { generateDefaultConfig } from '../../shared/config.js';
import { CalendarError } from '../../shared/errors.js';
import { calendarSettings, renderFeed, writeFeed } from '../feed.js';

let dir: string;
let db: Database.Database;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'fixturecal-feed-'));
  db = new Database(':memory:');
  runMigrations(db);
});

afterEach(() => {
  db.close();
  fs.rmSync(dir, { recursive: true, force: true });
});

describe('calendarSettings', () => {
  it('maps config keys', () => {
    const config = generateDefaultConfig();
    expect(calendarSettings(config)).toEqual({
      name: 'Fixtures',
      description: 'Automatically generated fixtures',
      timezone: 'Europe/Berlin',
      prodId: '-//fixturecal//Fixture Calendar//EN',
      uidDomain: 'fixturecal.local',
    });
  });
});

describe('renderFeed', () => {
  it('renders stored records with competition labels', () => {
    const store = createSqliteStore(db);
    store.events.upsert({
      identity: 'e1',
      title: 'Club Party',
      date: '2025-03-05',
      time: '',
      location: '',
      description: '',
      last_modified: '2025-01-01 00:00:00',
      created_at: '2025-01-01 00:00:00',
    });

    const output = renderFeed(store, generateDefaultConfig(), [], new Date('2025-01-01T00:00:00Z'));

    expect(output).toContain('\r\nUID:event-e1@fixturecal.local\r\n');
    expect(output).toContain('\r\nDTSTART:20250305T000000\r\n');
    expect(output).toContain('\r\nDTEND:20250305T030000\r\n');
  });
});

describe('writeFeed', () => {
  it('writes the content and leaves no temp file', () => {
    const target = path.join(dir, 'nested', 'fixtures.ics');
    const written = writeFeed(target, 'BEGIN:VCALENDAR\r\nEND:VCALENDAR\r\n');

    expect(written).toBe(target);
    expect(fs.readFileSync(target, 'utf-8')).toBe('BEGIN:VCALENDAR\r\nEND:VCALENDAR\r\n');
    expect(fs.existsSync(`${target}.tmp`)).toBe(false);
  });

  it('throws CalendarError when the target cannot be written', () => {
    const blocker = path.join(dir, 'file');
    fs.writeFileSync(blocker, 'x');
    expect(() => writeFeed(path.join(blocker, 'fixtures.ics'), 'x')).toThrow(CalendarError);
  });
});
