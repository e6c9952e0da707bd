import { describe, it, expect } from 'vitest';
import type { CanonicalEvent, CanonicalFixture } from '../../reconcile/types.js';
import {
  buildCalendar,
  entryUid,
  escapeIcs,
  foldLine,
  formatLocation,
  formatStamp,
  type CalendarInput,
  type CalendarSettings,
} from '../ics.js';

const SETTINGS: CalendarSettings = {
  name: 'Team, Fixtures',
  description: 'Games; events',
  timezone: 'Europe/Berlin',
  prodId: '-//test//fixtures//EN',
  uidDomain: 'test.local',
};

const GENERATED_AT = new Date('2025-01-02T03:04:05.678Z');

function fixture(overrides: Partial<CanonicalFixture> = {}): CanonicalFixture {
  return {
    identity: 'f1',
    seq: 1,
    home: 'FC Example',
    guest: 'SG Example',
    date: '2025-03-05',
    time: '18:30',
    location: 'Hall A',
    venue: '',
    map_url: '',
    result: '12:8',
    officials: '',
    quarters: '',
    description: 'Result: 12:8',
    competition: 'league',
    detail_ref: null,
    last_modified: '2025-01-01 00:00:00',
    created_at: '2025-01-01 00:00:00',
    ...overrides,
  };
}

function event(overrides: Partial<CanonicalEvent> = {}): CanonicalEvent {
  return {
    identity: 'e1',
    seq: 1,
    title: 'Club Party',
    date: '2025-03-05',
    time: '18:30',
    location: '',
    description: 'Bring food, drinks',
    last_modified: '2025-01-01 00:00:00',
    created_at: '2025-01-01 00:00:00',
    ...overrides,
  };
}

function input(overrides: Partial<CalendarInput> = {}): CalendarInput {
  return {
    fixtures: [fixture()],
    events: [event()],
    generatedAt: GENERATED_AT,
    settings: SETTINGS,
    competitionLabels: new Map([['league', 'League']]),
    ...overrides,
  };
}

describe('buildCalendar', () => {
  it('renders header, entries and footer with CRLF endings', () => {
    const expected = [
      'BEGIN:VCALENDAR',
      'VERSION:2.0',
      'PRODID:-//test//fixtures//EN',
      'CALSCALE:GREGORIAN',
      'METHOD:PUBLISH',
      'X-WR-CALNAME:Team\\, Fixtures',
      'X-WR-CALDESC:Games\\; events',
      'X-WR-TIMEZONE:Europe/Berlin',
      'BEGIN:VEVENT',
      'UID:fixture-f1@test.local',
      'DTSTAMP:20250102T030405Z',
      'DTSTART:20250305T183000',
      'DTEND:20250305T203000',
      'SUMMARY:FC Example vs SG Example',
      'DESCRIPTION:[League]\\nResult: 12:8',
      'LOCATION:Hall A',
      'STATUS:CONFIRMED',
      'TRANSP:OPAQUE',
      'END:VEVENT',
      'BEGIN:VEVENT',
      'UID:event-e1@test.local',
      'DTSTAMP:20250102T030405Z',
      'DTSTART:20250305T183000',
      'DTEND:20250305T213000',
      'SUMMARY:[EVENT] Club Party',
      'DESCRIPTION:Bring food\\, drinks',
      'LOCATION:TBA',
      'STATUS:CONFIRMED',
      'TRANSP:OPAQUE',
      'END:VEVENT',
      'END:VCALENDAR',
    ];

    expect(buildCalendar(input())).toBe(expected.join('\r\n') + '\r\n');
  });

  it('is byte-identical for the same input and timestamp', () => {
    expect(buildCalendar(input())).toBe(buildCalendar(input()));
  });

  it('does not depend on input order', () => {
    const a = fixture({ identity: 'a', date: '2025-03-06' });
    const b = fixture({ identity: 'b', date: '2025-03-05' });
    expect(buildCalendar(input({ fixtures: [a, b] }))).toBe(buildCalendar(input({ fixtures: [b, a] })));
  });

  it('sorts by date and time, untimed first', () => {
    const output = buildCalendar(
      input({
        fixtures: [
          fixture({ identity: 'late', date: '2025-03-06', time: '10:00' }),
          fixture({ identity: 'untimed', date: '2025-03-05', time: '' }),
          fixture({ identity: 'evening', date: '2025-03-05', time: '18:30' }),
        ],
        events: [],
      }),
    );

    const uids = output.split('\r\n').filter((line) => line.startsWith('UID:'));
    expect(uids).toEqual([
      'UID:fixture-untimed@test.local',
      'UID:fixture-evening@test.local',
      'UID:fixture-late@test.local',
    ]);
  });

  it('skips records whose date does not parse', () => {
    const output = buildCalendar(input({ fixtures: [fixture({ date: 'unknown' })], events: [] }));
    expect(output).toBe(
      [
        'BEGIN:VCALENDAR',
        'VERSION:2.0',
        'PRODID:-//test//fixtures//EN',
        'CALSCALE:GREGORIAN',
        'METHOD:PUBLISH',
        'X-WR-CALNAME:Team\\, Fixtures',
        'X-WR-CALDESC:Games\\; events',
        'X-WR-TIMEZONE:Europe/Berlin',
        'END:VCALENDAR',
        '',
      ].join('\r\n'),
    );
  });

  it('falls back to the competition tag when no label is known', () => {
    const output = buildCalendar(
      input({ fixtures: [fixture({ competition: 'manual', description: '' })], events: [] }),
    );
    expect(output).toContain('\r\nDESCRIPTION:[manual]\r\n');
  });

  it('joins address and map link in LOCATION', () => {
    const output = buildCalendar(
      input({ fixtures: [fixture({ map_url: 'https://maps.example/x' })], events: [] }),
    );
    expect(output).toContain('\r\nLOCATION:Hall A | https://maps.example/x\r\n');
  });
});

describe('escapeIcs', () => {
  it('escapes backslash, semicolon, comma and newlines', () => {
    expect(escapeIcs('a\\b;c,d\ne\r\nf')).toBe('a\\\\b\\;c\\,d\\ne\\nf');
  });
});

describe('foldLine', () => {
  it('leaves short lines alone', () => {
    expect(foldLine('SUMMARY:short')).toBe('SUMMARY:short');
  });

  it('folds at 75 octets with a leading space on continuations', () => {
    const line = `DESCRIPTION:${'a'.repeat(100)}`;
    const folded = foldLine(line);
    expect(folded).toBe(`${line.slice(0, 75)}\r\n ${line.slice(75)}`);
  });

  it('never splits a multi-byte character', () => {
    const folded = foldLine('ü'.repeat(40));
    expect(folded).toBe(`${'ü'.repeat(37)}\r\n ${'ü'.repeat(3)}`);
  });

  it('keeps continuation lines within 75 octets', () => {
    const folded = foldLine('x'.repeat(300));
    for (const part of folded.split('\r\n')) {
      expect(Buffer.byteLength(part, 'utf8')).toBeLessThanOrEqual(75);
    }
    expect(folded.split('\r\n').map((p, i) => (i === 0 ? p : p.slice(1))).join('')).toBe('x'.repeat(300));
  });
});

describe('formatStamp', () => {
  it('formats UTC without separators or milliseconds', () => {
    expect(formatStamp(GENERATED_AT)).toBe('20250102T030405Z');
  });
});

describe('formatLocation', () => {
  it('uses whatever is available', () => {
    expect(formatLocation('Hall A', 'https://m')).toBe('Hall A | https://m');
    expect(formatLocation('', 'https://m')).toBe('https://m');
    expect(formatLocation('Hall A')).toBe('Hall A');
    expect(formatLocation('')).toBe('TBA');
  });
});

describe('entryUid', () => {
  it('prefixes kind and appends the domain', () => {
    expect(entryUid('fixture', 'abc', 'test.local')).toBe('fixture-abc@test.local');
  });
});
