/**
 * iCalendar (RFC 5545 subset) rendering of the canonical tables.
 *
 * Output is a pure function of the records, the settings and the generation
 * timestamp. Entry order, property order, escaping and line folding are all
 * fixed so subscribers can diff documents between runs.
 */

import type { CanonicalEvent, CanonicalFixture } from '../reconcile/types.js';
import {
  formatLocalDateTime,
  resolveSchedule,
  scheduleInstants,
  type RecordKind,
  type ResolvedSchedule,
} from '../schedule/datetime.js';

export interface CalendarSettings {
  name: string;
  description: string;
  timezone: string;
  prodId: string;
  uidDomain: string;
}

export interface CalendarInput {
  fixtures: CanonicalFixture[];
  events: CanonicalEvent[];
  generatedAt: Date;
  settings: CalendarSettings;
  /** competition tag -> label shown in brackets; falls back to the tag. */
  competitionLabels?: Map<string, string>;
}

interface Entry {
  kind: RecordKind;
  identity: string;
  date: string;
  time: string;
  schedule: ResolvedSchedule;
  summary: string;
  description: string;
  location: string;
}

export const UNKNOWN_LOCATION = 'TBA';
const LOCATION_SEPARATOR = ' | ';
const MAX_LINE_OCTETS = 75;
const CRLF = '\r\n';
const KIND_ORDER: Record<RecordKind, number> = { fixture: 0, event: 1 };

/** Escape special characters per RFC 5545 TEXT values. */
export function escapeIcs(text: string): string {
  return text
    .replace(/\\/g, '\\\\')
    .replace(/;/g, '\\;')
    .replace(/,/g, '\\,')
    .replace(/\r?\n/g, '\\n');
}

/**
 * Fold a content line at 75 octets. Continuation lines start with a single
 * space, which counts towards their length. UTF-8 sequences are never split.
 */
export function foldLine(line: string): string {
  if (Buffer.byteLength(line, 'utf8') <= MAX_LINE_OCTETS) return line;

  const parts: string[] = [];
  let current = '';
  let currentOctets = 0;
  let limit = MAX_LINE_OCTETS;

  for (const char of line) {
    const octets = Buffer.byteLength(char, 'utf8');
    if (currentOctets + octets > limit) {
      parts.push(current);
      current = '';
      currentOctets = 0;
      limit = MAX_LINE_OCTETS - 1;
    }
    current += char;
    currentOctets += octets;
  }
  parts.push(current);

  return parts.join(`${CRLF} `);
}

/** `YYYYMMDDTHHMMSSZ` in UTC. */
export function formatStamp(date: Date): string {
  return date.toISOString().replace(/[-:]/g, '').replace(/\.\d{3}/, '');
}

export function formatLocation(address: string, mapUrl = ''): string {
  if (address && mapUrl) return `${address}${LOCATION_SEPARATOR}${mapUrl}`;
  return address || mapUrl || UNKNOWN_LOCATION;
}

function fixtureEntry(fixture: CanonicalFixture, labels: Map<string, string>): Entry | null {
  const schedule = resolveSchedule(fixture.date, fixture.time);
  if (!schedule) return null;

  const label = labels.get(fixture.competition) ?? fixture.competition;
  const lines = [label ? `[${label}]` : '', fixture.description].filter(Boolean);

  return {
    kind: 'fixture',
    identity: fixture.identity,
    date: fixture.date,
    time: fixture.time,
    schedule,
    summary: `${fixture.home} vs ${fixture.guest}`,
    description: lines.join('\n'),
    location: formatLocation(fixture.location, fixture.map_url),
  };
}

function eventEntry(event: CanonicalEvent): Entry | null {
  const schedule = resolveSchedule(event.date, event.time);
  if (!schedule) return null;

  return {
    kind: 'event',
    identity: event.identity,
    date: event.date,
    time: event.time,
    schedule,
    summary: `[EVENT] ${event.title}`,
    description: event.description,
    location: formatLocation(event.location),
  };
}

function compareEntries(a: Entry, b: Entry): number {
  if (a.date !== b.date) return a.date < b.date ? -1 : 1;
  if (a.time !== b.time) return a.time < b.time ? -1 : 1;
  if (a.kind !== b.kind) return KIND_ORDER[a.kind] - KIND_ORDER[b.kind];
  if (a.identity === b.identity) return 0;
  return a.identity < b.identity ? -1 : 1;
}

export function entryUid(kind: RecordKind, identity: string, uidDomain: string): string {
  return `${kind}-${identity}@${uidDomain}`;
}

function renderEntry(entry: Entry, stamp: string, uidDomain: string): string[] {
  const { start, end } = scheduleInstants(entry.schedule, entry.kind);
  return [
    'BEGIN:VEVENT',
    `UID:${entryUid(entry.kind, entry.identity, uidDomain)}`,
    `DTSTAMP:${stamp}`,
    `DTSTART:${formatLocalDateTime(start)}`,
    `DTEND:${formatLocalDateTime(end)}`,
    `SUMMARY:${escapeIcs(entry.summary)}`,
    `DESCRIPTION:${escapeIcs(entry.description)}`,
    `LOCATION:${escapeIcs(entry.location)}`,
    'STATUS:CONFIRMED',
    'TRANSP:OPAQUE',
    'END:VEVENT',
  ];
}

/**
 * Render every fixture and event with a valid date into one VCALENDAR.
 */
export function buildCalendar(input: CalendarInput): string {
  const { settings } = input;
  const labels = input.competitionLabels ?? new Map<string, string>();
  const stamp = formatStamp(input.generatedAt);

  const entries: Entry[] = [];
  for (const fixture of input.fixtures) {
    const entry = fixtureEntry(fixture, labels);
    if (entry) entries.push(entry);
  }
  for (const event of input.events) {
    const entry = eventEntry(event);
    if (entry) entries.push(entry);
  }
  entries.sort(compareEntries);

  const lines = [
    'BEGIN:VCALENDAR',
    'VERSION:2.0',
    `PRODID:${settings.prodId}`,
    'CALSCALE:GREGORIAN',
    'METHOD:PUBLISH',
    `X-WR-CALNAME:${escapeIcs(settings.name)}`,
    `X-WR-CALDESC:${escapeIcs(settings.description)}`,
    `X-WR-TIMEZONE:${settings.timezone}`,
  ];
  for (const entry of entries) {
    lines.push(...renderEntry(entry, stamp, settings.uidDomain));
  }
  lines.push('END:VCALENDAR');

  return lines.map(foldLine).join(CRLF) + CRLF;
}
