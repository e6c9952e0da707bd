/**
 * Date/time resolution for scraped fixture rows.
 *
 * Upstream cells come as "05.03.25, 18:30 Uhr", "5.3.2025", "2025-03-05" or an
 * empty time column. Everything resolves to floating local wall-clock values;
 * the calendar header carries the timezone.
 */

export type RecordKind = 'fixture' | 'event';

export interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

export interface TimeOfDay {
  hour: number;
  minute: number;
}

export interface ResolvedSchedule {
  date: CalendarDate;
  time: TimeOfDay | null;
}

export interface LocalDateTime extends CalendarDate, TimeOfDay {}

export const DEFAULT_DURATION_HOURS: Record<RecordKind, number> = {
  fixture: 2,
  event: 3,
};

const ISO_DATE = /(?<!\d)(\d{4})-(\d{2})-(\d{2})(?!\d)/;
const DOTTED_DATE = /(?<!\d)(\d{1,2})\.(\d{1,2})\.(\d{4}|\d{2})(?!\d)/;
const TIME = /(?<!\d)(\d{1,2}):(\d{2})(?!\d)/;

const HOUR_MS = 3_600_000;

/** Two-digit years: 00-49 are 2000s, 50-99 are 1900s. */
export function expandYear(year: number): number {
  if (year >= 100) return year;
  return year < 50 ? 2000 + year : 1900 + year;
}

function isValidDate(date: CalendarDate): boolean {
  if (date.month < 1 || date.month > 12 || date.day < 1) return false;
  const daysInMonth = new Date(Date.UTC(date.year, date.month, 0)).getUTCDate();
  return date.day <= daysInMonth;
}

export function parseDate(text: string): CalendarDate | null {
  const iso = ISO_DATE.exec(text);
  if (iso) {
    const date = { year: Number(iso[1]), month: Number(iso[2]), day: Number(iso[3]) };
    return isValidDate(date) ? date : null;
  }

  const dotted = DOTTED_DATE.exec(text);
  if (dotted) {
    const date = {
      year: expandYear(Number(dotted[3])),
      month: Number(dotted[2]),
      day: Number(dotted[1]),
    };
    return isValidDate(date) ? date : null;
  }

  return null;
}

/** Returns undefined when no time is present, null when one is present but impossible. */
export function parseTime(text: string): TimeOfDay | null | undefined {
  const match = TIME.exec(text);
  if (!match) return undefined;
  const time = { hour: Number(match[1]), minute: Number(match[2]) };
  if (time.hour > 23 || time.minute > 59) return null;
  return time;
}

/**
 * Resolve raw date and time cells. Either cell may hold both values.
 * Returns null when no valid date can be found or the time is impossible.
 */
export function resolveSchedule(
  rawDate: string | null | undefined,
  rawTime?: string | null,
): ResolvedSchedule | null {
  const dateText = rawDate?.trim() ?? '';
  const timeText = rawTime?.trim() ?? '';

  const date = parseDate(dateText) ?? parseDate(timeText);
  if (!date) return null;

  const fromTimeCell = parseTime(timeText);
  const time = fromTimeCell !== undefined ? fromTimeCell : parseTime(dateText);
  if (time === null) return null;

  return { date, time: time ?? null };
}

function pad(n: number, width = 2): string {
  return String(n).padStart(width, '0');
}

export function formatDate(date: CalendarDate): string {
  return `${pad(date.year, 4)}-${pad(date.month)}-${pad(date.day)}`;
}

export function formatTime(time: TimeOfDay | null): string {
  return time ? `${pad(time.hour)}:${pad(time.minute)}` : '';
}

function fromMillis(ms: number): LocalDateTime {
  const d = new Date(ms);
  return {
    year: d.getUTCFullYear(),
    month: d.getUTCMonth() + 1,
    day: d.getUTCDate(),
    hour: d.getUTCHours(),
    minute: d.getUTCMinutes(),
  };
}

/**
 * Start and end of a calendar entry. Missing times start at midnight; the end
 * is always start plus the default duration for the record kind.
 */
export function scheduleInstants(
  schedule: ResolvedSchedule,
  kind: RecordKind,
): { start: LocalDateTime; end: LocalDateTime } {
  const { date, time } = schedule;
  // UTC arithmetic on wall-clock values keeps DST out of the duration.
  const startMs = Date.UTC(date.year, date.month - 1, date.day, time?.hour ?? 0, time?.minute ?? 0);
  const endMs = startMs + DEFAULT_DURATION_HOURS[kind] * HOUR_MS;
  return { start: fromMillis(startMs), end: fromMillis(endMs) };
}

/** `YYYYMMDDTHHMMSS` without zone designator. */
export function formatLocalDateTime(value: LocalDateTime): string {
  return `${pad(value.year, 4)}${pad(value.month)}${pad(value.day)}T${pad(value.hour)}${pad(value.minute)}00`;
}
