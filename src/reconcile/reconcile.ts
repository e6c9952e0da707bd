import type { CalendarStore } from '../store/store.js';
import type {
  CandidateRecord,
  CanonicalEvent,
  CanonicalFixture,
  EventCandidate,
  FieldChange,
  FixtureCandidate,
  FixtureDetail,
  ReconcileReport,
} from './types.js';
import { EVENT_MATERIAL_FIELDS, FIXTURE_MATERIAL_FIELDS } from './types.js';
import {
  composeFixtureDescription,
  joinOfficials,
  joinQuarters,
  normalizeDescription,
} from './description.js';
import { normalizeName as defaultNormalizeName, normalizeTitle, type NameNormalizer } from '../normalize/names.js';
import { formatDate, formatTime, resolveSchedule } from '../schedule/datetime.js';
import { eventIdentity, fixtureIdentity } from '../identity/identity.js';
import { collapseWhitespace, toISO } from '../shared/utils.js';
import { errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

/**
 * Secondary per-fixture lookup (officials, quarter scores, venue).
 * Resolving to null means no detail was available.
 */
export interface DetailLookup {
  lookup(detailRef: string): Promise<FixtureDetail | null>;
}

export interface ReconcileOptions {
  normalizeName?: NameNormalizer;
  details?: DetailLookup;
  now?: () => Date;
}

interface Context {
  store: CalendarStore;
  normalizeName: NameNormalizer;
  details?: DetailLookup;
  now: () => Date;
  report: ReconcileReport;
}

type FixturePayload = Omit<CanonicalFixture, 'seq' | 'last_modified' | 'created_at'>;
type EventPayload = Omit<CanonicalEvent, 'seq' | 'last_modified' | 'created_at'>;

export function emptyReport(): ReconcileReport {
  return { new: [], updated: [], unchanged: [] };
}

/**
 * Merge a batch of candidates into the store, one at a time, and classify
 * each as new, updated or unchanged. Candidates without a usable name or date
 * are skipped. Store errors propagate; records already written stay written.
 */
export async function reconcileBatch(
  store: CalendarStore,
  candidates: CandidateRecord[],
  options: ReconcileOptions = {},
): Promise<ReconcileReport> {
  const ctx: Context = {
    store,
    normalizeName: options.normalizeName ?? defaultNormalizeName,
    details: options.details,
    now: options.now ?? (() => new Date()),
    report: emptyReport(),
  };

  for (const candidate of candidates) {
    if (candidate.kind === 'fixture') {
      await reconcileFixture(candidate, ctx);
    } else {
      reconcileEvent(candidate, ctx);
    }
  }

  return ctx.report;
}

export function hasChanges(report: ReconcileReport): boolean {
  return report.new.length > 0 || report.updated.length > 0;
}

export function diffFields<T, K extends keyof T & string>(
  stored: T,
  next: Pick<T, K>,
  fields: readonly K[],
): FieldChange[] {
  const changes: FieldChange[] = [];
  for (const field of fields) {
    const from = String(stored[field] ?? '');
    const to = String(next[field] ?? '');
    if (from !== to) changes.push({ field, from, to });
  }
  return changes;
}

// ================================================================
// Fixtures
// ================================================================

type DetailOutcome = { status: 'none' } | { status: 'ok'; detail: FixtureDetail } | { status: 'failed' };

async function lookupDetail(detailRef: string | null, ctx: Context): Promise<DetailOutcome> {
  if (!detailRef) return { status: 'none' };
  if (!ctx.details) return { status: 'failed' };

  try {
    const detail = await ctx.details.lookup(detailRef);
    return detail ? { status: 'ok', detail } : { status: 'failed' };
  } catch (err) {
    logger.warn({ detailRef, error: errorMessage(err) }, 'Detail lookup failed, using base fields');
    return { status: 'failed' };
  }
}

function buildFixturePayload(
  identity: string,
  candidate: FixtureCandidate,
  names: { home: string; guest: string },
  schedule: { date: string; time: string },
  outcome: DetailOutcome,
  existing: CanonicalFixture | undefined,
): FixturePayload {
  let venue = '';
  let mapUrl = '';
  let officials = '';
  let quarters = '';

  if (outcome.status === 'ok') {
    const { detail } = outcome;
    officials = joinOfficials(detail.officials);
    quarters = joinQuarters(detail.quarters);
    venue = collapseWhitespace(detail.venue ?? '');
    mapUrl = detail.mapUrl?.trim() ?? '';
  } else if (outcome.status === 'failed' && existing) {
    // Keep what the last successful lookup gave us.
    officials = existing.officials;
    quarters = existing.quarters;
    venue = existing.venue;
    mapUrl = existing.map_url;
  }

  const result = collapseWhitespace(candidate.result ?? '');
  const location = venue || collapseWhitespace(candidate.location ?? '');

  return {
    identity,
    home: names.home,
    guest: names.guest,
    date: schedule.date,
    time: schedule.time,
    location,
    venue,
    map_url: mapUrl,
    result,
    officials,
    quarters,
    description: composeFixtureDescription({ result, quarters, officials }),
    competition: candidate.competition.trim(),
    detail_ref: candidate.detailRef?.trim() || existing?.detail_ref || null,
  };
}

async function reconcileFixture(candidate: FixtureCandidate, ctx: Context): Promise<void> {
  const home = ctx.normalizeName(candidate.home);
  const guest = ctx.normalizeName(candidate.guest);
  if (!home || !guest) {
    logger.debug({ home: candidate.home, guest: candidate.guest }, 'Fixture skipped: no usable team name');
    return;
  }

  const resolved = resolveSchedule(candidate.date, candidate.time);
  if (!resolved) {
    logger.debug({ date: candidate.date, time: candidate.time }, 'Fixture skipped: no valid date');
    return;
  }

  const identity = fixtureIdentity(candidate.competition.trim(), home, guest);
  const existing = ctx.store.fixtures.get(identity);
  const outcome = await lookupDetail(candidate.detailRef?.trim() || null, ctx);

  const payload = buildFixturePayload(
    identity,
    candidate,
    { home, guest },
    { date: formatDate(resolved.date), time: formatTime(resolved.time) },
    outcome,
    existing,
  );
  const entry = { kind: 'fixture' as const, identity, label: `${home} vs ${guest}`, date: payload.date };
  const now = toISO(ctx.now());

  if (!existing) {
    ctx.store.fixtures.upsert({ ...payload, last_modified: now, created_at: now });
    ctx.report.new.push(entry);
    logger.debug({ identity, label: entry.label }, 'Fixture created');
    return;
  }

  const changes = diffFields(existing, payload, FIXTURE_MATERIAL_FIELDS);
  if (changes.length > 0) {
    ctx.store.fixtures.upsert({ ...payload, last_modified: now, created_at: existing.created_at });
    ctx.report.updated.push({ ...entry, changes });
    logger.debug({ identity, changes }, 'Fixture updated');
    return;
  }

  const backfill = {
    detail_ref: existing.detail_ref ?? payload.detail_ref,
    map_url: existing.map_url || payload.map_url,
    venue: existing.venue || payload.venue,
  };
  if (
    backfill.detail_ref !== existing.detail_ref ||
    backfill.map_url !== existing.map_url ||
    backfill.venue !== existing.venue
  ) {
    const { seq: _seq, ...row } = existing;
    ctx.store.fixtures.upsert({ ...row, ...backfill });
  }
  ctx.report.unchanged.push(entry);
}

// ================================================================
// Events
// ================================================================

function reconcileEvent(candidate: EventCandidate, ctx: Context): void {
  const title = normalizeTitle(candidate.title);
  if (!title) {
    logger.debug({ title: candidate.title }, 'Event skipped: empty title');
    return;
  }

  const identity = eventIdentity(title, candidate.date);
  const resolved = resolveSchedule(candidate.date, candidate.time);
  if (!resolved) {
    logger.debug({ date: candidate.date, time: candidate.time }, 'Event skipped: no valid date');
    return;
  }

  const payload: EventPayload = {
    identity,
    title,
    date: formatDate(resolved.date),
    time: formatTime(resolved.time),
    location: collapseWhitespace(candidate.location ?? ''),
    description: normalizeDescription(candidate.description),
  };
  const entry = { kind: 'event' as const, identity, label: title, date: payload.date };
  const existing = ctx.store.events.get(identity);
  const now = toISO(ctx.now());

  if (!existing) {
    ctx.store.events.upsert({ ...payload, last_modified: now, created_at: now });
    ctx.report.new.push(entry);
    return;
  }

  const changes = diffFields(existing, payload, EVENT_MATERIAL_FIELDS);
  if (changes.length > 0) {
    ctx.store.events.upsert({ ...payload, last_modified: now, created_at: existing.created_at });
    ctx.report.updated.push({ ...entry, changes });
    return;
  }

  ctx.report.unchanged.push(entry);
}

// ================================================================
// Change narrative
// ================================================================

export function describeChange(change: FieldChange): string {
  return `${change.field}: "${change.from}" -> "${change.to}"`;
}

/** One line per new or updated record, for operator change logs. */
export function formatChangeLog(report: ReconcileReport): string[] {
  const lines: string[] = [];
  for (const entry of report.new) {
    lines.push(`+ ${entry.kind} ${entry.label} (${entry.date})`);
  }
  for (const entry of report.updated) {
    const notes = entry.changes.map(describeChange).join('; ');
    lines.push(`~ ${entry.kind} ${entry.label} (${entry.date}): ${notes}`);
  }
  return lines;
}
