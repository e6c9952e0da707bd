import type { RecordKind } from '../schedule/datetime.js';

/**
 * Raw two-sided fixture as produced by a source adapter.
 */
export interface FixtureCandidate {
  kind: 'fixture';
  home: string;
  guest: string;
  date: string;
  time?: string;
  location?: string;
  result?: string;
  competition: string;
  detailRef?: string;
}

/**
 * Raw single-sided entry (club function, training camp, meeting).
 */
export interface EventCandidate {
  kind: 'event';
  title: string;
  date: string;
  time?: string;
  location?: string;
  description?: string;
}

export type CandidateRecord = FixtureCandidate | EventCandidate;

/**
 * Extra per-fixture data from the game detail page.
 */
export interface FixtureDetail {
  officials: string[];
  quarters: string[];
  venue?: string;
  mapUrl?: string;
}

/**
 * Row shape of the fixtures table.
 */
export interface CanonicalFixture {
  identity: string;
  seq: number;
  home: string;
  guest: string;
  date: string;
  time: string;
  location: string;
  /** Venue from the last successful detail lookup; '' when there was none. */
  venue: string;
  map_url: string;
  result: string;
  officials: string;
  quarters: string;
  description: string;
  competition: string;
  detail_ref: string | null;
  last_modified: string;
  created_at: string;
}

/**
 * Row shape of the events table.
 */
export interface CanonicalEvent {
  identity: string;
  seq: number;
  title: string;
  date: string;
  time: string;
  location: string;
  description: string;
  last_modified: string;
  created_at: string;
}

export const FIXTURE_MATERIAL_FIELDS = [
  'home',
  'guest',
  'date',
  'time',
  'location',
  'description',
] as const satisfies ReadonlyArray<keyof CanonicalFixture>;

export const EVENT_MATERIAL_FIELDS = [
  'title',
  'date',
  'time',
  'location',
  'description',
] as const satisfies ReadonlyArray<keyof CanonicalEvent>;

export interface FieldChange {
  field: string;
  from: string;
  to: string;
}

export interface ReconcileEntry {
  kind: RecordKind;
  identity: string;
  label: string;
  date: string;
}

export interface UpdatedEntry extends ReconcileEntry {
  changes: FieldChange[];
}

export interface ReconcileReport {
  new: ReconcileEntry[];
  updated: UpdatedEntry[];
  unchanged: ReconcileEntry[];
}
