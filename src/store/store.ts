import type { CanonicalEvent, CanonicalFixture } from '../reconcile/types.js';

/**
 * Minimal keyed repository the reconciler and synthesizer work against.
 * `seq` is a display ordinal owned by the store.
 */
export interface RecordStore<T extends { identity: string; seq: number }> {
  get(identity: string): T | undefined;
  upsert(record: Omit<T, 'seq'>): T;
  /** Ordered by date, then time. */
  listAll(): T[];
  /** Removes the records and renumbers the rest 1..n. Returns how many were removed. */
  deleteAndRenumber(identities: string[]): number;
}

export interface CalendarStore {
  fixtures: RecordStore<CanonicalFixture>;
  events: RecordStore<CanonicalEvent>;
}
