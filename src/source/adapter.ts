import type { Competition } from '../shared/competitions.js';
import type { CandidateRecord } from '../reconcile/types.js';

/**
 * Source adapter interface. One implementation per upstream site.
 *
 * `fetch` never rejects: network or parse failures yield an empty list, so
 * "no fixtures" and "adapter failed softly" look the same to the caller.
 */
export interface SourceAdapter {
  type: string;
  fetch(competition: Competition): Promise<CandidateRecord[]>;
}

export interface FetchOptions {
  timeoutMs: number;
  userAgent: string;
}
