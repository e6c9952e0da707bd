import { sha1 } from '../shared/utils.js';

// Field order and separator are part of the stored identity. Changing either
// re-keys every canonical record.
const SEPARATOR = '\u001f';

/**
 * Identity of a two-sided fixture. Names must already be normalized.
 */
export function fixtureIdentity(competition: string, home: string, guest: string): string {
  return sha1(['fixture', competition, home, guest].join(SEPARATOR));
}

/**
 * Identity of a single-sided event, keyed on the raw date text as scraped
 * (trimmed), not on the resolved date.
 */
export function eventIdentity(title: string, rawDate: string): string {
  return sha1(['event', title, rawDate.trim()].join(SEPARATOR));
}
