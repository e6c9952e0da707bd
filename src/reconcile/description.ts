import { collapseWhitespace } from '../shared/utils.js';

export interface FixtureDescriptionParts {
  result: string;
  quarters: string;
  officials: string;
}

export function joinOfficials(officials: string[]): string {
  return officials.map(collapseWhitespace).filter(Boolean).join(', ');
}

export function joinQuarters(quarters: string[]): string {
  return quarters.map((q) => q.replace(/\s+/g, '')).filter(Boolean).join(' ');
}

/**
 * The one place a fixture description is built. Sub-fields are expected to be
 * whitespace-normalized already; empty ones are left out.
 */
export function composeFixtureDescription(parts: FixtureDescriptionParts): string {
  const lines: string[] = [];
  if (parts.result) lines.push(`Result: ${parts.result}`);
  if (parts.quarters) lines.push(`Quarters: ${parts.quarters}`);
  if (parts.officials) lines.push(`Officials: ${parts.officials}`);
  return lines.join('\n');
}

/** Free-text event description: each line tidied, blank lines dropped. */
export function normalizeDescription(raw: string | undefined): string {
  if (!raw) return '';
  return raw
    .split(/\r?\n/)
    .map(collapseWhitespace)
    .filter(Boolean)
    .join('\n');
}
