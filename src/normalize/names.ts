import type { ClubAlias } from '../shared/config.js';
import { collapseWhitespace } from '../shared/utils.js';

// Row numbers and stray punctuation that leak into name cells ("12. ", "3) ").
const LEADING_NOISE = /^[\p{N}\p{P}\p{S}\s]+/u;
const TEAM_SUFFIX = /\s+(I{1,3})$/;
const YEAR_TOKEN = /(^|\s)\d{4}(?=\s|$)/g;

export type NameNormalizer = (raw: string) => string;

interface AliasIndex {
  byVariant: Map<string, string>;
}

function buildAliasIndex(aliases: ClubAlias[]): AliasIndex {
  const byVariant = new Map<string, string>();
  for (const alias of aliases) {
    const canonical = collapseWhitespace(alias.canonical);
    byVariant.set(canonical.toLowerCase(), canonical);
    for (const variant of alias.variants) {
      byVariant.set(collapseWhitespace(variant).toLowerCase(), canonical);
    }
  }
  return { byVariant };
}

function splitSuffix(name: string): { base: string; suffix: string } {
  const match = TEAM_SUFFIX.exec(name);
  if (!match) return { base: name, suffix: '' };
  return { base: name.slice(0, match.index), suffix: match[1] ?? '' };
}

/**
 * Build a team-name normalizer bound to a club alias table.
 *
 * Applies, in order: an exact alias match, leading row-number stripping,
 * whitespace collapsing, alias mapping (keeping an I/II/III team suffix) and,
 * for names without an alias, removal of 4-digit founding years. Returns '' when nothing usable is
 * left. Normalizing an already normalized name returns it unchanged.
 */
export function createNameNormalizer(aliases: ClubAlias[] = []): NameNormalizer {
  const index = buildAliasIndex(aliases);

  return (raw: string): string => {
    // Canonical spellings may start with a digit ("1. FC ..."); match them before stripping.
    const direct = applyAlias(index, collapseWhitespace(raw));
    if (direct) return direct;

    const stripped = collapseWhitespace(raw.replace(LEADING_NOISE, ''));
    if (!stripped || /^\d+$/.test(stripped)) return '';

    const aliased = applyAlias(index, stripped);
    if (aliased) return aliased;

    const withoutYears = collapseWhitespace(stripped.replace(YEAR_TOKEN, ' '));
    if (!withoutYears || /^\d+$/.test(withoutYears)) return '';
    return applyAlias(index, withoutYears) ?? withoutYears;
  };
}

function applyAlias(index: AliasIndex, name: string): string | undefined {
  const { base, suffix } = splitSuffix(name);
  const canonical = index.byVariant.get(base.toLowerCase());
  if (!canonical) return undefined;
  return suffix ? `${canonical} ${suffix}` : canonical;
}

export const normalizeName: NameNormalizer = createNameNormalizer();

/** Event titles only get their whitespace tidied. */
export function normalizeTitle(raw: string): string {
  return collapseWhitespace(raw);
}
