import { JSDOM } from 'jsdom';
import type { Competition } from '../shared/competitions.js';
import type { FixtureCandidate } from '../reconcile/types.js';
import type { FetchOptions, SourceAdapter } from './adapter.js';
import { fetchHtml } from './http.js';
import { collapseWhitespace } from '../shared/utils.js';
import { errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

// League table layout:
// [game no, date/time, -, home, -, guest, location, result (link to game page), quarters]
const COL_GAME_NO = 0;
const COL_DATE = 1;
const COL_HOME = 3;
const COL_GUEST = 5;
const COL_LOCATION = 6;
const COL_RESULT = 7;
const MIN_CELLS = 8;

export interface DsvAdapterOptions extends FetchOptions {
  baseUrl: string;
  club: string;
}

export function buildLeagueUrl(baseUrl: string, competition: Competition): string {
  const url = new URL(baseUrl);
  url.searchParams.set('Season', String(competition.season));
  url.searchParams.set('LeagueID', String(competition.league_id));
  url.searchParams.set('Group', competition.group);
  url.searchParams.set('LeagueKind', competition.kind);
  return url.toString();
}

function cellText(el: Element | null | undefined): string {
  return collapseWhitespace(el?.textContent ?? '');
}

function resolveHref(href: string | null, pageUrl: string): string | undefined {
  if (!href) return undefined;
  try {
    return new URL(href, pageUrl).toString();
  } catch {
    logger.debug({ href }, 'Ignoring unresolvable result link');
    return undefined;
  }
}

/**
 * Pull the club's games out of a league page. Rows without a numeric game
 * number (headers, standings) and games of other clubs are ignored.
 */
export function parseLeagueTable(
  html: string,
  opts: { club: string; competition: string; pageUrl: string },
): FixtureCandidate[] {
  const { document } = new JSDOM(html).window;
  const club = opts.club.toLowerCase();
  const fixtures: FixtureCandidate[] = [];

  for (const row of Array.from(document.querySelectorAll('table tr'))) {
    const cells = Array.from(row.querySelectorAll('td, th'));
    if (cells.length < MIN_CELLS) continue;
    if (!/^\d+$/.test(cellText(cells[COL_GAME_NO]))) continue;

    const home = cellText(cells[COL_HOME]);
    const guest = cellText(cells[COL_GUEST]);
    if (!home.toLowerCase().includes(club) && !guest.toLowerCase().includes(club)) continue;

    const resultCell = cells[COL_RESULT];
    const link = resultCell?.querySelector('a') ?? null;

    fixtures.push({
      kind: 'fixture',
      home,
      guest,
      date: cellText(cells[COL_DATE]),
      location: cellText(cells[COL_LOCATION]),
      result: link ? cellText(link) : cellText(resultCell),
      competition: opts.competition,
      detailRef: resolveHref(link?.getAttribute('href') ?? null, opts.pageUrl),
    });
  }

  return fixtures;
}

export class DsvAdapter implements SourceAdapter {
  readonly type = 'dsv';

  constructor(private readonly options: DsvAdapterOptions) {}

  async fetch(competition: Competition): Promise<FixtureCandidate[]> {
    const pageUrl = buildLeagueUrl(this.options.baseUrl, competition);
    try {
      const html = await fetchHtml(pageUrl, this.options);
      const fixtures = parseLeagueTable(html, {
        club: this.options.club,
        competition: competition.id,
        pageUrl,
      });
      logger.debug({ competition: competition.id, count: fixtures.length }, 'League table parsed');
      return fixtures;
    } catch (err) {
      logger.warn(
        { competition: competition.id, url: pageUrl, error: errorMessage(err) },
        'League fetch failed',
      );
      return [];
    }
  }
}
