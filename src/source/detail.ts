import { JSDOM } from 'jsdom';
import type { DetailLookup } from '../reconcile/reconcile.js';
import type { FixtureDetail } from '../reconcile/types.js';
import type { FetchOptions } from './adapter.js';
import { fetchHtml } from './http.js';
import { collapseWhitespace } from '../shared/utils.js';

const OFFICIAL_LABELS = ['schiedsrichter', 'referee', 'sr'];
const QUARTER_LABELS = ['viertel', 'quarter'];
const VENUE_LABELS = ['schwimmbad', 'bad', 'ort', 'venue', 'spielort'];
const MAP_HOSTS = ['maps.google.', 'google.com/maps', 'goo.gl/maps', 'openstreetmap.org', 'maps.apple.com'];

function labelOf(text: string): string {
  return collapseWhitespace(text).replace(/:$/, '').toLowerCase();
}

function matches(label: string, candidates: string[]): boolean {
  return candidates.some((c) => label === c || label.startsWith(`${c} `) || label.startsWith(`${c}(`));
}

/**
 * Read officials, quarter scores and venue from a game page laid out as
 * label/value table rows. Returns null when the page carries none of them.
 */
export function parseGameDetail(html: string): FixtureDetail | null {
  const { document } = new JSDOM(html).window;
  const detail: FixtureDetail = { officials: [], quarters: [] };

  for (const row of Array.from(document.querySelectorAll('tr'))) {
    const cells = Array.from(row.querySelectorAll('td, th'));
    if (cells.length < 2) continue;

    const label = labelOf(cells[0]?.textContent ?? '');
    const value = collapseWhitespace(cells[1]?.textContent ?? '');
    if (!value) continue;

    if (matches(label, OFFICIAL_LABELS)) {
      detail.officials.push(...value.split(/[,;/]/).map(collapseWhitespace).filter(Boolean));
    } else if (matches(label, QUARTER_LABELS)) {
      detail.quarters.push(...(value.match(/\d+\s*:\s*\d+/g) ?? []));
    } else if (matches(label, VENUE_LABELS) && !detail.venue) {
      detail.venue = value;
    }
  }

  for (const anchor of Array.from(document.querySelectorAll('a[href]'))) {
    const href = anchor.getAttribute('href') ?? '';
    if (MAP_HOSTS.some((host) => href.includes(host))) {
      detail.mapUrl = href;
      break;
    }
  }

  const empty =
    detail.officials.length === 0 && detail.quarters.length === 0 && !detail.venue && !detail.mapUrl;
  return empty ? null : detail;
}

export class DsvDetailLookup implements DetailLookup {
  constructor(private readonly options: FetchOptions) {}

  async lookup(detailRef: string): Promise<FixtureDetail | null> {
    const html = await fetchHtml(detailRef, this.options);
    return parseGameDetail(html);
  }
}
