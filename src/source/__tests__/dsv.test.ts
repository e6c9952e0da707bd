import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { DsvAdapter, buildLeagueUrl, parseLeagueTable } from '../dsv.js';
import type { Competition } from '../../shared/competitions.js';

const BASE_URL = 'https://league.example/Modules/WB/League.aspx';
const PAGE_URL = `${BASE_URL}?Season=2025&LeagueID=12&Group=&LeagueKind=L`;

const LEAGUE_HTML = `<!DOCTYPE html>
<html><body>
<table>
  <tr><th>Nr</th><th>Datum</th><th></th><th>Heim</th><th></th><th>Gast</th><th>Ort</th><th>Ergebnis</th><th>Viertel</th></tr>
  <tr>
    <td>101</td><td>05.03.25, 18:30 Uhr</td><td>-</td><td>SG Example</td><td>-</td><td>FC Example</td>
    <td>Hall A</td><td><a href="Game.aspx?GameID=101">12:8</a></td><td>3:2</td>
  </tr>
  <tr>
    <td>102</td><td>12.03.25, 19:00 Uhr</td><td>-</td><td>SV Placeholder</td><td>-</td><td>FC Other</td>
    <td>Pool B</td><td></td><td></td>
  </tr>
  <tr>
    <td>103</td><td>19.03.25</td><td>-</td><td>SV Placeholder</td><td>-</td><td>sg example II</td>
    <td>  Pool   C </td><td> - </td><td></td>
  </tr>
  <tr><td colspan="9">Standings</td></tr>
</table>
</body></html>`;

function makeCompetition(overrides: Partial<Competition> = {}): Competition {
  return {
    id: 'league',
    label: 'League',
    season: 2025,
    league_id: 12,
    group: '',
    kind: 'L',
    ...overrides,
  };
}

describe('buildLeagueUrl', () => {
  it('adds the league query parameters', () => {
    expect(buildLeagueUrl(BASE_URL, makeCompetition())).toBe(PAGE_URL);
  });

  it('encodes the group', () => {
    const url = new URL(buildLeagueUrl(BASE_URL, makeCompetition({ group: 'North A' })));
    expect(url.searchParams.get('Group')).toBe('North A');
  });
});

describe('parseLeagueTable', () => {
  it('keeps only numbered rows that involve the club', () => {
    const fixtures = parseLeagueTable(LEAGUE_HTML, {
      club: 'SG Example',
      competition: 'league',
      pageUrl: PAGE_URL,
    });

    expect(fixtures).toEqual([
      {
        kind: 'fixture',
        home: 'SG Example',
        guest: 'FC Example',
        date: '05.03.25, 18:30 Uhr',
        location: 'Hall A',
        result: '12:8',
        competition: 'league',
        detailRef: 'https://league.example/Modules/WB/Game.aspx?GameID=101',
      },
      {
        kind: 'fixture',
        home: 'SV Placeholder',
        guest: 'sg example II',
        date: '19.03.25',
        location: 'Pool C',
        result: '-',
        competition: 'league',
        detailRef: undefined,
      },
    ]);
  });

  it('returns nothing for a page without a table', () => {
    expect(
      parseLeagueTable('<p>Maintenance</p>', { club: 'SG Example', competition: 'league', pageUrl: PAGE_URL }),
    ).toEqual([]);
  });
});

describe('DsvAdapter', () => {
  const originalFetch = globalThis.fetch;

  beforeEach(() => {
    vi.restoreAllMocks();
  });

  afterEach(() => {
    globalThis.fetch = originalFetch;
  });

  function makeAdapter(): DsvAdapter {
    return new DsvAdapter({
      baseUrl: BASE_URL,
      club: 'SG Example',
      timeoutMs: 1000,
      userAgent: 'fixturecal-test',
    });
  }

  it('fetches the league page and parses it', async () => {
    const fetchMock = vi.fn().mockResolvedValue(new Response(LEAGUE_HTML, { status: 200 }));
    globalThis.fetch = fetchMock;

    const fixtures = await makeAdapter().fetch(makeCompetition());

    expect(fixtures).toHaveLength(2);
    expect(fetchMock).toHaveBeenCalledWith(
      PAGE_URL,
      expect.objectContaining({
        headers: expect.objectContaining({ 'User-Agent': 'fixturecal-test' }),
      }),
    );
  });

  it('returns an empty list on HTTP errors', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(new Response('Server error', { status: 500 }));
    expect(await makeAdapter().fetch(makeCompetition())).toEqual([]);
  });

  it('returns an empty list on network errors', async () => {
    globalThis.fetch = vi.fn().mockRejectedValue(new Error('ECONNREFUSED'));
    expect(await makeAdapter().fetch(makeCompetition())).toEqual([]);
  });
});
