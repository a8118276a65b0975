import { AxiosInstance } from 'axios';
import { HtmlPageClient, PageSource, parseHtmlPage } from '../../../integrations/shared/html-page.client';
import { RequestThrottle } from '../../../integrations/shared/request-throttle';
import {
  currentSeason,
  LeagueSiteProvider,
} from '../../../integrations/league-site/league-site-provider';
import {
  leadersPageUrl,
  leagueSitePlayerId,
  parseBattingRows,
  parsePitchingRows,
  parseStandingsRows,
  standingsPageUrl,
  teamPageUrl,
} from '../../../integrations/league-site/league-site.pages';
import { NOT_FOUND } from '../../../integrations/shared/source-provider.types';
import { TransportFailureException } from '../../../utils/exceptions';
import {
  BASE_URL,
  battingCells,
  FakePages,
  pageHtml,
  pitchingCells,
  tableRow,
} from '../../fixtures/league-site-pages';
import { flush, ManualClock } from '../../fixtures/manual-clock';

jest.mock('../../../config/logger.config', () => ({
  logger: { warn: jest.fn(), info: jest.fn(), debug: jest.fn(), error: jest.fn() },
}));

const MURAKAMI_HREF = '/bis/eng/players/11115555.html';

// ---------------------------------------------------------------------------
// Providers
// ---------------------------------------------------------------------------

function makeProvider(pages: PageSource, cutoffYear = 2023) {
  return new LeagueSiteProvider({
    pages,
    baseUrl: `${BASE_URL}/`,
    cutoffYear,
    now: () => new Date(2024, 5, 1),
  });
}

// ---------------------------------------------------------------------------
// Page parsing
// ---------------------------------------------------------------------------

describe('league site pages', () => {
  it('builds page urls from season, league and team code', () => {
    expect(leadersPageUrl(BASE_URL, 2024, 'pacific', 'pitching')).toBe(
      'https://league.test/bis/eng/2024/stats/pit_p.html'
    );
    expect(teamPageUrl(BASE_URL, 2024, 's', 'batting')).toBe('https://league.test/bis/eng/2024/stats/idb1_s.html');
    expect(standingsPageUrl(BASE_URL, 2024, 'central')).toBe(
      'https://league.test/bis/eng/2024/standings/std_c.html'
    );
  });

  it('reads batting counts by position on leaders pages', () => {
    const page = parseHtmlPage(
      pageHtml([tableRow(battingCells('Murakami, Munetaka', 120, 'Yakult'), MURAKAMI_HREF)]),
      'x'
    );

    const [row] = parseBattingRows(page, 'leaders');

    expect(row.teamText).toBe('Yakult');
    expect(row.games).toBe(120);
    expect(row.counts).toEqual({
      plateAppearances: 520,
      atBats: 500,
      runs: 80,
      hits: 150,
      doubles: 30,
      triples: 2,
      homeRuns: 20,
      rbi: 90,
      stolenBases: 10,
      caughtStealing: 3,
      walks: 50,
      hitByPitch: 4,
      sacrificeFlies: 6,
      strikeouts: 100,
    });
  });

  it('skips rows whose games cell is not an integer', () => {
    const totals = battingCells('Team Total', 0);
    totals[2] = 'Total';
    const page = parseHtmlPage(pageHtml([tableRow(totals), tableRow(battingCells('Sato, Kenji', 40))]), 'x');

    expect(parseBattingRows(page, 'team').map((row) => row.player.name)).toEqual(['Sato, Kenji']);
  });

  it('reads innings from the split whole and fraction cells', () => {
    const page = parseHtmlPage(pageHtml([tableRow(pitchingCells('Sato, Kenji'))]), 'x');

    const [row] = parsePitchingRows(page, 'team');

    expect(row.teamText).toBeNull();
    expect(row.counts.outsRecorded).toBe(542);
    expect(row.counts.earnedRuns).toBe(55);
    expect(row.counts.strikeouts).toBe(170);
  });

  it('reads standings rows with the leader at zero games behind', () => {
    const page = parseHtmlPage(
      pageHtml([
        tableRow(['1', 'Yomiuri Giants', '143', '80', '60', '3', '.571', '-']),
        tableRow(['2', 'Hanshin Tigers', '143', '75', '65', '3', '.536', '5.0']),
      ]),
      'x'
    );

    const rows = parseStandingsRows(page);

    expect(rows.map((row) => [row.teamText, row.winningPercentage, row.gamesBehind])).toEqual([
      ['Yomiuri Giants', 0.571, 0],
      ['Hanshin Tigers', 0.536, 5],
    ]);
  });

  it('derives ids from player page links, falling back to the name slug', () => {
    expect(leagueSitePlayerId({ name: 'Murakami, Munetaka', link: { href: MURAKAMI_HREF, text: '' } })).toBe(
      'npb-11115555'
    );
    expect(leagueSitePlayerId({ name: 'X', link: { href: '/players/detail?id=42', text: '' } })).toBe('npb-42');
    expect(leagueSitePlayerId({ name: 'Sato, Kenji', link: null })).toBe('npb-kenzi-sato');
  });
});

describe('currentSeason', () => {
  it('stays on the previous season until March', () => {
    expect(currentSeason(new Date(2025, 0, 15))).toBe(2024);
    expect(currentSeason(new Date(2025, 2, 1))).toBe(2025);
  });
});

// ---------------------------------------------------------------------------
// Provider
// ---------------------------------------------------------------------------

describe('LeagueSiteProvider', () => {
  const centralBatting2024 = leadersPageUrl(BASE_URL, 2024, 'central', 'batting');
  const centralBatting2023 = leadersPageUrl(BASE_URL, 2023, 'central', 'batting');

  describe('searchPlayer', () => {
    it('scans the leaders pages of the current and prior season', async () => {
      const pages = new FakePages({
        [centralBatting2024]: pageHtml([
          tableRow(battingCells('Murakami, Munetaka', 120, 'Yakult'), MURAKAMI_HREF),
          tableRow(battingCells('Okamoto, Kazuma', 130, 'Yomiuri'), '/bis/eng/players/22226666.html'),
        ]),
      });

      const players = await makeProvider(pages).searchPlayer('Murakami');

      expect(pages.requested).toHaveLength(8);
      expect(players).toEqual([
        {
          id: 'npb-11115555',
          nameEnglish: 'Munetaka Murakami',
          nameJapanese: null,
          sourceIds: { league_site: 'npb-11115555' },
          team: { id: 'swallows', name: 'Tokyo Yakult Swallows', league: 'central' },
          jerseyNumber: null,
          position: null,
          disambiguationHints: { league_site: '2024 Tokyo Yakult Swallows, batter' },
          source: 'league_site',
        },
      ]);
    });

    it('scans only the hinted seasons the site covers', async () => {
      const pages = new FakePages();

      await makeProvider(pages).searchPlayer('Murakami', { seasons: [2020, 2024, 2024, 2030] });

      expect(pages.requested).toEqual([
        leadersPageUrl(BASE_URL, 2024, 'central', 'batting'),
        leadersPageUrl(BASE_URL, 2024, 'central', 'pitching'),
        leadersPageUrl(BASE_URL, 2024, 'pacific', 'batting'),
        leadersPageUrl(BASE_URL, 2024, 'pacific', 'pitching'),
      ]);
    });

    it('fetches nothing when no hinted season is covered', async () => {
      const pages = new FakePages();

      await expect(makeProvider(pages).searchPlayer('Murakami', { seasons: [2010] })).resolves.toEqual([]);
      expect(pages.requested).toEqual([]);
    });

    it('returns nothing for a blank query without fetching', async () => {
      const pages = new FakePages();

      await expect(makeProvider(pages).searchPlayer('   ')).resolves.toEqual([]);
      expect(pages.requested).toEqual([]);
    });
  });

  describe('getPlayerStats', () => {
    it('answers NotFound for ids outside its namespace without fetching', async () => {
      const pages = new FakePages();

      await expect(makeProvider(pages).getPlayerStats('hist-0001', { statsType: 'batting' })).resolves.toBe(
        NOT_FOUND
      );
      expect(pages.requested).toEqual([]);
    });

    it('finds a season on the leaders pages', async () => {
      const pages = new FakePages({
        [centralBatting2024]: pageHtml([
          tableRow(battingCells('Murakami, Munetaka', 120, 'Yakult'), MURAKAMI_HREF),
        ]),
      });

      const result = await makeProvider(pages).getPlayerStats('npb-11115555', {
        season: 2024,
        statsType: 'batting',
      });

      expect(result.kind).toBe('season');
      if (result.kind !== 'season') return;
      expect(result.stats.season).toBe(2024);
      expect(result.stats.statsType === 'batting' && result.stats.homeRuns).toBe(20);
      expect(result.stats.statsType === 'batting' && result.stats.battingAverage).toBe(0.3);
      expect(result.stats.team?.id).toBe('swallows');
      expect(pages.requested).toHaveLength(2);
    });

    it('falls back to the team pages for players below the qualifying line', async () => {
      const pages = new FakePages({
        [teamPageUrl(BASE_URL, 2024, 's', 'batting')]: pageHtml([
          tableRow(battingCells('Murakami, Munetaka', 30), MURAKAMI_HREF),
        ]),
      });

      const result = await makeProvider(pages).getPlayerStats('npb-11115555', {
        season: 2024,
        statsType: 'batting',
      });

      expect(pages.requested).toHaveLength(14);
      expect(result.kind).toBe('season');
      if (result.kind !== 'season') return;
      expect(result.stats.games).toBe(30);
      expect(result.stats.team).toEqual({ id: 'swallows', name: 'Tokyo Yakult Swallows', league: 'central' });
    });

    it('answers NotFound when no page lists the player', async () => {
      const result = await makeProvider(new FakePages()).getPlayerStats('npb-11115555', {
        season: 2024,
        statsType: 'batting',
      });

      expect(result).toBe(NOT_FOUND);
    });

    it('builds a career from every season since the cutoff', async () => {
      const pages = new FakePages({
        [centralBatting2023]: pageHtml([
          tableRow(battingCells('Murakami, Munetaka', 100, 'Yakult'), MURAKAMI_HREF),
        ]),
        [centralBatting2024]: pageHtml([
          tableRow(battingCells('Murakami, Munetaka', 120, 'Yakult'), MURAKAMI_HREF),
        ]),
      });

      const result = await makeProvider(pages).getPlayerStats('npb-11115555', { statsType: 'batting' });

      expect(result.kind).toBe('career');
      if (result.kind !== 'career') return;
      expect(result.seasons.map((row) => row.season)).toEqual([2023, 2024]);
      expect(result.totals.season).toBeNull();
      expect(result.totals.games).toBe(220);
      expect(result.totals.statsType === 'batting' && result.totals.homeRuns).toBe(40);
      expect(result.storedTotals).toBeNull();
      expect(result.player?.disambiguationHints.league_site).toBe('2024 Tokyo Yakult Swallows, batter');
    });

    it('joins unlinked rows of the same name into one career', async () => {
      const pages = new FakePages({
        [centralBatting2023]: pageHtml([tableRow(battingCells('Sato, Kenji', 100, 'Yakult'))]),
        [centralBatting2024]: pageHtml([tableRow(battingCells('Sato, Kenji', 120, 'Yomiuri'))]),
      });

      const result = await makeProvider(pages).getPlayerStats('npb-kenzi-sato', { statsType: 'batting' });

      expect(result.kind).toBe('career');
      if (result.kind !== 'career') return;
      expect(result.seasons.map((row) => [row.season, row.team?.id])).toEqual([
        [2023, 'swallows'],
        [2024, 'giants'],
      ]);
      expect(result.totals.games).toBe(220);
    });

    it('propagates transport failures', async () => {
      const pages: PageSource = {
        fetchPage: jest.fn().mockRejectedValue(TransportFailureException.timeout('league_site', 'x')),
      };

      await expect(
        makeProvider(pages).getPlayerStats('npb-11115555', { season: 2024, statsType: 'batting' })
      ).rejects.toBeInstanceOf(TransportFailureException);
    });
  });

  describe('scan cancellation', () => {
    it('stops the queued pages of a scan once one page fails', async () => {
      const clock = new ManualClock();
      const get = jest.fn().mockRejectedValue(
        Object.assign(new Error('Request failed with status code 403'), {
          isAxiosError: true,
          response: { status: 403 },
        })
      );
      const pages = new HtmlPageClient({
        source: 'league_site',
        throttle: new RequestThrottle(1000, clock),
        http: { get } as unknown as AxiosInstance,
        sleep: jest.fn().mockResolvedValue(undefined),
      });

      await expect(
        makeProvider(pages, 2020).getPlayerStats('npb-11115555', { statsType: 'batting' })
      ).rejects.toBeInstanceOf(TransportFailureException);
      expect(get).toHaveBeenCalledTimes(1);
      expect(clock.pending).toBe(0);

      clock.release();
      await flush();
      expect(get).toHaveBeenCalledTimes(1);
    });
  });

  describe('getTeamRoster', () => {
    it('lists the batters and pitchers on the team pages', async () => {
      const pages = new FakePages({
        [teamPageUrl(BASE_URL, 2024, 's', 'batting')]: pageHtml([
          tableRow(battingCells('Murakami, Munetaka', 120), MURAKAMI_HREF),
        ]),
        [teamPageUrl(BASE_URL, 2024, 's', 'pitching')]: pageHtml([
          tableRow(pitchingCells('Ogawa, Yasuhiro'), '/bis/eng/players/33337777.html'),
        ]),
      });

      const roster = await makeProvider(pages).getTeamRoster('swallows', 2024);

      expect(roster.map((player) => [player.id, player.position])).toEqual([
        ['npb-11115555', null],
        ['npb-33337777', 'P'],
      ]);
    });

    it('returns an empty roster for an unknown team', async () => {
      await expect(makeProvider(new FakePages()).getTeamRoster('nobody', 2024)).resolves.toEqual([]);
    });
  });

  it('lists the twelve franchises', async () => {
    const teams = await makeProvider(new FakePages()).getTeams();
    expect(teams).toHaveLength(12);
  });

  it('reads the standings of the requested league', async () => {
    const pages = new FakePages({
      [standingsPageUrl(BASE_URL, 2024, 'central')]: pageHtml([
        tableRow(['1', 'Yomiuri Giants', '143', '80', '60', '3', '.571', '-']),
      ]),
    });

    const result = await makeProvider(pages).getStandings({ season: 2024, league: 'central' });

    expect(result.kind).toBe('standings');
    if (result.kind !== 'standings') return;
    expect(result.standings).toHaveLength(1);
    expect(result.standings[0].league).toBe('central');
    expect(result.standings[0].rows[0]).toEqual({
      rank: 1,
      team: { id: 'giants', name: 'Yomiuri Giants', league: 'central' },
      games: 143,
      wins: 80,
      losses: 60,
      ties: 3,
      winningPercentage: 0.571,
      gamesBehind: 0,
    });
  });

  describe('healthCheck', () => {
    it('is healthy when the current leaders page loads', async () => {
      const pages = new FakePages({ [centralBatting2024]: pageHtml([]) });
      await expect(makeProvider(pages).healthCheck()).resolves.toBe(true);
    });

    it('reports a failed fetch as unhealthy', async () => {
      const pages: PageSource = { fetchPage: jest.fn().mockRejectedValue(new Error('offline')) };
      await expect(makeProvider(pages).healthCheck()).resolves.toBe(false);
    });
  });
});
