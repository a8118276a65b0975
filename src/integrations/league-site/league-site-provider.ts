import { logger } from '../../config/logger.config';
import {
  findFranchiseById,
  findFranchiseByName,
  FRANCHISES,
  FranchiseDefinition,
  listTeams,
  teamRefFromText,
  toTeamRef,
} from '../../constants/teams';
import {
  League,
  LeagueStandings,
  Player,
  SOURCE,
  SeasonStats,
  StatsType,
  Team,
  TeamRef,
} from '../../domain/model/canonical.types';
import { matchName } from '../../domain/names/name-resolver';
import {
  collapseSeasons,
  combineSameSeason,
  computeCareerTotals,
  createBattingStats,
  createPitchingStats,
} from '../../domain/stats/season-stats';
import { HtmlPage, PageSource } from '../shared/html-page.client';
import { SourceProvider } from '../shared/source-provider.interface';
import {
  NOT_FOUND,
  PlayerSearchOptions,
  PlayerStatsResult,
  RequestOptions,
  StandingsQuery,
  StandingsResult,
  StatsQuery,
} from '../shared/source-provider.types';
import {
  BattingPageRow,
  displayName,
  LEAGUE_SITE_ID_PREFIX,
  LEAGUES,
  leadersPageUrl,
  leagueSitePlayerId,
  PageLayout,
  parseBattingRows,
  parsePitchingRows,
  parseStandingsRows,
  PitchingPageRow,
  standingsPageUrl,
  teamPageUrl,
} from './league-site.pages';

/**
 * Season the site currently publishes: the calendar year, or the previous
 * year in January and February before a new season's pages exist.
 */
export function currentSeason(now: Date = new Date()): number {
  return now.getMonth() < 2 ? now.getFullYear() - 1 : now.getFullYear();
}

export interface LeagueSiteProviderOptions {
  pages: PageSource;
  baseUrl: string;
  /** First season the site is consulted for */
  cutoffYear: number;
  now?: () => Date;
}

type PageRow = BattingPageRow | PitchingPageRow;

interface PageContext {
  season: number;
  league: League | null;
  /** Team of every row on a team page; null to read the row's team column */
  team: TeamRef | null;
}

type LocatedRow = {
  season: number;
  league: League | null;
  team: TeamRef | null;
} & ({ statsType: 'batting'; row: BattingPageRow } | { statsType: 'pitching'; row: PitchingPageRow });

const LEAGUE_LABEL: Record<League, string> = { central: 'Central', pacific: 'Pacific' };

/**
 * League Site Provider
 * Reads the official site's English stats pages. The site has no search or
 * player endpoint, so every lookup scans leaders pages (and team pages as a
 * fallback) and filters rows by name or derived id.
 */
export class LeagueSiteProvider implements SourceProvider {
  readonly providerId = SOURCE.LEAGUE_SITE;

  private readonly pages: PageSource;
  private readonly baseUrl: string;
  private readonly cutoffYear: number;
  private readonly now: () => Date;

  constructor(options: LeagueSiteProviderOptions) {
    this.pages = options.pages;
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.cutoffYear = options.cutoffYear;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Scans the batting and pitching leaders pages of both leagues for the
   * current and prior season (eight pages), or for the hinted seasons the
   * site covers.
   */
  async searchPlayer(name: string, options: PlayerSearchOptions = {}): Promise<Player[]> {
    const query = name.trim();
    if (!query) return [];

    const seasons = this.searchSeasons(options.seasons);
    if (seasons.length === 0) return [];
    const located = await this.scanLeaders(seasons, ['batting', 'pitching'], options);

    const players = new Map<string, Player>();
    for (const entry of located) {
      if (!matchName(query, entry.row.player.name)) continue;
      const player = this.toPlayer(entry);
      if (!players.has(player.id)) players.set(player.id, player);
    }

    logger.debug('League site search', { query, scannedRows: located.length, results: players.size });
    return [...players.values()];
  }

  private searchSeasons(hint: readonly number[] | undefined): number[] {
    const current = currentSeason(this.now());
    if (!hint) return [current, current - 1];
    return [...new Set(hint)].filter((season) => season >= this.cutoffYear && season <= current);
  }

  async getPlayerStats(
    playerId: string,
    query: StatsQuery,
    options: RequestOptions = {}
  ): Promise<PlayerStatsResult> {
    if (!playerId.startsWith(LEAGUE_SITE_ID_PREFIX)) return NOT_FOUND;

    if (query.season !== undefined && query.season !== null) {
      return this.getSeasonStats(playerId, query.season, query.statsType, options);
    }

    // Career: leaders pages of every live season
    const current = currentSeason(this.now());
    const seasons: number[] = [];
    for (let season = this.cutoffYear; season <= current; season++) seasons.push(season);

    const matches = (await this.scanLeaders(seasons, [query.statsType], options)).filter(
      (entry) => leagueSitePlayerId(entry.row.player) === playerId
    );
    if (matches.length === 0) return NOT_FOUND;

    const rows = collapseSeasons(matches.map((entry) => this.toStats(entry, playerId)));
    return {
      kind: 'career',
      player: this.toPlayer(matches[matches.length - 1]),
      seasons: rows,
      totals: computeCareerTotals(rows, query.statsType, playerId, SOURCE.LEAGUE_SITE),
      storedTotals: null,
    };
  }

  async getTeams(): Promise<Team[]> {
    return listTeams();
  }

  async getTeamRoster(teamId: string, season?: number, options: RequestOptions = {}): Promise<Player[]> {
    const franchise = findFranchiseById(teamId) ?? findFranchiseByName(teamId);
    if (!franchise) return [];

    const year = season ?? currentSeason(this.now());
    const located = await this.scanTeams(year, [franchise], ['batting', 'pitching'], options);

    const players = new Map<string, Player>();
    for (const entry of located) {
      const player = this.toPlayer(entry);
      if (!players.has(player.id)) players.set(player.id, player);
    }
    return [...players.values()];
  }

  async getStandings(query: StandingsQuery = {}, options: RequestOptions = {}): Promise<StandingsResult> {
    const season = query.season ?? currentSeason(this.now());
    const leagues = query.league ? [query.league] : LEAGUES;

    const pages = await this.fetchAll(
      leagues.map((league) => standingsPageUrl(this.baseUrl, season, league)),
      options
    );

    const standings: LeagueStandings[] = [];
    pages.forEach((page, index) => {
      const league = leagues[index];
      if (!page) return;
      standings.push({
        season,
        league,
        source: SOURCE.LEAGUE_SITE,
        rows: parseStandingsRows(page).map((row) => ({
          rank: row.rank,
          team: teamRefFromText(row.teamText) ?? { id: row.teamText.toLowerCase(), name: row.teamText, league },
          games: row.games,
          wins: row.wins,
          losses: row.losses,
          ties: row.ties,
          winningPercentage: row.winningPercentage,
          gamesBehind: row.gamesBehind,
        })),
      });
    });

    return { kind: 'standings', standings };
  }

  async healthCheck(options: RequestOptions = {}): Promise<boolean> {
    const url = leadersPageUrl(this.baseUrl, currentSeason(this.now()), 'central', 'batting');
    try {
      return (await this.pages.fetchPage(url, options)) !== null;
    } catch (error) {
      logger.warn('League site health check failed', {
        url,
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  /**
   * One season: leaders pages first, then every team page when the player
   * is not among the leaders (players below the qualifying threshold only
   * appear on their team's page).
   */
  private async getSeasonStats(
    playerId: string,
    season: number,
    statsType: StatsType,
    options: RequestOptions
  ): Promise<PlayerStatsResult> {
    const isPlayer = (entry: LocatedRow) => leagueSitePlayerId(entry.row.player) === playerId;

    let matches = (await this.scanLeaders([season], [statsType], options)).filter(isPlayer);
    if (matches.length === 0) {
      matches = (await this.scanTeams(season, FRANCHISES, [statsType], options)).filter(isPlayer);
    }
    if (matches.length === 0) return NOT_FOUND;

    const stats = combineSameSeason(matches.map((entry) => this.toStats(entry, playerId)));
    if (!stats) return NOT_FOUND;
    return { kind: 'season', player: this.toPlayer(matches[0]), stats };
  }

  private async scanLeaders(
    seasons: number[],
    statsTypes: StatsType[],
    options: RequestOptions
  ): Promise<LocatedRow[]> {
    const targets = seasons.flatMap((season) =>
      LEAGUES.flatMap((league) => statsTypes.map((statsType) => ({ season, league, statsType })))
    );
    const pages = await this.fetchAll(
      targets.map((target) => leadersPageUrl(this.baseUrl, target.season, target.league, target.statsType)),
      options
    );

    return targets.flatMap((target, index) =>
      this.locate(pages[index], 'leaders', target.statsType, {
        season: target.season,
        league: target.league,
        team: null,
      })
    );
  }

  private async scanTeams(
    season: number,
    franchises: readonly FranchiseDefinition[],
    statsTypes: StatsType[],
    options: RequestOptions
  ): Promise<LocatedRow[]> {
    const targets = franchises.flatMap((franchise) => statsTypes.map((statsType) => ({ franchise, statsType })));
    const pages = await this.fetchAll(
      targets.map((target) => teamPageUrl(this.baseUrl, season, target.franchise.leagueSiteCode, target.statsType)),
      options
    );

    return targets.flatMap((target, index) =>
      this.locate(pages[index], 'team', target.statsType, {
        season,
        league: target.franchise.league,
        team: toTeamRef(target.franchise),
      })
    );
  }

  /**
   * Fetch the pages of one scan concurrently. The first failure cancels every
   * page still queued or in flight before it is rethrown.
   */
  private async fetchAll(urls: string[], options: RequestOptions): Promise<(HtmlPage | null)[]> {
    const scan = new AbortController();
    const { signal } = options;
    const forwardAbort = () => scan.abort();
    if (signal?.aborted) scan.abort();
    signal?.addEventListener('abort', forwardAbort, { once: true });

    try {
      return await Promise.all(urls.map((url) => this.pages.fetchPage(url, { signal: scan.signal })));
    } catch (error) {
      scan.abort();
      throw error;
    } finally {
      signal?.removeEventListener('abort', forwardAbort);
    }
  }

  private locate(
    page: HtmlPage | null,
    layout: PageLayout,
    statsType: StatsType,
    context: PageContext
  ): LocatedRow[] {
    if (!page) return [];
    const teamOf = (row: PageRow): TeamRef | null =>
      context.team ?? (row.teamText ? teamRefFromText(row.teamText) : null);

    if (statsType === 'batting') {
      return parseBattingRows(page, layout).map(
        (row): LocatedRow => ({ ...context, team: teamOf(row), statsType: 'batting', row })
      );
    }
    return parsePitchingRows(page, layout).map(
      (row): LocatedRow => ({ ...context, team: teamOf(row), statsType: 'pitching', row })
    );
  }

  private toStats(entry: LocatedRow, playerId: string): SeasonStats {
    const meta = {
      playerId,
      season: entry.season,
      team: entry.team,
      source: SOURCE.LEAGUE_SITE,
      games: entry.row.games,
    };
    return entry.statsType === 'batting'
      ? createBattingStats(meta, entry.row.counts)
      : createPitchingStats(meta, entry.row.counts);
  }

  private toPlayer(entry: LocatedRow): Player {
    const id = leagueSitePlayerId(entry.row.player);
    const where = entry.team?.name ?? (entry.league ? `${LEAGUE_LABEL[entry.league]} League` : 'NPB');
    return {
      id,
      nameEnglish: displayName(entry.row.player),
      nameJapanese: null,
      sourceIds: { [SOURCE.LEAGUE_SITE]: id },
      team: entry.team,
      jerseyNumber: null,
      position: entry.statsType === 'pitching' ? 'P' : null,
      disambiguationHints: {
        [SOURCE.LEAGUE_SITE]: `${entry.season} ${where}, ${entry.statsType === 'pitching' ? 'pitcher' : 'batter'}`,
      },
      source: SOURCE.LEAGUE_SITE,
    };
  }
}
