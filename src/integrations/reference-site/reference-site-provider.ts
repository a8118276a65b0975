import { logger } from '../../config/logger.config';
import { teamRefFromText } from '../../constants/teams';
import { Player, SOURCE, SeasonStats, Team, TeamRef } from '../../domain/model/canonical.types';
import {
  collapseSeasons,
  combineSameSeason,
  computeCareerTotals,
  createBattingStats,
  createPitchingStats,
  StatsRowMeta,
} from '../../domain/stats/season-stats';
import { PageSource } from '../shared/html-page.client';
import { SourceProvider } from '../shared/source-provider.interface';
import {
  NOT_FOUND,
  PlayerStatsResult,
  RequestOptions,
  StandingsResult,
  StatsQuery,
  unsupported,
} from '../shared/source-provider.types';
import {
  fromReferenceId,
  parseBattingTable,
  parsePitchingTable,
  parseSearchResults,
  registerIdOfPage,
  registerPageUrl,
  registerPlayerName,
  searchPageUrl,
  toReferenceId,
} from './reference-site.pages';

export interface ReferenceSiteProviderOptions {
  pages: PageSource;
  baseUrl: string;
}

/**
 * Reference Site Provider
 * Secondary source with patchy coverage that reports WAR. Its register pages
 * list a player's whole professional record; only Japanese top-level rows
 * are kept. Teams, rosters and standings are not tracked here.
 */
export class ReferenceSiteProvider implements SourceProvider {
  readonly providerId = SOURCE.REFERENCE_SITE;

  private readonly pages: PageSource;
  private readonly baseUrl: string;

  constructor(options: ReferenceSiteProviderOptions) {
    this.pages = options.pages;
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
  }

  async searchPlayer(name: string, options: RequestOptions = {}): Promise<Player[]> {
    const query = name.trim();
    if (!query) return [];

    const page = await this.pages.fetchPage(searchPageUrl(this.baseUrl, query), options);
    if (!page) return [];

    // A unique match redirects straight to the player's register page
    const redirectedTo = registerIdOfPage(page);
    if (redirectedTo) {
      const playerName = registerPlayerName(page);
      return playerName ? [this.toPlayer(redirectedTo, playerName, null, null)] : [];
    }

    const hits = parseSearchResults(page);
    logger.debug('Reference site search', { query, results: hits.length });
    return hits.map((hit) => this.toPlayer(hit.registerId, hit.name, hit.detail, null));
  }

  async getPlayerStats(
    playerId: string,
    query: StatsQuery,
    options: RequestOptions = {}
  ): Promise<PlayerStatsResult> {
    const registerId = fromReferenceId(playerId);
    if (!registerId) return NOT_FOUND;

    const page = await this.pages.fetchPage(registerPageUrl(this.baseUrl, registerId), options);
    if (!page) return NOT_FOUND;

    const season = query.season ?? undefined;
    const rows: SeasonStats[] =
      query.statsType === 'batting'
        ? parseBattingTable(page, season).map((row) =>
            createBattingStats(this.meta(playerId, row), row.counts, { war: row.war })
          )
        : parsePitchingTable(page, season).map((row) =>
            createPitchingStats(this.meta(playerId, row), row.counts, { war: row.war })
          );
    if (rows.length === 0) return NOT_FOUND;

    const seasons = collapseSeasons(rows);
    const latestTeam = seasons[seasons.length - 1].team;
    const player = this.toPlayer(registerId, registerPlayerName(page) ?? playerId, null, latestTeam);

    if (season !== undefined) {
      const stats = combineSameSeason(rows);
      return stats ? { kind: 'season', player, stats } : NOT_FOUND;
    }

    return {
      kind: 'career',
      player,
      seasons,
      totals: computeCareerTotals(seasons, query.statsType, playerId, SOURCE.REFERENCE_SITE),
      storedTotals: null,
    };
  }

  async getTeams(): Promise<Team[]> {
    return [];
  }

  async getTeamRoster(): Promise<Player[]> {
    return [];
  }

  async getStandings(): Promise<StandingsResult> {
    return unsupported('The reference site provider does not track standings');
  }

  async healthCheck(options: RequestOptions = {}): Promise<boolean> {
    const url = `${this.baseUrl}/register/`;
    try {
      return (await this.pages.fetchPage(url, options)) !== null;
    } catch (error) {
      logger.warn('Reference site health check failed', {
        url,
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  private meta(playerId: string, row: { season: number; teamText: string | null; games: number }): StatsRowMeta {
    return {
      playerId,
      season: row.season,
      team: row.teamText ? teamRefFromText(row.teamText) : null,
      source: SOURCE.REFERENCE_SITE,
      games: row.games,
    };
  }

  private toPlayer(registerId: string, name: string, detail: string | null, team: TeamRef | null): Player {
    const id = toReferenceId(registerId);
    return {
      id,
      nameEnglish: name,
      nameJapanese: null,
      sourceIds: { [SOURCE.REFERENCE_SITE]: id },
      team,
      jerseyNumber: null,
      position: null,
      disambiguationHints: detail ? { [SOURCE.REFERENCE_SITE]: detail } : {},
      source: SOURCE.REFERENCE_SITE,
    };
  }
}
