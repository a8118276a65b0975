import { logger } from '../../config/logger.config';
import { Player, Team } from '../../domain/model/canonical.types';
import { isSameName } from '../../domain/names/name-resolver';
import { computeCareerTotals, joinSources, mergeSeasonLists } from '../../domain/stats/season-stats';
import { fulfilledValues, settle, settleAll } from '../../shared/fan-out';
import { throwIfAborted } from '../../utils/exceptions';
import { SourceProvider } from '../shared/source-provider.interface';
import {
  CareerStatsFound,
  PlayerStatsResult,
  RequestOptions,
  StandingsQuery,
  StandingsResult,
  StatsQuery,
  unsupported,
} from '../shared/source-provider.types';

export const COMPOSITE_PROVIDER_ID = 'composite';

export interface CompositeProviderOptions {
  historical: SourceProvider;
  live: SourceProvider;
  /** First season served by the live provider */
  cutoffYear: number;
}

/**
 * Composite Provider
 * Routes each request by season: seasons before the cutoff go to the
 * archive, later seasons to the live site. Career requests that reach the
 * cutoff are stitched together from both halves.
 */
export class CompositeProvider implements SourceProvider {
  readonly providerId = COMPOSITE_PROVIDER_ID;

  private readonly historical: SourceProvider;
  private readonly live: SourceProvider;
  readonly cutoffYear: number;

  constructor(options: CompositeProviderOptions) {
    this.historical = options.historical;
    this.live = options.live;
    this.cutoffYear = options.cutoffYear;
  }

  /**
   * Both halves concurrently; archive results first and kept on id collision.
   */
  async searchPlayer(name: string, options: RequestOptions = {}): Promise<Player[]> {
    const outcomes = await settleAll(
      [
        { label: this.historical.providerId, task: () => this.historical.searchPlayer(name, options) },
        { label: this.live.providerId, task: () => this.live.searchPlayer(name, options) },
      ],
      options.signal,
      'composite.searchPlayer'
    );

    const players = new Map<string, Player>();
    for (const player of fulfilledValues(outcomes).flat()) {
      if (!players.has(player.id)) players.set(player.id, player);
    }
    return [...players.values()];
  }

  async getPlayerStats(
    playerId: string,
    query: StatsQuery,
    options: RequestOptions = {}
  ): Promise<PlayerStatsResult> {
    if (query.season !== undefined && query.season !== null) {
      const provider = query.season < this.cutoffYear ? this.historical : this.live;
      return provider.getPlayerStats(playerId, query, options);
    }

    const archived = await this.historical.getPlayerStats(playerId, query, options);
    if (archived.kind === 'not_found') {
      return this.live.getPlayerStats(playerId, query, options);
    }
    if (archived.kind !== 'career') return archived;

    const latest = archived.seasons[archived.seasons.length - 1]?.season ?? null;
    if (latest === null || latest < this.cutoffYear - 1) return archived;

    return this.extendCareer(playerId, archived, query, options);
  }

  /**
   * Append the live seasons to an archived career that reaches the cutoff.
   * A failed live lookup, or a player the live site cannot be matched to,
   * leaves the archived answer as it was.
   */
  private async extendCareer(
    playerId: string,
    archived: CareerStatsFound,
    query: StatsQuery,
    options: RequestOptions
  ): Promise<PlayerStatsResult> {
    const liveId = await this.resolveLiveId(playerId, archived, options);
    if (liveId === null) return archived;

    const outcome = await settle(`${this.live.providerId}.career`, () =>
      this.live.getPlayerStats(liveId, query, options)
    );
    throwIfAborted(options.signal, 'composite.getPlayerStats');

    if (outcome.status === 'failed' || outcome.value.kind !== 'career') return archived;
    const live = outcome.value;

    const seasons = mergeSeasonLists(archived.seasons, live.seasons);
    const source = joinSources(this.historical.providerId, this.live.providerId);
    const player = archived.player
      ? {
          ...archived.player,
          sourceIds: { ...(live.player?.sourceIds ?? {}), ...archived.player.sourceIds },
        }
      : live.player;

    logger.debug('Merged archived and live career', {
      playerId,
      liveId,
      archivedSeasons: archived.seasons.length,
      liveSeasons: live.seasons.length,
      mergedSeasons: seasons.length,
    });

    return {
      kind: 'career',
      player,
      seasons,
      totals: computeCareerTotals(seasons, query.statsType, playerId, source),
      storedTotals: archived.storedTotals,
    };
  }

  /**
   * The player's id at the live source. A stored cross-reference wins;
   * otherwise the live site is searched in its first two seasons and a
   * single candidate with the same full name is taken. Null when
   * nobody or more than one player matches.
   */
  private async resolveLiveId(
    playerId: string,
    archived: CareerStatsFound,
    options: RequestOptions
  ): Promise<string | null> {
    const player = archived.player;
    if (!player) return playerId;
    const mapped = player.sourceIds[this.live.providerId];
    if (mapped) return mapped;

    const seasons = [this.cutoffYear, this.cutoffYear + 1];
    const outcome = await settle(`${this.live.providerId}.resolve`, () =>
      this.live.searchPlayer(player.nameEnglish, { signal: options.signal, seasons })
    );
    throwIfAborted(options.signal, 'composite.getPlayerStats');
    if (outcome.status === 'failed') return null;

    const ids = new Set(
      outcome.value.filter((candidate) => isSameName(player.nameEnglish, candidate.nameEnglish)).map((c) => c.id)
    );
    logger.debug('Resolved live id by name', { playerId, name: player.nameEnglish, matches: [...ids] });
    if (ids.size !== 1) return null;
    const [liveId] = ids;
    return liveId;
  }

  /**
   * Archive teams before the cutoff, live teams after it. Without a season
   * both lists are merged and the live entry wins on id.
   */
  async getTeams(season?: number, options: RequestOptions = {}): Promise<Team[]> {
    if (season !== undefined) {
      const provider = season < this.cutoffYear ? this.historical : this.live;
      return provider.getTeams(season, options);
    }

    const outcomes = await settleAll(
      [
        { label: this.historical.providerId, task: () => this.historical.getTeams(undefined, options) },
        { label: this.live.providerId, task: () => this.live.getTeams(undefined, options) },
      ],
      options.signal,
      'composite.getTeams'
    );

    const teams = new Map<string, Team>();
    for (const team of fulfilledValues(outcomes).flat()) teams.set(team.id, team);
    return [...teams.values()];
  }

  async getTeamRoster(teamId: string, season?: number, options: RequestOptions = {}): Promise<Player[]> {
    const provider = season === undefined || season < this.cutoffYear ? this.historical : this.live;
    return provider.getTeamRoster(teamId, season, options);
  }

  async getStandings(query: StandingsQuery = {}, options: RequestOptions = {}): Promise<StandingsResult> {
    if (query.season !== undefined && query.season < this.cutoffYear) {
      return unsupported(`Standings are not kept for seasons before ${this.cutoffYear}`);
    }
    return this.live.getStandings(query, options);
  }

  async healthCheck(options: RequestOptions = {}): Promise<boolean> {
    const outcomes = await settleAll(
      [
        { label: this.historical.providerId, task: () => this.historical.healthCheck(options) },
        { label: this.live.providerId, task: () => this.live.healthCheck(options) },
      ],
      options.signal,
      'composite.healthCheck'
    );
    return outcomes.every((outcome) => outcome.status === 'fulfilled' && outcome.value);
  }
}
