import { Player, Team } from '../../domain/model/canonical.types';
import {
  PlayerSearchOptions,
  PlayerStatsResult,
  RequestOptions,
  StandingsQuery,
  StandingsResult,
  StatsQuery,
} from './source-provider.types';

/**
 * Source provider interface
 * Every backend (archive, league site, reference site, and the composite that
 * routes between them) implements this contract and translates its raw data
 * into the canonical model.
 *
 * A well-formed query with no matching record resolves to an empty list or
 * NotFound. Implementations throw TransportFailureException for timeouts,
 * network errors and unreadable payloads, and OperationAbortedException when
 * the caller's signal fires. Nothing else is thrown.
 */
export interface SourceProvider {
  /** Provider identifier (e.g., 'historical', 'league_site') */
  readonly providerId: string;

  /**
   * Find players whose name matches a free-text query
   * @returns Candidates in the provider's id namespace
   */
  searchPlayer(name: string, options?: PlayerSearchOptions): Promise<Player[]>;

  /**
   * Fetch one season, or the whole career when `query.season` is omitted
   */
  getPlayerStats(
    playerId: string,
    query: StatsQuery,
    options?: RequestOptions
  ): Promise<PlayerStatsResult>;

  /**
   * List teams (optionally for a season)
   */
  getTeams(season?: number, options?: RequestOptions): Promise<Team[]>;

  /**
   * List players who appeared for a team
   */
  getTeamRoster(teamId: string, season?: number, options?: RequestOptions): Promise<Player[]>;

  /**
   * League standings, or Unsupported when the backend keeps none
   */
  getStandings(query?: StandingsQuery, options?: RequestOptions): Promise<StandingsResult>;

  /**
   * Cheap reachability probe
   */
  healthCheck(options?: RequestOptions): Promise<boolean>;
}
