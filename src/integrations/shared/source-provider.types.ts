import {
  League,
  LeagueStandings,
  Player,
  SeasonStats,
  StatsType,
} from '../../domain/model/canonical.types';

/**
 * Result types shared by every source provider.
 *
 * "No such record" and "not tracked here" are values; only transport
 * failures are thrown.
 */

export interface NotFound {
  kind: 'not_found';
}

export interface Unsupported {
  kind: 'unsupported';
  reason: string;
}

export const NOT_FOUND: NotFound = { kind: 'not_found' };

export function unsupported(reason: string): Unsupported {
  return { kind: 'unsupported', reason };
}

export interface SeasonStatsFound {
  kind: 'season';
  player: Player | null;
  stats: SeasonStats;
}

export interface CareerStatsFound {
  kind: 'career';
  player: Player | null;
  /** Sorted by season, one row per season. */
  seasons: SeasonStats[];
  /** Recomputed from `seasons`. */
  totals: SeasonStats;
  /** Aggregate row as stored by the source, reported but never preferred. */
  storedTotals: SeasonStats | null;
}

export type PlayerStatsResult = SeasonStatsFound | CareerStatsFound | NotFound;

export interface StandingsFound {
  kind: 'standings';
  standings: LeagueStandings[];
}

export type StandingsResult = StandingsFound | Unsupported;

export interface RequestOptions {
  /** Caller-driven cancellation; aborts queued and in-flight fetches. */
  signal?: AbortSignal;
}

export interface PlayerSearchOptions extends RequestOptions {
  /**
   * Seasons to look in, for sources that can only find players through
   * per-season pages. Other sources ignore it.
   */
  seasons?: readonly number[];
}

export interface StatsQuery {
  /** Omitted or null asks for the whole career. */
  season?: number | null;
  statsType: StatsType;
}

export interface StandingsQuery {
  season?: number;
  league?: League;
}

/** Headline row of a found result: the season row, or the career totals. */
export function headlineStats(result: SeasonStatsFound | CareerStatsFound): SeasonStats {
  return result.kind === 'season' ? result.stats : result.totals;
}

export function isFound(result: PlayerStatsResult): result is SeasonStatsFound | CareerStatsFound {
  return result.kind !== 'not_found';
}
