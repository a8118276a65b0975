/**
 * Advanced Metrics Domain Logic
 *
 * League-specific estimates derived from counting stats. These are
 * simplified versions without park factors, defensive runs or baserunning.
 * No async I/O, no database access.
 */

import { BattingCounts, PitchingCounts } from '../model/canonical.types';
import { OUTS_PER_INNING, round1, round2, round3, singles, totalBases } from './rate-stats';

export const FIP_CONSTANT = 3.1;

/** Linear weights for wOBA in the league's run environment */
export const WOBA_WEIGHTS = {
  walk: 0.69,
  hitByPitch: 0.72,
  single: 0.88,
  double: 1.24,
  triple: 1.56,
  homeRun: 1.95,
} as const;

export const RUNS_PER_WIN = 9.5;

/** Wins per 600 PA for position players */
export const REPLACEMENT_LEVEL_BATTING = 2.0;
/** Wins per 200 IP for pitchers */
export const REPLACEMENT_LEVEL_PITCHING = 2.0;

export const LEAGUE_AVERAGE_OPS = 0.75;
export const LEAGUE_AVERAGE_ERA = 3.5;
export const LEAGUE_AVERAGE_FIP = 3.8;

const GAMES_PER_SEASON = 162;

/** Positional adjustment in runs per full season */
export const POSITIONAL_ADJUSTMENTS: Record<string, number> = {
  C: 12.5,
  SS: 7.5,
  '2B': 2.5,
  '3B': 2.5,
  CF: 2.5,
  RF: -7.5,
  LF: -7.5,
  '1B': -12.5,
  DH: -17.5,
};

/**
 * FIP = (13*HR + 3*(BB + HBP) - 2*K) / IP + constant, two places.
 */
export function calculateFip(
  counts: Pick<PitchingCounts, 'homeRunsAllowed' | 'walksAllowed' | 'hitBatters' | 'strikeouts' | 'outsRecorded'>
): number | null {
  if (counts.outsRecorded <= 0) return null;
  const innings = counts.outsRecorded / OUTS_PER_INNING;
  const fip =
    (13 * counts.homeRunsAllowed +
      3 * (counts.walksAllowed + counts.hitBatters) -
      2 * counts.strikeouts) /
      innings +
    FIP_CONSTANT;
  return round2(fip);
}

/**
 * Weighted on-base average, three places.
 */
export function calculateWoba(counts: BattingCounts): number | null {
  const denominator = counts.atBats + counts.walks + counts.sacrificeFlies + counts.hitByPitch;
  if (denominator <= 0) return null;

  const numerator =
    WOBA_WEIGHTS.walk * counts.walks +
    WOBA_WEIGHTS.hitByPitch * counts.hitByPitch +
    WOBA_WEIGHTS.single * singles(counts) +
    WOBA_WEIGHTS.double * counts.doubles +
    WOBA_WEIGHTS.triple * counts.triples +
    WOBA_WEIGHTS.homeRun * counts.homeRuns;

  return round3(numerator / denominator);
}

/**
 * Basic runs created: (H + BB) * TB / (AB + BB), unrounded.
 */
export function calculateRunsCreated(counts: BattingCounts): number | null {
  const denominator = counts.atBats + counts.walks;
  if (denominator <= 0) return null;
  return ((counts.hits + counts.walks) * totalBases(counts)) / denominator;
}

/** 100 is league average. */
export function calculateOpsPlus(ops: number | null, leagueOps = LEAGUE_AVERAGE_OPS): number | null {
  if (ops === null || ops <= 0 || leagueOps <= 0) return null;
  return Math.round((100 * ops) / leagueOps);
}

/** 100 is league average; higher is better. */
export function calculateEraPlus(era: number | null, leagueEra = LEAGUE_AVERAGE_ERA): number | null {
  if (era === null || era <= 0) return null;
  return Math.round((100 * leagueEra) / era);
}

export function calculateBattingWarEstimate(
  runsCreated: number,
  games: number,
  position = 'DH'
): number {
  const seasonShare = games / GAMES_PER_SEASON;
  const positionalRuns = (POSITIONAL_ADJUSTMENTS[position] ?? 0) * seasonShare;
  const replacementRuns = REPLACEMENT_LEVEL_BATTING * RUNS_PER_WIN * seasonShare;
  return round1((runsCreated - replacementRuns + positionalRuns) / RUNS_PER_WIN);
}

export function calculatePitchingWarEstimate(
  fip: number,
  outsRecorded: number,
  leagueFip = LEAGUE_AVERAGE_FIP
): number {
  const innings = outsRecorded / OUTS_PER_INNING;
  const runsAboveAverage = ((leagueFip - fip) / 9) * innings;
  const replacementRuns = REPLACEMENT_LEVEL_PITCHING * RUNS_PER_WIN * (innings / 200);
  return round1((runsAboveAverage + replacementRuns) / RUNS_PER_WIN);
}
