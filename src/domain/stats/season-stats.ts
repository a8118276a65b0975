/**
 * Season Stats Domain Logic
 *
 * Builds canonical stat rows from counting fields, sums seasons into career
 * totals, and merges rows from several sources. Every function returns new
 * objects; inputs are never mutated.
 */

import {
  BattingAdvanced,
  BattingCounts,
  BattingStats,
  PitchingAdvanced,
  PitchingCounts,
  PitchingStats,
  SeasonStats,
  StatsType,
  TeamRef,
} from '../model/canonical.types';
import {
  calculateBattingWarEstimate,
  calculateEraPlus,
  calculateFip,
  calculateOpsPlus,
  calculatePitchingWarEstimate,
  calculateRunsCreated,
  calculateWoba,
} from './advanced-metrics';
import { computeBattingRates, computePitchingRates, round1 } from './rate-stats';

export interface StatsRowMeta {
  playerId: string;
  season: number | null;
  team: TeamRef | null;
  source: string;
  games: number;
}

export const BATTING_COUNT_FIELDS: readonly (keyof BattingCounts)[] = [
  'plateAppearances',
  'atBats',
  'runs',
  'hits',
  'doubles',
  'triples',
  'homeRuns',
  'rbi',
  'stolenBases',
  'caughtStealing',
  'walks',
  'hitByPitch',
  'sacrificeFlies',
  'strikeouts',
];

export const PITCHING_COUNT_FIELDS: readonly (keyof PitchingCounts)[] = [
  'gamesStarted',
  'wins',
  'losses',
  'saves',
  'holds',
  'completeGames',
  'shutouts',
  'outsRecorded',
  'hitsAllowed',
  'runsAllowed',
  'earnedRuns',
  'homeRunsAllowed',
  'walksAllowed',
  'hitBatters',
  'strikeouts',
];

export const BATTING_ADVANCED_FIELDS: readonly (keyof BattingAdvanced)[] = [
  'war',
  'wrcPlus',
  'woba',
  'opsPlus',
  'runsCreated',
  'warEstimate',
];

export const PITCHING_ADVANCED_FIELDS: readonly (keyof PitchingAdvanced)[] = [
  'war',
  'fip',
  'xfip',
  'eraPlus',
  'warEstimate',
];

/** Non-negative integer, 0 for anything unreadable. */
export function toCount(value: number | null | undefined): number {
  if (value === null || value === undefined || !Number.isFinite(value)) return 0;
  return Math.max(0, Math.trunc(value));
}

function battingCounts(partial: Partial<BattingCounts>): BattingCounts {
  return {
    plateAppearances: toCount(partial.plateAppearances),
    atBats: toCount(partial.atBats),
    runs: toCount(partial.runs),
    hits: toCount(partial.hits),
    doubles: toCount(partial.doubles),
    triples: toCount(partial.triples),
    homeRuns: toCount(partial.homeRuns),
    rbi: toCount(partial.rbi),
    stolenBases: toCount(partial.stolenBases),
    caughtStealing: toCount(partial.caughtStealing),
    walks: toCount(partial.walks),
    hitByPitch: toCount(partial.hitByPitch),
    sacrificeFlies: toCount(partial.sacrificeFlies),
    strikeouts: toCount(partial.strikeouts),
  };
}

function pitchingCounts(partial: Partial<PitchingCounts>): PitchingCounts {
  return {
    gamesStarted: toCount(partial.gamesStarted),
    wins: toCount(partial.wins),
    losses: toCount(partial.losses),
    saves: toCount(partial.saves),
    holds: toCount(partial.holds),
    completeGames: toCount(partial.completeGames),
    shutouts: toCount(partial.shutouts),
    outsRecorded: toCount(partial.outsRecorded),
    hitsAllowed: toCount(partial.hitsAllowed),
    runsAllowed: toCount(partial.runsAllowed),
    earnedRuns: toCount(partial.earnedRuns),
    homeRunsAllowed: toCount(partial.homeRunsAllowed),
    walksAllowed: toCount(partial.walksAllowed),
    hitBatters: toCount(partial.hitBatters),
    strikeouts: toCount(partial.strikeouts),
  };
}

/**
 * Build a batting row. Rates are computed from the counts; derived advanced
 * fields are filled where the source did not report them.
 */
export function createBattingStats(
  meta: StatsRowMeta,
  counts: Partial<BattingCounts>,
  reported: Partial<BattingAdvanced> = {}
): BattingStats {
  const normalized = battingCounts(counts);
  const rates = computeBattingRates(normalized);
  const games = toCount(meta.games);
  const runsCreated = calculateRunsCreated(normalized);

  return {
    statsType: 'batting',
    playerId: meta.playerId,
    season: meta.season,
    team: meta.team,
    source: meta.source,
    games,
    ...normalized,
    ...rates,
    advanced: {
      war: reported.war ?? null,
      wrcPlus: reported.wrcPlus ?? null,
      woba: reported.woba ?? calculateWoba(normalized),
      opsPlus: reported.opsPlus ?? calculateOpsPlus(rates.ops),
      runsCreated: reported.runsCreated ?? (runsCreated === null ? null : round1(runsCreated)),
      warEstimate:
        reported.warEstimate ??
        (runsCreated === null ? null : calculateBattingWarEstimate(runsCreated, games)),
    },
  };
}

/**
 * Build a pitching row. Rates come from outs recorded; FIP, ERA+ and the WAR
 * estimate are filled where the source did not report them.
 */
export function createPitchingStats(
  meta: StatsRowMeta,
  counts: Partial<PitchingCounts>,
  reported: Partial<PitchingAdvanced> = {}
): PitchingStats {
  const normalized = pitchingCounts(counts);
  const rates = computePitchingRates(normalized);
  const fip = reported.fip ?? calculateFip(normalized);

  return {
    statsType: 'pitching',
    playerId: meta.playerId,
    season: meta.season,
    team: meta.team,
    source: meta.source,
    games: toCount(meta.games),
    ...normalized,
    ...rates,
    advanced: {
      war: reported.war ?? null,
      fip,
      xfip: reported.xfip ?? null,
      eraPlus: reported.eraPlus ?? calculateEraPlus(rates.era),
      warEstimate:
        reported.warEstimate ??
        (fip === null ? null : calculatePitchingWarEstimate(fip, normalized.outsRecorded)),
    },
  };
}

function sharedTeam(rows: SeasonStats[]): TeamRef | null {
  const first = rows[0]?.team ?? null;
  if (!first) return null;
  return rows.every((row) => row.team?.id === first.id) ? first : null;
}

/** Sum of source WAR when every season reports one. */
function summedWar(rows: SeasonStats[]): number | null {
  let total = 0;
  for (const row of rows) {
    if (row.advanced.war === null) return null;
    total += row.advanced.war;
  }
  return rows.length > 0 ? round1(total) : null;
}

function careerMeta(rows: SeasonStats[], playerId: string, source: string): StatsRowMeta {
  return {
    playerId,
    season: null,
    team: sharedTeam(rows),
    source,
    games: rows.reduce((sum, row) => sum + row.games, 0),
  };
}

export function sumBattingSeasons(rows: BattingStats[], playerId: string, source: string): BattingStats {
  const counts = battingCounts({});
  for (const row of rows) {
    for (const field of BATTING_COUNT_FIELDS) counts[field] += row[field];
  }
  return createBattingStats(careerMeta(rows, playerId, source), counts, { war: summedWar(rows) });
}

export function sumPitchingSeasons(rows: PitchingStats[], playerId: string, source: string): PitchingStats {
  const counts = pitchingCounts({});
  for (const row of rows) {
    for (const field of PITCHING_COUNT_FIELDS) counts[field] += row[field];
  }
  return createPitchingStats(careerMeta(rows, playerId, source), counts, { war: summedWar(rows) });
}

/**
 * Career totals (`season = null`) for the rows of one stats type: counting
 * fields summed, every rate recomputed from the sums.
 */
export function computeCareerTotals(
  rows: SeasonStats[],
  statsType: StatsType,
  playerId: string,
  source: string
): SeasonStats {
  if (statsType === 'batting') {
    return sumBattingSeasons(
      rows.filter((row): row is BattingStats => row.statsType === 'batting'),
      playerId,
      source
    );
  }
  return sumPitchingSeasons(
    rows.filter((row): row is PitchingStats => row.statsType === 'pitching'),
    playerId,
    source
  );
}

/**
 * Concatenate season lists in priority order, keep the first row seen for
 * each season, and sort by season. Career rows (`season = null`) are dropped.
 */
export function mergeSeasonLists(...lists: SeasonStats[][]): SeasonStats[] {
  const bySeason = new Map<number, SeasonStats>();
  for (const list of lists) {
    for (const row of list) {
      if (row.season === null || bySeason.has(row.season)) continue;
      bySeason.set(row.season, row);
    }
  }
  return [...bySeason.values()].sort((a, b) => (a.season ?? 0) - (b.season ?? 0));
}

/**
 * Rows of one type combined from the same season (a mid-season trade shows
 * up as one row per team). Counting fields are summed; the team is dropped
 * when the rows disagree.
 */
export function combineSameSeason(rows: SeasonStats[]): SeasonStats | null {
  const first = rows[0];
  if (!first) return null;
  if (rows.length === 1) return first;

  const combined = computeCareerTotals(rows, first.statsType, first.playerId, first.source);
  return { ...combined, season: first.season };
}

/** Whether every optional advanced field of the row is populated. */
export function isAdvancedComplete(stats: SeasonStats): boolean {
  return Object.values(stats.advanced).every((value) => value !== null);
}

export interface AdvancedMergeResult {
  stats: SeasonStats;
  /** Names of the fields taken from the donor row */
  filled: string[];
}

function fillNulls<A extends object>(
  target: A,
  donor: A,
  fields: readonly (keyof A)[]
): { merged: A; filled: string[] } {
  const merged = { ...target };
  const filled: string[] = [];
  for (const field of fields) {
    if (merged[field] === null && donor[field] !== null) {
      merged[field] = donor[field];
      filled.push(String(field));
    }
  }
  return { merged, filled };
}

/**
 * Copy advanced fields the base row lacks from a lower-priority row. A field
 * already populated on the base is never overwritten. When anything was
 * taken, the donor's source is appended to the base's source tag.
 */
export function fillMissingAdvanced(base: SeasonStats, donor: SeasonStats): AdvancedMergeResult {
  if (base.statsType === 'batting' && donor.statsType === 'batting') {
    const { merged, filled } = fillNulls(base.advanced, donor.advanced, BATTING_ADVANCED_FIELDS);
    if (filled.length === 0) return { stats: base, filled };
    return {
      stats: { ...base, advanced: merged, source: joinSources(base.source, donor.source) },
      filled,
    };
  }
  if (base.statsType === 'pitching' && donor.statsType === 'pitching') {
    const { merged, filled } = fillNulls(base.advanced, donor.advanced, PITCHING_ADVANCED_FIELDS);
    if (filled.length === 0) return { stats: base, filled };
    return {
      stats: { ...base, advanced: merged, source: joinSources(base.source, donor.source) },
      filled,
    };
  }
  return { stats: base, filled: [] };
}

/** 'a' + 'b' -> 'a+b', without repeating a tag already present. */
export function joinSources(current: string, addition: string): string {
  const tags = current.split('+');
  for (const tag of addition.split('+')) {
    if (!tags.includes(tag)) tags.push(tag);
  }
  return tags.join('+');
}

/**
 * One row per season, sorted: rows sharing a season (one per team after a
 * trade) are combined with combineSameSeason.
 */
export function collapseSeasons(rows: SeasonStats[]): SeasonStats[] {
  const bySeason = new Map<number | null, SeasonStats[]>();
  for (const row of rows) {
    const group = bySeason.get(row.season) ?? [];
    group.push(row);
    bySeason.set(row.season, group);
  }

  const collapsed: SeasonStats[] = [];
  for (const group of bySeason.values()) {
    const combined = combineSameSeason(group);
    if (combined) collapsed.push(combined);
  }
  return collapsed.sort((a, b) => (a.season ?? 0) - (b.season ?? 0));
}
