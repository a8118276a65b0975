import { z } from 'zod';
import { BattingCounts, League, PitchingCounts } from '../../domain/model/canonical.types';

/**
 * Row shapes of the historical archive.
 *
 * pg returns BIGINT aggregates and NUMERIC columns as strings, so counts and
 * metrics accept either form. Every row read from the archive goes through
 * one of these schemas; a row that fails validation is a malformed payload.
 */

const count = z
  .union([z.number(), z.string()])
  .transform((value) => Number(value))
  .pipe(z.number().int().nonnegative());

const nullableCount = z
  .union([z.number(), z.string(), z.null()])
  .transform((value) => (value === null ? null : Number(value)))
  .pipe(z.number().int().nullable());

const nullableMetric = z
  .union([z.number(), z.string(), z.null()])
  .transform((value) => (value === null ? null : Number(value)))
  .pipe(z.number().finite().nullable());

const league = z.enum(['central', 'pacific']);

export const historicalPlayerRowSchema = z.object({
  player_id: z.string().min(1),
  name_english: z.string().min(1),
  name_japanese: z.string().nullable(),
  name_variants: z
    .array(z.string())
    .nullable()
    .transform((value) => value ?? []),
  source_ids: z
    .record(z.string())
    .nullable()
    .transform((value) => value ?? {}),
  primary_position: z.string().nullable(),
  first_season: nullableCount,
  last_season: nullableCount,
  batting_seasons: count,
  pitching_seasons: count,
});

export const historicalTeamRowSchema = z.object({
  team_id: z.string().min(1),
  name_english: z.string().min(1),
  name_japanese: z.string().nullable(),
  abbreviation: z.string(),
  league,
  city: z.string(),
});

const seasonRowBase = {
  player_id: z.string().min(1),
  season: count,
  team_id: z.string().min(1),
  team_name: z.string().nullable(),
  team_league: league.nullable(),
  games: count,
  war: nullableMetric,
  data_source: z.string(),
};

export const historicalBattingRowSchema = z.object({
  ...seasonRowBase,
  plate_appearances: count,
  at_bats: count,
  runs: count,
  hits: count,
  doubles: count,
  triples: count,
  home_runs: count,
  rbi: count,
  stolen_bases: count,
  caught_stealing: count,
  walks: count,
  hit_by_pitch: count,
  sacrifice_flies: count,
  strikeouts: count,
  wrc_plus: nullableMetric,
});

export const historicalPitchingRowSchema = z.object({
  ...seasonRowBase,
  games_started: count,
  wins: count,
  losses: count,
  saves: count,
  holds: count,
  complete_games: count,
  shutouts: count,
  outs_recorded: count,
  hits_allowed: count,
  runs_allowed: count,
  earned_runs: count,
  home_runs_allowed: count,
  walks_allowed: count,
  hit_batters: count,
  strikeouts: count,
  xfip: nullableMetric,
});

const careerRowBase = {
  player_id: z.string().min(1),
  seasons: count,
  games: count,
  war: nullableMetric,
};

export const historicalBattingCareerRowSchema = historicalBattingRowSchema
  .pick({
    plate_appearances: true,
    at_bats: true,
    runs: true,
    hits: true,
    doubles: true,
    triples: true,
    home_runs: true,
    rbi: true,
    stolen_bases: true,
    caught_stealing: true,
    walks: true,
    hit_by_pitch: true,
    sacrifice_flies: true,
    strikeouts: true,
  })
  .extend(careerRowBase);

export const historicalPitchingCareerRowSchema = historicalPitchingRowSchema
  .pick({
    games_started: true,
    wins: true,
    losses: true,
    saves: true,
    holds: true,
    complete_games: true,
    shutouts: true,
    outs_recorded: true,
    hits_allowed: true,
    runs_allowed: true,
    earned_runs: true,
    home_runs_allowed: true,
    walks_allowed: true,
    hit_batters: true,
    strikeouts: true,
  })
  .extend(careerRowBase);

export type HistoricalPlayerRow = z.infer<typeof historicalPlayerRowSchema>;
export type HistoricalTeamRow = z.infer<typeof historicalTeamRowSchema>;
export type HistoricalBattingRow = z.infer<typeof historicalBattingRowSchema>;
export type HistoricalPitchingRow = z.infer<typeof historicalPitchingRowSchema>;
export type HistoricalBattingCareerRow = z.infer<typeof historicalBattingCareerRowSchema>;
export type HistoricalPitchingCareerRow = z.infer<typeof historicalPitchingCareerRowSchema>;

export function parseRows<S extends z.ZodTypeAny>(schema: S, rows: unknown[]): z.output<S>[] {
  return rows.map((row) => schema.parse(row));
}

/** Role hint from the kinds of seasons a player has on record. */
export function playerRole(row: HistoricalPlayerRow): string | null {
  if (row.batting_seasons > 0 && row.pitching_seasons > 0) return 'two-way player';
  if (row.pitching_seasons > 0) return 'pitcher';
  if (row.batting_seasons > 0) return 'position player';
  return null;
}

/** "Active 1995-2004, pitcher" */
export function describeHistoricalPlayer(row: HistoricalPlayerRow): string {
  const role = playerRole(row);
  if (row.first_season === null || row.last_season === null) {
    return 'No seasons on record';
  }
  const span =
    row.first_season === row.last_season
      ? `Active ${row.first_season}`
      : `Active ${row.first_season}-${row.last_season}`;
  return role ? `${span}, ${role}` : span;
}

// ---------------------------------------------------------------------------
// Import rows (maintenance script input)
// ---------------------------------------------------------------------------

export interface HistoricalTeamInput {
  teamId: string;
  nameEnglish: string;
  nameJapanese: string | null;
  abbreviation: string;
  league: League;
  city: string;
}

export interface HistoricalPlayerInput {
  playerId: string;
  nameEnglish: string;
  nameJapanese: string | null;
  nameVariants: string[];
  sourceIds: Record<string, string>;
  primaryPosition: string | null;
}

interface SeasonInputBase {
  playerId: string;
  season: number;
  teamId: string;
  games: number;
  war: number | null;
  dataSource: string;
}

export interface HistoricalBattingSeasonInput extends SeasonInputBase {
  counts: BattingCounts;
  wrcPlus: number | null;
}

export interface HistoricalPitchingSeasonInput extends SeasonInputBase {
  counts: PitchingCounts;
  xfip: number | null;
}
