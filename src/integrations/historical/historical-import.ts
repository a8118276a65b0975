import { z } from 'zod';
import { logger } from '../../config/logger.config';
import { FRANCHISES, toTeam } from '../../constants/teams';
import { parseInningsNotation } from '../../domain/stats/rate-stats';
import { DatabaseException, ValidationException } from '../../utils/exceptions';
import {
  HistoricalBattingSeasonInput,
  HistoricalPitchingSeasonInput,
  HistoricalPlayerInput,
  HistoricalTeamInput,
} from './historical.model';

const count = z.number().int().nonnegative().default(0);
const metric = z.number().nullable().default(null);

const archiveTeamSchema = z.object({
  teamId: z.string().min(1),
  nameEnglish: z.string().min(1),
  nameJapanese: z.string().nullable().default(null),
  abbreviation: z.string().min(1),
  league: z.enum(['central', 'pacific']),
  city: z.string().default(''),
});

const seasonBase = {
  season: z.number().int().min(1936),
  teamId: z.string().min(1),
  games: count,
  war: metric,
  dataSource: z.string().default('archive'),
};

const archiveBattingSchema = z.object({
  ...seasonBase,
  plateAppearances: count,
  atBats: count,
  runs: count,
  hits: count,
  doubles: count,
  triples: count,
  homeRuns: count,
  rbi: count,
  stolenBases: count,
  caughtStealing: count,
  walks: count,
  hitByPitch: count,
  sacrificeFlies: count,
  strikeouts: count,
  wrcPlus: metric,
});

const archivePitchingSchema = z.object({
  ...seasonBase,
  gamesStarted: count,
  wins: count,
  losses: count,
  saves: count,
  holds: count,
  completeGames: count,
  shutouts: count,
  // Baseball notation: "123.2" is 123 innings and two outs
  innings: z.union([z.string(), z.number()]).transform((value) => parseInningsNotation(String(value))),
  hitsAllowed: count,
  runsAllowed: count,
  earnedRuns: count,
  homeRunsAllowed: count,
  walksAllowed: count,
  hitBatters: count,
  strikeouts: count,
  xfip: metric,
});

const archivePlayerSchema = z.object({
  playerId: z.string().min(1),
  nameEnglish: z.string().min(1),
  nameJapanese: z.string().nullable().default(null),
  nameVariants: z.array(z.string()).default([]),
  sourceIds: z.record(z.string()).default({}),
  primaryPosition: z.string().nullable().default(null),
  batting: z.array(archiveBattingSchema).default([]),
  pitching: z.array(archivePitchingSchema).default([]),
});

export const historicalArchiveSchema = z.object({
  teams: z.array(archiveTeamSchema).default([]),
  players: z.array(archivePlayerSchema),
});

export type HistoricalArchive = z.infer<typeof historicalArchiveSchema>;

/** Write side of the archive used by the importer. */
export interface HistoricalWriter {
  upsertTeam(team: HistoricalTeamInput): Promise<void>;
  upsertPlayer(player: HistoricalPlayerInput): Promise<void>;
  upsertBattingSeason(row: HistoricalBattingSeasonInput): Promise<void>;
  upsertPitchingSeason(row: HistoricalPitchingSeasonInput): Promise<void>;
}

export interface ImportSummary {
  teams: number;
  players: number;
  battingSeasons: number;
  pitchingSeasons: number;
}

/**
 * Validate a parsed archive file.
 * @throws ValidationException listing every invalid path
 */
export function parseHistoricalArchive(input: unknown): HistoricalArchive {
  const result = historicalArchiveSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ValidationException(`Invalid archive file:\n  - ${issues.join('\n  - ')}`);
  }
  return result.data;
}

async function write(operation: string, fn: () => Promise<void>): Promise<void> {
  try {
    await fn();
  } catch (error) {
    throw DatabaseException.fromError(error, operation);
  }
}

/**
 * Upsert the twelve current franchises, then the file's own teams (defunct
 * clubs and former names), then every player with their seasons.
 */
export async function importHistoricalArchive(
  writer: HistoricalWriter,
  archive: HistoricalArchive
): Promise<ImportSummary> {
  const summary: ImportSummary = { teams: 0, players: 0, battingSeasons: 0, pitchingSeasons: 0 };

  const teams: HistoricalTeamInput[] = [
    ...FRANCHISES.map(toTeam).map((team) => ({
      teamId: team.id,
      nameEnglish: team.nameEnglish,
      nameJapanese: team.nameJapanese,
      abbreviation: team.abbreviation,
      league: team.league,
      city: team.city,
    })),
    ...archive.teams,
  ];
  for (const team of teams) {
    await write(`upsert team ${team.teamId}`, () => writer.upsertTeam(team));
    summary.teams++;
  }

  for (const player of archive.players) {
    const { batting, pitching, ...identity } = player;
    await write(`upsert player ${player.playerId}`, () => writer.upsertPlayer(identity));
    summary.players++;

    for (const { season, teamId, games, war, dataSource, wrcPlus, ...counts } of batting) {
      await write(`upsert batting ${player.playerId} ${season}`, () =>
        writer.upsertBattingSeason({
          playerId: player.playerId,
          season,
          teamId,
          games,
          war,
          dataSource,
          wrcPlus,
          counts,
        })
      );
      summary.battingSeasons++;
    }

    for (const { season, teamId, games, war, dataSource, xfip, innings, ...counts } of pitching) {
      await write(`upsert pitching ${player.playerId} ${season}`, () =>
        writer.upsertPitchingSeason({
          playerId: player.playerId,
          season,
          teamId,
          games,
          war,
          dataSource,
          xfip,
          counts: { ...counts, outsRecorded: innings },
        })
      );
      summary.pitchingSeasons++;
    }
  }

  logger.info('Historical archive imported', { ...summary });
  return summary;
}
