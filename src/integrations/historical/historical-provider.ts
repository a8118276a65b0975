import { ZodError } from 'zod';
import { logger } from '../../config/logger.config';
import {
  BattingStats,
  PitchingStats,
  Player,
  SOURCE,
  SeasonStats,
  Team,
  TeamRef,
} from '../../domain/model/canonical.types';
import { generateNameVariants } from '../../domain/names/name-resolver';
import {
  collapseSeasons,
  computeCareerTotals,
  createBattingStats,
  createPitchingStats,
} from '../../domain/stats/season-stats';
import { TransportFailureException, throwIfAborted } from '../../utils/exceptions';
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
  HistoricalBattingCareerRow,
  HistoricalBattingRow,
  HistoricalPitchingCareerRow,
  HistoricalPitchingRow,
  HistoricalPlayerRow,
  HistoricalTeamRow,
  describeHistoricalPlayer,
  playerRole,
} from './historical.model';
import { HistoricalStore, toContainsPattern } from './historical.repository';

function teamRefOf(teamId: string, name: string | null, league: TeamRef['league']): TeamRef {
  return { id: teamId, name: name ?? teamId, league };
}

function battingFromRow(row: HistoricalBattingRow, playerId: string): BattingStats {
  return createBattingStats(
    {
      playerId,
      season: row.season,
      team: teamRefOf(row.team_id, row.team_name, row.team_league),
      source: SOURCE.HISTORICAL,
      games: row.games,
    },
    {
      plateAppearances: row.plate_appearances,
      atBats: row.at_bats,
      runs: row.runs,
      hits: row.hits,
      doubles: row.doubles,
      triples: row.triples,
      homeRuns: row.home_runs,
      rbi: row.rbi,
      stolenBases: row.stolen_bases,
      caughtStealing: row.caught_stealing,
      walks: row.walks,
      hitByPitch: row.hit_by_pitch,
      sacrificeFlies: row.sacrifice_flies,
      strikeouts: row.strikeouts,
    },
    { war: row.war, wrcPlus: row.wrc_plus }
  );
}

function pitchingFromRow(row: HistoricalPitchingRow, playerId: string): PitchingStats {
  return createPitchingStats(
    {
      playerId,
      season: row.season,
      team: teamRefOf(row.team_id, row.team_name, row.team_league),
      source: SOURCE.HISTORICAL,
      games: row.games,
    },
    {
      gamesStarted: row.games_started,
      wins: row.wins,
      losses: row.losses,
      saves: row.saves,
      holds: row.holds,
      completeGames: row.complete_games,
      shutouts: row.shutouts,
      outsRecorded: row.outs_recorded,
      hitsAllowed: row.hits_allowed,
      runsAllowed: row.runs_allowed,
      earnedRuns: row.earned_runs,
      homeRunsAllowed: row.home_runs_allowed,
      walksAllowed: row.walks_allowed,
      hitBatters: row.hit_batters,
      strikeouts: row.strikeouts,
    },
    { war: row.war, xfip: row.xfip }
  );
}

function battingFromCareerRow(row: HistoricalBattingCareerRow, playerId: string): BattingStats {
  return createBattingStats(
    { playerId, season: null, team: null, source: SOURCE.HISTORICAL, games: row.games },
    {
      plateAppearances: row.plate_appearances,
      atBats: row.at_bats,
      runs: row.runs,
      hits: row.hits,
      doubles: row.doubles,
      triples: row.triples,
      homeRuns: row.home_runs,
      rbi: row.rbi,
      stolenBases: row.stolen_bases,
      caughtStealing: row.caught_stealing,
      walks: row.walks,
      hitByPitch: row.hit_by_pitch,
      sacrificeFlies: row.sacrifice_flies,
      strikeouts: row.strikeouts,
    },
    { war: row.war }
  );
}

function pitchingFromCareerRow(row: HistoricalPitchingCareerRow, playerId: string): PitchingStats {
  return createPitchingStats(
    { playerId, season: null, team: null, source: SOURCE.HISTORICAL, games: row.games },
    {
      gamesStarted: row.games_started,
      wins: row.wins,
      losses: row.losses,
      saves: row.saves,
      holds: row.holds,
      completeGames: row.complete_games,
      shutouts: row.shutouts,
      outsRecorded: row.outs_recorded,
      hitsAllowed: row.hits_allowed,
      runsAllowed: row.runs_allowed,
      earnedRuns: row.earned_runs,
      homeRunsAllowed: row.home_runs_allowed,
      walksAllowed: row.walks_allowed,
      hitBatters: row.hit_batters,
      strikeouts: row.strikeouts,
    },
    { war: row.war }
  );
}

function positionOf(row: HistoricalPlayerRow): string | null {
  if (row.primary_position) return row.primary_position;
  return playerRole(row) === 'pitcher' ? 'P' : null;
}

function teamFromRow(row: HistoricalTeamRow): Team {
  return {
    id: row.team_id,
    nameEnglish: row.name_english,
    nameJapanese: row.name_japanese,
    league: row.league,
    abbreviation: row.abbreviation,
    city: row.city,
  };
}

/**
 * Historical Provider
 * Serves seasons before the live-site cutoff from the PostgreSQL archive.
 * Queries cannot be cancelled once sent; the abort signal is checked before
 * each one.
 */
export class HistoricalProvider implements SourceProvider {
  readonly providerId = SOURCE.HISTORICAL;

  constructor(private readonly store: HistoricalStore) {}

  async searchPlayer(name: string, options: RequestOptions = {}): Promise<Player[]> {
    const trimmed = name.trim();
    if (!trimmed) return [];

    const patterns = [...new Set([trimmed, ...generateNameVariants(trimmed)])].map(toContainsPattern);
    const rows = await this.run('searchPlayer', options, () => this.store.searchPlayers(patterns));

    logger.debug('Historical search', { query: trimmed, results: rows.length });
    return rows.map((row) => this.toPlayer(row, null));
  }

  async getPlayerStats(
    playerId: string,
    query: StatsQuery,
    options: RequestOptions = {}
  ): Promise<PlayerStatsResult> {
    const player = await this.run('getPlayerStats', options, () => this.store.findPlayer(playerId));
    if (!player) return NOT_FOUND;

    const id = player.player_id;
    const season = query.season ?? undefined;
    const rows: SeasonStats[] =
      query.statsType === 'batting'
        ? (await this.run('getPlayerStats', options, () => this.store.findBattingSeasons(id, season))).map(
            (row) => battingFromRow(row, id)
          )
        : (await this.run('getPlayerStats', options, () => this.store.findPitchingSeasons(id, season))).map(
            (row) => pitchingFromRow(row, id)
          );

    const seasons = collapseSeasons(rows);
    if (seasons.length === 0) return NOT_FOUND;

    const canonicalPlayer = this.toPlayer(player, seasons[seasons.length - 1].team);

    if (season !== undefined) {
      return { kind: 'season', player: canonicalPlayer, stats: seasons[0] };
    }

    const storedTotals = await this.storedTotals(id, query, options);
    return {
      kind: 'career',
      player: canonicalPlayer,
      seasons,
      totals: computeCareerTotals(seasons, query.statsType, id, SOURCE.HISTORICAL),
      storedTotals,
    };
  }

  async getTeams(_season?: number, options: RequestOptions = {}): Promise<Team[]> {
    const rows = await this.run('getTeams', options, () => this.store.findTeams());
    return rows.map(teamFromRow);
  }

  async getTeamRoster(teamId: string, season?: number, options: RequestOptions = {}): Promise<Player[]> {
    const [rows, teams] = await Promise.all([
      this.run('getTeamRoster', options, () => this.store.findRoster(teamId, season)),
      this.run('getTeamRoster', options, () => this.store.findTeams()),
    ]);
    const team = teams.find((candidate) => candidate.team_id === teamId);
    const teamRef = team
      ? teamRefOf(team.team_id, team.name_english, team.league)
      : teamRefOf(teamId, null, null);
    return rows.map((row) => this.toPlayer(row, teamRef));
  }

  async getStandings(): Promise<StandingsResult> {
    return unsupported('The historical archive keeps no standings');
  }

  async healthCheck(): Promise<boolean> {
    try {
      return await this.store.ping();
    } catch (error) {
      logger.warn('Historical archive health check failed', {
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  private async storedTotals(
    playerId: string,
    query: StatsQuery,
    options: RequestOptions
  ): Promise<SeasonStats | null> {
    if (query.statsType === 'batting') {
      const row = await this.run('getPlayerStats', options, () => this.store.findBattingCareer(playerId));
      return row ? battingFromCareerRow(row, playerId) : null;
    }
    const row = await this.run('getPlayerStats', options, () => this.store.findPitchingCareer(playerId));
    return row ? pitchingFromCareerRow(row, playerId) : null;
  }

  private toPlayer(row: HistoricalPlayerRow, team: TeamRef | null): Player {
    return {
      id: row.player_id,
      nameEnglish: row.name_english,
      nameJapanese: row.name_japanese,
      sourceIds: { ...row.source_ids, [SOURCE.HISTORICAL]: row.player_id },
      team,
      jerseyNumber: null,
      position: positionOf(row),
      disambiguationHints: { [SOURCE.HISTORICAL]: describeHistoricalPlayer(row) },
      source: SOURCE.HISTORICAL,
    };
  }

  /**
   * Run one store call, translating database and validation errors into
   * TransportFailureException.
   */
  private async run<T>(operation: string, options: RequestOptions, fn: () => Promise<T>): Promise<T> {
    throwIfAborted(options.signal, operation);
    try {
      return await fn();
    } catch (error) {
      if (error instanceof ZodError) {
        throw TransportFailureException.malformed(
          SOURCE.HISTORICAL,
          operation,
          error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')
        );
      }
      throw TransportFailureException.fromError(SOURCE.HISTORICAL, operation, error);
    }
  }
}
