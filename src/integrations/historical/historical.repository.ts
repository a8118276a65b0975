import { Pool } from 'pg';
import { timedQuery } from '../../db/pool';
import {
  HistoricalBattingCareerRow,
  HistoricalBattingRow,
  HistoricalBattingSeasonInput,
  HistoricalPitchingCareerRow,
  HistoricalPitchingRow,
  HistoricalPitchingSeasonInput,
  HistoricalPlayerInput,
  HistoricalPlayerRow,
  HistoricalTeamInput,
  HistoricalTeamRow,
  historicalBattingCareerRowSchema,
  historicalBattingRowSchema,
  historicalPitchingCareerRowSchema,
  historicalPitchingRowSchema,
  historicalPlayerRowSchema,
  historicalTeamRowSchema,
  parseRows,
} from './historical.model';

/**
 * Read access to the historical archive. HistoricalProvider depends on this
 * interface only; tests substitute an in-memory store.
 */
export interface HistoricalStore {
  /** Players whose English, Japanese or alternate name matches any ILIKE pattern */
  searchPlayers(patterns: string[]): Promise<HistoricalPlayerRow[]>;
  /** Lookup by archive id, or by any id recorded in source_ids */
  findPlayer(id: string): Promise<HistoricalPlayerRow | null>;
  findBattingSeasons(playerId: string, season?: number): Promise<HistoricalBattingRow[]>;
  findPitchingSeasons(playerId: string, season?: number): Promise<HistoricalPitchingRow[]>;
  findBattingCareer(playerId: string): Promise<HistoricalBattingCareerRow | null>;
  findPitchingCareer(playerId: string): Promise<HistoricalPitchingCareerRow | null>;
  findTeams(): Promise<HistoricalTeamRow[]>;
  findRoster(teamId: string, season?: number): Promise<HistoricalPlayerRow[]>;
  ping(): Promise<boolean>;
}

const SEARCH_LIMIT = 50;

// Player columns plus career span and season counts
const PLAYER_SELECT = `
  SELECT p.player_id, p.name_english, p.name_japanese, p.name_variants, p.source_ids,
         p.primary_position, span.first_season, span.last_season,
         span.batting_seasons, span.pitching_seasons
  FROM historical_players p
  CROSS JOIN LATERAL (
    SELECT MIN(s.season) AS first_season,
           MAX(s.season) AS last_season,
           COUNT(*) FILTER (WHERE s.kind = 'batting') AS batting_seasons,
           COUNT(*) FILTER (WHERE s.kind = 'pitching') AS pitching_seasons
    FROM (
      SELECT season, 'batting' AS kind FROM historical_batting_seasons WHERE player_id = p.player_id
      UNION ALL
      SELECT season, 'pitching' AS kind FROM historical_pitching_seasons WHERE player_id = p.player_id
    ) s
  ) span`;

/** Escape LIKE wildcards so a name is matched literally inside %...% */
export function toContainsPattern(text: string): string {
  return `%${text.replace(/[\\%_]/g, (char) => `\\${char}`)}%`;
}

export class HistoricalRepository implements HistoricalStore {
  constructor(private readonly db: Pool) {}

  async searchPlayers(patterns: string[]): Promise<HistoricalPlayerRow[]> {
    if (patterns.length === 0) return [];

    const result = await timedQuery(
      this.db,
      `${PLAYER_SELECT}
       WHERE p.name_english ILIKE ANY($1::text[])
          OR p.name_japanese ILIKE ANY($1::text[])
          OR EXISTS (SELECT 1 FROM unnest(p.name_variants) v WHERE v ILIKE ANY($1::text[]))
       ORDER BY p.name_english, p.player_id
       LIMIT $2`,
      [patterns, SEARCH_LIMIT],
      'historical.searchPlayers'
    );
    return parseRows(historicalPlayerRowSchema, result.rows);
  }

  async findPlayer(id: string): Promise<HistoricalPlayerRow | null> {
    const result = await timedQuery(
      this.db,
      `${PLAYER_SELECT}
       WHERE p.player_id = $1
          OR EXISTS (SELECT 1 FROM jsonb_each_text(p.source_ids) ids WHERE ids.value = $1)
       ORDER BY (p.player_id = $1) DESC
       LIMIT 1`,
      [id],
      'historical.findPlayer'
    );
    return result.rows.length > 0 ? historicalPlayerRowSchema.parse(result.rows[0]) : null;
  }

  async findBattingSeasons(playerId: string, season?: number): Promise<HistoricalBattingRow[]> {
    const result = await timedQuery(
      this.db,
      `SELECT b.*, t.name_english AS team_name, t.league AS team_league
       FROM historical_batting_seasons b
       LEFT JOIN historical_teams t ON t.team_id = b.team_id
       WHERE b.player_id = $1 AND ($2::int IS NULL OR b.season = $2)
       ORDER BY b.season, b.team_id`,
      [playerId, season ?? null],
      'historical.findBattingSeasons'
    );
    return parseRows(historicalBattingRowSchema, result.rows);
  }

  async findPitchingSeasons(playerId: string, season?: number): Promise<HistoricalPitchingRow[]> {
    const result = await timedQuery(
      this.db,
      `SELECT p.*, t.name_english AS team_name, t.league AS team_league
       FROM historical_pitching_seasons p
       LEFT JOIN historical_teams t ON t.team_id = p.team_id
       WHERE p.player_id = $1 AND ($2::int IS NULL OR p.season = $2)
       ORDER BY p.season, p.team_id`,
      [playerId, season ?? null],
      'historical.findPitchingSeasons'
    );
    return parseRows(historicalPitchingRowSchema, result.rows);
  }

  async findBattingCareer(playerId: string): Promise<HistoricalBattingCareerRow | null> {
    const result = await timedQuery(
      this.db,
      'SELECT * FROM historical_batting_career WHERE player_id = $1',
      [playerId],
      'historical.findBattingCareer'
    );
    return result.rows.length > 0 ? historicalBattingCareerRowSchema.parse(result.rows[0]) : null;
  }

  async findPitchingCareer(playerId: string): Promise<HistoricalPitchingCareerRow | null> {
    const result = await timedQuery(
      this.db,
      'SELECT * FROM historical_pitching_career WHERE player_id = $1',
      [playerId],
      'historical.findPitchingCareer'
    );
    return result.rows.length > 0 ? historicalPitchingCareerRowSchema.parse(result.rows[0]) : null;
  }

  async findTeams(): Promise<HistoricalTeamRow[]> {
    const result = await timedQuery(
      this.db,
      `SELECT team_id, name_english, name_japanese, abbreviation, league, city
       FROM historical_teams
       ORDER BY league, team_id`,
      [],
      'historical.findTeams'
    );
    return parseRows(historicalTeamRowSchema, result.rows);
  }

  async findRoster(teamId: string, season?: number): Promise<HistoricalPlayerRow[]> {
    const result = await timedQuery(
      this.db,
      `${PLAYER_SELECT}
       WHERE p.player_id IN (
         SELECT player_id FROM historical_batting_seasons
         WHERE team_id = $1 AND ($2::int IS NULL OR season = $2)
         UNION
         SELECT player_id FROM historical_pitching_seasons
         WHERE team_id = $1 AND ($2::int IS NULL OR season = $2)
       )
       ORDER BY p.name_english, p.player_id`,
      [teamId, season ?? null],
      'historical.findRoster'
    );
    return parseRows(historicalPlayerRowSchema, result.rows);
  }

  async ping(): Promise<boolean> {
    const result = await this.db.query<{ ok: number }>('SELECT 1 AS ok');
    return result.rows[0]?.ok === 1;
  }

  // ---------------------------------------------------------------------------
  // Writes (archive import)
  // ---------------------------------------------------------------------------

  async upsertTeam(team: HistoricalTeamInput): Promise<void> {
    await this.db.query(
      `INSERT INTO historical_teams (team_id, name_english, name_japanese, abbreviation, league, city)
       VALUES ($1, $2, $3, $4, $5, $6)
       ON CONFLICT (team_id) DO UPDATE SET
         name_english = EXCLUDED.name_english,
         name_japanese = EXCLUDED.name_japanese,
         abbreviation = EXCLUDED.abbreviation,
         league = EXCLUDED.league,
         city = EXCLUDED.city`,
      [team.teamId, team.nameEnglish, team.nameJapanese, team.abbreviation, team.league, team.city]
    );
  }

  async upsertPlayer(player: HistoricalPlayerInput): Promise<void> {
    await this.db.query(
      `INSERT INTO historical_players
         (player_id, name_english, name_japanese, name_variants, source_ids, primary_position)
       VALUES ($1, $2, $3, $4, $5::jsonb, $6)
       ON CONFLICT (player_id) DO UPDATE SET
         name_english = EXCLUDED.name_english,
         name_japanese = EXCLUDED.name_japanese,
         name_variants = EXCLUDED.name_variants,
         source_ids = historical_players.source_ids || EXCLUDED.source_ids,
         primary_position = EXCLUDED.primary_position,
         updated_at = NOW()`,
      [
        player.playerId,
        player.nameEnglish,
        player.nameJapanese,
        player.nameVariants,
        JSON.stringify(player.sourceIds),
        player.primaryPosition,
      ]
    );
  }

  async upsertBattingSeason(row: HistoricalBattingSeasonInput): Promise<void> {
    const c = row.counts;
    await this.db.query(
      `INSERT INTO historical_batting_seasons
         (player_id, season, team_id, games, plate_appearances, at_bats, runs, hits, doubles,
          triples, home_runs, rbi, stolen_bases, caught_stealing, walks, hit_by_pitch,
          sacrifice_flies, strikeouts, war, wrc_plus, data_source)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, $16, $17, $18, $19, $20, $21)
       ON CONFLICT (player_id, season, team_id) DO UPDATE SET
         games = EXCLUDED.games,
         plate_appearances = EXCLUDED.plate_appearances,
         at_bats = EXCLUDED.at_bats,
         runs = EXCLUDED.runs,
         hits = EXCLUDED.hits,
         doubles = EXCLUDED.doubles,
         triples = EXCLUDED.triples,
         home_runs = EXCLUDED.home_runs,
         rbi = EXCLUDED.rbi,
         stolen_bases = EXCLUDED.stolen_bases,
         caught_stealing = EXCLUDED.caught_stealing,
         walks = EXCLUDED.walks,
         hit_by_pitch = EXCLUDED.hit_by_pitch,
         sacrifice_flies = EXCLUDED.sacrifice_flies,
         strikeouts = EXCLUDED.strikeouts,
         war = EXCLUDED.war,
         wrc_plus = EXCLUDED.wrc_plus,
         data_source = EXCLUDED.data_source,
         updated_at = NOW()`,
      [
        row.playerId,
        row.season,
        row.teamId,
        row.games,
        c.plateAppearances,
        c.atBats,
        c.runs,
        c.hits,
        c.doubles,
        c.triples,
        c.homeRuns,
        c.rbi,
        c.stolenBases,
        c.caughtStealing,
        c.walks,
        c.hitByPitch,
        c.sacrificeFlies,
        c.strikeouts,
        row.war,
        row.wrcPlus,
        row.dataSource,
      ]
    );
  }

  async upsertPitchingSeason(row: HistoricalPitchingSeasonInput): Promise<void> {
    const c = row.counts;
    await this.db.query(
      `INSERT INTO historical_pitching_seasons
         (player_id, season, team_id, games, games_started, wins, losses, saves, holds,
          complete_games, shutouts, outs_recorded, hits_allowed, runs_allowed, earned_runs,
          home_runs_allowed, walks_allowed, hit_batters, strikeouts, war, xfip, data_source)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, $16, $17, $18, $19, $20, $21, $22)
       ON CONFLICT (player_id, season, team_id) DO UPDATE SET
         games = EXCLUDED.games,
         games_started = EXCLUDED.games_started,
         wins = EXCLUDED.wins,
         losses = EXCLUDED.losses,
         saves = EXCLUDED.saves,
         holds = EXCLUDED.holds,
         complete_games = EXCLUDED.complete_games,
         shutouts = EXCLUDED.shutouts,
         outs_recorded = EXCLUDED.outs_recorded,
         hits_allowed = EXCLUDED.hits_allowed,
         runs_allowed = EXCLUDED.runs_allowed,
         earned_runs = EXCLUDED.earned_runs,
         home_runs_allowed = EXCLUDED.home_runs_allowed,
         walks_allowed = EXCLUDED.walks_allowed,
         hit_batters = EXCLUDED.hit_batters,
         strikeouts = EXCLUDED.strikeouts,
         war = EXCLUDED.war,
         xfip = EXCLUDED.xfip,
         data_source = EXCLUDED.data_source,
         updated_at = NOW()`,
      [
        row.playerId,
        row.season,
        row.teamId,
        row.games,
        c.gamesStarted,
        c.wins,
        c.losses,
        c.saves,
        c.holds,
        c.completeGames,
        c.shutouts,
        c.outsRecorded,
        c.hitsAllowed,
        c.runsAllowed,
        c.earnedRuns,
        c.homeRunsAllowed,
        c.walksAllowed,
        c.hitBatters,
        c.strikeouts,
        row.war,
        row.xfip,
        row.dataSource,
      ]
    );
  }
}
