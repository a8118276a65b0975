/**
 * Canonical model
 *
 * Shapes every source provider normalizes into. Objects are plain data built
 * fresh per call; code that merges results builds new objects instead of
 * mutating its inputs. Absent values are `null`, never `undefined`, so rows
 * survive a JSON round trip through the response cache unchanged.
 */

export type League = 'central' | 'pacific';

export type StatsType = 'batting' | 'pitching';

/** Source tags for the concrete providers; merged rows join tags with '+'. */
export const SOURCE = {
  HISTORICAL: 'historical',
  LEAGUE_SITE: 'league_site',
  REFERENCE_SITE: 'reference_site',
} as const;

export type SourceName = (typeof SOURCE)[keyof typeof SOURCE];

export interface Team {
  id: string;
  nameEnglish: string;
  nameJapanese: string | null;
  league: League;
  abbreviation: string;
  city: string;
}

/** Lightweight pointer to a team carried by players and stat rows. */
export interface TeamRef {
  id: string;
  name: string;
  league: League | null;
}

export interface Player {
  /** Unique inside the producing provider's namespace only. */
  id: string;
  nameEnglish: string;
  nameJapanese: string | null;
  /** Native ids keyed by source name, including the producing provider's own. */
  sourceIds: Record<string, string>;
  team: TeamRef | null;
  jerseyNumber: string | null;
  position: string | null;
  /** Free text per source, e.g. "Active 1994-2000, position player". */
  disambiguationHints: Record<string, string>;
  source: string;
}

interface StatsRowBase {
  playerId: string;
  /** null for a career aggregate */
  season: number | null;
  team: TeamRef | null;
  source: string;
  games: number;
}

export interface BattingCounts {
  plateAppearances: number;
  atBats: number;
  runs: number;
  hits: number;
  doubles: number;
  triples: number;
  homeRuns: number;
  rbi: number;
  stolenBases: number;
  caughtStealing: number;
  walks: number;
  hitByPitch: number;
  sacrificeFlies: number;
  strikeouts: number;
}

export interface BattingRates {
  battingAverage: number | null;
  onBasePercentage: number | null;
  sluggingPercentage: number | null;
  ops: number | null;
}

export interface BattingAdvanced {
  war: number | null;
  wrcPlus: number | null;
  woba: number | null;
  opsPlus: number | null;
  runsCreated: number | null;
  warEstimate: number | null;
}

export interface BattingStats extends StatsRowBase, BattingCounts, BattingRates {
  statsType: 'batting';
  advanced: BattingAdvanced;
}

export interface PitchingCounts {
  gamesStarted: number;
  wins: number;
  losses: number;
  saves: number;
  holds: number;
  completeGames: number;
  shutouts: number;
  /** Innings are carried as outs so every counting field is an integer. */
  outsRecorded: number;
  hitsAllowed: number;
  runsAllowed: number;
  earnedRuns: number;
  homeRunsAllowed: number;
  walksAllowed: number;
  hitBatters: number;
  strikeouts: number;
}

export interface PitchingRates {
  /** Decimal innings (outs / 3), rounded to two places. */
  inningsPitched: number | null;
  era: number | null;
  whip: number | null;
  strikeoutsPerNine: number | null;
  walksPerNine: number | null;
}

export interface PitchingAdvanced {
  war: number | null;
  fip: number | null;
  xfip: number | null;
  eraPlus: number | null;
  warEstimate: number | null;
}

export interface PitchingStats extends StatsRowBase, PitchingCounts, PitchingRates {
  statsType: 'pitching';
  advanced: PitchingAdvanced;
}

export type SeasonStats = BattingStats | PitchingStats;

export interface StandingsRow {
  rank: number;
  team: TeamRef;
  games: number;
  wins: number;
  losses: number;
  ties: number;
  winningPercentage: number | null;
  gamesBehind: number | null;
}

export interface LeagueStandings {
  season: number;
  league: League;
  rows: StandingsRow[];
  source: string;
}
