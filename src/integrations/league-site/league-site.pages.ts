/**
 * League site page contracts.
 *
 * The English stats pages carry no column classes, so every parser reads
 * cells by position. Positions count th and td cells alike, left to right.
 * A row is only read when its games cell holds an integer, which skips
 * header, legend and totals rows.
 */

import { BattingCounts, League, PitchingCounts, StatsType } from '../../domain/model/canonical.types';
import { nameSlug, toWesternOrder } from '../../domain/names/name-resolver';
import { parseSplitInnings } from '../../domain/stats/rate-stats';
import { HtmlLink, HtmlPage, HtmlTableRow } from '../shared/html-page.client';

export const LEAGUE_SITE_ID_PREFIX = 'npb-';

export type PageLayout = 'team' | 'leaders';

const LEAGUE_CODE: Record<League, string> = { central: 'c', pacific: 'p' };

export const LEAGUES: readonly League[] = ['central', 'pacific'];

export function leadersPageUrl(baseUrl: string, season: number, league: League, statsType: StatsType): string {
  const page = statsType === 'batting' ? 'bat' : 'pit';
  return `${baseUrl}/bis/eng/${season}/stats/${page}_${LEAGUE_CODE[league]}.html`;
}

export function teamPageUrl(baseUrl: string, season: number, siteCode: string, statsType: StatsType): string {
  const page = statsType === 'batting' ? 'idb1' : 'idp1';
  return `${baseUrl}/bis/eng/${season}/stats/${page}_${siteCode}.html`;
}

export function standingsPageUrl(baseUrl: string, season: number, league: League): string {
  return `${baseUrl}/bis/eng/${season}/standings/std_${LEAGUE_CODE[league]}.html`;
}

// Team page batting columns. Leaders pages insert a team column after the
// name, shifting every stat one place right.
const BATTING_COLUMNS = {
  games: 2,
  plateAppearances: 3,
  atBats: 4,
  runs: 5,
  hits: 6,
  doubles: 7,
  triples: 8,
  homeRuns: 9,
  rbi: 11,
  stolenBases: 12,
  caughtStealing: 13,
  sacrificeFlies: 15,
  walks: 16,
  hitByPitch: 18,
  strikeouts: 19,
} as const;

const PITCHING_COLUMNS = {
  games: 2,
  wins: 3,
  losses: 4,
  saves: 5,
  holds: 6,
  completeGames: 8,
  shutouts: 9,
  inningsWhole: 13,
  inningsFraction: 14,
  hitsAllowed: 15,
  homeRunsAllowed: 16,
  walksAllowed: 17,
  hitBatters: 19,
  strikeouts: 20,
  runsAllowed: 23,
  earnedRuns: 24,
} as const;

const MIN_BATTING_CELLS = 24;
const MIN_PITCHING_CELLS = 26;
const MIN_STANDINGS_CELLS = 7;
const NAME_COLUMN = 1;
const LEADERS_TEAM_COLUMN = 2;

export interface ScrapedPlayer {
  /** Display name as printed ("Family, Given" on this site) */
  name: string;
  link: HtmlLink | null;
}

interface ScrapedRowBase {
  player: ScrapedPlayer;
  /** Team column of leaders pages; null on team pages */
  teamText: string | null;
  games: number;
}

export interface BattingPageRow extends ScrapedRowBase {
  counts: BattingCounts;
}

export interface PitchingPageRow extends ScrapedRowBase {
  counts: PitchingCounts;
}

export interface StandingsPageRow {
  rank: number;
  teamText: string;
  games: number;
  wins: number;
  losses: number;
  ties: number;
  winningPercentage: number | null;
  gamesBehind: number | null;
}

/** Integer cell; "-" and blanks read as 0, anything else non-numeric as null. */
export function parseCountCell(text: string | undefined): number | null {
  const cleaned = (text ?? '').replace(/,/g, '').trim();
  if (cleaned === '' || cleaned === '-' || cleaned === '--') return 0;
  return /^\d+$/.test(cleaned) ? parseInt(cleaned, 10) : null;
}

function parseDecimalCell(text: string | undefined): number | null {
  const cleaned = (text ?? '').trim();
  if (!/^-?\d*\.?\d+$/.test(cleaned)) return null;
  return parseFloat(cleaned);
}

function dataRows(page: HtmlPage, minCells: number): HtmlTableRow[] {
  return page.tables.flatMap((table) => table.rows).filter((row) => !row.isHeader && row.cells.length >= minCells);
}

/**
 * Reads the stat cells of one row through a column offset. Returns null when
 * the games cell is not an integer.
 */
function cellReader(row: HtmlTableRow, offset: number, gamesColumn: number) {
  const gamesText = (row.cells[gamesColumn + offset] ?? '').replace(/,/g, '').trim();
  if (!/^\d+$/.test(gamesText)) return null;
  return {
    games: parseInt(gamesText, 10),
    count: (column: number): number => parseCountCell(row.cells[column + offset]) ?? 0,
    text: (column: number): string => row.cells[column + offset] ?? '',
  };
}

function scrapedPlayer(row: HtmlTableRow): ScrapedPlayer | null {
  const name = row.cells[NAME_COLUMN]?.trim() ?? '';
  if (!name) return null;
  return { name, link: row.links[NAME_COLUMN] ?? null };
}

function offsetFor(layout: PageLayout): number {
  return layout === 'leaders' ? 1 : 0;
}

function teamTextOf(row: HtmlTableRow, layout: PageLayout): string | null {
  if (layout !== 'leaders') return null;
  const text = row.cells[LEADERS_TEAM_COLUMN]?.trim();
  return text ? text : null;
}

export function parseBattingRows(page: HtmlPage, layout: PageLayout): BattingPageRow[] {
  const offset = offsetFor(layout);
  const rows: BattingPageRow[] = [];

  for (const row of dataRows(page, MIN_BATTING_CELLS + offset)) {
    const player = scrapedPlayer(row);
    const cells = cellReader(row, offset, BATTING_COLUMNS.games);
    if (!player || !cells) continue;

    rows.push({
      player,
      teamText: teamTextOf(row, layout),
      games: cells.games,
      counts: {
        plateAppearances: cells.count(BATTING_COLUMNS.plateAppearances),
        atBats: cells.count(BATTING_COLUMNS.atBats),
        runs: cells.count(BATTING_COLUMNS.runs),
        hits: cells.count(BATTING_COLUMNS.hits),
        doubles: cells.count(BATTING_COLUMNS.doubles),
        triples: cells.count(BATTING_COLUMNS.triples),
        homeRuns: cells.count(BATTING_COLUMNS.homeRuns),
        rbi: cells.count(BATTING_COLUMNS.rbi),
        stolenBases: cells.count(BATTING_COLUMNS.stolenBases),
        caughtStealing: cells.count(BATTING_COLUMNS.caughtStealing),
        walks: cells.count(BATTING_COLUMNS.walks),
        hitByPitch: cells.count(BATTING_COLUMNS.hitByPitch),
        sacrificeFlies: cells.count(BATTING_COLUMNS.sacrificeFlies),
        strikeouts: cells.count(BATTING_COLUMNS.strikeouts),
      },
    });
  }

  return rows;
}

export function parsePitchingRows(page: HtmlPage, layout: PageLayout): PitchingPageRow[] {
  const offset = offsetFor(layout);
  const rows: PitchingPageRow[] = [];

  for (const row of dataRows(page, MIN_PITCHING_CELLS + offset)) {
    const player = scrapedPlayer(row);
    const cells = cellReader(row, offset, PITCHING_COLUMNS.games);
    if (!player || !cells) continue;

    rows.push({
      player,
      teamText: teamTextOf(row, layout),
      games: cells.games,
      counts: {
        // Not printed on these pages
        gamesStarted: 0,
        wins: cells.count(PITCHING_COLUMNS.wins),
        losses: cells.count(PITCHING_COLUMNS.losses),
        saves: cells.count(PITCHING_COLUMNS.saves),
        holds: cells.count(PITCHING_COLUMNS.holds),
        completeGames: cells.count(PITCHING_COLUMNS.completeGames),
        shutouts: cells.count(PITCHING_COLUMNS.shutouts),
        outsRecorded: parseSplitInnings(
          cells.text(PITCHING_COLUMNS.inningsWhole),
          cells.text(PITCHING_COLUMNS.inningsFraction)
        ),
        hitsAllowed: cells.count(PITCHING_COLUMNS.hitsAllowed),
        runsAllowed: cells.count(PITCHING_COLUMNS.runsAllowed),
        earnedRuns: cells.count(PITCHING_COLUMNS.earnedRuns),
        homeRunsAllowed: cells.count(PITCHING_COLUMNS.homeRunsAllowed),
        walksAllowed: cells.count(PITCHING_COLUMNS.walksAllowed),
        hitBatters: cells.count(PITCHING_COLUMNS.hitBatters),
        strikeouts: cells.count(PITCHING_COLUMNS.strikeouts),
      },
    });
  }

  return rows;
}

export function parseStandingsRows(page: HtmlPage): StandingsPageRow[] {
  const rows: StandingsPageRow[] = [];

  for (const row of dataRows(page, MIN_STANDINGS_CELLS)) {
    const rank = parseCountCell(row.cells[0]);
    const games = parseCountCell(row.cells[2]);
    const teamText = row.cells[1]?.trim() ?? '';
    if (!rank || games === null || !teamText) continue;

    const gamesBehindText = row.cells[7]?.trim() ?? '';
    rows.push({
      rank,
      teamText,
      games,
      wins: parseCountCell(row.cells[3]) ?? 0,
      losses: parseCountCell(row.cells[4]) ?? 0,
      ties: parseCountCell(row.cells[5]) ?? 0,
      winningPercentage: parseDecimalCell(row.cells[6]),
      // The leader's cell is printed as "-" or "--"
      gamesBehind: /^-+$/.test(gamesBehindText) ? 0 : parseDecimalCell(gamesBehindText),
    });
  }

  return rows;
}

/**
 * Site player id: "npb-<digits>" from a numeric player page link
 * (/bis/eng/players/12345678.html or ?id=12345678), otherwise
 * "npb-<slug of the display name>".
 *
 * The slug fallback is not unique: every unlinked row with the same name, in
 * any season and on any team, gets the same id, so two such players share one
 * career. Rows with a player page link never collide.
 */
export function leagueSitePlayerId(player: ScrapedPlayer): string {
  const href = player.link?.href ?? '';
  const pageMatch = /\/players\/(\d+)\.html/.exec(href) ?? /[?&]id=(\d+)/.exec(href);
  if (pageMatch) return `${LEAGUE_SITE_ID_PREFIX}${pageMatch[1]}`;
  return `${LEAGUE_SITE_ID_PREFIX}${nameSlug(player.name)}`;
}

export function displayName(player: ScrapedPlayer): string {
  return toWesternOrder(player.name);
}
