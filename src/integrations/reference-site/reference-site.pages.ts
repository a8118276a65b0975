/**
 * Reference site page contracts: search results and register (player)
 * pages. Stats tables are read by header text, not position.
 */

import { BattingCounts, League, PitchingCounts, StatsType } from '../../domain/model/canonical.types';
import { parseInningsNotation } from '../../domain/stats/rate-stats';
import { HtmlPage, HtmlTable } from '../shared/html-page.client';

export const REFERENCE_ID_PREFIX = 'br_';

const REGISTER_LINK = /\/register\/player\.fcgi\?id=([^&#"]+)/;

/** League column values of Japanese top-level rows */
const JAPANESE_LEAGUES: Record<string, League | null> = {
  JPC: 'central',
  JPCL: 'central',
  JPP: 'pacific',
  JPPL: 'pacific',
  NPB: null,
};

const TABLE_IDS: Record<StatsType, string[]> = {
  batting: ['standard_batting', 'batting_standard', 'batting'],
  pitching: ['standard_pitching', 'pitching_standard', 'pitching'],
};

export function searchPageUrl(baseUrl: string, name: string): string {
  return `${baseUrl}/search/search.fcgi?search=${encodeURIComponent(name)}`;
}

export function registerPageUrl(baseUrl: string, registerId: string): string {
  return `${baseUrl}/register/player.fcgi?id=${encodeURIComponent(registerId)}`;
}

export function registerIdFromHref(href: string): string | null {
  const match = REGISTER_LINK.exec(href);
  return match ? decodeURIComponent(match[1]) : null;
}

export function toReferenceId(registerId: string): string {
  return `${REFERENCE_ID_PREFIX}${registerId}`;
}

export function fromReferenceId(id: string): string | null {
  return id.startsWith(REFERENCE_ID_PREFIX) && id.length > REFERENCE_ID_PREFIX.length
    ? id.slice(REFERENCE_ID_PREFIX.length)
    : null;
}

export interface SearchHit {
  registerId: string;
  name: string;
  /** Parenthesised text after the name, e.g. a span of years */
  detail: string | null;
}

/**
 * Register id of the page when the search redirected straight to one
 * player, otherwise null.
 */
export function registerIdOfPage(page: HtmlPage): string | null {
  for (const url of [page.canonicalUrl, page.url]) {
    const registerId = url ? registerIdFromHref(url) : null;
    if (registerId) return registerId;
  }
  return null;
}

function splitDetail(text: string): { name: string; detail: string | null } {
  const match = /^(.*?)\s*\(([^)]*)\)\s*$/.exec(text);
  return match ? { name: match[1].trim(), detail: match[2].trim() } : { name: text.trim(), detail: null };
}

export function parseSearchResults(page: HtmlPage): SearchHit[] {
  const hits = new Map<string, SearchHit>();
  for (const link of page.links) {
    const registerId = registerIdFromHref(link.href);
    if (!registerId || hits.has(registerId) || !link.text) continue;
    hits.set(registerId, { registerId, ...splitDetail(link.text) });
  }
  return [...hits.values()];
}

/** Player name printed on a register page. */
export function registerPlayerName(page: HtmlPage): string | null {
  const heading = page.headings.find((text) => text && !/search results/i.test(text));
  if (heading) return heading;
  const fromTitle = page.title.split('|')[0].replace(/\s+(Register|Stats|Statistics).*$/i, '').trim();
  return fromTitle || null;
}

interface ReferenceRowBase {
  season: number;
  teamText: string | null;
  league: League | null;
  games: number;
  war: number | null;
}

export interface ReferenceBattingRow extends ReferenceRowBase {
  counts: BattingCounts;
}

export interface ReferencePitchingRow extends ReferenceRowBase {
  counts: PitchingCounts;
}

function findStatsTable(page: HtmlPage, statsType: StatsType): HtmlTable | null {
  for (const id of TABLE_IDS[statsType]) {
    const table = page.tables.find((candidate) => candidate.id === id);
    if (table) return table;
  }
  return null;
}

/**
 * Column reader keyed by header text. The header row is the first all-th
 * row naming a Year column (grouping rows above it are ignored).
 */
function headerIndex(table: HtmlTable): Map<string, number> | null {
  const headerRow = table.rows.find((row) => row.isHeader && row.cells.includes('Year'));
  if (!headerRow) return null;
  const index = new Map<string, number>();
  headerRow.cells.forEach((text, position) => {
    if (!index.has(text)) index.set(text, position);
  });
  return index;
}

function readCount(text: string | undefined): number {
  const cleaned = (text ?? '').replace(/,/g, '').trim();
  return /^\d+$/.test(cleaned) ? parseInt(cleaned, 10) : 0;
}

function readMetric(text: string | undefined): number | null {
  const cleaned = (text ?? '').trim();
  return /^-?\d*\.?\d+$/.test(cleaned) ? parseFloat(cleaned) : null;
}

interface RowCells {
  base: ReferenceRowBase;
  count: (header: string) => number;
  text: (header: string) => string;
}

/** Japanese top-level rows of a stats table, optionally for one season. */
function japaneseRows(table: HtmlTable, season?: number): RowCells[] {
  const index = headerIndex(table);
  if (!index) return [];

  const text = (cells: string[], header: string): string => {
    const position = index.get(header);
    return position === undefined ? '' : (cells[position] ?? '');
  };

  const rows: RowCells[] = [];
  for (const row of table.rows) {
    if (row.isHeader) continue;
    const yearText = text(row.cells, 'Year').trim();
    const leagueCode = text(row.cells, 'Lg').trim();
    if (!/^\d{4}$/.test(yearText) || !(leagueCode in JAPANESE_LEAGUES)) continue;

    const year = parseInt(yearText, 10);
    if (season !== undefined && year !== season) continue;

    const teamText = text(row.cells, 'Tm').trim();
    rows.push({
      base: {
        season: year,
        teamText: teamText || null,
        league: JAPANESE_LEAGUES[leagueCode] ?? null,
        games: readCount(text(row.cells, 'G')),
        war: readMetric(text(row.cells, 'WAR')),
      },
      count: (header) => readCount(text(row.cells, header)),
      text: (header) => text(row.cells, header),
    });
  }
  return rows;
}

export function parseBattingTable(page: HtmlPage, season?: number): ReferenceBattingRow[] {
  const table = findStatsTable(page, 'batting');
  if (!table) return [];

  return japaneseRows(table, season).map(({ base, count }) => ({
    ...base,
    counts: {
      plateAppearances: count('PA'),
      atBats: count('AB'),
      runs: count('R'),
      hits: count('H'),
      doubles: count('2B'),
      triples: count('3B'),
      homeRuns: count('HR'),
      rbi: count('RBI'),
      stolenBases: count('SB'),
      caughtStealing: count('CS'),
      walks: count('BB'),
      hitByPitch: count('HBP'),
      sacrificeFlies: count('SF'),
      strikeouts: count('SO'),
    },
  }));
}

export function parsePitchingTable(page: HtmlPage, season?: number): ReferencePitchingRow[] {
  const table = findStatsTable(page, 'pitching');
  if (!table) return [];

  return japaneseRows(table, season).map(({ base, count, text }) => ({
    ...base,
    counts: {
      gamesStarted: count('GS'),
      wins: count('W'),
      losses: count('L'),
      saves: count('SV'),
      holds: count('HLD'),
      completeGames: count('CG'),
      shutouts: count('SHO'),
      outsRecorded: parseInningsNotation(text('IP')),
      hitsAllowed: count('H'),
      runsAllowed: count('R'),
      earnedRuns: count('ER'),
      homeRunsAllowed: count('HR'),
      walksAllowed: count('BB'),
      hitBatters: count('HBP'),
      strikeouts: count('SO'),
    },
  }));
}
