/**
 * Franchise reference data.
 * Load-once, read-only; providers copy these into fresh Team objects.
 */

import { League, Team, TeamRef } from '../domain/model/canonical.types';

export interface FranchiseDefinition extends Team {
  /** Code the league site uses in team page names (idb1_<code>.html) */
  leagueSiteCode: string;
  /** Short names pages print in team columns */
  aliases: readonly string[];
}

export const FRANCHISES: readonly FranchiseDefinition[] = [
  // Central League
  {
    id: 'giants',
    nameEnglish: 'Yomiuri Giants',
    nameJapanese: '読売ジャイアンツ',
    league: 'central',
    abbreviation: 'YG',
    city: 'Tokyo',
    leagueSiteCode: 'g',
    aliases: ['Yomiuri', 'Giants'],
  },
  {
    id: 'tigers',
    nameEnglish: 'Hanshin Tigers',
    nameJapanese: '阪神タイガース',
    league: 'central',
    abbreviation: 'HT',
    city: 'Nishinomiya',
    leagueSiteCode: 't',
    aliases: ['Hanshin', 'Tigers'],
  },
  {
    id: 'baystars',
    nameEnglish: 'Yokohama DeNA BayStars',
    nameJapanese: '横浜DeNAベイスターズ',
    league: 'central',
    abbreviation: 'DB',
    city: 'Yokohama',
    leagueSiteCode: 'db',
    aliases: ['DeNA', 'Yokohama', 'BayStars'],
  },
  {
    id: 'dragons',
    nameEnglish: 'Chunichi Dragons',
    nameJapanese: '中日ドラゴンズ',
    league: 'central',
    abbreviation: 'CD',
    city: 'Nagoya',
    leagueSiteCode: 'd',
    aliases: ['Chunichi', 'Dragons'],
  },
  {
    id: 'carp',
    nameEnglish: 'Hiroshima Toyo Carp',
    nameJapanese: '広島東洋カープ',
    league: 'central',
    abbreviation: 'HC',
    city: 'Hiroshima',
    leagueSiteCode: 'c',
    aliases: ['Hiroshima', 'Carp'],
  },
  {
    id: 'swallows',
    nameEnglish: 'Tokyo Yakult Swallows',
    nameJapanese: '東京ヤクルトスワローズ',
    league: 'central',
    abbreviation: 'YS',
    city: 'Tokyo',
    leagueSiteCode: 's',
    aliases: ['Yakult', 'Swallows'],
  },

  // Pacific League
  {
    id: 'hawks',
    nameEnglish: 'Fukuoka SoftBank Hawks',
    nameJapanese: '福岡ソフトバンクホークス',
    league: 'pacific',
    abbreviation: 'SH',
    city: 'Fukuoka',
    leagueSiteCode: 'h',
    aliases: ['SoftBank', 'Hawks'],
  },
  {
    id: 'fighters',
    nameEnglish: 'Hokkaido Nippon-Ham Fighters',
    nameJapanese: '北海道日本ハムファイターズ',
    league: 'pacific',
    abbreviation: 'NF',
    city: 'Sapporo',
    leagueSiteCode: 'f',
    aliases: ['Nippon-Ham', 'Nippon Ham', 'Fighters'],
  },
  {
    id: 'marines',
    nameEnglish: 'Chiba Lotte Marines',
    nameJapanese: '千葉ロッテマリーンズ',
    league: 'pacific',
    abbreviation: 'LM',
    city: 'Chiba',
    leagueSiteCode: 'm',
    aliases: ['Lotte', 'Marines'],
  },
  {
    id: 'lions',
    nameEnglish: 'Saitama Seibu Lions',
    nameJapanese: '埼玉西武ライオンズ',
    league: 'pacific',
    abbreviation: 'SL',
    city: 'Tokorozawa',
    leagueSiteCode: 'l',
    aliases: ['Seibu', 'Lions'],
  },
  {
    id: 'eagles',
    nameEnglish: 'Tohoku Rakuten Golden Eagles',
    nameJapanese: '東北楽天ゴールデンイーグルス',
    league: 'pacific',
    abbreviation: 'RE',
    city: 'Sendai',
    leagueSiteCode: 'e',
    aliases: ['Rakuten', 'Eagles'],
  },
  {
    id: 'buffaloes',
    nameEnglish: 'Orix Buffaloes',
    nameJapanese: 'オリックス・バファローズ',
    league: 'pacific',
    abbreviation: 'OB',
    city: 'Osaka',
    leagueSiteCode: 'b',
    aliases: ['ORIX', 'Buffaloes'],
  },
];

export function toTeam(franchise: FranchiseDefinition): Team {
  return {
    id: franchise.id,
    nameEnglish: franchise.nameEnglish,
    nameJapanese: franchise.nameJapanese,
    league: franchise.league,
    abbreviation: franchise.abbreviation,
    city: franchise.city,
  };
}

export function toTeamRef(team: Team): TeamRef {
  return { id: team.id, name: team.nameEnglish, league: team.league };
}

export function listTeams(league?: League): Team[] {
  return FRANCHISES.filter((franchise) => !league || franchise.league === league).map(toTeam);
}

export function findFranchiseById(id: string): FranchiseDefinition | null {
  return FRANCHISES.find((franchise) => franchise.id === id) ?? null;
}

export function findFranchiseBySiteCode(code: string): FranchiseDefinition | null {
  const lowered = code.toLowerCase();
  return FRANCHISES.find((franchise) => franchise.leagueSiteCode === lowered) ?? null;
}

/**
 * Resolve the free text of a team column ("Yakult", "Hiroshima Toyo Carp",
 * "YS") to a franchise.
 */
export function findFranchiseByName(text: string): FranchiseDefinition | null {
  const needle = text.trim().toLowerCase();
  if (!needle) return null;

  return (
    FRANCHISES.find(
      (franchise) =>
        franchise.abbreviation.toLowerCase() === needle ||
        franchise.nameEnglish.toLowerCase() === needle ||
        franchise.aliases.some((alias) => alias.toLowerCase() === needle)
    ) ??
    FRANCHISES.find(
      (franchise) =>
        franchise.nameEnglish.toLowerCase().includes(needle) ||
        franchise.aliases.some((alias) => needle.includes(alias.toLowerCase()))
    ) ??
    null
  );
}

/** TeamRef for a team column, keeping the printed text when unrecognized. */
export function teamRefFromText(text: string): TeamRef | null {
  const trimmed = text.trim();
  if (!trimmed) return null;
  const franchise = findFranchiseByName(trimmed);
  return franchise ? toTeamRef(franchise) : { id: trimmed.toLowerCase(), name: trimmed, league: null };
}
