import { BattingCounts, BattingStats, PitchingStats, TeamRef } from '../model/canonical.types';
import {
  collapseSeasons,
  combineSameSeason,
  computeCareerTotals,
  createBattingStats,
  createPitchingStats,
  fillMissingAdvanced,
  isAdvancedComplete,
  joinSources,
  mergeSeasonLists,
  toCount,
} from '../stats/season-stats';
import { round3 } from '../stats/rate-stats';

const LIONS: TeamRef = { id: 'lions', name: 'Saitama Seibu Lions', league: 'pacific' };
const HAWKS: TeamRef = { id: 'hawks', name: 'Fukuoka SoftBank Hawks', league: 'pacific' };

function makeBatting(
  season: number | null,
  counts: Partial<BattingCounts> = {},
  options: { source?: string; team?: TeamRef | null; games?: number; war?: number | null } = {}
): BattingStats {
  return createBattingStats(
    {
      playerId: 'p-1',
      season,
      team: options.team === undefined ? LIONS : options.team,
      source: options.source ?? 'historical',
      games: options.games ?? 100,
    },
    counts,
    { war: options.war ?? null }
  );
}

function makePitching(season: number, outsRecorded: number, earnedRuns: number): PitchingStats {
  return createPitchingStats(
    { playerId: 'p-2', season, team: HAWKS, source: 'league_site', games: 25 },
    { outsRecorded, earnedRuns, hitsAllowed: 100, walksAllowed: 30, strikeouts: 120 }
  );
}

describe('toCount', () => {
  it('truncates to a non-negative integer', () => {
    expect(toCount(12.9)).toBe(12);
    expect(toCount(-3)).toBe(0);
    expect(toCount(null)).toBe(0);
    expect(toCount(Number.NaN)).toBe(0);
  });
});

describe('createBattingStats', () => {
  const row = makeBatting(
    2003,
    {
      plateAppearances: 560,
      atBats: 500,
      hits: 150,
      doubles: 30,
      triples: 2,
      homeRuns: 20,
      walks: 50,
      hitByPitch: 4,
      sacrificeFlies: 6,
    },
    { games: 135, war: 3.1 }
  );

  it('recomputes rates from counts', () => {
    expect(row.battingAverage).toBe(0.3);
    expect(row.onBasePercentage).toBe(0.364);
    expect(row.sluggingPercentage).toBe(0.488);
    expect(row.ops).toBe(0.852);
  });

  it('keeps reported fields and derives the rest', () => {
    expect(row.advanced).toEqual({
      war: 3.1,
      wrcPlus: null,
      woba: 0.362,
      opsPlus: 114,
      runsCreated: 88.7,
      warEstimate: 6.1,
    });
  });

  it('fills missing counting fields with zero', () => {
    expect(row.rbi).toBe(0);
    expect(row.strikeouts).toBe(0);
  });
});

describe('computeCareerTotals', () => {
  const seasons = [
    makeBatting(2001, { atBats: 100, hits: 40, walks: 10 }, { games: 40, war: 1.2 }),
    makeBatting(2002, { atBats: 400, hits: 100, walks: 20 }, { games: 120, war: 2.3 }),
  ];

  it('sums counting fields and recomputes rates from the sums', () => {
    const totals = computeCareerTotals(seasons, 'batting', 'p-1', 'historical');

    expect(totals.season).toBeNull();
    expect(totals.games).toBe(160);
    if (totals.statsType !== 'batting') throw new Error('expected batting totals');
    expect(totals.atBats).toBe(500);
    expect(totals.hits).toBe(140);
    expect(totals.walks).toBe(30);
    // 140 / 500, not the mean of .400 and .250
    expect(totals.battingAverage).toBe(0.28);
    expect(totals.ops).toBe(round3((totals.onBasePercentage ?? 0) + (totals.sluggingPercentage ?? 0)));
  });

  it('sums reported WAR only when every season has one', () => {
    const complete = computeCareerTotals(seasons, 'batting', 'p-1', 'historical');
    const partial = computeCareerTotals(
      [...seasons, makeBatting(2003, { atBats: 10, hits: 1 })],
      'batting',
      'p-1',
      'historical'
    );

    expect(complete.advanced.war).toBe(3.5);
    expect(partial.advanced.war).toBeNull();
  });

  it('keeps the team only when every season shares it', () => {
    const sameTeam = computeCareerTotals(seasons, 'batting', 'p-1', 'historical');
    const traded = computeCareerTotals(
      [...seasons, makeBatting(2003, { atBats: 10 }, { team: HAWKS })],
      'batting',
      'p-1',
      'historical'
    );

    expect(sameTeam.team).toEqual(LIONS);
    expect(traded.team).toBeNull();
  });

  it('ignores rows of the other stats type', () => {
    const totals = computeCareerTotals(
      [makePitching(2004, 300, 30), makePitching(2005, 150, 20)],
      'pitching',
      'p-2',
      'league_site'
    );

    if (totals.statsType !== 'pitching') throw new Error('expected pitching totals');
    expect(totals.outsRecorded).toBe(450);
    expect(totals.earnedRuns).toBe(50);
    // 50 * 27 / 450
    expect(totals.era).toBe(3);
    expect(computeCareerTotals([makePitching(2004, 300, 30)], 'batting', 'p-2', 'league_site').games).toBe(0);
  });
});

describe('mergeSeasonLists', () => {
  it('keeps the first row of an overlapping season and sorts', () => {
    const archived = [2001, 2002, 2003].map((season) => makeBatting(season, { atBats: 10 }));
    const live = [2004, 2003].map((season) => makeBatting(season, { atBats: 20 }, { source: 'league_site' }));

    const merged = mergeSeasonLists(archived, live);

    expect(merged.map((row) => row.season)).toEqual([2001, 2002, 2003, 2004]);
    expect(merged[2].source).toBe('historical');
    expect(merged[3].source).toBe('league_site');
  });

  it('drops career rows', () => {
    expect(mergeSeasonLists([makeBatting(null), makeBatting(2001)])).toHaveLength(1);
  });
});

describe('combineSameSeason / collapseSeasons', () => {
  it('combines rows from two teams in one season', () => {
    const combined = combineSameSeason([
      makeBatting(2004, { atBats: 200, hits: 50 }, { games: 60 }),
      makeBatting(2004, { atBats: 300, hits: 90 }, { team: HAWKS, games: 80 }),
    ]);

    expect(combined).not.toBeNull();
    expect(combined?.season).toBe(2004);
    expect(combined?.games).toBe(140);
    expect(combined?.team).toBeNull();
    expect(combined?.statsType === 'batting' ? combined.battingAverage : null).toBe(0.28);
  });

  it('returns null for no rows and the row itself for one', () => {
    const single = makeBatting(2004);
    expect(combineSameSeason([])).toBeNull();
    expect(combineSameSeason([single])).toBe(single);
  });

  it('yields one sorted row per season', () => {
    const rows = collapseSeasons([
      makeBatting(2004, { atBats: 100 }),
      makeBatting(2003, { atBats: 50 }),
      makeBatting(2004, { atBats: 20 }, { team: HAWKS }),
    ]);

    expect(rows.map((row) => row.season)).toEqual([2003, 2004]);
    expect(rows[1].statsType === 'batting' ? rows[1].atBats : null).toBe(120);
  });
});

describe('fillMissingAdvanced', () => {
  it('fills unset fields from the donor and joins the source tags', () => {
    const base = makeBatting(2003, { atBats: 100, hits: 30 });
    const donor = makeBatting(2003, { atBats: 100, hits: 30 }, { source: 'reference_site', war: 2.2 });

    const { stats, filled } = fillMissingAdvanced(base, donor);

    expect(filled).toEqual(['war']);
    expect(stats.advanced.war).toBe(2.2);
    expect(stats.source).toBe('historical+reference_site');
    expect(base.advanced.war).toBeNull();
  });

  it('never overwrites a populated field', () => {
    const base = makeBatting(2003, { atBats: 100, hits: 30 }, { war: 1.5 });
    const donor = makeBatting(2003, { atBats: 100, hits: 30 }, { source: 'reference_site', war: 2.2 });

    const { stats, filled } = fillMissingAdvanced(base, donor);

    expect(filled).toEqual([]);
    expect(stats).toBe(base);
  });

  it('does not mix batting and pitching rows', () => {
    const base = makeBatting(2003);
    expect(fillMissingAdvanced(base, makePitching(2003, 30, 1)).filled).toEqual([]);
  });
});

describe('isAdvancedComplete / joinSources', () => {
  it('requires every advanced field', () => {
    const row = makeBatting(2003, { atBats: 100, hits: 30 }, { war: 1 });
    expect(isAdvancedComplete(row)).toBe(false);
    expect(isAdvancedComplete({ ...row, advanced: { ...row.advanced, wrcPlus: 110 } })).toBe(true);
  });

  it('appends only new tags', () => {
    expect(joinSources('historical', 'league_site')).toBe('historical+league_site');
    expect(joinSources('historical+league_site', 'league_site+reference_site')).toBe(
      'historical+league_site+reference_site'
    );
  });
});
