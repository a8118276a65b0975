import {
  calculateBattingWarEstimate,
  calculateEraPlus,
  calculateFip,
  calculateOpsPlus,
  calculateRunsCreated,
  calculateWoba,
} from '../stats/advanced-metrics';
import { BattingCounts } from '../model/canonical.types';

const counts: BattingCounts = {
  plateAppearances: 11,
  atBats: 10,
  runs: 2,
  hits: 3,
  doubles: 1,
  triples: 0,
  homeRuns: 1,
  rbi: 3,
  stolenBases: 0,
  caughtStealing: 0,
  walks: 1,
  hitByPitch: 0,
  sacrificeFlies: 0,
  strikeouts: 2,
};

describe('calculateFip', () => {
  it('applies the FIP formula with the league constant', () => {
    expect(
      calculateFip({ homeRunsAllowed: 15, walksAllowed: 50, hitBatters: 4, strikeouts: 172, outsRecorded: 604 })
    ).toBe(3.16);
  });

  it('is null without outs', () => {
    expect(
      calculateFip({ homeRunsAllowed: 1, walksAllowed: 1, hitBatters: 0, strikeouts: 0, outsRecorded: 0 })
    ).toBeNull();
  });
});

describe('calculateWoba', () => {
  it('weights each way of reaching base', () => {
    expect(calculateWoba(counts)).toBe(0.433);
  });

  it('is null without a denominator', () => {
    expect(calculateWoba({ ...counts, atBats: 0, walks: 0 })).toBeNull();
  });
});

describe('calculateRunsCreated', () => {
  it('uses (H + BB) * TB / (AB + BB)', () => {
    // TB = 3 + 1 + 0 + 3 = 7
    expect(calculateRunsCreated(counts)).toBeCloseTo((4 * 7) / 11, 10);
  });
});

describe('index stats', () => {
  it('scores league average as 100', () => {
    expect(calculateOpsPlus(0.75)).toBe(100);
    expect(calculateEraPlus(3.5)).toBe(100);
  });

  it('rewards a lower ERA', () => {
    expect(calculateEraPlus(1.75)).toBe(200);
  });

  it('is null for missing or zero inputs', () => {
    expect(calculateOpsPlus(null)).toBeNull();
    expect(calculateEraPlus(0)).toBeNull();
  });
});

describe('calculateBattingWarEstimate', () => {
  it('subtracts replacement level and adds the positional adjustment', () => {
    expect(calculateBattingWarEstimate((200 * 244) / 550, 135)).toBe(6.1);
  });
});
