/**
 * Rate Statistics Domain Logic
 *
 * Rate fields are always derived from counting fields here; values printed
 * by a source are never carried through. Each function returns null when its
 * denominator is zero.
 */

import { BattingCounts, BattingRates, PitchingCounts, PitchingRates } from '../model/canonical.types';

export const OUTS_PER_INNING = 3;

function roundTo(value: number, places: number): number {
  const factor = Math.pow(10, places);
  return Math.round(value * factor) / factor;
}

export const round1 = (value: number): number => roundTo(value, 1);
export const round2 = (value: number): number => roundTo(value, 2);
export const round3 = (value: number): number => roundTo(value, 3);

export function totalBases(counts: Pick<BattingCounts, 'hits' | 'doubles' | 'triples' | 'homeRuns'>): number {
  return counts.hits + counts.doubles + 2 * counts.triples + 3 * counts.homeRuns;
}

export function singles(counts: Pick<BattingCounts, 'hits' | 'doubles' | 'triples' | 'homeRuns'>): number {
  return Math.max(0, counts.hits - counts.doubles - counts.triples - counts.homeRuns);
}

/**
 * AVG, OBP, SLG and OPS rounded to three places. OPS is the rounded sum of
 * the rounded OBP and SLG, so `ops === round3(obp + slg)` holds exactly.
 */
export function computeBattingRates(counts: BattingCounts): BattingRates {
  const obpDenominator =
    counts.atBats + counts.walks + counts.hitByPitch + counts.sacrificeFlies;

  const battingAverage = counts.atBats > 0 ? round3(counts.hits / counts.atBats) : null;
  const onBasePercentage =
    obpDenominator > 0
      ? round3((counts.hits + counts.walks + counts.hitByPitch) / obpDenominator)
      : null;
  const sluggingPercentage = counts.atBats > 0 ? round3(totalBases(counts) / counts.atBats) : null;
  const ops =
    onBasePercentage !== null && sluggingPercentage !== null
      ? round3(onBasePercentage + sluggingPercentage)
      : null;

  return { battingAverage, onBasePercentage, sluggingPercentage, ops };
}

/**
 * Innings (two places), ERA and WHIP (two and three places), K/9 and BB/9
 * (one place), all from outs recorded.
 */
export function computePitchingRates(counts: PitchingCounts): PitchingRates {
  const outs = counts.outsRecorded;
  if (outs <= 0) {
    return { inningsPitched: null, era: null, whip: null, strikeoutsPerNine: null, walksPerNine: null };
  }

  const perNine = (value: number) => (value * 9 * OUTS_PER_INNING) / outs;

  return {
    inningsPitched: round2(outs / OUTS_PER_INNING),
    era: round2(perNine(counts.earnedRuns)),
    whip: round3(((counts.hitsAllowed + counts.walksAllowed) * OUTS_PER_INNING) / outs),
    strikeoutsPerNine: round1(perNine(counts.strikeouts)),
    walksPerNine: round1(perNine(counts.walksAllowed)),
  };
}

/**
 * Parse innings written in baseball notation, where ".1" is one out and
 * ".2" two outs ("123.2" is 371 outs). Any other fraction is read as decimal
 * innings and rounded to the nearest out. Unparseable input yields 0.
 */
export function parseInningsNotation(value: string): number {
  const cleaned = value.replace(/,/g, '').trim();
  if (!/^\d*(\.\d+)?$/.test(cleaned) || cleaned === '' || cleaned === '.') return 0;

  const [wholeText, fraction = ''] = cleaned.split('.');
  const whole = wholeText ? parseInt(wholeText, 10) : 0;

  if (fraction === '' || fraction === '0') return whole * OUTS_PER_INNING;
  if (fraction === '1' || fraction === '2') return whole * OUTS_PER_INNING + parseInt(fraction, 10);

  return Math.round(parseFloat(cleaned) * OUTS_PER_INNING);
}

/**
 * Parse innings that a page splits across two cells: the whole part and a
 * trailing fraction cell such as ".2" (or an empty cell).
 */
export function parseSplitInnings(whole: string, fraction: string): number {
  const fractionText = fraction.trim().replace(/^\./, '');
  return parseInningsNotation(fractionText ? `${whole.trim()}.${fractionText}` : whole.trim());
}
