/**
 * Domain Module - canonical model, name matching and statistics
 *
 * Pure computation and types only; nothing here performs I/O.
 *
 * Usage:
 * ```typescript
 * import { matchName, computeCareerTotals } from './domain';
 *
 * matchName('Matsui Hideki', 'Matsui, Hideki'); // true
 * const totals = computeCareerTotals(seasons, 'batting', playerId, 'historical');
 * ```
 */

export * from './model/canonical.types';

export {
  cleanName,
  normalizeName,
  generateNameVariants,
  matchName,
  isSameName,
  toWesternOrder,
  nameSlug,
} from './names/name-resolver';

export {
  computeBattingRates,
  computePitchingRates,
  parseInningsNotation,
  parseSplitInnings,
} from './stats/rate-stats';

export {
  calculateFip,
  calculateWoba,
  calculateRunsCreated,
  calculateOpsPlus,
  calculateEraPlus,
  calculateBattingWarEstimate,
  calculatePitchingWarEstimate,
} from './stats/advanced-metrics';

export {
  createBattingStats,
  createPitchingStats,
  computeCareerTotals,
  mergeSeasonLists,
  combineSameSeason,
  collapseSeasons,
  fillMissingAdvanced,
  isAdvancedComplete,
  joinSources,
} from './stats/season-stats';
