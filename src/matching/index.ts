/**
 * Attendance Reconciliation Matching Engine
 *
 * This module provides pure, deterministic functions for matching
 * sign-in names to roster names through a four-stage cascade:
 * - Exact normalized match
 * - Token (word-set) overlap
 * - Character similarity (Ratcliff/Obershelp)
 * - Close-match fallback
 *
 * Usage:
 * ```typescript
 * import { reconcile, fromNames } from './matching';
 *
 * const report = reconcile(fromNames(roster), fromNames(signIns));
 * console.log(report.unmatchedTotal); // absentees
 * ```
 */

// Main functions
export { reconcile, reconcileRecords } from './reconcile';
export type { ReconcileRecordsOptions } from './reconcile';

// Record building and thresholds
export { buildNameRecords, fromNames } from './nameRecords';
export type { RawRow } from './nameRecords';
export { resolveThresholds, DEFAULT_THRESHOLDS } from './thresholds';

// Individual building blocks (for testing/debugging)
export { normalizeName, tokenize } from './normalizeName';
export { calculateTokenOverlap } from './tokenOverlap';
export { calculateSimilarityRatio, getMatchingBlocks } from './sequenceSimilarity';
export { CandidatePool } from './candidatePool';
export {
  exactStage,
  closeMatchStage,
  createTokenStage,
  createFuzzyStage,
  createStages,
  formatMethod,
} from './stages';
export type { MatchStrategy } from './stages';

// Errors
export { ReconciliationError, InvalidInputError, InvalidConfigurationError } from './errors';
export type { ReconciliationErrorCode } from './errors';

// Constants
export {
  DEFAULT_FUZZY_CUTOFF,
  DEFAULT_TOKEN_CUTOFF,
  CLOSE_MATCH_CUTOFF,
  HONORIFICS,
} from './constants';

// Types
export type {
  NameRecord,
  Roster,
  SignInList,
  Thresholds,
  DatasetKind,
  MatchStage,
  Allocation,
  MatchCounts,
  MatchReport,
  StageMatch,
} from './types';
