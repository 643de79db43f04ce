/**
 * Matching Stages for Attendance Reconciliation
 *
 * Each stage is a pure strategy that looks at one sign-in record and the
 * current pool and either picks a roster candidate or passes. Stages never
 * mutate the pool; the reconciliation loop does that.
 *
 * Cascade (strictest first):
 * 1. exact       - identical normalized names
 * 2. token       - word-set overlap ≥ tokenCutoff
 * 3. fuzzy       - character similarity ≥ fuzzyCutoff
 * 4. close-match - character similarity ≥ CLOSE_MATCH_CUTOFF
 */

import { CLOSE_MATCH_CUTOFF } from './constants';
import { tokenize } from './normalizeName';
import { calculateTokenOverlap } from './tokenOverlap';
import { calculateSimilarityRatio } from './sequenceSimilarity';
import type { CandidatePool, PoolCandidate } from './candidatePool';
import type { MatchStage, NameRecord, StageMatch, Thresholds } from './types';

export type MatchStrategy = (present: NameRecord, pool: CandidatePool) => StageMatch | null;

/**
 * Picks the highest-scoring candidate. Only a strictly higher score replaces
 * the current best, so ties go to the lowest roster index.
 */
function pickBest(
  pool: CandidatePool,
  score: (candidate: PoolCandidate) => number | null
): { index: number; score: number } | null {
  let best: { index: number; score: number } | null = null;

  for (const candidate of pool.remaining()) {
    const value = score(candidate);
    if (value === null) continue;

    if (best === null || value > best.score) {
      best = { index: candidate.index, score: value };
    }
  }

  return best;
}

/**
 * First unallocated roster record with the same normalized name.
 */
export const exactStage: MatchStrategy = (present, pool) => {
  for (const candidate of pool.remaining()) {
    if (candidate.record.normalized === present.normalized) {
      return { rosterIndex: candidate.index, stage: 'exact', score: 1 };
    }
  }
  return null;
};

/**
 * Best word-set overlap, accepted at or above the cutoff.
 */
export function createTokenStage(tokenCutoff: number): MatchStrategy {
  return (present, pool) => {
    const presentTokens = new Set(tokenize(present.normalized));
    if (presentTokens.size === 0) {
      return null;
    }

    const best = pickBest(pool, (candidate) =>
      candidate.tokens.size === 0 ? null : calculateTokenOverlap(presentTokens, candidate.tokens)
    );

    if (best === null || best.score < tokenCutoff) {
      return null;
    }
    return { rosterIndex: best.index, stage: 'token', score: best.score };
  };
}

/**
 * The ratio is not symmetric when equally long blocks tie, so the stage fixes
 * which name is compared against which.
 */
type RatioOrder = 'present-first' | 'candidate-first';

function createSimilarityStage(
  stage: MatchStage,
  cutoff: number,
  order: RatioOrder
): MatchStrategy {
  return (present, pool) => {
    const best = pickBest(pool, (candidate) =>
      order === 'present-first'
        ? calculateSimilarityRatio(present.normalized, candidate.record.normalized)
        : calculateSimilarityRatio(candidate.record.normalized, present.normalized)
    );

    if (best === null || best.score < cutoff) {
      return null;
    }
    return { rosterIndex: best.index, stage, score: best.score };
  };
}

/**
 * Best character similarity, accepted at or above the cutoff.
 */
export function createFuzzyStage(fuzzyCutoff: number): MatchStrategy {
  return createSimilarityStage('fuzzy', fuzzyCutoff, 'present-first');
}

/**
 * Last resort: nearest name by character similarity above a fixed cutoff.
 * Scores each roster name against the sign-in, the way a close-matches
 * lookup of the sign-in among the roster names does.
 */
export const closeMatchStage: MatchStrategy = createSimilarityStage(
  'close-match',
  CLOSE_MATCH_CUTOFF,
  'candidate-first'
);

/**
 * Builds the ordered cascade for a run.
 */
export function createStages(thresholds: Thresholds): MatchStrategy[] {
  return [
    exactStage,
    createTokenStage(thresholds.tokenCutoff),
    createFuzzyStage(thresholds.fuzzyCutoff),
    closeMatchStage,
  ];
}

/**
 * Formats the method tag reported for an allocation.
 *
 * @example
 * formatMethod({ rosterIndex: 0, stage: 'token', score: 1 }) // "token:1.00"
 * formatMethod({ rosterIndex: 0, stage: 'close-match', score: 0.69 }) // "close-match"
 */
export function formatMethod(match: StageMatch): string {
  switch (match.stage) {
    case 'token':
    case 'fuzzy':
      return `${match.stage}:${match.score.toFixed(2)}`;
    default:
      return match.stage;
  }
}
