/**
 * Main Reconciliation Function for Attendance Reconciliation
 *
 * This is the entry point for the matching engine.
 * It allocates every sign-in entry to at most one roster entry and reports
 * the roster entries nobody claimed.
 *
 * Flow, per sign-in record (in input order):
 * 1. Skip blank names (unmatched, pool untouched)
 * 2. Try each stage of the cascade until one picks a candidate
 * 3. Remove the picked roster record from the pool
 * 4. Otherwise record the sign-in entry as unmatched
 *
 * Allocation is greedy and final: an earlier sign-in entry can take a roster
 * slot a later one would have matched better.
 */

import { CandidatePool } from './candidatePool';
import { createStages, formatMethod } from './stages';
import type { MatchStrategy } from './stages';
import { buildNameRecords } from './nameRecords';
import { resolveThresholds } from './thresholds';
import type {
  Allocation,
  MatchCounts,
  MatchReport,
  NameRecord,
  Roster,
  SignInList,
  StageMatch,
  Thresholds,
} from './types';

/**
 * Runs the cascade for one sign-in record, stopping at the first stage that
 * picks a candidate.
 */
function runStages(
  present: NameRecord,
  pool: CandidatePool,
  stages: readonly MatchStrategy[]
): StageMatch | null {
  for (const stage of stages) {
    const match = stage(present, pool);
    if (match) {
      return match;
    }
  }
  return null;
}

function countAllocations(
  allocations: readonly Allocation[],
  total: number,
  present: number,
  absent: number,
  unmatchedPresent: number
): MatchCounts {
  const byStage = { exact: 0, token: 0, fuzzy: 0, closeMatch: 0 };

  for (const allocation of allocations) {
    switch (allocation.stage) {
      case 'exact':
        byStage.exact++;
        break;
      case 'token':
        byStage.token++;
        break;
      case 'fuzzy':
        byStage.fuzzy++;
        break;
      case 'close-match':
        byStage.closeMatch++;
        break;
    }
  }

  return {
    total,
    present,
    matched: allocations.length,
    absent,
    unmatchedPresent,
    byStage,
  };
}

/**
 * Reconciles a sign-in list against a roster.
 *
 * This function is pure and deterministic - given the same inputs,
 * it will always return the same report.
 *
 * @param total - Roster of expected names
 * @param present - Names observed as present
 * @param thresholds - Optional cutoff overrides
 * @throws InvalidConfigurationError when a cutoff is outside [0, 1]
 *
 * @example
 * const report = reconcile(fromNames(['Alice Kumar', 'Bob Singh']), fromNames(['alice kumar']));
 * // report.allocations[0].method === 'exact'
 * // report.unmatchedTotal → [{ original: 'Bob Singh', ... }]
 */
export function reconcile(
  total: Roster,
  present: SignInList,
  thresholds: Partial<Thresholds> = {}
): MatchReport {
  const stages = createStages(resolveThresholds(thresholds));
  const pool = new CandidatePool(total);

  const allocations: Allocation[] = [];
  const unmatchedPresent: NameRecord[] = [];

  for (const record of present) {
    // Blank sign-ins never reach the pool
    if (!record.normalized) {
      unmatchedPresent.push(record);
      continue;
    }

    const match = runStages(record, pool, stages);
    if (!match) {
      unmatchedPresent.push(record);
      continue;
    }

    const roster = pool.take(match.rosterIndex);
    allocations.push({
      present: record,
      roster,
      stage: match.stage,
      score: match.score,
      method: formatMethod(match),
    });
  }

  const unmatchedTotal = pool.leftovers();

  return {
    allocations,
    unmatchedPresent,
    unmatchedTotal,
    counts: countAllocations(
      allocations,
      total.length,
      present.length,
      unmatchedTotal.length,
      unmatchedPresent.length
    ),
  };
}

export interface ReconcileRecordsOptions extends Partial<Thresholds> {
  /** Name field of the roster rows */
  totalField: string;
  /** Name field of the sign-in rows */
  presentField: string;
}

/**
 * Validates raw rows and thresholds, then reconciles.
 * Nothing is matched unless both datasets and the thresholds are valid.
 *
 * @throws InvalidInputError for malformed datasets or missing name fields
 * @throws InvalidConfigurationError for cutoffs outside [0, 1]
 */
export function reconcileRecords(
  totalRows: unknown,
  presentRows: unknown,
  options: ReconcileRecordsOptions
): MatchReport {
  const total = buildNameRecords(totalRows, options.totalField, 'total');
  const present = buildNameRecords(presentRows, options.presentField, 'present');
  const thresholds = resolveThresholds({
    fuzzyCutoff: options.fuzzyCutoff,
    tokenCutoff: options.tokenCutoff,
  });

  return reconcile(total, present, thresholds);
}

export default reconcile;
