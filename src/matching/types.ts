/**
 * Type Definitions for the Attendance Reconciliation Engine
 *
 * These types define the input/output contracts for the matching engine.
 * The engine is pure and deterministic - no file, network or database access.
 */

// ============================================
// INPUT TYPES
// ============================================

/**
 * A single name taken from the roster or the sign-in list.
 */
export interface NameRecord {
  /** Name exactly as supplied by the caller (kept for output) */
  original: string;
  /** Canonical form used for every comparison */
  normalized: string;
  /** 0-based position in the originating dataset */
  sourceIndex: number;
}

/** The authoritative list of expected names ("total" dataset) */
export type Roster = readonly NameRecord[];

/** The names observed as present ("present" dataset) */
export type SignInList = readonly NameRecord[];

/**
 * Tunable cutoffs for the looser matching stages. Both are in [0, 1].
 */
export interface Thresholds {
  /** Minimum whole-string similarity ratio accepted by the fuzzy stage */
  fuzzyCutoff: number;
  /** Minimum word-level overlap score accepted by the token stage */
  tokenCutoff: number;
}

/**
 * Which dataset a record or error belongs to.
 */
export type DatasetKind = 'total' | 'present';

// ============================================
// OUTPUT TYPES
// ============================================

/**
 * Matching stages, in the order they are attempted.
 */
export type MatchStage = 'exact' | 'token' | 'fuzzy' | 'close-match';

/**
 * A confirmed pairing between one sign-in entry and one roster entry.
 */
export interface Allocation {
  present: NameRecord;
  roster: NameRecord;
  stage: MatchStage;
  /** Score produced by the stage (1 for exact matches) */
  score: number;
  /** Method tag, e.g. `exact`, `token:1.00`, `fuzzy:0.86`, `close-match` */
  method: string;
}

export interface MatchCounts {
  total: number;
  present: number;
  matched: number;
  absent: number;
  unmatchedPresent: number;
  byStage: {
    exact: number;
    token: number;
    fuzzy: number;
    closeMatch: number;
  };
}

/**
 * Complete result of one reconciliation run.
 *
 * Every roster record appears in exactly one of `allocations` / `unmatchedTotal`,
 * every sign-in record in exactly one of `allocations` / `unmatchedPresent`.
 */
export interface MatchReport {
  /** Allocations in sign-in list order */
  allocations: Allocation[];
  /** Sign-in entries with no roster counterpart, in sign-in list order */
  unmatchedPresent: NameRecord[];
  /** Absentees, in roster order */
  unmatchedTotal: NameRecord[];
  counts: MatchCounts;
}

// ============================================
// INTERNAL TYPES
// ============================================

/**
 * Result of a single stage picking a roster candidate.
 */
export interface StageMatch {
  rosterIndex: number;
  stage: MatchStage;
  score: number;
}
