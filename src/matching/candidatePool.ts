/**
 * Candidate Pool for Attendance Reconciliation
 *
 * Holds the roster records that have not been allocated yet. Records leave the
 * pool once and never come back within a run, so a roster slot can only be
 * claimed by one sign-in entry.
 */

import { tokenize } from './normalizeName';
import type { NameRecord, Roster } from './types';

export interface PoolCandidate {
  /** Position in the roster */
  index: number;
  record: NameRecord;
  /** Distinct words of the normalized name */
  tokens: ReadonlySet<string>;
}

export class CandidatePool {
  private readonly candidates: readonly PoolCandidate[];

  // Set keeps insertion order, and indices are only ever removed,
  // so iteration stays in ascending roster order.
  private readonly available: Set<number>;

  constructor(roster: Roster) {
    this.candidates = roster.map((record, index) => ({
      index,
      record,
      tokens: new Set(tokenize(record.normalized)),
    }));
    this.available = new Set(this.candidates.map((candidate) => candidate.index));
  }

  get size(): number {
    return this.available.size;
  }

  has(index: number): boolean {
    return this.available.has(index);
  }

  /**
   * Unallocated candidates in ascending roster order.
   */
  *remaining(): IterableIterator<PoolCandidate> {
    for (const index of this.available) {
      yield this.candidates[index];
    }
  }

  /**
   * Removes a candidate from the pool and returns its record.
   *
   * @throws Error if the index was never in the pool or is already taken
   */
  take(index: number): NameRecord {
    if (!this.available.delete(index)) {
      throw new Error(`Roster index ${index} is not available for allocation`);
    }
    return this.candidates[index].record;
  }

  /**
   * Records never taken, in roster order.
   */
  leftovers(): NameRecord[] {
    return Array.from(this.remaining(), (candidate) => candidate.record);
  }
}

export default CandidatePool;
