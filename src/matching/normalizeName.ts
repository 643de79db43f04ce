/**
 * Name Normalization for Attendance Reconciliation
 *
 * Roster exports and sign-in sheets spell the same person differently.
 * This module reduces a raw name to the canonical form every stage compares.
 *
 * Example transformations:
 * - "  José  Álvarez " → "jose alvarez"
 * - "Dr. Meera Rao" → "meera rao"
 * - "O'Brien-Smith, Liam" → "o brien smith liam"
 */

import { HONORIFICS } from './constants';

/**
 * Normalizes a name for comparison by:
 * 1. Trimming (a missing value becomes an empty string)
 * 2. Decomposing accents and dropping every non-ASCII character
 * 3. Lowercasing
 * 4. Replacing anything but letters, digits and whitespace with a space
 * 5. Collapsing whitespace runs and trimming again
 * 6. Dropping leading honorifics, as long as another token follows
 *
 * Never throws; blank input yields "".
 *
 * @example
 * normalizeName("Mrs. Anita Desai") // Returns: "anita desai"
 * normalizeName("Dr") // Returns: "dr"
 * normalizeName(undefined) // Returns: ""
 */
export function normalizeName(input: string | null | undefined): string {
  if (input === null || input === undefined) {
    return '';
  }

  // Step 1: Trim
  let normalized = input.trim();

  // Step 2: Split accented letters into base + combining mark, keep ASCII only
  normalized = normalized.normalize('NFKD').replace(/[^\x00-\x7F]/g, '');

  // Step 3: Lowercase
  normalized = normalized.toLowerCase();

  // Step 4: Punctuation and symbols become word breaks
  normalized = normalized.replace(/[^a-z0-9\s]/g, ' ');

  // Step 5: Collapse whitespace
  const words = normalized.split(/\s+/).filter(Boolean);

  // Step 6: Drop leading titles ("Prof. Dr. Rao" loses both)
  while (words.length > 1 && HONORIFICS.has(words[0])) {
    words.shift();
  }

  return words.join(' ');
}

/**
 * Splits a normalized name into its words.
 *
 * @example
 * tokenize("avesh sajiwala") // Returns: ["avesh", "sajiwala"]
 * tokenize("") // Returns: []
 */
export function tokenize(normalized: string): string[] {
  return normalized.split(' ').filter(Boolean);
}

export default normalizeName;
