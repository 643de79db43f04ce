/**
 * Constants for the Attendance Reconciliation Engine
 *
 * These values define the behavior of the matching cascade.
 * Cutoffs can be overridden per run; the close-match cutoff is fixed.
 */

// ============================================
// STAGE CUTOFFS
// ============================================

/**
 * Default minimum similarity ratio for the fuzzy stage.
 *
 * Examples:
 * - "jonathon smyth" vs "jonathan smith" = 0.86 → fuzzy match ✓
 * - "kathryn li" vs "katherine lee" = 0.70 → falls through to close-match
 */
export const DEFAULT_FUZZY_CUTOFF = 0.72;

/**
 * Default minimum token-overlap score for the token stage.
 *
 * Examples:
 * - "avesh" vs "avesh sajiwala" = 1.00 (coverage 1/1) → token match ✓
 * - "meera k" vs "meera rao" = 0.50 (coverage 1/2) → token match ✓
 */
export const DEFAULT_TOKEN_CUTOFF = 0.5;

/**
 * Fixed cutoff of the last-resort close-match stage.
 * Catches names whose similarity lies between this value and the fuzzy cutoff.
 */
export const CLOSE_MATCH_CUTOFF = 0.6;

// ============================================
// HONORIFICS
// ============================================

/**
 * Leading titles dropped during normalization.
 *
 * Examples of how these appear:
 * - "Dr. Meera Rao" → "meera rao"
 * - "Mrs Anita Desai" → "anita desai"
 * - "Sir" → "sir" (kept, nothing follows it)
 */
export const HONORIFICS: ReadonlySet<string> = new Set([
  'mr',
  'ms',
  'mrs',
  'miss',
  'dr',
  'prof',
  'sir',
]);
