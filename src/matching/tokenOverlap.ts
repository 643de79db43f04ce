/**
 * Token Overlap Scoring
 *
 * Sign-in sheets often carry partial names ("avesh" for "Avesh Sajiwala").
 * Comparing word sets rewards these while ignoring word order.
 */

/**
 * Scores how well the sign-in words are covered by a roster name.
 *
 * score = max(coverage, jaccard) where
 * - coverage = |shared| / |present words|
 * - jaccard  = |shared| / |all words|
 *
 * Returns 0 when either side has no words.
 *
 * @example
 * calculateTokenOverlap(new Set(["avesh"]), new Set(["avesh", "sajiwala"])) // 1
 * calculateTokenOverlap(new Set(["meera", "k"]), new Set(["meera", "rao"])) // 0.5
 */
export function calculateTokenOverlap(
  presentTokens: ReadonlySet<string>,
  rosterTokens: ReadonlySet<string>
): number {
  if (presentTokens.size === 0 || rosterTokens.size === 0) {
    return 0;
  }

  let shared = 0;
  for (const token of presentTokens) {
    if (rosterTokens.has(token)) {
      shared++;
    }
  }

  const union = presentTokens.size + rosterTokens.size - shared;
  const coverage = shared / presentTokens.size;
  const jaccard = shared / union;

  return Math.max(coverage, jaccard);
}

export default calculateTokenOverlap;
