/**
 * Character Similarity for Attendance Reconciliation
 *
 * Uses the Ratcliff/Obershelp "gestalt pattern matching" ratio, which is
 * particularly good for:
 * - Misspellings inside a name ("jonathon" vs "jonathan")
 * - Vowel swaps and dropped letters ("smyth" vs "smith")
 * - Comparing whole names including the space between words
 *
 * The ratio is 2 * M / T, where M counts the characters in the matching blocks
 * and T is the combined length of both strings.
 */

/**
 * A run of identical characters: a[a..a+size) === b[b..b+size)
 */
export interface MatchingBlock {
  a: number;
  b: number;
  size: number;
}

/**
 * Maps every character of b to the ascending positions it occupies.
 */
function indexCharacters(b: string): Map<string, number[]> {
  const positions = new Map<string, number[]>();
  for (let j = 0; j < b.length; j++) {
    const existing = positions.get(b[j]);
    if (existing) {
      existing.push(j);
    } else {
      positions.set(b[j], [j]);
    }
  }
  return positions;
}

/**
 * Finds the longest common substring of a[alo..ahi) and b[blo..bhi).
 *
 * Of several equally long blocks, the one starting earliest in a wins,
 * then the one starting earliest in b.
 */
function findLongestMatch(
  a: string,
  positionsInB: Map<string, number[]>,
  alo: number,
  ahi: number,
  blo: number,
  bhi: number
): MatchingBlock {
  let best: MatchingBlock = { a: alo, b: blo, size: 0 };

  // lengths of the runs ending at (i - 1, j), keyed by j
  let runLengths = new Map<number, number>();

  for (let i = alo; i < ahi; i++) {
    const nextRunLengths = new Map<number, number>();

    for (const j of positionsInB.get(a[i]) ?? []) {
      if (j < blo) continue;
      if (j >= bhi) break;

      const size = (runLengths.get(j - 1) ?? 0) + 1;
      nextRunLengths.set(j, size);

      if (size > best.size) {
        best = { a: i - size + 1, b: j - size + 1, size };
      }
    }

    runLengths = nextRunLengths;
  }

  return best;
}

/**
 * Recursively collects the matching blocks of two strings: the longest common
 * substring, then the blocks to its left and to its right.
 *
 * Blocks are returned in ascending order of position.
 */
export function getMatchingBlocks(a: string, b: string): MatchingBlock[] {
  const positionsInB = indexCharacters(b);
  const blocks: MatchingBlock[] = [];
  const pending: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];

  while (pending.length > 0) {
    const next = pending.pop();
    if (!next) break;

    const [alo, ahi, blo, bhi] = next;
    const block = findLongestMatch(a, positionsInB, alo, ahi, blo, bhi);
    if (block.size === 0) continue;

    blocks.push(block);

    if (alo < block.a && blo < block.b) {
      pending.push([alo, block.a, blo, block.b]);
    }
    if (block.a + block.size < ahi && block.b + block.size < bhi) {
      pending.push([block.a + block.size, ahi, block.b + block.size, bhi]);
    }
  }

  return blocks.sort((x, y) => x.a - y.a || x.b - y.b);
}

/**
 * Calculates the similarity ratio of two normalized names.
 *
 * @returns Ratio from 0 to 1 (1 = identical, also for two empty strings)
 *
 * @example
 * calculateSimilarityRatio("jonathon smyth", "jonathan smith") // 0.857...
 * calculateSimilarityRatio("kathryn li", "katherine lee") // 0.695...
 * calculateSimilarityRatio("abc", "xyz") // 0
 */
export function calculateSimilarityRatio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) {
    return 1;
  }

  // Exact match
  if (a === b) {
    return 1;
  }

  const matched = getMatchingBlocks(a, b).reduce((sum, block) => sum + block.size, 0);

  return (2 * matched) / total;
}

export default calculateSimilarityRatio;
