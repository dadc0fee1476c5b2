/**
 * String similarity utilities used for spoken-name matching.
 */

type MatchingBlock = { aStart: number; bStart: number; size: number };

/**
 * Index of every position of each character in `b`.
 */
function indexPositions(b: string): Map<string, number[]> {
  const positions = new Map<string, number[]>();
  for (let j = 0; j < b.length; j++) {
    const char = b.charAt(j);
    const list = positions.get(char);
    if (list) {
      list.push(j);
    } else {
      positions.set(char, [j]);
    }
  }
  return positions;
}

/**
 * Longest common substring of a[aLo, aHi) and b[bLo, bHi).
 * Ties go to the match starting earliest in `a`, then earliest in `b`.
 */
function findLongestMatch(
  a: string,
  positions: Map<string, number[]>,
  aLo: number,
  aHi: number,
  bLo: number,
  bHi: number
): MatchingBlock {
  let best: MatchingBlock = { aStart: aLo, bStart: bLo, size: 0 };
  let runs = new Map<number, number>();

  for (let i = aLo; i < aHi; i++) {
    const nextRuns = new Map<number, number>();
    for (const j of positions.get(a.charAt(i)) ?? []) {
      if (j < bLo) continue;
      if (j >= bHi) break;
      const length = (runs.get(j - 1) ?? 0) + 1;
      nextRuns.set(j, length);
      if (length > best.size) {
        best = { aStart: i - length + 1, bStart: j - length + 1, size: length };
      }
    }
    runs = nextRuns;
  }

  return best;
}

/**
 * Total number of characters in the Ratcliff/Obershelp matching blocks of two strings.
 */
export function countMatchingCharacters(a: string, b: string): number {
  const positions = indexPositions(b);
  const pending: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];
  let matched = 0;

  while (pending.length > 0) {
    const range = pending.pop();
    if (!range) break;
    const [aLo, aHi, bLo, bHi] = range;
    const { aStart, bStart, size } = findLongestMatch(a, positions, aLo, aHi, bLo, bHi);
    if (size === 0) continue;

    matched += size;
    if (aLo < aStart && bLo < bStart) {
      pending.push([aLo, aStart, bLo, bStart]);
    }
    if (aStart + size < aHi && bStart + size < bHi) {
      pending.push([aStart + size, aHi, bStart + size, bHi]);
    }
  }

  return matched;
}

/**
 * Ratcliff/Obershelp similarity (0-1): twice the matched characters over the combined length.
 * Two empty strings are identical.
 */
export function sequenceRatio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) return 1.0;
  return (2 * countMatchingCharacters(a, b)) / total;
}

/**
 * Round to the nearest integer, halves going to the even neighbour.
 */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const fraction = value - floor;
  if (fraction > 0.5) return floor + 1;
  if (fraction < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

/**
 * Similarity score (0-100) between two strings. Empty input scores 0.
 */
export function ratio(a: string, b: string): number {
  if (a.length === 0 || b.length === 0) return 0;
  return roundHalfEven(100 * sequenceRatio(a, b));
}

/**
 * Normalize text for fuzzy comparison: drop Latin-1 supplement characters
 * (U+0080-U+00FF), turn anything that is not a letter, digit or underscore in
 * any script into a space, lower-case and trim.
 */
export function normalizeForMatching(text: string): string {
  return text
    .replace(/[\u0080-\u00FF]/g, "")
    .replace(/[^\p{L}\p{N}_]/gu, " ")
    .toLowerCase()
    .trim();
}

function sortTokens(text: string): string {
  return normalizeForMatching(text)
    .split(/\s+/)
    .filter(Boolean)
    .sort()
    .join(" ");
}

/**
 * Word-order-insensitive similarity score (0-100).
 *
 * Both strings are normalized, split into words, the words sorted and joined
 * back together before scoring, so "outside temperature" and
 * "temperature outside" score 100. Repeated words are kept.
 */
export function tokenSortRatio(a: string, b: string): number {
  return ratio(sortTokens(a), sortTokens(b));
}
