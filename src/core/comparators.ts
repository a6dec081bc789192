/**
 * A run of equal code points: `a[aStart..aStart+size)` equals `b[bStart..bStart+size)`.
 */
export interface MatchingBlock {
  aStart: number
  bStart: number
  size: number
}

/**
 * Signature shared by similarity scorers.
 * Takes two already-normalized strings and returns a ratio in [0, 1].
 */
export type SimilarityScorer = (a: string, b: string) => number

/**
 * Orders two strings canonically so every ratio below is symmetric.
 * @internal
 */
function canonicalPair(a: string, b: string): [string[], string[]] {
  const left = Array.from(a)
  const right = Array.from(b)
  return a <= b ? [left, right] : [right, left]
}

/**
 * Finds the longest common run of `a[alo..ahi)` and `b[blo..bhi)`.
 * Ties resolve to the earliest start in `a`, then in `b`.
 * @internal
 */
function findLongestMatch(
  a: string[],
  bIndex: Map<string, number[]>,
  alo: number,
  ahi: number,
  blo: number,
  bhi: number
): MatchingBlock {
  let best: MatchingBlock = { aStart: alo, bStart: blo, size: 0 }
  // j2len[j] = length of the longest run ending at a[i-1], b[j]
  let j2len = new Map<number, number>()

  for (let i = alo; i < ahi; i++) {
    const next = new Map<number, number>()
    for (const j of bIndex.get(a[i]) ?? []) {
      if (j < blo) continue
      if (j >= bhi) break
      const k = (j2len.get(j - 1) ?? 0) + 1
      next.set(j, k)
      if (k > best.size) {
        best = { aStart: i - k + 1, bStart: j - k + 1, size: k }
      }
    }
    j2len = next
  }

  return best
}

/**
 * Computes the Ratcliff/Obershelp alignment of two code point sequences:
 * take the longest common run, then recurse into the pieces left of it and
 * right of it.
 *
 * @returns Blocks ordered by position
 */
function alignBlocks(a: string[], b: string[]): MatchingBlock[] {
  const bIndex = new Map<string, number[]>()
  b.forEach((char, j) => {
    const positions = bIndex.get(char)
    if (positions) {
      positions.push(j)
    } else {
      bIndex.set(char, [j])
    }
  })

  const blocks: MatchingBlock[] = []
  const pending: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]]

  while (pending.length > 0) {
    const range = pending.pop()
    if (!range) break
    const [alo, ahi, blo, bhi] = range
    const block = findLongestMatch(a, bIndex, alo, ahi, blo, bhi)
    if (block.size === 0) continue

    blocks.push(block)
    if (alo < block.aStart && blo < block.bStart) {
      pending.push([alo, block.aStart, blo, block.bStart])
    }
    if (block.aStart + block.size < ahi && block.bStart + block.size < bhi) {
      pending.push([block.aStart + block.size, ahi, block.bStart + block.size, bhi])
    }
  }

  return blocks.sort((x, y) => x.aStart - y.aStart || x.bStart - y.bStart)
}

/**
 * Returns the matching blocks of the canonical alignment of `a` and `b`.
 * Positions are code point offsets into the lexicographically smaller string
 * (`aStart`) and the larger one (`bStart`).
 */
export function matchingBlocks(a: string, b: string): MatchingBlock[] {
  const [left, right] = canonicalPair(a, b)
  return alignBlocks(left, right)
}

/**
 * Converts a matched length into the `2*M/T` ratio.
 * @internal
 */
function toRatio(matched: number, total: number): number {
  return total === 0 ? 1 : (2 * matched) / total
}

/**
 * Longest-matching-blocks similarity (Ratcliff/Obershelp).
 *
 * Returns `2*M/T` where M is the total length of the aligned blocks and T the
 * combined length of both strings, counted in code points. Inputs are compared
 * as given: callers normalize first.
 *
 * @param a - First normalized string
 * @param b - Second normalized string
 * @returns Similarity from 0 to 1
 *
 * @example
 * ```typescript
 * similarity('web testing survey', 'web testing survey') // 1
 * similarity('abcd', 'bcde')                             // 0.75
 * similarity('', '')                                     // 1
 * similarity('', 'abc')                                  // 0
 * ```
 */
export function similarity(a: string, b: string): number {
  const [left, right] = canonicalPair(a, b)
  const total = left.length + right.length
  if (total === 0) return 1
  if (left.length === 0 || right.length === 0) return 0

  const matched = alignBlocks(left, right).reduce((sum, block) => sum + block.size, 0)
  return toRatio(matched, total)
}

/**
 * Upper bound of {@link similarity} from shared characters, ignoring order.
 */
export function quickRatio(a: string, b: string): number {
  const left = Array.from(a)
  const right = Array.from(b)

  const available = new Map<string, number>()
  for (const char of right) {
    available.set(char, (available.get(char) ?? 0) + 1)
  }

  let matched = 0
  for (const char of left) {
    const count = available.get(char) ?? 0
    if (count > 0) {
      available.set(char, count - 1)
      matched++
    }
  }

  return toRatio(matched, left.length + right.length)
}

/**
 * Upper bound of {@link similarity} from lengths alone.
 */
export function realQuickRatio(a: string, b: string): number {
  const lenA = Array.from(a).length
  const lenB = Array.from(b).length
  return toRatio(Math.min(lenA, lenB), lenA + lenB)
}
