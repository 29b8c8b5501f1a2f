/**
 * Lexical Similarity
 *
 * Edit-distance based scores on a 0-100 integer scale, halves rounded to even.
 *
 * - ratio: whole-string similarity. Length mismatch lowers the score, so it
 *   suits comparing two well-formed descriptions.
 * - partialRatio: best alignment of the shorter string against every
 *   same-length window of the longer one. A short query fully contained in a
 *   long catalog description scores 100.
 *
 * Both are case-sensitive; callers lowercase when they want case-insensitive
 * comparison.
 */

/**
 * Length of the longest common subsequence (two-row DP)
 */
export function longestCommonSubsequence(a: string, b: string): number {
  const n = b.length
  if (a.length === 0 || n === 0) return 0

  let previous = new Array<number>(n + 1).fill(0)
  let current = new Array<number>(n + 1).fill(0)

  for (let i = 1; i <= a.length; i++) {
    for (let j = 1; j <= n; j++) {
      current[j] = a[i - 1] === b[j - 1]
        ? previous[j - 1] + 1
        : Math.max(previous[j], current[j - 1])
    }
    ;[previous, current] = [current, previous]
  }

  return previous[n]
}

/**
 * Round to the nearest integer, halves to the even neighbour
 */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value)
  const fraction = value - floor
  if (fraction > 0.5) return floor + 1
  if (fraction < 0.5) return floor
  return floor % 2 === 0 ? floor : floor + 1
}

// Rounds the float 100 * (2 * matches / total) as computed, not the exact fraction
function similarityScore(matches: number, total: number): number {
  return roundHalfEven(100 * ((2 * matches) / total))
}

/**
 * Whole-string similarity in [0, 100]: 100 * 2 * LCS / (|a| + |b|).
 * Empty input scores 0.
 */
export function ratio(a: string, b: string): number {
  if (a.length === 0 || b.length === 0) return 0

  return similarityScore(longestCommonSubsequence(a, b), a.length + b.length)
}

/**
 * LCS of `pattern` against every window of `text` with the pattern's length.
 * Entry k is the LCS for the window starting at k.
 *
 * Seaweed combing: one O(|pattern| * |text|) pass over the grid, after which
 * a window's LCS is its length minus the strands that enter and leave
 * through its own columns. Requires |pattern| <= |text|.
 */
export function windowedLcs(pattern: string, text: string): number[] {
  const m = pattern.length
  const n = text.length
  if (m === 0 || m > n) return []

  // Strands 0..m-1 enter from the left, m..m+n-1 from the top
  const vertical = new Int32Array(n)
  for (let j = 0; j < n; j++) vertical[j] = m + j

  for (let i = 0; i < m; i++) {
    const char = pattern.charCodeAt(i)
    let strand = i
    for (let j = 0; j < n; j++) {
      const crossing = vertical[j]
      if (char === text.charCodeAt(j) || strand > crossing) {
        vertical[j] = strand
        strand = crossing
      }
    }
  }

  const windowCount = n - m + 1
  const delta = new Int32Array(windowCount + 1)
  for (let end = 0; end < n; end++) {
    const start = vertical[end] - m
    if (start < 0) continue

    // Windows k with k <= min(start, end) and max(start, end) < k + m
    const from = Math.max(Math.max(start, end) - m + 1, 0)
    const to = Math.min(Math.min(start, end), windowCount - 1)
    if (from <= to) {
      delta[from]++
      delta[to + 1]--
    }
  }

  const lcs = new Array<number>(windowCount)
  let passingThrough = 0
  for (let k = 0; k < windowCount; k++) {
    passingThrough += delta[k]
    lcs[k] = m - passingThrough
  }
  return lcs
}

/**
 * Best ratio of the shorter string against any window of the longer string
 * with the same length. Empty input scores 0.
 */
export function partialRatio(a: string, b: string): number {
  if (a.length === 0 || b.length === 0) return 0

  const [shorter, longer] = a.length <= b.length ? [a, b] : [b, a]
  if (shorter.length === longer.length) return ratio(shorter, longer)

  // Exact containment is the common case for short queries
  if (longer.includes(shorter)) return 100

  let best = 0
  for (const matches of windowedLcs(shorter, longer)) {
    if (matches > best) best = matches
  }

  return similarityScore(best, 2 * shorter.length)
}
