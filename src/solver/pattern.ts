// Feedback alphabet: one trit per position.
export const ABSENT = 0
export const PRESENT = 1
export const EXACT = 2

export type Trit = typeof ABSENT | typeof PRESENT | typeof EXACT

/** Per-position feedback for one guess, same length as the guess. */
export type FeedbackPattern = Trit[]

/** Packed pattern: base-3 number for short words, digit string for long ones. */
export type PatternValue = number | string

export const MAX_NUMERIC_TRITS = 33 // because 3^33 < 2^53 (safe integer) and 3^34 > 2^53

/** Return true if a word length should use the numeric (base-3 packed) representation */
export function isNumericLength(length: number): boolean {
  return length <= MAX_NUMERIC_TRITS
}

export function isTrit(value: number): value is Trit {
  return value === ABSENT || value === PRESENT || value === EXACT
}

/**
 * Encode an array of trits into either a number (little-endian base-3) or a string fallback.
 * Lowest index (position 0) becomes the least-significant trit.
 */
export function encodeTrits(trits: readonly Trit[]): PatternValue {
  const L = trits.length
  if (isNumericLength(L)) {
    let value = 0
    let mul = 1
    for (const t of trits) {
      value += t * mul
      mul *= 3
    }
    return value
  }
  // String fallback: digits '0','1','2' in index order left->right.
  return trits.join('')
}

/** Decode a pattern value back into its trit array of given length */
export function decodePattern(p: PatternValue, length: number): FeedbackPattern {
  const out: FeedbackPattern = []
  if (typeof p === 'number') {
    let v = p
    for (let i = 0; i < length; i++) {
      out.push(tritOf(v % 3))
      v = Math.trunc(v / 3)
    }
    return out
  }
  for (let i = 0; i < length; i++) {
    const ch = p.charCodeAt(i)
    out.push(Number.isNaN(ch) ? ABSENT : tritOf(ch - 48))
  }
  return out
}

function tritOf(n: number): Trit {
  return isTrit(n) ? n : ABSENT
}

export function isSolved(trits: readonly Trit[]): boolean {
  return trits.length > 0 && trits.every((t) => t === EXACT)
}
