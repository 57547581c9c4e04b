import { assertSameLength } from './errors'
import {
  ABSENT,
  EXACT,
  PRESENT,
  encodeTrits,
  isNumericLength,
  type FeedbackPattern,
  type PatternValue,
  type Trit,
} from './pattern'

// Letter counts are indexed by char code - 97; words are lower-case a-z.

export function feedbackTrits(guess: string, answer: string): FeedbackPattern {
  assertSameLength('guess and answer', guess.length, answer.length)
  const L = guess.length
  const result: FeedbackPattern = new Array<Trit>(L).fill(ABSENT)

  const counts = new Array<number>(26).fill(0)
  for (let i = 0; i < L; i++) {
    const c = answer.charCodeAt(i) - 97
    if (c >= 0 && c < 26) counts[c] = (counts[c] ?? 0) + 1
  }

  // First pass: exact matches consume their answer letter
  for (let i = 0; i < L; i++) {
    if (guess[i] === answer[i]) {
      result[i] = EXACT
      const c = guess.charCodeAt(i) - 97
      if (c >= 0 && c < 26) counts[c] = (counts[c] ?? 0) - 1
    }
  }

  // Second pass: present-but-misplaced, left to right, against what is left
  for (let i = 0; i < L; i++) {
    if (result[i] === EXACT) continue
    const c = guess.charCodeAt(i) - 97
    const left = counts[c] ?? 0
    if (left > 0) {
      result[i] = PRESENT
      counts[c] = left - 1
    }
  }

  return result
}

export function feedbackPattern(guess: string, answer: string): PatternValue {
  return encodeTrits(feedbackTrits(guess, answer))
}

/**
 * Computes packed patterns for one word length without allocating per call.
 * Used by the minimax scan, which scores every pool word against every candidate.
 */
export class FeedbackScorer {
  readonly length: number
  private readonly counts = new Int32Array(26)
  private readonly marks: Uint8Array
  private readonly numeric: boolean

  constructor(length: number) {
    this.length = length
    this.marks = new Uint8Array(length)
    this.numeric = isNumericLength(length)
  }

  pattern(guess: string, answer: string): PatternValue {
    assertSameLength('guess', this.length, guess.length)
    assertSameLength('answer', this.length, answer.length)
    // Long words fall back to the allocating path; their key is a string anyway.
    if (!this.numeric) return feedbackPattern(guess, answer)

    const L = this.length
    const counts = this.counts
    const marks = this.marks
    counts.fill(0)
    marks.fill(ABSENT)
    for (let i = 0; i < L; i++) {
      const a = answer.charCodeAt(i)
      if (guess.charCodeAt(i) === a) {
        marks[i] = EXACT
      } else {
        const c = a - 97
        if (c >= 0 && c < 26) counts[c] = (counts[c] ?? 0) + 1
      }
    }
    let value = 0
    let mul = 1
    for (let i = 0; i < L; i++) {
      if (marks[i] === EXACT) {
        value += EXACT * mul
      } else {
        const c = guess.charCodeAt(i) - 97
        const left = counts[c] ?? 0
        if (left > 0) {
          counts[c] = left - 1
          value += PRESENT * mul
        }
      }
      mul *= 3
    }
    return value
  }
}
