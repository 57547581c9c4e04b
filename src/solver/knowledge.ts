import { assertSameLength } from './errors'
import { ABSENT, EXACT, PRESENT, type Trit } from './pattern'

/**
 * Everything learned from the guesses so far. Plain data so it can be stored or
 * posted to a worker as is; `updateKnowledge` never mutates its input.
 */
export interface KnowledgeState {
  length: number
  /** Letter confirmed EXACT at each position, or null. */
  greenAt: (string | null)[]
  /** Positions a PRESENT letter is known not to occupy (sorted, distinct). */
  yellowExclusions: Record<string, number[]>
  /** Lower bound on occurrences of a letter. */
  minCount: Record<string, number>
  /** Exact occurrence count, known once a guess carried a surplus copy. */
  maxCount: Record<string, number>
  /** Letters with zero occurrences (sorted). */
  excludedLetters: string[]
  /** Set once the history disagreed with itself; nothing can match. */
  contradictory: boolean
}

export interface GuessEntry {
  guess: string
  trits: Trit[]
}

export function createKnowledge(length: number): KnowledgeState {
  return {
    length,
    greenAt: new Array<string | null>(length).fill(null),
    yellowExclusions: {},
    minCount: {},
    maxCount: {},
    excludedLetters: [],
    contradictory: false,
  }
}

interface LetterTally {
  confirmed: number
  absent: number
}

export function updateKnowledge(
  state: KnowledgeState,
  guess: string,
  feedback: readonly Trit[],
): KnowledgeState {
  assertSameLength('guess', state.length, guess.length)
  assertSameLength('feedback', state.length, feedback.length)

  const greenAt = state.greenAt.slice()
  const yellowExclusions: Record<string, number[]> = {}
  for (const [letter, positions] of Object.entries(state.yellowExclusions)) {
    yellowExclusions[letter] = positions.slice()
  }
  const minCount = { ...state.minCount }
  const maxCount = { ...state.maxCount }
  const excluded = new Set(state.excludedLetters)
  let contradictory = state.contradictory

  const tallies = new Map<string, LetterTally>()
  for (let i = 0; i < guess.length; i++) {
    const letter = guess.charAt(i)
    const t = feedback[i]
    let tally = tallies.get(letter)
    if (!tally) {
      tally = { confirmed: 0, absent: 0 }
      tallies.set(letter, tally)
    }
    if (t === EXACT) {
      tally.confirmed++
      const known = greenAt[i]
      if (known != null && known !== letter) contradictory = true
      else greenAt[i] = letter
    } else if (t === PRESENT) {
      tally.confirmed++
      const positions = (yellowExclusions[letter] ??= [])
      if (!positions.includes(i)) {
        positions.push(i)
        positions.sort((a, b) => a - b)
      }
    } else if (t === ABSENT) {
      tally.absent++
    }
  }

  for (const [letter, { confirmed, absent }] of tallies) {
    if (confirmed === 0) {
      // A letter known present may still show ABSENT where a surplus copy was placed.
      if ((minCount[letter] ?? 0) === 0) excluded.add(letter)
      continue
    }
    if (excluded.has(letter)) {
      contradictory = true
      continue
    }
    const lower = Math.max(minCount[letter] ?? 0, confirmed)
    const prevUpper = maxCount[letter]
    const upper =
      absent > 0 ? Math.min(prevUpper ?? confirmed, confirmed) : prevUpper
    if (upper !== undefined && upper < lower) {
      contradictory = true
      continue
    }
    minCount[letter] = lower
    if (upper !== undefined) maxCount[letter] = upper
  }

  return {
    length: state.length,
    greenAt,
    yellowExclusions,
    minCount,
    maxCount,
    excludedLetters: [...excluded].sort(),
    contradictory,
  }
}

/** Fold a whole guess history into a fresh state. */
export function knowledgeFromHistory(length: number, history: readonly GuessEntry[]): KnowledgeState {
  let state = createKnowledge(length)
  for (const { guess, trits } of history) {
    state = updateKnowledge(state, guess, trits)
  }
  return state
}

/** Letters confirmed present (positive lower bound), sorted. */
export function confirmedLetters(state: KnowledgeState): string[] {
  return Object.keys(state.minCount)
    .filter((letter) => (state.minCount[letter] ?? 0) > 0)
    .sort()
}
