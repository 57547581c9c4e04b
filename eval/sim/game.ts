import { filterCandidates } from '../../src/solver/filter'
import { feedbackTrits } from '../../src/solver/feedback'
import { isSolved } from '../../src/solver/pattern'
import type { StrategyId } from '../../src/solver/strategy'
import { initialState, recommend, reducer, sessionWords } from '../../src/session/session'

export interface GameOpts {
  strategy: StrategyId
  attempts: number
  hardMode?: boolean
  opener?: string | null
}

export interface GameResult {
  secret: string
  solved: boolean
  /** Guesses played (equals the attempt limit on failure). */
  attempts: number
  guesses: string[]
  /** Candidates still alive when the game ended. */
  remaining: number
}

/** Play one game against `secret`, following the session's recommendation every round. */
export function playGame(secret: string, words: readonly string[], opts: GameOpts): GameResult {
  let state = initialState({
    length: secret.length,
    strategy: opts.strategy,
    hardMode: opts.hardMode ?? false,
    opener: opts.opener ?? null,
  })
  const guesses: string[] = []
  while (guesses.length < opts.attempts) {
    const rec = recommend(state, words)
    if (rec.kind !== 'guess') break
    const trits = feedbackTrits(rec.guess, secret)
    guesses.push(rec.guess)
    state = reducer(state, { type: 'addGuess', payload: { guess: rec.guess, trits } })
    if (isSolved(trits)) {
      return { secret, solved: true, attempts: guesses.length, guesses, remaining: 1 }
    }
  }
  const remaining = filterCandidates(state.knowledge, sessionWords(state, words)).length
  return { secret, solved: false, attempts: guesses.length, guesses, remaining }
}
