// Solver session state & reducer.
// The reducer owns the guess history; knowledge is rebuilt from it after every
// change, so undoing or editing a mistaken entry needs no special rollback.

import { filterCandidates } from '../solver/filter'
import { isHardModeValid } from '../solver/hardMode'
import {
  createKnowledge,
  knowledgeFromHistory,
  updateKnowledge,
  type GuessEntry,
  type KnowledgeState,
} from '../solver/knowledge'
import { isSolved, isTrit, type Trit } from '../solver/pattern'
import { selectGuess, type GuessStrategy, type StrategyId } from '../solver/strategy'

export const MAX_LENGTH = 64

export interface Settings {
  length: number
  strategy: StrategyId
  hardMode: boolean
  /** First guess to suggest before any feedback; skips the opening search. */
  opener: string | null
}

export interface SessionState {
  settings: Settings
  history: GuessEntry[]
  /** Words dropped from the dictionary for this session. */
  excluded: string[]
  knowledge: KnowledgeState
}

export type Action =
  | { type: 'setLength'; length: number }
  | { type: 'addGuess'; payload: { guess: string; trits: Trit[] } }
  | { type: 'editTrit'; payload: { row: number; col: number; value: Trit } }
  | { type: 'undo' }
  | { type: 'clear' }
  | { type: 'setStrategy'; value: StrategyId }
  | { type: 'setHardMode'; value: boolean }
  | { type: 'setOpener'; value: string | null }
  | { type: 'exclude'; word: string }

function clampLength(length: number): number {
  return Math.max(1, Math.min(MAX_LENGTH, Math.floor(length)))
}

export function initialState(settings: Partial<Settings> & { length: number }): SessionState {
  const length = clampLength(settings.length)
  return {
    settings: {
      length,
      strategy: settings.strategy ?? 'frequency',
      hardMode: settings.hardMode ?? false,
      opener: settings.opener ?? null,
    },
    history: [],
    excluded: [],
    knowledge: createKnowledge(length),
  }
}

function withHistory(state: SessionState, history: GuessEntry[]): SessionState {
  return { ...state, history, knowledge: knowledgeFromHistory(state.settings.length, history) }
}

export function reducer(state: SessionState, action: Action): SessionState {
  switch (action.type) {
    case 'setLength': {
      const length = clampLength(action.length)
      if (length === state.settings.length) return state
      // Changing length invalidates existing guesses.
      return {
        settings: { ...state.settings, length },
        history: [],
        excluded: state.excluded,
        knowledge: createKnowledge(length),
      }
    }
    case 'addGuess': {
      const { guess, trits } = action.payload
      const L = state.settings.length
      if (guess.length !== L || trits.length !== L) return state
      if (!trits.every((t) => isTrit(t))) return state
      const entry: GuessEntry = { guess: guess.toLowerCase(), trits: [...trits] }
      return {
        ...state,
        history: [...state.history, entry],
        knowledge: updateKnowledge(state.knowledge, entry.guess, entry.trits),
      }
    }
    case 'editTrit': {
      const { row, col, value } = action.payload
      if (!isTrit(value)) return state
      const entry = state.history[row]
      if (!entry) return state
      if (col < 0 || col >= entry.trits.length) return state
      const edited: GuessEntry = {
        guess: entry.guess,
        trits: entry.trits.map((t, i) => (i === col ? value : t)),
      }
      return withHistory(
        state,
        state.history.map((h, i) => (i === row ? edited : h)),
      )
    }
    case 'undo': {
      if (state.history.length === 0) return state
      return withHistory(state, state.history.slice(0, -1))
    }
    case 'clear': {
      if (state.history.length === 0) return state
      return withHistory(state, [])
    }
    case 'setStrategy': {
      if (state.settings.strategy === action.value) return state
      return { ...state, settings: { ...state.settings, strategy: action.value } }
    }
    case 'setHardMode': {
      if (state.settings.hardMode === action.value) return state
      return { ...state, settings: { ...state.settings, hardMode: action.value } }
    }
    case 'setOpener': {
      const opener = action.value ? action.value.toLowerCase() : null
      if (state.settings.opener === opener) return state
      return { ...state, settings: { ...state.settings, opener } }
    }
    case 'exclude': {
      const word = action.word.toLowerCase()
      if (state.excluded.includes(word)) return state
      return { ...state, excluded: [...state.excluded, word] }
    }
    default:
      return state
  }
}

export type Round =
  | { kind: 'solved'; answer: string; attempts: number }
  | { kind: 'empty'; dictionarySize: number }
  | {
      kind: 'open'
      candidates: string[]
      /** Words the strategy may propose (hard mode drops invalid ones). */
      pool: string[]
      opener: string | null
    }

/** Dictionary words usable this session: right length, not excluded. */
export function sessionWords(state: SessionState, words: readonly string[]): string[] {
  const excluded = new Set(state.excluded)
  return words.filter((w) => w.length === state.settings.length && !excluded.has(w))
}

/**
 * Everything one round needs before a guess is chosen. Candidates are always
 * recomputed from the full word list, never from the previous round's output.
 */
export function prepareRound(state: SessionState, words: readonly string[]): Round {
  const last = state.history[state.history.length - 1]
  if (last && isSolved(last.trits)) {
    return { kind: 'solved', answer: last.guess, attempts: state.history.length }
  }
  const dictionary = sessionWords(state, words)
  const candidates = filterCandidates(state.knowledge, dictionary)
  if (candidates.length === 0) return { kind: 'empty', dictionarySize: dictionary.length }
  const pool = state.settings.hardMode
    ? dictionary.filter((w) => isHardModeValid(w, state.knowledge))
    : dictionary
  const { opener, length } = state.settings
  const useOpener = state.history.length === 0 && opener != null && opener.length === length
  return { kind: 'open', candidates, pool, opener: useOpener ? opener : null }
}

export type Recommendation =
  | { kind: 'solved'; answer: string; attempts: number }
  | { kind: 'empty'; dictionarySize: number }
  | { kind: 'guess'; guess: string; source: 'opener' | 'strategy'; candidates: string[] }

export function recommend(
  state: SessionState,
  words: readonly string[],
  strategy: StrategyId | GuessStrategy = state.settings.strategy,
): Recommendation {
  const round = prepareRound(state, words)
  if (round.kind !== 'open') return round
  if (round.opener) {
    return { kind: 'guess', guess: round.opener, source: 'opener', candidates: round.candidates }
  }
  const guess = selectGuess(round.candidates, round.pool, strategy)
  if (guess == null) return { kind: 'empty', dictionarySize: round.pool.length }
  return { kind: 'guess', guess, source: 'strategy', candidates: round.candidates }
}

/**
 * True if adding (guess, trits) would leave no candidates. Lets the shell warn
 * before accepting feedback that contradicts the history.
 */
export function wouldEliminateAll(
  state: SessionState,
  words: readonly string[],
  guess: string,
  trits: Trit[],
): boolean {
  if (guess.length !== state.settings.length || trits.length !== guess.length) return false
  const next = updateKnowledge(state.knowledge, guess, trits)
  return filterCandidates(next, sessionWords(state, words)).length === 0
}
