import { feedbackPattern } from './feedback'
import type { KnowledgeState } from './knowledge'
import { type PatternValue } from './pattern'

/** Words that would answer `guess` with exactly `pat`. */
export function filterByPattern(words: readonly string[], guess: string, pat: PatternValue): string[] {
  const L = guess.length
  const out: string[] = []
  for (const w of words) {
    if (w.length !== L) continue // length mismatch can't match pattern
    if (feedbackPattern(guess, w) === pat) out.push(w)
  }
  return out
}

interface CompiledConstraints {
  greens: [number, string][]
  excluded: Set<string>
  counts: { letter: string; min: number; max: number | undefined }[]
  forbidden: [number, string][]
}

function compile(state: KnowledgeState): CompiledConstraints {
  const greens: [number, string][] = []
  state.greenAt.forEach((letter, i) => {
    if (letter != null) greens.push([i, letter])
  })
  const letters = new Set([...Object.keys(state.minCount), ...Object.keys(state.maxCount)])
  const counts = [...letters].map((letter) => ({
    letter,
    min: state.minCount[letter] ?? 0,
    max: state.maxCount[letter],
  }))
  const forbidden: [number, string][] = []
  for (const [letter, positions] of Object.entries(state.yellowExclusions)) {
    for (const i of positions) forbidden.push([i, letter])
  }
  return { greens, excluded: new Set(state.excludedLetters), counts, forbidden }
}

function occurrences(word: string, letter: string): number {
  let n = 0
  for (const ch of word) if (ch === letter) n++
  return n
}

function satisfies(word: string, c: CompiledConstraints): boolean {
  for (const [i, letter] of c.greens) {
    if (word[i] !== letter) return false
  }
  for (const ch of word) {
    if (c.excluded.has(ch)) return false
  }
  for (const { letter, min, max } of c.counts) {
    const n = occurrences(word, letter)
    if (n < min) return false
    if (max !== undefined && n !== max) return false
  }
  for (const [i, letter] of c.forbidden) {
    if (word[i] === letter) return false
  }
  return true
}

/**
 * Subset of `words` consistent with everything in `state`, in input order.
 * Empty means the feedback history contradicts itself (or the word list).
 */
export function filterCandidates(state: KnowledgeState, words: readonly string[]): string[] {
  if (state.contradictory) return []
  const compiled = compile(state)
  return words.filter((w) => w.length === state.length && satisfies(w, compiled))
}
