export interface FrequencyScore {
  guess: string
  score: number
}

/** How many candidates contain each letter (each candidate counts a letter once). */
export function letterCoverage(candidates: readonly string[]): Map<string, number> {
  const freq = new Map<string, number>()
  for (const w of candidates) {
    for (const letter of new Set(w)) {
      freq.set(letter, (freq.get(letter) ?? 0) + 1)
    }
  }
  return freq
}

function distinctScore(word: string, freq: Map<string, number>): number {
  let s = 0
  for (const letter of new Set(word)) s += freq.get(letter) ?? 0
  return s
}

/** Every candidate with its coverage score, best first; ties keep input order. */
export function rankByFrequency(candidates: readonly string[]): FrequencyScore[] {
  const freq = letterCoverage(candidates)
  const scored = candidates.map((guess, idx) => ({ guess, score: distinctScore(guess, freq), idx }))
  scored.sort((a, b) => b.score - a.score || a.idx - b.idx)
  return scored.map(({ guess, score }) => ({ guess, score }))
}

/** Candidate covering the most common letters; first one wins a tie. */
export function pickByFrequency(candidates: readonly string[]): string | null {
  const freq = letterCoverage(candidates)
  let best: string | null = null
  let bestScore = -1
  for (const w of candidates) {
    const s = distinctScore(w, freq)
    if (s > bestScore) {
      best = w
      bestScore = s
    }
  }
  return best
}
