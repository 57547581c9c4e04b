import { FeedbackScorer } from './feedback'
import type { PatternValue } from './pattern'

/** Candidate count at or below which only candidates are worth guessing. */
export const FINISH_THRESHOLD = 2

export interface MinimaxEvaluation {
  guess: string
  /** Position of the guess in the evaluated pool; the last tie-break. */
  index: number
  /** Size of the largest bucket: candidates left in the worst case. */
  worstCase: number
  /** Number of distinct feedback patterns (buckets). */
  buckets: number
  isCandidate: boolean
}

export interface GuessDone {
  guess: string
  abortedEarly: boolean
  answersVisited: number
}

export interface ScanOpts {
  /** Offset added to every index (for pool shards scanned separately). */
  indexOffset?: number
  /** Stop scoring a guess once a bucket outgrows the best worst case (default true). */
  earlyCut?: boolean
  onGuessDone?: (info: GuessDone) => void
}

/** Words worth evaluating as the next guess. */
export function minimaxPool(
  candidates: readonly string[],
  dictionary: readonly string[],
): readonly string[] {
  if (candidates.length <= FINISH_THRESHOLD || dictionary.length === 0) return candidates
  return dictionary
}

/** Total order used to pick between two evaluations: smaller worst case, then candidate, then pool order. */
export function compareEvaluations(a: MinimaxEvaluation, b: MinimaxEvaluation): number {
  return (
    a.worstCase - b.worstCase ||
    Number(b.isCandidate) - Number(a.isCandidate) ||
    a.index - b.index
  )
}

export function preferEvaluation(
  a: MinimaxEvaluation | null,
  b: MinimaxEvaluation | null,
): MinimaxEvaluation | null {
  if (!a) return b
  if (!b) return a
  return compareEvaluations(a, b) <= 0 ? a : b
}

interface Partition {
  worstCase: number
  buckets: number
  visited: number
  aborted: boolean
}

function partition(
  guess: string,
  candidates: readonly string[],
  scorer: FeedbackScorer,
  cutoff: number,
): Partition {
  const sizes = new Map<PatternValue, number>()
  let worstCase = 0
  let visited = 0
  for (const answer of candidates) {
    const key = scorer.pattern(guess, answer)
    const n = (sizes.get(key) ?? 0) + 1
    sizes.set(key, n)
    visited++
    if (n > worstCase) {
      worstCase = n
      if (worstCase > cutoff) return { worstCase, buckets: sizes.size, visited, aborted: true }
    }
  }
  return { worstCase, buckets: sizes.size, visited, aborted: false }
}

/** Score a single guess against the full candidate set. */
export function evaluateGuess(
  guess: string,
  candidates: readonly string[],
  index = 0,
): MinimaxEvaluation {
  const scorer = new FeedbackScorer(guess.length)
  const { worstCase, buckets } = partition(guess, candidates, scorer, Infinity)
  return { guess, index, worstCase, buckets, isCandidate: candidates.includes(guess) }
}

/**
 * Best guess of `pool` by minimax over feedback buckets, or null when there is
 * nothing to partition. Runs in O(|pool| x |candidates| x L).
 */
export function scanMinimax(
  pool: readonly string[],
  candidates: readonly string[],
  opts: ScanOpts = {},
): MinimaxEvaluation | null {
  if (candidates.length === 0 || pool.length === 0) return null
  const first = candidates[0]
  if (first === undefined) return null
  const scorer = new FeedbackScorer(first.length)
  const candidateSet = new Set(candidates)
  const offset = opts.indexOffset ?? 0
  const earlyCut = opts.earlyCut ?? true
  let best: MinimaxEvaluation | null = null

  for (const [i, guess] of pool.entries()) {
    if (guess.length !== scorer.length) continue
    const cutoff = earlyCut && best ? best.worstCase : Infinity
    const part = partition(guess, candidates, scorer, cutoff)
    opts.onGuessDone?.({ guess, abortedEarly: part.aborted, answersVisited: part.visited })
    if (part.aborted) continue
    const evaluation: MinimaxEvaluation = {
      guess,
      index: offset + i,
      worstCase: part.worstCase,
      buckets: part.buckets,
      isCandidate: candidateSet.has(guess),
    }
    best = preferEvaluation(best, evaluation)
  }

  return best
}

/** Full evaluations of the pool, best first; no early cut. */
export function rankMinimax(
  candidates: readonly string[],
  dictionary: readonly string[],
  topK = 5,
): MinimaxEvaluation[] {
  if (candidates.length === 0) return []
  const pool = minimaxPool(candidates, dictionary)
  const candidateSet = new Set(candidates)
  const L = candidates[0]?.length ?? 0
  const scorer = new FeedbackScorer(L)
  const out: MinimaxEvaluation[] = []
  pool.forEach((guess, index) => {
    if (guess.length !== L) return
    const { worstCase, buckets } = partition(guess, candidates, scorer, Infinity)
    out.push({ guess, index, worstCase, buckets, isCandidate: candidateSet.has(guess) })
  })
  out.sort(compareEvaluations)
  return out.slice(0, topK)
}
