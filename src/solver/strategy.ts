import { pickByFrequency } from './frequency'
import { minimaxPool, scanMinimax } from './minimax'

export type StrategyId = 'frequency' | 'minimax'

export const STRATEGY_IDS: readonly StrategyId[] = ['frequency', 'minimax']

export function isStrategyId(value: string): value is StrategyId {
  return value === 'frequency' || value === 'minimax'
}

/**
 * Picks the next guess. `null` means the candidate set is empty, i.e. the
 * feedback so far is contradictory; callers must not retry silently.
 */
export interface GuessStrategy {
  readonly id: StrategyId
  select(candidates: readonly string[], dictionary: readonly string[]): string | null
}

/** Rewards candidates whose distinct letters are common among the candidates. */
export class FrequencyStrategy implements GuessStrategy {
  readonly id = 'frequency'

  select(candidates: readonly string[]): string | null {
    return pickByFrequency(candidates)
  }
}

/** Minimises the worst-case number of candidates left after the guess. */
export class MinimaxStrategy implements GuessStrategy {
  readonly id = 'minimax'

  select(candidates: readonly string[], dictionary: readonly string[]): string | null {
    if (candidates.length === 0) return null
    // A pool with no word of the candidates' length falls back to the candidates.
    const best =
      scanMinimax(minimaxPool(candidates, dictionary), candidates) ??
      scanMinimax(candidates, candidates)
    return best ? best.guess : null
  }
}

export function createStrategy(id: StrategyId): GuessStrategy {
  switch (id) {
    case 'frequency':
      return new FrequencyStrategy()
    case 'minimax':
      return new MinimaxStrategy()
  }
}

export function selectGuess(
  candidates: readonly string[],
  dictionary: readonly string[],
  strategy: StrategyId | GuessStrategy,
): string | null {
  const impl = typeof strategy === 'string' ? createStrategy(strategy) : strategy
  return impl.select(candidates, dictionary)
}
