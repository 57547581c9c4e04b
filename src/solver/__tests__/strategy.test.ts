import { describe, it, expect } from 'vitest'
import {
  createStrategy,
  FrequencyStrategy,
  isStrategyId,
  MinimaxStrategy,
  selectGuess,
} from '@/solver'

const cats = ['bat', 'cat', 'hat', 'mat']

describe('guess strategies', () => {
  it('dispatches on the strategy id', () => {
    expect(createStrategy('frequency')).toBeInstanceOf(FrequencyStrategy)
    expect(createStrategy('minimax')).toBeInstanceOf(MinimaxStrategy)
    expect(isStrategyId('minimax')).toBe(true)
    expect(isStrategyId('entropy')).toBe(false)
  })

  it('both return null for an empty candidate set', () => {
    expect(selectGuess([], cats, 'frequency')).toBeNull()
    expect(selectGuess([], cats, 'minimax')).toBeNull()
  })

  it('frequency picks among candidates only', () => {
    // every candidate scores a+t (4+4) plus its own first letter (1)
    expect(selectGuess(cats, [...cats, 'chm'], 'frequency')).toBe('bat')
  })

  it('minimax may pick a dictionary word that is not a candidate', () => {
    expect(selectGuess(cats, [...cats, 'chm'], 'minimax')).toBe('chm')
  })

  it('minimax falls back to the candidates when the pool has no usable word', () => {
    expect(selectGuess(cats, ['toolong'], new MinimaxStrategy())).toBe('bat')
  })

  it('a single candidate is always the answer', () => {
    expect(selectGuess(['cat'], [...cats, 'chm'], 'minimax')).toBe('cat')
    expect(selectGuess(['cat'], [...cats, 'chm'], 'frequency')).toBe('cat')
  })
})
