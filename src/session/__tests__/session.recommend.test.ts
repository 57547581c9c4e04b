import { describe, it, expect } from 'vitest'
import { initialState, prepareRound, recommend, reducer, wouldEliminateAll } from '../session'
import { feedbackTrits } from '@/solver'

const words = ['slate', 'crane', 'plate', 'state', 'least', 'steal', 'table', 'cat']

describe('recommend', () => {
  it('suggests the opener before any feedback', () => {
    const s = initialState({ length: 5, opener: 'crane' })
    const rec = recommend(s, words)
    expect(rec).toEqual({
      kind: 'guess',
      guess: 'crane',
      source: 'opener',
      candidates: ['slate', 'crane', 'plate', 'state', 'least', 'steal', 'table'],
    })
  })

  it('ignores an opener of the wrong length', () => {
    const s = initialState({ length: 5, opener: 'cat' })
    const rec = recommend(s, words)
    expect(rec.kind === 'guess' && rec.source).toBe('strategy')
  })

  it('narrows the candidates from the full word list each round', () => {
    let s = initialState({ length: 5 })
    s = reducer(s, {
      type: 'addGuess',
      payload: { guess: 'crane', trits: feedbackTrits('crane', 'slate') },
    })
    // slate, plate, state remain; s l a t e cover: a3 e3 l2 p1 s2 t3
    // slate = s2+l2+a3+t3+e3 = 13, plate = 12, state = s2+t3+a3+e3 = 11
    expect(recommend(s, words)).toEqual({
      kind: 'guess',
      guess: 'slate',
      source: 'strategy',
      candidates: ['slate', 'plate', 'state'],
    })
  })

  it('reports the solved word', () => {
    let s = initialState({ length: 5 })
    s = reducer(s, { type: 'addGuess', payload: { guess: 'crane', trits: [0, 0, 2, 0, 2] } })
    s = reducer(s, { type: 'addGuess', payload: { guess: 'slate', trits: [2, 2, 2, 2, 2] } })
    expect(recommend(s, words)).toEqual({ kind: 'solved', answer: 'slate', attempts: 2 })
  })

  it('reports contradictory feedback as an empty round', () => {
    let s = initialState({ length: 5 })
    s = reducer(s, { type: 'addGuess', payload: { guess: 'slate', trits: [0, 0, 0, 0, 0] } })
    expect(recommend(s, words)).toEqual({ kind: 'empty', dictionarySize: 7 })
  })

  it('leaves excluded words out', () => {
    let s = initialState({ length: 5 })
    s = reducer(s, {
      type: 'addGuess',
      payload: { guess: 'crane', trits: feedbackTrits('crane', 'slate') },
    })
    s = reducer(s, { type: 'exclude', word: 'slate' })
    const round = prepareRound(s, words)
    expect(round.kind === 'open' && round.candidates).toEqual(['plate', 'state'])
  })

  it('restricts the minimax pool in hard mode', () => {
    let s = initialState({ length: 5, strategy: 'minimax', hardMode: true })
    s = reducer(s, {
      type: 'addGuess',
      payload: { guess: 'crane', trits: feedbackTrits('crane', 'slate') },
    })
    const round = prepareRound(s, words)
    // a at 2 and e at 4 are required; crane itself still qualifies
    expect(round.kind === 'open' && round.pool).toEqual(['slate', 'crane', 'plate', 'state'])
  })
})

describe('wouldEliminateAll', () => {
  const s = initialState({ length: 5 })

  it('returns false for a length mismatch', () => {
    expect(wouldEliminateAll(s, words, 'crane', [0, 0, 0])).toBe(false)
  })

  it('detects feedback that leaves nothing', () => {
    expect(wouldEliminateAll(s, words, 'slate', [0, 0, 0, 0, 0])).toBe(true)
  })

  it('all exact keeps the guess alive', () => {
    expect(wouldEliminateAll(s, words, 'slate', [2, 2, 2, 2, 2])).toBe(false)
  })
})
