import { describe, it, expect } from 'vitest'
import { feedbackTrits, feedbackPattern, FeedbackScorer } from '../feedback'
import { LengthMismatchError } from '../errors'
import { encodeTrits, MAX_NUMERIC_TRITS } from '../pattern'

describe('feedback basic cases', () => {
  it('all exact when guess == answer', () => {
    expect(feedbackTrits('crane', 'crane')).toEqual([2, 2, 2, 2, 2])
  })

  it('all absent when no overlap', () => {
    expect(feedbackTrits('aaaaa', 'bcdfg')).toEqual([0, 0, 0, 0, 0])
  })

  it('crane against slate', () => {
    // c r n are absent; a and e sit in place
    expect(feedbackTrits('crane', 'slate')).toEqual([0, 0, 2, 0, 2])
  })

  it('rejects words of different lengths', () => {
    expect(() => feedbackTrits('crane', 'slat')).toThrow(LengthMismatchError)
  })
})

describe('duplicate handling cases', () => {
  it('speed against erase marks no more e than the answer holds', () => {
    // answer letters: e e r a s; no position matches
    // s -> present, p -> absent, e -> present, e -> present, d -> absent
    const trits = feedbackTrits('speed', 'erase')
    expect(trits).toEqual([1, 0, 1, 1, 0])
    const eMarks = trits.filter((t, i) => t > 0 && 'speed'[i] === 'e').length
    expect(eMarks).toBe(2)
  })

  it('answer cigar, guess civic', () => {
    // c i exact; v absent; the only i and c are already used
    expect(feedbackTrits('civic', 'cigar')).toEqual([2, 2, 0, 0, 0])
  })

  it('answer allee, guess eagle', () => {
    // exact first: final e. Remaining a:1 l:2 e:1
    expect(feedbackTrits('eagle', 'allee')).toEqual([1, 1, 0, 1, 2])
  })

  it('answer abbey, guess cabal', () => {
    // b at 2 exact; one a left for position 1, none for position 3
    expect(feedbackTrits('cabal', 'abbey')).toEqual([0, 1, 2, 0, 0])
  })

  it('exact matches win over earlier present marks', () => {
    // answer has one o, at position 2: the o at position 1 must be absent
    expect(feedbackTrits('eoo', 'xxo')).toEqual([0, 0, 2])
  })
})

describe('FeedbackScorer', () => {
  it('agrees with feedbackPattern, reusing its buffers', () => {
    const scorer = new FeedbackScorer(5)
    const words = ['speed', 'erase', 'civic', 'cigar', 'eagle', 'allee']
    for (const g of words) {
      for (const a of words) {
        expect(scorer.pattern(g, a)).toBe(feedbackPattern(g, a))
      }
    }
  })

  it('uses string keys for long words', () => {
    const L = MAX_NUMERIC_TRITS + 2
    const g = 'a'.repeat(L)
    const scorer = new FeedbackScorer(L)
    const p = scorer.pattern(g, g)
    expect(typeof p).toBe('string')
    expect(p).toBe(encodeTrits(new Array(L).fill(2)))
  })

  it('rejects words of the wrong length', () => {
    const scorer = new FeedbackScorer(5)
    expect(() => scorer.pattern('abc', 'abc')).toThrow(LengthMismatchError)
  })
})
