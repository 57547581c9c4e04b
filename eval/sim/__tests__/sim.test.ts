import { describe, it, expect } from 'vitest'
import { playGame } from '../game'
import { aggregate, emptyShard, formatCsv, recordGame } from '../summary'

const CATS = ['bat', 'cat', 'hat', 'mat']

describe('playGame', () => {
  it('follows the frequency strategy until solved', () => {
    const game = playGame('mat', CATS, { strategy: 'frequency', attempts: 6 })
    expect(game).toEqual({
      secret: 'mat',
      solved: true,
      attempts: 4,
      guesses: ['bat', 'cat', 'hat', 'mat'],
      remaining: 1,
    })
  })

  it('reports the survivors when attempts run out', () => {
    const game = playGame('mat', CATS, { strategy: 'frequency', attempts: 3 })
    expect(game.solved).toBe(false)
    expect(game.attempts).toBe(3)
    expect(game.remaining).toBe(1)
  })

  it('lets minimax spend a probe word', () => {
    const game = playGame('hat', [...CATS, 'chm'], { strategy: 'minimax', attempts: 6 })
    expect(game.guesses).toEqual(['chm', 'hat'])
    expect(game.solved).toBe(true)
  })

  it('opens with the fixed opener', () => {
    const game = playGame('bat', CATS, { strategy: 'frequency', attempts: 6, opener: 'mat' })
    expect(game.guesses[0]).toBe('mat')
  })
})

describe('summary', () => {
  it('tallies games per strategy', () => {
    const shard = emptyShard('frequency', 6)
    recordGame(shard, { secret: 'mat', solved: true, attempts: 4, guesses: [], remaining: 1 }, 10)
    recordGame(shard, { secret: 'cat', solved: true, attempts: 2, guesses: [], remaining: 1 }, 20)
    recordGame(shard, { secret: 'hat', solved: false, attempts: 6, guesses: [], remaining: 3 }, 30)
    expect(shard.attemptHist).toEqual([0, 1, 0, 1, 0, 0, 1])

    const [row] = aggregate([shard])
    expect(row).toEqual({
      strategy: 'frequency',
      trials: 3,
      solved: 2,
      failRate: 1 / 3,
      avgAttempts: 3,
      avgTimeMs: 20,
      avgRemainingOnFail: 3,
    })
    expect(formatCsv(aggregate([shard])).split('\n')[1]).toBe(
      'frequency,3,2,0.333333,3.0000,20.00,3.00',
    )
  })

  it('sorts rows by strategy', () => {
    const rows = aggregate([emptyShard('minimax', 6), emptyShard('frequency', 6)])
    expect(rows.map((r) => r.strategy)).toEqual(['frequency', 'minimax'])
  })
})
