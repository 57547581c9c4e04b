import { describe, it, expect } from 'vitest'
import { scanMinimax } from '@/solver/minimax'
import { MIN_SHARD_SIZE, selectMinimaxParallel, shardRanges, WorkerError } from '../pool'
import { isShardMessage } from '../protocol'

describe('shardRanges', () => {
  it('splits evenly, giving the remainder to the first shards', () => {
    expect(shardRanges(10, 3)).toEqual([
      [0, 4],
      [4, 7],
      [7, 10],
    ])
  })

  it('never makes more shards than items', () => {
    expect(shardRanges(2, 8)).toEqual([
      [0, 1],
      [1, 2],
    ])
  })

  it('returns no ranges for an empty pool', () => {
    expect(shardRanges(0, 4)).toEqual([])
  })
})

describe('selectMinimaxParallel', () => {
  const cats = ['bat', 'cat', 'hat', 'mat']

  it('scans in process when the pool is too small to shard', async () => {
    expect(cats.length + 1).toBeLessThan(MIN_SHARD_SIZE * 2)
    const best = await selectMinimaxParallel(cats, [...cats, 'chm'], { threads: 4 })
    expect(best?.guess).toBe('chm')
    expect(best?.worstCase).toBe(1)
    expect(best?.index).toBe(4)
  })

  it('resolves null with no candidates', async () => {
    await expect(selectMinimaxParallel([], cats, { threads: 4 })).resolves.toBeNull()
  })
})

describe('selectMinimaxParallel on worker threads', () => {
  // Every 3-letter word over a-j: 1000 words, enough for three shards.
  const letters = 'abcdefghij'
  const words: string[] = []
  for (const x of letters) for (const y of letters) for (const z of letters) words.push(x + y + z)

  it('matches the sequential scan', async () => {
    expect(words.length).toBeGreaterThanOrEqual(2 * MIN_SHARD_SIZE)
    const candidates = words.filter((w) => w.startsWith('a'))
    const done: number[] = []
    const best = await selectMinimaxParallel(candidates, words, {
      threads: 3,
      onShardDone: (shard) => done.push(shard),
    })
    expect(best).toEqual(scanMinimax(words, candidates))
    expect([...done].sort()).toEqual([0, 1, 2])
  }, 30_000)

  it('rejects with the shard error when a worker fails', async () => {
    const candidates = ['abc', 'abd', 'abe', 'abcd']
    const run = selectMinimaxParallel(candidates, words, { threads: 2 })
    await expect(run).rejects.toBeInstanceOf(WorkerError)
    await expect(run).rejects.toThrow(/^minimax shard [01] failed: answer: expected length 3, got 4$/)
  }, 30_000)
})

describe('worker protocol', () => {
  it('accepts worker replies only', () => {
    expect(isShardMessage({ done: true, evaluation: null })).toBe(true)
    expect(isShardMessage('done')).toBe(false)
    expect(isShardMessage(null)).toBe(false)
  })

  it('names the failing shard', () => {
    const err = new WorkerError(2, 'boom')
    expect(err.message).toBe('minimax shard 2 failed: boom')
    expect(err.name).toBe('WorkerError')
  })
})
