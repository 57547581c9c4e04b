import { describe, it, expect } from 'vitest'
import { runJobs } from '../jobs'
import { aggregate, type WorkerInput } from '../summary'

const CATS = ['bat', 'cat', 'hat', 'mat']

function job(strategy: WorkerInput['strategy']): WorkerInput {
  return { strategy, secrets: ['mat', 'hat'], words: CATS, attempts: 6, hardMode: false, opener: null }
}

describe('runJobs', () => {
  it('plays every shard in its own worker thread', async () => {
    const started: string[] = []
    const shards = await runJobs([job('frequency'), job('minimax')], 2, {
      onStart: (j) => started.push(j.strategy),
    })
    expect(started).toEqual(['frequency', 'minimax'])
    const rows = aggregate(shards)
    expect(rows.map((r) => [r.strategy, r.trials, r.solved])).toEqual([
      ['frequency', 2, 2],
      ['minimax', 2, 2],
    ])
    // mat takes 4 guesses and hat 3 with either strategy.
    expect(rows.map((r) => r.avgAttempts)).toEqual([3.5, 3.5])
  }, 30_000)
})
