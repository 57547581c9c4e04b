import type { Worker } from 'node:worker_threads'
import {
  minimaxPool,
  preferEvaluation,
  scanMinimax,
  type MinimaxEvaluation,
} from '../solver/minimax'
import { isShardMessage } from './protocol'
import { firstMessage, spawnTsWorker } from './spawn'

/** Below this many pool words per thread, spawning workers costs more than it saves. */
export const MIN_SHARD_SIZE = 256

export class WorkerError extends Error {
  readonly shard: number

  constructor(shard: number, message: string) {
    super(`minimax shard ${shard} failed: ${message}`)
    this.name = 'WorkerError'
    this.shard = shard
  }
}

export interface ParallelOpts {
  threads: number
  /** Called once per finished shard. */
  onShardDone?: (shard: number, elapsedMs: number) => void
}

/** Split [0, n) into at most `shards` contiguous ranges of near-equal size. */
export function shardRanges(n: number, shards: number): [number, number][] {
  const count = Math.max(1, Math.min(shards, n))
  const out: [number, number][] = []
  const base = Math.floor(n / count)
  let extra = n % count
  let start = 0
  for (let i = 0; i < count && start < n; i++) {
    const size = base + (extra > 0 ? 1 : 0)
    if (extra > 0) extra--
    out.push([start, start + size])
    start += size
  }
  return out
}

const SHARD_ENTRY = new URL('./minimax.worker.ts', import.meta.url)

async function awaitShard(shard: number, worker: Worker): Promise<MinimaxEvaluation | null> {
  let msg: unknown
  try {
    msg = await firstMessage(worker)
  } catch (err) {
    throw new WorkerError(shard, err instanceof Error ? err.message : String(err))
  }
  if (!isShardMessage(msg)) throw new WorkerError(shard, 'unexpected message')
  if ('error' in msg) throw new WorkerError(shard, msg.error)
  return msg.evaluation
}

/**
 * Minimax selection with the pool split across worker threads. Each shard
 * reports its own winner and the winners are reduced with the same ordering
 * as the sequential scan, so the result does not depend on the thread count.
 */
export async function selectMinimaxParallel(
  candidates: readonly string[],
  dictionary: readonly string[],
  opts: ParallelOpts,
): Promise<MinimaxEvaluation | null> {
  if (candidates.length === 0) return null
  const pool = minimaxPool(candidates, dictionary)
  const threads = Math.min(opts.threads, Math.floor(pool.length / MIN_SHARD_SIZE))
  if (threads <= 1) {
    return scanMinimax(pool, candidates) ?? scanMinimax(candidates, candidates)
  }
  const ranges = shardRanges(pool.length, threads)
  const workers: Worker[] = []
  try {
    const results = await Promise.all(
      ranges.map(async ([start, end], shard) => {
        const t0 = Date.now()
        const worker = spawnTsWorker(SHARD_ENTRY, {
          pool: pool.slice(start, end),
          candidates: [...candidates],
          indexOffset: start,
        })
        workers.push(worker)
        const evaluation = await awaitShard(shard, worker)
        opts.onShardDone?.(shard, Date.now() - t0)
        return evaluation
      }),
    )
    const best = results.reduce<MinimaxEvaluation | null>((acc, r) => preferEvaluation(acc, r), null)
    return best ?? scanMinimax(candidates, candidates)
  } finally {
    // Shards still running after a failure are abandoned; finished ones have exited already.
    await Promise.all(workers.map((w) => w.terminate()))
  }
}
