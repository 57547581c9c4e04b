import type { Worker } from 'node:worker_threads'
import { firstMessage, spawnTsWorker } from '../../src/worker/spawn'
import { isWorkerMessage, type ShardResult, type WorkerInput } from './summary'

const WORKER_ENTRY = new URL('./worker.ts', import.meta.url)

export interface JobEvents {
  onStart?: (job: WorkerInput) => void
  onDone?: (job: WorkerInput, elapsedMs: number) => void
}

async function runJob(job: WorkerInput, workers: Set<Worker>, events: JobEvents): Promise<ShardResult> {
  const startTs = Date.now()
  events.onStart?.(job)
  const worker = spawnTsWorker(WORKER_ENTRY, job)
  workers.add(worker)
  try {
    const msg = await firstMessage(worker)
    if (!isWorkerMessage(msg)) throw new Error(`unexpected message from ${job.strategy}`)
    if ('error' in msg) throw new Error(`shard ${job.strategy} failed: ${msg.error}`)
    events.onDone?.(job, Date.now() - startTs)
    return msg.shardResult
  } finally {
    workers.delete(worker)
  }
}

/**
 * Run every job in its own worker, at most `concurrency` at a time. Results
 * come back in completion order. The first failure terminates the workers
 * still running and rejects.
 */
export async function runJobs(
  jobs: readonly WorkerInput[],
  concurrency: number,
  events: JobEvents = {},
): Promise<ShardResult[]> {
  const results: ShardResult[] = []
  const running = new Set<Worker>()
  let idx = 0
  const lane = async () => {
    while (idx < jobs.length) {
      const job = jobs[idx++]
      if (!job) break
      results.push(await runJob(job, running, events))
    }
  }
  try {
    await Promise.all(Array.from({ length: Math.max(1, concurrency) }, lane))
  } catch (err) {
    idx = jobs.length
    await Promise.all([...running].map((w) => w.terminate()))
    throw err
  }
  return results
}
