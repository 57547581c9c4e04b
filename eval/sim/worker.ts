/* eslint-env node */
import { parentPort, workerData } from 'node:worker_threads'
import type { TsWorkerData } from '../../src/worker/spawn'
import { playGame } from './game'
import { emptyShard, recordGame, type ShardResult, type WorkerInput, type WorkerMessage } from './summary'

export function runTrials(input: WorkerInput): ShardResult {
  const shard = emptyShard(input.strategy, input.attempts)
  for (const secret of input.secrets) {
    const start = Date.now()
    const game = playGame(secret, input.words, {
      strategy: input.strategy,
      attempts: input.attempts,
      hardMode: input.hardMode,
      opener: input.opener,
    })
    recordGame(shard, game, Date.now() - start)
  }
  return shard
}

function main() {
  if (!parentPort) return
  const input = (workerData as TsWorkerData<WorkerInput>).payload
  let msg: WorkerMessage
  try {
    msg = { done: true, shardResult: runTrials(input) }
  } catch (err) {
    msg = { done: true, error: err instanceof Error ? err.message : String(err) }
  }
  parentPort.postMessage(msg)
}

main()
