/* Worker thread: scans one contiguous shard of the minimax guess pool. */
import { parentPort, workerData } from 'node:worker_threads'
import { scanMinimax } from '../solver/minimax'
import type { ShardInput, ShardMessage } from './protocol'
import type { TsWorkerData } from './spawn'

function main() {
  if (!parentPort) return
  const input = (workerData as TsWorkerData<ShardInput>).payload
  let msg: ShardMessage
  try {
    const evaluation = scanMinimax(input.pool, input.candidates, { indexOffset: input.indexOffset })
    msg = { done: true, evaluation }
  } catch (err) {
    msg = { done: true, error: err instanceof Error ? err.message : String(err) }
  }
  parentPort.postMessage(msg)
}

main()
