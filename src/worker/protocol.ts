import type { MinimaxEvaluation } from '../solver/minimax'

/** Data passed from the main thread to one minimax shard. */
export interface ShardInput {
  pool: string[]
  candidates: string[]
  /** Index of `pool[0]` in the full pool. */
  indexOffset: number
}

export type ShardMessage =
  | { done: true; evaluation: MinimaxEvaluation | null }
  | { done: true; error: string }

export function isShardMessage(value: unknown): value is ShardMessage {
  return typeof value === 'object' && value !== null && 'done' in value
}
