import type { StrategyId } from '../../src/solver/strategy'
import { formatTable } from '../../src/cli/format'
import type { GameResult } from './game'

/** Data passed from the main thread to one simulator shard. */
export interface WorkerInput {
  strategy: StrategyId
  secrets: string[]
  words: string[]
  attempts: number
  hardMode: boolean
  opener: string | null
}

/** Aggregate statistics returned to the parent */
export interface ShardResult {
  strategy: StrategyId
  trials: number
  successes: number
  failCount: number
  attemptHist: number[] // indices 0..attempts-1 for attempts used (success), last index = fails
  totalAttemptsSuccess: number
  totalTimeMs: number
  remainingOnFailAccum: number
}

export interface RowSummary {
  strategy: StrategyId
  trials: number
  solved: number
  failRate: number
  avgAttempts: number
  avgTimeMs: number
  avgRemainingOnFail: number
}

export type WorkerMessage =
  | { done: true; shardResult: ShardResult }
  | { done: true; error: string }

export function isWorkerMessage(value: unknown): value is WorkerMessage {
  return typeof value === 'object' && value !== null && 'done' in value
}

export function emptyShard(strategy: StrategyId, attempts: number): ShardResult {
  return {
    strategy,
    trials: 0,
    successes: 0,
    failCount: 0,
    attemptHist: new Array<number>(attempts + 1).fill(0),
    totalAttemptsSuccess: 0,
    totalTimeMs: 0,
    remainingOnFailAccum: 0,
  }
}

/** Fold one game into the shard totals (mutates `shard`). */
export function recordGame(shard: ShardResult, game: GameResult, elapsedMs: number): void {
  shard.trials++
  shard.totalTimeMs += elapsedMs
  const failSlot = shard.attemptHist.length - 1
  if (game.solved) {
    shard.successes++
    shard.totalAttemptsSuccess += game.attempts
    const slot = Math.min(game.attempts - 1, failSlot - 1)
    shard.attemptHist[slot] = (shard.attemptHist[slot] ?? 0) + 1
  } else {
    shard.failCount++
    shard.remainingOnFailAccum += game.remaining
    shard.attemptHist[failSlot] = (shard.attemptHist[failSlot] ?? 0) + 1
  }
}

export function aggregate(shards: readonly ShardResult[]): RowSummary[] {
  const rows = shards.map((s) => ({
    strategy: s.strategy,
    trials: s.trials,
    solved: s.successes,
    failRate: s.trials > 0 ? s.failCount / s.trials : 0,
    avgAttempts: s.successes > 0 ? s.totalAttemptsSuccess / s.successes : 0,
    avgTimeMs: s.trials > 0 ? s.totalTimeMs / s.trials : 0,
    avgRemainingOnFail: s.failCount > 0 ? s.remainingOnFailAccum / s.failCount : 0,
  }))
  // Deterministic sort
  rows.sort((a, b) => a.strategy.localeCompare(b.strategy))
  return rows
}

export function formatCsv(rows: readonly RowSummary[]): string {
  const header = 'strategy,trials,solved,failRate,avgAttempts,avgTimeMs,avgRemainingOnFail'
  const lines = rows.map((r) =>
    [
      r.strategy,
      r.trials,
      r.solved,
      r.failRate.toFixed(6),
      r.avgAttempts.toFixed(4),
      r.avgTimeMs.toFixed(2),
      r.avgRemainingOnFail.toFixed(2),
    ].join(','),
  )
  return [header, ...lines].join('\n') + '\n'
}

export function summaryTable(rows: readonly RowSummary[]): string[] {
  return formatTable(
    ['STRATEGY', 'TRIALS', 'SOLVED', 'FAIL%', 'AVG_ATT', 'AVG_MS', 'AVG_REM_FAIL'],
    rows.map((r) => [
      r.strategy,
      r.trials,
      r.solved,
      (r.failRate * 100).toFixed(2),
      r.avgAttempts.toFixed(2),
      r.avgTimeMs.toFixed(1),
      r.avgRemainingOnFail.toFixed(1),
    ]),
  )
}
