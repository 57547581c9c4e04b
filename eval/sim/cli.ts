#!/usr/bin/env tsx
/* eslint-env node */
/* eslint-disable no-console */
/**
 * Simulator CLI
 * Plays the same secrets with every strategy, one worker thread per strategy.
 */

import { Command, InvalidArgumentError } from 'commander'
import os from 'node:os'
import fs from 'node:fs'
import path from 'node:path'
import { loadDictionary } from '../../src/data/loader'
import { sampleWords } from '../../src/solver/random'
import { isStrategyId, STRATEGY_IDS, type StrategyId } from '../../src/solver/strategy'
import { parseLength } from '../../src/cli/parse'
import { runJobs } from './jobs'
import { aggregate, formatCsv, summaryTable, type WorkerInput } from './summary'

function positiveInt(value: string): number {
  const n = Number(value)
  if (!Number.isInteger(n) || n < 1) throw new InvalidArgumentError('expected a positive integer')
  return n
}

function parseStrategies(csv: string): StrategyId[] {
  const out: StrategyId[] = []
  for (const raw of csv.split(',')) {
    const s = raw.trim()
    if (!s) continue
    if (!isStrategyId(s)) throw new InvalidArgumentError(`unknown strategy '${s}'`)
    out.push(s)
  }
  return out
}

async function main() {
  const program = new Command('wordsieve-sim')
  program
    .option('-w, --words <path>', 'word list (env WORDSIEVE_WORDS)', process.env.WORDSIEVE_WORDS)
    .option('-l, --length <n>', 'word length', parseLength, 5)
    .option('--strategies <csv>', 'strategies to compare', parseStrategies, [...STRATEGY_IDS])
    .option('--trials <n>', 'games per strategy', positiveInt, 200)
    .option('--secrets <csv>', 'explicit secrets (overrides --trials)')
    .option('--attempts <n>', 'max attempts per game', positiveInt, 6)
    .option('--hard', 'play in hard mode')
    .option('--opener <word>', 'fixed first guess')
    .option('--concurrency <n>', 'max parallel workers', positiveInt, Math.min(8, os.cpus().length))
    .option('--seed <n>', 'RNG seed for sampled secrets (default: timestamp)', (v) => Number(v))
  program.parse(process.argv)
  const opts = program.opts<{
    words?: string
    length: number
    strategies: StrategyId[]
    trials: number
    secrets?: string
    attempts: number
    hard?: boolean
    opener?: string
    concurrency: number
    seed?: number
  }>()

  if (!opts.words) {
    console.error('No word list: pass --words or set WORDSIEVE_WORDS')
    process.exit(2)
  }
  const words = loadDictionary(opts.words).words(opts.length)
  if (words.length === 0) {
    console.error(`No words of length ${opts.length} in ${opts.words}`)
    process.exit(2)
  }
  if (opts.strategies.length === 0) {
    console.error('No strategies specified')
    process.exit(2)
  }

  const baseSeed = opts.seed ?? Date.now()
  let secrets: string[]
  if (opts.secrets) {
    const wordSet = new Set(words)
    secrets = opts.secrets
      .split(',')
      .map((s) => s.trim().toLowerCase())
      .filter(Boolean)
    const unknown = secrets.filter((s) => !wordSet.has(s))
    if (unknown.length) console.warn('[warn] secrets not in the word list:', unknown.join(','))
    secrets = secrets.filter((s) => wordSet.has(s))
  } else {
    secrets = sampleWords(words, opts.trials, baseSeed)
  }

  const jobs: WorkerInput[] = opts.strategies.map((strategy) => ({
    strategy,
    secrets,
    words,
    attempts: opts.attempts,
    hardMode: opts.hard ?? false,
    opener: opts.opener ? opts.opener.toLowerCase() : null,
  }))
  const concurrency = Math.max(1, opts.concurrency)
  console.log(
    `Running ${jobs.length} shard(s) over ${secrets.length} secret(s), ${words.length} words of length ${opts.length}, concurrency=${concurrency}`,
  )
  const rows = aggregate(
    await runJobs(jobs, concurrency, {
      onStart: (job) => process.stdout.write(`Start ${job.strategy} (${job.secrets.length} games)\n`),
      onDone: (job, ms) => process.stdout.write(`Done  ${job.strategy} in ${ms}ms\n`),
    }),
  )

  const now = new Date()
  const ts = now.toISOString().replace(/[-:]/g, '').replace(/\..+/, '').replace('T', '-')
  const outDir = path.resolve('eval', 'results')
  fs.mkdirSync(outDir, { recursive: true })
  const csvPath = path.join(outDir, `run-${ts}.csv`)
  const jsonPath = path.join(outDir, `run-${ts}.json`)
  fs.writeFileSync(csvPath, formatCsv(rows), 'utf8')
  const summary = {
    meta: {
      timestamp: now.toISOString(),
      wordList: opts.words,
      length: opts.length,
      strategies: opts.strategies,
      games: secrets.length,
      attempts: opts.attempts,
      hardMode: opts.hard ?? false,
      opener: opts.opener ?? null,
      baseSeed: opts.secrets ? null : baseSeed,
    },
    rows,
  }
  fs.writeFileSync(jsonPath, JSON.stringify(summary, null, 2) + '\n', 'utf8')
  fs.copyFileSync(csvPath, path.join(outDir, 'latest.csv'))
  fs.copyFileSync(jsonPath, path.join(outDir, 'latest.json'))

  console.log('\n' + summaryTable(rows).join('\n') + '\n')
  console.log('Results written to:')
  console.log('  ' + csvPath)
  console.log('  ' + jsonPath)
}

main().catch((err) => {
  console.error('[fatal]', err)
  process.exit(1)
})
