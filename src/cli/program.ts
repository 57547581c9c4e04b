import { Command, CommanderError, InvalidArgumentError } from 'commander'
import { WordListNotFoundError, type Dictionary } from '../data/loader'
import {
  initialState,
  prepareRound,
  reducer,
  wouldEliminateAll,
  type SessionState,
} from '../session/session'
import { LengthMismatchError } from '../solver/errors'
import { feedbackTrits } from '../solver/feedback'
import { rankByFrequency } from '../solver/frequency'
import { describeViolation, hardModeViolations } from '../solver/hardMode'
import { evaluateGuess, rankMinimax } from '../solver/minimax'
import { encodeTrits } from '../solver/pattern'
import { isStrategyId, selectGuess, STRATEGY_IDS, type StrategyId } from '../solver/strategy'
import { selectMinimaxParallel } from '../worker/pool'
import { formatTable, formatWords } from './format'
import { createLogger, type Logger } from './log'
import { formatFeedback, InputError, parseGuessEntry, parseLength, parseWord } from './parse'

export const EXIT_OK = 0
export const EXIT_FATAL = 1
export const EXIT_INPUT = 2
export const EXIT_EMPTY = 3

/** Candidates are listed in full below this count. */
export const LIST_LIMIT = 20

export interface CliIO {
  out(line: string): void
  err(line: string): void
  env: Readonly<Record<string, string | undefined>>
  loadWords(path: string): Dictionary
}

interface SessionOpts {
  words?: string
  length: number
  guess: string[]
  strategy: string
  hard?: boolean
  exclude?: string
  opener?: string
  threads: number
  top: number
  verbose?: boolean
}

interface Session {
  state: SessionState
  words: string[]
  dictionary: Dictionary
  strategy: StrategyId
  log: Logger
}

function positiveInt(value: string): number {
  const n = Number(value)
  if (!Number.isInteger(n) || n < 1) throw new InvalidArgumentError('expected a positive integer')
  return n
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value]
}

function withSessionOptions(cmd: Command, io: CliIO): Command {
  return cmd
    .option('-w, --words <path>', 'word list, one word per line (env WORDSIEVE_WORDS)', io.env.WORDSIEVE_WORDS)
    .option('-l, --length <n>', 'word length', parseLength, 5)
    .option('-g, --guess <word:marks>', 'a played guess and its feedback, e.g. crane:--g-g (repeatable)', collect, [])
    .option(
      '-s, --strategy <id>',
      `guess strategy: ${STRATEGY_IDS.join(' | ')} (env WORDSIEVE_STRATEGY)`,
      io.env.WORDSIEVE_STRATEGY ?? 'frequency',
    )
    .option('--hard', 'hard mode: only suggest guesses that reuse every clue')
    .option('--exclude <words>', 'comma-separated words to drop from the list for this run')
    .option('--opener <word>', 'first guess to suggest before any feedback')
    .option('-t, --threads <n>', 'worker threads for the minimax search', positiveInt, 1)
    .option('--top <n>', 'show the best n guesses', positiveInt, 1)
    .option('-v, --verbose', 'print [debug] lines')
}

function openSession(opts: SessionOpts, io: CliIO): Session {
  const log = createLogger(io, opts.verbose ?? false)
  if (!opts.words) throw new InputError('no word list: pass --words or set WORDSIEVE_WORDS')
  if (!isStrategyId(opts.strategy)) {
    throw new InputError(`unknown strategy '${opts.strategy}' (expected ${STRATEGY_IDS.join(' or ')})`)
  }
  const dictionary = io.loadWords(opts.words)
  let state = initialState({
    length: opts.length,
    strategy: opts.strategy,
    hardMode: opts.hard ?? false,
    opener: opts.opener ? parseWord(opts.opener, opts.length) : null,
  })
  const L = state.settings.length

  // Checked before exclusions so a played word can still be dropped as an answer.
  const entries = opts.guess.map((text) => parseGuessEntry(text, L))
  for (const entry of entries) {
    if (!dictionary.has(entry.guess)) throw new InputError(`guess '${entry.guess}' is not in the word list`)
  }

  for (const raw of (opts.exclude ?? '').split(',')) {
    const word = raw.trim().toLowerCase()
    if (!word) continue
    if (dictionary.remove(word)) state = reducer(state, { type: 'exclude', word })
    else log.warn(`'${word}' is not in the word list`)
  }
  const words = dictionary.words(L)

  for (const entry of entries) {
    if (state.settings.hardMode) {
      for (const v of hardModeViolations(entry.guess, state.knowledge)) {
        log.warn(`'${entry.guess}' breaks hard mode: ${describeViolation(v)}`)
      }
    }
    if (wouldEliminateAll(state, words, entry.guess, entry.trits)) {
      log.warn(`feedback for '${entry.guess}' leaves no candidates; check the marks`)
    }
    state = reducer(state, { type: 'addGuess', payload: entry })
  }
  log.debug(`${words.length} words of length ${L}, ${state.history.length} guess(es)`)
  return { state, words, dictionary, strategy: opts.strategy, log }
}

async function pickGuess(
  session: Session,
  candidates: string[],
  pool: string[],
  threads: number,
): Promise<string | null> {
  if (session.strategy !== 'minimax') return selectGuess(candidates, pool, session.strategy)
  const best = await selectMinimaxParallel(candidates, pool, {
    threads,
    onShardDone: (shard, ms) => session.log.debug(`shard ${shard} done in ${ms}ms`),
  })
  return best ? best.guess : null
}

function rankingLines(session: Session, candidates: string[], pool: string[], top: number): string[] {
  if (session.strategy === 'minimax') {
    const ranked = rankMinimax(candidates, pool, top)
    return formatTable(
      ['GUESS', 'WORST', 'GROUPS', 'CANDIDATE'],
      ranked.map((e) => [e.guess, e.worstCase, e.buckets, e.isCandidate ? 'yes' : 'no']),
    )
  }
  const ranked = rankByFrequency(candidates).slice(0, top)
  return formatTable(
    ['GUESS', 'SCORE'],
    ranked.map((s) => [s.guess, s.score]),
  )
}

export function buildProgram(io: CliIO, setExitCode: (code: number) => void): Command {
  const program = new Command('wordsieve')
  program
    .description('Narrow down the answer of a word puzzle from colour feedback')
    .exitOverride()
    .configureOutput({
      writeOut: (s) => io.out(s.trimEnd()),
      writeErr: (s) => io.err(s.trimEnd()),
    })

  program
    .command('score')
    .description('print the feedback a guess gets against an answer')
    .argument('<guess>')
    .argument('<answer>')
    .action((guess: string, answer: string) => {
      const g = parseWord(guess, guess.trim().length)
      const trits = feedbackTrits(g, parseWord(answer, answer.trim().length))
      io.out(`${formatFeedback(trits)}  ${encodeTrits(trits)}`)
    })

  withSessionOptions(
    program.command('suggest').description('list the remaining candidates and suggest the next guess'),
    io,
  ).action(async (opts: SessionOpts) => {
    const session = openSession(opts, io)
    const round = prepareRound(session.state, session.words)
    if (round.kind === 'solved') {
      io.out(`solved: ${round.answer} in ${round.attempts}`)
      return
    }
    if (round.kind === 'empty') {
      io.err(`no candidates remain among ${round.dictionarySize} words; the feedback contradicts itself or the word list`)
      setExitCode(EXIT_EMPTY)
      return
    }
    io.out(`candidates: ${round.candidates.length}`)
    if (round.candidates.length < LIST_LIMIT) {
      for (const line of formatWords(round.candidates)) io.out(`  ${line}`)
    }
    if (round.opener) {
      io.out(`suggest: ${round.opener} (opener)`)
      return
    }
    const t0 = Date.now()
    const guess = await pickGuess(session, round.candidates, round.pool, opts.threads)
    session.log.debug(`${session.strategy} over ${round.pool.length} words took ${Date.now() - t0}ms`)
    if (guess == null) {
      io.err('no guess available')
      setExitCode(EXIT_EMPTY)
      return
    }
    io.out(`suggest: ${guess}`)
    if (opts.top > 1) {
      for (const line of rankingLines(session, round.candidates, round.pool, opts.top)) io.out(line)
    }
  })

  withSessionOptions(
    program
      .command('check')
      .description('judge a guess you are about to play')
      .argument('<guess>'),
    io,
  ).action((guess: string, opts: SessionOpts) => {
    const session = openSession(opts, io)
    const word = parseWord(guess, session.state.settings.length)
    const round = prepareRound(session.state, session.words)
    if (round.kind === 'solved') {
      io.out(`solved: ${round.answer} in ${round.attempts}`)
      return
    }
    if (round.kind === 'empty') {
      io.err(`no candidates remain among ${round.dictionarySize} words`)
      setExitCode(EXIT_EMPTY)
      return
    }
    if (!session.dictionary.has(word)) session.log.warn(`'${word}' is not in the word list`)
    const possible = round.candidates.includes(word)
    io.out(`${word}: ${possible ? 'possible answer' : 'not a possible answer'}`)
    const violations = hardModeViolations(word, session.state.knowledge)
    io.out(
      violations.length === 0
        ? 'hard mode: ok'
        : `hard mode: ${violations.map(describeViolation).join('; ')}`,
    )
    const ev = evaluateGuess(word, round.candidates)
    io.out(`worst case: ${ev.worstCase} of ${round.candidates.length} left (${ev.buckets} groups)`)
  })

  return program
}

/** Runs one command line (without node and script) and resolves its exit code. */
export async function run(argv: readonly string[], io: CliIO): Promise<number> {
  let code = EXIT_OK
  const program = buildProgram(io, (c) => {
    code = c
  })
  try {
    await program.parseAsync([...argv], { from: 'user' })
    return code
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode === 0 ? EXIT_OK : EXIT_INPUT
    if (
      err instanceof InputError ||
      err instanceof LengthMismatchError ||
      err instanceof WordListNotFoundError
    ) {
      io.err(`[error] ${err.message}`)
      return EXIT_INPUT
    }
    throw err
  }
}
