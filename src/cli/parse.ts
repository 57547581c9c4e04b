// Text forms of guesses and feedback accepted on the command line.
import { InvalidArgumentError } from 'commander'
import { MAX_LENGTH } from '../session/session'
import type { GuessEntry } from '../solver/knowledge'
import { ABSENT, EXACT, PRESENT, type Trit } from '../solver/pattern'

export class InputError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'InputError'
  }
}

const TOKENS: Record<string, Trit> = {
  g: EXACT,
  '2': EXACT,
  y: PRESENT,
  '1': PRESENT,
  '-': ABSENT,
  '.': ABSENT,
  b: ABSENT,
  x: ABSENT,
  '0': ABSENT,
}

const SYMBOLS: Record<Trit, string> = { [ABSENT]: '-', [PRESENT]: 'y', [EXACT]: 'g' }

/** Commander parser for `--length`: an integer the session accepts as is. */
export function parseLength(value: string): number {
  const n = Number(value)
  if (!Number.isInteger(n) || n < 1 || n > MAX_LENGTH) {
    throw new InvalidArgumentError(`expected a word length from 1 to ${MAX_LENGTH}`)
  }
  return n
}

/** `gy--g` (or `21002`) to trits; one token per position. */
export function parseFeedback(text: string, length: number): Trit[] {
  const tokens = [...text.trim().toLowerCase()]
  if (tokens.length !== length) {
    throw new InputError(`feedback '${text}' has ${tokens.length} marks, expected ${length}`)
  }
  return tokens.map((ch, i) => {
    const t = TOKENS[ch]
    if (t === undefined) throw new InputError(`unknown feedback mark '${ch}' at position ${i + 1}`)
    return t
  })
}

export function parseWord(text: string, length: number): string {
  const word = text.trim().toLowerCase()
  if (!/^[a-z]+$/.test(word)) throw new InputError(`'${text}' is not a word (letters a-z only)`)
  if (word.length !== length) {
    throw new InputError(`'${word}' has ${word.length} letters, expected ${length}`)
  }
  return word
}

/** `crane:--g-g` to a history entry. */
export function parseGuessEntry(text: string, length: number): GuessEntry {
  const sep = text.indexOf(':')
  if (sep < 0) throw new InputError(`guess '${text}' must look like word:feedback`)
  return {
    guess: parseWord(text.slice(0, sep), length),
    trits: parseFeedback(text.slice(sep + 1), length),
  }
}

export function formatFeedback(trits: readonly Trit[]): string {
  return trits.map((t) => SYMBOLS[t]).join('')
}
