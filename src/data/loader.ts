// Word list loading for the command-line shell. The solver core only ever sees
// the filtered, lower-cased, de-duplicated lists produced here.
import fs from 'node:fs'

/**
 * The word list as the shell owns it. Removing a word affects this process
 * only; nothing is written back to disk.
 */
export interface Dictionary {
  readonly size: number
  /** Words of the given length, in file order. */
  words(length: number): string[]
  has(word: string): boolean
  /** Returns true if the word was present. */
  remove(word: string): boolean
}

const WORD_RE = /^[a-z]+$/

/** Trim, lower-case, keep a-z only, drop duplicates (first occurrence wins). */
export function normalizeWords(lines: Iterable<string>): string[] {
  const seen = new Set<string>()
  for (const raw of lines) {
    const w = raw.trim().toLowerCase()
    if (WORD_RE.test(w)) seen.add(w)
  }
  return [...seen]
}

export function parseWordList(text: string): string[] {
  return normalizeWords(text.split(/\r?\n/))
}

export class MemoryDictionary implements Dictionary {
  private readonly byLength = new Map<number, string[]>()
  private readonly all = new Set<string>()

  constructor(words: Iterable<string>) {
    for (const w of normalizeWords(words)) {
      this.all.add(w)
      let bucket = this.byLength.get(w.length)
      if (!bucket) {
        bucket = []
        this.byLength.set(w.length, bucket)
      }
      bucket.push(w)
    }
  }

  get size(): number {
    return this.all.size
  }

  words(length: number): string[] {
    return (this.byLength.get(length) ?? []).slice()
  }

  has(word: string): boolean {
    return this.all.has(word.toLowerCase())
  }

  remove(word: string): boolean {
    const w = word.toLowerCase()
    if (!this.all.delete(w)) return false
    const bucket = this.byLength.get(w.length)
    if (bucket) {
      const i = bucket.indexOf(w)
      if (i >= 0) bucket.splice(i, 1)
    }
    return true
  }

  /** Word lengths present, ascending. */
  lengths(): number[] {
    return [...this.byLength.entries()]
      .filter(([, bucket]) => bucket.length > 0)
      .map(([L]) => L)
      .sort((a, b) => a - b)
  }
}

export class WordListNotFoundError extends Error {
  readonly path: string

  constructor(path: string) {
    super(`Word list not found: ${path}`)
    this.name = 'WordListNotFoundError'
    this.path = path
  }
}

export function loadDictionary(path: string): MemoryDictionary {
  if (!fs.existsSync(path)) throw new WordListNotFoundError(path)
  return new MemoryDictionary(parseWordList(fs.readFileSync(path, 'utf8')))
}
