/** Raised when two words (or a word and its feedback) that must share a length do not. */
export class LengthMismatchError extends Error {
  readonly expected: number
  readonly actual: number

  constructor(what: string, expected: number, actual: number) {
    super(`${what}: expected length ${expected}, got ${actual}`)
    this.name = 'LengthMismatchError'
    this.expected = expected
    this.actual = actual
  }
}

export function assertSameLength(what: string, expected: number, actual: number): void {
  if (expected !== actual) throw new LengthMismatchError(what, expected, actual)
}
