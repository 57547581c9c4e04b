import { confirmedLetters, type KnowledgeState } from './knowledge'

export type HardModeViolation =
  | { kind: 'green'; position: number; letter: string }
  | { kind: 'missing'; letter: string }

/**
 * Ways `guess` throws away confirmed information: a known green not reused in
 * place, or a confirmed letter left out. Surplus copies of a letter are fine,
 * so `maxCount` is not consulted.
 */
export function hardModeViolations(guess: string, state: KnowledgeState): HardModeViolation[] {
  const out: HardModeViolation[] = []
  state.greenAt.forEach((letter, position) => {
    if (letter != null && guess[position] !== letter) out.push({ kind: 'green', position, letter })
  })
  for (const letter of confirmedLetters(state)) {
    if (!guess.includes(letter)) out.push({ kind: 'missing', letter })
  }
  return out
}

export function isHardModeValid(guess: string, state: KnowledgeState): boolean {
  return hardModeViolations(guess, state).length === 0
}

export function describeViolation(v: HardModeViolation): string {
  switch (v.kind) {
    case 'green':
      return `position ${v.position + 1} must be '${v.letter}'`
    case 'missing':
      return `guess must contain '${v.letter}'`
  }
}
