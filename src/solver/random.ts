// Deterministic lightweight RNG (Mulberry32)
// Reference: https://stackoverflow.com/a/47593316 (public domain)
export function mulberry32(seed: number): () => number {
  let t = seed >>> 0
  return function () {
    t += 0x6d2b79f5
    let x = Math.imul(t ^ (t >>> 15), 1 | t)
    x ^= x + Math.imul(x ^ (x >>> 7), 61 | x)
    return ((x ^ (x >>> 14)) >>> 0) / 4294967296
  }
}

/** `count` words drawn uniformly (with replacement) from `words`. */
export function sampleWords(words: readonly string[], count: number, seed: number): string[] {
  if (words.length === 0) return []
  const rand = mulberry32(seed)
  const out: string[] = []
  for (let k = 0; k < count; k++) {
    const w = words[Math.floor(rand() * words.length)]
    if (w !== undefined) out.push(w)
  }
  return out
}
