export type Cell = string | number

/** Left-aligned columns, each as wide as its widest cell. */
export function formatTable(header: readonly string[], rows: readonly (readonly Cell[])[]): string[] {
  const text = [header, ...rows].map((row) => row.map((c) => String(c)))
  const widths = header.map((_, i) => Math.max(...text.map((row) => (row[i] ?? '').length)))
  return text.map((row) =>
    row
      .map((c, i) => c.padEnd(widths[i] ?? 0))
      .join('  ')
      .trimEnd(),
  )
}

/** Words wrapped `perLine` to a line. */
export function formatWords(words: readonly string[], perLine = 10): string[] {
  const out: string[] = []
  for (let i = 0; i < words.length; i += perLine) {
    out.push(words.slice(i, i + perLine).join(' '))
  }
  return out
}
