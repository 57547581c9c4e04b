// Tagged console-style logging routed through the injected CLI io.
export interface LineSink {
  err(line: string): void
}

export interface Logger {
  warn(message: string): void
  debug(message: string): void
}

export function createLogger(sink: LineSink, verbose: boolean): Logger {
  return {
    warn: (message) => sink.err(`[warn] ${message}`),
    debug: (message) => {
      if (verbose) sink.err(`[debug] ${message}`)
    },
  }
}
