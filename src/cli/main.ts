#!/usr/bin/env tsx
/* eslint-disable no-console */
import { loadDictionary } from '../data/loader'
import { EXIT_FATAL, run, type CliIO } from './program'

const io: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
  env: process.env,
  loadWords: loadDictionary,
}

run(process.argv.slice(2), io)
  .then((code) => {
    process.exitCode = code
  })
  .catch((err: unknown) => {
    console.error('[fatal]', err)
    process.exit(EXIT_FATAL)
  })
