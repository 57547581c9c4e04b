import { Worker } from 'node:worker_threads'

const BOOTSTRAP = new URL('./tsx-bootstrap.mjs', import.meta.url)

/** What a worker started by `spawnTsWorker` finds in `workerData`. */
export interface TsWorkerData<T> {
  entry: string
  payload: T
}

/**
 * Start a worker thread on a TypeScript module. Loader flags in `execArgv`
 * do not reach worker threads on Node 20, so a plain ESM bootstrap registers
 * tsx inside the thread before importing `entry`.
 */
export function spawnTsWorker<T>(entry: URL, payload: T): Worker {
  const workerData: TsWorkerData<T> = { entry: entry.href, payload }
  return new Worker(BOOTSTRAP, { workerData })
}

/** Resolves with the first message the worker posts; rejects if it errors or exits first. */
export function firstMessage(worker: Worker): Promise<unknown> {
  return new Promise((resolve, reject) => {
    worker.once('message', resolve)
    worker.once('error', reject)
    worker.once('exit', (code) => reject(new Error(`worker exited with code ${code} before replying`)))
  })
}
