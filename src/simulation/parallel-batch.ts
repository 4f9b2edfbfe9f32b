/**
 * Parallel Batch Executor
 *
 * Runs a batch across a pool of worker threads. Each strategy's games are
 * split into fixed-size chunks that are handed to whichever worker is
 * free. Outcomes come back out of order and the collector puts them back
 * in game order, so the result is identical to the sequential executor's.
 *
 * On abort no further chunks are handed out, and the chunks already running
 * are allowed to finish (at most CHUNK_SIZE games per worker), so the kept
 * prefix covers every dispatched chunk.
 */

import { Worker } from "node:worker_threads"
import { cpus } from "node:os"
import path from "node:path"

import { InvariantViolation, SimulationError } from "../errors.js"
import type {
  BatchResult,
  BatchRunOptions,
  RecordCollector,
  SimulationConfig,
} from "./types.js"
import { createRecordCollector } from "./collector.js"
import { runBatch } from "./batch.js"
import type { WorkerError, WorkerMessage, WorkerTask } from "./simulation-worker.js"

/**
 * Games per worker task. Large enough that messaging overhead stays
 * small, small enough that workers finish close together.
 */
export const CHUNK_SIZE = 250

/**
 * Extended run options with parallel settings.
 */
export interface ParallelBatchOptions extends BatchRunOptions {
  maxWorkers?: number // Overrides config.maxWorkers; default: number of CPU cores
}

/**
 * Split every strategy's games into chunk tasks, strategy by strategy.
 */
export function buildTasks(config: SimulationConfig, chunkSize: number = CHUNK_SIZE): WorkerTask[] {
  const tasks: WorkerTask[] = []
  for (const strategyId of config.strategyIds) {
    for (let start = 0; start < config.gamesPerStrategy; start += chunkSize) {
      tasks.push({
        seed: config.seed,
        strategyId,
        startIndex: start,
        count: Math.min(chunkSize, config.gamesPerStrategy - start),
        recordTraces: config.recordTraces,
      })
    }
  }
  return tasks
}

/**
 * Check if we're running from TypeScript source (tests/dev) vs compiled JS.
 *
 * Worker threads can't load TypeScript directly, so from source we fall
 * back to sequential execution rather than pick up a stale dist/.
 */
function isRunningFromSource(): boolean {
  return __filename.endsWith(".ts")
}

function getWorkerPath(): string {
  return path.join(__dirname, "simulation-worker.js")
}

/**
 * The parts of a worker the pool uses.
 */
export interface PoolWorker {
  postMessage(task: WorkerTask): void
  onMessage(listener: (message: WorkerMessage) => void): void
  onError(listener: (error: Error) => void): void
  terminate(): void
}

function spawnThreadWorker(workerPath: string): PoolWorker {
  const worker = new Worker(workerPath)
  return {
    postMessage: (task) => worker.postMessage(task),
    onMessage: (listener) => {
      worker.on("message", listener)
    },
    onError: (listener) => {
      worker.on("error", listener)
    },
    terminate: () => {
      void worker.terminate()
    },
  }
}

/**
 * Rebuild a worker's failure report, restoring InvariantViolation and its
 * code so callers can tell logic errors apart.
 */
export function errorFromWorker(message: WorkerError): SimulationError {
  const cause =
    message.code !== undefined
      ? new InvariantViolation(message.code, message.error)
      : new Error(message.error)
  return new SimulationError(message.strategyId, message.gameIndex, message.gameSeed, cause)
}

/**
 * Hand tasks to a pool of workers and collect their outcomes.
 *
 * @param spawn Creates one worker; called numWorkers times up front
 */
export function runWorkerPool(
  tasks: readonly WorkerTask[],
  collector: RecordCollector,
  numWorkers: number,
  spawn: () => PoolWorker,
  options: BatchRunOptions = {}
): Promise<BatchResult> {
  const { signal, onProgress } = options
  if (signal?.aborted || tasks.length === 0) {
    return Promise.resolve(collector.finalize(signal?.aborted ?? false))
  }

  return new Promise((resolve, reject) => {
    let taskIndex = 0
    let tasksDone = 0
    let inFlight = 0
    let draining = false
    let settled = false
    const workers: PoolWorker[] = []

    function finish(outcome: { result: BatchResult } | { error: unknown }): void {
      if (settled) return
      settled = true
      signal?.removeEventListener("abort", onAbort)
      for (const worker of workers) {
        worker.terminate()
      }
      if ("result" in outcome) {
        resolve(outcome.result)
      } else {
        reject(outcome.error)
      }
    }

    function onAbort(): void {
      draining = true
      if (inFlight === 0) {
        finish({ result: collector.finalize(true) })
      }
    }

    function dispatch(worker: PoolWorker): void {
      const task = tasks[taskIndex]
      if (task && !draining) {
        taskIndex++
        inFlight++
        worker.postMessage(task)
      }
    }

    function handleMessage(worker: PoolWorker, message: WorkerMessage): void {
      if (settled) return

      switch (message.type) {
        case "error":
          finish({ error: errorFromWorker(message) })
          return

        case "result":
          try {
            collector.record(message.strategyId, message.gameIndex, message.outcome)
            onProgress?.({
              strategyId: message.strategyId,
              gameIndex: message.gameIndex,
              outcome: message.outcome,
            })
          } catch (error) {
            finish({ error })
          }
          return

        case "done":
          tasksDone++
          inFlight--
          if (tasksDone === tasks.length) {
            finish({ result: collector.finalize(draining) })
            return
          }
          if (draining) {
            if (inFlight === 0) {
              finish({ result: collector.finalize(true) })
            }
            return
          }
          dispatch(worker)
          return
      }
    }

    signal?.addEventListener("abort", onAbort, { once: true })

    for (let i = 0; i < numWorkers; i++) {
      const worker = spawn()
      workers.push(worker)
      worker.onMessage((message) => handleMessage(worker, message))
      worker.onError((err) => finish({ error: err }))
      dispatch(worker)
    }
  })
}

/**
 * Run a batch in parallel using worker threads.
 *
 * @param config Validated configuration
 * @param options Progress callback, abort signal and worker count
 * @returns Records per strategy, identical to runBatch for the same config
 */
export async function runBatchParallel(
  config: SimulationConfig,
  options: ParallelBatchOptions = {}
): Promise<BatchResult> {
  const tasks = buildTasks(config)
  const numWorkers = Math.min(options.maxWorkers ?? config.maxWorkers ?? cpus().length, tasks.length)

  // Fall back to sequential execution when:
  // 1. Running from TypeScript source (workers can't run TS directly)
  // 2. Only 1 worker or 1 task (overhead not worth it)
  if (isRunningFromSource() || numWorkers <= 1 || tasks.length <= 1) {
    const reasons: string[] = []
    if (isRunningFromSource()) {
      reasons.push("running from TypeScript source; worker threads require compiled JavaScript")
    }
    if (numWorkers <= 1) {
      reasons.push("worker count is 1 or less")
    }
    if (tasks.length <= 1) {
      reasons.push("only one chunk of games to run")
    }

    if (!process.env.JEST_WORKER_ID) {
      console.warn(
        `Parallel execution disabled; falling back to sequential (${reasons.join(", ")}).`
      )
    }
    return runBatch(config, options)
  }

  const collector = createRecordCollector(
    config.seed,
    config.gamesPerStrategy,
    config.strategyIds,
    config.recordTraces
  )
  const workerPath = getWorkerPath()
  return runWorkerPool(tasks, collector, numWorkers, () => spawnThreadWorker(workerPath), options)
}
