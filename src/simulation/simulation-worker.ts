/**
 * Worker thread for playing batch games in parallel.
 *
 * Each task is a contiguous chunk of one strategy's games. The worker
 * posts every finished game as it completes, then a done message for the
 * chunk. Strategies are rebuilt from their id, since objects with methods
 * can't cross the thread boundary.
 */

import { parentPort } from "node:worker_threads"
import { playGame } from "../game.js"
import { deriveGameSeed } from "../rng.js"
import type { GameOutcome, StrategyId } from "../types.js"
import { InvariantViolation } from "../errors.js"
import type { InvariantCode } from "../errors.js"

/**
 * Message sent to the worker to play a chunk of games.
 */
export interface WorkerTask {
  seed: string // Base seed of the batch
  strategyId: StrategyId
  startIndex: number
  count: number
  recordTraces: boolean
}

/**
 * One finished game.
 */
export interface WorkerResult {
  type: "result"
  strategyId: StrategyId
  gameIndex: number
  outcome: GameOutcome
}

/**
 * Every game of the task has been posted.
 */
export interface WorkerDone {
  type: "done"
}

/**
 * A game failed. The chunk is abandoned.
 */
export interface WorkerError {
  type: "error"
  error: string
  code?: InvariantCode // Set when the game raised an InvariantViolation
  strategyId: StrategyId
  gameIndex: number
  gameSeed: string
}

export type WorkerMessage = WorkerResult | WorkerDone | WorkerError

/**
 * Describe a failed game in a form that can cross the thread boundary.
 */
export function toWorkerError(
  err: unknown,
  strategyId: StrategyId,
  gameIndex: number,
  gameSeed: string
): WorkerError {
  return {
    type: "error",
    error: err instanceof Error ? err.message : String(err),
    ...(err instanceof InvariantViolation ? { code: err.code } : {}),
    strategyId,
    gameIndex,
    gameSeed,
  }
}

/**
 * Play one chunk, posting each game as it finishes and then done.
 * Stops at the first failed game.
 */
export function playChunk(task: WorkerTask, post: (message: WorkerMessage) => void): void {
  const end = task.startIndex + task.count
  for (let gameIndex = task.startIndex; gameIndex < end; gameIndex++) {
    const gameSeed = deriveGameSeed(task.seed, task.strategyId, gameIndex)
    let outcome: GameOutcome
    try {
      outcome = playGame({
        seed: gameSeed,
        strategyId: task.strategyId,
        recordTrace: task.recordTraces,
      })
    } catch (err) {
      post(toWorkerError(err, task.strategyId, gameIndex, gameSeed))
      return
    }
    post({
      type: "result",
      strategyId: task.strategyId,
      gameIndex,
      outcome,
    } satisfies WorkerResult)
  }
  post({ type: "done" } satisfies WorkerDone)
}

const port = parentPort
if (port) {
  port.on("message", (task: WorkerTask) => {
    playChunk(task, (message) => port.postMessage(message))
  })
}
