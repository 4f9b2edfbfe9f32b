/**
 * Batch Executor (Monte Carlo Harness)
 *
 * Plays every configured strategy for the configured number of games,
 * each game seeded from the base seed, and collects the outcomes in game
 * order. Runs in-process, one game at a time.
 */

import type { GameOutcome, StrategyId } from "../types.js"
import { playGame } from "../game.js"
import { deriveGameSeed } from "../rng.js"
import { SimulationError } from "../errors.js"
import type { BatchResult, BatchRunOptions, RecordCollector, SimulationConfig } from "./types.js"
import { createRecordCollector } from "./collector.js"

// Games between yields to the event loop, so an abort can land mid-batch
const YIELD_INTERVAL = 100

function yieldToEventLoop(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve))
}

/**
 * Play one game of a batch and record it.
 * Any error from the game is rethrown with what is needed to replay it.
 */
function playBatchGame(
  config: SimulationConfig,
  strategyId: StrategyId,
  gameIndex: number,
  collector: RecordCollector,
  options: BatchRunOptions
): void {
  const gameSeed = deriveGameSeed(config.seed, strategyId, gameIndex)
  let outcome: GameOutcome
  try {
    outcome = playGame({ seed: gameSeed, strategyId, recordTrace: config.recordTraces })
  } catch (error) {
    throw new SimulationError(strategyId, gameIndex, gameSeed, error)
  }
  collector.record(strategyId, gameIndex, outcome)
  options.onProgress?.({ strategyId, gameIndex, outcome })
}

/**
 * Run a batch sequentially.
 *
 * @param config Validated configuration (see createSimulationConfig)
 * @param options Progress callback and abort signal
 * @returns Records per strategy; partial, with cancelled set, if aborted
 */
export async function runBatch(
  config: SimulationConfig,
  options: BatchRunOptions = {}
): Promise<BatchResult> {
  const collector = createRecordCollector(
    config.seed,
    config.gamesPerStrategy,
    config.strategyIds,
    config.recordTraces
  )

  for (const strategyId of config.strategyIds) {
    for (let gameIndex = 0; gameIndex < config.gamesPerStrategy; gameIndex++) {
      if (options.signal?.aborted) {
        return collector.finalize(true)
      }
      playBatchGame(config, strategyId, gameIndex, collector, options)

      if ((gameIndex + 1) % YIELD_INTERVAL === 0) {
        await yieldToEventLoop()
      }
    }
  }

  return collector.finalize(options.signal?.aborted ?? false)
}
