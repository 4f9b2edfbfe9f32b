/**
 * Type definitions for the Simulation Harness
 *
 * The harness sits above the game runner, playing many seeded games per
 * strategy and collecting their outcomes in game order for persistence.
 */

import type { GameOutcome, RoundRecord, StrategyId } from "../types.js"

// ============================================================================
// Configuration
// ============================================================================

/**
 * Validated, frozen configuration for one batch run.
 * Built only through createSimulationConfig.
 */
export interface SimulationConfig {
  readonly strategyIds: readonly StrategyId[]
  readonly gamesPerStrategy: number
  readonly seed: string // Base seed; every game seed derives from it
  readonly outputPath: string
  readonly csvPath?: string // Also write a CSV summary here
  readonly recordTraces: boolean // Persist round-by-round traces
  readonly maxWorkers?: number // Parallel mode only; default: CPU count
}

/**
 * Unvalidated configuration as it arrives from flags or a config file.
 */
export interface SimulationConfigInput {
  strategyIds?: readonly number[]
  gamesPerStrategy?: number
  seed?: string
  outputPath?: string
  csvPath?: string
  recordTraces?: boolean
  maxWorkers?: number
}

// ============================================================================
// Progress and Cancellation
// ============================================================================

/**
 * Reported after each completed game.
 */
export interface GameCompletion {
  strategyId: StrategyId
  gameIndex: number
  outcome: GameOutcome
}

export interface BatchRunOptions {
  signal?: AbortSignal // Stops the batch after the games already finished
  onProgress?: (completion: GameCompletion) => void
}

// ============================================================================
// Results
// ============================================================================

/**
 * Outcomes of one strategy's games. Every array is indexed by game index.
 */
export interface StrategyRecord {
  strategyId: StrategyId
  strategyName: string
  numGames: number
  scores: number[]
  roundCounts: number[]
  tilesClosed: number[]
  traces?: RoundRecord[][] // Only when traces are recorded
}

export interface BatchResult {
  seed: string
  gamesPerStrategy: number
  cancelled: boolean // True when stopped early; records hold the games finished
  records: StrategyRecord[]
}

/**
 * Collects outcomes as games finish, in any order, and keeps each
 * strategy's record in game order.
 */
export interface RecordCollector {
  record(strategyId: StrategyId, gameIndex: number, outcome: GameOutcome): void
  completedCount(): number
  finalize(cancelled: boolean): BatchResult
}
