/**
 * Simulation Harness Public API
 *
 * Plays many seeded games per strategy and persists the outcomes. Use it for:
 * - Comparing strategies by mean score and shut rate
 * - Reproducing any single game of a batch from its derived seed
 * - Exporting per-game rows for outside analysis
 */

// Core execution
export { runBatch } from "./batch.js"
export { runBatchParallel, runWorkerPool, buildTasks, CHUNK_SIZE } from "./parallel-batch.js"
export type { ParallelBatchOptions, PoolWorker } from "./parallel-batch.js"
export { createRecordCollector } from "./collector.js"

// Configuration
export {
  createSimulationConfig,
  loadConfigFile,
  mergeConfigInputs,
  defaultOutputPath,
  DEFAULT_GAMES_PER_STRATEGY,
  DEFAULT_SEED,
  DEFAULT_RESULTS_DIR,
} from "./config.js"

// Persistence
export {
  writeBatchResult,
  readBatchResult,
  toPersistedResult,
  fromPersistedResult,
  formatResultsCsv,
  writeResultsCsv,
  SCHEMA_VERSION,
  CSV_HEADER,
} from "./persistence.js"
export type { PersistedBatchResult, PersistedRecord, PersistedRound } from "./persistence.js"

// Metrics
export { summarizeBatch, createProgressTracker } from "./metrics.js"
export type { StrategySummary, ProgressTracker } from "./metrics.js"

// Types
export type {
  SimulationConfig,
  SimulationConfigInput,
  GameCompletion,
  BatchRunOptions,
  StrategyRecord,
  BatchResult,
  RecordCollector,
} from "./types.js"
