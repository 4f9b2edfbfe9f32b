/**
 * Result persistence
 *
 * Writes a batch result as one JSON document (snake_case keys, versioned)
 * and optionally as a CSV of per-game rows. Both writes are atomic: the
 * content goes to a temp file that is synced to disk and then renamed over
 * the target, so a failed run never leaves a half-written results file.
 */

import * as fs from "fs"
import * as path from "path"

import type { RoundRecord, StrategyId } from "../types.js"
import { PersistenceError } from "../errors.js"
import { isStrategyId } from "../strategies/index.js"
import type { BatchResult, StrategyRecord } from "./types.js"

export const SCHEMA_VERSION = 1

export interface PersistedRound {
  open_tiles: number[]
  roll: [number, number]
  legal_move_count: number
  move: number[] | null
}

export interface PersistedRecord {
  strategy_id: StrategyId
  strategy_name: string
  num_games: number
  seed: string
  scores: number[]
  round_counts: number[]
  tiles_closed: number[]
  traces?: PersistedRound[][]
}

export interface PersistedBatchResult {
  schema_version: number
  seed: string
  games_per_strategy: number
  cancelled: boolean
  records: PersistedRecord[]
}

// ============================================================================
// Serialization
// ============================================================================

function toPersistedRound(record: RoundRecord): PersistedRound {
  return {
    open_tiles: [...record.openTiles],
    roll: [record.roll.d1, record.roll.d2],
    legal_move_count: record.legalMoveCount,
    move: record.move ? [...record.move] : null,
  }
}

function toPersistedRecord(record: StrategyRecord, seed: string): PersistedRecord {
  return {
    strategy_id: record.strategyId,
    strategy_name: record.strategyName,
    num_games: record.numGames,
    seed,
    scores: record.scores,
    round_counts: record.roundCounts,
    tiles_closed: record.tilesClosed,
    ...(record.traces
      ? { traces: record.traces.map((trace) => trace.map(toPersistedRound)) }
      : {}),
  }
}

export function toPersistedResult(batch: BatchResult): PersistedBatchResult {
  return {
    schema_version: SCHEMA_VERSION,
    seed: batch.seed,
    games_per_strategy: batch.gamesPerStrategy,
    cancelled: batch.cancelled,
    records: batch.records.map((record) => toPersistedRecord(record, batch.seed)),
  }
}

// ============================================================================
// Deserialization
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

function isIntegerArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((item) => Number.isInteger(item))
}

function parseRound(value: unknown, round: number, where: string): RoundRecord {
  const label = `${where} round ${round}`
  if (!isRecord(value)) {
    throw new Error(`${label} is not an object`)
  }
  const openTiles = value.open_tiles
  const roll = value.roll
  const legalMoveCount = value.legal_move_count
  const move = value.move

  if (!isIntegerArray(openTiles)) {
    throw new Error(`${label}: open_tiles must be an array of integers`)
  }
  if (!isIntegerArray(roll) || roll.length !== 2) {
    throw new Error(`${label}: roll must be a pair of integers`)
  }
  if (typeof legalMoveCount !== "number") {
    throw new Error(`${label}: legal_move_count must be a number`)
  }
  if (move !== null && !isIntegerArray(move)) {
    throw new Error(`${label}: move must be an array of integers or null`)
  }

  const [d1, d2] = roll
  return {
    round,
    openTiles,
    roll: { d1, d2, total: d1 + d2 },
    legalMoveCount,
    move,
  }
}

function parseRecord(value: unknown, index: number): StrategyRecord {
  const where = `records[${index}]`
  if (!isRecord(value)) {
    throw new Error(`${where} is not an object`)
  }

  const strategyId = value.strategy_id
  if (!isStrategyId(strategyId)) {
    throw new Error(`${where}: invalid strategy_id ${String(strategyId)}`)
  }
  const strategyName = value.strategy_name
  if (typeof strategyName !== "string") {
    throw new Error(`${where}: strategy_name must be a string`)
  }

  const { num_games: numGames, scores, round_counts: roundCounts } = value
  const tilesClosed = value.tiles_closed
  if (!isIntegerArray(scores) || !isIntegerArray(roundCounts) || !isIntegerArray(tilesClosed)) {
    throw new Error(`${where}: scores, round_counts and tiles_closed must be integer arrays`)
  }
  if (numGames !== scores.length) {
    throw new Error(`${where}: num_games ${String(numGames)} but ${scores.length} scores`)
  }
  if (roundCounts.length !== scores.length || tilesClosed.length !== scores.length) {
    throw new Error(`${where}: per-game arrays differ in length`)
  }

  const record: StrategyRecord = {
    strategyId,
    strategyName,
    numGames: scores.length,
    scores,
    roundCounts,
    tilesClosed,
  }

  const traces = value.traces
  if (traces !== undefined) {
    if (!Array.isArray(traces) || traces.length !== scores.length) {
      throw new Error(`${where}: traces must hold one trace per game`)
    }
    record.traces = traces.map((trace: unknown, game) => {
      if (!Array.isArray(trace)) {
        throw new Error(`${where} game ${game}: trace must be an array`)
      }
      return trace.map((round: unknown, i) => parseRound(round, i + 1, `${where} game ${game}`))
    })
  }
  return record
}

/**
 * Validate a parsed results document and convert it back to a BatchResult.
 *
 * @throws Error naming the first malformed field
 */
export function fromPersistedResult(value: unknown): BatchResult {
  if (!isRecord(value)) {
    throw new Error("results document must be a JSON object")
  }
  if (value.schema_version !== SCHEMA_VERSION) {
    throw new Error(
      `unsupported schema_version ${String(value.schema_version)} (expected ${SCHEMA_VERSION})`
    )
  }

  const { seed, cancelled, records } = value
  const gamesPerStrategy = value.games_per_strategy
  if (typeof seed !== "string") {
    throw new Error("seed must be a string")
  }
  if (typeof gamesPerStrategy !== "number") {
    throw new Error("games_per_strategy must be a number")
  }
  if (typeof cancelled !== "boolean") {
    throw new Error("cancelled must be a boolean")
  }
  if (!Array.isArray(records)) {
    throw new Error("records must be an array")
  }

  return {
    seed,
    gamesPerStrategy,
    cancelled,
    records: records.map((record: unknown, index) => parseRecord(record, index)),
  }
}

// ============================================================================
// File operations
// ============================================================================

/**
 * Write and sync the temp file. The descriptor is closed even if the write
 * or the sync fails.
 */
function writeAndSync(tempPath: string, content: string): void {
  const fd = fs.openSync(tempPath, "w")
  try {
    fs.writeSync(fd, content, null, "utf-8")
    fs.fsyncSync(fd)
  } finally {
    fs.closeSync(fd)
  }
}

/**
 * Remove a leftover temp file. A failure here is reported but never
 * replaces the error that caused the cleanup.
 */
function removeTempFile(tempPath: string): void {
  try {
    if (fs.existsSync(tempPath)) {
      fs.rmSync(tempPath, { force: true })
    }
  } catch (cleanupError) {
    const reason = cleanupError instanceof Error ? cleanupError.message : String(cleanupError)
    console.warn(`Could not remove temp file '${tempPath}': ${reason}`)
  }
}

/**
 * Write content to a file via a synced temp file and rename.
 * Creates the parent directory if it doesn't exist.
 */
function writeFileAtomic(targetPath: string, content: string): void {
  const tempPath = `${targetPath}.tmp`
  try {
    fs.mkdirSync(path.dirname(targetPath), { recursive: true })
    writeAndSync(tempPath, content)
    fs.renameSync(tempPath, targetPath)
  } catch (error) {
    removeTempFile(tempPath)
    throw new PersistenceError(targetPath, error)
  }
}

/**
 * Write a batch result as JSON.
 *
 * @throws PersistenceError; the batch itself is untouched and can be written again
 */
export function writeBatchResult(outputPath: string, batch: BatchResult): void {
  writeFileAtomic(outputPath, `${JSON.stringify(toPersistedResult(batch), null, 2)}\n`)
}

/**
 * Load a results file written by writeBatchResult.
 * Throws on read, parse or validation errors.
 */
export function readBatchResult(resultsPath: string): BatchResult {
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(resultsPath, "utf-8"))
    return fromPersistedResult(parsed)
  } catch (error) {
    if (error instanceof Error) {
      throw new Error(`Failed to load results file '${resultsPath}': ${error.message}`, {
        cause: error,
      })
    }
    throw error
  }
}

export const CSV_HEADER = "strategy,game_number,score,tiles_closed,round_count"

/**
 * One row per game. Game numbers are 1-based.
 */
export function formatResultsCsv(batch: BatchResult): string {
  const lines = [CSV_HEADER]
  for (const record of batch.records) {
    for (let i = 0; i < record.numGames; i++) {
      lines.push(
        [record.strategyId, i + 1, record.scores[i], record.tilesClosed[i], record.roundCounts[i]].join(
          ","
        )
      )
    }
  }
  return `${lines.join("\n")}\n`
}

export function writeResultsCsv(csvPath: string, batch: BatchResult): void {
  writeFileAtomic(csvPath, formatResultsCsv(batch))
}
