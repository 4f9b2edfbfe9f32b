/**
 * Simulation Configuration
 *
 * Configuration is validated once, up front, and frozen. Every problem is
 * reported together so that no partial run is ever started.
 */

import * as fs from "fs"
import * as path from "path"

import type { StrategyId } from "../types.js"
import { STRATEGY_IDS } from "../types.js"
import { ConfigurationError } from "../errors.js"
import { isStrategyId } from "../strategies/index.js"
import type { SimulationConfig, SimulationConfigInput } from "./types.js"

export const DEFAULT_GAMES_PER_STRATEGY = 100
export const DEFAULT_SEED = "stb"
export const DEFAULT_RESULTS_DIR = "./results"

/**
 * Results file for a seed, inside the default results directory.
 */
export function defaultOutputPath(seed: string): string {
  const safeSeed = seed.replace(/[^A-Za-z0-9._-]/g, "_")
  return path.join(DEFAULT_RESULTS_DIR, `stb-results-${safeSeed}.json`)
}

/**
 * Validate input and build an immutable configuration.
 *
 * @throws ConfigurationError listing every invalid field
 */
export function createSimulationConfig(input: SimulationConfigInput = {}): SimulationConfig {
  const issues: string[] = []

  const rawIds = input.strategyIds ?? STRATEGY_IDS
  const strategyIds: StrategyId[] = []
  if (rawIds.length === 0) {
    issues.push("at least one strategy id is required")
  }
  for (const id of rawIds) {
    if (!isStrategyId(id)) {
      issues.push(`invalid strategy id ${id} (expected 0-5)`)
    } else if (strategyIds.includes(id)) {
      issues.push(`strategy id ${id} is listed more than once`)
    } else {
      strategyIds.push(id)
    }
  }

  const gamesPerStrategy = input.gamesPerStrategy ?? DEFAULT_GAMES_PER_STRATEGY
  if (!Number.isSafeInteger(gamesPerStrategy) || gamesPerStrategy <= 0) {
    issues.push(`games per strategy must be a positive integer (got ${gamesPerStrategy})`)
  }

  const seed = input.seed ?? DEFAULT_SEED
  if (seed.trim().length === 0) {
    issues.push("seed must not be empty")
  }

  const outputPath = input.outputPath ?? defaultOutputPath(seed)
  if (outputPath.trim().length === 0) {
    issues.push("output path must not be empty")
  }

  if (input.csvPath !== undefined && input.csvPath.trim().length === 0) {
    issues.push("CSV path must not be empty")
  }

  if (
    input.maxWorkers !== undefined &&
    (!Number.isSafeInteger(input.maxWorkers) || input.maxWorkers <= 0)
  ) {
    issues.push(`max workers must be a positive integer (got ${input.maxWorkers})`)
  }

  if (issues.length > 0) {
    throw new ConfigurationError(issues)
  }

  return Object.freeze({
    strategyIds: Object.freeze(strategyIds),
    gamesPerStrategy,
    seed,
    outputPath,
    recordTraces: input.recordTraces ?? false,
    ...(input.csvPath !== undefined ? { csvPath: input.csvPath } : {}),
    ...(input.maxWorkers !== undefined ? { maxWorkers: input.maxWorkers } : {}),
  })
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

/**
 * Load configuration input from a JSON file. Keys mirror SimulationConfigInput.
 * Unknown keys are reported, not ignored.
 *
 * @throws ConfigurationError if the file is unreadable or malformed
 */
export function loadConfigFile(configPath: string): SimulationConfigInput {
  let parsed: unknown
  try {
    parsed = JSON.parse(fs.readFileSync(configPath, "utf-8"))
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new ConfigurationError([`cannot read config file '${configPath}': ${reason}`])
  }

  if (!isRecord(parsed)) {
    throw new ConfigurationError([`config file '${configPath}' must contain a JSON object`])
  }

  const issues: string[] = []
  const input: SimulationConfigInput = {}

  for (const [key, value] of Object.entries(parsed)) {
    switch (key) {
      case "strategyIds":
        if (Array.isArray(value) && value.every((v): v is number => typeof v === "number")) {
          input.strategyIds = value
        } else {
          issues.push("strategyIds must be an array of numbers")
        }
        break
      case "gamesPerStrategy":
      case "maxWorkers":
        if (typeof value === "number") {
          input[key] = value
        } else {
          issues.push(`${key} must be a number`)
        }
        break
      case "seed":
      case "outputPath":
      case "csvPath":
        if (typeof value === "string") {
          input[key] = value
        } else {
          issues.push(`${key} must be a string`)
        }
        break
      case "recordTraces":
        if (typeof value === "boolean") {
          input.recordTraces = value
        } else {
          issues.push("recordTraces must be a boolean")
        }
        break
      default:
        issues.push(`unknown config key '${key}'`)
    }
  }

  if (issues.length > 0) {
    throw new ConfigurationError(issues.map((issue) => `${configPath}: ${issue}`))
  }
  return input
}

/**
 * Layer configuration sources: later sources override earlier ones,
 * and undefined fields never override.
 */
export function mergeConfigInputs(...sources: SimulationConfigInput[]): SimulationConfigInput {
  const merged: SimulationConfigInput = {}
  for (const source of sources) {
    for (const [key, value] of Object.entries(source)) {
      if (value !== undefined) {
        Object.assign(merged, { [key]: value })
      }
    }
  }
  return merged
}
