#!/usr/bin/env node

/**
 * Shut the Box Simulation CLI
 *
 * Run seeded strategy batches, a single logged game, or play interactively.
 */

import * as os from "os"
import * as path from "path"

import { playGame } from "../game.js"
import { playInteractive } from "../interactive.js"
import { formatTiles } from "../moves.js"
import type { RoundRecord } from "../types.js"
import { getStrategyName } from "../strategies/index.js"
import { ConfigurationError, PersistenceError } from "../errors.js"
import { runBatch } from "./batch.js"
import { runBatchParallel } from "./parallel-batch.js"
import {
  DEFAULT_SEED,
  createSimulationConfig,
  loadConfigFile,
  mergeConfigInputs,
} from "./config.js"
import { writeBatchResult, writeResultsCsv } from "./persistence.js"
import { createProgressTracker, summarizeBatch } from "./metrics.js"
import type { BatchResult, SimulationConfig, SimulationConfigInput } from "./types.js"

export interface CliArgs {
  strategyIds: number[] | undefined
  games: number | undefined
  seed: string | undefined
  output: string | undefined
  csv: string | undefined
  config: string | undefined
  traces: boolean
  parallel: boolean
  maxWorkers: number | undefined
  single: number | undefined // Strategy id for a single logged game
  logRounds: boolean
  play: boolean
  help: boolean
}

/**
 * Parse a comma-separated id list. Non-numeric entries become NaN so that
 * validation reports them.
 */
function parseIdList(value: string): number[] {
  return value.split(",").map((part) => Number(part.trim()))
}

function requireValue(flag: string, value: string | undefined): string {
  if (value === undefined || value.startsWith("-")) {
    throw new ConfigurationError([`${flag} requires a value`])
  }
  return value
}

/**
 * Parse command line arguments
 */
export function parseArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = {
    strategyIds: undefined,
    games: undefined,
    seed: undefined,
    output: undefined,
    csv: undefined,
    config: undefined,
    traces: false,
    parallel: false,
    maxWorkers: undefined,
    single: undefined,
    logRounds: false,
    play: false,
    help: false,
  }

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]

    if (arg === "--help" || arg === "-h") {
      args.help = true
    } else if (arg === "--strategies" || arg === "-S") {
      args.strategyIds = parseIdList(requireValue(arg, argv[++i]))
    } else if (arg === "--games" || arg === "-n") {
      args.games = Number(requireValue(arg, argv[++i]))
    } else if (arg === "--seed" || arg === "-s") {
      args.seed = requireValue(arg, argv[++i])
    } else if (arg === "--output" || arg === "-o") {
      args.output = requireValue(arg, argv[++i])
    } else if (arg === "--csv") {
      args.csv = requireValue(arg, argv[++i])
    } else if (arg === "--config" || arg === "-c") {
      args.config = requireValue(arg, argv[++i])
    } else if (arg === "--traces") {
      args.traces = true
    } else if (arg === "--parallel" || arg === "-P") {
      args.parallel = true
    } else if (arg === "--max-workers" || arg === "-w") {
      args.maxWorkers = Number(requireValue(arg, argv[++i]))
    } else if (arg === "--single") {
      args.single = Number(requireValue(arg, argv[++i]))
    } else if (arg === "--log-rounds") {
      args.logRounds = true
    } else if (arg === "--play") {
      args.play = true
    } else {
      throw new ConfigurationError([`unknown option '${arg}'`])
    }
  }

  return args
}

/**
 * Configuration input carried by flags. Only flags actually given appear.
 */
export function argsToConfigInput(args: CliArgs): SimulationConfigInput {
  return {
    strategyIds: args.strategyIds,
    gamesPerStrategy: args.games,
    seed: args.seed,
    outputPath: args.output,
    csvPath: args.csv,
    recordTraces: args.traces ? true : undefined,
    maxWorkers: args.maxWorkers,
  }
}

/**
 * Print usage information
 */
function printHelp(): void {
  console.log(`
Shut the Box Simulator - Compare tile-shutting strategies by Monte Carlo

USAGE:
  stb-sim [options]

OPTIONS:
  -S, --strategies <ids>  Comma-separated strategy ids (default: 0,1,2,3,4,5)
  -n, --games <n>         Games per strategy (default: 100)
  -s, --seed <seed>       Base seed for the run (default: ${DEFAULT_SEED})
  -o, --output <path>     Results JSON (default: ./results/stb-results-<seed>.json)
  --csv <path>            Also write one CSV row per game
  -c, --config <path>     JSON config file; flags override its values
  --traces                Record round-by-round traces in the results
  -P, --parallel          Run the batch on worker threads
  -w, --max-workers <n>   Maximum worker threads for parallel mode (default: CPU count)
                          On Ctrl-C each worker finishes its current chunk of
                          up to 250 games before the results are saved
  --single <id>           Play one game with the given strategy and print it
  --log-rounds            Stream every round of a --single game
  --play                  Play a game yourself
  -h, --help              Show this help message

STRATEGIES:
  0  Random Choice               Uniformly random legal move
  1  Single Tile                 Prefer the tile equal to the total, then the two dice
  2  Maximum Immediate Reward    Shut as many tiles as possible
  3  Tiles of Least Probability  Keep the most roll totals reachable
  4  Inside Out                  Shut tiles nearest 5 first
  5  Outside In                  Shut tiles nearest 1 and 9 first

EXAMPLES:
  # All strategies, 1000 games each
  stb-sim --games 1000 --seed demo

  # Two strategies in parallel, with a CSV export
  stb-sim --strategies 2,3 --games 100000 --parallel --csv ./results/demo.csv

  # One logged game
  stb-sim --single 3 --seed demo --log-rounds
`)
}

/**
 * Format duration in human-readable form
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`
  return `${(ms / 60000).toFixed(1)}m`
}

/**
 * One line per round: number, open tiles, roll, move.
 */
export function formatRoundRecord(record: RoundRecord): string {
  const { roll } = record
  const move = record.move ? `shut ${formatTiles(record.move)}` : "no legal move"
  const round = String(record.round).padStart(5)
  const open = formatTiles(record.openTiles).padEnd(17)
  return `${round}  ${open}  ${roll.d1}+${roll.d2}=${String(roll.total).padEnd(2)}  ${move}`
}

/**
 * Run one game and print its log
 */
function runSingle(strategyId: number, seed: string, logRounds: boolean): void {
  const config = createSimulationConfig({ strategyIds: [strategyId], seed, gamesPerStrategy: 1 })
  const [id] = config.strategyIds

  console.log("=".repeat(60))
  console.log("SHUT THE BOX - Single Game")
  console.log("=".repeat(60))
  console.log()
  console.log(`Seed: ${seed}`)
  console.log(`Strategy: ${id} (${getStrategyName(id)})`)
  console.log()

  if (logRounds) {
    console.log("Round  Open tiles         Roll     Move")
    console.log("-".repeat(60))
  }

  const startTime = Date.now()
  const outcome = playGame({
    seed,
    strategyId: id,
    onRound: logRounds ? (record) => console.log(formatRoundRecord(record)) : undefined,
  })
  const elapsed = Date.now() - startTime

  console.log()
  console.log(`Score: ${outcome.score}${outcome.score === 0 ? " (box shut)" : ""}`)
  console.log(`Rounds: ${outcome.roundCount}`)
  console.log(`Tiles closed: ${outcome.tilesClosed}`)
  console.log(`Open tiles: ${formatTiles(outcome.finalOpenTiles)}`)
  console.log()
  console.log(`Completed in ${formatDuration(elapsed)}`)
}

/**
 * Print the per-strategy summary table
 */
function printSummary(result: BatchResult): void {
  console.log("Strategy                        Games   Mean score  Shut rate  Mean rounds")
  console.log("-".repeat(76))
  for (const summary of summarizeBatch(result)) {
    const name = `${summary.strategyId} ${summary.strategyName}`.padEnd(30)
    const games = String(summary.games).padStart(7)
    const score = summary.meanScore.toFixed(2).padStart(12)
    const shut = `${(summary.shutRate * 100).toFixed(1)}%`.padStart(10)
    const rounds = summary.meanRounds.toFixed(2).padStart(12)
    console.log(`${name}${games}${score}${shut}${rounds}`)
  }
}

/**
 * Run one write, reporting a PersistenceError instead of throwing it.
 */
function tryWrite(label: string, filePath: string, write: (target: string) => void): boolean {
  try {
    write(filePath)
    console.log(`${label} written to ${filePath}`)
    return true
  } catch (error) {
    if (!(error instanceof PersistenceError)) {
      throw error
    }
    console.error(error.message)
    return false
  }
}

/**
 * Write the results JSON and, if configured, the CSV. A failed JSON write
 * is retried in the system temp directory so the batch isn't lost, and the
 * CSV is still attempted.
 *
 * @returns true if every configured file was written where asked
 */
export function persistResults(config: SimulationConfig, result: BatchResult): boolean {
  let ok = tryWrite("Results", config.outputPath, (target) => writeBatchResult(target, result))
  if (!ok) {
    const fallbackPath = path.join(os.tmpdir(), path.basename(config.outputPath))
    tryWrite("Results", fallbackPath, (target) => writeBatchResult(target, result))
  }
  if (config.csvPath !== undefined) {
    const csvOk = tryWrite("CSV", config.csvPath, (target) => writeResultsCsv(target, result))
    ok = ok && csvOk
  }
  return ok
}

/**
 * Run a batch and persist its results
 */
async function runBatchMode(config: SimulationConfig, parallel: boolean): Promise<void> {
  console.log("=".repeat(60))
  console.log(`SHUT THE BOX - Batch Mode${parallel ? " (Parallel)" : ""}`)
  console.log("=".repeat(60))
  console.log()
  console.log(`Strategies: ${config.strategyIds.join(", ")}`)
  console.log(`Games per strategy: ${config.gamesPerStrategy}`)
  console.log(`Seed: ${config.seed}`)
  if (parallel) {
    console.log(`Parallel: yes (max workers: ${config.maxWorkers ?? "auto"})`)
  }
  console.log()

  // Ctrl-C stops the batch; the games already finished are still written
  const controller = new AbortController()
  const onSigint = (): void => {
    console.log()
    console.log("Interrupted; finishing up and saving completed games...")
    controller.abort()
  }
  process.once("SIGINT", onSigint)

  const startTime = Date.now()
  const progress = createProgressTracker(config.gamesPerStrategy, startTime)
  // Report every 1% of a strategy's games, at least every game
  const reportEvery = Math.max(1, Math.floor(config.gamesPerStrategy / 100))

  const batchRunner = parallel ? runBatchParallel : runBatch
  let result: BatchResult
  try {
    result = await batchRunner(config, {
      signal: controller.signal,
      onProgress: (completion) => {
        progress.update(completion)
        const done = completion.gameIndex + 1
        if (done % reportEvery === 0 || done === config.gamesPerStrategy) {
          process.stdout.write(`\r${progress.format(completion.strategyId)}`)
          if (done === config.gamesPerStrategy && !parallel) {
            process.stdout.write("\n")
          }
        }
      },
    })
  } finally {
    process.removeListener("SIGINT", onSigint)
  }
  const elapsed = Date.now() - startTime

  console.log()
  console.log("=".repeat(60))
  console.log(result.cancelled ? "BATCH RESULTS (cancelled, partial)" : "BATCH RESULTS")
  console.log("=".repeat(60))
  console.log()
  const totalGames = result.records.reduce((sum, record) => sum + record.numGames, 0)
  console.log(`Total games: ${totalGames}`)
  console.log(`Completed in ${formatDuration(elapsed)}`)
  console.log()
  printSummary(result)
  console.log()

  if (!persistResults(config, result)) {
    process.exitCode = 1
  }
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2))

  if (args.help) {
    printHelp()
    return
  }

  if (args.play) {
    await playInteractive(args.seed ?? `play-${Date.now()}`)
    return
  }

  if (args.single !== undefined) {
    runSingle(args.single, args.seed ?? DEFAULT_SEED, args.logRounds)
    return
  }

  const fileInput = args.config ? loadConfigFile(args.config) : {}
  const config = createSimulationConfig(mergeConfigInputs(fileInput, argsToConfigInput(args)))
  await runBatchMode(config, args.parallel)
}

// Run only when executed directly (not when imported for testing)
if (require.main === module) {
  main().catch((error: unknown) => {
    if (error instanceof ConfigurationError) {
      console.error(error.message)
      console.error("Use --help for usage information")
    } else {
      console.error("Fatal error:", error)
    }
    process.exit(1)
  })
}
