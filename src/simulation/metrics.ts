/**
 * Batch Metrics
 *
 * Summaries computed from a batch result, and the running totals behind
 * the CLI's live progress line.
 */

import type { StrategyId } from "../types.js"
import { getStrategyName } from "../strategies/index.js"
import type { BatchResult, GameCompletion } from "./types.js"

export interface StrategySummary {
  strategyId: StrategyId
  strategyName: string
  games: number
  meanScore: number
  shutRate: number // Fraction of games that shut the box
  meanRounds: number
}

function mean(values: readonly number[]): number {
  if (values.length === 0) return 0
  return values.reduce((sum, value) => sum + value, 0) / values.length
}

export function summarizeBatch(result: BatchResult): StrategySummary[] {
  return result.records.map((record) => ({
    strategyId: record.strategyId,
    strategyName: record.strategyName,
    games: record.numGames,
    meanScore: mean(record.scores),
    shutRate:
      record.numGames === 0
        ? 0
        : record.scores.filter((score) => score === 0).length / record.numGames,
    meanRounds: mean(record.roundCounts),
  }))
}

/**
 * Running totals per strategy for the live display.
 */
export interface ProgressTracker {
  update(completion: GameCompletion): void
  format(strategyId: StrategyId, now?: number): string
}

export function createProgressTracker(
  gamesPerStrategy: number,
  startTime: number = Date.now()
): ProgressTracker {
  const totals = new Map<StrategyId, { games: number; scoreSum: number }>()

  return {
    update(completion: GameCompletion): void {
      const total = totals.get(completion.strategyId) ?? { games: 0, scoreSum: 0 }
      total.games++
      total.scoreSum += completion.outcome.score
      totals.set(completion.strategyId, total)
    },

    format(strategyId: StrategyId, now: number = Date.now()): string {
      const total = totals.get(strategyId) ?? { games: 0, scoreSum: 0 }
      const elapsedSeconds = Math.max((now - startTime) / 1000, 0.001)
      let completed = 0
      for (const entry of totals.values()) {
        completed += entry.games
      }
      const rate = Math.round(completed / elapsedSeconds)
      const meanScore = total.games === 0 ? 0 : total.scoreSum / total.games
      return (
        `  ${getStrategyName(strategyId)}: ${total.games}/${gamesPerStrategy} games` +
        `, mean score ${meanScore.toFixed(2)}, ${rate} games/s`
      )
    },
  }
}
