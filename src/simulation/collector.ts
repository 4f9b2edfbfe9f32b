/**
 * Result Collection
 *
 * Outcomes may arrive out of order (parallel workers). Each one is tagged
 * with its game index; the collector holds early arrivals aside and appends
 * to a strategy's record only in game order, so a record is always the
 * contiguous prefix of finished games.
 */

import type { GameOutcome, StrategyId } from "../types.js"
import { getStrategyName } from "../strategies/index.js"
import type { BatchResult, RecordCollector, StrategyRecord } from "./types.js"

interface StrategySlot {
  record: StrategyRecord
  waiting: Map<number, GameOutcome> // Finished ahead of their turn
}

/**
 * Create a collector for one batch.
 *
 * @param strategyIds Strategies in the order their records are reported
 * @param recordTraces Keep round traces from outcomes that carry them
 */
export function createRecordCollector(
  seed: string,
  gamesPerStrategy: number,
  strategyIds: readonly StrategyId[],
  recordTraces: boolean
): RecordCollector {
  const slots = new Map<StrategyId, StrategySlot>()
  for (const strategyId of strategyIds) {
    slots.set(strategyId, {
      record: {
        strategyId,
        strategyName: getStrategyName(strategyId),
        numGames: 0,
        scores: [],
        roundCounts: [],
        tilesClosed: [],
        ...(recordTraces ? { traces: [] } : {}),
      },
      waiting: new Map(),
    })
  }
  let completed = 0

  function append(record: StrategyRecord, outcome: GameOutcome): void {
    record.scores.push(outcome.score)
    record.roundCounts.push(outcome.roundCount)
    record.tilesClosed.push(outcome.tilesClosed)
    record.traces?.push(outcome.trace ?? [])
    record.numGames++
  }

  return {
    record(strategyId: StrategyId, gameIndex: number, outcome: GameOutcome): void {
      const slot = slots.get(strategyId)
      if (!slot) {
        throw new Error(`No record slot for strategy ${strategyId}`)
      }
      if (gameIndex < slot.record.numGames || slot.waiting.has(gameIndex)) {
        throw new Error(`Game ${gameIndex} of strategy ${strategyId} recorded twice`)
      }

      slot.waiting.set(gameIndex, outcome)
      completed++

      // Flush every outcome that is now next in line
      let next = slot.waiting.get(slot.record.numGames)
      while (next) {
        slot.waiting.delete(slot.record.numGames)
        append(slot.record, next)
        next = slot.waiting.get(slot.record.numGames)
      }
    },

    completedCount(): number {
      return completed
    },

    finalize(cancelled: boolean): BatchResult {
      const records = strategyIds.map((strategyId) => {
        const slot = slots.get(strategyId)
        if (!slot) {
          throw new Error(`No record slot for strategy ${strategyId}`)
        }
        const { record } = slot
        return {
          ...record,
          scores: [...record.scores],
          roundCounts: [...record.roundCounts],
          tilesClosed: [...record.tilesClosed],
          ...(record.traces ? { traces: [...record.traces] } : {}),
        }
      })
      return { seed, gamesPerStrategy, cancelled, records }
    },
  }
}
