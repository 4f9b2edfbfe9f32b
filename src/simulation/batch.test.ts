/**
 * Tests for batch.ts - Sequential Monte Carlo harness
 */

import { runBatch } from "./batch.js"
import { createSimulationConfig } from "./config.js"
import * as game from "../game.js"
import { playGame } from "../game.js"
import { deriveGameSeed } from "../rng.js"
import { verifyTrace } from "../replay.js"
import { SimulationError } from "../errors.js"
import type { GameCompletion } from "./types.js"

describe("batch", () => {
  describe("runBatch", () => {
    it("plays every game of every strategy in order", async () => {
      const config = createSimulationConfig({
        strategyIds: [1, 2],
        gamesPerStrategy: 20,
        seed: "batch-test",
      })

      const result = await runBatch(config)

      expect(result.seed).toBe("batch-test")
      expect(result.gamesPerStrategy).toBe(20)
      expect(result.cancelled).toBe(false)
      expect(result.records.map((r) => r.strategyId)).toEqual([1, 2])
      expect(result.records.map((r) => r.strategyName)).toEqual([
        "Single Tile",
        "Maximum Immediate Reward",
      ])

      for (const record of result.records) {
        expect(record.numGames).toBe(20)
        expect(record.scores).toHaveLength(20)
        expect(record.roundCounts).toHaveLength(20)
        expect(record.tilesClosed).toHaveLength(20)
        expect(record.traces).toBeUndefined()
      }
    })

    it("records game i from the seed derived for game i", async () => {
      const config = createSimulationConfig({
        strategyIds: [0, 3],
        gamesPerStrategy: 10,
        seed: "derived",
      })

      const result = await runBatch(config)

      for (const record of result.records) {
        for (let i = 0; i < record.numGames; i++) {
          const replay = playGame({
            seed: deriveGameSeed("derived", record.strategyId, i),
            strategyId: record.strategyId,
          })
          expect(record.scores[i]).toBe(replay.score)
          expect(record.roundCounts[i]).toBe(replay.roundCount)
          expect(record.tilesClosed[i]).toBe(replay.tilesClosed)
        }
      }
    })

    it("holds the terminal invariants for every game", async () => {
      const result = await runBatch(
        createSimulationConfig({ gamesPerStrategy: 50, seed: "invariants" })
      )

      for (const record of result.records) {
        for (let i = 0; i < record.numGames; i++) {
          const score = record.scores[i]
          expect(score).toBeGreaterThanOrEqual(0)
          expect(score).toBeLessThanOrEqual(45)
          expect(score === 0).toBe(record.tilesClosed[i] === 9)
          expect(record.roundCounts[i]).toBeLessThanOrEqual(record.tilesClosed[i])
        }
      }
    })

    it("records traces that replay to the recorded scores", async () => {
      const result = await runBatch(
        createSimulationConfig({
          strategyIds: [0, 5],
          gamesPerStrategy: 15,
          seed: "traces",
          recordTraces: true,
        })
      )

      for (const record of result.records) {
        expect(record.traces).toHaveLength(15)
        record.traces?.forEach((trace, i) => {
          const verification = verifyTrace(trace, record.scores[i])
          expect(verification.issues).toEqual([])
          expect(verification.valid).toBe(true)
        })
      }
    })

    it("reports progress once per game, in game order", async () => {
      const completions: GameCompletion[] = []
      await runBatch(
        createSimulationConfig({ strategyIds: [4, 2], gamesPerStrategy: 3, seed: "progress" }),
        { onProgress: (completion) => completions.push(completion) }
      )

      expect(completions.map((c) => [c.strategyId, c.gameIndex])).toEqual([
        [4, 0],
        [4, 1],
        [4, 2],
        [2, 0],
        [2, 1],
        [2, 2],
      ])
    })

    it("returns an empty cancelled result when aborted up front", async () => {
      const controller = new AbortController()
      controller.abort()

      const result = await runBatch(
        createSimulationConfig({ strategyIds: [1], gamesPerStrategy: 10, seed: "abort" }),
        { signal: controller.signal }
      )

      expect(result.cancelled).toBe(true)
      expect(result.records[0].numGames).toBe(0)
    })

    it("keeps the games finished before an abort", async () => {
      const controller = new AbortController()
      const config = createSimulationConfig({
        strategyIds: [0, 1],
        gamesPerStrategy: 50,
        seed: "abort-mid",
      })

      const result = await runBatch(config, {
        signal: controller.signal,
        onProgress: (completion) => {
          if (completion.gameIndex === 4) {
            controller.abort()
          }
        },
      })

      expect(result.cancelled).toBe(true)
      expect(result.records[0].numGames).toBe(5)
      expect(result.records[1].numGames).toBe(0)

      const full = await runBatch(config)
      expect(result.records[0].scores).toEqual(full.records[0].scores.slice(0, 5))
    })

    it("wraps a failing game with its strategy, index and seed", async () => {
      const spy = jest.spyOn(game, "playGame").mockImplementation(() => {
        throw new Error("boom")
      })

      try {
        const run = runBatch(
          createSimulationConfig({ strategyIds: [2], gamesPerStrategy: 3, seed: "err-test" })
        )
        await expect(run).rejects.toThrow(SimulationError)
        await expect(run).rejects.toThrow(
          "Game 0 of strategy 2 failed (seed 'err-test/s2/g0'): boom"
        )
      } finally {
        spy.mockRestore()
      }
    })
  })
})
