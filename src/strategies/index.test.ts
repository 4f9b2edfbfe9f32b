/**
 * Tests for the strategy registry and the purity of deterministic strategies
 */

import {
  createStrategy,
  deterministicStrategies,
  getStrategyName,
  isStrategyId,
  STRATEGY_NAMES,
} from "./index.js"
import { Board } from "../board.js"
import { createRoll } from "../dice.js"
import { enumerateMoves } from "../moves.js"
import { createRng } from "../rng.js"
import { STRATEGY_IDS } from "../types.js"

describe("strategy registry", () => {
  it("builds the strategy for every id", () => {
    for (const id of STRATEGY_IDS) {
      const strategy = createStrategy(id, createRng(`registry-${id}`))
      expect(strategy.id).toBe(id)
      expect(strategy.name).toBe(STRATEGY_NAMES[id])
    }
  })

  it("recognises valid ids only", () => {
    expect(isStrategyId(0)).toBe(true)
    expect(isStrategyId(5)).toBe(true)
    expect(isStrategyId(6)).toBe(false)
    expect(isStrategyId(-1)).toBe(false)
    expect(isStrategyId("1")).toBe(false)
  })

  it("names strategies", () => {
    expect(getStrategyName(3)).toBe("Tiles of Least Probability")
  })

  it("lists the five deterministic strategies", () => {
    expect(deterministicStrategies.map((s) => s.id)).toEqual([1, 2, 3, 4, 5])
  })
})

describe("deterministic strategies", () => {
  it("choose the same move for the same inputs, every time", () => {
    const openSets = [
      [1, 2, 3, 4, 5, 6, 7, 8, 9],
      [1, 3, 4, 6, 8, 9],
      [2, 5, 7, 9],
    ]
    for (const strategy of deterministicStrategies) {
      for (const openTiles of openSets) {
        for (let d1 = 1; d1 <= 6; d1++) {
          for (let d2 = 1; d2 <= 6; d2++) {
            const roll = createRoll(d1, d2)
            const moves = enumerateMoves(openTiles, roll.total)
            if (moves.length === 0) continue
            const first = strategy.choose(Board.fromOpenTiles(openTiles), roll, moves)
            const second = strategy.choose(Board.fromOpenTiles(openTiles), roll, [...moves])
            expect(second).toEqual(first)
            expect(moves).toContainEqual(first)
          }
        }
      }
    }
  })
})
