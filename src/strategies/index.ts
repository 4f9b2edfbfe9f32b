/**
 * Strategy Registry
 *
 * Strategies are a closed set keyed by id. Selection happens once, when a
 * game is set up; the game loop only ever sees the Strategy interface.
 */

export { createRandomStrategy } from "./random.js"
export { singleSeeker } from "./single-seeker.js"
export { bigBlocker } from "./big-blocker.js"
export { smartGuesser, remainingCoverage } from "./smart-guesser.js"
export { insideOut, outsideIn, distanceFromCenter, distanceFromEdges } from "./positional.js"

import { createRandomStrategy } from "./random.js"
import { singleSeeker } from "./single-seeker.js"
import { bigBlocker } from "./big-blocker.js"
import { smartGuesser } from "./smart-guesser.js"
import { insideOut, outsideIn } from "./positional.js"
import type { Strategy, StrategyId, RngState } from "../types.js"
import { STRATEGY_IDS } from "../types.js"

export const STRATEGY_NAMES: Record<StrategyId, string> = {
  0: "Random Choice",
  1: "Single Tile",
  2: "Maximum Immediate Reward",
  3: "Tiles of Least Probability",
  4: "Inside Out",
  5: "Outside In",
}

export function isStrategyId(value: unknown): value is StrategyId {
  return STRATEGY_IDS.some((id) => id === value)
}

export function getStrategyName(id: StrategyId): string {
  return STRATEGY_NAMES[id]
}

/**
 * Build the strategy for one game. rng feeds only the seeded strategy;
 * the deterministic ones ignore it.
 */
export function createStrategy(id: StrategyId, rng: RngState): Strategy {
  switch (id) {
    case 0:
      return createRandomStrategy(rng)
    case 1:
      return singleSeeker
    case 2:
      return bigBlocker
    case 3:
      return smartGuesser
    case 4:
      return insideOut
    case 5:
      return outsideIn
  }
}

/**
 * The strategies that never draw from a generator.
 */
export const deterministicStrategies: Strategy[] = [
  singleSeeker,
  bigBlocker,
  smartGuesser,
  insideOut,
  outsideIn,
]
