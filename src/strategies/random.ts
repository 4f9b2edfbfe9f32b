/**
 * Random Choice Strategy
 *
 * Control baseline: a uniform pick from the legal moves, drawn from the
 * generator it was created with. Reproducible under a fixed seed.
 */

import type { Strategy, Move, Roll, RngState } from "../types.js"
import type { Board } from "../board.js"
import { InvariantViolation } from "../errors.js"
import { pickIndex } from "../rng.js"

export function createRandomStrategy(rng: RngState): Strategy {
  return {
    id: 0,
    kind: "random",
    name: "Random Choice",

    choose(_board: Board, _roll: Roll, legalMoves: readonly Move[]): Move {
      if (legalMoves.length === 0) {
        throw new InvariantViolation("NO_LEGAL_MOVES", "Strategy asked to choose from no moves")
      }
      return legalMoves[pickIndex(rng, legalMoves.length)]
    },
  }
}
