/**
 * Shared ranking helpers for the deterministic strategies.
 */

import type { Move } from "../types.js"
import { InvariantViolation } from "../errors.js"
import { compareMoves } from "../moves.js"

export type MoveComparator = (a: Move, b: Move) => number

/**
 * Compose comparators: later ones only break ties left by earlier ones.
 * compareMoves always runs last, so the result is a total order.
 */
export function rankBy(...comparators: MoveComparator[]): MoveComparator {
  return (a, b) => {
    for (const compare of comparators) {
      const result = compare(a, b)
      if (result !== 0) return result
    }
    return compareMoves(a, b)
  }
}

/**
 * The first move under the given order.
 */
export function pickBest(legalMoves: readonly Move[], compare: MoveComparator): Move {
  if (legalMoves.length === 0) {
    throw new InvariantViolation("NO_LEGAL_MOVES", "Strategy asked to choose from no moves")
  }
  let best = legalMoves[0]
  for (let i = 1; i < legalMoves.length; i++) {
    if (compare(legalMoves[i], best) < 0) {
      best = legalMoves[i]
    }
  }
  return best
}

/**
 * Order moves by a numeric score, lowest first.
 */
export function ascendingBy(score: (move: Move) => number): MoveComparator {
  return (a, b) => score(a) - score(b)
}

/**
 * Order moves by a numeric score, highest first.
 */
export function descendingBy(score: (move: Move) => number): MoveComparator {
  return (a, b) => score(b) - score(a)
}

export const fewerTiles: MoveComparator = ascendingBy((move) => move.length)
