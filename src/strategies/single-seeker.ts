/**
 * Single Tile Strategy
 *
 * Intent: keep the low tiles for later by matching the dice directly.
 * 1. The single tile equal to the roll total
 * 2. Otherwise the two tiles showing on the dice (distinct faces only)
 * 3. Otherwise the lexicographically smallest legal move
 */

import type { Strategy, Move, Roll } from "../types.js"
import type { Board } from "../board.js"
import { compareMoves, sameMove } from "../moves.js"
import { pickBest } from "./ranking.js"

export const singleSeeker: Strategy = {
  id: 1,
  kind: "single-seeker",
  name: "Single Tile",

  choose(_board: Board, roll: Roll, legalMoves: readonly Move[]): Move {
    const single = legalMoves.find((move) => sameMove(move, [roll.total]))
    if (single) return single

    if (roll.d1 !== roll.d2) {
      const faces = [Math.min(roll.d1, roll.d2), Math.max(roll.d1, roll.d2)]
      const faceMove = legalMoves.find((move) => sameMove(move, faces))
      if (faceMove) return faceMove
    }

    return pickBest(legalMoves, compareMoves)
  },
}
