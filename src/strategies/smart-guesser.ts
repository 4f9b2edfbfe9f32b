/**
 * Tiles of Least Probability Strategy
 *
 * Looks one roll ahead: keeps open the tiles that leave the most distinct
 * totals (2 through 12) still answerable next round.
 */

import type { Strategy, Move, Roll, TileValue } from "../types.js"
import type { Board } from "../board.js"
import { countReachableTotals } from "../moves.js"
import { pickBest, rankBy, descendingBy } from "./ranking.js"

/**
 * Totals still reachable after shutting move on a board with openTiles.
 */
export function remainingCoverage(openTiles: readonly TileValue[], move: Move): number {
  const shut = new Set(move)
  return countReachableTotals(openTiles.filter((tile) => !shut.has(tile)))
}

export const smartGuesser: Strategy = {
  id: 3,
  kind: "smart-guesser",
  name: "Tiles of Least Probability",

  choose(board: Board, _roll: Roll, legalMoves: readonly Move[]): Move {
    const openTiles = board.openTiles()
    const coverage = new Map<Move, number>()
    for (const move of legalMoves) {
      coverage.set(move, remainingCoverage(openTiles, move))
    }
    const widestCoverage = rankBy(descendingBy((move) => coverage.get(move) ?? 0))
    return pickBest(legalMoves, widestCoverage)
  },
}
