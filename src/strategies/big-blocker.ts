/**
 * Maximum Immediate Reward Strategy
 *
 * Shuts as many tiles as possible every round.
 */

import type { Strategy, Move, Roll } from "../types.js"
import type { Board } from "../board.js"
import { pickBest, rankBy, descendingBy } from "./ranking.js"

const mostTilesFirst = rankBy(descendingBy((move) => move.length))

export const bigBlocker: Strategy = {
  id: 2,
  kind: "big-blocker",
  name: "Maximum Immediate Reward",

  choose(_board: Board, _roll: Roll, legalMoves: readonly Move[]): Move {
    return pickBest(legalMoves, mostTilesFirst)
  },
}
