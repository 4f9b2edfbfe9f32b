/**
 * Inside Out / Outside In Strategies
 *
 * Both rank moves by how far their tiles sit from a reference point,
 * then prefer fewer tiles, then lexicographic order.
 */

import type { Strategy, Move, Roll, TileValue } from "../types.js"
import { MIN_TILE, MAX_TILE } from "../types.js"
import type { Board } from "../board.js"
import { pickBest, rankBy, ascendingBy, fewerTiles } from "./ranking.js"

export const CENTER_TILE = 5

function totalDistance(move: Move, distance: (tile: TileValue) => number): number {
  return move.reduce((sum, tile) => sum + distance(tile), 0)
}

/**
 * Summed distance of a move's tiles from the center tile.
 */
export function distanceFromCenter(move: Move): number {
  return totalDistance(move, (tile) => Math.abs(tile - CENTER_TILE))
}

/**
 * Summed distance of a move's tiles from the nearer end of the row.
 */
export function distanceFromEdges(move: Move): number {
  return totalDistance(move, (tile) => Math.min(tile - MIN_TILE, MAX_TILE - tile))
}

const centerFirst = rankBy(ascendingBy(distanceFromCenter), fewerTiles)
const edgesFirst = rankBy(ascendingBy(distanceFromEdges), fewerTiles)

export const insideOut: Strategy = {
  id: 4,
  kind: "inside-out",
  name: "Inside Out",

  choose(_board: Board, _roll: Roll, legalMoves: readonly Move[]): Move {
    return pickBest(legalMoves, centerFirst)
  },
}

export const outsideIn: Strategy = {
  id: 5,
  kind: "outside-in",
  name: "Outside In",

  choose(_board: Board, _roll: Roll, legalMoves: readonly Move[]): Move {
    return pickBest(legalMoves, edgesFirst)
  },
}
