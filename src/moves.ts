/**
 * Move Enumeration
 *
 * Lists every set of open tiles summing to a target. With at most nine open
 * tiles there are at most 512 subsets, so the search is always exhaustive.
 */

import type { Move, TileValue } from "./types.js"
import { MIN_TOTAL, MAX_TOTAL } from "./types.js"

/**
 * Lexicographic order on ascending tile sequences; a prefix sorts first.
 * This is the common tie-break for every deterministic strategy.
 */
export function compareMoves(a: Move, b: Move): number {
  const length = Math.min(a.length, b.length)
  for (let i = 0; i < length; i++) {
    if (a[i] !== b[i]) return a[i] - b[i]
  }
  return a.length - b.length
}

export function moveSum(move: Move): number {
  return move.reduce((sum, tile) => sum + tile, 0)
}

function ascendingUnique(tiles: readonly TileValue[]): TileValue[] {
  return [...new Set(tiles)].sort((a, b) => a - b)
}

/**
 * Every subset of openTiles whose values sum to target, each exactly once,
 * in lexicographic order. Empty when no legal move exists.
 */
export function enumerateMoves(openTiles: readonly TileValue[], target: number): Move[] {
  const tiles = ascendingUnique(openTiles)
  const moves: Move[] = []
  const current: TileValue[] = []

  // Depth-first over ascending tiles, trying each tile before the ones after it
  function search(start: number, remaining: number): void {
    for (let i = start; i < tiles.length; i++) {
      const tile = tiles[i]
      if (tile > remaining) break
      current.push(tile)
      if (tile === remaining) {
        moves.push([...current])
      } else {
        search(i + 1, remaining - tile)
      }
      current.pop()
    }
  }

  if (target > 0) {
    search(0, target)
  }
  return moves
}

/**
 * Whether move is a legal closing set for the given open tiles and target.
 */
export function isLegalMove(openTiles: readonly TileValue[], target: number, move: Move): boolean {
  if (move.length === 0) return false
  const open = new Set(openTiles)
  for (let i = 0; i < move.length; i++) {
    if (!open.has(move[i])) return false
    if (i > 0 && move[i] <= move[i - 1]) return false
  }
  return moveSum(move) === target
}

/**
 * Whether two moves shut the same tiles.
 */
export function sameMove(a: Move, b: Move): boolean {
  return compareMoves(a, b) === 0
}

/**
 * Normalize a user-supplied tile list into move form (ascending).
 * Duplicates are kept so that isLegalMove rejects them.
 */
export function normalizeMove(tiles: readonly TileValue[]): Move {
  return [...tiles].sort((a, b) => a - b)
}

/**
 * Number of distinct roll totals in [2, 12] that the given open tiles could
 * still answer with at least one move.
 */
export function countReachableTotals(openTiles: readonly TileValue[]): number {
  // Bit n of reachable is set when some non-empty subset sums to n.
  // Sums above MAX_TOTAL are masked off to stay inside 32-bit integers.
  const mask = (1 << (MAX_TOTAL + 1)) - 1
  let reachable = 0
  for (const tile of ascendingUnique(openTiles)) {
    reachable = (reachable | (reachable << tile) | (1 << tile)) & mask
  }
  let count = 0
  for (let total = MIN_TOTAL; total <= MAX_TOTAL; total++) {
    if (reachable & (1 << total)) count++
  }
  return count
}

/**
 * Display form of a tile list: "1 2 4", or "-" when empty.
 */
export function formatTiles(tiles: readonly TileValue[]): string {
  return tiles.length === 0 ? "-" : tiles.join(" ")
}
