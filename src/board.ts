/**
 * Board
 *
 * Open/shut state of the nine tiles. The tile set never changes,
 * only the flags do.
 */

import type { TileValue } from "./types.js"
import { ALL_TILES, MIN_TILE, MAX_TILE } from "./types.js"
import { InvariantViolation } from "./errors.js"

export function isTileValue(value: number): boolean {
  return Number.isInteger(value) && value >= MIN_TILE && value <= MAX_TILE
}

export class Board {
  // Indexed by tile value; slot 0 unused
  private readonly open: boolean[]

  private constructor(open: boolean[]) {
    this.open = open
  }

  /**
   * A fresh board with every tile open.
   */
  static create(): Board {
    return Board.fromOpenTiles(ALL_TILES)
  }

  /**
   * Restore a board where exactly the given tiles are open.
   */
  static fromOpenTiles(tiles: readonly TileValue[]): Board {
    const open = new Array<boolean>(MAX_TILE + 1).fill(false)
    for (const tile of tiles) {
      if (!isTileValue(tile)) {
        throw new InvariantViolation("INVALID_TILE", `Not a tile value: ${tile}`, { tile })
      }
      open[tile] = true
    }
    return new Board(open)
  }

  isOpen(tile: TileValue): boolean {
    return isTileValue(tile) && this.open[tile]
  }

  /**
   * Shut every given tile. All tiles are checked before any flag changes,
   * so a rejected call leaves the board as it was.
   */
  shut(tiles: readonly TileValue[]): void {
    const seen = new Set<TileValue>()
    for (const tile of tiles) {
      if (!isTileValue(tile)) {
        throw new InvariantViolation("INVALID_TILE", `Not a tile value: ${tile}`, { tile })
      }
      if (!this.open[tile] || seen.has(tile)) {
        throw new InvariantViolation("DUPLICATE_SHUT", `Tile ${tile} is already shut`, {
          tile,
          openTiles: this.openTiles(),
        })
      }
      seen.add(tile)
    }
    for (const tile of seen) {
      this.open[tile] = false
    }
  }

  /**
   * Open tiles in ascending order.
   */
  openTiles(): TileValue[] {
    return ALL_TILES.filter((tile) => this.open[tile])
  }

  currentScore(): number {
    return this.openTiles().reduce((sum, tile) => sum + tile, 0)
  }

  isFullyShut(): boolean {
    return this.openTiles().length === 0
  }

  tilesClosed(): number {
    return ALL_TILES.length - this.openTiles().length
  }
}
