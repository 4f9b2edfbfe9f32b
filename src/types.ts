// Core type definitions for the Shut the Box engine

import type { Board } from "./board.js"

// ============================================================================
// Board Types
// ============================================================================

/**
 * A tile value in [1, 9]. Plain number, validated at the board boundary.
 */
export type TileValue = number

export const MIN_TILE = 1
export const MAX_TILE = 9

/**
 * All tile values in ascending order.
 */
export const ALL_TILES: readonly TileValue[] = [1, 2, 3, 4, 5, 6, 7, 8, 9]

/**
 * A set of open tiles shut together in one action.
 * Always non-empty and strictly ascending.
 */
export type Move = readonly TileValue[]

// ============================================================================
// Dice Types
// ============================================================================

export const MIN_DIE = 1
export const MAX_DIE = 6

export const MIN_TOTAL = MIN_DIE * 2
export const MAX_TOTAL = MAX_DIE * 2

/**
 * One round's dice. total is always d1 + d2.
 */
export interface Roll {
  readonly d1: number
  readonly d2: number
  readonly total: number
}

// ============================================================================
// RNG Types
// ============================================================================

/**
 * Counter-based generator state. Every draw hashes seed + counter,
 * so the same seed always yields the same sequence.
 */
export interface RngState {
  seed: string
  counter: number
}

// ============================================================================
// Game Types
// ============================================================================

export type GameStatus = "in_progress" | "complete"

/**
 * One recorded round. move is null for the final dead roll
 * (no legal move existed).
 */
export interface RoundRecord {
  round: number
  openTiles: TileValue[] // Open tiles before the roll
  roll: Roll
  legalMoveCount: number
  move: Move | null
}

/**
 * Terminal state of one game.
 */
export interface GameOutcome {
  score: number // Sum of open tiles; 0 = box shut
  roundCount: number // Rounds in which tiles were shut
  tilesClosed: number
  finalOpenTiles: TileValue[]
  trace?: RoundRecord[]
}

// ============================================================================
// Strategy Types
// ============================================================================

export const STRATEGY_IDS = [0, 1, 2, 3, 4, 5] as const

export type StrategyId = (typeof STRATEGY_IDS)[number]

export type StrategyKind =
  | "random"
  | "single-seeker"
  | "big-blocker"
  | "smart-guesser"
  | "inside-out"
  | "outside-in"

/**
 * Picks one move from a non-empty legal set. Every strategy except
 * random is a pure function of its arguments.
 */
export interface Strategy {
  id: StrategyId
  kind: StrategyKind
  name: string
  choose(board: Board, roll: Roll, legalMoves: readonly Move[]): Move
}
