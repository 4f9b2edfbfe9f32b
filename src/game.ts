/**
 * Game Runner
 *
 * Drives one game from a fresh board to its terminal state:
 * 1. Roll the dice
 * 2. Enumerate the legal moves for the roll
 * 3. No legal move ends the game with the open tiles as score
 * 4. Otherwise the strategy picks a move, which is applied to the board
 * 5. A fully shut board ends the game with score 0
 *
 * The round is also exposed as beginRound/applyMove so that a chooser
 * which cannot answer synchronously (a human at a prompt) drives the
 * same runner.
 */

import type {
  GameOutcome,
  GameStatus,
  Move,
  Roll,
  RoundRecord,
  Strategy,
  StrategyId,
  TileValue,
} from "./types.js"
import { Board } from "./board.js"
import type { DiceRoller } from "./dice.js"
import { createDiceRoller } from "./dice.js"
import { enumerateMoves, normalizeMove, sameMove } from "./moves.js"
import { InvariantViolation } from "./errors.js"
import { createRng, deriveChoiceSeed } from "./rng.js"
import { createStrategy } from "./strategies/index.js"

export interface GameRunnerOptions {
  dice: DiceRoller
  strategy?: Strategy // Required for playRound/play, not for beginRound/applyMove
  board?: Board // Defaults to a fresh, fully open board
  recordTrace?: boolean // If true, the outcome carries every round
  onRound?: (record: RoundRecord) => void // Called after each round for streaming output
}

/**
 * A rolled round waiting for its move.
 */
export interface PendingRound {
  roll: Roll
  legalMoves: Move[]
}

export class GameRunner {
  private readonly board: Board
  private readonly dice: DiceRoller
  private readonly strategy?: Strategy
  private readonly onRound?: (record: RoundRecord) => void
  private readonly trace: RoundRecord[] | null

  private status: GameStatus = "in_progress"
  private pending: (PendingRound & { openTiles: TileValue[] }) | null = null
  private rollCount = 0
  private roundCount = 0

  constructor(options: GameRunnerOptions) {
    this.board = options.board ?? Board.create()
    this.dice = options.dice
    this.strategy = options.strategy
    this.onRound = options.onRound
    this.trace = options.recordTrace ? [] : null

    // A board handed in already shut has nothing left to play
    if (this.board.isFullyShut()) {
      this.status = "complete"
    }
  }

  getStatus(): GameStatus {
    return this.status
  }

  openTiles(): TileValue[] {
    return this.board.openTiles()
  }

  /**
   * Roll and enumerate. An empty legal set completes the game on the spot.
   */
  beginRound(): PendingRound {
    this.assertInProgress("beginRound")
    if (this.pending) {
      throw new InvariantViolation("ROUND_PENDING", "Previous round is still waiting for a move", {
        round: this.rollCount,
      })
    }

    const openTiles = this.board.openTiles()
    const roll = this.dice.roll()
    const legalMoves = enumerateMoves(openTiles, roll.total)
    this.rollCount++

    if (legalMoves.length === 0) {
      this.record({ round: this.rollCount, openTiles, roll, legalMoveCount: 0, move: null })
      this.status = "complete"
      return { roll, legalMoves }
    }

    this.pending = { roll, legalMoves, openTiles }
    return { roll, legalMoves }
  }

  /**
   * Shut the tiles of a move from the pending round's legal set.
   */
  applyMove(move: Move): GameStatus {
    this.assertInProgress("applyMove")
    const pending = this.pending
    if (!pending) {
      throw new InvariantViolation("NO_PENDING_ROUND", "applyMove called before beginRound")
    }

    const wanted = normalizeMove(move)
    const legal = pending.legalMoves.find((candidate) => sameMove(candidate, wanted))
    if (!legal) {
      throw new InvariantViolation("ILLEGAL_MOVE", "Move is not in the legal set for this roll", {
        move,
        total: pending.roll.total,
        openTiles: pending.openTiles,
      })
    }

    this.board.shut(legal)
    this.pending = null
    this.roundCount++
    this.record({
      round: this.rollCount,
      openTiles: pending.openTiles,
      roll: pending.roll,
      legalMoveCount: pending.legalMoves.length,
      move: legal,
    })

    if (this.board.isFullyShut()) {
      this.status = "complete"
    }
    return this.status
  }

  /**
   * Play one round with the configured strategy.
   */
  playRound(): GameStatus {
    const strategy = this.requireStrategy()
    const { roll, legalMoves } = this.beginRound()
    if (legalMoves.length === 0) {
      return this.status
    }
    const move = strategy.choose(this.board, roll, legalMoves)
    return this.applyMove(move)
  }

  /**
   * Play rounds until the game is complete.
   */
  play(): GameOutcome {
    this.requireStrategy()
    this.assertInProgress("play")
    while (this.status === "in_progress") {
      this.playRound()
    }
    return this.getOutcome()
  }

  /**
   * Terminal result. Only available once the game is complete.
   */
  getOutcome(): GameOutcome {
    if (this.status !== "complete") {
      throw new InvariantViolation(
        "GAME_IN_PROGRESS",
        "Outcome requested before the game ended",
        { round: this.rollCount }
      )
    }
    const finalOpenTiles = this.board.openTiles()
    return {
      score: this.board.currentScore(),
      roundCount: this.roundCount,
      tilesClosed: this.board.tilesClosed(),
      finalOpenTiles,
      ...(this.trace ? { trace: [...this.trace] } : {}),
    }
  }

  private record(record: RoundRecord): void {
    this.trace?.push(record)
    this.onRound?.(record)
  }

  private requireStrategy(): Strategy {
    if (!this.strategy) {
      throw new Error("GameRunner has no strategy; drive it with beginRound/applyMove instead")
    }
    return this.strategy
  }

  private assertInProgress(operation: string): void {
    if (this.status === "complete") {
      throw new InvariantViolation("GAME_COMPLETE", `${operation} called on a completed game`, {
        round: this.rollCount,
      })
    }
  }
}

/**
 * Configuration for a single seeded game.
 */
export interface GameConfig {
  seed: string
  strategyId: StrategyId
  recordTrace?: boolean
  onRound?: (record: RoundRecord) => void
}

/**
 * Play one complete game. The dice and the strategy's choices draw from
 * separate streams of the same seed, so the outcome is a pure function of
 * (seed, strategyId).
 */
export function playGame(config: GameConfig): GameOutcome {
  const dice = createDiceRoller(createRng(config.seed))
  const strategy = createStrategy(config.strategyId, createRng(deriveChoiceSeed(config.seed)))
  const runner = new GameRunner({
    dice,
    strategy,
    recordTrace: config.recordTrace,
    onRound: config.onRound,
  })
  return runner.play()
}
