/**
 * Interactive play
 *
 * A human takes the strategy's place: each round shows the roll and the
 * legal moves, then reads a tile list until it names one of them. The
 * game itself runs on the same GameRunner as simulated play.
 */

import * as readline from "readline/promises"

import type { GameOutcome, Move, TileValue } from "./types.js"
import type { DiceRoller } from "./dice.js"
import { createDiceRoller } from "./dice.js"
import { GameRunner } from "./game.js"
import { formatTiles, normalizeMove, sameMove } from "./moves.js"
import { createRng } from "./rng.js"

/**
 * Where the game reads answers and writes its output.
 */
export interface PlayerIO {
  ask(question: string): Promise<string>
  print(line: string): void
}

export interface InteractiveGameOptions {
  dice: DiceRoller
  io: PlayerIO
  recordTrace?: boolean
}

/**
 * Parse "3 4", "3,4" or "3, 4" into tile numbers.
 * Returns null for empty input or any token that isn't a whole number.
 */
export function parseTileList(input: string): TileValue[] | null {
  const trimmed = input.trim()
  if (trimmed.length === 0) {
    return null
  }
  const tokens = trimmed.split(/[\s,]+/).filter((token) => token.length > 0)
  if (!tokens.every((token) => /^\d+$/.test(token))) {
    return null
  }
  return tokens.map((token) => parseInt(token, 10))
}

async function promptForMove(
  io: PlayerIO,
  total: number,
  legalMoves: readonly Move[]
): Promise<Move> {
  while (true) {
    const tiles = parseTileList(await io.ask("Tiles to shut: "))
    if (!tiles) {
      io.print("Enter tile numbers separated by spaces or commas, e.g. 3 4")
      continue
    }
    const move = normalizeMove(tiles)
    if (legalMoves.some((candidate) => sameMove(candidate, move))) {
      return move
    }
    io.print(`[${formatTiles(move)}] is not a legal move for ${total}. Try again.`)
  }
}

/**
 * Play one game with answers from io. Invalid answers re-prompt; they
 * never end the game.
 */
export async function runInteractiveGame(options: InteractiveGameOptions): Promise<GameOutcome> {
  const { io } = options
  const runner = new GameRunner({ dice: options.dice, recordTrace: options.recordTrace })

  while (runner.getStatus() === "in_progress") {
    io.print(`Open tiles: ${formatTiles(runner.openTiles())}`)
    const { roll, legalMoves } = runner.beginRound()
    io.print(`Rolled ${roll.d1} + ${roll.d2} = ${roll.total}`)

    if (legalMoves.length === 0) {
      io.print(`No open tiles add up to ${roll.total}.`)
      break
    }

    io.print(`Legal moves: ${legalMoves.map((move) => `[${formatTiles(move)}]`).join(" ")}`)
    runner.applyMove(await promptForMove(io, roll.total, legalMoves))
  }

  const outcome = runner.getOutcome()
  io.print(outcome.score === 0 ? "You shut the box!" : `Game over. Score: ${outcome.score}`)
  return outcome
}

/**
 * Play a seeded game on the terminal.
 */
export async function playInteractive(seed: string): Promise<GameOutcome> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  })

  try {
    return await runInteractiveGame({
      dice: createDiceRoller(createRng(seed)),
      io: {
        ask: (question) => rl.question(question),
        print: (line) => console.log(line),
      },
    })
  } finally {
    rl.close()
  }
}
