/**
 * Dice
 *
 * Two six-sided dice drawn from an injected seeded generator.
 * There is no default generator: callers always supply one.
 */

import type { Roll, RngState } from "./types.js"
import { MIN_DIE, MAX_DIE } from "./types.js"
import { InvariantViolation } from "./errors.js"
import { rollInt } from "./rng.js"

function isDieValue(value: number): boolean {
  return Number.isInteger(value) && value >= MIN_DIE && value <= MAX_DIE
}

/**
 * Build a roll from two die faces.
 */
export function createRoll(d1: number, d2: number): Roll {
  for (const die of [d1, d2]) {
    if (!isDieValue(die)) {
      throw new InvariantViolation("INVALID_DIE", `Die value out of range: ${die}`, { d1, d2 })
    }
  }
  return { d1, d2, total: d1 + d2 }
}

export interface DiceRoller {
  roll(): Roll
}

export function createDiceRoller(rng: RngState): DiceRoller {
  return {
    roll(): Roll {
      const d1 = rollInt(rng, MIN_DIE, MAX_DIE)
      const d2 = rollInt(rng, MIN_DIE, MAX_DIE)
      return createRoll(d1, d2)
    },
  }
}

/**
 * Replays a fixed sequence of rolls. Throws once the sequence runs out.
 */
export function createScriptedDice(faces: ReadonlyArray<readonly [number, number]>): DiceRoller {
  let index = 0
  return {
    roll(): Roll {
      if (index >= faces.length) {
        throw new RangeError(`Scripted dice exhausted after ${faces.length} rolls`)
      }
      const [d1, d2] = faces[index++]
      return createRoll(d1, d2)
    },
  }
}
