/**
 * Trace Replay
 *
 * Checks a recorded round trace against the rules: every recorded move must
 * be in the legal set for its recorded open tiles and roll, the open tiles
 * must follow from the previous moves, and the game must end where it says.
 */

import type { RoundRecord, TileValue } from "./types.js"
import { ALL_TILES, MIN_DIE, MAX_DIE } from "./types.js"
import { enumerateMoves, sameMove } from "./moves.js"

export interface TraceVerification {
  valid: boolean
  score: number // Score the replay ends on
  issues: string[]
}

function sameTiles(a: readonly TileValue[], b: readonly TileValue[]): boolean {
  return a.length === b.length && a.every((tile, i) => tile === b[i])
}

function isDie(value: number): boolean {
  return Number.isInteger(value) && value >= MIN_DIE && value <= MAX_DIE
}

/**
 * Replay a trace from a fully open board.
 *
 * @param trace Rounds in play order
 * @param expectedScore If given, the replayed final score must match it
 */
export function verifyTrace(trace: readonly RoundRecord[], expectedScore?: number): TraceVerification {
  const issues: string[] = []
  let open: TileValue[] = [...ALL_TILES]

  for (let i = 0; i < trace.length; i++) {
    const record = trace[i]
    const label = `round ${record.round}`

    if (!sameTiles(record.openTiles, open)) {
      issues.push(`${label}: recorded open tiles [${record.openTiles}] but replay has [${open}]`)
    }

    const { d1, d2, total } = record.roll
    if (!isDie(d1) || !isDie(d2) || total !== d1 + d2) {
      issues.push(`${label}: invalid roll ${d1} + ${d2} = ${total}`)
      break
    }

    const legalMoves = enumerateMoves(open, total)
    if (legalMoves.length !== record.legalMoveCount) {
      issues.push(
        `${label}: recorded ${record.legalMoveCount} legal moves but replay finds ${legalMoves.length}`
      )
    }

    const move = record.move
    if (move === null) {
      if (legalMoves.length > 0) {
        issues.push(`${label}: no move recorded but ${legalMoves.length} legal moves exist`)
      }
      if (i !== trace.length - 1) {
        issues.push(`${label}: rounds recorded after a dead roll`)
      }
      break
    }

    if (!legalMoves.some((legal) => sameMove(legal, move))) {
      issues.push(`${label}: move [${move}] is not legal for ${total} with [${open}] open`)
      break
    }

    const shut = new Set(move)
    open = open.filter((tile) => !shut.has(tile))

    if (open.length === 0 && i !== trace.length - 1) {
      issues.push(`${label}: rounds recorded after the box was shut`)
      break
    }
  }

  const last = trace.length > 0 ? trace[trace.length - 1] : undefined
  if (open.length > 0 && (!last || last.move !== null)) {
    issues.push("trace ends with tiles open but without a dead roll")
  }

  const score = open.reduce((sum, tile) => sum + tile, 0)
  if (expectedScore !== undefined && expectedScore !== score) {
    issues.push(`replay ends on score ${score} but ${expectedScore} was recorded`)
  }

  return { valid: issues.length === 0, score, issues }
}
