/**
 * Error types
 *
 * Invariant violations are logic errors in move generation or application.
 * They abort the game that raised them and are never recovered from.
 * Configuration and persistence errors surface at the harness boundary.
 */

export type InvariantCode =
  | "INVALID_TILE"
  | "DUPLICATE_SHUT"
  | "INVALID_DIE"
  | "ILLEGAL_MOVE"
  | "NO_LEGAL_MOVES"
  | "GAME_COMPLETE"
  | "GAME_IN_PROGRESS"
  | "NO_PENDING_ROUND"
  | "ROUND_PENDING"

export type ErrorContext = Readonly<Record<string, unknown>>

function formatMessage(message: string, context?: ErrorContext): string {
  if (context === undefined) {
    return message
  }
  return `${message} context=${JSON.stringify(context)}`
}

export class InvariantViolation extends Error {
  readonly code: InvariantCode
  readonly context?: ErrorContext

  constructor(code: InvariantCode, message: string, context?: ErrorContext) {
    super(formatMessage(message, context))
    this.name = "InvariantViolation"
    this.code = code
    if (context !== undefined) {
      this.context = context
    }
  }
}

/**
 * Raised before any game runs. Lists every problem found, not just the first.
 */
export class ConfigurationError extends Error {
  readonly issues: readonly string[]

  constructor(issues: readonly string[]) {
    super(`Invalid simulation configuration: ${issues.join("; ")}`)
    this.name = "ConfigurationError"
    this.issues = issues
  }
}

/**
 * A game failed inside a batch. Carries what is needed to replay it.
 */
export class SimulationError extends Error {
  readonly strategyId: number
  readonly gameIndex: number
  readonly gameSeed: string

  constructor(strategyId: number, gameIndex: number, gameSeed: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause)
    super(`Game ${gameIndex} of strategy ${strategyId} failed (seed '${gameSeed}'): ${reason}`, {
      cause,
    })
    this.name = "SimulationError"
    this.strategyId = strategyId
    this.gameIndex = gameIndex
    this.gameSeed = gameSeed
  }
}

export class PersistenceError extends Error {
  readonly path: string

  constructor(path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause)
    super(`Failed to write results to '${path}': ${reason}`, { cause })
    this.name = "PersistenceError"
    this.path = path
  }
}
