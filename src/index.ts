// Core types
export type {
  TileValue,
  Move,
  Roll,
  RngState,
  GameStatus,
  RoundRecord,
  GameOutcome,
  StrategyId,
  StrategyKind,
  Strategy,
} from "./types.js"
export {
  ALL_TILES,
  MIN_TILE,
  MAX_TILE,
  MIN_DIE,
  MAX_DIE,
  MIN_TOTAL,
  MAX_TOTAL,
  STRATEGY_IDS,
} from "./types.js"

// Errors
export {
  InvariantViolation,
  ConfigurationError,
  SimulationError,
  PersistenceError,
} from "./errors.js"
export type { InvariantCode, ErrorContext } from "./errors.js"

// RNG
export { createRng, rollInt, pickIndex, deriveGameSeed, deriveChoiceSeed } from "./rng.js"

// Board, dice, moves
export { Board, isTileValue } from "./board.js"
export { createRoll, createDiceRoller, createScriptedDice } from "./dice.js"
export type { DiceRoller } from "./dice.js"
export {
  enumerateMoves,
  isLegalMove,
  compareMoves,
  moveSum,
  sameMove,
  normalizeMove,
  countReachableTotals,
  formatTiles,
} from "./moves.js"

// Strategies
export {
  createStrategy,
  createRandomStrategy,
  singleSeeker,
  bigBlocker,
  smartGuesser,
  insideOut,
  outsideIn,
  getStrategyName,
  isStrategyId,
  STRATEGY_NAMES,
} from "./strategies/index.js"

// Game
export { GameRunner, playGame } from "./game.js"
export type { GameRunnerOptions, GameConfig, PendingRound } from "./game.js"
export { verifyTrace } from "./replay.js"
export type { TraceVerification } from "./replay.js"
export { runInteractiveGame, playInteractive, parseTileList } from "./interactive.js"
export type { PlayerIO, InteractiveGameOptions } from "./interactive.js"

// Simulation harness
export * from "./simulation/index.js"
