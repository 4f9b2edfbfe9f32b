import type { RngState } from "./types.js"

export function createRng(seed: string): RngState {
  return {
    seed,
    counter: 0,
  }
}

// Simple deterministic hash function (cyrb53)
function hash(str: string): number {
  let h1 = 0xdeadbeef
  let h2 = 0x41c6ce57
  for (let i = 0; i < str.length; i++) {
    const ch = str.charCodeAt(i)
    h1 = Math.imul(h1 ^ ch, 2654435761)
    h2 = Math.imul(h2 ^ ch, 1597334677)
  }
  h1 = Math.imul(h1 ^ (h1 >>> 16), 2246822507)
  h1 ^= Math.imul(h2 ^ (h2 >>> 13), 3266489909)
  h2 = Math.imul(h2 ^ (h2 >>> 16), 2246822507)
  h2 ^= Math.imul(h1 ^ (h1 >>> 13), 3266489909)
  return 4294967296 * (2097151 & h2) + (h1 >>> 0)
}

// cyrb53 yields 53 bits
const HASH_RANGE = 2 ** 53

function getRandomValue(seed: string, counter: number): number {
  const combined = `${seed}:${counter}`
  // Normalize to [0, 1)
  return hash(combined) / HASH_RANGE
}

/**
 * Get a random float in range [min, max).
 */
export function rollFloat(rng: RngState, min: number, max: number): number {
  const randomValue = getRandomValue(rng.seed, rng.counter)
  rng.counter++
  return min + randomValue * (max - min)
}

/**
 * Get a uniform random integer in [min, max] (both inclusive).
 */
export function rollInt(rng: RngState, min: number, max: number): number {
  return min + Math.floor(rollFloat(rng, 0, 1) * (max - min + 1))
}

/**
 * Pick a uniform index into a collection of the given length.
 */
export function pickIndex(rng: RngState, length: number): number {
  if (length <= 0) {
    throw new RangeError(`Cannot pick from an empty collection (length ${length})`)
  }
  return rollInt(rng, 0, length - 1)
}

/**
 * Derive the seed of one game in a batch from the batch's base seed.
 * Each (strategy, game index) pair gets its own stream, so any single
 * game can be replayed without running the ones before it.
 */
export function deriveGameSeed(baseSeed: string, strategyId: number, gameIndex: number): string {
  return `${baseSeed}/s${strategyId}/g${gameIndex}`
}

/**
 * Seed of the choice stream used by seeded strategies, kept apart from the
 * dice stream so that choosing never shifts the dice sequence.
 */
export function deriveChoiceSeed(gameSeed: string): string {
  return `${gameSeed}/choice`
}
