import * as fs from "fs"
import * as os from "os"
import * as path from "path"

import {
  CSV_HEADER,
  formatResultsCsv,
  fromPersistedResult,
  readBatchResult,
  toPersistedResult,
  writeBatchResult,
  writeResultsCsv,
} from "./persistence.js"
import { runBatch } from "./batch.js"
import { createSimulationConfig } from "./config.js"
import { PersistenceError } from "../errors.js"
import type { BatchResult } from "./types.js"

const HAND_BATCH: BatchResult = {
  seed: "hand",
  gamesPerStrategy: 2,
  cancelled: false,
  records: [
    {
      strategyId: 2,
      strategyName: "Maximum Immediate Reward",
      numGames: 2,
      scores: [0, 7],
      roundCounts: [4, 3],
      tilesClosed: [9, 6],
    },
    {
      strategyId: 4,
      strategyName: "Inside Out",
      numGames: 1,
      scores: [17],
      roundCounts: [2],
      tilesClosed: [5],
    },
  ],
}

describe("Persistence", () => {
  let tempDir: string

  beforeAll(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "stb-test-results-"))
  })

  afterAll(() => {
    if (fs.existsSync(tempDir)) {
      fs.rmSync(tempDir, { recursive: true, force: true })
    }
  })

  describe("toPersistedResult", () => {
    it("uses the snake_case schema with a version", () => {
      const persisted = toPersistedResult(HAND_BATCH)

      expect(persisted.schema_version).toBe(1)
      expect(persisted.seed).toBe("hand")
      expect(persisted.games_per_strategy).toBe(2)
      expect(persisted.cancelled).toBe(false)
      expect(persisted.records[0]).toEqual({
        strategy_id: 2,
        strategy_name: "Maximum Immediate Reward",
        num_games: 2,
        seed: "hand",
        scores: [0, 7],
        round_counts: [4, 3],
        tiles_closed: [9, 6],
      })
    })

    it("writes trace rounds with the roll as a pair", () => {
      const persisted = toPersistedResult({
        ...HAND_BATCH,
        records: [
          {
            ...HAND_BATCH.records[1],
            traces: [
              [
                {
                  round: 1,
                  openTiles: [1, 2, 3, 4, 5, 6, 7, 8, 9],
                  roll: { d1: 2, d2: 3, total: 5 },
                  legalMoveCount: 3,
                  move: [5],
                },
              ],
            ],
          },
        ],
      })

      expect(persisted.records[0].traces).toEqual([
        [{ open_tiles: [1, 2, 3, 4, 5, 6, 7, 8, 9], roll: [2, 3], legal_move_count: 3, move: [5] }],
      ])
    })
  })

  describe("writeBatchResult / readBatchResult", () => {
    it("reads back exactly what was written, traces included", async () => {
      const batch = await runBatch(
        createSimulationConfig({
          strategyIds: [0, 3],
          gamesPerStrategy: 5,
          seed: "persist",
          recordTraces: true,
        })
      )
      const outputPath = path.join(tempDir, "round-trip", "results.json")

      writeBatchResult(outputPath, batch)

      expect(readBatchResult(outputPath)).toEqual(batch)
    })

    it("creates the directory and leaves no temp file behind", () => {
      const dir = path.join(tempDir, "nested", "deeper")
      const outputPath = path.join(dir, "results.json")

      writeBatchResult(outputPath, HAND_BATCH)

      expect(fs.readdirSync(dir)).toEqual(["results.json"])
      const parsed: unknown = JSON.parse(fs.readFileSync(outputPath, "utf-8"))
      expect(parsed).toEqual(toPersistedResult(HAND_BATCH))
    })

    it("overwrites an earlier file", () => {
      const outputPath = path.join(tempDir, "overwrite.json")
      writeBatchResult(outputPath, HAND_BATCH)
      writeBatchResult(outputPath, { ...HAND_BATCH, cancelled: true })

      expect(readBatchResult(outputPath).cancelled).toBe(true)
    })

    it("raises PersistenceError naming the path when the write fails", () => {
      const blocker = path.join(tempDir, "blocker")
      fs.writeFileSync(blocker, "not a directory", "utf-8")
      const outputPath = path.join(blocker, "results.json")

      try {
        writeBatchResult(outputPath, HAND_BATCH)
        throw new Error("expected PersistenceError")
      } catch (error) {
        expect(error).toBeInstanceOf(PersistenceError)
        if (error instanceof PersistenceError) {
          expect(error.path).toBe(outputPath)
          expect(error.message.startsWith(`Failed to write results to '${outputPath}': `)).toBe(
            true
          )
        }
      }
      expect(fs.readFileSync(blocker, "utf-8")).toBe("not a directory")
    })

    it("removes the temp file and leaves the target alone when the rename fails", () => {
      const dir = path.join(tempDir, "rename-fails")
      // A non-empty directory at the target path makes the rename fail
      const outputPath = path.join(dir, "results.json")
      fs.mkdirSync(outputPath, { recursive: true })
      fs.writeFileSync(path.join(outputPath, "keep.txt"), "kept", "utf-8")

      expect(() => writeBatchResult(outputPath, HAND_BATCH)).toThrow(PersistenceError)

      expect(fs.readdirSync(dir)).toEqual(["results.json"])
      expect(fs.readFileSync(path.join(outputPath, "keep.txt"), "utf-8")).toBe("kept")
    })

    it("keeps the write error when the temp file cannot be removed", () => {
      const warn = jest.spyOn(console, "warn").mockImplementation(() => undefined)
      const dir = path.join(tempDir, "stuck-temp")
      const outputPath = path.join(dir, "results.json")
      // A directory where the temp file goes: opening it fails, and so does removing it
      fs.mkdirSync(`${outputPath}.tmp`, { recursive: true })

      try {
        writeBatchResult(outputPath, HAND_BATCH)
        throw new Error("expected PersistenceError")
      } catch (error) {
        expect(error).toBeInstanceOf(PersistenceError)
        if (error instanceof PersistenceError) {
          expect(error.message).toContain("EISDIR")
          expect(error.message).not.toContain("Could not remove")
        }
      }

      expect(warn).toHaveBeenCalledTimes(1)
      expect(String(warn.mock.calls[0][0])).toContain(
        `Could not remove temp file '${outputPath}.tmp'`
      )
      expect(fs.existsSync(outputPath)).toBe(false)
      warn.mockRestore()
    })

    it("rejects an unsupported schema version", () => {
      const resultsPath = path.join(tempDir, "v2.json")
      fs.writeFileSync(resultsPath, JSON.stringify({ schema_version: 2 }), "utf-8")

      expect(() => readBatchResult(resultsPath)).toThrow(
        `Failed to load results file '${resultsPath}': unsupported schema_version 2 (expected 1)`
      )
    })

    it("rejects malformed JSON", () => {
      const resultsPath = path.join(tempDir, "broken.json")
      fs.writeFileSync(resultsPath, "{", "utf-8")

      expect(() => readBatchResult(resultsPath)).toThrow(
        `Failed to load results file '${resultsPath}'`
      )
    })
  })

  describe("fromPersistedResult", () => {
    it("rejects a record whose num_games disagrees with its scores", () => {
      const persisted = toPersistedResult(HAND_BATCH)
      const broken = {
        ...persisted,
        records: [{ ...persisted.records[0], num_games: 3 }],
      }

      expect(() => fromPersistedResult(broken)).toThrow("records[0]: num_games 3 but 2 scores")
    })

    it("rejects an unknown strategy id", () => {
      const persisted = toPersistedResult(HAND_BATCH)
      const broken = {
        ...persisted,
        records: [{ ...persisted.records[0], strategy_id: 6 }],
      }

      expect(() => fromPersistedResult(broken)).toThrow("records[0]: invalid strategy_id 6")
    })

    it("rejects a trace round without a roll pair", () => {
      const persisted = toPersistedResult(HAND_BATCH)
      const broken = {
        ...persisted,
        records: [
          {
            ...persisted.records[1],
            traces: [[{ open_tiles: [9], roll: [3], legal_move_count: 0, move: null }]],
          },
        ],
      }

      expect(() => fromPersistedResult(broken)).toThrow(
        "records[0] game 0 round 1: roll must be a pair of integers"
      )
    })
  })

  describe("CSV export", () => {
    it("writes one row per game with 1-based game numbers", () => {
      expect(formatResultsCsv(HAND_BATCH)).toBe(
        [CSV_HEADER, "2,1,0,9,4", "2,2,7,6,3", "4,1,17,5,2", ""].join("\n")
      )
    })

    it("writes only the header for an empty batch", () => {
      expect(formatResultsCsv({ ...HAND_BATCH, records: [] })).toBe(
        "strategy,game_number,score,tiles_closed,round_count\n"
      )
    })

    it("writes the CSV file", () => {
      const csvPath = path.join(tempDir, "csv", "results.csv")
      writeResultsCsv(csvPath, HAND_BATCH)
      expect(fs.readFileSync(csvPath, "utf-8")).toBe(formatResultsCsv(HAND_BATCH))
    })
  })
})
