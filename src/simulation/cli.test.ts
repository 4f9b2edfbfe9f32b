/**
 * Tests for cli.ts - argument parsing and display helpers
 */

import * as fs from "fs"
import * as os from "os"
import * as path from "path"

import {
  argsToConfigInput,
  formatDuration,
  formatRoundRecord,
  parseArgs,
  persistResults,
} from "./cli.js"
import { createSimulationConfig, mergeConfigInputs } from "./config.js"
import { formatResultsCsv, readBatchResult } from "./persistence.js"
import { ConfigurationError } from "../errors.js"
import type { BatchResult } from "./types.js"

const SMALL_BATCH: BatchResult = {
  seed: "persist-cli",
  gamesPerStrategy: 2,
  cancelled: false,
  records: [
    {
      strategyId: 3,
      strategyName: "Tiles of Least Probability",
      numGames: 2,
      scores: [0, 11],
      roundCounts: [6, 3],
      tilesClosed: [9, 5],
    },
  ],
}

describe("cli", () => {
  describe("parseArgs", () => {
    it("defaults every option", () => {
      expect(parseArgs([])).toEqual({
        strategyIds: undefined,
        games: undefined,
        seed: undefined,
        output: undefined,
        csv: undefined,
        config: undefined,
        traces: false,
        parallel: false,
        maxWorkers: undefined,
        single: undefined,
        logRounds: false,
        play: false,
        help: false,
      })
    })

    it("reads long and short flags", () => {
      const args = parseArgs([
        "--strategies",
        "1,3",
        "-n",
        "500",
        "-s",
        "abc",
        "--traces",
        "-P",
        "-w",
        "4",
        "-o",
        "out.json",
        "--csv",
        "out.csv",
      ])

      expect(args.strategyIds).toEqual([1, 3])
      expect(args.games).toBe(500)
      expect(args.seed).toBe("abc")
      expect(args.traces).toBe(true)
      expect(args.parallel).toBe(true)
      expect(args.maxWorkers).toBe(4)
      expect(args.output).toBe("out.json")
      expect(args.csv).toBe("out.csv")
    })

    it("reads single-game and interactive flags", () => {
      const args = parseArgs(["--single", "3", "--log-rounds", "--play", "-h"])
      expect(args.single).toBe(3)
      expect(args.logRounds).toBe(true)
      expect(args.play).toBe(true)
      expect(args.help).toBe(true)
    })

    it("passes bad ids through for validation to report", () => {
      const args = parseArgs(["--strategies", "1, x"])
      expect(args.strategyIds).toEqual([1, NaN])
      expect(() => createSimulationConfig(argsToConfigInput(args))).toThrow(
        "invalid strategy id NaN (expected 0-5)"
      )
    })

    it("rejects unknown options", () => {
      expect(() => parseArgs(["--bogus"])).toThrow(ConfigurationError)
      expect(() => parseArgs(["--bogus"])).toThrow("unknown option '--bogus'")
    })

    it("rejects a flag missing its value", () => {
      expect(() => parseArgs(["--seed"])).toThrow("--seed requires a value")
      expect(() => parseArgs(["--games", "--traces"])).toThrow("--games requires a value")
    })
  })

  describe("argsToConfigInput", () => {
    it("lets flags override a config file only where given", () => {
      const fromFile = { seed: "file-seed", gamesPerStrategy: 20, recordTraces: true }
      const fromFlags = argsToConfigInput(parseArgs(["--games", "30"]))

      expect(mergeConfigInputs(fromFile, fromFlags)).toEqual({
        seed: "file-seed",
        gamesPerStrategy: 30,
        recordTraces: true,
      })
    })
  })

  describe("formatDuration", () => {
    it("formats milliseconds for durations under 1 second", () => {
      expect(formatDuration(0)).toBe("0ms")
      expect(formatDuration(999)).toBe("999ms")
    })

    it("formats seconds for durations under 1 minute", () => {
      expect(formatDuration(1500)).toBe("1.5s")
      expect(formatDuration(59999)).toBe("60.0s")
    })

    it("formats minutes for durations 1 minute or more", () => {
      expect(formatDuration(90000)).toBe("1.5m")
    })
  })

  describe("formatRoundRecord", () => {
    it("formats a round that shut tiles", () => {
      expect(
        formatRoundRecord({
          round: 1,
          openTiles: [1, 2, 3, 4, 5, 6, 7, 8, 9],
          roll: { d1: 3, d2: 4, total: 7 },
          legalMoveCount: 5,
          move: [3, 4],
        })
      ).toBe("    1  1 2 3 4 5 6 7 8 9  3+4=7   shut 3 4")
    })

    it("formats the final dead roll", () => {
      expect(
        formatRoundRecord({
          round: 12,
          openTiles: [9],
          roll: { d1: 6, d2: 6, total: 12 },
          legalMoveCount: 0,
          move: null,
        })
      ).toBe(`   12  9${" ".repeat(18)}6+6=12  no legal move`)
    })
  })

  describe("persistResults", () => {
    let tempDir: string

    beforeAll(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "stb-test-cli-"))
    })

    afterAll(() => {
      fs.rmSync(tempDir, { recursive: true, force: true })
    })

    it("writes the results and the CSV", () => {
      const log = jest.spyOn(console, "log").mockImplementation(() => undefined)
      const outputPath = path.join(tempDir, "ok", "results.json")
      const csvPath = path.join(tempDir, "ok", "results.csv")
      const config = createSimulationConfig({ seed: "persist-cli", outputPath, csvPath })

      expect(persistResults(config, SMALL_BATCH)).toBe(true)

      expect(readBatchResult(outputPath)).toEqual(SMALL_BATCH)
      expect(fs.readFileSync(csvPath, "utf-8")).toBe(formatResultsCsv(SMALL_BATCH))
      expect(log.mock.calls.map((call) => call[0])).toEqual([
        `Results written to ${outputPath}`,
        `CSV written to ${csvPath}`,
      ])
      log.mockRestore()
    })

    it("falls back to the temp directory and still writes the CSV", () => {
      const log = jest.spyOn(console, "log").mockImplementation(() => undefined)
      const error = jest.spyOn(console, "error").mockImplementation(() => undefined)
      const blocker = path.join(tempDir, "blocker")
      fs.writeFileSync(blocker, "not a directory", "utf-8")
      const fileName = `${path.basename(tempDir)}-results.json`
      const outputPath = path.join(blocker, fileName)
      const csvPath = path.join(tempDir, "fallback.csv")
      const fallbackPath = path.join(os.tmpdir(), fileName)
      const config = createSimulationConfig({ seed: "persist-cli", outputPath, csvPath })

      try {
        expect(persistResults(config, SMALL_BATCH)).toBe(false)

        expect(error).toHaveBeenCalledTimes(1)
        expect(String(error.mock.calls[0][0])).toContain(
          `Failed to write results to '${outputPath}'`
        )
        expect(readBatchResult(fallbackPath)).toEqual(SMALL_BATCH)
        expect(fs.readFileSync(csvPath, "utf-8")).toBe(formatResultsCsv(SMALL_BATCH))
        expect(log.mock.calls.map((call) => call[0])).toEqual([
          `Results written to ${fallbackPath}`,
          `CSV written to ${csvPath}`,
        ])
      } finally {
        fs.rmSync(fallbackPath, { force: true })
        log.mockRestore()
        error.mockRestore()
      }
    })
  })
})
