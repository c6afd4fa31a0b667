import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import { parseCliArgs } from "../../src/core/cli.js"

const argv = (...args: ReadonlyArray<string>): ReadonlyArray<string> => ["node", "json-descent", ...args]

describe("parseCliArgs", () => {
  it.effect("defaults to the parse command with no sources", () =>
    Effect.sync(() => {
      const parsed = parseCliArgs(argv())
      expect(Either.isRight(parsed) ? parsed.right : parsed.left).toEqual({
        command: "parse",
        inputPath: undefined,
        text: undefined,
        configPath: "./.json-descent.json",
        configPathExplicit: false,
        maxDepth: undefined,
        legacyLiterals: false,
        json: false,
        silent: false,
        verbose: false
      })
    }))

  it.effect("reads the command and value flags", () =>
    Effect.sync(() => {
      const parsed = parseCliArgs(argv("tokens", "--text", "-1", "--max-depth=4", "--config", "cfg.json", "--json"))
      expect(Either.isRight(parsed)).toBe(true)
      if (Either.isRight(parsed)) {
        expect(parsed.right).toMatchObject({
          command: "tokens",
          text: "-1",
          maxDepth: 4,
          configPath: "cfg.json",
          configPathExplicit: true,
          json: true
        })
      }
    }))

  it.effect("rejects invalid input", () =>
    Effect.sync(() => {
      const message = (args: ReadonlyArray<string>): string | undefined => {
        const parsed = parseCliArgs(argv(...args))
        return Either.isLeft(parsed) ? parsed.left.message : undefined
      }
      expect(message(["frobnicate"])).toBe("Unknown command: frobnicate")
      expect(message(["--bogus"])).toBe("Unknown flag: --bogus")
      expect(message(["parse", "extra"])).toBe("Unexpected positional argument: extra")
      expect(message(["--max-depth", "0"])).toBe("Invalid value for --max-depth: 0")
      expect(message(["--max-depth", "1000000"])).toBe("Invalid value for --max-depth: 1000000")
      expect(message(["--max-depth=2049"])).toBe("Invalid value for --max-depth: 2049")
      expect(message(["--verbose=false"])).toBe("Flag --verbose takes no value")
      expect(message(["--json=1"])).toBe("Flag --json takes no value")
      expect(message(["--input"])).toBe("Missing value for --input")
      expect(message(["--input", "a.json", "--text", "[]"])).toBe("--input and --text cannot be combined")
    }))
})

describe("parseCliArgs limits", () => {
  it.effect("accepts --max-depth up to the ceiling", () =>
    Effect.sync(() => {
      const parsed = parseCliArgs(argv("--max-depth", "2048", "--verbose"))
      expect(Either.isRight(parsed) ? [parsed.right.maxDepth, parsed.right.verbose] : undefined).toEqual([2048, true])
    }))
})
