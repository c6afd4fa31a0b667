import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import type { CliArgs } from "../../src/core/cli.js"
import { parseCliArgs } from "../../src/core/cli.js"
import { defaultParseOptions, maxDepthCeiling, resolveParseOptions, withDefaults } from "../../src/core/config.js"

const cliFrom = (...args: ReadonlyArray<string>): CliArgs => {
  const parsed = parseCliArgs(["node", "json-descent", ...args])
  if (Either.isLeft(parsed)) {
    throw new Error(parsed.left.message)
  }
  return parsed.right
}

describe("resolveParseOptions", () => {
  it.effect("falls back to defaults", () =>
    Effect.sync(() => {
      expect(resolveParseOptions(cliFrom(), undefined)).toEqual({ maxDepth: 512, literalBoundary: "strict" })
      expect(resolveParseOptions(cliFrom(), {})).toEqual(defaultParseOptions)
    }))

  it.effect("prefers the config file over defaults", () =>
    Effect.sync(() => {
      expect(resolveParseOptions(cliFrom(), { maxDepth: 8, literalBoundary: "legacy" })).toEqual({
        maxDepth: 8,
        literalBoundary: "legacy"
      })
    }))

  it.effect("prefers CLI flags over the config file", () =>
    Effect.sync(() => {
      expect(resolveParseOptions(cliFrom("--max-depth", "3", "--legacy-literals"), { maxDepth: 8 })).toEqual({
        maxDepth: 3,
        literalBoundary: "legacy"
      })
    }))
})

describe("withDefaults", () => {
  it.effect("fills missing fields", () =>
    Effect.sync(() => {
      expect(withDefaults({ maxDepth: 2 })).toEqual({ maxDepth: 2, literalBoundary: "strict" })
      expect(withDefaults(undefined)).toEqual(defaultParseOptions)
    }))

  it.effect("keeps maxDepth within [1, maxDepthCeiling]", () =>
    Effect.sync(() => {
      expect(withDefaults({ maxDepth: Number.NaN }).maxDepth).toBe(512)
      expect(withDefaults({ maxDepth: Number.POSITIVE_INFINITY }).maxDepth).toBe(maxDepthCeiling)
      expect(withDefaults({ maxDepth: 1_000_000 }).maxDepth).toBe(2048)
      expect(withDefaults({ maxDepth: -3 }).maxDepth).toBe(1)
      expect(withDefaults({ maxDepth: 2.7 }).maxDepth).toBe(2)
    }))
})
