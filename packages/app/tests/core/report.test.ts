import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import { decodeJson } from "../../src/core/decode.js"
import { buildReport, renderHumanReport, renderJsonReport, renderOutline, renderTokenListing } from "../../src/core/report.js"
import { tokenize } from "../../src/core/tokenize.js"
import type { JsonValue } from "../../src/core/value.js"

const tree = (text: string): JsonValue => {
  const result = decodeJson(text)
  if (Either.isLeft(result)) {
    throw new Error(result.left._tag)
  }
  return result.right
}

describe("buildReport", () => {
  it.effect("counts nodes per kind and container depth", () =>
    Effect.sync(() => {
      expect(buildReport(tree(`{"a": [1, "x", null], "b": {"c": true}}`))).toEqual({
        root: "Object",
        nodes: 7,
        maxDepth: 2,
        kinds: { Null: 1, Boolean: 1, Number: 1, String: 1, Array: 1, Object: 2 }
      })
    }))

  it.effect("reports depth 0 for a scalar root", () =>
    Effect.sync(() => {
      expect(buildReport(tree("5"))).toMatchObject({ root: "Number", nodes: 1, maxDepth: 0 })
    }))
})

describe("renderOutline", () => {
  it.effect("prints one node per line with sorted keys", () =>
    Effect.sync(() => {
      expect(renderOutline(tree(`{"b": [1, "x"], "a": null}`))).toBe(
        [
          "Object (2 members)",
          "  \"a\": Null",
          "  \"b\": Array (2 elements)",
          "    [0] Number 1",
          "    [1] String \"x\""
        ].join("\n")
      )
    }))

  it.effect("uses singular nouns for one child", () =>
    Effect.sync(() => {
      expect(renderOutline(tree(`[{"k": false}]`))).toBe(
        ["Array (1 element)", "  [0] Object (1 member)", "    \"k\": Boolean false"].join("\n")
      )
    }))
})

describe("renderHumanReport", () => {
  it.effect("appends stats and non-empty kinds", () =>
    Effect.sync(() => {
      const value = tree("[true, 2]")
      expect(renderHumanReport(value, buildReport(value))).toBe(
        [
          "Array (2 elements)",
          "  [0] Boolean true",
          "  [1] Number 2",
          "Stats: nodes=3, maxDepth=1",
          "Kinds: Boolean=1, Number=1, Array=1"
        ].join("\n")
      )
    }))
})

describe("renderJsonReport", () => {
  it.effect("emits the statistics only", () =>
    Effect.sync(() => {
      expect(JSON.parse(renderJsonReport(buildReport(tree(`"doc"`))))).toEqual({
        root: "String",
        nodes: 1,
        maxDepth: 0,
        kinds: { Null: 0, Boolean: 0, Number: 0, String: 1, Array: 0, Object: 0 }
      })
    }))
})

describe("renderTokenListing", () => {
  it.effect("lists tokens with their line and column", () =>
    Effect.sync(() => {
      const sequence = tokenize("[1]")
      expect(Either.isRight(sequence)).toBe(true)
      if (Either.isRight(sequence)) {
        expect(renderTokenListing(sequence.right)).toBe(
          "1:1\tLeftBracket\t'['\n1:2\tNumber\tnumber 1\n1:3\tRightBracket\t']'\nTokens: 3"
        )
      }
    }))
})
