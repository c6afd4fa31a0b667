import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import { decodeJson, defaultParseOptions, formatJsonError, makeParser, toJson, tokenize } from "../../src/index.js"

describe("public entry point", () => {
  it.effect("runs the two stages separately or through decodeJson", () =>
    Effect.sync(() => {
      const text = `{"list": [1, 2.5, "three"], "ok": true}`
      const sequence = tokenize(text)
      expect(Either.isRight(sequence)).toBe(true)
      if (Either.isRight(sequence)) {
        const staged = makeParser(sequence.right, defaultParseOptions).parse()
        const direct = decodeJson(text)
        expect(Either.isRight(staged) ? toJson(staged.right) : undefined).toEqual({ list: [1, 2.5, "three"], ok: true })
        expect(Either.isRight(direct) ? toJson(direct.right) : undefined).toEqual({ list: [1, 2.5, "three"], ok: true })
      }
    }))

  it.effect("never returns a partial tree", () =>
    Effect.sync(() => {
      const result = decodeJson(`{"a": [1, 2`)
      expect(Either.isLeft(result) ? formatJsonError(result.left) : undefined).toBe(
        "array not closed at line 1, column 7"
      )
    }))
})
