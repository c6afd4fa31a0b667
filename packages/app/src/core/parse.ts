import * as Either from "effect/Either"

import type { ParseOptions } from "./config.js"
import { withDefaults } from "./config.js"
import type { StructureError } from "./errors.js"
import {
  expectedColon,
  expectedCommaOrBrace,
  expectedCommaOrBracket,
  keyMustBeString,
  maxDepthExceeded,
  trailingComma,
  unclosedArray,
  unclosedObject,
  unexpectedEndOfInput,
  unexpectedToken
} from "./errors.js"
import type { Position, Token, TokenSequence } from "./token.js"
import type { JsonValue } from "./value.js"
import { jsonArray, jsonBoolean, jsonNull, jsonNumber, jsonObject, jsonString } from "./value.js"

// CHANGE: build the value tree from tokens by recursive descent
// WHY: each grammar production maps to one function; nesting maps to recursion
// QUOTE(TZ): "recursive descent over the token sequence"
// REF: req-parse-1
// SOURCE: n/a
// FORMAT THEOREM: ∀seq: parse(seq) = Right(v) → every token of seq was consumed exactly once
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: the cursor only moves forward; a container succeeds only by consuming its closing token
// COMPLEXITY: O(n) time, O(d) stack where d ≤ maxDepth

export interface Parser {
  readonly parse: () => Either.Either<JsonValue, StructureError>
}

type Step<A> = Either.Either<A, StructureError>

interface Cursor {
  readonly peek: () => Token | undefined
  readonly advance: () => Token | undefined
  readonly end: Position
}

const makeCursor = (sequence: TokenSequence): Cursor => {
  let index = 0
  return {
    peek: () => sequence.tokens[index],
    advance: () => {
      const token = sequence.tokens[index]
      if (token !== undefined) {
        index += 1
      }
      return token
    },
    end: sequence.end
  }
}

const makeDescent = (cursor: Cursor, options: ParseOptions) => {
  const enter = (depth: number, opener: Token): Step<number> =>
    depth >= options.maxDepth
      ? Either.left(maxDepthExceeded(options.maxDepth, opener.position))
      : Either.right(depth + 1)

  const parseValue = (depth: number): Step<JsonValue> => {
    const token = cursor.peek()
    if (token === undefined) {
      return Either.left(unexpectedEndOfInput(cursor.end))
    }
    switch (token._tag) {
      case "LeftBrace":
        return parseObject(depth)
      case "LeftBracket":
        return parseArray(depth)
      case "String":
        cursor.advance()
        return Either.right(jsonString(token.value))
      case "Number":
        cursor.advance()
        return Either.right(jsonNumber(token.value))
      case "Boolean":
        cursor.advance()
        return Either.right(jsonBoolean(token.value))
      case "Null":
        cursor.advance()
        return Either.right(jsonNull)
      default:
        return Either.left(unexpectedToken(token))
    }
  }

  const parseObject = (depth: number): Step<JsonValue> => {
    const opener = cursor.advance()
    if (opener === undefined) {
      return Either.left(unexpectedEndOfInput(cursor.end))
    }
    const entered = enter(depth, opener)
    if (Either.isLeft(entered)) {
      return Either.left(entered.left)
    }
    const members = new Map<string, JsonValue>()
    let afterComma: Token | undefined
    for (let token = cursor.peek(); token !== undefined; token = cursor.peek()) {
      if (token._tag === "RightBrace") {
        if (afterComma !== undefined) {
          return Either.left(trailingComma("object", afterComma.position))
        }
        cursor.advance()
        return Either.right(jsonObject(members))
      }
      if (token._tag !== "String") {
        return Either.left(keyMustBeString(token))
      }
      cursor.advance()
      const colon = cursor.peek()
      if (colon === undefined) {
        return Either.left(unclosedObject(opener.position))
      }
      if (colon._tag !== "Colon") {
        return Either.left(expectedColon(colon))
      }
      cursor.advance()
      if (cursor.peek() === undefined) {
        return Either.left(unclosedObject(opener.position))
      }
      const member = parseValue(entered.right)
      if (Either.isLeft(member)) {
        return Either.left(member.left)
      }
      members.set(token.value, member.right)
      const separator = cursor.peek()
      if (separator === undefined) {
        break
      }
      if (separator._tag === "Comma") {
        afterComma = cursor.advance()
        continue
      }
      if (separator._tag !== "RightBrace") {
        return Either.left(expectedCommaOrBrace(separator))
      }
      afterComma = undefined
    }
    return Either.left(unclosedObject(opener.position))
  }

  const parseArray = (depth: number): Step<JsonValue> => {
    const opener = cursor.advance()
    if (opener === undefined) {
      return Either.left(unexpectedEndOfInput(cursor.end))
    }
    const entered = enter(depth, opener)
    if (Either.isLeft(entered)) {
      return Either.left(entered.left)
    }
    const items: Array<JsonValue> = []
    let afterComma: Token | undefined
    for (let token = cursor.peek(); token !== undefined; token = cursor.peek()) {
      if (token._tag === "RightBracket") {
        if (afterComma !== undefined) {
          return Either.left(trailingComma("array", afterComma.position))
        }
        cursor.advance()
        return Either.right(jsonArray(items))
      }
      const item = parseValue(entered.right)
      if (Either.isLeft(item)) {
        return Either.left(item.left)
      }
      items.push(item.right)
      const separator = cursor.peek()
      if (separator === undefined) {
        break
      }
      if (separator._tag === "Comma") {
        afterComma = cursor.advance()
        continue
      }
      if (separator._tag !== "RightBracket") {
        return Either.left(expectedCommaOrBracket(separator))
      }
      afterComma = undefined
    }
    return Either.left(unclosedArray(opener.position))
  }

  return { parseValue }
}

/**
 * Create a parser over a token sequence.
 *
 * @param sequence - Output of tokenize; the parser reads it without copying.
 * @param options - maxDepth bounds container nesting.
 * @returns Parser whose parse() consumes the whole sequence.
 *
 * @pure true
 * @invariant leftover tokens after the root value are an UnexpectedToken error
 * @complexity O(n)
 */
export const makeParser = (
  sequence: TokenSequence,
  options?: Partial<ParseOptions>
): Parser => ({
  parse: () => {
    const cursor = makeCursor(sequence)
    const root = makeDescent(cursor, withDefaults(options)).parseValue(0)
    if (Either.isLeft(root)) {
      return root
    }
    const leftover = cursor.peek()
    if (leftover !== undefined) {
      return Either.left(unexpectedToken(leftover))
    }
    return root
  }
})

export const parseTokens = (
  sequence: TokenSequence,
  options?: Partial<ParseOptions>
): Either.Either<JsonValue, StructureError> => makeParser(sequence, options).parse()
