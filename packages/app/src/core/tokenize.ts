import * as Either from "effect/Either"

import type { LiteralBoundary, ParseOptions } from "./config.js"
import { withDefaults } from "./config.js"
import type { LiteralKeyword, TokenizeError } from "./errors.js"
import {
  expectedLiteral,
  invalidEscape,
  invalidNumber,
  unexpectedCharacter,
  unterminatedString
} from "./errors.js"
import type { Position, Token, TokenSequence } from "./token.js"
import {
  booleanToken,
  isStructuralSymbol,
  nullToken,
  numberToken,
  stringToken,
  structuralToken
} from "./token.js"

// CHANGE: scan JSON text into a flat token sequence with one character of lookahead
// WHY: the parser works on typed tokens and never touches raw characters
// QUOTE(TZ): "one character of lookahead"
// REF: req-tokenize-1
// SOURCE: n/a
// FORMAT THEOREM: ∀s: tokenize(s) = Right(seq) → seq.tokens are in source order
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: the first scanning failure aborts the whole pass; no partial sequence escapes
// COMPLEXITY: O(n) where n = input length

const simpleEscapes: Readonly<Record<string, string>> = {
  "\"": "\"",
  "\\": "\\",
  "/": "/",
  b: "\b",
  f: "\f",
  n: "\n",
  r: "\r",
  t: "\t"
}

const keywordByLead: Readonly<Record<string, LiteralKeyword>> = {
  t: "true",
  f: "false",
  n: "null"
}

const whitespacePattern = /^\s$/u
const digitPattern = /^[0-9]$/
const numberRunPattern = /^[0-9.eE+-]$/
const floatPattern = /^[+-]?(?:[0-9]+\.?[0-9]*|\.[0-9]+)(?:[eE][+-]?[0-9]+)?$/

const isWhitespace = (char: string): boolean => whitespacePattern.test(char)

const isDigit = (char: string): boolean => digitPattern.test(char)

/**
 * Forward-only character reader tracking line and column.
 * Characters are UTF-16 code units, which keeps offsets aligned with String#slice.
 */
interface Scanner {
  readonly peek: () => string | undefined
  readonly next: () => string | undefined
  readonly position: () => Position
}

const makeScanner = (text: string): Scanner => {
  let offset = 0
  let line = 1
  let column = 1
  const peek = (): string | undefined => (offset < text.length ? text.charAt(offset) : undefined)
  const next = (): string | undefined => {
    const char = peek()
    if (char === undefined) {
      return undefined
    }
    offset += 1
    if (char === "\n") {
      line += 1
      column = 1
    } else {
      column += 1
    }
    return char
  }
  return { peek, next, position: () => ({ offset, line, column }) }
}

const scanString = (scanner: Scanner, start: Position): Either.Either<Token, TokenizeError> => {
  scanner.next()
  let value = ""
  for (;;) {
    const at = scanner.position()
    const char = scanner.next()
    if (char === undefined) {
      return Either.left(unterminatedString(start))
    }
    if (char === "\"") {
      return Either.right(stringToken(value, start))
    }
    if (char !== "\\") {
      value += char
      continue
    }
    const escape = scanner.next()
    if (escape === undefined) {
      return Either.left(unterminatedString(start))
    }
    const decoded = simpleEscapes[escape]
    if (decoded === undefined) {
      return Either.left(invalidEscape(escape, at))
    }
    value += decoded
  }
}

const scanNumber = (scanner: Scanner, start: Position): Either.Either<Token, TokenizeError> => {
  let run = ""
  for (let char = scanner.peek(); char !== undefined && numberRunPattern.test(char); char = scanner.peek()) {
    run += char
    scanner.next()
  }
  if (!floatPattern.test(run)) {
    return Either.left(invalidNumber(run, start))
  }
  return Either.right(numberToken(Number(run), start))
}

const isLiteralBoundary = (char: string | undefined): boolean =>
  char === undefined || isWhitespace(char) || isStructuralSymbol(char)

const keywordToken = (keyword: LiteralKeyword, position: Position): Token => {
  switch (keyword) {
    case "true":
      return booleanToken(true, position)
    case "false":
      return booleanToken(false, position)
    case "null":
      return nullToken(position)
  }
}

const scanKeyword = (
  scanner: Scanner,
  keyword: LiteralKeyword,
  start: Position,
  boundary: LiteralBoundary
): Either.Either<Token, TokenizeError> => {
  let collected = ""
  for (let index = 0; index < keyword.length; index++) {
    const char = scanner.next()
    if (char === undefined) {
      break
    }
    collected += char
  }
  if (collected !== keyword) {
    return Either.left(expectedLiteral(keyword, start))
  }
  if (boundary === "strict" && !isLiteralBoundary(scanner.peek())) {
    return Either.left(expectedLiteral(keyword, start))
  }
  return Either.right(keywordToken(keyword, start))
}

/**
 * Scan JSON text into tokens.
 *
 * @param text - Whole document, already in memory.
 * @param options - literalBoundary decides whether `truefoo` is rejected outright.
 * @returns Either with the token sequence or the first scanning error.
 *
 * @pure true
 * @invariant escapes are decoded; \u is rejected as an invalid escape
 * @complexity O(n)
 */
export const tokenize = (
  text: string,
  options?: Partial<ParseOptions>
): Either.Either<TokenSequence, TokenizeError> => {
  const { literalBoundary } = withDefaults(options)
  const scanner = makeScanner(text)
  const tokens: Array<Token> = []
  for (let char = scanner.peek(); char !== undefined; char = scanner.peek()) {
    const start = scanner.position()
    if (isWhitespace(char)) {
      scanner.next()
      continue
    }
    if (isStructuralSymbol(char)) {
      scanner.next()
      tokens.push(structuralToken(char, start))
      continue
    }
    const keyword = keywordByLead[char]
    let scanned: Either.Either<Token, TokenizeError>
    if (char === "\"") {
      scanned = scanString(scanner, start)
    } else if (char === "-" || isDigit(char)) {
      scanned = scanNumber(scanner, start)
    } else if (keyword !== undefined) {
      scanned = scanKeyword(scanner, keyword, start, literalBoundary)
    } else {
      const codePoint = text.codePointAt(start.offset)
      return Either.left(unexpectedCharacter(codePoint === undefined ? char : String.fromCodePoint(codePoint), start))
    }
    if (Either.isLeft(scanned)) {
      return Either.left(scanned.left)
    }
    tokens.push(scanned.right)
  }
  return Either.right({ tokens, end: scanner.position() })
}
