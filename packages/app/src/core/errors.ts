import { Match } from "effect"

import type { CliError } from "./cli.js"
import type { Position, Token } from "./token.js"
import { describeToken } from "./token.js"

// CHANGE: unify the error algebra for the tokenizer, the parser and the CLI shell
// WHY: provide typed failures that carry the offending position and map to exit codes
// QUOTE(TZ): "every error carries its position"
// REF: req-errors-1
// SOURCE: n/a
// FORMAT THEOREM: ∀e ∈ JsonError: e._tag is stable and exhaustively matchable
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: error tags are unique; every JsonError has a position
// COMPLEXITY: O(1)/O(1)

export type InvalidEscape = { readonly _tag: "InvalidEscape"; readonly escape: string; readonly position: Position }
export type InvalidNumber = { readonly _tag: "InvalidNumber"; readonly text: string; readonly position: Position }
export type UnexpectedCharacter = {
  readonly _tag: "UnexpectedCharacter"
  readonly character: string
  readonly position: Position
}
export type LiteralKeyword = "true" | "false" | "null"
export type ExpectedLiteral = {
  readonly _tag: "ExpectedLiteral"
  readonly literal: LiteralKeyword
  readonly position: Position
}
export type UnterminatedString = { readonly _tag: "UnterminatedString"; readonly position: Position }
export type UnexpectedEndOfInput = { readonly _tag: "UnexpectedEndOfInput"; readonly position: Position }
export type UnexpectedToken = { readonly _tag: "UnexpectedToken"; readonly token: Token; readonly position: Position }
export type KeyMustBeString = { readonly _tag: "KeyMustBeString"; readonly token: Token; readonly position: Position }
export type ExpectedColon = { readonly _tag: "ExpectedColon"; readonly token: Token; readonly position: Position }
export type ExpectedCommaOrBrace = {
  readonly _tag: "ExpectedCommaOrBrace"
  readonly token: Token
  readonly position: Position
}
export type ExpectedCommaOrBracket = {
  readonly _tag: "ExpectedCommaOrBracket"
  readonly token: Token
  readonly position: Position
}
export type UnclosedObject = { readonly _tag: "UnclosedObject"; readonly position: Position }
export type UnclosedArray = { readonly _tag: "UnclosedArray"; readonly position: Position }
export type TrailingComma = {
  readonly _tag: "TrailingComma"
  readonly container: "object" | "array"
  readonly position: Position
}
export type MaxDepthExceeded = { readonly _tag: "MaxDepthExceeded"; readonly limit: number; readonly position: Position }

export type TokenizeError =
  | InvalidEscape
  | InvalidNumber
  | UnexpectedCharacter
  | ExpectedLiteral
  | UnterminatedString

export type StructureError =
  | UnexpectedEndOfInput
  | UnexpectedToken
  | KeyMustBeString
  | ExpectedColon
  | ExpectedCommaOrBrace
  | ExpectedCommaOrBracket
  | UnclosedObject
  | UnclosedArray
  | TrailingComma
  | MaxDepthExceeded

export type JsonError = TokenizeError | StructureError

export const invalidEscape = (escape: string, position: Position): InvalidEscape => ({
  _tag: "InvalidEscape",
  escape,
  position
})

export const invalidNumber = (text: string, position: Position): InvalidNumber => ({
  _tag: "InvalidNumber",
  text,
  position
})

export const unexpectedCharacter = (character: string, position: Position): UnexpectedCharacter => ({
  _tag: "UnexpectedCharacter",
  character,
  position
})

export const expectedLiteral = (literal: LiteralKeyword, position: Position): ExpectedLiteral => ({
  _tag: "ExpectedLiteral",
  literal,
  position
})

export const unterminatedString = (position: Position): UnterminatedString => ({
  _tag: "UnterminatedString",
  position
})

export const unexpectedEndOfInput = (position: Position): UnexpectedEndOfInput => ({
  _tag: "UnexpectedEndOfInput",
  position
})

export const unexpectedToken = (token: Token): UnexpectedToken => ({
  _tag: "UnexpectedToken",
  token,
  position: token.position
})

export const keyMustBeString = (token: Token): KeyMustBeString => ({
  _tag: "KeyMustBeString",
  token,
  position: token.position
})

export const expectedColon = (token: Token): ExpectedColon => ({
  _tag: "ExpectedColon",
  token,
  position: token.position
})

export const expectedCommaOrBrace = (token: Token): ExpectedCommaOrBrace => ({
  _tag: "ExpectedCommaOrBrace",
  token,
  position: token.position
})

export const expectedCommaOrBracket = (token: Token): ExpectedCommaOrBracket => ({
  _tag: "ExpectedCommaOrBracket",
  token,
  position: token.position
})

export const unclosedObject = (position: Position): UnclosedObject => ({ _tag: "UnclosedObject", position })

export const unclosedArray = (position: Position): UnclosedArray => ({ _tag: "UnclosedArray", position })

export const trailingComma = (container: "object" | "array", position: Position): TrailingComma => ({
  _tag: "TrailingComma",
  container,
  position
})

export const maxDepthExceeded = (limit: number, position: Position): MaxDepthExceeded => ({
  _tag: "MaxDepthExceeded",
  limit,
  position
})

/**
 * Describe a JsonError without its location.
 *
 * @pure true
 * @invariant every tag has exactly one message
 */
export const describeJsonError = (error: JsonError): string =>
  Match.value(error).pipe(
    Match.tag("InvalidEscape", (e) => `invalid escape sequence '\\${e.escape}'`),
    Match.tag("InvalidNumber", (e) => `invalid number '${e.text}'`),
    Match.tag("UnexpectedCharacter", (e) => `unexpected character '${e.character}'`),
    Match.tag("ExpectedLiteral", (e) => `expected '${e.literal}'`),
    Match.tag("UnterminatedString", () => "string not closed"),
    Match.tag("UnexpectedEndOfInput", () => "unexpected end of input"),
    Match.tag("UnexpectedToken", (e) => `unexpected token ${describeToken(e.token)}`),
    Match.tag("KeyMustBeString", (e) => `key must be string, found ${describeToken(e.token)}`),
    Match.tag("ExpectedColon", (e) => `expected ':' after key, found ${describeToken(e.token)}`),
    Match.tag("ExpectedCommaOrBrace", (e) => `expected ',' or '}', found ${describeToken(e.token)}`),
    Match.tag("ExpectedCommaOrBracket", (e) => `expected ',' or ']', found ${describeToken(e.token)}`),
    Match.tag("UnclosedObject", () => "object not closed"),
    Match.tag("UnclosedArray", () => "array not closed"),
    Match.tag("TrailingComma", (e) => `trailing comma in ${e.container}`),
    Match.tag("MaxDepthExceeded", (e) => `nesting deeper than ${e.limit} levels`),
    Match.exhaustive
  )

/**
 * Render a JsonError as a single line: message plus 1-based line and column.
 *
 * @pure true
 */
export const formatJsonError = (error: JsonError): string =>
  `${describeJsonError(error)} at line ${error.position.line}, column ${error.position.column}`

export type ConfigError = { readonly _tag: "ConfigError"; readonly message: string }
export type FileError = { readonly _tag: "FileError"; readonly message: string }
export type DocumentError = { readonly _tag: "DocumentError"; readonly source: string; readonly error: JsonError }

export type AppError = CliError | ConfigError | FileError | DocumentError

export const configError = (message: string): ConfigError => ({
  _tag: "ConfigError",
  message
})

export const fileError = (message: string): FileError => ({
  _tag: "FileError",
  message
})

export const documentError = (source: string, error: JsonError): DocumentError => ({
  _tag: "DocumentError",
  source,
  error
})

export const formatAppError = (error: AppError): string =>
  Match.value(error).pipe(
    Match.tag("CliError", (e) => e.message),
    Match.tag("ConfigError", (e) => `invalid config: ${e.message}`),
    Match.tag("FileError", (e) => e.message),
    Match.tag("DocumentError", (e) => `${e.source}: ${formatJsonError(e.error)}`),
    Match.exhaustive
  )
