export type { FileConfig, LiteralBoundary, ParseOptions } from "./core/config.js"
export { defaultParseOptions, maxDepthCeiling } from "./core/config.js"
export { decodeJson } from "./core/decode.js"
export type { JsonError, StructureError, TokenizeError } from "./core/errors.js"
export { describeJsonError, formatJsonError } from "./core/errors.js"
export type { Json, JsonObject } from "./core/json.js"
export type { Parser } from "./core/parse.js"
export { makeParser, parseTokens } from "./core/parse.js"
export type { Position, Token, TokenSequence } from "./core/token.js"
export { tokenize } from "./core/tokenize.js"
export type {
  JsonArray,
  JsonBoolean,
  JsonNull,
  JsonNumber,
  JsonObjectValue,
  JsonString,
  JsonValue,
  JsonValueKind
} from "./core/value.js"
export { toJson } from "./core/value.js"
