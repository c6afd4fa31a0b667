import * as Either from "effect/Either"

import type { ParseOptions } from "./config.js"
import type { JsonError } from "./errors.js"
import { parseTokens } from "./parse.js"
import { tokenize } from "./tokenize.js"
import type { JsonValue } from "./value.js"

/**
 * Decode JSON text into a value tree: tokenize, then parse.
 *
 * @param text - Whole document.
 * @param options - Shared by both stages.
 * @returns Either with the tree or the first error of either stage.
 *
 * @pure true
 * @complexity O(n)
 */
export const decodeJson = (
  text: string,
  options?: Partial<ParseOptions>
): Either.Either<JsonValue, JsonError> =>
  Either.flatMap(tokenize(text, options), (sequence): Either.Either<JsonValue, JsonError> =>
    parseTokens(sequence, options)
  )
