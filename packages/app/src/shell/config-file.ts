import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as S from "@effect/schema/Schema"
import * as TreeFormatter from "@effect/schema/TreeFormatter"
import * as Effect from "effect/Effect"
import * as Either from "effect/Either"
import { pipe } from "effect/Function"

import type { FileConfig } from "../core/config.js"
import { isValidMaxDepth, maxDepthCeiling } from "../core/config.js"
import { decodeJson } from "../core/decode.js"
import type { AppError } from "../core/errors.js"
import { configError, fileError, formatJsonError } from "../core/errors.js"
import { toJson } from "../core/value.js"

// CHANGE: decode .json-descent.json with this project's own parser plus schema validation
// WHY: keep boundary data typed and reject invalid config early
// QUOTE(TZ): "maxDepth and literalBoundary from .json-descent.json"
// REF: req-config-file-1
// SOURCE: n/a
// FORMAT THEOREM: ∀c: decode(c) = Right(cfg) → cfg fields have correct types
// PURITY: SHELL
// EFFECT: Effect<FileConfig | undefined, AppError, FileSystem>
// INVARIANT: a missing, non-explicit config yields undefined
// COMPLEXITY: O(n)

const RawConfigSchema = S.partial(
  S.Struct({
    maxDepth: S.Number.pipe(S.filter(isValidMaxDepth, { message: () => `maxDepth must be an integer between 1 and ${maxDepthCeiling}` })),
    literalBoundary: S.Literal("strict", "legacy")
  })
)

/**
 * Decode config file contents.
 *
 * @param raw - File contents.
 * @returns FileConfig or ConfigError; parse errors carry line and column.
 *
 * @pure true
 */
export const decodeConfig = (raw: string): Effect.Effect<FileConfig, AppError> => {
  const parsed = decodeJson(raw)
  if (Either.isLeft(parsed)) {
    return Effect.fail(configError(formatJsonError(parsed.left)))
  }
  return pipe(
    S.decodeUnknown(RawConfigSchema)(toJson(parsed.right)),
    Effect.map((config) => ({
      ...(config.maxDepth === undefined ? {} : { maxDepth: config.maxDepth }),
      ...(config.literalBoundary === undefined ? {} : { literalBoundary: config.literalBoundary })
    })),
    Effect.mapError((error) => configError(TreeFormatter.formatErrorSync(error)))
  )
}

export const loadConfigFile = (
  path: string,
  explicit: boolean
): Effect.Effect<FileConfig | undefined, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const exists = yield* _(
      fs.exists(path).pipe(Effect.mapError((error) => fileError(String(error))))
    )
    if (!exists) {
      if (explicit) {
        return yield* _(Effect.fail(fileError(`Config file not found: ${path}`)))
      }
      return
    }
    const contents = yield* _(
      fs.readFileString(path).pipe(Effect.mapError((error) => fileError(String(error))))
    )
    yield* _(Effect.logDebug(`loaded config from ${path}`))
    return yield* _(decodeConfig(contents))
  })
