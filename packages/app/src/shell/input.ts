import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as Effect from "effect/Effect"

import type { CliArgs } from "../core/cli.js"
import type { AppError } from "../core/errors.js"
import { fileError } from "../core/errors.js"
import { sampleDocument } from "../core/sample.js"

// CHANGE: resolve the document text from --input, --text or the built-in sample
// WHY: isolate filesystem IO from the pure pipeline
// QUOTE(TZ): "read from --input, --text or the built-in sample"
// REF: req-input-1
// SOURCE: n/a
// PURITY: SHELL
// EFFECT: Effect<DocumentSource, AppError, FileSystem>
// INVARIANT: exactly one source is chosen
// COMPLEXITY: O(n)

export interface DocumentSource {
  readonly label: string
  readonly text: string
}

export const readDocument = (
  cli: CliArgs
): Effect.Effect<DocumentSource, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    if (cli.text !== undefined) {
      return { label: "<text>", text: cli.text }
    }
    const inputPath = cli.inputPath
    if (inputPath === undefined) {
      return { label: "<sample>", text: sampleDocument }
    }
    const fs = yield* _(FileSystem)
    const text = yield* _(
      fs.readFileString(inputPath).pipe(
        Effect.mapError((error) => fileError(`Cannot read ${inputPath}: ${String(error)}`))
      )
    )
    return { label: inputPath, text }
  })
