import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Effect } from "effect"

import { formatAppError } from "../core/errors.js"
import { runCli } from "./program.js"

// CHANGE: wire the CLI program into the Node runtime with proper teardown
// WHY: execute effects with platform services and typed error handling
// QUOTE(TZ): "exit code 1 on any failure"
// REF: req-main-1
// SOURCE: n/a
// FORMAT THEOREM: runMain(program) exits with 0 on success and 1 on any AppError
// PURITY: SHELL
// EFFECT: Effect<void, never, NodeContext>
// INVARIANT: every AppError is printed to stderr and yields exit code 1
// COMPLEXITY: O(1)

const main = runCli(process.argv).pipe(
  Effect.asVoid,
  Effect.catchAll((error) =>
    Effect.sync(() => {
      process.stderr.write(`json-descent: ${formatAppError(error)}\n`)
      process.exitCode = 1
    })
  )
)

NodeRuntime.runMain(Effect.provide(main, NodeContext.layer))
