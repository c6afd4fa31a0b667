import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Effect, Logger, LogLevel, Match } from "effect"
import * as Either from "effect/Either"

import type { CliArgs } from "../core/cli.js"
import { parseCliArgs } from "../core/cli.js"
import type { ParseOptions } from "../core/config.js"
import { resolveParseOptions } from "../core/config.js"
import type { AppError } from "../core/errors.js"
import { documentError } from "../core/errors.js"
import { parseTokens } from "../core/parse.js"
import { buildReport, renderHumanReport, renderJsonReport, renderTokenListing } from "../core/report.js"
import type { Report } from "../core/report.js"
import type { TokenSequence } from "../core/token.js"
import { tokenize } from "../core/tokenize.js"
import type { JsonValue } from "../core/value.js"
import { loadConfigFile } from "../shell/config-file.js"
import type { DocumentSource } from "../shell/input.js"
import { readDocument } from "../shell/input.js"

// CHANGE: orchestrate the CLI commands with functional core + imperative shell
// WHY: enforce a single entrypoint with typed errors and deterministic outputs
// QUOTE(TZ): "parse or list the tokens of a document"
// REF: req-program-1
// SOURCE: n/a
// FORMAT THEOREM: ∀cmd: run(cmd) fails ⇔ some stage returned an AppError
// PURITY: SHELL
// EFFECT: Effect<ProgramResult, AppError, FileSystem>
// INVARIANT: output is emitted at most once, and only after the whole pipeline succeeded
// COMPLEXITY: O(n)

export interface ProgramResult {
  readonly command: CliArgs["command"]
  readonly output: string
}

const writeStdout = (payload: string): Effect.Effect<void> =>
  Effect.sync(() => {
    process.stdout.write(payload.endsWith("\n") ? payload : `${payload}\n`)
  })

const fromEither = <A, E>(either: Either.Either<A, E>): Effect.Effect<A, E> =>
  either._tag === "Left" ? Effect.fail(either.left) : Effect.succeed(either.right)

const scanDocument = (
  source: DocumentSource,
  options: ParseOptions
): Effect.Effect<TokenSequence, AppError> =>
  fromEither(tokenize(source.text, options)).pipe(
    Effect.mapError((error) => documentError(source.label, error)),
    Effect.tap((sequence) => Effect.logDebug(`scanned ${sequence.tokens.length} tokens from ${source.label}`))
  )

const parseDocument = (
  source: DocumentSource,
  sequence: TokenSequence,
  options: ParseOptions
): Effect.Effect<JsonValue, AppError> =>
  fromEither(parseTokens(sequence, options)).pipe(
    Effect.mapError((error) => documentError(source.label, error))
  )

const renderParse = (value: JsonValue, report: Report, json: boolean): string =>
  json ? renderJsonReport(report) : renderHumanReport(value, report)

const handleParse = (
  cli: CliArgs,
  source: DocumentSource,
  options: ParseOptions
): Effect.Effect<string, AppError> =>
  Effect.gen(function*(_) {
    const sequence = yield* _(scanDocument(source, options))
    const value = yield* _(parseDocument(source, sequence, options))
    const report = buildReport(value)
    yield* _(Effect.logDebug(`parsed ${report.nodes} nodes, max depth ${report.maxDepth}`))
    return renderParse(value, report, cli.json)
  })

const handleTokens = (
  source: DocumentSource,
  options: ParseOptions
): Effect.Effect<string, AppError> =>
  Effect.map(scanDocument(source, options), renderTokenListing)

const executeCommand = (
  cli: CliArgs,
  source: DocumentSource,
  options: ParseOptions
): Effect.Effect<string, AppError> =>
  Match.value(cli.command).pipe(
    Match.when("parse", () => handleParse(cli, source, options)),
    Match.when("tokens", () => handleTokens(source, options)),
    Match.exhaustive
  )

const runParsedCli = (
  cli: CliArgs
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fileConfig = yield* _(loadConfigFile(cli.configPath, cli.configPathExplicit))
    const options = resolveParseOptions(cli, fileConfig)
    yield* _(Effect.logDebug(`maxDepth=${options.maxDepth}, literalBoundary=${options.literalBoundary}`))
    const source = yield* _(readDocument(cli))
    const output = yield* _(executeCommand(cli, source, options))
    if (!cli.silent) {
      yield* _(writeStdout(output))
    }
    return { command: cli.command, output }
  })

/**
 * Run CLI program with the provided argv.
 *
 * @param argv - process.argv array.
 * @returns ProgramResult with the rendered output.
 *
 * @pure false
 * @effect FileSystem, stdout, Logger (debug level under --verbose)
 * @invariant output is deterministic for fixed inputs
 * @complexity O(n)
 */
export const runCli = (
  argv: ReadonlyArray<string>
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.flatMap(fromEither(parseCliArgs(argv)), (cli) =>
    runParsedCli(cli).pipe(Logger.withMinimumLogLevel(cli.verbose ? LogLevel.Debug : LogLevel.Info)))
