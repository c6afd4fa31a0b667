import { Match } from "effect"
import * as Either from "effect/Either"

import { isValidMaxDepth } from "./config.js"

// CHANGE: implement deterministic CLI parsing for json-descent
// WHY: keep CLI decoding pure and testable at the boundary
// QUOTE(TZ): "json-descent [parse|tokens]"
// REF: req-cli-1
// SOURCE: n/a
// FORMAT THEOREM: ∀argv: parse(argv) = Right(args) → args.command ∈ Commands
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: unknown flags are rejected; --input and --text are mutually exclusive
// COMPLEXITY: O(n) where n = argv length

export type CliCommand = "parse" | "tokens"

export interface CliArgs {
  readonly command: CliCommand
  readonly inputPath: string | undefined
  readonly text: string | undefined
  readonly configPath: string
  readonly configPathExplicit: boolean
  readonly maxDepth: number | undefined
  readonly legacyLiterals: boolean
  readonly json: boolean
  readonly silent: boolean
  readonly verbose: boolean
}

export type CliError = { readonly _tag: "CliError"; readonly message: string }

const cliError = (message: string): CliError => ({ _tag: "CliError", message })

const isFlag = (value: string): boolean => value.startsWith("--")

const parseMaxDepth = (flagName: string, value: string): Either.Either<number, CliError> => {
  const parsed = Number(value)
  if (!/^[0-9]+$/.test(value) || !isValidMaxDepth(parsed)) {
    return Either.left(cliError(`Invalid value for --${flagName}: ${value}`))
  }
  return Either.right(parsed)
}

const parseCommand = (value: string): Either.Either<CliCommand, CliError> =>
  Match.value(value).pipe(
    Match.when("parse", () => Either.right<CliCommand>("parse")),
    Match.when("tokens", () => Either.right<CliCommand>("tokens")),
    Match.orElse(() => Either.left(cliError(`Unknown command: ${value}`)))
  )

export const defaultConfigPath = "./.json-descent.json"

const defaultArgs = (command: CliCommand): CliArgs => ({
  command,
  inputPath: undefined,
  text: undefined,
  configPath: defaultConfigPath,
  configPathExplicit: false,
  maxDepth: undefined,
  legacyLiterals: false,
  json: false,
  silent: false,
  verbose: false
})

interface ParsedFlag {
  readonly next: CliArgs
  readonly consumed: number
}

const readFlagValue = (
  flagName: string,
  inlineValue: string | undefined,
  nextValue: string | undefined
): Either.Either<string, CliError> => {
  if (inlineValue !== undefined) {
    return Either.right(inlineValue)
  }
  if (nextValue === undefined || isFlag(nextValue)) {
    return Either.left(cliError(`Missing value for --${flagName}`))
  }
  return Either.right(nextValue)
}

const parseSwitchFlag = (
  flagName: string,
  inlineValue: string | undefined,
  next: CliArgs
): Either.Either<ParsedFlag, CliError> =>
  inlineValue === undefined
    ? Either.right({ next, consumed: 1 })
    : Either.left(cliError(`Flag --${flagName} takes no value`))

const parseValueFlag = (
  flagName: string,
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined,
  update: (args: CliArgs, value: string) => Either.Either<CliArgs, CliError>
): Either.Either<ParsedFlag, CliError> =>
  Either.flatMap(readFlagValue(flagName, inlineValue, nextValue), (value) =>
    Either.map(update(current, value), (next) => ({
      next,
      consumed: inlineValue === undefined ? 2 : 1
    })))

type FlagParser = (
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined
) => Either.Either<ParsedFlag, CliError>

const flagParsers: Record<string, FlagParser> = {
  json: (current, inlineValue) => parseSwitchFlag("json", inlineValue, { ...current, json: true }),
  silent: (current, inlineValue) => parseSwitchFlag("silent", inlineValue, { ...current, silent: true }),
  verbose: (current, inlineValue) => parseSwitchFlag("verbose", inlineValue, { ...current, verbose: true }),
  "legacy-literals": (current, inlineValue) =>
    parseSwitchFlag("legacy-literals", inlineValue, { ...current, legacyLiterals: true }),
  input: (current, inlineValue, nextValue) =>
    parseValueFlag("input", current, inlineValue, nextValue, (args, value) =>
      args.text === undefined
        ? Either.right({ ...args, inputPath: value })
        : Either.left(cliError("--input and --text cannot be combined"))),
  text: (current, inlineValue, nextValue) =>
    parseValueFlag("text", current, inlineValue, nextValue, (args, value) =>
      args.inputPath === undefined
        ? Either.right({ ...args, text: value })
        : Either.left(cliError("--input and --text cannot be combined"))),
  config: (current, inlineValue, nextValue) =>
    parseValueFlag("config", current, inlineValue, nextValue, (args, value) =>
      Either.right({
        ...args,
        configPath: value,
        configPathExplicit: true
      })),
  "max-depth": (current, inlineValue, nextValue) =>
    parseValueFlag("max-depth", current, inlineValue, nextValue, (args, value) =>
      Either.map(parseMaxDepth("max-depth", value), (maxDepth) => ({ ...args, maxDepth })))
}

const parseFlag = (
  raw: string,
  nextValue: string | undefined,
  current: CliArgs
): Either.Either<ParsedFlag, CliError> => {
  const separator = raw.indexOf("=")
  const name = separator === -1 ? raw.slice(2) : raw.slice(2, separator)
  const inlineValue = separator === -1 ? undefined : raw.slice(separator + 1)
  const parser = Object.prototype.hasOwnProperty.call(flagParsers, name) ? flagParsers[name] : undefined
  if (parser === undefined) {
    return Either.left(cliError(`Unknown flag: --${name}`))
  }
  return parser(current, inlineValue, nextValue)
}

interface ParsedCommand {
  readonly command: CliCommand
  readonly startIndex: number
}

const parseCommandFromArgs = (
  rawArgs: ReadonlyArray<string>
): Either.Either<ParsedCommand, CliError> => {
  const first = rawArgs[0]
  if (first === undefined || isFlag(first)) {
    return Either.right({ command: "parse", startIndex: 0 })
  }
  return Either.map(parseCommand(first), (command) => ({ command, startIndex: 1 }))
}

const parseFlags = (
  rawArgs: ReadonlyArray<string>,
  startIndex: number,
  initial: CliArgs
): Either.Either<CliArgs, CliError> => {
  let args = initial
  let index = startIndex
  while (index < rawArgs.length) {
    const current = rawArgs[index]
    if (current === undefined) {
      return Either.left(cliError("Unexpected end of arguments"))
    }
    if (!isFlag(current)) {
      return Either.left(cliError(`Unexpected positional argument: ${current}`))
    }
    const parsed = parseFlag(current, rawArgs[index + 1], args)
    if (Either.isLeft(parsed)) {
      return Either.left(parsed.left)
    }
    args = parsed.right.next
    index += parsed.right.consumed
  }
  return Either.right(args)
}

/**
 * Parse CLI arguments into a typed configuration.
 *
 * @param argv - Raw process.argv array.
 * @returns Either with parsed CliArgs or CliError.
 *
 * @pure true
 * @invariant command defaults to parse when omitted
 * @complexity O(n)
 */
export const parseCliArgs = (
  argv: ReadonlyArray<string>
): Either.Either<CliArgs, CliError> => {
  const rawArgs = argv.slice(2)
  const commandEither = parseCommandFromArgs(rawArgs)
  if (Either.isLeft(commandEither)) {
    return Either.left(commandEither.left)
  }
  const parsed = commandEither.right
  return parseFlags(rawArgs, parsed.startIndex, defaultArgs(parsed.command))
}
