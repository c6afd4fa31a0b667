import type { CliArgs } from "./cli.js"

// CHANGE: define parser options, their defaults and the merging rules
// WHY: ensure CLI flags override the config file and defaults deterministically
// QUOTE(TZ): "CLI flags override the config file, which overrides defaults"
// REF: req-config-1
// SOURCE: n/a
// FORMAT THEOREM: ∀k: resolve(cli, cfg).k = cli.k ?? cfg.k ?? default(k)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: resolved maxDepth is an integer in [1, maxDepthCeiling]
// COMPLEXITY: O(1)/O(1)

/**
 * strict: a keyword must be followed by whitespace, a structural character or end of input.
 * legacy: a keyword is a fixed-length read; whatever follows is scanned as the next token.
 */
export type LiteralBoundary = "strict" | "legacy"

export interface ParseOptions {
  readonly maxDepth: number
  readonly literalBoundary: LiteralBoundary
}

export interface FileConfig {
  readonly maxDepth?: number
  readonly literalBoundary?: LiteralBoundary
}

export const defaultParseOptions: ParseOptions = {
  maxDepth: 512,
  literalBoundary: "strict"
}

// each nesting level costs two stack frames in the descent; deeper limits overflow the Node stack
export const maxDepthCeiling = 2048

export const isValidMaxDepth = (value: number): boolean =>
  Number.isInteger(value) && value > 0 && value <= maxDepthCeiling

const normalizeMaxDepth = (value: number | undefined): number => {
  if (value === undefined || Number.isNaN(value)) {
    return defaultParseOptions.maxDepth
  }
  return Math.min(Math.max(Math.trunc(value), 1), maxDepthCeiling)
}

/**
 * Fill the gaps of a partial options object with the defaults.
 * A missing or NaN maxDepth takes the default; any other value is truncated and clamped to [1, maxDepthCeiling].
 *
 * @pure true
 * @invariant isValidMaxDepth(withDefaults(o).maxDepth)
 */
export const withDefaults = (options: Partial<ParseOptions> | undefined): ParseOptions => ({
  maxDepth: normalizeMaxDepth(options?.maxDepth),
  literalBoundary: options?.literalBoundary ?? defaultParseOptions.literalBoundary
})

const resolveMaxDepth = (cli: CliArgs, fileConfig: FileConfig | undefined): number =>
  cli.maxDepth ?? fileConfig?.maxDepth ?? defaultParseOptions.maxDepth

const resolveLiteralBoundary = (cli: CliArgs, fileConfig: FileConfig | undefined): LiteralBoundary =>
  cli.legacyLiterals ? "legacy" : fileConfig?.literalBoundary ?? defaultParseOptions.literalBoundary

/**
 * Resolve the effective parser options from CLI flags, file config, and defaults.
 *
 * @param cli - Parsed CLI arguments.
 * @param fileConfig - Optional config loaded from .json-descent.json.
 * @returns Resolved options.
 *
 * @pure true
 * @invariant maxDepth ≥ 1 whenever both sources were validated
 * @complexity O(1)
 */
export const resolveParseOptions = (
  cli: CliArgs,
  fileConfig: FileConfig | undefined
): ParseOptions => ({
  maxDepth: resolveMaxDepth(cli, fileConfig),
  literalBoundary: resolveLiteralBoundary(cli, fileConfig)
})
