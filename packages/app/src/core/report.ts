import { Match } from "effect"

import type { Token, TokenSequence } from "./token.js"
import { describeToken } from "./token.js"
import type { JsonValue, JsonValueKind } from "./value.js"

// CHANGE: build document statistics and render outline, token and JSON outputs
// WHY: keep reporting pure and deterministic across CLI commands
// QUOTE(TZ): "outline, token listing and statistics"
// REF: req-report-1
// SOURCE: n/a
// FORMAT THEOREM: ∀v: report(v).nodes = Σ kinds(v)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: object members are rendered in sorted key order
// COMPLEXITY: O(n log n)

export type KindCounts = Readonly<Record<JsonValueKind, number>>

export interface Report {
  readonly root: JsonValueKind
  readonly nodes: number
  readonly maxDepth: number
  readonly kinds: KindCounts
}

const kindOrder: ReadonlyArray<JsonValueKind> = ["Null", "Boolean", "Number", "String", "Array", "Object"]

const emptyCounts = (): Record<JsonValueKind, number> => ({
  Null: 0,
  Boolean: 0,
  Number: 0,
  String: 0,
  Array: 0,
  Object: 0
})

const compareStrings = (left: string, right: string): number => (left < right ? -1 : left > right ? 1 : 0)

const sortedMembers = (members: ReadonlyMap<string, JsonValue>): ReadonlyArray<readonly [string, JsonValue]> =>
  [...members.entries()].sort(([left], [right]) => compareStrings(left, right))

const childrenOf = (value: JsonValue): ReadonlyArray<JsonValue> => {
  if (value._tag === "Array") {
    return value.items
  }
  if (value._tag === "Object") {
    return [...value.members.values()]
  }
  return []
}

/**
 * Count nodes per kind and measure container nesting.
 *
 * @param value - Parsed value tree.
 * @returns Report; maxDepth is 0 for a scalar root, 1 for a flat container.
 *
 * @pure true
 * @invariant report.nodes equals the sum of report.kinds
 * @complexity O(n)
 */
export const buildReport = (value: JsonValue): Report => {
  const kinds = emptyCounts()
  let nodes = 0
  let maxDepth = 0
  const pending: Array<{ readonly node: JsonValue; readonly depth: number }> = [{ node: value, depth: 0 }]
  for (let entry = pending.pop(); entry !== undefined; entry = pending.pop()) {
    const { depth, node } = entry
    nodes += 1
    kinds[node._tag] += 1
    const isContainer = node._tag === "Array" || node._tag === "Object"
    const level = isContainer ? depth + 1 : depth
    maxDepth = Math.max(maxDepth, level)
    for (const child of childrenOf(node)) {
      pending.push({ node: child, depth: level })
    }
  }
  return { root: value._tag, nodes, maxDepth, kinds }
}

const pluralize = (count: number, noun: string): string => `${count} ${noun}${count === 1 ? "" : "s"}`

const describeNode = (value: JsonValue): string =>
  Match.value(value).pipe(
    Match.tag("Null", () => "Null"),
    Match.tag("Boolean", (node) => `Boolean ${String(node.value)}`),
    Match.tag("Number", (node) => `Number ${String(node.value)}`),
    Match.tag("String", (node) => `String ${JSON.stringify(node.value)}`),
    Match.tag("Array", (node) => `Array (${pluralize(node.items.length, "element")})`),
    Match.tag("Object", (node) => `Object (${pluralize(node.members.size, "member")})`),
    Match.exhaustive
  )

const outlineLines = (value: JsonValue, label: string, indent: string): ReadonlyArray<string> => {
  const head = `${indent}${label}${describeNode(value)}`
  const childIndent = `${indent}  `
  if (value._tag === "Array") {
    return [head, ...value.items.flatMap((item, index) => outlineLines(item, `[${index}] `, childIndent))]
  }
  if (value._tag === "Object") {
    return [
      head,
      ...sortedMembers(value.members).flatMap(([key, member]) =>
        outlineLines(member, `${JSON.stringify(key)}: `, childIndent)
      )
    ]
  }
  return [head]
}

/**
 * Render the value tree as an indented outline, one node per line.
 *
 * @pure true
 * @invariant the outline describes the tree; it is not JSON text
 */
export const renderOutline = (value: JsonValue): string => outlineLines(value, "", "").join("\n")

const formatToken = (token: Token): string =>
  `${token.position.line}:${token.position.column}\t${token._tag}\t${describeToken(token)}`

export const renderTokenListing = (sequence: TokenSequence): string =>
  [...sequence.tokens.map(formatToken), `Tokens: ${sequence.tokens.length}`].join("\n")

/**
 * Render a human-readable report: outline followed by statistics.
 *
 * @pure true
 */
export const renderHumanReport = (value: JsonValue, report: Report): string => {
  const kindSummary = kindOrder
    .filter((kind) => report.kinds[kind] > 0)
    .map((kind) => `${kind}=${report.kinds[kind]}`)
    .join(", ")
  return [
    renderOutline(value),
    `Stats: nodes=${report.nodes}, maxDepth=${report.maxDepth}`,
    `Kinds: ${kindSummary}`
  ].join("\n")
}

/**
 * Render report as JSON text.
 *
 * @pure true
 * @invariant only the statistics are emitted, never the document itself
 */
export const renderJsonReport = (report: Report): string =>
  JSON.stringify(
    {
      root: report.root,
      nodes: report.nodes,
      maxDepth: report.maxDepth,
      kinds: report.kinds
    },
    null,
    2
  )
