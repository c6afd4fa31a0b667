// CHANGE: define the lexical token algebra shared by the tokenizer and the parser
// WHY: the parser depends only on this module, never on the scanner itself
// QUOTE(TZ): "structural symbols and value tokens with positions"
// REF: req-token-1
// SOURCE: n/a
// PURITY: CORE
// INVARIANT: every token carries the position of its first character
// COMPLEXITY: O(1)/O(1)

export interface Position {
  readonly offset: number
  readonly line: number
  readonly column: number
}

export type LeftBrace = { readonly _tag: "LeftBrace"; readonly position: Position }
export type RightBrace = { readonly _tag: "RightBrace"; readonly position: Position }
export type LeftBracket = { readonly _tag: "LeftBracket"; readonly position: Position }
export type RightBracket = { readonly _tag: "RightBracket"; readonly position: Position }
export type Colon = { readonly _tag: "Colon"; readonly position: Position }
export type Comma = { readonly _tag: "Comma"; readonly position: Position }
export type StringToken = { readonly _tag: "String"; readonly value: string; readonly position: Position }
export type NumberToken = { readonly _tag: "Number"; readonly value: number; readonly position: Position }
export type BooleanToken = { readonly _tag: "Boolean"; readonly value: boolean; readonly position: Position }
export type NullToken = { readonly _tag: "Null"; readonly position: Position }

export type StructuralToken = LeftBrace | RightBrace | LeftBracket | RightBracket | Colon | Comma

export type Token = StructuralToken | StringToken | NumberToken | BooleanToken | NullToken

export interface TokenSequence {
  readonly tokens: ReadonlyArray<Token>
  readonly end: Position
}

const structuralBySymbol = {
  "{": "LeftBrace",
  "}": "RightBrace",
  "[": "LeftBracket",
  "]": "RightBracket",
  ":": "Colon",
  ",": "Comma"
} as const satisfies Record<string, StructuralToken["_tag"]>

export type StructuralSymbol = keyof typeof structuralBySymbol

export const isStructuralSymbol = (char: string): char is StructuralSymbol =>
  Object.prototype.hasOwnProperty.call(structuralBySymbol, char)

export const structuralToken = (symbol: StructuralSymbol, position: Position): StructuralToken => ({
  _tag: structuralBySymbol[symbol],
  position
})

export const stringToken = (value: string, position: Position): StringToken => ({
  _tag: "String",
  value,
  position
})

export const numberToken = (value: number, position: Position): NumberToken => ({
  _tag: "Number",
  value,
  position
})

export const booleanToken = (value: boolean, position: Position): BooleanToken => ({
  _tag: "Boolean",
  value,
  position
})

export const nullToken = (position: Position): NullToken => ({ _tag: "Null", position })

const symbolByTag: Record<StructuralToken["_tag"], StructuralSymbol> = {
  LeftBrace: "{",
  RightBrace: "}",
  LeftBracket: "[",
  RightBracket: "]",
  Colon: ":",
  Comma: ","
}

/**
 * Short human-readable description of a token, used in error messages
 * and in the token listing.
 *
 * @pure true
 */
export const describeToken = (token: Token): string => {
  switch (token._tag) {
    case "String":
      return `string ${JSON.stringify(token.value)}`
    case "Number":
      return `number ${String(token.value)}`
    case "Boolean":
      return `boolean ${String(token.value)}`
    case "Null":
      return "null"
    default:
      return `'${symbolByTag[token._tag]}'`
  }
}
