import type { Json } from "./json.js"

// CHANGE: model the parsed document as a closed tagged union
// WHY: consumers match exhaustively on _tag instead of probing typeof
// QUOTE(TZ): "null, boolean, number, string, array, object"
// REF: req-value-1
// SOURCE: n/a
// PURITY: CORE
// INVARIANT: Array.items keeps source order; Object.members has unique keys
// COMPLEXITY: O(1)/O(1)

export type JsonNull = { readonly _tag: "Null" }
export type JsonBoolean = { readonly _tag: "Boolean"; readonly value: boolean }
export type JsonNumber = { readonly _tag: "Number"; readonly value: number }
export type JsonString = { readonly _tag: "String"; readonly value: string }
export type JsonArray = { readonly _tag: "Array"; readonly items: ReadonlyArray<JsonValue> }
export type JsonObjectValue = {
  readonly _tag: "Object"
  readonly members: ReadonlyMap<string, JsonValue>
}

export type JsonValue = JsonNull | JsonBoolean | JsonNumber | JsonString | JsonArray | JsonObjectValue

export type JsonValueKind = JsonValue["_tag"]

export const jsonNull: JsonNull = { _tag: "Null" }

export const jsonBoolean = (value: boolean): JsonBoolean => ({ _tag: "Boolean", value })

export const jsonNumber = (value: number): JsonNumber => ({ _tag: "Number", value })

export const jsonString = (value: string): JsonString => ({ _tag: "String", value })

export const jsonArray = (items: ReadonlyArray<JsonValue>): JsonArray => ({ _tag: "Array", items })

export const jsonObject = (members: ReadonlyMap<string, JsonValue>): JsonObjectValue => ({
  _tag: "Object",
  members
})

/**
 * Convert a value tree into plain JavaScript data.
 *
 * @param value - Parsed value tree.
 * @returns Equivalent Json; object members become own enumerable properties.
 *
 * @pure true
 * @invariant toJson never shares structure with the input tree
 * @complexity O(n) where n = number of nodes
 */
export const toJson = (value: JsonValue): Json => {
  switch (value._tag) {
    case "Null":
      return null
    case "Boolean":
    case "Number":
    case "String":
      return value.value
    case "Array":
      return value.items.map(toJson)
    case "Object": {
      const result: Record<string, Json> = {}
      for (const [key, member] of value.members) {
        Object.defineProperty(result, key, {
          value: toJson(member),
          enumerable: true,
          writable: true,
          configurable: true
        })
      }
      return result
    }
  }
}
