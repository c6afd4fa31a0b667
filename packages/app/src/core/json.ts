// CHANGE: keep a plain JSON domain type for handing parsed trees to ordinary code
// WHY: callers that do not want to match on tags still get a closed, typed shape
// QUOTE(TZ): "plain JSON view of the value tree"
// REF: req-value-2
// SOURCE: n/a
// PURITY: CORE
// INVARIANT: Json is closed under array/object nesting with primitive leaves
// COMPLEXITY: O(1)/O(1)

export type Json =
  | null
  | boolean
  | number
  | string
  | ReadonlyArray<Json>
  | { readonly [key: string]: Json }

export type JsonObject = { readonly [key: string]: Json }
