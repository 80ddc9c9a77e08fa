// CHANGE: introduce the JSON value model shared by the normalizer and the query engine
// WHY: every recovered record and every query result is a plain, immutable JSON value
// QUOTE(TZ): "Object, Array, String, Number, Boolean, Null"
// REF: req-json-model-1
// SOURCE: n/a
// FORMAT THEOREM: ∀x ∈ Json: isJson(x) = true
// PURITY: CORE
// EFFECT: n/a
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

export type JsonArray = ReadonlyArray<Json>

export const isJsonObject = (value: Json): value is JsonObject =>
  typeof value === "object" && value !== null && !Array.isArray(value)

export const isJsonArray = (value: Json): value is JsonArray => Array.isArray(value)

export const isJsonContainer = (value: Json): value is JsonObject | JsonArray =>
  typeof value === "object" && value !== null

const isPlainRecord = (value: object): value is Record<string, unknown> => {
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

const isScalar = (value: unknown): boolean =>
  value === null ||
  typeof value === "boolean" ||
  typeof value === "string" ||
  typeof value === "number"

/**
 * Check that an unknown value is a JSON value.
 *
 * @param value - Any runtime value, typically the output of JSON.parse.
 * @returns true when the value (and everything nested in it) is Json.
 *
 * @pure true
 * @invariant traversal uses an explicit stack, nesting depth is not bounded by the call stack
 * @complexity O(n) where n = number of nested nodes
 */
export const isJson = (value: unknown): value is Json => {
  const pending: Array<unknown> = [value]
  while (pending.length > 0) {
    const current = pending.pop()
    if (isScalar(current)) {
      continue
    }
    if (Array.isArray(current)) {
      for (const item of current) {
        pending.push(item)
      }
      continue
    }
    if (typeof current !== "object" || current === null || !isPlainRecord(current)) {
      return false
    }
    for (const key of Object.keys(current)) {
      pending.push(current[key])
    }
  }
  return true
}
