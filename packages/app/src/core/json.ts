// CHANGE: introduce the structured value tree walked by decoders
// WHY: decoders only know object/array/scalar shapes, never JSON syntax
// FORMAT THEOREM: ∀x ∈ Json: isJsonObject(x) ⊕ isJsonArray(x) ⊕ isJsonScalar(x)
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

export type JsonScalar = null | boolean | number | string

/**
 * Check that an untyped value is a structured value tree.
 *
 * Walks with an explicit work list instead of recursion.
 *
 * @pure true
 * @complexity O(n) where n = number of nodes
 */
export const isJson = (value: unknown): value is Json => {
  const pending: Array<unknown> = [value]
  while (pending.length > 0) {
    const current = pending.pop()
    if (current === null || typeof current === "boolean" || typeof current === "string") {
      continue
    }
    if (typeof current === "number") {
      if (!Number.isFinite(current)) {
        return false
      }
      continue
    }
    if (typeof current !== "object") {
      return false
    }
    const children: ReadonlyArray<unknown> = Array.isArray(current) ? current : Object.values(current)
    for (const child of children) {
      pending.push(child)
    }
  }
  return true
}

export const isJsonObject = (value: Json): value is JsonObject =>
  typeof value === "object" && value !== null && !Array.isArray(value)

export const isJsonArray = (value: Json): value is JsonArray => Array.isArray(value)

export const isJsonScalar = (value: Json): value is JsonScalar =>
  value === null || typeof value !== "object"

export const describeShape = (value: Json): string => {
  if (value === null) {
    return "null"
  }
  if (isJsonArray(value)) {
    return "array"
  }
  return typeof value
}
