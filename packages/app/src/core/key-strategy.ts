import type { KeyDecodingStrategy } from "./config.js"
import type { JsonObject } from "./json.js"

// CHANGE: map document keys onto coding keys according to the decoding strategy
// WHY: snake_case payloads decode against camelCase key tables without renaming
// FORMAT THEOREM: ∀s: convertFromSnakeCase(s) has no "_" between its first and last letter
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: the first document key converting to a name wins
// COMPLEXITY: O(n)/O(n)

const capitalize = (word: string): string =>
  word.length === 0 ? word : `${word.charAt(0).toUpperCase()}${word.slice(1).toLowerCase()}`

/**
 * Convert a snake_case key to camelCase.
 *
 * Leading and trailing underscores are kept, empty words between repeated
 * underscores are dropped, the first word is lowercased and later words are
 * capitalized. A key with a single word is returned unchanged.
 *
 * @example
 * convertFromSnakeCase("is_admin") // "isAdmin"
 * convertFromSnakeCase("_private_key_") // "_privateKey_"
 *
 * @pure true
 * @complexity O(n)
 */
export const convertFromSnakeCase = (key: string): string => {
  const first = key.search(/[^_]/u)
  if (first === -1) {
    return key
  }
  let last = key.length - 1
  while (last > first && key.charAt(last) === "_") {
    last -= 1
  }
  const core = key.slice(first, last + 1)
  const words = core.split("_").filter((word) => word.length > 0)
  const [head = "", ...tail] = words
  if (tail.length === 0) {
    return key
  }
  return `${key.slice(0, first)}${head.toLowerCase()}${tail.map(capitalize).join("")}${key.slice(last + 1)}`
}

export interface KeyIndex {
  readonly keys: ReadonlyArray<string>
  readonly lookup: (key: string) => string | undefined
}

/**
 * Index an object's keys so coding keys resolve to document keys.
 *
 * @returns Index whose `keys` are the converted names in document order.
 *
 * @pure true
 * @complexity O(n)
 */
export const indexKeys = (object: JsonObject, strategy: KeyDecodingStrategy): KeyIndex => {
  if (strategy === "useDefaultKeys") {
    const keys = Object.keys(object)
    return {
      keys,
      lookup: (key) => Object.prototype.hasOwnProperty.call(object, key) ? key : undefined
    }
  }
  const converted = new Map<string, string>()
  for (const documentKey of Object.keys(object)) {
    const name = convertFromSnakeCase(documentKey)
    if (!converted.has(name)) {
      converted.set(name, documentKey)
    }
  }
  return {
    keys: [...converted.keys()],
    lookup: (key) => converted.get(key)
  }
}
