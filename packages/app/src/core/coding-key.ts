// CHANGE: model string-backed field identifiers for keyed access
// WHY: a schema names each field once and reuses the table across decodings
// FORMAT THEOREM: ∀t: codingKeys(t)[k] = t[k]
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: key tables are frozen after construction
// COMPLEXITY: O(n)/O(n)

export type CodingKey = string

export type CodingKeys<Keys extends Readonly<Record<string, CodingKey>>> = Readonly<Keys>

/**
 * Build a frozen key table mapping property names to wire names.
 *
 * @example
 * const UserKeys = codingKeys({ id: "id", ageInYears: "age", isAdmin: "is_admin" })
 * UserKeys.ageInYears // "age"
 *
 * @pure true
 * @invariant wire names should be unique within one table
 */
export const codingKeys = <const Keys extends Readonly<Record<string, CodingKey>>>(
  keys: Keys
): CodingKeys<Keys> => Object.freeze({ ...keys })

/**
 * List wire names that appear more than once in a key table, in first-seen order.
 *
 * @pure true
 * @complexity O(n)
 */
export const duplicateCodingKeys = (keys: Readonly<Record<string, CodingKey>>): ReadonlyArray<CodingKey> => {
  const seen = new Set<CodingKey>()
  const duplicates: Array<CodingKey> = []
  for (const value of Object.values(keys)) {
    if (seen.has(value) && !duplicates.includes(value)) {
      duplicates.push(value)
    }
    seen.add(value)
  }
  return duplicates
}
