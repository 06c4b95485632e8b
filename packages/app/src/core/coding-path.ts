// CHANGE: track where in the document a decoder is positioned
// WHY: every failure reports the keys and indices traversed to reach it
// FORMAT THEOREM: ∀p,s: length(append(p, s)) = length(p) + 1
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: paths are immutable; appending never mutates the parent
// COMPLEXITY: O(n)/O(n)

export type PathSegment =
  | { readonly _tag: "Key"; readonly key: string }
  | { readonly _tag: "Index"; readonly index: number }

export type CodingPath = ReadonlyArray<PathSegment>

export const rootPath: CodingPath = []

export const keySegment = (key: string): PathSegment => ({ _tag: "Key", key })

export const indexSegment = (index: number): PathSegment => ({ _tag: "Index", index })

export const appendKey = (path: CodingPath, key: string): CodingPath => [...path, keySegment(key)]

export const appendIndex = (path: CodingPath, index: number): CodingPath => [...path, indexSegment(index)]

const identifier = /^[A-Za-z_$][\w$]*$/u

const renderSegment = (segment: PathSegment): string => {
  if (segment._tag === "Index") {
    return `[${segment.index}]`
  }
  return identifier.test(segment.key) ? `.${segment.key}` : `[${JSON.stringify(segment.key)}]`
}

/**
 * Render a coding path in JSONPath-like notation.
 *
 * @returns `$` for the root, otherwise e.g. `$.items[2].name` or `$["first name"]`.
 *
 * @pure true
 * @complexity O(n)
 */
export const renderPath = (path: CodingPath): string => `$${path.map(renderSegment).join("")}`
