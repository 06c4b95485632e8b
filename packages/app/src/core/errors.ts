import { Match } from "effect"

import type { CodingPath } from "./coding-path.js"
import { renderPath } from "./coding-path.js"

// CHANGE: unify the failure algebra for decoding and its shell
// WHY: failures are values propagated unchanged through every combinator
// FORMAT THEOREM: ∀e ∈ DecodeError: e._tag is stable and exhaustively matchable
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: error tags are unique; every non-parse failure carries its path
// COMPLEXITY: O(1)/O(1)

export type ParseError = { readonly _tag: "ParseError"; readonly message: string }
export type TypeMismatch = {
  readonly _tag: "TypeMismatch"
  readonly path: CodingPath
  readonly expected: string
  readonly message: string
}
export type KeyNotFound = {
  readonly _tag: "KeyNotFound"
  readonly path: CodingPath
  readonly key: string
  readonly message: string
}
export type EndOfSequence = {
  readonly _tag: "EndOfSequence"
  readonly path: CodingPath
  readonly index: number
  readonly message: string
}

export type DecodeError = ParseError | TypeMismatch | KeyNotFound | EndOfSequence

export type FileError = { readonly _tag: "FileError"; readonly message: string }
export type ConfigError = { readonly _tag: "ConfigError"; readonly message: string }

export type DecodeFileError = DecodeError | FileError | ConfigError

export const parseError = (message: string): ParseError => ({
  _tag: "ParseError",
  message
})

export const typeMismatch = (path: CodingPath, expected: string, message: string): TypeMismatch => ({
  _tag: "TypeMismatch",
  path,
  expected,
  message
})

export const keyNotFound = (path: CodingPath, key: string): KeyNotFound => ({
  _tag: "KeyNotFound",
  path,
  key,
  message: `No value associated with key "${key}"`
})

export const endOfSequence = (path: CodingPath, index: number): EndOfSequence => ({
  _tag: "EndOfSequence",
  path,
  index,
  message: `Unkeyed container is at end (index ${index})`
})

export const fileError = (message: string): FileError => ({
  _tag: "FileError",
  message
})

export const configError = (message: string): ConfigError => ({
  _tag: "ConfigError",
  message
})

/**
 * Render any failure as a single diagnostic line.
 *
 * @pure true
 * @invariant path-carrying failures start with their rendered path
 * @complexity O(n) where n = path length
 */
export const renderDecodeError = (error: DecodeFileError): string =>
  Match.value(error).pipe(
    Match.tag("ParseError", (e) => `Invalid input: ${e.message}`),
    Match.tag("TypeMismatch", (e) => `${renderPath(e.path)}: expected ${e.expected}: ${e.message}`),
    Match.tag("KeyNotFound", (e) => `${renderPath(e.path)}: ${e.message}`),
    Match.tag("EndOfSequence", (e) => `${renderPath(e.path)}: ${e.message}`),
    Match.tag("FileError", (e) => `File error: ${e.message}`),
    Match.tag("ConfigError", (e) => `Config error: ${e.message}`),
    Match.exhaustive
  )
