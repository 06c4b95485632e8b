import * as Schema from "@effect/schema/Schema"
import * as TreeFormatter from "@effect/schema/TreeFormatter"
import * as Either from "effect/Either"
import * as Option from "effect/Option"

import type { CodingKey } from "./coding-key.js"
import type { CodingPath } from "./coding-path.js"
import { appendIndex, appendKey, rootPath } from "./coding-path.js"
import type { DecoderConfig } from "./config.js"
import { defaultDecoderConfig } from "./config.js"
import type { DecodeError } from "./errors.js"
import { endOfSequence, keyNotFound, typeMismatch } from "./errors.js"
import type { Json, JsonArray, JsonObject, JsonScalar } from "./json.js"
import { describeShape, isJsonArray, isJsonObject, isJsonScalar } from "./json.js"
import { indexKeys } from "./key-strategy.js"

// CHANGE: expose a cursor over a structured value with keyed, sequential and scalar access
// WHY: decodings read through one narrow surface and never see the raw tree
// FORMAT THEOREM: ∀d: d.sequential() views share one cursor c with c(t+1) ≥ c(t)
// PURITY: CORE
// EFFECT: n/a (the sequential cursor is the only mutable state, local to one Decoder)
// INVARIANT: a failed read never advances the cursor
// COMPLEXITY: O(1) per access, O(k) to index an object with k keys

/** Type a primitive extracts; any schema whose decoding needs no services. */
export type Target<A, I> = Schema.Schema<A, I>

export interface KeyedView {
  readonly path: CodingPath
  readonly keys: ReadonlyArray<CodingKey>
  readonly contains: (key: CodingKey) => boolean
  readonly get: <A, I>(key: CodingKey, target: Target<A, I>) => Either.Either<A, DecodeError>
  readonly getOptional: <A, I>(
    key: CodingKey,
    target: Target<A, I>
  ) => Either.Either<Option.Option<A>, DecodeError>
  readonly nested: (key: CodingKey) => Either.Either<Decoder, DecodeError>
  readonly nestedOptional: (key: CodingKey) => Either.Either<Option.Option<Decoder>, DecodeError>
}

export interface SequentialView {
  readonly path: CodingPath
  readonly count: number
  readonly currentIndex: () => number
  readonly isAtEnd: () => boolean
  readonly next: <A, I>(target: Target<A, I>) => Either.Either<A, DecodeError>
  readonly nextDecoder: () => Either.Either<Decoder, DecodeError>
}

export interface ScalarView {
  readonly path: CodingPath
  readonly isNull: boolean
  readonly value: <A, I>(target: Target<A, I>) => Either.Either<A, DecodeError>
}

export interface Decoder {
  readonly path: CodingPath
  readonly config: DecoderConfig
  readonly keyed: () => Either.Either<KeyedView, DecodeError>
  readonly sequential: () => Either.Either<SequentialView, DecodeError>
  readonly scalar: () => Either.Either<ScalarView, DecodeError>
}

const shapeMismatch = (path: CodingPath, expected: string, value: Json): DecodeError =>
  typeMismatch(path, expected, `Expected ${expected} but found ${describeShape(value)} instead`)

/**
 * Decode one value against a target schema, mapping schema failures to TypeMismatch.
 *
 * @pure true
 * @complexity O(n) where n = size of value
 */
export const extract = <A, I>(
  value: Json,
  target: Target<A, I>,
  path: CodingPath
): Either.Either<A, DecodeError> =>
  Either.mapLeft(
    Schema.decodeUnknownEither(target)(value),
    (error) => typeMismatch(path, String(target.ast), TreeFormatter.formatErrorSync(error))
  )

const isAbsent = (value: Json, config: DecoderConfig): boolean => value === null && config.treatNullAsAbsent

const makeKeyedView = (object: JsonObject, path: CodingPath, config: DecoderConfig): KeyedView => {
  const index = indexKeys(object, config.keyDecodingStrategy)

  const read = (key: CodingKey): Option.Option<Json> => {
    const documentKey = index.lookup(key)
    if (documentKey === undefined) {
      return Option.none()
    }
    const value = object[documentKey]
    return value === undefined ? Option.none() : Option.some(value)
  }

  const required = (key: CodingKey): Either.Either<Json, DecodeError> =>
    Option.match(read(key), {
      onNone: () => Either.left(keyNotFound(path, key)),
      onSome: (value) => Either.right(value)
    })

  const present = (key: CodingKey): Option.Option<Json> =>
    Option.filter(read(key), (value) => !isAbsent(value, config))

  return {
    path,
    keys: index.keys,
    contains: (key) => Option.isSome(read(key)),
    get: (key, target) => Either.flatMap(required(key), (value) => extract(value, target, appendKey(path, key))),
    getOptional: (key, target) =>
      Option.match(present(key), {
        onNone: () => Either.right(Option.none()),
        onSome: (value) => Either.map(extract(value, target, appendKey(path, key)), Option.some)
      }),
    nested: (key) => Either.map(required(key), (value) => makeDecoder(value, config, appendKey(path, key))),
    nestedOptional: (key) =>
      Either.right(Option.map(present(key), (value) => makeDecoder(value, config, appendKey(path, key))))
  }
}

interface Cursor {
  index: number
}

const makeSequentialView = (
  array: JsonArray,
  path: CodingPath,
  config: DecoderConfig,
  cursor: Cursor
): SequentialView => {
  const current = (): Either.Either<Json, DecodeError> => {
    const value = array[cursor.index]
    return value === undefined ? Either.left(endOfSequence(path, cursor.index)) : Either.right(value)
  }

  const advance = <A>(result: Either.Either<A, DecodeError>): Either.Either<A, DecodeError> => {
    if (Either.isRight(result)) {
      cursor.index += 1
    }
    return result
  }

  return {
    path,
    count: array.length,
    currentIndex: () => cursor.index,
    isAtEnd: () => cursor.index >= array.length,
    next: (target) =>
      advance(Either.flatMap(current(), (value) => extract(value, target, appendIndex(path, cursor.index)))),
    nextDecoder: () =>
      advance(Either.map(current(), (value) => makeDecoder(value, config, appendIndex(path, cursor.index))))
  }
}

const makeScalarView = (value: JsonScalar, path: CodingPath): ScalarView => ({
  path,
  isNull: value === null,
  value: (target) => extract(value, target, path)
})

/**
 * Create a Decoder positioned at `value`.
 *
 * @param value - Structured value the decoder reads.
 * @param config - Resolved decoder configuration.
 * @param path - Position of `value` within the top-level document.
 * @returns Decoder whose sequential views share a single forward-only cursor.
 *
 * @pure false (the returned decoder owns a mutable cursor)
 * @invariant cursor never rewinds
 * @complexity O(1)
 */
export const makeDecoder = (
  value: Json,
  config: DecoderConfig = defaultDecoderConfig,
  path: CodingPath = rootPath
): Decoder => {
  const cursor: Cursor = { index: 0 }
  return {
    path,
    config,
    keyed: () =>
      isJsonObject(value)
        ? Either.right(makeKeyedView(value, path, config))
        : Either.left(shapeMismatch(path, "object", value)),
    sequential: () =>
      isJsonArray(value)
        ? Either.right(makeSequentialView(value, path, config, cursor))
        : Either.left(shapeMismatch(path, "array", value)),
    scalar: () =>
      isJsonScalar(value)
        ? Either.right(makeScalarView(value, path))
        : Either.left(shapeMismatch(path, "scalar", value))
  }
}
