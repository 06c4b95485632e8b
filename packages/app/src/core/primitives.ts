import * as Either from "effect/Either"
import * as Option from "effect/Option"

import type { CodingKey } from "./coding-key.js"
import type { Decoder, Target } from "./decoder.js"
import type { Decoding } from "./decoding.js"
import { make } from "./decoding.js"
import type { DecodeError } from "./errors.js"

// CHANGE: provide leaf decodings bound to one access mode and one key
// WHY: composite decodings are assembled from these without touching the decoder surface
// FORMAT THEOREM: ∀k,t,d: keyed(k,t).run(d) = d.keyed() >>= get(k,t)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: optional yields None on absence, never a failure
// COMPLEXITY: O(1) per access plus the target schema's cost

/**
 * Decode the current position as a scalar of type `target`.
 *
 * @pure true
 * @invariant objects and arrays fail with TypeMismatch
 */
export const singleValue = <A, I>(target: Target<A, I>): Decoding<A> =>
  make((decoder) => Either.flatMap(decoder.scalar(), (view) => view.value(target)))

/**
 * Decode the value stored under `key` of the current object.
 *
 * @pure true
 * @invariant absent key → KeyNotFound; wrong type → TypeMismatch
 */
export const keyed = <A, I>(key: CodingKey, target: Target<A, I>): Decoding<A> =>
  make((decoder) => Either.flatMap(decoder.keyed(), (view) => view.get(key, target)))

/**
 * Decode the element under the decoder's sequential cursor and advance it.
 *
 * @pure false (advances the cursor of the decoder it runs against)
 * @invariant exhausted cursor → EndOfSequence
 */
export const unkeyed = <A, I>(target: Target<A, I>): Decoding<A> =>
  make((decoder) => Either.flatMap(decoder.sequential(), (view) => view.next(target)))

/**
 * Decode the value under `key` if it is present.
 *
 * @pure true
 * @invariant absent (or null, when treatNullAsAbsent) → None; present with wrong type → TypeMismatch
 */
export const optional = <A, I>(key: CodingKey, target: Target<A, I>): Decoding<Option.Option<A>> =>
  make((decoder) => Either.flatMap(decoder.keyed(), (view) => view.getOptional(key, target)))

export const nested = <A>(key: CodingKey, decoding: Decoding<A>): Decoding<A> =>
  make((decoder) =>
    Either.flatMap(
      Either.flatMap(decoder.keyed(), (view) => view.nested(key)),
      (child) => decoding.run(child)
    )
  )

export const optionalNested = <A>(key: CodingKey, decoding: Decoding<A>): Decoding<Option.Option<A>> =>
  make((decoder) =>
    Either.flatMap(
      Either.flatMap(decoder.keyed(), (view) => view.nestedOptional(key)),
      (child): Either.Either<Option.Option<A>, DecodeError> =>
        Option.match(child, {
          onNone: () => Either.right(Option.none()),
          onSome: (value) => Either.map(decoding.run(value), Option.some)
        })
    )
  )

const collect = <A>(decoder: Decoder, decoding: Decoding<A>): Either.Either<ReadonlyArray<A>, DecodeError> =>
  Either.flatMap(decoder.sequential(), (view) => {
    const values: Array<A> = []
    while (!view.isAtEnd()) {
      const decoded = Either.flatMap(view.nextDecoder(), (child) => decoding.run(child))
      if (Either.isLeft(decoded)) {
        return Either.left(decoded.left)
      }
      values.push(decoded.right)
    }
    return Either.right(values)
  })

/**
 * Decode every remaining element of the current array with `decoding`.
 *
 * Each element gets its own child decoder, so `decoding` may itself use keyed,
 * scalar or sequential access.
 *
 * @pure false (drains the cursor of the decoder it runs against)
 * @complexity O(n) where n = remaining elements
 */
export const elements = <A>(decoding: Decoding<A>): Decoding<ReadonlyArray<A>> =>
  make((decoder) => collect(decoder, decoding))
