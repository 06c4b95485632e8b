import * as Either from "effect/Either"
import { dual } from "effect/Function"
import * as Option from "effect/Option"

import type { Decoding } from "./decoding.js"
import { make } from "./decoding.js"
import type { DecodeError } from "./errors.js"

// CHANGE: compose decodings into richer decodings
// WHY: composite types are built from field decodings without re-deriving the decoder
// FORMAT THEOREM: ∀d,f,x: map(d,f).run(x) = map(d.run(x), f)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: no combinator recovers from a failure; replaceNil substitutes only for None
// COMPLEXITY: O(n) in the number of composed decodings

/**
 * Transform the decoded value with a pure, total function.
 *
 * @example
 * pipe(keyed("name", Schema.String), map((name) => name.toUpperCase()))
 *
 * @pure true
 * @invariant failures pass through unchanged
 */
export const map: {
  <A, B>(f: (value: A) => B): (self: Decoding<A>) => Decoding<B>
  <A, B>(self: Decoding<A>, f: (value: A) => B): Decoding<B>
} = dual(
  2,
  <A, B>(self: Decoding<A>, f: (value: A) => B): Decoding<B> =>
    make((decoder) => Either.map(self.run(decoder), f))
)

/**
 * Substitute `fallback` when the inner decoding yields None.
 *
 * @pure true
 * @invariant TypeMismatch and other failures are never replaced
 */
export const replaceNil: {
  <A>(fallback: A): (self: Decoding<Option.Option<A>>) => Decoding<A>
  <A>(self: Decoding<Option.Option<A>>, fallback: A): Decoding<A>
} = dual(
  2,
  <A>(self: Decoding<Option.Option<A>>, fallback: A): Decoding<A> =>
    make((decoder) => Either.map(self.run(decoder), Option.getOrElse(() => fallback)))
)

/**
 * Run two decodings against the same decoder and combine their values.
 *
 * Evaluation is left to right and short-circuits: when `left` fails, `right`
 * is not run and the left failure is returned.
 *
 * @pure true
 */
export const zipWith = <A, B, C>(
  left: Decoding<A>,
  right: Decoding<B>,
  f: (a: A, b: B) => C
): Decoding<C> =>
  make((decoder) =>
    Either.flatMap(left.run(decoder), (a) => Either.map(right.run(decoder), (b) => f(a, b)))
  )

export const zip = <A, B>(left: Decoding<A>, right: Decoding<B>): Decoding<readonly [A, B]> =>
  zipWith(left, right, (a, b) => [a, b] as const)

export const zip3 = <A, B, C>(
  a: Decoding<A>,
  b: Decoding<B>,
  c: Decoding<C>
): Decoding<readonly [A, B, C]> => map(zip(zip(a, b), c), ([[va, vb], vc]) => [va, vb, vc] as const)

export const zip4 = <A, B, C, D>(
  a: Decoding<A>,
  b: Decoding<B>,
  c: Decoding<C>,
  d: Decoding<D>
): Decoding<readonly [A, B, C, D]> =>
  map(zip(zip3(a, b, c), d), ([[va, vb, vc], vd]) => [va, vb, vc, vd] as const)

export const zip5 = <A, B, C, D, E>(
  a: Decoding<A>,
  b: Decoding<B>,
  c: Decoding<C>,
  d: Decoding<D>,
  e: Decoding<E>
): Decoding<readonly [A, B, C, D, E]> =>
  map(zip(zip4(a, b, c, d), e), ([[va, vb, vc, vd], ve]) => [va, vb, vc, vd, ve] as const)

/**
 * Run any number of same-typed decodings in order and collect their values.
 *
 * @pure true
 * @invariant the first failure in declaration order is returned
 * @complexity O(n)
 */
export const zipAll = <A>(decodings: ReadonlyArray<Decoding<A>>): Decoding<ReadonlyArray<A>> =>
  make((decoder) => {
    const values: Array<A> = []
    for (const decoding of decodings) {
      const decoded: Either.Either<A, DecodeError> = decoding.run(decoder)
      if (Either.isLeft(decoded)) {
        return Either.left(decoded.left)
      }
      values.push(decoded.right)
    }
    return Either.right(values)
  })
