import type * as Either from "effect/Either"
import { hasProperty } from "effect/Predicate"

import type { Decoder } from "./decoder.js"
import type { DecodeError } from "./errors.js"

// CHANGE: wrap a pure decoder function as the unit every combinator composes
// WHY: decodings are values that can be shared, reused and combined
// FORMAT THEOREM: ∀d,x,y: x ≅ y → d.run(x) = d.run(y)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: a Decoding holds no state beyond its run function
// COMPLEXITY: O(1)/O(1)

export interface Decoding<A> {
  readonly _tag: "Decoding"
  readonly run: (decoder: Decoder) => Either.Either<A, DecodeError>
}

export type DecodedValue<D> = D extends Decoding<infer A> ? A : never

export const make = <A>(run: (decoder: Decoder) => Either.Either<A, DecodeError>): Decoding<A> =>
  Object.freeze({ _tag: "Decoding", run })

export const run = <A>(decoding: Decoding<A>, decoder: Decoder): Either.Either<A, DecodeError> =>
  decoding.run(decoder)

export const isDecoding = (value: unknown): value is Decoding<unknown> =>
  hasProperty(value, "_tag") && value._tag === "Decoding" && hasProperty(value, "run") &&
  typeof value.run === "function"
