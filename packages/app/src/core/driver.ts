import * as Schema from "@effect/schema/Schema"
import * as TreeFormatter from "@effect/schema/TreeFormatter"
import * as Either from "effect/Either"

import type { DecoderConfig, FileConfig } from "./config.js"
import { resolveDecoderConfig } from "./config.js"
import { makeDecoder } from "./decoder.js"
import type { Decoding } from "./decoding.js"
import type { DecodeError, ParseError } from "./errors.js"
import { parseError } from "./errors.js"
import type { Json } from "./json.js"
import { isJson } from "./json.js"

// CHANGE: decode top-level input with a Decoding
// WHY: a single entry point parses input once and hands the root decoder to the chain
// FORMAT THEOREM: ∀s,d: parse(s) = Left(e) → decodeTopLevel(s,d) = Left(e)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: no decoding logic runs on malformed input; the parsed tree is checked, never rebuilt
// COMPLEXITY: O(n) where n = input size

const JsonParseSchema = Schema.parseJson()

const utf8 = new TextDecoder("utf-8", { fatal: true })

const toText = (input: string | Uint8Array): Either.Either<string, ParseError> => {
  if (typeof input === "string") {
    return Either.right(input)
  }
  return Either.try({
    try: () => utf8.decode(input),
    catch: (error) => parseError(`Input is not valid UTF-8: ${String(error)}`)
  })
}

/**
 * Parse raw input into a structured value.
 *
 * @pure true
 * @complexity O(n)
 */
export const parseDocument = (input: string | Uint8Array): Either.Either<Json, ParseError> =>
  Either.flatMap(toText(input), (text) =>
    Either.flatMap(
      Either.mapLeft(
        Schema.decodeUnknownEither(JsonParseSchema)(text),
        (error) => parseError(TreeFormatter.formatErrorSync(error))
      ),
      (value): Either.Either<Json, ParseError> =>
        isJson(value) ? Either.right(value) : Either.left(parseError("Input is not a structured document"))
    ))

/**
 * Run a decoding against an already-parsed structured value.
 *
 * @param value - Root of the document.
 * @param decoding - Decoding to run at the root.
 * @param config - Decoder options; unset fields take their defaults.
 *
 * @pure true
 */
export const decodeJson = <A>(
  value: Json,
  decoding: Decoding<A>,
  config?: DecoderConfig | FileConfig
): Either.Either<A, DecodeError> => decoding.run(makeDecoder(value, resolveDecoderConfig(config)))

/**
 * Decode top-level input as `decoding`.
 *
 * @example
 * decodeTopLevel('{"name":"Ada"}', keyed("name", Schema.String)) // Right("Ada")
 *
 * @returns ParseError when the input is malformed, otherwise the decoding's result.
 *
 * @pure true
 * @invariant the root decoder is created once per call
 * @complexity O(n)
 */
export const decodeTopLevel = <A>(
  input: string | Uint8Array,
  decoding: Decoding<A>,
  config?: DecoderConfig | FileConfig
): Either.Either<A, DecodeError> => Either.flatMap(parseDocument(input), (value) => decodeJson(value, decoding, config))
