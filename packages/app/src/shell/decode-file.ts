import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as Effect from "effect/Effect"
import type * as Either from "effect/Either"

import type { DecoderConfig, FileConfig } from "../core/config.js"
import { resolveDecoderConfig } from "../core/config.js"
import type { Decoding } from "../core/decoding.js"
import { decodeTopLevel } from "../core/driver.js"
import type { DecodeFileError } from "../core/errors.js"
import { fileError, renderDecodeError } from "../core/errors.js"
import { loadConfigFile } from "./config-file.js"

// CHANGE: decode documents stored on disk
// WHY: isolate filesystem IO while the decoding chain stays pure
// FORMAT THEOREM: ∀p,d: decodeFile(p,d) = read(p) >>= decodeTopLevel(_, d)
// PURITY: SHELL
// EFFECT: Effect<A, DecodeFileError, FileSystem>
// INVARIANT: decode failures are logged once and surfaced verbatim
// COMPLEXITY: O(n)

const fromEither = <A, E>(either: Either.Either<A, E>): Effect.Effect<A, E> =>
  either._tag === "Left" ? Effect.fail(either.left) : Effect.succeed(either.right)

/**
 * Read a UTF-8 document and decode it.
 *
 * @param path - File to read.
 * @param decoding - Decoding to run at the document root.
 * @param config - Decoder options; unset fields take their defaults.
 * @returns Decoded value, FileError when unreadable, or the DecodeError.
 *
 * @pure false
 * @effect FileSystem, Logger
 */
export const decodeFile = <A>(
  path: string,
  decoding: Decoding<A>,
  config?: DecoderConfig | FileConfig
): Effect.Effect<A, DecodeFileError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const raw = yield* _(
      fs.readFileString(path).pipe(Effect.mapError((error) => fileError(String(error))))
    )
    yield* _(Effect.logDebug("decoding document"))
    return yield* _(
      fromEither(decodeTopLevel(raw, decoding, config)).pipe(
        Effect.tapError((error) => Effect.logWarning(renderDecodeError(error)))
      )
    )
  }).pipe(Effect.annotateLogs({ path }))

/**
 * Load decoder options from `configPath`, then decode `path` with them.
 *
 * @param overrides - Options that take precedence over the config file.
 *
 * @pure false
 * @effect FileSystem, Logger
 */
export const decodeFileWithConfig = <A>(
  path: string,
  decoding: Decoding<A>,
  configPath: string,
  overrides: FileConfig = {}
): Effect.Effect<A, DecodeFileError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fileConfig = yield* _(loadConfigFile(configPath, true))
    return yield* _(decodeFile(path, decoding, resolveDecoderConfig(overrides, fileConfig)))
  })
