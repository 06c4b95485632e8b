import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as S from "@effect/schema/Schema"
import * as TreeFormatter from "@effect/schema/TreeFormatter"
import * as Effect from "effect/Effect"
import { pipe } from "effect/Function"

import type { FileConfig } from "../core/config.js"
import type { DecodeFileError } from "../core/errors.js"
import { configError, fileError } from "../core/errors.js"

// CHANGE: decode decoder options from a JSON file with schema validation
// WHY: keep boundary data typed and reject invalid config early
// FORMAT THEOREM: ∀c: decode(c) = Right(cfg) → cfg fields have correct types
// PURITY: SHELL
// EFFECT: Effect<FileConfig | undefined, DecodeFileError, FileSystem>
// INVARIANT: missing config yields undefined unless the path was given explicitly
// COMPLEXITY: O(n)

const RawConfigSchema = S.partial(
  S.Struct({
    keyDecodingStrategy: S.Literal("useDefaultKeys", "convertFromSnakeCase"),
    treatNullAsAbsent: S.Boolean
  })
)

const ConfigSchema = S.parseJson(RawConfigSchema)

const decodeConfig = (raw: string): Effect.Effect<FileConfig, DecodeFileError> =>
  pipe(
    S.decodeUnknown(ConfigSchema)(raw),
    Effect.map((config) => ({
      ...(config.keyDecodingStrategy === undefined ? {} : { keyDecodingStrategy: config.keyDecodingStrategy }),
      ...(config.treatNullAsAbsent === undefined ? {} : { treatNullAsAbsent: config.treatNullAsAbsent })
    })),
    Effect.mapError((error) => configError(TreeFormatter.formatErrorSync(error)))
  )

export const loadConfigFile = (
  path: string | undefined,
  explicit: boolean
): Effect.Effect<FileConfig | undefined, DecodeFileError, FileSystemService> =>
  Effect.gen(function*(_) {
    if (path === undefined) {
      return
    }
    const fs = yield* _(FileSystem)
    const exists = yield* _(
      fs.exists(path).pipe(Effect.mapError((error) => fileError(String(error))))
    )
    if (!exists) {
      if (explicit) {
        return yield* _(Effect.fail(fileError(`Config file not found: ${path}`)))
      }
      return
    }
    const contents = yield* _(
      fs.readFileString(path).pipe(Effect.mapError((error) => fileError(String(error))))
    )
    const decoded = yield* _(decodeConfig(contents))
    yield* _(Effect.logDebug("loaded decoder config").pipe(Effect.annotateLogs({ path })))
    return decoded
  })
