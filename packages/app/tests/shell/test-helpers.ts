import { NodeContext } from "@effect/platform-node"
import type { PlatformError } from "@effect/platform/Error"
import { FileSystem, type FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Path, type Path as PathService } from "@effect/platform/Path"
import { Effect } from "effect"

export interface TempContext {
  readonly fs: FileSystemService
  readonly path: PathService
  readonly tempDir: string
  readonly writeFile: (name: string, contents: string) => Effect.Effect<string, PlatformError>
}

export const withTempDir = <A, E, R>(use: (context: TempContext) => Effect.Effect<A, E, R>) =>
  Effect.scoped(
    Effect.gen(function*(_) {
      const fs = yield* _(FileSystem)
      const path = yield* _(Path)
      const tempDir = yield* _(fs.makeTempDirectoryScoped({ prefix: "decoding-" }))
      const writeFile = (name: string, contents: string): Effect.Effect<string, PlatformError> => {
        const target = path.join(tempDir, name)
        return fs.writeFileString(target, contents).pipe(Effect.as(target))
      }
      return yield* _(use({ fs, path, tempDir, writeFile }))
    })
  )

export const provideNodeContext = <A, E, R>(effect: Effect.Effect<A, E, R>) =>
  effect.pipe(Effect.provide(NodeContext.layer))
