import { FileSystem, Path } from "@effect/platform"
import { Context, Effect, Layer, pipe } from "effect"
import { homedir } from "node:os"
import { expandHomePath } from "../../lib/expandHomePath"

export interface FileProbeService {
  /** False for missing paths and for paths that cannot be checked */
  readonly exists: (path: string) => Effect.Effect<boolean>
  readonly expandHomePath: (path: string) => string
  /** Home expansion, then resolution against the working directory */
  readonly resolvePath: (path: string) => string
}

export class FileProbeServiceTag extends Context.Tag("FileProbeService")<
  FileProbeServiceTag,
  FileProbeService
>() {}

export const makeFileProbe = (fs: FileSystem.FileSystem, path: Path.Path, home: string): FileProbeService => ({
  exists: (target) =>
    pipe(
      fs.exists(target),
      Effect.catchAll((e) =>
        pipe(
          Effect.logDebug(`Could not check ${target}: ${e.message}`),
          Effect.as(false)
        )
      )
    ),
  expandHomePath: (target) => expandHomePath(target, home),
  resolvePath: (target) => path.resolve(expandHomePath(target, home)),
})

export const FileProbeServiceLive = Layer.effect(
  FileProbeServiceTag,
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem
    const path = yield* Path.Path
    return makeFileProbe(fs, path, homedir())
  })
)
