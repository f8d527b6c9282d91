/**
 * DiskImageService - attach, detach and inspect disk images.
 *
 * The live implementation drives macOS `hdiutil`. `info` reads the plist form
 * of `hdiutil info`; attach and detach hand back exit status and output as
 * values so callers can decide what a failure means.
 */

import { Context, Data, Effect, Layer, pipe, Schema } from "effect"
import plist from "plist"
import { ShellServiceTag, type ShellError } from "../ShellService"
import {
  combineOutput,
  type CommandOutcome,
  type DiskImageDescriptor,
} from "../../domain/DiskImage"

// =============================================================================
// Service errors
// =============================================================================

export class DiskImageCommandFailed extends Data.TaggedError("DiskImageCommandFailed")<{
  readonly operation: "info" | "attach" | "detach"
  readonly reason: string
}> {}

export class DiskImageInfoUnavailable extends Data.TaggedError("DiskImageInfoUnavailable")<{
  readonly exitCode: number
  readonly output: string
}> {}

export class DiskImageInfoUnreadable extends Data.TaggedError("DiskImageInfoUnreadable")<{
  readonly reason: string
}> {}

export type DiskImageError = DiskImageCommandFailed | DiskImageInfoUnavailable | DiskImageInfoUnreadable

// =============================================================================
// Service interface
// =============================================================================

export interface AttachOptions {
  /** Keep the volume out of Finder (`-nobrowse`) */
  readonly noBrowse: boolean
}

export interface DiskImageService {
  readonly info: () => Effect.Effect<ReadonlyArray<DiskImageDescriptor>, DiskImageError>
  /** May block while the system asks the user for the image password */
  readonly attach: (path: string, options: AttachOptions) => Effect.Effect<CommandOutcome, DiskImageCommandFailed>
  readonly detach: (mountPoint: string) => Effect.Effect<CommandOutcome, DiskImageCommandFailed>
}

export class DiskImageServiceTag extends Context.Tag("DiskImageService")<
  DiskImageServiceTag,
  DiskImageService
>() {}

// =============================================================================
// hdiutil info decoding
// =============================================================================

const SystemEntitySchema = Schema.Struct({
  mountPoint: Schema.optional(Schema.String).pipe(Schema.fromKey("mount-point")),
  contentHint: Schema.optional(Schema.String).pipe(Schema.fromKey("content-hint")),
  volumeKind: Schema.optional(Schema.String).pipe(Schema.fromKey("volume-kind")),
})

const ImageSchema = Schema.Struct({
  imagePath: Schema.propertySignature(Schema.String).pipe(Schema.fromKey("image-path")),
  systemEntities: Schema.optional(Schema.Array(SystemEntitySchema)).pipe(Schema.fromKey("system-entities")),
})

const HdiutilInfoSchema = Schema.Struct({
  images: Schema.Array(ImageSchema),
})

/**
 * Decode the XML plist printed by `hdiutil info -plist`.
 */
export const parseHdiutilInfo = (
  xml: string
): Effect.Effect<ReadonlyArray<DiskImageDescriptor>, DiskImageInfoUnreadable> =>
  pipe(
    Effect.try({
      try: () => plist.parse(xml),
      catch: (e) => new DiskImageInfoUnreadable({ reason: `Invalid plist: ${e}` }),
    }),
    Effect.flatMap((value) =>
      pipe(
        Schema.decodeUnknown(HdiutilInfoSchema)(value),
        Effect.mapError((e) => new DiskImageInfoUnreadable({ reason: e.message }))
      )
    ),
    Effect.map((info) =>
      info.images.map((image) => ({
        imagePath: image.imagePath,
        systemEntities: image.systemEntities ?? [],
      }))
    )
  )

// =============================================================================
// hdiutil implementation
// =============================================================================

const toCommandFailed =
  (operation: DiskImageCommandFailed["operation"]) =>
  (e: ShellError): DiskImageCommandFailed =>
    new DiskImageCommandFailed({ operation, reason: e.message })

export const HdiutilDiskImageService = Layer.effect(
  DiskImageServiceTag,
  Effect.gen(function* () {
    const shell = yield* ShellServiceTag

    const run = (operation: DiskImageCommandFailed["operation"], args: ReadonlyArray<string>) =>
      pipe(shell.exec("hdiutil", [operation, ...args]), Effect.mapError(toCommandFailed(operation)))

    return {
      info: () =>
        pipe(
          run("info", ["-plist"]),
          Effect.flatMap(
            (
              result
            ): Effect.Effect<ReadonlyArray<DiskImageDescriptor>, DiskImageInfoUnreadable | DiskImageInfoUnavailable> =>
            result.exitCode === 0
              ? parseHdiutilInfo(result.stdout)
              : Effect.fail(
                  new DiskImageInfoUnavailable({
                    exitCode: result.exitCode,
                    output: combineOutput(result.stdout, result.stderr),
                  })
                )
          )
        ),

      attach: (path, options) =>
        pipe(
          run("attach", [path, ...(options.noBrowse ? ["-nobrowse"] : [])]),
          Effect.map((result) => ({
            exitCode: result.exitCode,
            output: combineOutput(result.stdout, result.stderr),
          }))
        ),

      detach: (mountPoint) =>
        pipe(
          run("detach", [mountPoint]),
          Effect.map((result) => ({
            exitCode: result.exitCode,
            output: combineOutput(result.stdout, result.stderr),
          }))
        ),
    }
  })
)
