/**
 * Standalone image commands: report the mount state, eject, hand the image to
 * the system opener.
 */

import { Data, Effect, Option, pipe } from "effect"
import type { WorkflowConfig } from "../domain/WorkflowConfig"
import { AppLauncherServiceTag } from "../services/AppLauncherService"
import { DiskImageServiceTag } from "../services/DiskImageService"
import { FileProbeServiceTag } from "../services/FileProbeService"
import { LoggerServiceTag } from "../services/LoggerService"
import { ImageNotFound, queryMountPoint } from "./DecryptLaunchWorkflow"

export class EjectFailed extends Data.TaggedError("EjectFailed")<{
  readonly mountPoint: string
  readonly reason: string
}> {}

export class OpenFailed extends Data.TaggedError("OpenFailed")<{
  readonly path: string
  readonly reason: string
}> {}

export interface ImageStatus {
  readonly imagePath: string
  readonly mountPoint: Option.Option<string>
}

const existingImagePath = (config: WorkflowConfig) =>
  Effect.gen(function* () {
    const probe = yield* FileProbeServiceTag
    const imagePath = probe.resolvePath(config.imagePath)
    if (!(yield* probe.exists(imagePath))) {
      return yield* Effect.fail(new ImageNotFound({ path: imagePath }))
    }
    return imagePath
  })

export const showImageStatus = (config: WorkflowConfig) =>
  Effect.gen(function* () {
    const logger = yield* LoggerServiceTag

    yield* logger.status.header
    const imagePath = yield* existingImagePath(config)
    const mountPoint = yield* queryMountPoint(imagePath)

    yield* Option.match(mountPoint, {
      onNone: () => logger.status.notMounted(imagePath),
      onSome: (path) => logger.status.mounted(imagePath, path),
    })

    return { imagePath, mountPoint } satisfies ImageStatus
  })

/**
 * Detach the image if it is attached. Unlike the cleanup step of a launch, a
 * failed detach is an error here.
 */
export const ejectImage = (config: WorkflowConfig) =>
  Effect.gen(function* () {
    const diskImages = yield* DiskImageServiceTag
    const logger = yield* LoggerServiceTag

    yield* logger.eject.header
    const imagePath = yield* existingImagePath(config)
    const mountPoint = yield* queryMountPoint(imagePath)

    if (Option.isNone(mountPoint)) {
      yield* logger.eject.notMounted(imagePath)
      return Option.none<string>()
    }

    yield* logger.eject.ejecting(mountPoint.value)
    const result = yield* pipe(
      diskImages.detach(mountPoint.value),
      Effect.mapError((e) => new EjectFailed({ mountPoint: mountPoint.value, reason: e.reason }))
    )
    if (result.exitCode !== 0) {
      return yield* Effect.fail(
        new EjectFailed({
          mountPoint: mountPoint.value,
          reason: `hdiutil detach exited with status ${result.exitCode}. ${result.output}`.trim(),
        })
      )
    }
    yield* logger.eject.ejected(mountPoint.value)
    return mountPoint
  })

/**
 * Let the system mount the image itself, with its own password prompt.
 */
export const openImage = (config: WorkflowConfig) =>
  Effect.gen(function* () {
    const launcher = yield* AppLauncherServiceTag
    const logger = yield* LoggerServiceTag

    const imagePath = yield* existingImagePath(config)
    yield* logger.open.opening(imagePath)

    const exitCode = yield* pipe(
      launcher.open({ target: imagePath, profile: Option.none(), wait: false }),
      Effect.mapError((e) => new OpenFailed({ path: imagePath, reason: e.reason }))
    )
    if (exitCode !== 0) {
      return yield* Effect.fail(new OpenFailed({ path: imagePath, reason: `open exited with status ${exitCode}` }))
    }
    yield* logger.open.opened
  })
