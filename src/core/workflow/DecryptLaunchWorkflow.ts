/**
 * DecryptLaunchWorkflow - mount the encrypted profile image, open the browser
 * on the profile the mount outcome allows, release the volume afterwards.
 *
 *   validate image -> query mount state
 *     already mounted ---------------------------------> secure profile -> eject
 *     not mounted -> credential manager -> attach -+-> secure profile -> eject
 *                                                  +-> personal profile (cancelled)
 *                                                  +-> fatal
 */

import { Data, Effect, Option, pipe } from "effect"
import {
  findMountPoint,
  isAuthenticationCancellation,
  parseAttachOutput,
  resolveSecureProfilePath,
  volumeLabel,
} from "../domain/DiskImage"
import type { WorkflowConfig } from "../domain/WorkflowConfig"
import { AppLauncherServiceTag, type LaunchRequest } from "../services/AppLauncherService"
import { DiskImageServiceTag } from "../services/DiskImageService"
import { FileProbeServiceTag, type FileProbeService } from "../services/FileProbeService"
import { LoggerServiceTag, type MountPointSource } from "../services/LoggerService"

// =============================================================================
// Fatal outcomes
// =============================================================================

export class ImageNotFound extends Data.TaggedError("ImageNotFound")<{
  readonly path: string
}> {}

export class BrowserNotFound extends Data.TaggedError("BrowserNotFound")<{
  readonly path: string
}> {}

export class MountCommandFailed extends Data.TaggedError("MountCommandFailed")<{
  readonly path: string
  readonly reason: string
}> {}

export class MountFailed extends Data.TaggedError("MountFailed")<{
  readonly path: string
  readonly exitCode: number
  readonly output: string
}> {}

export class MountPointUnresolved extends Data.TaggedError("MountPointUnresolved")<{
  readonly path: string
}> {}

export class BrowserLaunchFailed extends Data.TaggedError("BrowserLaunchFailed")<{
  readonly path: string
  readonly reason: string
}> {}

export class BrowserExitedWithError extends Data.TaggedError("BrowserExitedWithError")<{
  readonly path: string
  readonly exitCode: number
}> {}

export type WorkflowError =
  | ImageNotFound
  | BrowserNotFound
  | MountCommandFailed
  | MountFailed
  | MountPointUnresolved
  | BrowserLaunchFailed
  | BrowserExitedWithError

// =============================================================================
// Outcomes
// =============================================================================

export type MountOutcome =
  | { readonly _tag: "AlreadyMounted"; readonly mountPoint: string }
  | { readonly _tag: "Mounted"; readonly mountPoint: string; readonly source: MountPointSource }
  | { readonly _tag: "Cancelled" }

export type WorkflowOutcome =
  | { readonly _tag: "SecureProfile"; readonly mountPoint: string; readonly profile: Option.Option<string> }
  | { readonly _tag: "PersonalProfile"; readonly profile: Option.Option<string> }

/**
 * Make every configured path absolute. The secure profile only gets home
 * expansion, since a relative one is resolved against the mount point later.
 */
export const resolveConfigPaths = (
  config: WorkflowConfig,
  probe: Pick<FileProbeService, "expandHomePath" | "resolvePath">
): WorkflowConfig => ({
  imagePath: probe.resolvePath(config.imagePath),
  credentialManagerPath: probe.resolvePath(config.credentialManagerPath),
  browserPath: probe.resolvePath(config.browserPath),
  secureProfilePath: probe.expandHomePath(config.secureProfilePath),
  personalProfilePath: probe.resolvePath(config.personalProfilePath),
})

// =============================================================================
// Steps
// =============================================================================

/**
 * Mount point of `imagePath` per the disk-image service. A failed query is
 * reported and read as "not mounted".
 */
export const queryMountPoint = (imagePath: string) =>
  Effect.gen(function* () {
    const diskImages = yield* DiskImageServiceTag
    const logger = yield* LoggerServiceTag

    return yield* pipe(
      diskImages.info(),
      Effect.map((images) => findMountPoint(images, imagePath)),
      Effect.catchAll((e) =>
        pipe(
          logger.launch.infoQueryFailed(
            e._tag === "DiskImageInfoUnavailable" ? `hdiutil info exited with status ${e.exitCode}` : e.reason
          ),
          Effect.as(Option.none<string>())
        )
      )
    )
  })

const openCredentialManager = (config: WorkflowConfig) =>
  Effect.gen(function* () {
    const probe = yield* FileProbeServiceTag
    const launcher = yield* AppLauncherServiceTag
    const logger = yield* LoggerServiceTag

    if (yield* probe.exists(config.credentialManagerPath)) {
      yield* logger.launch.openingCredentialManager(config.credentialManagerPath)
      yield* launcher.launchDetached({ target: config.credentialManagerPath, profile: Option.none(), wait: false })
    } else {
      yield* logger.launch.credentialManagerMissing(config.credentialManagerPath)
    }
  })

const attachImage = (imagePath: string) =>
  Effect.gen(function* () {
    const diskImages = yield* DiskImageServiceTag
    const logger = yield* LoggerServiceTag

    yield* logger.launch.attaching(imagePath)
    const attach = yield* pipe(
      diskImages.attach(imagePath, { noBrowse: true }),
      Effect.mapError((e) => new MountCommandFailed({ path: imagePath, reason: e.reason }))
    )
    yield* logger.launch.attachFinished(attach.exitCode, attach.output)

    if (attach.exitCode !== 0) {
      if (isAuthenticationCancellation(attach.output)) {
        yield* logger.launch.mountCancelled
        return { _tag: "Cancelled" } as const
      }
      return yield* Effect.fail(
        new MountFailed({ path: imagePath, exitCode: attach.exitCode, output: attach.output })
      )
    }

    const fromInfo = yield* queryMountPoint(imagePath)
    if (Option.isSome(fromInfo)) {
      return { _tag: "Mounted", mountPoint: fromInfo.value, source: "info" } as const
    }

    const fromOutput = parseAttachOutput(attach.output)
    if (Option.isSome(fromOutput)) {
      return { _tag: "Mounted", mountPoint: fromOutput.value, source: "attach-output" } as const
    }

    return yield* Effect.fail(new MountPointUnresolved({ path: imagePath }))
  })

/**
 * Bring the image online, or learn that the user declined the password prompt.
 */
export const ensureMounted = (config: WorkflowConfig): Effect.Effect<
  MountOutcome,
  MountCommandFailed | MountFailed | MountPointUnresolved,
  DiskImageServiceTag | FileProbeServiceTag | AppLauncherServiceTag | LoggerServiceTag
> =>
  Effect.gen(function* () {
    const logger = yield* LoggerServiceTag

    const existing = yield* queryMountPoint(config.imagePath)
    if (Option.isSome(existing)) {
      yield* logger.launch.alreadyMounted(volumeLabel(config.imagePath), existing.value)
      return { _tag: "AlreadyMounted", mountPoint: existing.value } as const
    }

    yield* openCredentialManager(config)

    const outcome = yield* attachImage(config.imagePath)
    if (outcome._tag === "Mounted") {
      yield* logger.launch.mounted(outcome.mountPoint, outcome.source)
    }
    return outcome
  })

const ensureBrowserInstalled = (browserPath: string) =>
  Effect.gen(function* () {
    const probe = yield* FileProbeServiceTag
    if (!(yield* probe.exists(browserPath))) {
      return yield* Effect.fail(new BrowserNotFound({ path: browserPath }))
    }
  })

/**
 * Detach the volume. Never fails; problems are reported and the run goes on.
 */
export const ejectVolume = (mountPoint: string) =>
  Effect.gen(function* () {
    const diskImages = yield* DiskImageServiceTag
    const logger = yield* LoggerServiceTag

    yield* logger.launch.ejecting(mountPoint)
    yield* pipe(
      diskImages.detach(mountPoint),
      Effect.flatMap((result) =>
        result.exitCode === 0
          ? logger.launch.ejected(mountPoint)
          : logger.launch.ejectFailed(mountPoint, `status ${result.exitCode}. ${result.output}`.trim())
      ),
      Effect.catchAll((e) => logger.launch.ejectFailed(mountPoint, e.reason))
    )
  })

/**
 * Run the browser on the secure profile and wait for it to quit. The volume is
 * ejected afterwards whatever happened to the browser.
 */
export const openSecureProfile = (config: WorkflowConfig, mountPoint: string) =>
  Effect.gen(function* () {
    const probe = yield* FileProbeServiceTag
    const launcher = yield* AppLauncherServiceTag
    const logger = yield* LoggerServiceTag

    const browse = Effect.gen(function* () {
      yield* ensureBrowserInstalled(config.browserPath)

      const profilePath = resolveSecureProfilePath(config.secureProfilePath, mountPoint)
      const found = yield* probe.exists(profilePath)
      yield* logger.launch.secureProfile(profilePath, found)

      const request: LaunchRequest = {
        target: config.browserPath,
        profile: found ? Option.some(profilePath) : Option.none(),
        wait: true,
      }
      yield* logger.launch.waitingForBrowser
      const exitCode = yield* pipe(
        launcher.open(request),
        Effect.mapError((e) => new BrowserLaunchFailed({ path: config.browserPath, reason: e.reason }))
      )
      if (exitCode !== 0) {
        return yield* Effect.fail(new BrowserExitedWithError({ path: config.browserPath, exitCode }))
      }
      yield* logger.launch.browserClosed

      return { _tag: "SecureProfile", mountPoint, profile: request.profile } as const
    })

    return yield* pipe(browse, Effect.ensuring(ejectVolume(mountPoint)))
  })

/**
 * Open the browser on the personal profile without waiting for it. Only a
 * missing browser is fatal here.
 */
export const openPersonalProfile = (config: WorkflowConfig) =>
  Effect.gen(function* () {
    const probe = yield* FileProbeServiceTag
    const launcher = yield* AppLauncherServiceTag
    const logger = yield* LoggerServiceTag

    yield* ensureBrowserInstalled(config.browserPath)

    const found = yield* probe.exists(config.personalProfilePath)
    yield* logger.launch.personalProfile(config.personalProfilePath, found)

    const request: LaunchRequest = {
      target: config.browserPath,
      profile: found ? Option.some(config.personalProfilePath) : Option.none(),
      wait: false,
    }
    yield* pipe(
      launcher.open(request),
      Effect.flatMap((exitCode) =>
        exitCode === 0
          ? logger.launch.browserOpened
          : logger.launch.browserOpenWarning(`Browser launcher exited with status ${exitCode}`)
      ),
      Effect.catchAll((e) => logger.launch.browserOpenWarning(`Failed to open the browser: ${e.reason}`))
    )

    return { _tag: "PersonalProfile", profile: request.profile } as const
  })

// =============================================================================
// Entry point
// =============================================================================

export const runDecryptAndLaunch = (
  configured: WorkflowConfig
): Effect.Effect<
  WorkflowOutcome,
  WorkflowError,
  DiskImageServiceTag | AppLauncherServiceTag | FileProbeServiceTag | LoggerServiceTag
> =>
  Effect.gen(function* () {
    const probe = yield* FileProbeServiceTag
    const logger = yield* LoggerServiceTag

    const config = resolveConfigPaths(configured, probe)
    yield* Effect.logDebug(`Resolved configuration: ${JSON.stringify(config)}`)

    yield* logger.launch.header
    if (!(yield* probe.exists(config.imagePath))) {
      return yield* Effect.fail(new ImageNotFound({ path: config.imagePath }))
    }
    yield* logger.launch.image(config.imagePath, volumeLabel(config.imagePath))

    const mount = yield* ensureMounted(config)

    switch (mount._tag) {
      case "AlreadyMounted":
      case "Mounted":
        return yield* openSecureProfile(config, mount.mountPoint)
      case "Cancelled":
        return yield* openPersonalProfile(config)
    }
  })
