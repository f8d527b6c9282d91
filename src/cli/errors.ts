import { Match } from "effect"

import type {
  BrowserExitedWithError,
  BrowserLaunchFailed,
  BrowserNotFound,
  EjectFailed,
  ImageNotFound,
  InvalidConfiguration,
  MountCommandFailed,
  MountFailed,
  MountPointUnresolved,
  OpenFailed,
} from "../core"

type DomainError =
  | InvalidConfiguration
  | ImageNotFound
  | BrowserNotFound
  | MountCommandFailed
  | MountFailed
  | MountPointUnresolved
  | BrowserLaunchFailed
  | BrowserExitedWithError
  | EjectFailed
  | OpenFailed

const domainErrorTags: ReadonlySet<string> = new Set<DomainError["_tag"]>([
  "InvalidConfiguration",
  "ImageNotFound",
  "BrowserNotFound",
  "MountCommandFailed",
  "MountFailed",
  "MountPointUnresolved",
  "BrowserLaunchFailed",
  "BrowserExitedWithError",
  "EjectFailed",
  "OpenFailed",
])

export class AppError extends Error {
  readonly _tag = "AppError"

  constructor(
    readonly title: string,
    readonly detail: string,
    readonly suggestion: string
  ) {
    super(`${title}: ${detail}`)
  }

  format(): string {
    return [`ERROR: ${this.title}`, ``, `   ${this.detail}`, ``, `   Hint: ${this.suggestion}`].join("\n")
  }
}

const errors = {
  invalidConfiguration: (reason: string) =>
    new AppError(
      "Invalid configuration",
      reason,
      `Unset the variable to use the default path, or give it a non-empty value.`
    ),

  imageNotFound: (path: string) =>
    new AppError(
      "Disk image not found",
      `No disk image exists at "${path}".`,
      `Check the path or set PROFILE_VAULT_IMAGE to the location of your encrypted image.`
    ),

  browserNotFound: (path: string) =>
    new AppError(
      "Browser not found",
      `The browser application is not installed at "${path}".`,
      `Install the browser at that location or set PROFILE_VAULT_BROWSER to where it lives.`
    ),

  mountCommandFailed: (path: string, reason: string) =>
    new AppError(
      "Cannot run hdiutil",
      `Mounting "${path}" could not be started: ${reason}`,
      `This tool needs macOS with /usr/bin/hdiutil on the PATH.`
    ),

  mountFailed: (path: string, exitCode: number, output: string) =>
    new AppError(
      "Mount failed",
      `hdiutil could not attach "${path}" (status ${exitCode})${output ? `: ${output}` : "."}`,
      `Check that the image is not damaged and is not attached by another user.`
    ),

  mountPointUnresolved: (path: string) =>
    new AppError(
      "Mount point unknown",
      `hdiutil reported success for "${path}" but the mount point could not be determined.`,
      `Check whether a password prompt appeared and was handled, then run 'profile-vault status'.`
    ),

  browserLaunchFailed: (path: string, reason: string) =>
    new AppError(
      "Browser launch failed",
      `Could not start "${path}": ${reason}`,
      `Try opening the browser by hand to see whether it starts at all.`
    ),

  browserExited: (path: string, exitCode: number) =>
    new AppError(
      "Browser did not close cleanly",
      `"${path}" exited with status ${exitCode}.`,
      `The volume was still ejected. Run 'profile-vault status' to confirm.`
    ),

  ejectFailed: (mountPoint: string, reason: string) =>
    new AppError(
      "Eject failed",
      `Could not eject "${mountPoint}": ${reason}`,
      `Quit any application still using the volume and run 'profile-vault eject' again.`
    ),

  openFailed: (path: string, reason: string) =>
    new AppError(
      "Cannot open image",
      `The system could not open "${path}": ${reason}`,
      `Try double-clicking the image in Finder.`
    ),

  unexpected: (message: string) =>
    new AppError("Unexpected error", message, `If this persists, please report this issue.`),
}

const matchDomainError = Match.typeTags<DomainError>()({
  InvalidConfiguration: (e) => errors.invalidConfiguration(e.reason),
  ImageNotFound: (e) => errors.imageNotFound(e.path),
  BrowserNotFound: (e) => errors.browserNotFound(e.path),
  MountCommandFailed: (e) => errors.mountCommandFailed(e.path, e.reason),
  MountFailed: (e) => errors.mountFailed(e.path, e.exitCode, e.output),
  MountPointUnresolved: (e) => errors.mountPointUnresolved(e.path),
  BrowserLaunchFailed: (e) => errors.browserLaunchFailed(e.path, e.reason),
  BrowserExitedWithError: (e) => errors.browserExited(e.path, e.exitCode),
  EjectFailed: (e) => errors.ejectFailed(e.mountPoint, e.reason),
  OpenFailed: (e) => errors.openFailed(e.path, e.reason),
})

const isDomainError = (e: unknown): e is DomainError =>
  typeof e === "object" &&
  e !== null &&
  "_tag" in e &&
  typeof e._tag === "string" &&
  domainErrorTags.has(e._tag)

export const fromDomainError = (error: unknown): AppError => {
  if (error instanceof AppError) {
    return error
  }

  if (isDomainError(error)) {
    return matchDomainError(error)
  }

  if (error instanceof Error) {
    return errors.unexpected(error.message)
  }

  return errors.unexpected(String(error))
}

export const {
  invalidConfiguration,
  imageNotFound,
  browserNotFound,
  mountCommandFailed,
  mountFailed,
  mountPointUnresolved,
  browserLaunchFailed,
  browserExited,
  ejectFailed,
  openFailed,
  unexpected,
} = errors
