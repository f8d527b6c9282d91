/**
 * DiskImage - read-only views of what the disk-image service reports,
 * and the pure rules the workflow applies to them.
 */

import { Option, pipe } from "effect"

// =============================================================================
// Types
// =============================================================================

export interface SystemEntity {
  readonly mountPoint?: string
  readonly contentHint?: string
  readonly volumeKind?: string
}

export interface DiskImageDescriptor {
  readonly imagePath: string
  readonly systemEntities: ReadonlyArray<SystemEntity>
}

/** Exit status plus stdout and stderr folded into one text */
export interface CommandOutcome {
  readonly exitCode: number
  readonly output: string
}

// =============================================================================
// Constants
// =============================================================================

export const VOLUMES_ROOT = "/Volumes/"

/**
 * Substrings in attach output that mean the password prompt was dismissed or
 * the password was wrong. Matched case-sensitively.
 */
export const CANCELLATION_MARKERS: ReadonlyArray<string> = [
  "Authentication_Canceled",
  "authentication error",
  "cancelled",
  "attach canceled",
]

// =============================================================================
// Functions
// =============================================================================

/**
 * First mount point of the image registered under exactly `imagePath`.
 */
export const findMountPoint = (
  images: ReadonlyArray<DiskImageDescriptor>,
  imagePath: string
): Option.Option<string> =>
  pipe(
    images.find((image) => image.imagePath === imagePath),
    Option.fromNullable,
    Option.flatMap((image) =>
      Option.fromNullable(image.systemEntities.find((entity) => entity.mountPoint !== undefined)?.mountPoint)
    )
  )

/**
 * Recover the mount point from attach output, e.g.
 * `/dev/disk4s1\tApple_HFS\t/Volumes/Profile`.
 */
export const parseAttachOutput = (output: string): Option.Option<string> => {
  for (const line of output.split(/\r?\n/)) {
    const fields = line.split("\t").filter((field) => field.length > 0)
    const last = fields[fields.length - 1]
    if (fields.length >= 3 && last !== undefined && last.startsWith(VOLUMES_ROOT)) {
      return Option.some(last.trim())
    }
  }
  return Option.none()
}

export const isAuthenticationCancellation = (output: string): boolean =>
  CANCELLATION_MARKERS.some((marker) => output.includes(marker))

/**
 * File name without its extension; only used in messages.
 */
export const volumeLabel = (imagePath: string): string => {
  const fileName = imagePath.split("/").filter((part) => part.length > 0).pop() ?? imagePath
  const dot = fileName.lastIndexOf(".")
  return dot > 0 ? fileName.slice(0, dot) : fileName
}

/**
 * Absolute profile paths are taken as given; relative ones live on the volume.
 */
export const resolveSecureProfilePath = (profilePath: string, mountPoint: string): string => {
  if (profilePath.startsWith("/")) return profilePath
  const base = mountPoint.endsWith("/") ? mountPoint.slice(0, -1) : mountPoint
  return `${base}/${profilePath}`
}

export const combineOutput = (stdout: string, stderr: string): string =>
  [stdout.trim(), stderr.trim()].filter((part) => part.length > 0).join("\n")
