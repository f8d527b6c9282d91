/**
 * AppLauncherService - opens applications and documents through macOS `open`.
 */

import { Context, Data, Effect, Layer, Option, pipe } from "effect"
import { ShellServiceTag } from "../ShellService"

export class LaunchFailed extends Data.TaggedError("LaunchFailed")<{
  readonly target: string
  readonly reason: string
}> {}

export interface LaunchRequest {
  /** Application bundle or document to open */
  readonly target: string
  /** Passed to the application as `--profile <path>` */
  readonly profile: Option.Option<string>
  /** Block until the application quits (`open -W`) */
  readonly wait: boolean
}

export interface AppLauncherService {
  /** Run `open` and return its exit status */
  readonly open: (request: LaunchRequest) => Effect.Effect<number, LaunchFailed>
  /** Start `open` in the background and return immediately; failures are only logged */
  readonly launchDetached: (request: LaunchRequest) => Effect.Effect<void>
}

export class AppLauncherServiceTag extends Context.Tag("AppLauncherService")<
  AppLauncherServiceTag,
  AppLauncherService
>() {}

export const openArguments = (request: LaunchRequest): ReadonlyArray<string> => [
  ...(request.wait ? ["-W"] : []),
  request.target,
  ...Option.match(request.profile, {
    onNone: () => [],
    onSome: (profile) => ["--args", "--profile", profile],
  }),
]

export const MacOpenLauncher = Layer.effect(
  AppLauncherServiceTag,
  Effect.gen(function* () {
    const shell = yield* ShellServiceTag

    const open = (request: LaunchRequest) =>
      pipe(
        shell.exec("open", openArguments(request)),
        Effect.map((result) => result.exitCode),
        Effect.mapError((e) => new LaunchFailed({ target: request.target, reason: e.message }))
      )

    return {
      open,
      launchDetached: (request) =>
        pipe(
          open(request),
          Effect.flatMap((exitCode) =>
            exitCode === 0
              ? Effect.void
              : Effect.logWarning(`open ${request.target} exited with status ${exitCode}`)
          ),
          Effect.catchAll((e) => Effect.logWarning(`Could not open ${e.target}: ${e.reason}`)),
          Effect.forkDaemon,
          Effect.asVoid
        ),
    }
  })
)
