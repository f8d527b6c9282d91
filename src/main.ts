/**
 * Profile Vault CLI
 *
 * Mounts an encrypted disk image holding a browser profile, opens the browser
 * on that profile and ejects the image once the browser quits. When the
 * password prompt is cancelled, the browser opens on a personal profile
 * instead.
 *
 * Commands:
 *   (none) - mount, launch, eject
 *   status - show where the image is mounted
 *   eject  - detach the image
 *   open   - let the system mount the image with its own prompt
 *
 * Paths come from PROFILE_VAULT_* environment variables, with defaults.
 *
 * Example:
 *   $ profile-vault
 *   $ PROFILE_VAULT_IMAGE=~/Secure.dmg profile-vault status
 */

import { Command } from "@effect/cli"
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Effect, Layer, Logger, LogLevel, pipe } from "effect"

import * as Opts from "./cli/options"
import { runLaunch, runStatus, runEject, runOpen, withErrorHandling, AppLive, type ExitCode } from "./cli/handler"

type AppServices = Layer.Layer.Success<typeof AppLive>

const withLogLevel =
  (debug: boolean) =>
  <A, E, R>(effect: Effect.Effect<A, E, R>): Effect.Effect<A, E, R> =>
    debug ? Effect.provide(effect, Logger.minimumLogLevel(LogLevel.Debug)) : effect

const setExitCode = (code: ExitCode) =>
  Effect.sync(() => {
    process.exitCode = code
  })

const execute = <A, E>(effect: Effect.Effect<A, E, AppServices>, debug: boolean) =>
  pipe(
    withErrorHandling(effect),
    Effect.flatMap(setExitCode),
    withLogLevel(debug),
    Effect.provide(AppLive)
  )

// =============================================================================
// Subcommands
// =============================================================================

const statusCommand = Command.make("status", { debug: Opts.debug }, ({ debug }) =>
  execute(runStatus, debug)
).pipe(Command.withDescription("Show whether the image is mounted and where"))

const ejectCommand = Command.make("eject", { debug: Opts.debug }, ({ debug }) =>
  execute(runEject, debug)
).pipe(Command.withDescription("Eject the image if it is mounted"))

const openCommand = Command.make("open", { debug: Opts.debug }, ({ debug }) =>
  execute(runOpen, debug)
).pipe(Command.withDescription("Let the system mount the image with its own password prompt"))

// =============================================================================
// Root command: decrypt and launch
// =============================================================================

const rootCommand = Command.make("profile-vault", { debug: Opts.debug }, ({ debug }) =>
  execute(runLaunch, debug)
).pipe(
  Command.withDescription("Mount the encrypted profile image, open the browser on it, eject afterwards"),
  Command.withSubcommands([statusCommand, ejectCommand, openCommand])
)

const cli = Command.run(rootCommand, {
  name: "profile-vault",
  version: "0.1.0",
})

cli(process.argv).pipe(Effect.provide(NodeContext.layer), NodeRuntime.runMain)
