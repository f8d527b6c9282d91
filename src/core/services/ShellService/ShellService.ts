/**
 * ShellService - wraps external command execution for testability.
 */

import { Command, CommandExecutor } from "@effect/platform"
import { Context, Data, Effect, Layer, pipe, Stream } from "effect"

// =============================================================================
// Errors
// =============================================================================

export class ShellError extends Data.TaggedError("ShellError")<{
  readonly message: string
  readonly command: string
}> {}

// =============================================================================
// Types
// =============================================================================

export interface ShellResult {
  readonly stdout: string
  readonly stderr: string
  readonly exitCode: number
}

// =============================================================================
// Service interface
// =============================================================================

export interface ShellService {
  /**
   * Run `command` with `args` (no shell interpolation) and wait for it to exit.
   * stdin is inherited so tools that prompt can still read from the terminal.
   */
  readonly exec: (command: string, args: ReadonlyArray<string>) => Effect.Effect<ShellResult, ShellError>
}

export class ShellServiceTag extends Context.Tag("ShellService")<
  ShellServiceTag,
  ShellService
>() {}

// =============================================================================
// Live implementation (uses @effect/platform Command)
// =============================================================================

const collectText = <E>(stream: Stream.Stream<Uint8Array, E>) =>
  pipe(
    Stream.decodeText(stream),
    Stream.runFold("", (acc, chunk) => acc + chunk)
  )

export const describeCommand = (command: string, args: ReadonlyArray<string>): string =>
  [command, ...args.map((arg) => (/\s/.test(arg) ? `"${arg}"` : arg))].join(" ")

export const ShellServiceLive = Layer.effect(
  ShellServiceTag,
  Effect.gen(function* () {
    const executor = yield* CommandExecutor.CommandExecutor

    return {
      exec: (command, args) =>
        pipe(
          Effect.logDebug(`exec: ${describeCommand(command, args)}`),
          Effect.zipRight(
            Effect.scoped(
              Effect.gen(function* () {
                const proc = yield* Command.start(
                  Command.make(command, ...args).pipe(Command.stdin("inherit"))
                )
                const [stdout, stderr, exitCode] = yield* Effect.all(
                  [collectText(proc.stdout), collectText(proc.stderr), proc.exitCode],
                  { concurrency: "unbounded" }
                )
                return { stdout, stderr, exitCode: Number(exitCode) }
              })
            )
          ),
          Effect.provideService(CommandExecutor.CommandExecutor, executor),
          Effect.mapError(
            (e) =>
              new ShellError({
                message: `Shell command failed: ${e.message}`,
                command: describeCommand(command, args),
              })
          )
        ),
    }
  })
)
