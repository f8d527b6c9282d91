import { Effect, pipe } from "effect"

import { fromDomainError } from "./errors"

import {
  loadWorkflowConfig,
  runDecryptAndLaunch,
  showImageStatus,
  ejectImage,
  openImage,
  AppLive,
} from "../core"
import { LoggerServiceTag } from "../core/services/LoggerService"

export type ExitCode = 0 | 1

/**
 * Error handling wrapper for CLI commands: report any failure and turn the
 * result into a process exit code.
 */
export const withErrorHandling = <A, E, R>(
  effect: Effect.Effect<A, E, R>
): Effect.Effect<ExitCode, never, R | LoggerServiceTag> =>
  pipe(
    effect,
    Effect.as<ExitCode>(0),
    Effect.catchAll((error) =>
      Effect.gen(function* () {
        const logger = yield* LoggerServiceTag
        yield* logger.failure(fromDomainError(error).format())
        return 1 as const
      })
    )
  )

/**
 * Run the decrypt-and-launch workflow
 */
export const runLaunch = Effect.gen(function* () {
  const logger = yield* LoggerServiceTag
  const config = yield* loadWorkflowConfig

  const outcome = yield* runDecryptAndLaunch(config)
  yield* logger.launch.complete(outcome._tag === "SecureProfile" ? "secure" : "personal")
  return outcome
})

/**
 * Run the status command
 */
export const runStatus = Effect.flatMap(loadWorkflowConfig, showImageStatus)

/**
 * Run the eject command
 */
export const runEject = Effect.flatMap(loadWorkflowConfig, ejectImage)

/**
 * Run the open command
 */
export const runOpen = Effect.flatMap(loadWorkflowConfig, openImage)

/**
 * Export the application layer for CLI
 */
export { AppLive }
