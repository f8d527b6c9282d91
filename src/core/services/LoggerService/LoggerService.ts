/**
 * LoggerService - formatted console output for the launch, status, eject and open commands
 */

import { Console, Context, Effect, Layer } from "effect"

// =============================================================================
// Output sink
// =============================================================================

export interface OutputSink {
  readonly log: (line: string) => Effect.Effect<void>
  readonly error: (line: string) => Effect.Effect<void>
}

export const consoleSink: OutputSink = {
  log: (line) => Console.log(line),
  error: (line) => Console.error(line),
}

// =============================================================================
// Service interface
// =============================================================================

export type MountPointSource = "info" | "attach-output"

export interface LoggerService {
  readonly launch: {
    readonly header: Effect.Effect<void>
    readonly image: (path: string, label: string) => Effect.Effect<void>
    readonly infoQueryFailed: (reason: string) => Effect.Effect<void>
    readonly alreadyMounted: (label: string, mountPoint: string) => Effect.Effect<void>
    readonly openingCredentialManager: (path: string) => Effect.Effect<void>
    readonly credentialManagerMissing: (path: string) => Effect.Effect<void>
    readonly attaching: (path: string) => Effect.Effect<void>
    readonly attachFinished: (exitCode: number, output: string) => Effect.Effect<void>
    readonly mounted: (mountPoint: string, source: MountPointSource) => Effect.Effect<void>
    readonly mountCancelled: Effect.Effect<void>
    readonly secureProfile: (path: string, found: boolean) => Effect.Effect<void>
    readonly waitingForBrowser: Effect.Effect<void>
    readonly browserClosed: Effect.Effect<void>
    readonly personalProfile: (path: string, found: boolean) => Effect.Effect<void>
    readonly browserOpened: Effect.Effect<void>
    readonly browserOpenWarning: (detail: string) => Effect.Effect<void>
    readonly ejecting: (mountPoint: string) => Effect.Effect<void>
    readonly ejected: (mountPoint: string) => Effect.Effect<void>
    readonly ejectFailed: (mountPoint: string, detail: string) => Effect.Effect<void>
    readonly complete: (profileKind: "secure" | "personal") => Effect.Effect<void>
  }
  readonly status: {
    readonly header: Effect.Effect<void>
    readonly mounted: (imagePath: string, mountPoint: string) => Effect.Effect<void>
    readonly notMounted: (imagePath: string) => Effect.Effect<void>
  }
  readonly eject: {
    readonly header: Effect.Effect<void>
    readonly notMounted: (imagePath: string) => Effect.Effect<void>
    readonly ejecting: (mountPoint: string) => Effect.Effect<void>
    readonly ejected: (mountPoint: string) => Effect.Effect<void>
  }
  readonly open: {
    readonly opening: (imagePath: string) => Effect.Effect<void>
    readonly opened: Effect.Effect<void>
  }
  /** A formatted fatal error, written to stderr */
  readonly failure: (formatted: string) => Effect.Effect<void>
}

export class LoggerServiceTag extends Context.Tag("LoggerService")<
  LoggerServiceTag,
  LoggerService
>() {}

// =============================================================================
// Implementation
// =============================================================================

const indent = (text: string): string =>
  text
    .split("\n")
    .map((line) => `   ${line}`)
    .join("\n")

export const makeLoggerService = (sink: OutputSink): LoggerService => ({
  launch: {
    header: sink.log("\n🔐 Profile Vault - Launch\n"),
    image: (path, label) =>
      Effect.gen(function* () {
        yield* sink.log(`💽 Image: ${path}`)
        yield* sink.log(`   Volume: ${label}`)
      }),
    infoQueryFailed: (reason) => sink.log(`⚠️  Could not read the list of attached images: ${reason}`),
    alreadyMounted: (label, mountPoint) =>
      sink.log(`✓ ${label} is already mounted at ${mountPoint}. Skipping the credential manager.`),
    openingCredentialManager: (path) => sink.log(`🔑 Opening ${path}...`),
    credentialManagerMissing: (path) => sink.log(`⚠️  Credential manager not found at "${path}"`),
    attaching: (path) =>
      Effect.gen(function* () {
        yield* sink.log(`\n📀 Mounting ${path}...`)
        yield* sink.log("   If the image is encrypted, the system will now ask for its password.")
      }),
    attachFinished: (exitCode, output) =>
      Effect.gen(function* () {
        yield* sink.log(`   hdiutil attach exited with status ${exitCode}`)
        if (output.length > 0) yield* sink.log(indent(output))
      }),
    mounted: (mountPoint, source) =>
      sink.log(
        source === "info"
          ? `✓ Mounted at ${mountPoint}`
          : `✓ Mounted. Mount point taken from attach output: ${mountPoint}`
      ),
    mountCancelled: Effect.gen(function* () {
      yield* sink.log("⚠️  Mounting was cancelled or the password was wrong.")
      yield* sink.log("   Falling back to the personal profile.")
    }),
    secureProfile: (path, found) =>
      sink.log(
        found
          ? `✓ Secure profile found at ${path}`
          : `⚠️  Secure profile not found at "${path}". Using the browser's default profile.`
      ),
    waitingForBrowser: sink.log("🌐 Opening the browser. Waiting for it to close before ejecting..."),
    browserClosed: sink.log("✓ Browser closed"),
    personalProfile: (path, found) =>
      sink.log(
        found
          ? `🌐 Opening the browser with the personal profile at ${path}...`
          : `⚠️  Personal profile not found at "${path}". Opening the browser with its default profile...`
      ),
    browserOpened: sink.log("✓ Browser opened"),
    browserOpenWarning: (detail) => sink.log(`⚠️  ${detail}`),
    ejecting: (mountPoint) => sink.log(`\n⏏️  Ejecting ${mountPoint}...`),
    ejected: (mountPoint) => sink.log(`✓ Ejected ${mountPoint}`),
    ejectFailed: (mountPoint, detail) => sink.error(`❌ Could not eject ${mountPoint}: ${detail}`),
    complete: (profileKind) =>
      sink.log(
        profileKind === "secure"
          ? "\n✅ Secure session finished and volume released\n"
          : "\n✅ Browser opened with the personal profile\n"
      ),
  },
  status: {
    header: sink.log("\n🔐 Profile Vault - Status\n"),
    mounted: (imagePath, mountPoint) => sink.log(`💽 ${imagePath}\n   Mounted at ${mountPoint}`),
    notMounted: (imagePath) => sink.log(`💽 ${imagePath}\n   Not mounted`),
  },
  eject: {
    header: sink.log("\n🔐 Profile Vault - Eject\n"),
    notMounted: (imagePath) => sink.log(`✓ ${imagePath} is not mounted. Nothing to eject.`),
    ejecting: (mountPoint) => sink.log(`⏏️  Ejecting ${mountPoint}...`),
    ejected: (mountPoint) => sink.log(`✓ Ejected ${mountPoint}`),
  },
  open: {
    opening: (imagePath) => sink.log(`📀 Handing ${imagePath} to the system opener...`),
    opened: sink.log("✓ Image opened. Enter the password in the system prompt to mount it."),
  },
  failure: (formatted) => sink.error(`\n${formatted}`),
})

export const LoggerServiceLive = Layer.succeed(LoggerServiceTag, makeLoggerService(consoleSink))
