import { describe, expect, test } from "vitest"
import { Effect, Layer, pipe } from "effect"
import { DiskImageServiceTag, HdiutilDiskImageService, parseHdiutilInfo } from "./DiskImageService"
import { ShellError, ShellServiceTag, type ShellResult } from "../ShellService"

// =============================================================================
// Fixtures
// =============================================================================

const INFO_PLIST = `<?xml version="1.0" encoding="UTF-8"?>
<plist version="1.0">
<dict>
  <key>framework</key>
  <string>671</string>
  <key>images</key>
  <array>
    <dict>
      <key>image-path</key>
      <string>/Users/tester/Movies/Profile.dmg</string>
      <key>system-entities</key>
      <array>
        <dict>
          <key>content-hint</key>
          <string>GUID_partition_scheme</string>
          <key>dev-entry</key>
          <string>/dev/disk4</string>
        </dict>
        <dict>
          <key>content-hint</key>
          <string>Apple_HFS</string>
          <key>mount-point</key>
          <string>/Volumes/Profile</string>
          <key>volume-kind</key>
          <string>hfs</string>
        </dict>
      </array>
    </dict>
    <dict>
      <key>image-path</key>
      <string>/Users/tester/Downloads/Installer.dmg</string>
    </dict>
  </array>
</dict>
</plist>
`

// =============================================================================
// Stub ShellService
// =============================================================================

interface ShellCall {
  readonly command: string
  readonly args: ReadonlyArray<string>
}

const makeStubShell = (respond: (call: ShellCall) => ShellResult) => {
  const calls: ShellCall[] = []
  const layer = Layer.succeed(ShellServiceTag, {
    exec: (command, args) =>
      Effect.sync(() => {
        calls.push({ command, args })
        return respond({ command, args })
      }),
  })
  return { calls, layer }
}

const FailingShell = Layer.succeed(ShellServiceTag, {
  exec: (command, args) =>
    Effect.fail(
      new ShellError({
        message: "Shell command failed: spawn hdiutil ENOENT",
        command: [command, ...args].join(" "),
      })
    ),
})

const withService = (shell: Layer.Layer<ShellServiceTag>) => pipe(HdiutilDiskImageService, Layer.provide(shell))

// =============================================================================
// Tests
// =============================================================================

describe("parseHdiutilInfo", () => {
  test("decodes images and their system entities", async () => {
    const images = await Effect.runPromise(parseHdiutilInfo(INFO_PLIST))

    expect(images).toHaveLength(2)
    expect(images[0]?.imagePath).toBe("/Users/tester/Movies/Profile.dmg")
    expect(images[0]?.systemEntities).toHaveLength(2)
    expect(images[0]?.systemEntities[0]?.contentHint).toBe("GUID_partition_scheme")
    expect(images[0]?.systemEntities[0]?.mountPoint).toBeUndefined()
    expect(images[0]?.systemEntities[1]?.mountPoint).toBe("/Volumes/Profile")
    expect(images[0]?.systemEntities[1]?.volumeKind).toBe("hfs")
  })

  test("images without system entities get an empty list", async () => {
    const images = await Effect.runPromise(parseHdiutilInfo(INFO_PLIST))

    expect(images[1]?.imagePath).toBe("/Users/tester/Downloads/Installer.dmg")
    expect(images[1]?.systemEntities).toEqual([])
  })

  test("an image entry without image-path is unreadable", async () => {
    const xml = `<plist version="1.0"><dict><key>images</key><array><dict><key>system-entities</key><array/></dict></array></dict></plist>`

    const result = await pipe(parseHdiutilInfo(xml), Effect.either, Effect.runPromise)

    expect(result._tag).toBe("Left")
    if (result._tag === "Left") {
      expect(result.left._tag).toBe("DiskImageInfoUnreadable")
    }
  })

  test("text that is not a plist is unreadable", async () => {
    const result = await pipe(parseHdiutilInfo("hdiutil: info: not a plist"), Effect.either, Effect.runPromise)

    expect(result._tag).toBe("Left")
    if (result._tag === "Left") {
      expect(result.left._tag).toBe("DiskImageInfoUnreadable")
    }
  })
})

describe("HdiutilDiskImageService", () => {
  describe("info", () => {
    test("runs hdiutil info -plist and decodes the output", async () => {
      const shell = makeStubShell(() => ({ stdout: INFO_PLIST, stderr: "", exitCode: 0 }))

      const images = await pipe(
        DiskImageServiceTag,
        Effect.flatMap((svc) => svc.info()),
        Effect.provide(withService(shell.layer)),
        Effect.runPromise
      )

      expect(shell.calls).toEqual([{ command: "hdiutil", args: ["info", "-plist"] }])
      expect(images.map((image) => image.imagePath)).toEqual([
        "/Users/tester/Movies/Profile.dmg",
        "/Users/tester/Downloads/Installer.dmg",
      ])
    })

    test("non-zero exit status is reported as unavailable", async () => {
      const shell = makeStubShell(() => ({ stdout: "", stderr: "hdiutil: info failed\n", exitCode: 1 }))

      const result = await pipe(
        DiskImageServiceTag,
        Effect.flatMap((svc) => svc.info()),
        Effect.provide(withService(shell.layer)),
        Effect.either,
        Effect.runPromise
      )

      expect(result._tag).toBe("Left")
      if (result._tag === "Left" && result.left._tag === "DiskImageInfoUnavailable") {
        expect(result.left.exitCode).toBe(1)
        expect(result.left.output).toBe("hdiutil: info failed")
      } else {
        expect.fail("expected DiskImageInfoUnavailable")
      }
    })
  })

  describe("attach", () => {
    test("passes -nobrowse and folds stdout and stderr together", async () => {
      const shell = makeStubShell(() => ({
        stdout: "/dev/disk4s1\tApple_HFS\t/Volumes/Profile\n",
        stderr: "hdiutil: verifying\n",
        exitCode: 0,
      }))

      const outcome = await pipe(
        DiskImageServiceTag,
        Effect.flatMap((svc) => svc.attach("/Users/tester/Movies/Profile.dmg", { noBrowse: true })),
        Effect.provide(withService(shell.layer)),
        Effect.runPromise
      )

      expect(shell.calls).toEqual([
        { command: "hdiutil", args: ["attach", "/Users/tester/Movies/Profile.dmg", "-nobrowse"] },
      ])
      expect(outcome).toEqual({
        exitCode: 0,
        output: "/dev/disk4s1\tApple_HFS\t/Volumes/Profile\nhdiutil: verifying",
      })
    })

    test("omits -nobrowse when browsing is allowed", async () => {
      const shell = makeStubShell(() => ({ stdout: "", stderr: "", exitCode: 0 }))

      await pipe(
        DiskImageServiceTag,
        Effect.flatMap((svc) => svc.attach("/tmp/a.dmg", { noBrowse: false })),
        Effect.provide(withService(shell.layer)),
        Effect.runPromise
      )

      expect(shell.calls[0]?.args).toEqual(["attach", "/tmp/a.dmg"])
    })

    test("a failed attach is a value, not an error", async () => {
      const shell = makeStubShell(() => ({ stdout: "", stderr: "hdiutil: attach canceled\n", exitCode: 1 }))

      const outcome = await pipe(
        DiskImageServiceTag,
        Effect.flatMap((svc) => svc.attach("/tmp/a.dmg", { noBrowse: true })),
        Effect.provide(withService(shell.layer)),
        Effect.runPromise
      )

      expect(outcome).toEqual({ exitCode: 1, output: "hdiutil: attach canceled" })
    })

    test("spawn failure becomes DiskImageCommandFailed", async () => {
      const result = await pipe(
        DiskImageServiceTag,
        Effect.flatMap((svc) => svc.attach("/tmp/a.dmg", { noBrowse: true })),
        Effect.provide(withService(FailingShell)),
        Effect.either,
        Effect.runPromise
      )

      expect(result._tag).toBe("Left")
      if (result._tag === "Left") {
        expect(result.left.operation).toBe("attach")
        expect(result.left.reason).toBe("Shell command failed: spawn hdiutil ENOENT")
      }
    })
  })

  describe("detach", () => {
    test("runs hdiutil detach on the mount point", async () => {
      const shell = makeStubShell(() => ({ stdout: "\"disk4\" ejected.\n", stderr: "", exitCode: 0 }))

      const outcome = await pipe(
        DiskImageServiceTag,
        Effect.flatMap((svc) => svc.detach("/Volumes/Profile")),
        Effect.provide(withService(shell.layer)),
        Effect.runPromise
      )

      expect(shell.calls).toEqual([{ command: "hdiutil", args: ["detach", "/Volumes/Profile"] }])
      expect(outcome).toEqual({ exitCode: 0, output: "\"disk4\" ejected." })
    })
  })
})
