import { describe, expect, test } from "vitest"
import { Option } from "effect"
import {
  combineOutput,
  findMountPoint,
  isAuthenticationCancellation,
  parseAttachOutput,
  resolveSecureProfilePath,
  volumeLabel,
  type DiskImageDescriptor,
} from "./DiskImage"

const images: DiskImageDescriptor[] = [
  {
    imagePath: "/Users/tester/Downloads/Installer.dmg",
    systemEntities: [{ contentHint: "Apple_HFS", mountPoint: "/Volumes/Installer" }],
  },
  {
    imagePath: "/Users/tester/Movies/Profile.dmg",
    systemEntities: [
      { contentHint: "GUID_partition_scheme" },
      { contentHint: "Apple_HFS", mountPoint: "/Volumes/Profile" },
      { contentHint: "Apple_HFS", mountPoint: "/Volumes/Profile 1" },
    ],
  },
]

describe("findMountPoint", () => {
  test("returns the first mount point of the matching image", () => {
    expect(Option.getOrNull(findMountPoint(images, "/Users/tester/Movies/Profile.dmg"))).toBe("/Volumes/Profile")
  })

  test("matches the image path exactly", () => {
    expect(Option.isNone(findMountPoint(images, "/Users/tester/Movies/Profile"))).toBe(true)
  })

  test("attached image without a mounted volume has no mount point", () => {
    const attached: DiskImageDescriptor[] = [
      { imagePath: "/tmp/a.dmg", systemEntities: [{ contentHint: "GUID_partition_scheme" }] },
    ]
    expect(Option.isNone(findMountPoint(attached, "/tmp/a.dmg"))).toBe(true)
  })

  test("empty image list", () => {
    expect(Option.isNone(findMountPoint([], "/tmp/a.dmg"))).toBe(true)
  })
})

describe("parseAttachOutput", () => {
  test("takes the volume path from the tab-separated line", () => {
    const output = [
      "/dev/disk4          \tGUID_partition_scheme          \t",
      "/dev/disk4s1        \tApple_HFS                      \t/Volumes/Profile Secure",
    ].join("\n")

    expect(Option.getOrNull(parseAttachOutput(output))).toBe("/Volumes/Profile Secure")
  })

  test("returns the first matching line", () => {
    const output = "/dev/disk4s1\tApple_HFS\t/Volumes/A\n/dev/disk4s2\tApple_HFS\t/Volumes/B"
    expect(Option.getOrNull(parseAttachOutput(output))).toBe("/Volumes/A")
  })

  test("ignores mount paths outside /Volumes/", () => {
    expect(Option.isNone(parseAttachOutput("/dev/disk4s1\tApple_HFS\t/private/tmp/mnt"))).toBe(true)
  })

  test("needs at least three fields", () => {
    expect(Option.isNone(parseAttachOutput("Apple_HFS\t/Volumes/Profile"))).toBe(true)
  })

  test("empty output", () => {
    expect(Option.isNone(parseAttachOutput(""))).toBe(true)
  })
})

describe("isAuthenticationCancellation", () => {
  test.each([
    "hdiutil: attach failed - Authentication_Canceled",
    "hdiutil: attach failed - authentication error",
    "password prompt cancelled",
    "hdiutil: attach canceled",
  ])("recognises %s", (output) => {
    expect(isAuthenticationCancellation(output)).toBe(true)
  })

  test("is case-sensitive", () => {
    expect(isAuthenticationCancellation("HDIUTIL: ATTACH CANCELED")).toBe(false)
  })

  test("other failures are not cancellations", () => {
    expect(isAuthenticationCancellation("hdiutil: attach failed - no mountable file systems")).toBe(false)
  })
})

describe("volumeLabel", () => {
  test("strips directory and extension", () => {
    expect(volumeLabel("/Users/tester/Movies/Profile.dmg")).toBe("Profile")
  })

  test("strips only the last extension", () => {
    expect(volumeLabel("/tmp/backup.sparse.dmg")).toBe("backup.sparse")
  })

  test("keeps names without an extension", () => {
    expect(volumeLabel("/tmp/Profile")).toBe("Profile")
    expect(volumeLabel("/tmp/.hidden")).toBe(".hidden")
  })
})

describe("resolveSecureProfilePath", () => {
  test("absolute paths are kept", () => {
    expect(resolveSecureProfilePath("/Volumes/Profile Secure/abc.Secure", "/Volumes/Profile")).toBe(
      "/Volumes/Profile Secure/abc.Secure"
    )
  })

  test("relative paths are resolved against the mount point", () => {
    expect(resolveSecureProfilePath("abc.Secure", "/Volumes/Profile")).toBe("/Volumes/Profile/abc.Secure")
    expect(resolveSecureProfilePath("abc.Secure", "/Volumes/Profile/")).toBe("/Volumes/Profile/abc.Secure")
  })
})

describe("combineOutput", () => {
  test("joins trimmed stdout and stderr", () => {
    expect(combineOutput("  /dev/disk4\n", "hdiutil: warning\n")).toBe("/dev/disk4\nhdiutil: warning")
  })

  test("drops empty parts", () => {
    expect(combineOutput("", "hdiutil: attach canceled\n")).toBe("hdiutil: attach canceled")
    expect(combineOutput("\n", "  ")).toBe("")
  })
})
