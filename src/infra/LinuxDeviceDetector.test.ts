import { describe, expect, test } from "vitest"
import { Effect, Either, Layer, pipe } from "effect"
import { FileSystem } from "@effect/platform"

import { LinuxDeviceDetectorLive, LSBLK_COLUMNS, parseLsblkDevices } from "./LinuxDeviceDetector"
import { DeviceDetectorTag } from "./DeviceDetector"
import { ShellServiceTag, type ShellResult } from "./ShellService"
import { makeDevice, makeTestConfig, testConfigLayer } from "../test/TestContext"

// =============================================================================
// Fixtures
// =============================================================================

const LSBLK_OUTPUT = JSON.stringify({
  blockdevices: [
    {
      name: "sda",
      path: "/dev/sda",
      size: 500107862016,
      fstype: null,
      label: null,
      mountpoint: null,
      rm: false,
      hotplug: false,
      type: "disk",
      children: [
        {
          name: "sda1",
          path: "/dev/sda1",
          size: 500106813440,
          fstype: "ext4",
          label: "system",
          mountpoint: "/",
          rm: false,
          hotplug: false,
          type: "part",
        },
      ],
    },
    {
      name: "sdb",
      path: "/dev/sdb",
      size: 64088965120,
      fstype: null,
      label: null,
      mountpoint: null,
      rm: true,
      hotplug: true,
      type: "disk",
      children: [
        {
          name: "sdb1",
          path: "/dev/sdb1",
          size: 64087916544,
          fstype: "exfat",
          label: "CARD",
          mountpoint: "/media/CARD",
          rm: false,
          hotplug: false,
          type: "part",
        },
      ],
    },
  ],
})

/** util-linux before 2.33 prints flags and sizes as strings */
const LEGACY_LSBLK_OUTPUT = JSON.stringify({
  blockdevices: [
    {
      name: "sdc",
      path: "/dev/sdc",
      size: "31914983424",
      fstype: "vfat",
      label: "B_CAM",
      mountpoint: null,
      rm: "1",
      hotplug: "0",
      type: "disk",
    },
  ],
})

// =============================================================================
// Parsing
// =============================================================================

describe("parseLsblkDevices", () => {
  test("keeps removable partitions with a filesystem", () => {
    expect(parseLsblkDevices(LSBLK_OUTPUT)).toEqual(
      Either.right([
        {
          name: "sdb1",
          path: "/dev/sdb1",
          mountPath: "/media/CARD",
          filesystem: "exfat",
          sizeBytes: 64087916544,
          label: "CARD",
        },
      ])
    )
  })

  test("accepts string flags and sizes", () => {
    expect(parseLsblkDevices(LEGACY_LSBLK_OUTPUT)).toEqual(
      Either.right([
        {
          name: "sdc",
          path: "/dev/sdc",
          mountPath: "",
          filesystem: "vfat",
          sizeBytes: 31914983424,
          label: "B_CAM",
        },
      ])
    )
  })

  test("rejects output that is not lsblk JSON", () => {
    const result = parseLsblkDevices("lsblk: unknown column")
    expect(Either.isLeft(result)).toBe(true)
    if (Either.isLeft(result)) {
      expect(result.left.startsWith("unexpected lsblk output:")).toBe(true)
    }
  })
})

// =============================================================================
// Live adapter with a stub shell
// =============================================================================

const setup = (respond: (command: string, args: readonly string[]) => ShellResult) => {
  const calls: string[] = []
  const directories: string[] = []

  const shell = Layer.succeed(ShellServiceTag, {
    exec: (command, args) =>
      Effect.sync(() => {
        calls.push([command, ...args].join(" "))
        return respond(command, args)
      }),
  })

  const fs = FileSystem.layerNoop({
    makeDirectory: (path) => Effect.sync(() => void directories.push(path)),
  })

  const config = makeTestConfig({ autoMount: { enabled: true, mountBase: "/mnt/ingest" } })
  const layer = pipe(LinuxDeviceDetectorLive, Layer.provide(Layer.mergeAll(shell, fs, testConfigLayer(config))))

  return { calls, directories, layer }
}

const ok = (stdout: string): ShellResult => ({ stdout, stderr: "", exitCode: 0 })

describe("LinuxDeviceDetector", () => {
  test("detectDevices asks lsblk for bytes as JSON", async () => {
    const { calls, layer } = setup(() => ok(LSBLK_OUTPUT))

    const devices = await pipe(
      DeviceDetectorTag,
      Effect.flatMap((detector) => detector.detectDevices()),
      Effect.provide(layer),
      Effect.runPromise
    )

    expect(devices.map((d) => d.name)).toEqual(["sdb1"])
    expect(calls).toEqual([`lsblk -J -b -o ${LSBLK_COLUMNS}`])
  })

  test("a failing lsblk becomes DeviceDetectionFailed", async () => {
    const { layer } = setup(() => ({ stdout: "", stderr: "lsblk: not found", exitCode: 127 }))

    const error = await pipe(
      DeviceDetectorTag,
      Effect.flatMap((detector) => detector.detectDevices()),
      Effect.flip,
      Effect.provide(layer),
      Effect.runPromise
    )

    expect(error).toEqual(
      expect.objectContaining({
        _tag: "DeviceDetectionFailed",
        reason: `lsblk -J -b -o ${LSBLK_COLUMNS}: lsblk: not found`,
      })
    )
  })

  test("mount creates the mount point under mountBase", async () => {
    const { calls, directories, layer } = setup(() => ok(""))

    const mounted = await pipe(
      DeviceDetectorTag,
      Effect.flatMap((detector) => detector.mount(makeDevice())),
      Effect.provide(layer),
      Effect.runPromise
    )

    expect(mounted.mountPath).toBe("/mnt/ingest/sdb1")
    expect(directories).toEqual(["/mnt/ingest/sdb1"])
    expect(calls).toEqual(["mount /dev/sdb1 /mnt/ingest/sdb1"])
  })

  test("mount leaves an already mounted device alone", async () => {
    const { calls, layer } = setup(() => ok(""))
    const device = makeDevice({ mountPath: "/media/CARD" })

    const mounted = await pipe(
      DeviceDetectorTag,
      Effect.flatMap((detector) => detector.mount(device)),
      Effect.provide(layer),
      Effect.runPromise
    )

    expect(mounted).toEqual(device)
    expect(calls).toEqual([])
  })

  test("a refused mount becomes DeviceMountFailed", async () => {
    const { layer } = setup(() => ({ stdout: "", stderr: "mount: only root can do that\n", exitCode: 1 }))

    const error = await pipe(
      DeviceDetectorTag,
      Effect.flatMap((detector) => detector.mount(makeDevice())),
      Effect.flip,
      Effect.provide(layer),
      Effect.runPromise
    )

    expect(error).toEqual(
      expect.objectContaining({ _tag: "DeviceMountFailed", device: "sdb1", reason: "mount: only root can do that" })
    )
  })

  test("getDeviceInfo returns the queried partition", async () => {
    const { calls, layer } = setup(() => ok(LSBLK_OUTPUT))

    const device = await pipe(
      DeviceDetectorTag,
      Effect.flatMap((detector) => detector.getDeviceInfo("/dev/sda1")),
      Effect.provide(layer),
      Effect.runPromise
    )

    expect(device.label).toBe("system")
    expect(calls).toEqual([`lsblk -J -b -o ${LSBLK_COLUMNS} /dev/sda1`])
  })
})
