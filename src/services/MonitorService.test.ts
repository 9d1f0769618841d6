import { describe, expect, test } from "vitest"
import { Effect, Layer, Option, pipe } from "effect"

import { MonitorServiceLive, MonitorServiceTag } from "./MonitorService"
import { DeviceManagerTag, type DeviceManager } from "./DeviceManager"
import type { Device } from "../domain/Device"
import { initialStats } from "../domain/TransferStats"
import { DeviceMountFailed } from "../infra/DeviceDetector"
import {
  createFakeDetector,
  createLogCapture,
  createRecordingNotifier,
  makeDevice,
  makeTestConfig,
  testConfigLayer,
} from "../test/TestContext"

const stubManager = (handle: DeviceManager["handle"]) =>
  Layer.succeed(DeviceManagerTag, {
    evaluate: () => Effect.succeed(true),
    mount: Effect.succeed,
    process: () => Effect.succeed(initialStats(0, 0, 0)),
    handle,
    activeDevices: () => Effect.succeed([]),
  })

const setup = (devices: Device[], handle: DeviceManager["handle"], settleDelay = 0) => {
  const detector = createFakeDetector(devices)
  const log = createLogCapture()
  const config = makeTestConfig({ deviceDetection: { detector: "volumes", settleDelay } })
  const layer = pipe(
    MonitorServiceLive,
    Layer.provide(
      Layer.mergeAll(
        testConfigLayer(config),
        detector.layer,
        log.layer,
        createRecordingNotifier().layer,
        stubManager(handle)
      )
    )
  )
  return { detector, log, layer }
}

describe("MonitorService", () => {
  test("processes attached devices and waits for them on stop", async () => {
    const handled: string[] = []
    const { detector, log, layer } = setup(
      [makeDevice({ name: "sdb1", mountPath: "/mnt/a" }), makeDevice({ name: "sdc1", mountPath: "/mnt/b" })],
      (device) =>
        pipe(
          Effect.sleep("20 millis"),
          Effect.map(() => {
            handled.push(device.name)
            return Option.none()
          })
        )
    )

    await pipe(
      MonitorServiceTag,
      Effect.flatMap((monitor) => pipe(monitor.start(), Effect.zipRight(monitor.stop()))),
      Effect.provide(layer),
      Effect.runPromise
    )

    expect(handled.sort()).toEqual(["sdb1", "sdc1"])
    expect(detector.watchers).toHaveLength(1)
    expect(detector.stopCount).toBe(1)
    expect(log.messages("info")).toEqual([
      "Starting device monitor",
      "Found 2 attached devices",
      "Watching for new devices",
      "Waiting for 2 device runs to finish",
      "Device monitor stopped",
    ])
  })

  test("devices reported by the watch are processed", async () => {
    const handled: string[] = []
    const { detector, log, layer } = setup([], (device) =>
      Effect.sync(() => {
        handled.push(device.name)
        return Option.none()
      })
    )

    await pipe(
      MonitorServiceTag,
      Effect.flatMap((monitor) =>
        Effect.gen(function* () {
          yield* monitor.start()
          for (const onDevice of detector.watchers) {
            yield* onDevice(makeDevice({ name: "sdd1", label: "B_CAM", mountPath: "/mnt/c" }))
          }
          yield* monitor.stop()
        })
      ),
      Effect.provide(layer),
      Effect.runPromise
    )

    expect(handled).toEqual(["sdd1"])
    expect(log.messages("info")).toContain("Device detected: sdd1 (B_CAM, 64.00 GB)")
  })

  test("a failed device run is logged and does not stop the monitor", async () => {
    const { log, layer } = setup([makeDevice({ mountPath: "/mnt/a" })], (device) =>
      Effect.fail(new DeviceMountFailed({ device: device.name, reason: "mount refused" }))
    )

    await pipe(
      MonitorServiceTag,
      Effect.flatMap((monitor) => pipe(monitor.start(), Effect.zipRight(monitor.stop()))),
      Effect.provide(layer),
      Effect.runPromise
    )

    expect(log.entries.filter((e) => e.level === "error")).toEqual([
      { level: "error", message: "Device run failed: mount failed: mount refused", device: "sdb1" },
    ])
    expect(log.messages("info")).toContain("Device monitor stopped")
  })

  test("the watch callback returns before the settle delay", async () => {
    const handled: string[] = []
    const { detector, layer } = setup(
      [],
      (device) =>
        Effect.sync(() => {
          handled.push(device.name)
          return Option.none()
        }),
      0.05
    )

    const beforeStop = await pipe(
      MonitorServiceTag,
      Effect.flatMap((monitor) =>
        Effect.gen(function* () {
          yield* monitor.start()
          for (const onDevice of detector.watchers) {
            yield* onDevice(makeDevice({ name: "sdd1", mountPath: "/mnt/c" }))
          }
          const seen = [...handled]
          yield* monitor.stop()
          return seen
        })
      ),
      Effect.provide(layer),
      Effect.runPromise
    )

    expect(beforeStop).toEqual([])
    expect(handled).toEqual(["sdd1"])
  })
})
