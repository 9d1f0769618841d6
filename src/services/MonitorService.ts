/**
 * MonitorService - processes attached devices, then watches for new ones.
 *
 * Every device runs in its own fiber, so a slow card never holds up the
 * next one. A newly reported device waits out the settle delay inside its own
 * fiber, so the watch callback returns at once. Device runs are
 * uninterruptible: `stop` ends the watch, then waits for the runs in flight
 * and for the notifications they sent.
 */

import { Context, Duration, Effect, Fiber, HashSet, Layer, Match, Option, Ref, pipe } from "effect"
import { describeDevice, type Device } from "../domain/Device"
import { IngestConfigTag } from "../domain/IngestConfig"
import {
  DeviceDetectorTag,
  type DeviceDetectionFailed,
  type WatchAlreadyActive,
} from "../infra/DeviceDetector"
import { DeviceManagerTag, type DeviceError } from "./DeviceManager"
import { LoggerServiceTag } from "./LoggerService"
import { NotifierServiceTag } from "./NotifierService"

export const describeDeviceError = Match.typeTags<DeviceError>()({
  DeviceMountFailed: (e) => `mount failed: ${e.reason}`,
  ScanPathNotFound: (e) => `path not found: ${e.path}`,
  ScanPermissionDenied: (e) => `permission denied: ${e.path}`,
  ScanFailed: (e) => `scan failed at ${e.path}: ${e.reason}`,
})

// =============================================================================
// Service interface
// =============================================================================

export type MonitorError = DeviceDetectionFailed | WatchAlreadyActive

export interface MonitorService {
  /** Starts runs for attached devices and begins watching. Returns immediately. */
  readonly start: () => Effect.Effect<void, MonitorError>
  /** Stops watching and waits for every device run in flight */
  readonly stop: () => Effect.Effect<void>
  /** start, then block until interrupted, then stop */
  readonly runUntilInterrupted: () => Effect.Effect<never, MonitorError>
}

export class MonitorServiceTag extends Context.Tag("MonitorService")<MonitorServiceTag, MonitorService>() {}

// =============================================================================
// Live implementation
// =============================================================================

export const MonitorServiceLive = Layer.effect(
  MonitorServiceTag,
  Effect.gen(function* () {
    const config = yield* IngestConfigTag
    const detector = yield* DeviceDetectorTag
    const devices = yield* DeviceManagerTag
    const logger = yield* LoggerServiceTag
    const notifier = yield* NotifierServiceTag

    const settleDelay = Duration.seconds(config.deviceDetection.settleDelay)
    const inFlight = yield* Ref.make(HashSet.empty<Fiber.RuntimeFiber<void>>())

    const handleLogged = (device: Device): Effect.Effect<void> =>
      pipe(
        devices.handle(device),
        Effect.asVoid,
        Effect.catchAll((e) => logger.error(`Device run failed: ${describeDeviceError(e)}`, device.name))
      )

    const prune = Effect.gen(function* () {
      const fibers = yield* Ref.get(inFlight)
      const running = yield* Effect.filter(fibers, (fiber) => Effect.map(Fiber.poll(fiber), Option.isNone))
      yield* Ref.set(inFlight, HashSet.fromIterable(running))
    })

    const spawn = (device: Device, delay: Duration.Duration) =>
      Effect.gen(function* () {
        yield* prune
        const fiber = yield* Effect.forkDaemon(
          pipe(Effect.sleep(delay), Effect.zipRight(Effect.uninterruptible(handleLogged(device))))
        )
        yield* Ref.update(inFlight, HashSet.add(fiber))
      })

    const onArrival = (device: Device) =>
      pipe(
        logger.info(`Device detected: ${describeDevice(device)}`, device.name),
        Effect.zipRight(spawn(device, settleDelay))
      )

    const start: MonitorService["start"] = () =>
      Effect.gen(function* () {
        yield* logger.info("Starting device monitor")

        const attached = yield* detector.detectDevices()
        yield* logger.info(`Found ${attached.length} attached devices`)
        yield* Effect.forEach(attached, (device) => spawn(device, Duration.zero), { discard: true })

        yield* detector.watchForDevices(onArrival)
        yield* logger.info("Watching for new devices")
      })

    const stop: MonitorService["stop"] = () =>
      Effect.gen(function* () {
        yield* detector.stopWatching()
        const fibers = Array.from(yield* Ref.get(inFlight))
        if (fibers.length > 0) {
          yield* logger.info(`Waiting for ${fibers.length} device runs to finish`)
        }
        yield* Fiber.awaitAll(fibers)
        yield* Ref.set(inFlight, HashSet.empty())
        yield* notifier.awaitPending()
        yield* logger.info("Device monitor stopped")
      })

    const runUntilInterrupted: MonitorService["runUntilInterrupted"] = () =>
      Effect.acquireUseRelease(start(), () => Effect.never, () => stop())

    return { start, stop, runUntilInterrupted }
  })
)
