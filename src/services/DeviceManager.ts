/**
 * DeviceManager - the lifecycle of one device run.
 *
 * evaluate (policy) -> mount -> process (scan, transfer, report). `handle`
 * claims the device in the active set before anything else and releases it
 * however the run ends, so a device is never processed twice at once.
 * Devices are left mounted afterwards.
 */

import { Clock, Context, Effect, HashMap, Layer, Option, Ref, pipe } from "effect"
import { describeDevice, isMounted, type Device } from "../domain/Device"
import { policyFromConfig, rejectionReason } from "../domain/DevicePolicy"
import { IngestConfigTag } from "../domain/IngestConfig"
import * as Stats from "../domain/TransferStats"
import { DeviceDetectorTag, DeviceMountFailed } from "../infra/DeviceDetector"
import { formatSize } from "../lib/parseSize"
import { LoggerServiceTag } from "./LoggerService"
import { NotifierServiceTag } from "./NotifierService"
import { ScannerServiceTag, type ScannerError } from "./ScannerService"
import { TransferServiceTag } from "./TransferService"

// =============================================================================
// Service errors
// =============================================================================

export type DeviceError = DeviceMountFailed | ScannerError

// =============================================================================
// Service interface
// =============================================================================

export interface HandleOptions {
  /** Skip the inclusion policy */
  readonly force?: boolean
}

export interface DeviceManager {
  /** Inclusion policy; rejected devices are logged at debug level */
  readonly evaluate: (device: Device) => Effect.Effect<boolean>
  readonly mount: (device: Device) => Effect.Effect<Device, DeviceMountFailed>
  /** Scans a mounted device and transfers everything on it */
  readonly process: (device: Device) => Effect.Effect<Stats.TransferStats, DeviceError>
  /**
   * evaluate -> mount -> process. None when the device was skipped, either
   * by policy or because it is already being processed.
   */
  readonly handle: (
    device: Device,
    options?: HandleOptions
  ) => Effect.Effect<Option.Option<Stats.TransferStats>, DeviceError>
  readonly activeDevices: () => Effect.Effect<readonly Device[]>
}

export class DeviceManagerTag extends Context.Tag("DeviceManager")<DeviceManagerTag, DeviceManager>() {}

// =============================================================================
// Live implementation
// =============================================================================

export const DeviceManagerLive = Layer.effect(
  DeviceManagerTag,
  Effect.gen(function* () {
    const config = yield* IngestConfigTag
    const detector = yield* DeviceDetectorTag
    const scanner = yield* ScannerServiceTag
    const transfer = yield* TransferServiceTag
    const logger = yield* LoggerServiceTag
    const notifier = yield* NotifierServiceTag

    const policy = policyFromConfig(config)
    const active = yield* Ref.make(HashMap.empty<string, Device>())

    const evaluate: DeviceManager["evaluate"] = (device) => {
      const reason = rejectionReason(device, policy)
      return reason === undefined
        ? Effect.succeed(true)
        : Effect.as(logger.debug(`Skipping ${describeDevice(device)}: ${reason}`), false)
    }

    const mount: DeviceManager["mount"] = (device) => {
      if (isMounted(device)) return Effect.succeed(device)
      if (!config.autoMount.enabled) {
        return Effect.fail(
          new DeviceMountFailed({ device: device.name, reason: "device is not mounted and autoMount is disabled" })
        )
      }
      return pipe(
        detector.mount(device),
        Effect.tap((mounted) => logger.info(`Mounted ${device.path} at ${mounted.mountPath}`, device.name))
      )
    }

    const register = (device: Device) => Ref.update(active, HashMap.set(device.name, device))

    /** Test-and-insert; false when the device is already claimed */
    const claim = (device: Device) =>
      Ref.modify(active, (devices) =>
        HashMap.has(devices, device.name) ? [false, devices] : [true, HashMap.set(devices, device.name, device)]
      )

    const deregister = (device: Device) =>
      pipe(Ref.update(active, HashMap.remove(device.name)), Effect.zipRight(logger.closeDeviceLog(device.name)))

    const run = (device: Device): Effect.Effect<Stats.TransferStats, DeviceError> =>
      Effect.gen(function* () {
        yield* logger.info(`Processing ${describeDevice(device)} from ${device.mountPath}`, device.name)

        const files = yield* scanner.scanDevice(device.mountPath)
        yield* logger.openDeviceLog(device)
        yield* logger.info(`Found ${files.length} files`, device.name)

        if (files.length === 0) {
          yield* logger.info("No files to transfer", device.name)
          return Stats.initialStats(0, 0, yield* Clock.currentTimeMillis)
        }

        const { stats } = yield* transfer.transferFiles(device.name, files)
        const location = yield* logger.logLocation(device.name)
        yield* notifier.transferComplete(device.name, stats, location)

        const summary = `${Stats.succeededFiles(stats)}/${stats.totalFiles} files, ${formatSize(stats.transferredBytes)}`
        yield* stats.failedFiles === 0
          ? logger.success(`Ingest complete: ${summary}`, device.name)
          : logger.warning(`Ingest finished with ${stats.failedFiles} failures: ${summary}`, device.name)

        return stats
      })

    const processDevice: DeviceManager["process"] = (device) =>
      Effect.acquireUseRelease(register(device), () => run(device), () => deregister(device))

    const handleClaimed = (device: Device, options: HandleOptions) =>
      Effect.gen(function* () {
        const allowed = options.force === true || (yield* evaluate(device))
        if (!allowed) return Option.none()

        const mounted = yield* mount(device)
        return Option.some(yield* run(mounted))
      })

    const handle: DeviceManager["handle"] = (device, options = {}) =>
      Effect.acquireUseRelease(
        claim(device),
        (claimed): Effect.Effect<Option.Option<Stats.TransferStats>, DeviceError> =>
          claimed
            ? handleClaimed(device, options)
            : Effect.as(logger.warning(`${device.name} is already being processed`, device.name), Option.none()),
        (claimed) => (claimed ? deregister(device) : Effect.void)
      )

    const activeDevices: DeviceManager["activeDevices"] = () =>
      pipe(Ref.get(active), Effect.map((devices) => Array.from(HashMap.values(devices))))

    return { evaluate, mount, process: processDevice, handle, activeDevices }
  })
)
