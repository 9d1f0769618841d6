/**
 * VolumeDeviceDetector - mounted volumes under a root directory.
 *
 * Desktop systems mount removable media on their own, either directly under
 * the root (`/Volumes/<label>`) or one level deeper (`/media/<user>/<label>`).
 * A directory is a device when its filesystem differs from its parent's;
 * with `requireMountPoint` off every directory counts.
 */

import * as path from "node:path"
import { Array, Duration, Effect, Layer, Option, Order, pipe } from "effect"
import { FileSystem } from "@effect/platform"
import { isMounted, withMountPath, type Device } from "../domain/Device"
import { IngestConfigTag } from "../domain/IngestConfig"
import { DiskStatsServiceTag } from "./DiskStatsService"
import {
  DeviceDetectionFailed,
  type DeviceDetector,
  DeviceDetectorTag,
  DeviceMountFailed,
  directoryDevice,
} from "./DeviceDetector"
import { makePollingWatcher } from "./DeviceWatcher"

export const VolumeDeviceDetectorLive = Layer.effect(
  DeviceDetectorTag,
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem
    const diskStats = yield* DiskStatsServiceTag
    const config = yield* IngestConfigTag
    const { volumesRoot, requireMountPoint } = config.deviceDetection

    const detectionFailed = (e: { readonly message: string }) => new DeviceDetectionFailed({ reason: e.message })

    const statDirectory = (directory: string): Effect.Effect<Option.Option<FileSystem.File.Info>> =>
      pipe(
        fs.stat(directory),
        Effect.map((info) => (info.type === "Directory" ? Option.some(info) : Option.none())),
        // Entries can vanish between listing and stat
        Effect.orElseSucceed(() => Option.none())
      )

    const toDevice = (directory: string): Effect.Effect<Device, DeviceDetectionFailed> =>
      pipe(
        diskStats.getStats(directory),
        Effect.map((stats) => directoryDevice(directory, stats)),
        Effect.mapError((e) => new DeviceDetectionFailed({ reason: `${directory}: ${e._tag}` }))
      )

    /** Mounted directories among the children of `parent`, descending one level into plain ones. */
    const volumesUnder = (
      parent: string,
      parentDev: number,
      depth: number
    ): Effect.Effect<readonly string[], DeviceDetectionFailed> =>
      pipe(
        fs.readDirectory(parent),
        Effect.mapError(detectionFailed),
        Effect.flatMap((entries) =>
          Effect.forEach(Array.sort(entries, Order.string), (entry) => {
            const directory = path.join(parent, entry)
            return pipe(
              statDirectory(directory),
              Effect.flatMap(
                Option.match({
                  onNone: () => Effect.succeed<readonly string[]>([]),
                  onSome: (info) => {
                    if (!requireMountPoint || info.dev !== parentDev) return Effect.succeed([directory])
                    return depth > 0 ? volumesUnder(directory, info.dev, depth - 1) : Effect.succeed([])
                  },
                })
              )
            )
          })
        ),
        Effect.map((nested) => nested.flat())
      )

    const detectDevices: DeviceDetector["detectDevices"] = () =>
      pipe(
        fs.stat(volumesRoot),
        Effect.mapError(detectionFailed),
        Effect.flatMap((root) => volumesUnder(volumesRoot, root.dev, requireMountPoint ? 1 : 0)),
        Effect.flatMap((directories) => Effect.forEach(directories, toDevice))
      )

    const getDeviceInfo: DeviceDetector["getDeviceInfo"] = (directory) =>
      pipe(
        statDirectory(directory),
        Effect.flatMap(
          Option.match({
            onNone: () => Effect.fail(new DeviceDetectionFailed({ reason: `${directory} is not a directory` })),
            onSome: () => toDevice(directory),
          })
        )
      )

    const mount: DeviceDetector["mount"] = (device) =>
      Effect.succeed(isMounted(device) ? device : withMountPath(device, device.path))

    const unmount: DeviceDetector["unmount"] = (device) =>
      Effect.fail(
        new DeviceMountFailed({
          device: device.name,
          reason: "volumes are unmounted through the operating system",
        })
      )

    const watch = yield* makePollingWatcher(
      detectDevices,
      Duration.seconds(config.deviceDetection.pollInterval)
    )

    return { detectDevices, getDeviceInfo, mount, unmount, ...watch }
  })
)
