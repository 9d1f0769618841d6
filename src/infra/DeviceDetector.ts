/**
 * DeviceDetector - platform capability for finding, mounting and watching
 * removable media.
 *
 * Two adapters exist: LinuxDeviceDetector (lsblk block devices) and
 * VolumeDeviceDetector (mount points under a volumes root). The adapter is
 * chosen from `deviceDetection.detector` when the app layer is built.
 */

import * as path from "node:path"
import { Context, Data, type Effect } from "effect"
import type { Device } from "../domain/Device"
import type { DiskStats } from "./DiskStatsService"

// =============================================================================
// Errors
// =============================================================================

export class DeviceDetectionFailed extends Data.TaggedError("DeviceDetectionFailed")<{
  readonly reason: string
}> {}

export class DeviceMountFailed extends Data.TaggedError("DeviceMountFailed")<{
  readonly device: string
  readonly reason: string
}> {}

export class WatchAlreadyActive extends Data.TaggedError("WatchAlreadyActive")<{}> {}

export type DeviceDetectorError = DeviceDetectionFailed | DeviceMountFailed | WatchAlreadyActive

// =============================================================================
// Service interface
// =============================================================================

export interface DeviceDetector {
  /** Devices currently attached that look like removable media */
  readonly detectDevices: () => Effect.Effect<readonly Device[], DeviceDetectionFailed>
  /** Returns the device with its mount path set */
  readonly mount: (device: Device) => Effect.Effect<Device, DeviceMountFailed>
  readonly unmount: (device: Device) => Effect.Effect<void, DeviceMountFailed>
  readonly getDeviceInfo: (path: string) => Effect.Effect<Device, DeviceDetectionFailed>
  /**
   * Starts a background watch that calls `onDevice` for every device that
   * appears after the call. Returns once the watch is running.
   */
  readonly watchForDevices: (
    onDevice: (device: Device) => Effect.Effect<void>
  ) => Effect.Effect<void, WatchAlreadyActive>
  /** Stops the watch; does nothing when none is running */
  readonly stopWatching: () => Effect.Effect<void>
}

export class DeviceDetectorTag extends Context.Tag("DeviceDetector")<DeviceDetectorTag, DeviceDetector>() {}

// =============================================================================
// Helpers
// =============================================================================

/** A plain directory treated as an already mounted device. */
export const directoryDevice = (directory: string, stats: DiskStats): Device => {
  const name = path.basename(directory) || directory
  return {
    name,
    path: directory,
    mountPath: directory,
    filesystem: "",
    sizeBytes: stats.size,
    label: name,
  }
}
