/**
 * Domain type for a removable storage volume.
 */

import { formatSize } from "../lib/parseSize"

export interface Device {
  /** Short identifier, e.g. "sdb1" or the volume directory name */
  readonly name: string
  /** Raw device path (/dev/sdb1) or the volume directory */
  readonly path: string
  /** Where the files can be read from; empty until mounted */
  readonly mountPath: string
  readonly filesystem: string
  readonly sizeBytes: number
  readonly label: string
}

export const isMounted = (device: Device): boolean => device.mountPath !== ""

export const withMountPath = (device: Device, mountPath: string): Device => ({
  ...device,
  mountPath,
})

export const describeDevice = (device: Device): string =>
  `${device.name} (${device.label || "no label"}, ${formatSize(device.sizeBytes)})`
