import type { Device } from "./Device"
import type { IngestConfig } from "./IngestConfig"

export interface DevicePolicy {
  readonly minSizeBytes: number
  /** Empty means any filesystem is accepted */
  readonly allowedFilesystems: readonly string[]
  /** Substrings of the device path that exclude it */
  readonly excludePatterns: readonly string[]
}

export const policyFromConfig = (config: IngestConfig): DevicePolicy => ({
  minSizeBytes: config.deviceDetection.minSize,
  allowedFilesystems: config.deviceDetection.allowedFilesystems,
  excludePatterns: config.deviceDetection.excludePatterns,
})

/**
 * Why a device is not ingested, or undefined when it passes every check.
 */
export const rejectionReason = (device: Device, policy: DevicePolicy): string | undefined => {
  if (device.sizeBytes < policy.minSizeBytes) {
    return `smaller than minimum size (${device.sizeBytes} < ${policy.minSizeBytes} bytes)`
  }

  if (policy.allowedFilesystems.length > 0) {
    const fs = device.filesystem.toLowerCase()
    if (!policy.allowedFilesystems.some((allowed) => allowed.toLowerCase() === fs)) {
      return `filesystem "${device.filesystem}" is not allowed`
    }
  }

  const excluded = policy.excludePatterns.find((pattern) => device.path.includes(pattern))
  if (excluded !== undefined) {
    return `path matches exclude pattern "${excluded}"`
  }

  return undefined
}
