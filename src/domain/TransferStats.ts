/**
 * Running totals for one device transfer.
 *
 * `processedFiles` counts every file whose outcome is known, successful or
 * not, so `processedFiles - failedFiles` is the number that arrived intact.
 */

export interface TransferStats {
  readonly totalFiles: number
  readonly processedFiles: number
  readonly failedFiles: number
  readonly totalBytes: number
  readonly transferredBytes: number
  /** Epoch millis */
  readonly startedAt: number
}

export const initialStats = (totalFiles: number, totalBytes: number, startedAt: number): TransferStats => ({
  totalFiles,
  processedFiles: 0,
  failedFiles: 0,
  totalBytes,
  transferredBytes: 0,
  startedAt,
})

export const recordSuccess = (stats: TransferStats, bytes: number): TransferStats => ({
  ...stats,
  processedFiles: stats.processedFiles + 1,
  transferredBytes: stats.transferredBytes + bytes,
})

export const recordFailure = (stats: TransferStats): TransferStats => ({
  ...stats,
  processedFiles: stats.processedFiles + 1,
  failedFiles: stats.failedFiles + 1,
})

export const succeededFiles = (stats: TransferStats): number => stats.processedFiles - stats.failedFiles

/** Percentage of queued bytes transferred, 0 when nothing was queued. */
export const progressPercent = (stats: TransferStats): number =>
  stats.totalBytes > 0 ? (stats.transferredBytes / stats.totalBytes) * 100 : 0

/** Bytes per second since `startedAt`. */
export const throughput = (stats: TransferStats, now: number): number => {
  const elapsedSeconds = (now - stats.startedAt) / 1000
  return elapsedSeconds > 0 ? stats.transferredBytes / elapsedSeconds : 0
}
