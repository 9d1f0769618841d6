/**
 * DiskStatsService - wraps check-disk-space for testability.
 *
 * NOTE: check-disk-space resolves the filesystem containing any path, so a
 * directory that is not itself a mount point reports its parent's totals.
 * Callers that need a real mount point check it separately.
 */

import { Context, Data, Effect, Layer, pipe } from "effect"
import checkDiskSpace from "check-disk-space"

// =============================================================================
// Typed errors - all possible failures from check-disk-space
// =============================================================================

export class DiskStatsPermissionDenied extends Data.TaggedError("DiskStatsPermissionDenied")<{
  readonly path: string
}> {}

export class DiskStatsUnknownError extends Data.TaggedError("DiskStatsUnknownError")<{
  readonly path: string
  readonly cause: string
}> {}

export type DiskStatsError = DiskStatsPermissionDenied | DiskStatsUnknownError

// =============================================================================
// Service interface
// =============================================================================

export interface DiskStats {
  readonly free: number
  readonly size: number
}

export interface DiskStatsService {
  readonly getStats: (path: string) => Effect.Effect<DiskStats, DiskStatsError>
}

export class DiskStatsServiceTag extends Context.Tag("DiskStatsService")<
  DiskStatsServiceTag,
  DiskStatsService
>() {}

// =============================================================================
// Error detection from check-disk-space errors
// =============================================================================

const errorCode = (error: unknown): string | undefined =>
  error instanceof Error && "code" in error && typeof error.code === "string"
    ? error.code.toUpperCase()
    : undefined

const toDiskStatsError = (path: string, error: unknown): DiskStatsError => {
  const code = errorCode(error)
  const message = error instanceof Error ? error.message : String(error)

  if (code === "EACCES" || code === "EPERM" || message.toLowerCase().includes("permission denied")) {
    return new DiskStatsPermissionDenied({ path })
  }

  return new DiskStatsUnknownError({ path, cause: message })
}

// =============================================================================
// Live implementation (check-disk-space)
// =============================================================================

export const DiskStatsServiceLive = Layer.succeed(DiskStatsServiceTag, {
  getStats: (path) =>
    pipe(
      Effect.tryPromise({
        try: () => checkDiskSpace(path),
        catch: (e) => toDiskStatsError(path, e),
      }),
      Effect.map(({ free, size }) => ({ free, size }))
    ),
})
