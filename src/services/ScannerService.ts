/**
 * ScannerService - lists the regular files on a mounted device.
 *
 * 1. Walk the mount path recursively
 * 2. Stat every entry in parallel and keep regular files
 *
 * Only a failure to walk the root fails the scan. An entry that cannot be
 * stat'ed (a dangling symlink, a file deleted mid-scan) is kept, so the
 * transfer reports it as a failed file.
 */

import * as path from "node:path"
import { Array, Context, Data, Effect, Layer, Match, Order, pipe } from "effect"
import { WalkServiceTag, type WalkError } from "../infra/WalkService"
import { FileStatServiceTag } from "../infra/FileStatService"

// =============================================================================
// Service errors - all possible failure modes
// =============================================================================

export class ScanPathNotFound extends Data.TaggedError("ScanPathNotFound")<{
  readonly path: string
}> {}

export class ScanPermissionDenied extends Data.TaggedError("ScanPermissionDenied")<{
  readonly path: string
}> {}

export class ScanFailed extends Data.TaggedError("ScanFailed")<{
  readonly path: string
  readonly reason: string
}> {}

export type ScannerError = ScanPathNotFound | ScanPermissionDenied | ScanFailed

// =============================================================================
// Error transformations from infra to service layer
// =============================================================================

const fromWalkError = Match.typeTags<WalkError>()({
  WalkNotFound: (e) => new ScanPathNotFound({ path: e.path }),
  WalkPermissionDenied: (e) => new ScanPermissionDenied({ path: e.path }),
  WalkUnknownError: (e) => new ScanFailed({ path: e.path, reason: e.cause }),
})

// =============================================================================
// Service interface
// =============================================================================

export interface ScannerService {
  /** Absolute paths of every regular file below `root`, sorted */
  readonly scanDevice: (root: string) => Effect.Effect<readonly string[], ScannerError>
}

export class ScannerServiceTag extends Context.Tag("ScannerService")<
  ScannerServiceTag,
  ScannerService
>() {}

// =============================================================================
// Live implementation
// =============================================================================

const STAT_CONCURRENCY = 32

export const ScannerServiceLive = Layer.effect(
  ScannerServiceTag,
  Effect.gen(function* () {
    const walker = yield* WalkServiceTag
    const fileStat = yield* FileStatServiceTag

    const isRegularFile = (absolutePath: string): Effect.Effect<boolean> =>
      pipe(
        fileStat.stat(absolutePath),
        Effect.map((stat) => stat.type === "File"),
        Effect.orElseSucceed(() => true)
      )

    const scanDevice: ScannerService["scanDevice"] = (root) =>
      pipe(
        walker.walk(root),
        Effect.mapError(fromWalkError),
        Effect.map((entries) => entries.map((relativePath) => path.join(root, relativePath))),
        Effect.flatMap((paths) =>
          Effect.filter(paths, isRegularFile, { concurrency: STAT_CONCURRENCY })
        ),
        Effect.map(Array.sort(Order.string))
      )

    return { scanDevice }
  })
)
