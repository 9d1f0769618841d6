/**
 * WalkService - recursive directory listing for testability.
 *
 * Live implementation uses @effect/platform FileSystem.readDirectory with
 * `recursive`. All errors are caught and converted to typed errors.
 */

import { Context, Data, Effect, Layer, pipe } from "effect"
import { FileSystem, type Error as PlatformErrors } from "@effect/platform"
import { platformFailure } from "./platformError"

// =============================================================================
// Typed errors
// =============================================================================

export class WalkNotFound extends Data.TaggedError("WalkNotFound")<{
  readonly path: string
}> {}

export class WalkPermissionDenied extends Data.TaggedError("WalkPermissionDenied")<{
  readonly path: string
}> {}

export class WalkUnknownError extends Data.TaggedError("WalkUnknownError")<{
  readonly path: string
  readonly cause: string
}> {}

export type WalkError = WalkNotFound | WalkPermissionDenied | WalkUnknownError

// =============================================================================
// Service interface
// =============================================================================

export interface WalkService {
  /**
   * Every entry below `root`, directories included, as paths relative to it.
   */
  readonly walk: (root: string) => Effect.Effect<readonly string[], WalkError>
}

export class WalkServiceTag extends Context.Tag("WalkService")<WalkServiceTag, WalkService>() {}

const toWalkError = (path: string, error: PlatformErrors.PlatformError): WalkError => {
  switch (platformFailure(error)) {
    case "NotFound":
      return new WalkNotFound({ path })
    case "PermissionDenied":
      return new WalkPermissionDenied({ path })
    default:
      return new WalkUnknownError({ path, cause: error.message })
  }
}

// =============================================================================
// Live implementation
// =============================================================================

export const WalkServiceLive = Layer.effect(
  WalkServiceTag,
  pipe(
    FileSystem.FileSystem,
    Effect.map((fs) => ({
      walk: (root: string) =>
        pipe(
          fs.readDirectory(root, { recursive: true }),
          Effect.mapError((e) => toWalkError(root, e))
        ),
    }))
  )
)
