/**
 * FileStatService - wraps file stat operations for testability.
 *
 * Live implementation uses @effect/platform FileSystem.
 * All errors are caught and converted to typed errors.
 */

import { Context, Data, Effect, Layer, pipe } from "effect"
import { FileSystem, type Error as PlatformErrors } from "@effect/platform"
import { platformFailure } from "./platformError"

// =============================================================================
// Typed errors - all possible failures from fs.stat
// =============================================================================

export class FileNotFound extends Data.TaggedError("FileNotFound")<{
  readonly path: string
}> {}

export class FilePermissionDenied extends Data.TaggedError("FilePermissionDenied")<{
  readonly path: string
}> {}

export class FileStatUnknownError extends Data.TaggedError("FileStatUnknownError")<{
  readonly path: string
  readonly cause: string
}> {}

export type FileStatError = FileNotFound | FilePermissionDenied | FileStatUnknownError

// =============================================================================
// Types
// =============================================================================

export interface FileStat {
  readonly size: number
  readonly type: FileSystem.File.Type
  /** Device id of the containing filesystem */
  readonly dev: number
}

// =============================================================================
// Service interface
// =============================================================================

export interface FileStatService {
  readonly stat: (path: string) => Effect.Effect<FileStat, FileStatError>
}

export class FileStatServiceTag extends Context.Tag("FileStatService")<
  FileStatServiceTag,
  FileStatService
>() {}

// =============================================================================
// Error detection from @effect/platform errors
// =============================================================================

const toFileStatError = (path: string, error: PlatformErrors.PlatformError): FileStatError => {
  switch (platformFailure(error)) {
    case "NotFound":
      return new FileNotFound({ path })
    case "PermissionDenied":
      return new FilePermissionDenied({ path })
    default:
      return new FileStatUnknownError({ path, cause: error.message })
  }
}

// =============================================================================
// Live implementation (uses @effect/platform FileSystem)
// =============================================================================

export const FileStatServiceLive = Layer.effect(
  FileStatServiceTag,
  pipe(
    FileSystem.FileSystem,
    Effect.map((fs) => ({
      stat: (path: string) =>
        pipe(
          fs.stat(path),
          Effect.map((s) => ({ size: Number(s.size), type: s.type, dev: s.dev })),
          Effect.mapError((e) => toFileStatError(path, e))
        ),
    }))
  )
)
