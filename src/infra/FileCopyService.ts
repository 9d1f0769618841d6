/**
 * FileCopyService - streaming copies and SHA-256 digests.
 *
 * Live implementation streams through @effect/platform FileSystem; hashing
 * uses node:crypto. All errors are caught and converted to typed errors.
 */

import { createHash, type Hash } from "node:crypto"
import { Context, Data, Effect, Layer, Stream, pipe } from "effect"
import { FileSystem, type Error as PlatformErrors } from "@effect/platform"
import { platformFailure } from "./platformError"

// =============================================================================
// Typed errors
// =============================================================================

export class CopyPathNotFound extends Data.TaggedError("CopyPathNotFound")<{
  readonly path: string
}> {}

export class CopyPermissionDenied extends Data.TaggedError("CopyPermissionDenied")<{
  readonly path: string
}> {}

export class CopyFailed extends Data.TaggedError("CopyFailed")<{
  readonly path: string
  readonly reason: string
}> {}

export type CopyError = CopyPathNotFound | CopyPermissionDenied | CopyFailed

// =============================================================================
// Service interface
// =============================================================================

export interface FileCopyService {
  readonly copy: (source: string, destination: string) => Effect.Effect<void, CopyError>
  /** Copies and returns the hex SHA-256 of the bytes read from `source`. */
  readonly copyWithDigest: (source: string, destination: string) => Effect.Effect<string, CopyError>
  readonly digest: (path: string) => Effect.Effect<string, CopyError>
  /** Removes a file; a missing file is not an error. */
  readonly remove: (path: string) => Effect.Effect<void, CopyError>
}

export class FileCopyServiceTag extends Context.Tag("FileCopyService")<
  FileCopyServiceTag,
  FileCopyService
>() {}

// =============================================================================
// Error detection from @effect/platform errors
// =============================================================================

const toCopyError =
  (fallbackPath: string) =>
  (error: PlatformErrors.PlatformError): CopyError => {
    const path =
      error._tag === "SystemError" && typeof error.pathOrDescriptor === "string"
        ? error.pathOrDescriptor
        : fallbackPath

    switch (platformFailure(error)) {
      case "NotFound":
        return new CopyPathNotFound({ path })
      case "PermissionDenied":
        return new CopyPermissionDenied({ path })
      default:
        return new CopyFailed({ path, reason: error.message })
    }
  }

// =============================================================================
// Live implementation
// =============================================================================

export const makeFileCopyService: Effect.Effect<FileCopyService, never, FileSystem.FileSystem> = Effect.map(
  FileSystem.FileSystem,
  (fs): FileCopyService => {
    const hashStream = (hash: Hash) => (stream: Stream.Stream<Uint8Array, PlatformErrors.PlatformError>) =>
      Stream.tap(stream, (chunk) => Effect.sync(() => hash.update(chunk)))

    return {
      copy: (source, destination) =>
        pipe(fs.stream(source), Stream.run(fs.sink(destination)), Effect.mapError(toCopyError(source))),

      copyWithDigest: (source, destination) =>
        Effect.suspend(() => {
          const hash = createHash("sha256")
          return pipe(
            fs.stream(source),
            hashStream(hash),
            Stream.run(fs.sink(destination)),
            Effect.map(() => hash.digest("hex")),
            Effect.mapError(toCopyError(source))
          )
        }),

      digest: (path) =>
        Effect.suspend(() => {
          const hash = createHash("sha256")
          return pipe(
            fs.stream(path),
            hashStream(hash),
            Stream.runDrain,
            Effect.map(() => hash.digest("hex")),
            Effect.mapError(toCopyError(path))
          )
        }),

      remove: (path) =>
        pipe(
          fs.remove(path),
          Effect.catchIf(
            (e) => platformFailure(e) === "NotFound",
            () => Effect.void
          ),
          Effect.mapError(toCopyError(path))
        ),
    }
  }
)

export const FileCopyServiceLive = Layer.effect(FileCopyServiceTag, makeFileCopyService)
