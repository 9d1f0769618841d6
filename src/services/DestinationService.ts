/**
 * DestinationService - claims collision-free destination paths.
 *
 * A claim is an exclusive create of an empty file at the candidate path, so
 * two jobs in the same run (or a file already on the destination) can never
 * resolve to the same name. Candidates are the computed path followed by
 * `_v2`, `_v3` ... `_v<maxVersions>` variants.
 */

import * as path from "node:path"
import { Context, Data, Effect, Layer, pipe } from "effect"
import { FileSystem } from "@effect/platform"
import { versionedPath } from "../domain/Classifier"
import { platformFailure } from "../infra/platformError"

export const MAX_VERSIONS = 1000

// =============================================================================
// Service errors
// =============================================================================

export class TooManyVersions extends Data.TaggedError("TooManyVersions")<{
  readonly path: string
  readonly attempts: number
}> {}

export class DestinationUnavailable extends Data.TaggedError("DestinationUnavailable")<{
  readonly path: string
  readonly reason: string
}> {}

export type DestinationError = TooManyVersions | DestinationUnavailable

// =============================================================================
// Service interface
// =============================================================================

export interface DestinationService {
  /**
   * Reserves `destination` or its first free versioned variant and returns
   * the reserved path. Parent directories are created as needed.
   */
  readonly claim: (destination: string) => Effect.Effect<string, DestinationError>
}

export class DestinationServiceTag extends Context.Tag("DestinationService")<
  DestinationServiceTag,
  DestinationService
>() {}

// =============================================================================
// Live implementation
// =============================================================================

export const makeDestinationService = (maxVersions: number = MAX_VERSIONS) =>
  Effect.map(FileSystem.FileSystem, (fs): DestinationService => {
    const tryClaim = (base: string, version: number): Effect.Effect<string, DestinationError> => {
      if (version > maxVersions) {
        return Effect.fail(new TooManyVersions({ path: base, attempts: maxVersions }))
      }

      const candidate = version === 1 ? base : versionedPath(base, version)
      return pipe(
        fs.open(candidate, { flag: "wx" }),
        Effect.scoped,
        Effect.as(candidate),
        Effect.catchAll((e) =>
          platformFailure(e) === "AlreadyExists"
            ? tryClaim(base, version + 1)
            : Effect.fail(new DestinationUnavailable({ path: candidate, reason: e.message }))
        )
      )
    }

    return {
      claim: (destination) =>
        pipe(
          fs.makeDirectory(path.dirname(destination), { recursive: true }),
          Effect.mapError((e) => new DestinationUnavailable({ path: destination, reason: e.message })),
          Effect.zipRight(tryClaim(destination, 1))
        ),
    }
  })

export const DestinationServiceLive = Layer.effect(DestinationServiceTag, makeDestinationService())
