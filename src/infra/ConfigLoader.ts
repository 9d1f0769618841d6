/**
 * Reads and validates the JSON configuration file.
 */

import { Data, Effect, ParseResult, Schema, pipe } from "effect"
import { FileSystem } from "@effect/platform"
import { IngestConfigSchema, type IngestConfig } from "../domain/IngestConfig"
import { platformFailure } from "./platformError"

export const DEFAULT_CONFIG_PATH = "/etc/media-ingest/config.json"

// =============================================================================
// Errors
// =============================================================================

export class ConfigNotFound extends Data.TaggedError("ConfigNotFound")<{
  readonly path: string
}> {}

export class ConfigUnreadable extends Data.TaggedError("ConfigUnreadable")<{
  readonly path: string
  readonly reason: string
}> {}

export class ConfigInvalid extends Data.TaggedError("ConfigInvalid")<{
  readonly path: string
  /** Formatted parse tree, one issue per line */
  readonly issues: string
}> {}

export type ConfigError = ConfigNotFound | ConfigUnreadable | ConfigInvalid

// =============================================================================
// Loading
// =============================================================================

const decodeConfig = Schema.decodeUnknown(Schema.parseJson(IngestConfigSchema))

export const loadConfig = (
  path: string
): Effect.Effect<IngestConfig, ConfigError, FileSystem.FileSystem> =>
  pipe(
    FileSystem.FileSystem,
    Effect.flatMap((fs) => fs.readFileString(path)),
    Effect.mapError((e) =>
      platformFailure(e) === "NotFound"
        ? new ConfigNotFound({ path })
        : new ConfigUnreadable({ path, reason: e.message })
    ),
    Effect.flatMap((text) =>
      pipe(
        decodeConfig(text),
        Effect.mapError(
          (e) => new ConfigInvalid({ path, issues: ParseResult.TreeFormatter.formatErrorSync(e) })
        )
      )
    )
  )
