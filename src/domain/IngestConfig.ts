/**
 * Ingest configuration - schema, defaults and the service tag that carries
 * the decoded value through the layer graph.
 *
 * Only `destinationPath` and `parsing.pattern` are required; every other
 * setting has a default applied at decode time.
 */

import { Context, Either, ParseResult, Schema } from "effect"
import { parseSize } from "../lib/parseSize"

// =============================================================================
// Field schemas
// =============================================================================

/**
 * Number of capture groups in a regular expression source, or an error
 * message when the source does not compile.
 */
export const countCaptureGroups = (source: string): Either.Either<number, string> => {
  try {
    // An empty alternative always matches, exposing one slot per group.
    const match = new RegExp(`${source}|`).exec("")
    return Either.right((match?.length ?? 1) - 1)
  } catch (e) {
    return Either.left(`invalid regular expression: ${e instanceof Error ? e.message : String(e)}`)
  }
}

const ClassificationPattern = Schema.String.pipe(
  Schema.filter((source) =>
    Either.match(countCaptureGroups(source), {
      onLeft: (message) => message,
      onRight: (groups) =>
        groups === 4 ||
        `pattern must have exactly 4 capture groups (project, client, camera, clip), found ${groups}`,
    })
  )
)

/** Byte count given either as a number or as a size string such as "1GB". */
const ByteSize = Schema.transformOrFail(
  Schema.Union(Schema.Number, Schema.String),
  Schema.NonNegative,
  {
    strict: true,
    decode: (input, _options, ast) =>
      typeof input === "number"
        ? ParseResult.succeed(input)
        : Either.match(parseSize(input), {
            onLeft: (e) => ParseResult.fail(new ParseResult.Type(ast, input, `${e.input}: ${e.reason}`)),
            onRight: (bytes) => ParseResult.succeed(bytes),
          }),
    encode: (bytes) => ParseResult.succeed(bytes),
  }
)

const PositiveInt = Schema.Int.pipe(Schema.greaterThanOrEqualTo(1))
const NonNegativeInt = Schema.Int.pipe(Schema.greaterThanOrEqualTo(0))
const Seconds = Schema.Number.pipe(Schema.greaterThanOrEqualTo(0))

export const DetectorKind = Schema.Literal("lsblk", "volumes")
export type DetectorKind = typeof DetectorKind.Type

export const LogLevelSetting = Schema.Literal("debug", "info", "warning", "error")
export type LogLevelSetting = typeof LogLevelSetting.Type

const defaultDetector = (): DetectorKind => (process.platform === "linux" ? "lsblk" : "volumes")

const defaultVolumesRoot = (): string => (process.platform === "darwin" ? "/Volumes" : "/media")

// =============================================================================
// Sections
// =============================================================================

const AutoMountSection = Schema.Struct({
  enabled: Schema.optionalWith(Schema.Boolean, { default: () => false }),
  mountBase: Schema.optionalWith(Schema.NonEmptyString, { default: () => "/mnt/ingest" }),
})

const LoggingSection = Schema.Struct({
  serverLogPath: Schema.optionalWith(Schema.NonEmptyString, { default: () => "/var/log/media-ingest" }),
  logToDevice: Schema.optionalWith(Schema.Boolean, { default: () => false }),
  logLevel: Schema.optionalWith(LogLevelSetting, { default: () => "info" as const }),
  /** Seconds between progress lines during a transfer; 0 disables them */
  progressInterval: Schema.optionalWith(Seconds, { default: () => 0 }),
})

const TransferSection = Schema.Struct({
  maxWorkers: Schema.optionalWith(PositiveInt, { default: () => 4 }),
  verifyChecksums: Schema.optionalWith(Schema.Boolean, { default: () => true }),
  maxRetries: Schema.optionalWith(NonNegativeInt, { default: () => 0 }),
  priorityPrefixes: Schema.optionalWith(Schema.Array(Schema.NonEmptyString), { default: () => [] }),
})

const ParsingSection = Schema.Struct({
  pattern: ClassificationPattern,
  folderStructure: Schema.optionalWith(Schema.NonEmptyString, {
    default: () => "{client}/{project}/{camera}",
  }),
  unmatchedFolder: Schema.optionalWith(Schema.NonEmptyString, { default: () => "Unsorted" }),
})

const DeviceDetectionSection = Schema.Struct({
  detector: Schema.optionalWith(DetectorKind, { default: defaultDetector }),
  volumesRoot: Schema.optionalWith(Schema.NonEmptyString, { default: defaultVolumesRoot }),
  requireMountPoint: Schema.optionalWith(Schema.Boolean, { default: () => true }),
  minSize: Schema.optionalWith(ByteSize, { default: () => 0 }),
  allowedFilesystems: Schema.optionalWith(Schema.Array(Schema.String), { default: () => [] }),
  excludePatterns: Schema.optionalWith(Schema.Array(Schema.NonEmptyString), { default: () => [] }),
  pollInterval: Schema.optionalWith(Seconds, { default: () => 2 }),
  settleDelay: Schema.optionalWith(Seconds, { default: () => 2 }),
})

const NotificationsSection = Schema.Struct({
  webhookUrl: Schema.optional(Schema.NonEmptyString),
})

// =============================================================================
// Root
// =============================================================================

export const IngestConfigSchema = Schema.Struct({
  destinationPath: Schema.NonEmptyString,
  autoMount: Schema.optionalWith(AutoMountSection, {
    default: () => Schema.decodeUnknownSync(AutoMountSection)({}),
  }),
  logging: Schema.optionalWith(LoggingSection, {
    default: () => Schema.decodeUnknownSync(LoggingSection)({}),
  }),
  transfer: Schema.optionalWith(TransferSection, {
    default: () => Schema.decodeUnknownSync(TransferSection)({}),
  }),
  parsing: ParsingSection,
  deviceDetection: Schema.optionalWith(DeviceDetectionSection, {
    default: () => Schema.decodeUnknownSync(DeviceDetectionSection)({}),
  }),
  notifications: Schema.optionalWith(NotificationsSection, { default: () => ({}) }),
})

export type IngestConfig = typeof IngestConfigSchema.Type
export type IngestConfigInput = typeof IngestConfigSchema.Encoded

export class IngestConfigTag extends Context.Tag("IngestConfig")<IngestConfigTag, IngestConfig>() {}
