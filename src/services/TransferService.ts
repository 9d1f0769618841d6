/**
 * TransferService - concurrent, verified copies of one device's files.
 *
 * A run has two phases:
 * 1. PREPARE: stat, classify and claim a destination for every file, in
 *    order. Failures here are counted and logged, the file is dropped.
 * 2. DISPATCH: priority jobs then the rest are fed through one bounded queue
 *    to `maxWorkers` worker fibers. The producer closes the queue with one
 *    end marker per worker and the run ends when every worker has exited.
 *
 * Per-file failures never fail the run; they show up in the statistics and
 * in the results.
 */

import * as path from "node:path"
import { Clock, Context, Data, Duration, Effect, Layer, Match, Queue, Schedule, pipe } from "effect"
import {
  classify,
  destinationPath,
  rulesFromConfig,
  type ClassifiedFile,
} from "../domain/Classifier"
import { IngestConfigTag } from "../domain/IngestConfig"
import { isPriorityFile, orderForDispatch, type TransferJob } from "../domain/TransferJob"
import * as Stats from "../domain/TransferStats"
import { FileCopyServiceTag, type CopyError } from "../infra/FileCopyService"
import { FileStatServiceTag, type FileStatError } from "../infra/FileStatService"
import { formatSize } from "../lib/parseSize"
import { formatDuration } from "../lib/time"
import { DestinationServiceTag, type DestinationError } from "./DestinationService"
import { LoggerServiceTag } from "./LoggerService"
import { makeStatsTracker } from "./StatsTracker"

// =============================================================================
// Service errors - per-file failure modes
// =============================================================================

export class FileStatFailed extends Data.TaggedError("FileStatFailed")<{
  readonly path: string
  readonly reason: string
}> {}

export class ChecksumMismatch extends Data.TaggedError("ChecksumMismatch")<{
  readonly source: string
  readonly destination: string
  readonly expected: string
  readonly actual: string
}> {}

export type PreparationError = FileStatFailed | DestinationError

export type TransferFailure = PreparationError | CopyError | ChecksumMismatch

export const describeFailure = Match.typeTags<TransferFailure>()({
  FileStatFailed: (e) => `cannot read ${e.path}: ${e.reason}`,
  TooManyVersions: (e) => `no free name for ${e.path} after ${e.attempts} versions`,
  DestinationUnavailable: (e) => `cannot create ${e.path}: ${e.reason}`,
  CopyPathNotFound: (e) => `not found: ${e.path}`,
  CopyPermissionDenied: (e) => `permission denied: ${e.path}`,
  CopyFailed: (e) => `copy failed at ${e.path}: ${e.reason}`,
  ChecksumMismatch: (e) => `checksum mismatch for ${e.destination} (source ${e.expected}, copy ${e.actual})`,
})

// =============================================================================
// Types
// =============================================================================

export type TransferResult =
  | { readonly _tag: "Transferred"; readonly job: TransferJob }
  | { readonly _tag: "Failed"; readonly sourcePath: string; readonly error: TransferFailure }

export interface TransferReport {
  readonly stats: Stats.TransferStats
  readonly results: readonly TransferResult[]
}

type FailedResult = Extract<TransferResult, { readonly _tag: "Failed" }>

type QueueItem = { readonly _tag: "Job"; readonly job: TransferJob } | { readonly _tag: "Done" }

// =============================================================================
// Service interface
// =============================================================================

export interface TransferService {
  /** Copies every file in `files` (absolute source paths) off the named device */
  readonly transferFiles: (deviceName: string, files: readonly string[]) => Effect.Effect<TransferReport>
}

export class TransferServiceTag extends Context.Tag("TransferService")<
  TransferServiceTag,
  TransferService
>() {}

// =============================================================================
// Helpers
// =============================================================================

const RETRY_BASE_DELAY = Duration.millis(250)

const statFailureReason = Match.typeTags<FileStatError>()({
  FileNotFound: () => "no such file",
  FilePermissionDenied: () => "permission denied",
  FileStatUnknownError: (e) => e.cause,
})

/** `client/project/camera` for matched files, the destination otherwise */
const describeRoute = (file: ClassifiedFile, destination: string): string =>
  file.matched ? `${file.tokens.client}/${file.tokens.project}/${file.tokens.camera}` : destination

const progressLine = (stats: Stats.TransferStats, now: number): string =>
  `Progress: ${stats.processedFiles}/${stats.totalFiles} files, ` +
  `${Stats.progressPercent(stats).toFixed(1)}% (${formatSize(stats.transferredBytes)} of ${formatSize(stats.totalBytes)}), ` +
  `${formatSize(Stats.throughput(stats, now))}/s`

// =============================================================================
// Live implementation
// =============================================================================

export const TransferServiceLive = Layer.effect(
  TransferServiceTag,
  Effect.gen(function* () {
    const config = yield* IngestConfigTag
    const logger = yield* LoggerServiceTag
    const fileStat = yield* FileStatServiceTag
    const files = yield* FileCopyServiceTag
    const destinations = yield* DestinationServiceTag

    const rules = rulesFromConfig(config)
    const { maxWorkers, verifyChecksums, maxRetries, priorityPrefixes } = config.transfer
    const { progressInterval } = config.logging

    // -------------------------------------------------------------------------
    // Prepare
    // -------------------------------------------------------------------------

    const prepare = (sourcePath: string): Effect.Effect<TransferJob, PreparationError> =>
      pipe(
        fileStat.stat(sourcePath),
        Effect.mapError((e) => new FileStatFailed({ path: sourcePath, reason: statFailureReason(e) })),
        Effect.filterOrFail(
          (stat) => stat.type === "File",
          () => new FileStatFailed({ path: sourcePath, reason: "not a regular file" })
        ),
        Effect.flatMap((stat) => {
          const file = classify(sourcePath, rules.pattern)
          return pipe(
            destinations.claim(destinationPath(file, rules)),
            Effect.map(
              (claimed): TransferJob => ({
                sourcePath,
                destinationPath: claimed,
                sizeBytes: stat.size,
                priority: isPriorityFile(file.fileName, priorityPrefixes),
                file,
              })
            )
          )
        })
      )

    // -------------------------------------------------------------------------
    // Copy
    // -------------------------------------------------------------------------

    const verifiedCopy = (job: TransferJob): Effect.Effect<void, CopyError | ChecksumMismatch> =>
      pipe(
        files.copyWithDigest(job.sourcePath, job.destinationPath),
        Effect.flatMap((expected) =>
          pipe(
            files.digest(job.destinationPath),
            Effect.flatMap((actual) =>
              actual === expected
                ? Effect.void
                : pipe(
                    files.remove(job.destinationPath),
                    Effect.zipRight(
                      Effect.fail(
                        new ChecksumMismatch({
                          source: job.sourcePath,
                          destination: job.destinationPath,
                          expected,
                          actual,
                        })
                      )
                    )
                  )
            )
          )
        )
      )

    const copyJob = (job: TransferJob): Effect.Effect<void, CopyError | ChecksumMismatch> =>
      pipe(
        verifyChecksums ? verifiedCopy(job) : files.copy(job.sourcePath, job.destinationPath),
        Effect.retry({ times: maxRetries, schedule: Schedule.exponential(RETRY_BASE_DELAY) })
      )

    // -------------------------------------------------------------------------
    // Run
    // -------------------------------------------------------------------------

    const transferFiles: TransferService["transferFiles"] = (deviceName, sources) =>
      Effect.gen(function* () {
        const startedAt = yield* Clock.currentTimeMillis

        if (sources.length === 0) {
          yield* logger.info("No files to transfer", deviceName)
          return { stats: Stats.initialStats(0, 0, startedAt), results: [] }
        }

        const prepared = yield* Effect.forEach(sources, (source) =>
          pipe(
            prepare(source),
            Effect.either,
            Effect.map((outcome) => ({ source, outcome }))
          )
        )

        const jobs: TransferJob[] = []
        const failures: FailedResult[] = []
        for (const { source, outcome } of prepared) {
          if (outcome._tag === "Right") jobs.push(outcome.right)
          else failures.push({ _tag: "Failed", sourcePath: source, error: outcome.left })
        }

        const totalBytes = jobs.reduce((sum, job) => sum + job.sizeBytes, 0)
        const tracker = yield* makeStatsTracker(Stats.initialStats(sources.length, totalBytes, startedAt))

        for (const failure of failures) {
          yield* tracker.recordFailure()
          yield* logger.error(`Skipped ${path.basename(failure.sourcePath)}: ${describeFailure(failure.error)}`, deviceName)
        }

        const ordered = orderForDispatch(jobs)
        const priorityCount = ordered.filter((job) => job.priority).length
        yield* logger.info(
          `Transferring ${ordered.length} files (${formatSize(totalBytes)}, ${priorityCount} priority) with ${maxWorkers} workers`,
          deviceName
        )

        const runJob = (job: TransferJob): Effect.Effect<TransferResult> =>
          pipe(
            copyJob(job),
            Effect.matchEffect({
              onSuccess: () =>
                pipe(
                  tracker.recordSuccess(job.sizeBytes),
                  Effect.zipRight(
                    logger.info(
                      job.file.matched
                        ? `Transferred: ${job.file.fileName} -> ${describeRoute(job.file, job.destinationPath)}`
                        : `Transferred (unmatched): ${job.file.fileName} -> ${job.destinationPath}`,
                      deviceName
                    )
                  ),
                  Effect.as<TransferResult>({ _tag: "Transferred", job })
                ),
              onFailure: (error) =>
                pipe(
                  files.remove(job.destinationPath),
                  Effect.catchAll((e) =>
                    logger.warning(`Could not remove ${job.destinationPath}: ${describeFailure(e)}`, deviceName)
                  ),
                  Effect.zipRight(tracker.recordFailure()),
                  Effect.zipRight(
                    logger.error(`Failed: ${job.file.fileName}: ${describeFailure(error)}`, deviceName)
                  ),
                  Effect.as<TransferResult>({ _tag: "Failed", sourcePath: job.sourcePath, error })
                ),
            })
          )

        const queue = yield* Queue.bounded<QueueItem>(maxWorkers * 2)

        const producer = pipe(
          Effect.forEach(ordered, (job) => Queue.offer(queue, { _tag: "Job", job }), { discard: true }),
          Effect.zipRight(
            Effect.forEach(Array.from({ length: maxWorkers }), () => Queue.offer(queue, { _tag: "Done" }), {
              discard: true,
            })
          )
        )

        const worker = Effect.gen(function* () {
          const results: TransferResult[] = []
          while (true) {
            const item = yield* Queue.take(queue)
            if (item._tag === "Done") return results
            results.push(yield* runJob(item.job))
          }
        })

        const reportProgress = pipe(
          Effect.all([tracker.snapshot(), Clock.currentTimeMillis]),
          Effect.flatMap(([stats, now]) => logger.info(progressLine(stats, now), deviceName))
        )

        const progressReporter = Effect.forkScoped(
          Effect.forever(Effect.delay(reportProgress, Duration.seconds(progressInterval)))
        )

        const workerResults = yield* pipe(
          Effect.when(progressReporter, () => progressInterval > 0),
          Effect.zipRight(
            Effect.all([producer, Effect.all(Array.from({ length: maxWorkers }, () => worker), { concurrency: "unbounded" })], {
              concurrency: "unbounded",
            })
          ),
          Effect.map(([, perWorker]) => perWorker.flat()),
          Effect.scoped
        )

        const stats = yield* tracker.snapshot()
        const finishedAt = yield* Clock.currentTimeMillis
        yield* logger.info(
          `Transfer finished: ${Stats.succeededFiles(stats)}/${stats.totalFiles} succeeded, ${stats.failedFiles} failed, ` +
            `${formatSize(stats.transferredBytes)} in ${formatDuration(finishedAt - startedAt)}`,
          deviceName
        )

        return { stats, results: [...failures, ...workerResults] }
      })

    return { transferFiles }
  })
)
