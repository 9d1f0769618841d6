/**
 * NotifierService - end-of-run summaries.
 *
 * With `notifications.webhookUrl` set the summary is POSTed there as JSON;
 * otherwise it is written to the log. Deliveries run in the background and
 * give up after DELIVERY_TIMEOUT; a failed delivery is logged as a warning
 * and never fails or holds up the device run. `awaitPending` waits for the
 * deliveries still in flight.
 */

import { Clock, Context, Data, Deferred, Duration, Effect, HashSet, Layer, Ref, pipe } from "effect"
import { HttpClient, HttpClientRequest } from "@effect/platform"
import { IngestConfigTag } from "../domain/IngestConfig"
import * as Stats from "../domain/TransferStats"
import { formatSize } from "../lib/parseSize"
import { formatDuration } from "../lib/time"
import { LoggerServiceTag } from "./LoggerService"

// =============================================================================
// Summary
// =============================================================================

export const summarySubject = (deviceName: string): string => `Media Ingest Complete - ${deviceName}`

export const buildSummary = (
  deviceName: string,
  stats: Stats.TransferStats,
  logLocation: string,
  finishedAt: number
): string =>
  [
    summarySubject(deviceName),
    "=".repeat(50),
    "",
    "Transfer Summary:",
    `  Device: ${deviceName}`,
    `  Total Files: ${stats.totalFiles}`,
    `  Successfully Transferred: ${Stats.succeededFiles(stats)}`,
    `  Failed: ${stats.failedFiles}`,
    `  Total Size: ${formatSize(stats.totalBytes)}`,
    `  Duration: ${formatDuration(finishedAt - stats.startedAt)}`,
    `  Average Speed: ${formatSize(Stats.throughput(stats, finishedAt))}/s`,
    "",
    `Log: ${logLocation}`,
  ].join("\n")

export interface WebhookPayload {
  readonly subject: string
  readonly device: string
  readonly summary: string
  readonly logLocation: string
  readonly stats: Stats.TransferStats
}

// =============================================================================
// Service errors
// =============================================================================

export class DeliveryTimedOut extends Data.TaggedError("DeliveryTimedOut")<{
  readonly url: string
}> {}

export const DELIVERY_TIMEOUT = Duration.seconds(10)

// =============================================================================
// Service interface
// =============================================================================

export interface NotifierService {
  readonly transferComplete: (
    deviceName: string,
    stats: Stats.TransferStats,
    logLocation: string
  ) => Effect.Effect<void>
  readonly awaitPending: () => Effect.Effect<void>
}

export class NotifierServiceTag extends Context.Tag("NotifierService")<
  NotifierServiceTag,
  NotifierService
>() {}

// =============================================================================
// Live implementation
// =============================================================================

export const makeNotifierService = (timeout: Duration.DurationInput = DELIVERY_TIMEOUT) =>
  Effect.gen(function* () {
    const config = yield* IngestConfigTag
    const logger = yield* LoggerServiceTag
    const client = HttpClient.filterStatusOk(yield* HttpClient.HttpClient)
    const { webhookUrl } = config.notifications
    const pending = yield* Ref.make(HashSet.empty<Deferred.Deferred<void>>())

    const post = (url: string, payload: WebhookPayload) =>
      pipe(
        client.execute(pipe(HttpClientRequest.post(url), HttpClientRequest.bodyUnsafeJson(payload))),
        Effect.scoped,
        Effect.timeoutFail({ duration: timeout, onTimeout: () => new DeliveryTimedOut({ url }) }),
        Effect.zipRight(logger.info(`Notification sent to ${url}`, payload.device)),
        Effect.catchAll((e) =>
          logger.warning(
            e._tag === "DeliveryTimedOut"
              ? `Notification to ${url} timed out after ${Duration.format(timeout)}`
              : `Notification to ${url} failed: ${e.message}`,
            payload.device
          )
        )
      )

    const inBackground = (delivery: Effect.Effect<void>) =>
      Effect.gen(function* () {
        const done = yield* Deferred.make<void>()
        yield* Ref.update(pending, HashSet.add(done))
        yield* pipe(
          delivery,
          Effect.ensuring(
            pipe(Deferred.succeed(done, undefined), Effect.zipRight(Ref.update(pending, HashSet.remove(done))))
          ),
          Effect.forkDaemon
        )
      })

    const transferComplete: NotifierService["transferComplete"] = (deviceName, stats, logLocation) =>
      Effect.gen(function* () {
        const finishedAt = yield* Clock.currentTimeMillis
        const summary = buildSummary(deviceName, stats, logLocation, finishedAt)

        if (webhookUrl === undefined) {
          return yield* logger.info(`\n${summary}`, deviceName)
        }

        yield* inBackground(
          post(webhookUrl, {
            subject: summarySubject(deviceName),
            device: deviceName,
            summary,
            logLocation,
            stats,
          })
        )
      })

    const awaitPending: NotifierService["awaitPending"] = () =>
      pipe(
        Ref.get(pending),
        Effect.flatMap((deliveries) => Effect.forEach(deliveries, (done) => Deferred.await(done), { discard: true }))
      )

    return { transferComplete, awaitPending }
  })

export const NotifierServiceLive = Layer.effect(NotifierServiceTag, makeNotifierService())
