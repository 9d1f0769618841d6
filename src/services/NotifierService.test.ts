import { describe, expect, test } from "vitest"
import { Effect, Layer, Option, pipe } from "effect"
import { HttpClient, HttpClientResponse } from "@effect/platform"

import {
  buildSummary,
  makeNotifierService,
  NotifierServiceLive,
  NotifierServiceTag,
  summarySubject,
} from "./NotifierService"
import * as Stats from "../domain/TransferStats"
import { createLogCapture, makeTestConfig, testConfigLayer } from "../test/TestContext"

const MIB = 1024 * 1024

const finishedRun = (): Stats.TransferStats => {
  let stats = Stats.initialStats(3, 3 * MIB, 0)
  stats = Stats.recordSuccess(stats, MIB)
  stats = Stats.recordSuccess(stats, MIB)
  return Stats.recordFailure(stats)
}

describe("buildSummary", () => {
  test("lists the run totals", () => {
    expect(buildSummary("sdb1", finishedRun(), "/var/log/media-ingest/server.log", 4000).split("\n")).toEqual([
      "Media Ingest Complete - sdb1",
      "==================================================",
      "",
      "Transfer Summary:",
      "  Device: sdb1",
      "  Total Files: 3",
      "  Successfully Transferred: 2",
      "  Failed: 1",
      "  Total Size: 3.0 MB",
      "  Duration: 4s",
      "  Average Speed: 512.0 KB/s",
      "",
      "Log: /var/log/media-ingest/server.log",
    ])
  })
})

// =============================================================================
// Delivery
// =============================================================================

interface Delivery {
  url: string
  body: unknown
}

const setup = (webhookUrl: string | undefined, status = 200) => {
  const deliveries: Delivery[] = []
  const log = createLogCapture()

  const client = HttpClient.make((request, url) =>
    Effect.sync(() => {
      if (request.body._tag === "Uint8Array") {
        deliveries.push({ url: url.toString(), body: JSON.parse(new TextDecoder().decode(request.body.body)) })
      }
      return HttpClientResponse.fromWeb(request, new Response(null, { status }))
    })
  )

  const config = makeTestConfig(webhookUrl === undefined ? {} : { notifications: { webhookUrl } })
  const layer = pipe(
    NotifierServiceLive,
    Layer.provide(Layer.mergeAll(testConfigLayer(config), log.layer, Layer.succeed(HttpClient.HttpClient, client)))
  )

  return { deliveries, log, layer }
}

const notify = (layer: ReturnType<typeof setup>["layer"]) =>
  pipe(
    NotifierServiceTag,
    Effect.flatMap((notifier) =>
      pipe(
        notifier.transferComplete("sdb1", finishedRun(), "/logs/sdb1.log"),
        Effect.zipRight(notifier.awaitPending())
      )
    ),
    Effect.provide(layer),
    Effect.runPromise
  )

describe("NotifierService", () => {
  test("posts the summary to the webhook", async () => {
    const { deliveries, log, layer } = setup("http://hooks.test/ingest")

    await notify(layer)

    expect(deliveries).toHaveLength(1)
    expect(deliveries[0]?.url).toBe("http://hooks.test/ingest")
    expect(deliveries[0]?.body).toEqual(
      expect.objectContaining({
        subject: summarySubject("sdb1"),
        device: "sdb1",
        logLocation: "/logs/sdb1.log",
        stats: expect.objectContaining({ totalFiles: 3, failedFiles: 1 }),
      })
    )
    expect(log.messages("info")).toEqual(["Notification sent to http://hooks.test/ingest"])
  })

  test("a rejected delivery is logged as a warning", async () => {
    const { log, layer } = setup("http://hooks.test/ingest", 500)

    await notify(layer)

    const warnings = log.messages("warning")
    expect(warnings).toHaveLength(1)
    expect(warnings[0]?.startsWith("Notification to http://hooks.test/ingest failed:")).toBe(true)
  })

  test("without a webhook the summary is logged", async () => {
    const { deliveries, log, layer } = setup(undefined)

    await notify(layer)

    expect(deliveries).toEqual([])
    const [logged] = log.messages("info")
    expect(logged?.startsWith("\nMedia Ingest Complete - sdb1\n")).toBe(true)
    expect(logged).toContain("  Failed: 1")
  })

  test("a stalled webhook times out in the background", async () => {
    const log = createLogCapture()
    const config = makeTestConfig({ notifications: { webhookUrl: "http://hooks.test/ingest" } })
    const layer = pipe(
      Layer.effect(NotifierServiceTag, makeNotifierService("20 millis")),
      Layer.provide(
        Layer.mergeAll(
          testConfigLayer(config),
          log.layer,
          Layer.succeed(HttpClient.HttpClient, HttpClient.make(() => Effect.never))
        )
      )
    )

    const returned = await pipe(
      NotifierServiceTag,
      Effect.flatMap((notifier) =>
        pipe(
          Effect.timeoutOption(notifier.transferComplete("sdb1", finishedRun(), "/logs/sdb1.log"), "1 second"),
          Effect.tap(() => notifier.awaitPending())
        )
      ),
      Effect.provide(layer),
      Effect.runPromise
    )

    expect(Option.isSome(returned)).toBe(true)
    expect(log.messages("warning")).toEqual(["Notification to http://hooks.test/ingest timed out after 20ms"])
    expect(log.messages("info")).toEqual([])
  })
})
