import { describe, expect, test } from "vitest"
import { Deferred, Effect, pipe } from "effect"

import { makePollingWatcher } from "./DeviceWatcher"
import type { Device } from "../domain/Device"
import { makeDevice } from "../test/TestContext"

const watcherOver = (attached: Device[]) => makePollingWatcher(() => Effect.sync(() => [...attached]), "5 millis")

describe("makePollingWatcher", () => {
  test("reports devices that appear after the watch starts", async () => {
    const attached = [makeDevice({ name: "sda1", path: "/dev/sda1" })]

    const reported = await pipe(
      Effect.gen(function* () {
        const watch = yield* watcherOver(attached)
        const arrived = yield* Deferred.make<Device>()

        yield* watch.watchForDevices((device) => Deferred.succeed(arrived, device))
        yield* Effect.sleep("20 millis")
        attached.push(makeDevice({ name: "sdb1", path: "/dev/sdb1" }))

        const device = yield* Deferred.await(arrived)
        yield* watch.stopWatching()
        return device
      }),
      Effect.runPromise
    )

    expect(reported.name).toBe("sdb1")
  })

  test("a device that is removed and reinserted is reported again", async () => {
    const attached: Device[] = []
    const seen: string[] = []
    const card = makeDevice()

    await pipe(
      Effect.gen(function* () {
        const watch = yield* watcherOver(attached)
        yield* watch.watchForDevices((device) => Effect.sync(() => void seen.push(device.name)))
        yield* Effect.sleep("20 millis")

        attached.push(card)
        yield* Effect.sleep("30 millis")
        attached.pop()
        yield* Effect.sleep("30 millis")
        attached.push(card)
        yield* Effect.sleep("30 millis")

        yield* watch.stopWatching()
      }),
      Effect.runPromise
    )

    expect(seen).toEqual(["sdb1", "sdb1"])
  })

  test("only one watch can run at a time", async () => {
    const error = await pipe(
      Effect.gen(function* () {
        const watch = yield* watcherOver([])
        yield* watch.watchForDevices(() => Effect.void)
        const second = yield* Effect.flip(watch.watchForDevices(() => Effect.void))
        yield* watch.stopWatching()
        yield* watch.watchForDevices(() => Effect.void)
        yield* watch.stopWatching()
        return second
      }),
      Effect.runPromise
    )

    expect(error._tag).toBe("WatchAlreadyActive")
  })
})
