/**
 * Polling watch shared by the detector adapters.
 *
 * Every poll lists the attached devices and reports the ones whose path was
 * not present in the previous poll. Devices attached before the watch
 * started are not reported.
 */

import { type Duration, Effect, Fiber, HashSet, Option, Ref, pipe } from "effect"
import type { Device } from "../domain/Device"
import { type DeviceDetectionFailed, type DeviceDetector, WatchAlreadyActive } from "./DeviceDetector"

type Watch = Pick<DeviceDetector, "watchForDevices" | "stopWatching">

export const makePollingWatcher = (
  detectDevices: () => Effect.Effect<readonly Device[], DeviceDetectionFailed>,
  pollInterval: Duration.DurationInput
): Effect.Effect<Watch> =>
  Effect.gen(function* () {
    const current = yield* Ref.make<Option.Option<Fiber.RuntimeFiber<void>>>(Option.none())
    const lock = yield* Effect.makeSemaphore(1)

    const listPaths = pipe(
      detectDevices(),
      Effect.tapError((e) => Effect.logWarning(`Device poll failed: ${e.reason}`)),
      Effect.option
    )

    const loop = (onDevice: (device: Device) => Effect.Effect<void>) =>
      Effect.gen(function* () {
        const initial = yield* listPaths
        const known = yield* Ref.make(
          HashSet.fromIterable(Option.getOrElse(initial, (): readonly Device[] => []).map((d) => d.path))
        )

        const poll = Effect.gen(function* () {
          const devices = yield* listPaths
          if (Option.isNone(devices)) return

          const previous = yield* Ref.getAndSet(known, HashSet.fromIterable(devices.value.map((d) => d.path)))
          const arrived = devices.value.filter((d) => !HashSet.has(previous, d.path))
          yield* Effect.forEach(arrived, onDevice, { discard: true })
        })

        return yield* Effect.forever(Effect.delay(poll, pollInterval))
      })

    const watchForDevices: Watch["watchForDevices"] = (onDevice) =>
      lock.withPermits(1)(
        Effect.gen(function* () {
          const running = yield* Ref.get(current)
          if (Option.isSome(running)) {
            return yield* Effect.fail(new WatchAlreadyActive())
          }
          const fiber = yield* Effect.forkDaemon(loop(onDevice))
          yield* Ref.set(current, Option.some(fiber))
        })
      )

    const stopWatching: Watch["stopWatching"] = () =>
      lock.withPermits(1)(
        pipe(
          Ref.getAndSet(current, Option.none()),
          Effect.flatMap(
            Option.match({
              onNone: () => Effect.void,
              onSome: (fiber) => Fiber.interrupt(fiber),
            })
          ),
          Effect.asVoid
        )
      )

    return { watchForDevices, stopWatching }
  })
