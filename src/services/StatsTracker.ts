import { Effect, Ref } from "effect"
import * as Stats from "../domain/TransferStats"

/**
 * Shared statistics for one transfer run. Workers record outcomes
 * concurrently; readers get consistent snapshots.
 */
export interface StatsTracker {
  readonly recordSuccess: (bytes: number) => Effect.Effect<void>
  readonly recordFailure: () => Effect.Effect<void>
  readonly snapshot: () => Effect.Effect<Stats.TransferStats>
}

export const makeStatsTracker = (initial: Stats.TransferStats): Effect.Effect<StatsTracker> =>
  Effect.map(Ref.make(initial), (ref) => ({
    recordSuccess: (bytes) => Ref.update(ref, (stats) => Stats.recordSuccess(stats, bytes)),
    recordFailure: () => Ref.update(ref, Stats.recordFailure),
    snapshot: () => Ref.get(ref),
  }))
