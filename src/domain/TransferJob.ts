import { Array, pipe } from "effect"
import type { ClassifiedFile } from "./Classifier"

export interface TransferJob {
  readonly sourcePath: string
  /** Claimed, collision-free destination */
  readonly destinationPath: string
  readonly sizeBytes: number
  readonly priority: boolean
  readonly file: ClassifiedFile
}

export const isPriorityFile = (fileName: string, prefixes: readonly string[]): boolean =>
  prefixes.some((prefix) => fileName.startsWith(prefix))

/**
 * Priority jobs first, then the rest. Relative order within each group is
 * kept.
 */
export const orderForDispatch = (jobs: readonly TransferJob[]): readonly TransferJob[] =>
  pipe(
    jobs,
    Array.partition((job) => job.priority),
    ([normal, priority]) => [...priority, ...normal]
  )
