import { describe, expect, test } from "vitest"
import {
  initialStats,
  progressPercent,
  recordFailure,
  recordSuccess,
  succeededFiles,
  throughput,
} from "./TransferStats"

describe("TransferStats", () => {
  test("successes and failures both count as processed", () => {
    const stats = recordFailure(recordSuccess(recordSuccess(initialStats(4, 300, 0), 100), 50))

    expect(stats.processedFiles).toBe(3)
    expect(stats.failedFiles).toBe(1)
    expect(stats.transferredBytes).toBe(150)
    expect(succeededFiles(stats)).toBe(2)
  })

  test("progressPercent", () => {
    expect(progressPercent(recordSuccess(initialStats(4, 400, 0), 100))).toBe(25)
    expect(progressPercent(recordFailure(initialStats(4, 400, 0)))).toBe(0)
    expect(progressPercent(initialStats(3, 0, 0))).toBe(0)
  })

  test("throughput is bytes per elapsed second", () => {
    const stats = recordSuccess(initialStats(1, 2000, 1_000), 2000)
    expect(throughput(stats, 3_000)).toBe(1000)
    expect(throughput(stats, 1_000)).toBe(0)
  })
})
