import { afterEach, beforeEach, describe, expect, test } from "vitest"
import { Effect, pipe } from "effect"
import { NodeFileSystem } from "@effect/platform-node"
import { mkdtemp, readdir, rm, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { makeDestinationService } from "./DestinationService"

let root: string

beforeEach(async () => {
  root = await mkdtemp(join(tmpdir(), "destination-test-"))
})

afterEach(async () => {
  await rm(root, { recursive: true, force: true })
})

const claim = (destination: string, maxVersions?: number) =>
  pipe(
    makeDestinationService(maxVersions),
    Effect.flatMap((service) => service.claim(destination)),
    Effect.provide(NodeFileSystem.layer)
  )

describe("DestinationService.claim", () => {
  test("claims the computed path and creates its directories", async () => {
    const target = join(root, "Acme", "Promo", "ACam", "001.mp4")

    const claimed = await Effect.runPromise(claim(target))

    expect(claimed).toBe(target)
    expect(await readdir(join(root, "Acme", "Promo", "ACam"))).toEqual(["001.mp4"])
  })

  test("repeated claims get increasing versions", async () => {
    const target = join(root, "001.mp4")

    const claimed = await pipe(
      Effect.all([claim(target), claim(target), claim(target)]),
      Effect.runPromise
    )

    expect(claimed).toEqual([target, join(root, "001_v2.mp4"), join(root, "001_v3.mp4")])
  })

  test("a file already at the destination is never reused", async () => {
    await writeFile(join(root, "001.mp4"), "existing footage")

    const claimed = await Effect.runPromise(claim(join(root, "001.mp4")))

    expect(claimed).toBe(join(root, "001_v2.mp4"))
  })

  test("names without an extension are versioned at the end", async () => {
    await writeFile(join(root, "README"), "")

    expect(await Effect.runPromise(claim(join(root, "README")))).toBe(join(root, "README_v2"))
  })

  test("fails with TooManyVersions when every candidate is taken", async () => {
    await writeFile(join(root, "001.mp4"), "")
    await writeFile(join(root, "001_v2.mp4"), "")

    const error = await pipe(claim(join(root, "001.mp4"), 2), Effect.flip, Effect.runPromise)

    expect(error._tag).toBe("TooManyVersions")
    if (error._tag === "TooManyVersions") {
      expect(error.attempts).toBe(2)
      expect(error.path).toBe(join(root, "001.mp4"))
    }
  })

  test("fails with DestinationUnavailable when the parent cannot be created", async () => {
    await writeFile(join(root, "blocker"), "")

    const error = await pipe(claim(join(root, "blocker", "001.mp4")), Effect.flip, Effect.runPromise)

    expect(error._tag).toBe("DestinationUnavailable")
  })
})
