import { afterEach, beforeEach, describe, expect, test } from "vitest"
import { Effect, pipe } from "effect"
import { NodeFileSystem } from "@effect/platform-node"
import { mkdtemp, rm, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"

import { loadConfig } from "./ConfigLoader"

let root: string

beforeEach(async () => {
  root = await mkdtemp(join(tmpdir(), "config-test-"))
})

afterEach(async () => {
  await rm(root, { recursive: true, force: true })
})

const writeConfig = async (content: unknown) => {
  const file = join(root, "config.json")
  await writeFile(file, typeof content === "string" ? content : JSON.stringify(content))
  return file
}

const load = (path: string) => pipe(loadConfig(path), Effect.provide(NodeFileSystem.layer))

const PATTERN = "^([^_]+)_([^_]+)_(ACam|BCam)_(.+)$"

describe("loadConfig", () => {
  test("fills defaults around the required fields", async () => {
    const file = await writeConfig({ destinationPath: "/srv/media", parsing: { pattern: PATTERN } })

    const config = await Effect.runPromise(load(file))

    expect(config.destinationPath).toBe("/srv/media")
    expect(config.parsing.folderStructure).toBe("{client}/{project}/{camera}")
    expect(config.parsing.unmatchedFolder).toBe("Unsorted")
    expect(config.transfer.maxWorkers).toBe(4)
    expect(config.transfer.verifyChecksums).toBe(true)
    expect(config.autoMount.enabled).toBe(false)
  })

  test("size strings are converted to bytes", async () => {
    const file = await writeConfig({
      destinationPath: "/srv/media",
      parsing: { pattern: PATTERN },
      deviceDetection: { minSize: "32GB" },
    })

    const config = await Effect.runPromise(load(file))

    expect(config.deviceDetection.minSize).toBe(32 * 1024 ** 3)
  })

  test("a missing file is ConfigNotFound", async () => {
    const missing = join(root, "absent.json")

    const error = await pipe(load(missing), Effect.flip, Effect.runPromise)

    expect(error).toEqual(expect.objectContaining({ _tag: "ConfigNotFound", path: missing }))
  })

  test("malformed JSON is ConfigInvalid", async () => {
    const file = await writeConfig("{ destinationPath: ")

    const error = await pipe(load(file), Effect.flip, Effect.runPromise)

    expect(error._tag).toBe("ConfigInvalid")
  })

  test("a pattern with the wrong number of groups is rejected", async () => {
    const file = await writeConfig({ destinationPath: "/srv/media", parsing: { pattern: "^(.+)_(.+)$" } })

    const error = await pipe(load(file), Effect.flip, Effect.runPromise)

    expect(error._tag).toBe("ConfigInvalid")
    if (error._tag === "ConfigInvalid") {
      expect(error.issues).toContain("pattern must have exactly 4 capture groups (project, client, camera, clip), found 2")
    }
  })

  test("a missing destination is rejected", async () => {
    const file = await writeConfig({ parsing: { pattern: PATTERN } })

    const error = await pipe(load(file), Effect.flip, Effect.runPromise)

    expect(error._tag).toBe("ConfigInvalid")
    if (error._tag === "ConfigInvalid") {
      expect(error.issues).toContain("destinationPath")
    }
  })

  test("the bundled example configuration is valid", async () => {
    const config = await Effect.runPromise(load(join(process.cwd(), "config.example.json")))

    expect(config.deviceDetection.detector).toBe("lsblk")
    expect(config.deviceDetection.minSize).toBe(1024 ** 3)
    expect(config.transfer.priorityPrefixes).toEqual(["PRIORITY_", "HERO_"])
  })
})
