/**
 * LinuxDeviceDetector - block devices reported by `lsblk`.
 *
 * A device is a partition (or an unpartitioned disk) that carries a
 * filesystem and sits on removable or hotplug hardware. Mounting creates
 * `<mountBase>/<name>` and runs `mount`; the device is never unmounted by the
 * ingest itself.
 */

import * as path from "node:path"
import { Duration, Effect, Either, Layer, ParseResult, Schema, pipe } from "effect"
import { FileSystem } from "@effect/platform"
import { isMounted, withMountPath, type Device } from "../domain/Device"
import { IngestConfigTag } from "../domain/IngestConfig"
import { ShellServiceTag, execOk, type ShellService } from "./ShellService"
import {
  DeviceDetectionFailed,
  type DeviceDetector,
  DeviceDetectorTag,
  DeviceMountFailed,
} from "./DeviceDetector"
import { makePollingWatcher } from "./DeviceWatcher"

// =============================================================================
// lsblk output
// =============================================================================

export const LSBLK_COLUMNS = "NAME,PATH,SIZE,FSTYPE,LABEL,MOUNTPOINT,RM,HOTPLUG,TYPE"

interface LsblkNode {
  readonly name: string
  readonly path: string
  readonly size: number
  readonly fstype: string | null
  readonly label: string | null
  readonly mountpoint: string | null
  readonly rm: boolean
  readonly hotplug: boolean
  readonly type: string
  readonly children: readonly LsblkNode[]
}

interface LsblkNodeEncoded {
  readonly name: string
  readonly path: string
  readonly size: number | string
  readonly fstype: string | null
  readonly label: string | null
  readonly mountpoint: string | null
  readonly rm: boolean | "1" | "0"
  readonly hotplug: boolean | "1" | "0"
  readonly type: string
  readonly children?: readonly LsblkNodeEncoded[]
}

/** Older util-linux prints flags as "1"/"0" and numbers as strings. */
const Flag = Schema.Union(
  Schema.Boolean,
  Schema.transform(Schema.Literal("1", "0"), Schema.Boolean, {
    strict: true,
    decode: (flag) => flag === "1",
    encode: (flag) => (flag ? "1" : "0"),
  })
)

const LsblkNode: Schema.Schema<LsblkNode, LsblkNodeEncoded> = Schema.Struct({
  name: Schema.String,
  path: Schema.String,
  size: Schema.Union(Schema.Number, Schema.NumberFromString),
  fstype: Schema.NullOr(Schema.String),
  label: Schema.NullOr(Schema.String),
  mountpoint: Schema.NullOr(Schema.String),
  rm: Flag,
  hotplug: Flag,
  type: Schema.String,
  children: Schema.optionalWith(Schema.Array(Schema.suspend(() => LsblkNode)), { default: () => [] }),
})

const LsblkOutput = Schema.parseJson(Schema.Struct({ blockdevices: Schema.Array(LsblkNode) }))

const toDevice = (node: LsblkNode): Device => ({
  name: node.name,
  path: node.path,
  mountPath: node.mountpoint ?? "",
  filesystem: node.fstype ?? "",
  sizeBytes: node.size,
  label: node.label ?? "",
})

const flatten = (nodes: readonly LsblkNode[], parentRemovable: boolean): readonly { node: LsblkNode; removable: boolean }[] =>
  nodes.flatMap((node) => {
    const removable = parentRemovable || node.rm || node.hotplug
    return [{ node, removable }, ...flatten(node.children, removable)]
  })

const hasFilesystem = (node: LsblkNode): boolean =>
  node.fstype !== null && node.fstype !== "" && (node.type === "part" || node.type === "disk")

const decodeLsblk = (json: string): Either.Either<readonly LsblkNode[], string> =>
  pipe(
    Schema.decodeUnknownEither(LsblkOutput)(json),
    Either.map((output) => output.blockdevices),
    Either.mapLeft((e) => `unexpected lsblk output: ${ParseResult.TreeFormatter.formatErrorSync(e)}`)
  )

/**
 * Removable devices with a filesystem from `lsblk -J -b` output. A partition
 * inherits the removable flag of its disk.
 */
export const parseLsblkDevices = (json: string): Either.Either<readonly Device[], string> =>
  Either.map(decodeLsblk(json), (nodes) =>
    flatten(nodes, false)
      .filter(({ node, removable }) => removable && hasFilesystem(node))
      .map(({ node }) => toDevice(node))
  )

// =============================================================================
// Live implementation
// =============================================================================

const lsblk = (shell: ShellService, args: readonly string[]) =>
  pipe(
    execOk(shell, "lsblk", ["-J", "-b", "-o", LSBLK_COLUMNS, ...args]),
    Effect.mapError((e) => new DeviceDetectionFailed({ reason: `${e.command}: ${e.message}` }))
  )

export const LinuxDeviceDetectorLive = Layer.effect(
  DeviceDetectorTag,
  Effect.gen(function* () {
    const shell = yield* ShellServiceTag
    const fs = yield* FileSystem.FileSystem
    const config = yield* IngestConfigTag

    const detectDevices: DeviceDetector["detectDevices"] = () =>
      pipe(
        lsblk(shell, []),
        Effect.flatMap((json) =>
          Either.match(parseLsblkDevices(json), {
            onLeft: (reason) => Effect.fail(new DeviceDetectionFailed({ reason })),
            onRight: Effect.succeed,
          })
        )
      )

    const getDeviceInfo: DeviceDetector["getDeviceInfo"] = (devicePath) =>
      pipe(
        lsblk(shell, [devicePath]),
        Effect.flatMap((json) =>
          Either.match(decodeLsblk(json), {
            onLeft: (reason) => Effect.fail(new DeviceDetectionFailed({ reason })),
            onRight: (nodes) => {
              const node = flatten(nodes, false).find((entry) => entry.node.path === devicePath)?.node ?? nodes[0]
              return node === undefined
                ? Effect.fail(new DeviceDetectionFailed({ reason: `lsblk does not know ${devicePath}` }))
                : Effect.succeed(toDevice(node))
            },
          })
        )
      )

    const mount: DeviceDetector["mount"] = (device) => {
      if (isMounted(device)) return Effect.succeed(device)

      const target = path.join(config.autoMount.mountBase, device.name)
      return pipe(
        fs.makeDirectory(target, { recursive: true }),
        Effect.mapError((e) => new DeviceMountFailed({ device: device.name, reason: e.message })),
        Effect.zipRight(
          pipe(
            execOk(shell, "mount", [device.path, target]),
            Effect.mapError((e) => new DeviceMountFailed({ device: device.name, reason: e.message }))
          )
        ),
        Effect.as(withMountPath(device, target))
      )
    }

    const unmount: DeviceDetector["unmount"] = (device) =>
      device.mountPath === ""
        ? Effect.void
        : pipe(
            execOk(shell, "umount", [device.mountPath]),
            Effect.mapError((e) => new DeviceMountFailed({ device: device.name, reason: e.message })),
            Effect.asVoid
          )

    const watch = yield* makePollingWatcher(
      detectDevices,
      Duration.seconds(config.deviceDetection.pollInterval)
    )

    return { detectDevices, getDeviceInfo, mount, unmount, ...watch }
  })
)
