/**
 * LoggerService - leveled, optionally device-scoped log lines.
 *
 * Every line goes to the console and to a per-process server log file. When
 * `logging.logToDevice` is on, lines scoped to a device are also appended to a
 * log file written onto that device.
 */

import * as path from "node:path"
import { Clock, Console, Context, Effect, HashMap, Layer, Option, Ref, pipe } from "effect"
import { FileSystem } from "@effect/platform"
import type { Device } from "../domain/Device"
import { IngestConfigTag, type LogLevelSetting } from "../domain/IngestConfig"
import { fileStamp, formatTimestamp } from "../lib/time"

// =============================================================================
// Types
// =============================================================================

export type LogLevel = "debug" | "info" | "success" | "warning" | "error"

const SEVERITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  success: 1,
  warning: 2,
  error: 3,
}

const LABEL: Record<LogLevel, string> = {
  debug: "DEBUG",
  info: "INFO",
  success: "SUCCESS",
  warning: "WARNING",
  error: "ERROR",
}

const ICON: Record<LogLevel, string> = {
  debug: "🔍",
  info: "ℹ️ ",
  success: "✓",
  warning: "⚠️ ",
  error: "❌",
}

export const isEnabled = (level: LogLevel, threshold: LogLevelSetting): boolean =>
  SEVERITY[level] >= SEVERITY[threshold]

/** `[2024-05-01 13:04:09] [INFO] [sdb1] message` */
export const formatLogLine = (
  timestamp: number,
  level: LogLevel,
  message: string,
  device?: string
): string =>
  `[${formatTimestamp(timestamp)}] [${LABEL[level]}]${device ? ` [${device}]` : ""} ${message}`

// =============================================================================
// Service interface
// =============================================================================

type Log = (message: string, device?: string) => Effect.Effect<void>

export interface LoggerService {
  readonly debug: Log
  readonly info: Log
  readonly success: Log
  readonly warning: Log
  readonly error: Log
  /** Starts the on-device log for a mounted device, when enabled */
  readonly openDeviceLog: (device: Device) => Effect.Effect<void>
  readonly closeDeviceLog: (deviceName: string) => Effect.Effect<void>
  /** Where a device's run is recorded: its device log, else the server log */
  readonly logLocation: (deviceName: string) => Effect.Effect<string>
}

export class LoggerServiceTag extends Context.Tag("LoggerService")<
  LoggerServiceTag,
  LoggerService
>() {}

// =============================================================================
// Implementation
// =============================================================================

export const makeLoggerService = Effect.gen(function* () {
  const fs = yield* FileSystem.FileSystem
  const config = yield* IngestConfigTag
  const { serverLogPath, logToDevice, logLevel } = config.logging

  const startedAt = yield* Clock.currentTimeMillis
  const serverLog = path.join(serverLogPath, `server_${fileStamp(startedAt)}.log`)

  const serverLogReady = yield* pipe(
    fs.makeDirectory(serverLogPath, { recursive: true }),
    Effect.zipRight(fs.writeFileString(serverLog, "", { flag: "a" })),
    Effect.as(true),
    Effect.catchAll((e) =>
      Effect.as(Console.error(`⚠️  Server log unavailable, logging to console only: ${e.message}`), false)
    )
  )

  const deviceLogs = yield* Ref.make(HashMap.empty<string, string>())

  const append = (file: string, line: string) =>
    pipe(
      fs.writeFileString(file, `${line}\n`, { flag: "a" }),
      Effect.catchAll((e) => Console.error(`⚠️  Could not write ${file}: ${e.message}`))
    )

  const write =
    (level: LogLevel): Log =>
    (message, device) =>
      Effect.gen(function* () {
        if (!isEnabled(level, logLevel)) return

        const now = yield* Clock.currentTimeMillis
        const line = formatLogLine(now, level, message, device)
        const prefix = device ? `[${device}] ` : ""
        const consoleLine = `${ICON[level]} ${prefix}${message}`
        yield* level === "error" || level === "warning" ? Console.error(consoleLine) : Console.log(consoleLine)

        if (serverLogReady) yield* append(serverLog, line)

        if (device !== undefined) {
          const deviceLog = HashMap.get(yield* Ref.get(deviceLogs), device)
          if (Option.isSome(deviceLog)) yield* append(deviceLog.value, line)
        }
      })

  const service: LoggerService = {
    debug: write("debug"),
    info: write("info"),
    success: write("success"),
    warning: write("warning"),
    error: write("error"),

    openDeviceLog: (device) =>
      Effect.gen(function* () {
        if (!logToDevice || device.mountPath === "") return

        const now = yield* Clock.currentTimeMillis
        const file = path.join(device.mountPath, `ingest_log_${fileStamp(now)}_${device.name}.txt`)
        const opened = yield* pipe(
          fs.writeFileString(file, `Media ingest log for ${device.name}\nStarted: ${formatTimestamp(now)}\n\n`, {
            flag: "a",
          }),
          Effect.as(true),
          Effect.catchAll((e) =>
            Effect.as(Console.error(`⚠️  Could not create device log ${file}: ${e.message}`), false)
          )
        )
        if (opened) yield* Ref.update(deviceLogs, HashMap.set(device.name, file))
      }),

    closeDeviceLog: (deviceName) => Ref.update(deviceLogs, HashMap.remove(deviceName)),

    logLocation: (deviceName) =>
      pipe(
        Ref.get(deviceLogs),
        Effect.map((logs) =>
          Option.getOrElse(HashMap.get(logs, deviceName), () => (serverLogReady ? serverLog : "console"))
        )
      ),
  }

  return service
})

export const LoggerServiceLive = Layer.effect(LoggerServiceTag, makeLoggerService)
