import { Console, Effect, Logger, LogLevel, Option, pipe } from "effect";
import { FileSystem } from "@effect/platform";

import type { ClassifyOptions, CommonOptions, IngestOptions } from "./options";
import { fromDomainError } from "./errors";
import { createAppLayer } from "../core";

import { classify, destinationPath, rulesFromConfig } from "../domain/Classifier";
import { describeDevice, type Device } from "../domain/Device";
import { policyFromConfig, rejectionReason } from "../domain/DevicePolicy";
import type { IngestConfig } from "../domain/IngestConfig";
import * as Stats from "../domain/TransferStats";
import { loadConfig } from "../infra/ConfigLoader";
import { DeviceDetectorTag, directoryDevice } from "../infra/DeviceDetector";
import { DiskStatsServiceTag } from "../infra/DiskStatsService";
import { formatSize } from "../lib/parseSize";
import { DeviceManagerTag } from "../services/DeviceManager";
import { MonitorServiceTag } from "../services/MonitorService";
import { NotifierServiceTag } from "../services/NotifierService";

/**
 * Error handling wrapper for CLI commands
 */
export const withErrorHandling = <A, R>(
  effect: Effect.Effect<A, unknown, R>
): Effect.Effect<void, never, R> =>
  pipe(
    effect,
    Effect.catchAll((error) => {
      const appError = fromDomainError(error);
      return Console.error(`\n${appError.format()}`);
    }),
    Effect.asVoid
  );

/**
 * Load the configuration, applying --debug on top of it.
 */
const loadWithFlags = (options: CommonOptions) =>
  pipe(
    loadConfig(options.config),
    Effect.map(
      (config): IngestConfig =>
        options.debug ? { ...config, logging: { ...config.logging, logLevel: "debug" } } : config
    )
  );

const withDebug =
  (debug: boolean) =>
  <A, E, R>(effect: Effect.Effect<A, E, R>): Effect.Effect<A, E, R> =>
    debug ? pipe(effect, Effect.provide(Logger.minimumLogLevel(LogLevel.Debug))) : effect;

/**
 * Run the watch command
 */
export const runWatch = (options: CommonOptions) =>
  Effect.gen(function* () {
    const config = yield* loadWithFlags(options);

    yield* pipe(
      MonitorServiceTag,
      Effect.flatMap((monitor) => monitor.runUntilInterrupted()),
      Effect.provide(createAppLayer(config))
    );
  }).pipe(withDebug(options.debug));

/**
 * A directory is ingested as-is; anything else is looked up by the detector.
 */
const resolveDevice = (target: string) =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const info = yield* fs.stat(target);

    if (info.type === "Directory") {
      const diskStats = yield* DiskStatsServiceTag;
      return directoryDevice(target, yield* diskStats.getStats(target));
    }

    const detector = yield* DeviceDetectorTag;
    return yield* detector.getDeviceInfo(target);
  });

/**
 * Run the ingest command
 */
export const runIngest = (options: IngestOptions) =>
  Effect.gen(function* () {
    const config = yield* loadWithFlags(options);

    yield* Effect.gen(function* () {
      const manager = yield* DeviceManagerTag;
      const device = yield* resolveDevice(options.path);

      const outcome = yield* manager.handle(device, { force: options.force });
      yield* Effect.flatMap(NotifierServiceTag, (notifier) => notifier.awaitPending());

      yield* Option.match(outcome, {
        onNone: () => Console.log(`\nSkipped ${describeDevice(device)}. Use --force to ingest it anyway.\n`),
        onSome: (stats) =>
          Console.log(
            `\n${Stats.succeededFiles(stats)}/${stats.totalFiles} files transferred, ` +
              `${stats.failedFiles} failed, ${formatSize(stats.transferredBytes)}\n`
          ),
      });
    }).pipe(Effect.provide(createAppLayer(config)));
  }).pipe(withDebug(options.debug));

const deviceLine = (device: Device, config: IngestConfig): string => {
  const reason = rejectionReason(device, policyFromConfig(config));
  const mount = device.mountPath === "" ? "not mounted" : `mounted at ${device.mountPath}`;
  const filesystem = device.filesystem === "" ? "" : `, ${device.filesystem}`;
  return `   ${reason === undefined ? "✓" : "✗"} ${device.path}: ${describeDevice(device)}${filesystem}, ${mount}` +
    (reason === undefined ? "" : ` (skipped: ${reason})`);
};

/**
 * Run the devices command
 */
export const runDevices = (options: CommonOptions) =>
  Effect.gen(function* () {
    const config = yield* loadWithFlags(options);

    yield* Effect.gen(function* () {
      const detector = yield* DeviceDetectorTag;
      const devices = yield* detector.detectDevices();

      if (devices.length === 0) {
        yield* Console.log("\nNo removable devices found\n");
        return;
      }

      yield* Console.log(`\n🔌 ${devices.length} devices:\n`);
      yield* Effect.forEach(devices, (device) => Console.log(deviceLine(device, config)), { discard: true });
      yield* Console.log("");
    }).pipe(Effect.provide(createAppLayer(config)));
  }).pipe(withDebug(options.debug));

/**
 * Run the classify command
 */
export const runClassify = (options: ClassifyOptions) =>
  Effect.gen(function* () {
    const config = yield* loadWithFlags(options);
    const rules = rulesFromConfig(config);

    yield* Effect.forEach(
      options.names,
      (name) => {
        const file = classify(name, rules.pattern);
        const marker = file.matched ? "✓" : "?";
        return Console.log(`${marker} ${name} -> ${destinationPath(file, rules)}`);
      },
      { discard: true }
    );
  }).pipe(withDebug(options.debug));
