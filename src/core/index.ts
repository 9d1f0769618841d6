/**
 * Composition root: every live service wired for one loaded configuration.
 */

import { Layer, pipe } from "effect";
import { FetchHttpClient, type FileSystem } from "@effect/platform";
import { NodeContext } from "@effect/platform-node";

import { IngestConfigTag, type DetectorKind, type IngestConfig } from "../domain/IngestConfig";
import type { DeviceDetectorTag } from "../infra/DeviceDetector";
import { DiskStatsServiceLive, type DiskStatsServiceTag } from "../infra/DiskStatsService";
import { FileCopyServiceLive } from "../infra/FileCopyService";
import { FileStatServiceLive } from "../infra/FileStatService";
import { LinuxDeviceDetectorLive } from "../infra/LinuxDeviceDetector";
import { ShellServiceLive, type ShellServiceTag } from "../infra/ShellService";
import { VolumeDeviceDetectorLive } from "../infra/VolumeDeviceDetector";
import { WalkServiceLive } from "../infra/WalkService";
import { DestinationServiceLive } from "../services/DestinationService";
import { DeviceManagerLive } from "../services/DeviceManager";
import { LoggerServiceLive } from "../services/LoggerService";
import { MonitorServiceLive } from "../services/MonitorService";
import { NotifierServiceLive } from "../services/NotifierService";
import { ScannerServiceLive } from "../services/ScannerService";
import { TransferServiceLive } from "../services/TransferService";

type DetectorLayer = Layer.Layer<
  DeviceDetectorTag,
  never,
  FileSystem.FileSystem | ShellServiceTag | DiskStatsServiceTag | IngestConfigTag
>;

export const detectorLayer = (kind: DetectorKind): DetectorLayer =>
  kind === "lsblk" ? LinuxDeviceDetectorLive : VolumeDeviceDetectorLive;

export const createAppLayer = (config: IngestConfig) => {
  const platform = Layer.mergeAll(
    NodeContext.layer,
    FetchHttpClient.layer,
    Layer.succeed(IngestConfigTag, config)
  );

  const infra = pipe(
    Layer.mergeAll(
      FileStatServiceLive,
      WalkServiceLive,
      FileCopyServiceLive,
      DiskStatsServiceLive,
      ShellServiceLive
    ),
    Layer.provideMerge(platform)
  );

  const support = pipe(
    Layer.mergeAll(detectorLayer(config.deviceDetection.detector), LoggerServiceLive, DestinationServiceLive),
    Layer.provideMerge(infra)
  );

  const engine = pipe(
    Layer.mergeAll(ScannerServiceLive, TransferServiceLive, NotifierServiceLive),
    Layer.provideMerge(support)
  );

  return pipe(
    MonitorServiceLive,
    Layer.provideMerge(DeviceManagerLive),
    Layer.provideMerge(engine)
  );
};
