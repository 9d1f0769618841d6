import { Match, Predicate } from "effect";

import type { ConfigError } from "../infra/ConfigLoader";
import type { DeviceDetectorError } from "../infra/DeviceDetector";
import type { ScannerError } from "../services/ScannerService";

type DomainError = ConfigError | DeviceDetectorError | ScannerError;

export class AppError extends Error {
  readonly _tag = "AppError";

  constructor(
    readonly title: string,
    readonly detail: string,
    readonly suggestion: string
  ) {
    super(`${title}: ${detail}`);
  }

  format(): string {
    return [
      `ERROR: ${this.title}`,
      ``,
      `   ${this.detail}`,
      ``,
      `   Hint: ${this.suggestion}`
    ].join("\n");
  }
}

const errors = {
  configNotFound: (path: string) =>
    new AppError(
      "Configuration not found",
      `No configuration file exists at "${path}".`,
      `Create one from config.example.json, or point to it with --config <path>.`
    ),

  configUnreadable: (path: string, reason: string) =>
    new AppError(
      "Cannot read configuration",
      `Failed to read "${path}": ${reason}`,
      `Check that the file is readable by the user running media-ingest.`
    ),

  configInvalid: (path: string, issues: string) =>
    new AppError(
      "Invalid configuration",
      `"${path}" does not match the expected format:\n${issues}`,
      `Fix the fields listed above. Only destinationPath and parsing.pattern are required.`
    ),

  mountFailed: (device: string, reason: string) =>
    new AppError(
      "Mount failed",
      `Could not mount ${device}: ${reason}`,
      `Enable autoMount and run as a user allowed to mount, or mount the device yourself and ingest its mount point.`
    ),

  detectionFailed: (reason: string) =>
    new AppError(
      "Device detection failed",
      reason,
      `Check deviceDetection.detector: "lsblk" needs util-linux, "volumes" needs an existing volumesRoot.`
    ),

  watchAlreadyActive: () =>
    new AppError(
      "Already watching",
      `A device watch is already running in this process.`,
      `Stop the running watch before starting another.`
    ),

  scanPathNotFound: (path: string) =>
    new AppError(
      "Device path missing",
      `The path "${path}" does not exist.`,
      `The device may have been removed. Reconnect it and try again.`
    ),

  scanFailed: (path: string, reason: string) =>
    new AppError(
      "Scan failed",
      `Could not scan files in "${path}": ${reason}`,
      `Check that the device is mounted and readable.`
    ),

  scanPermissionDenied: (path: string) =>
    new AppError(
      "Permission denied during scan",
      `Cannot read files in "${path}": permission denied.`,
      `Check file permissions or run with elevated privileges.`
    ),

  unexpected: (message: string) =>
    new AppError("Unexpected error", message, `If this persists, please report this issue.`),

  permissionDenied: (message: string) =>
    new AppError(
      "Permission denied",
      message,
      `Check that you have the required permissions. You may need to run with elevated privileges.`
    )
};

const matchDomainError = Match.typeTags<DomainError>()({
  ConfigNotFound: (e) => errors.configNotFound(e.path),
  ConfigUnreadable: (e) => errors.configUnreadable(e.path, e.reason),
  ConfigInvalid: (e) => errors.configInvalid(e.path, e.issues),

  DeviceDetectionFailed: (e) => errors.detectionFailed(e.reason),
  DeviceMountFailed: (e) => errors.mountFailed(e.device, e.reason),
  WatchAlreadyActive: () => errors.watchAlreadyActive(),

  ScanPathNotFound: (e) => errors.scanPathNotFound(e.path),
  ScanPermissionDenied: (e) => errors.scanPermissionDenied(e.path),
  ScanFailed: (e) => errors.scanFailed(e.path, e.reason)
});

const DOMAIN_TAGS: ReadonlySet<string> = new Set<DomainError["_tag"]>([
  "ConfigNotFound",
  "ConfigUnreadable",
  "ConfigInvalid",
  "DeviceDetectionFailed",
  "DeviceMountFailed",
  "WatchAlreadyActive",
  "ScanPathNotFound",
  "ScanPermissionDenied",
  "ScanFailed"
]);

const isDomainError = (e: unknown): e is DomainError =>
  Predicate.hasProperty(e, "_tag") && typeof e._tag === "string" && DOMAIN_TAGS.has(e._tag);

const isPermissionError = (message: string): boolean =>
  message.toLowerCase().includes("permission denied") ||
  message.toLowerCase().includes("eacces") ||
  message.toLowerCase().includes("operation not permitted") ||
  message.toLowerCase().includes("eperm");

export const fromDomainError = (error: unknown): AppError => {
  if (error instanceof AppError) {
    return error;
  }

  if (isDomainError(error)) {
    return matchDomainError(error);
  }

  if (error instanceof Error) {
    return isPermissionError(error.message)
      ? errors.permissionDenied(error.message)
      : errors.unexpected(error.message);
  }

  return errors.unexpected(String(error));
};

export const {
  configNotFound,
  configUnreadable,
  configInvalid,
  mountFailed,
  detectionFailed,
  watchAlreadyActive,
  scanPathNotFound,
  scanFailed,
  scanPermissionDenied,
  unexpected,
  permissionDenied
} = errors;
