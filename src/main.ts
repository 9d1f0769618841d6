#!/usr/bin/env node
/**
 * Media Ingest CLI
 *
 * Watches for removable media, copies the footage it finds into a
 * client/project/camera tree derived from each file name, and reports on
 * every device it processed.
 *
 * Commands:
 *   watch    - Monitor for devices and ingest each one as it arrives
 *   ingest   - Ingest a single device or directory now
 *   devices  - List detected devices and whether they would be ingested
 *   classify - Show where file names would be filed
 *
 * Example:
 *   $ media-ingest watch --config ./config.json
 *   $ media-ingest ingest /dev/sdb1 --force
 *   $ media-ingest classify Promo_Acme_ACam_001.mp4 notes.txt
 */

import { Command } from "@effect/cli"
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Effect } from "effect"

import * as Opts from "./cli/options"
import { runClassify, runDevices, runIngest, runWatch, withErrorHandling } from "./cli/handler"

// =============================================================================
// Watch subcommand
// =============================================================================

const watchCommand = Command.make(
  "watch",
  {
    config: Opts.config,
    debug: Opts.debug,
  },
  (opts) => withErrorHandling(runWatch(opts))
).pipe(
  Command.withDescription("Monitor for removable devices and ingest each one as it is connected")
)

// =============================================================================
// Ingest subcommand
// =============================================================================

const ingestCommand = Command.make(
  "ingest",
  {
    config: Opts.config,
    debug: Opts.debug,
    force: Opts.force,
    path: Opts.devicePath,
  },
  (opts) => withErrorHandling(runIngest(opts))
).pipe(
  Command.withDescription("Ingest one block device or directory and exit")
)

// =============================================================================
// Devices subcommand
// =============================================================================

const devicesCommand = Command.make(
  "devices",
  {
    config: Opts.config,
    debug: Opts.debug,
  },
  (opts) => withErrorHandling(runDevices(opts))
).pipe(
  Command.withDescription("List detected devices and the policy decision for each")
)

// =============================================================================
// Classify subcommand
// =============================================================================

const classifyCommand = Command.make(
  "classify",
  {
    config: Opts.config,
    debug: Opts.debug,
    names: Opts.fileNames,
  },
  (opts) => withErrorHandling(runClassify(opts))
).pipe(
  Command.withDescription("Print the destination each file name would be copied to")
)

// =============================================================================
// Root command
// =============================================================================

const rootCommand = Command.make("media-ingest", {}).pipe(
  Command.withSubcommands([watchCommand, ingestCommand, devicesCommand, classifyCommand]),
  Command.withDescription("Copy footage off removable media into an organized archive")
)

// =============================================================================
// Run CLI
// =============================================================================

const cli = Command.run(rootCommand, {
  name: "media-ingest",
  version: "0.1.0",
})

cli(process.argv).pipe(Effect.provide(NodeContext.layer), NodeRuntime.runMain)
