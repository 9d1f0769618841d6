import { Args, Options } from "@effect/cli";
import { DEFAULT_CONFIG_PATH } from "../infra/ConfigLoader";

export const config = Options.file("config").pipe(
  Options.withAlias("c"),
  Options.withDescription(`Path to the JSON configuration (default: ${DEFAULT_CONFIG_PATH})`),
  Options.withDefault(DEFAULT_CONFIG_PATH)
);

export const debug = Options.boolean("debug").pipe(
  Options.withDescription("Enable verbose debug logging"),
  Options.withDefault(false)
);

export const force = Options.boolean("force").pipe(
  Options.withDescription("Ingest even if the device fails the inclusion policy"),
  Options.withDefault(false)
);

export const devicePath = Args.text({ name: "path" }).pipe(
  Args.withDescription("Block device (e.g. /dev/sdb1) or a directory holding the media")
);

export const fileNames = Args.text({ name: "name" }).pipe(
  Args.withDescription("File names to classify"),
  Args.atLeast(1)
);

export interface CommonOptions {
  readonly config: string;
  readonly debug: boolean;
}

export interface IngestOptions extends CommonOptions {
  readonly path: string;
  readonly force: boolean;
}

export interface ClassifyOptions extends CommonOptions {
  readonly names: readonly string[];
}
