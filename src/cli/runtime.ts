/*
 * Shared CLI wiring: config, storage layout and the event log for one command invocation.
 */

import path from "node:path";

import type { ServerConfig } from "../core/config.js";
import { loadServerConfig, type ConfigOverrides } from "../core/config-loader.js";
import { JsonlLogger, type EventLogger } from "../core/logger.js";
import { createStoragePaths, eventsLogPath, type StoragePaths } from "../core/paths.js";

export type CliRuntime = {
  config: ServerConfig;
  configPath: string | null;
  paths: StoragePaths;
  log: EventLogger;
};

export type CliRuntimeOptions = {
  configPath?: string;
  cwd?: string;
  overrides?: ConfigOverrides;
  service: string;
};

export function createCliRuntime(options: CliRuntimeOptions): CliRuntime {
  const cwd = options.cwd ?? process.cwd();
  const { config, configPath } = loadServerConfig({
    explicitPath: options.configPath,
    cwd,
    overrides: options.overrides,
  });

  const paths = createStoragePaths(config.storage_dir, cwd);
  const logFile = config.log_file ? path.resolve(cwd, config.log_file) : eventsLogPath(paths);
  const log = new JsonlLogger(logFile, { service: options.service });

  return { config, configPath, paths, log };
}
