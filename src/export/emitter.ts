/*
Purpose: write one save's outputs: an untouched copy of the project plus netlist, script and guide.
Assumptions: outputDir is writable; every file of one save shares the same timestamp.
Usage: const summary = await writeExports({ artifactPath, connections, outputDir, log }).
*/

import path from "node:path";

import fse from "fs-extra";

import { formatErrorMessage } from "../core/error-format.js";
import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";
import { NOOP_LOGGER, logEvent, type EventLogger } from "../core/logger.js";
import { fileExtension } from "../core/paths.js";
import { fileTimestamp } from "../core/utils.js";
import type { Connection } from "../model/schema.js";

import { renderGuide } from "./guide.js";
import { renderNetlist } from "./netlist.js";
import { renderScript } from "./script.js";

// =============================================================================
// TYPES
// =============================================================================

export type WriteExportsOptions = {
  artifactPath: string;
  connections: readonly Connection[];
  outputDir: string;
  now?: Date;
  log?: EventLogger;
};

export type ExportFiles = {
  netlist: string;
  script: string;
  guide: string;
};

export type ExportSummary = {
  timestamp: string;
  updated_file: string;
  files: ExportFiles;
  connections_count: number;
};

type ExportRenderer = (connections: readonly Connection[], now: Date) => Promise<string>;

const DEFAULT_PROJECT_EXTENSION = "pdsprj";

// =============================================================================
// PUBLIC API
// =============================================================================

export function exportFileNames(timestamp: string, artifactPath: string): ExportFiles & { copy: string } {
  const extension = fileExtension(artifactPath) || DEFAULT_PROJECT_EXTENSION;
  return {
    copy: `connected_proteus_${timestamp}.${extension}`,
    netlist: `netlist_${timestamp}.net`,
    script: `connect_script_${timestamp}.scr`,
    guide: `wiring_guide_${timestamp}.txt`,
  };
}

export async function writeExports(options: WriteExportsOptions): Promise<ExportSummary> {
  const now = options.now ?? new Date();
  const log = options.log ?? NOOP_LOGGER;
  const timestamp = fileTimestamp(now);
  const names = exportFileNames(timestamp, options.artifactPath);

  await fse.ensureDir(options.outputDir);
  await copyArtifact(options.artifactPath, path.join(options.outputDir, names.copy));

  const renderers: Array<[string, ExportRenderer]> = [
    [names.netlist, renderNetlist],
    [names.script, renderScript],
    [names.guide, renderGuide],
  ];
  for (const [fileName, render] of renderers) {
    const content = await render(options.connections, now);
    await fse.writeFile(path.join(options.outputDir, fileName), content, "utf8");
  }

  const summary: ExportSummary = {
    timestamp,
    updated_file: names.copy,
    files: { netlist: names.netlist, script: names.script, guide: names.guide },
    connections_count: options.connections.length,
  };

  logEvent(log, "export.complete", {
    timestamp,
    updated_file: summary.updated_file,
    connections: summary.connections_count,
  });
  return summary;
}

// =============================================================================
// INTERNALS
// =============================================================================

async function copyArtifact(source: string, destination: string): Promise<void> {
  try {
    await fse.copy(source, destination, { preserveTimestamps: true });
  } catch (err) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.export,
      title: "Export failed.",
      message: `Failed to create a copy of the project file: ${formatErrorMessage(err)}`,
      hint: "Check that the uploaded project still exists and the storage directory is writable.",
      cause: err,
    });
  }
}
