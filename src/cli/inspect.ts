import path from "node:path";

import fse from "fs-extra";

import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";
import type { EventLogger } from "../core/logger.js";
import { loadArtifact, type LoadedArtifact } from "../extraction/pipeline.js";

export type InspectCommandOptions = {
  json?: boolean;
};

export async function inspectCommand(
  file: string,
  opts: InspectCommandOptions,
  log?: EventLogger,
): Promise<void> {
  const filePath = await requireArtifactFile(file);
  const loaded = await loadArtifact(filePath, log);

  if (opts.json) {
    console.log(JSON.stringify(loaded, null, 2));
    return;
  }

  for (const line of formatInspectReport(path.basename(filePath), loaded)) {
    console.log(line);
  }
}

export function formatInspectReport(name: string, loaded: LoadedArtifact): string[] {
  const info = loaded.classification;
  const lines = [
    `File: ${name}`,
    `Size: ${info.size} bytes`,
    `Signature: ${info.file_signature}`,
    `Format: ${info.format} (${info.version})`,
    `Encoding: ${info.encoding}`,
    `Components (${loaded.components.length}, source: ${loaded.source}):`,
  ];

  for (const component of loaded.components) {
    const pins = component.pins.map((pin) => pin.name).join(", ");
    const value = component.value ? ` = ${component.value}` : "";
    lines.push(`  ${component.id}  ${component.name} [${component.type}]${value}  pins: ${pins}`);
  }
  return lines;
}

export async function requireArtifactFile(file: string): Promise<string> {
  const filePath = path.resolve(file);
  const stat = await fse.stat(filePath).catch(() => null);
  if (!stat?.isFile()) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.input,
      title: "Project file not found.",
      message: `No file at ${filePath}.`,
      hint: "Pass the path of a .pdsprj project file.",
    });
  }
  return filePath;
}
