/*
 * `wirebridge export`: offline save. Extracts components from a project file and writes
 * the same outputs the editor's save route produces.
 * Connections come from a JSON file holding either an array or { "connections": [...] }.
 */

import path from "node:path";

import fse from "fs-extra";
import { z } from "zod";

import { formatSchemaIssues } from "../core/config.js";
import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";
import { writeExports, type ExportSummary } from "../export/emitter.js";
import { enforceReferencePolicy } from "../export/references.js";
import { loadArtifact } from "../extraction/pipeline.js";
import { ConnectionListSchema, type Connection } from "../model/schema.js";

import { requireArtifactFile } from "./inspect.js";
import { createCliRuntime } from "./runtime.js";

export type ExportCommandOptions = {
  connections: string;
  out?: string;
  config?: string;
};

const ConnectionsFileSchema = z.union([
  ConnectionListSchema,
  z.object({ connections: ConnectionListSchema }).transform((value) => value.connections),
]);

export async function exportCommand(file: string, opts: ExportCommandOptions): Promise<ExportSummary> {
  const runtime = createCliRuntime({ configPath: opts.config, service: "cli" });
  const artifactPath = await requireArtifactFile(file);
  const connections = await readConnectionsFile(opts.connections);

  const loaded = await loadArtifact(artifactPath, runtime.log);
  const check = enforceReferencePolicy(
    runtime.config.connection_references,
    loaded.components,
    connections,
    runtime.log,
  );
  if (check.unknown.length > 0) {
    console.warn(`Warning: unknown connection endpoints: ${check.unknown.join(", ")}`);
  }

  const outputDir = path.resolve(opts.out ?? process.cwd());
  const summary = await writeExports({ artifactPath, connections, outputDir, log: runtime.log });

  console.log(`Wrote ${summary.connections_count} connection(s) to ${outputDir}:`);
  for (const name of [summary.updated_file, summary.files.netlist, summary.files.script, summary.files.guide]) {
    console.log(`  ${name}`);
  }
  return summary;
}

export async function readConnectionsFile(filePath: string): Promise<Connection[]> {
  const resolved = path.resolve(filePath);
  let raw: unknown;
  try {
    raw = await fse.readJson(resolved);
  } catch (err) {
    throw createConnectionsFileError(`Failed to read connections from ${resolved}.`, err);
  }

  const parsed = ConnectionsFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = formatSchemaIssues(parsed.error.issues).join("\n");
    throw createConnectionsFileError(`Invalid connections in ${resolved}:\n${issues}`, parsed.error);
  }
  return parsed.data;
}

function createConnectionsFileError(message: string, cause: unknown): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.input,
    title: "Connections file invalid.",
    message,
    hint: 'Provide a JSON array of { "from_component", "from_pin", "to_component", "to_pin" } objects.',
    cause,
  });
}
