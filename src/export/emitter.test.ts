import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { USER_FACING_ERROR_CODES, UserFacingError } from "../core/errors.js";
import { MemoryLogger } from "../core/logger.js";
import type { Connection } from "../model/schema.js";

import { exportFileNames, writeExports } from "./emitter.js";

// =============================================================================
// TEST SETUP
// =============================================================================

const NOW = new Date(2024, 0, 2, 3, 4, 5);
const ARTIFACT_BYTES = Uint8Array.from([0x50, 0x4b, 0x03, 0x04, 0xff, 0x00, 0x10, 0x80]);
const CONNECTIONS: Connection[] = [
  { from_component: "IC1", from_pin: "D13", to_component: "R1", to_pin: "1", net_name: "LED" },
];

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
});

function makeTempDir(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "wirebridge-export-"));
  tempDirs.push(dir);
  return dir;
}

// =============================================================================
// TESTS
// =============================================================================

describe("writeExports", () => {
  it("writes a byte-identical copy and three text files sharing one timestamp", async () => {
    const dir = makeTempDir();
    const artifactPath = path.join(dir, "board.pdsprj");
    fs.writeFileSync(artifactPath, ARTIFACT_BYTES);
    const outputDir = path.join(dir, "out");
    const log = new MemoryLogger();

    const summary = await writeExports({ artifactPath, connections: CONNECTIONS, outputDir, now: NOW, log });

    expect(summary).toEqual({
      timestamp: "20240102_030405",
      updated_file: "connected_proteus_20240102_030405.pdsprj",
      files: {
        netlist: "netlist_20240102_030405.net",
        script: "connect_script_20240102_030405.scr",
        guide: "wiring_guide_20240102_030405.txt",
      },
      connections_count: 1,
    });

    const copy = fs.readFileSync(path.join(outputDir, summary.updated_file));
    expect(Buffer.compare(copy, Buffer.from(ARTIFACT_BYTES))).toBe(0);
    expect(fs.readFileSync(artifactPath)).toEqual(Buffer.from(ARTIFACT_BYTES));

    const netlist = fs.readFileSync(path.join(outputDir, summary.files.netlist), "utf8");
    expect(netlist.split("\n")).toContain('(NET "LED"');
    const script = fs.readFileSync(path.join(outputDir, summary.files.script), "utf8");
    expect(script.split("\n")).toContain('    WIRE "IC1" "D13" "R1" "1"');
    const guide = fs.readFileSync(path.join(outputDir, summary.files.guide), "utf8");
    expect(guide.split("\n")).toContain("# Total Connections: 1");

    expect(log.types()).toEqual(["export.complete"]);
  });

  it("writes outputs for an empty connection list", async () => {
    const dir = makeTempDir();
    const artifactPath = path.join(dir, "board.pdsprj");
    fs.writeFileSync(artifactPath, ARTIFACT_BYTES);

    const summary = await writeExports({ artifactPath, connections: [], outputDir: dir, now: NOW });

    expect(summary.connections_count).toBe(0);
    expect(fs.existsSync(path.join(dir, summary.files.guide))).toBe(true);
  });

  it("reports a failed copy as a user-facing export error", async () => {
    const dir = makeTempDir();

    const error = await writeExports({
      artifactPath: path.join(dir, "missing.pdsprj"),
      connections: CONNECTIONS,
      outputDir: dir,
      now: NOW,
    }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(UserFacingError);
    if (error instanceof UserFacingError) {
      expect(error.code).toBe(USER_FACING_ERROR_CODES.export);
      expect(error.message).toMatch(/^Failed to create a copy of the project file: /);
    }
    expect(fs.existsSync(path.join(dir, "netlist_20240102_030405.net"))).toBe(false);
  });
});

describe("exportFileNames", () => {
  it("keeps the artifact extension for the copy", () => {
    expect(exportFileNames("20240102_030405", "/tmp/board.PDSPRJ").copy).toBe(
      "connected_proteus_20240102_030405.PDSPRJ",
    );
    expect(exportFileNames("20240102_030405", "/tmp/board").copy).toBe(
      "connected_proteus_20240102_030405.pdsprj",
    );
  });
});
