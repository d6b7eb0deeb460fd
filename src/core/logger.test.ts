import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { JsonlLogger, MemoryLogger, logEvent } from "./logger.js";

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
});

describe("JsonlLogger", () => {
  it("appends one JSON object per event, creating the directory", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "wirebridge-log-"));
    tempDirs.push(dir);
    const filePath = path.join(dir, "logs", "events.jsonl");
    const logger = new JsonlLogger(filePath, { service: "test" });

    logEvent(logger, "export.complete", { connections: 2 });
    logEvent(logger, "server.stop");

    const lines = fs.readFileSync(filePath, "utf8").trimEnd().split("\n");
    expect(lines).toHaveLength(2);

    const first: unknown = JSON.parse(lines[0] ?? "");
    expect(first).toMatchObject({
      type: "export.complete",
      service: "test",
      payload: { connections: 2 },
    });
    expect(JSON.parse(lines[1] ?? "")).not.toHaveProperty("payload");
  });
});

describe("MemoryLogger", () => {
  it("records events in order", () => {
    const logger = new MemoryLogger();

    logEvent(logger, "a");
    logEvent(logger, "b", { n: 1 });

    expect(logger.types()).toEqual(["a", "b"]);
    expect(logger.events[1]).toEqual({ type: "b", payload: { n: 1 } });
  });
});
