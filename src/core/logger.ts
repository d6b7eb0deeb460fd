/*
 * Structured JSONL event logging.
 * Each event is one line: { ts, type, ...defaults, payload }.
 * Usage: const log = new JsonlLogger(eventsLogPath(root), { service: "http" }); logEvent(log, "export.complete", { files: 4 }).
 */

import fs from "node:fs";
import path from "node:path";

import { isoNow } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export type LogEvent = {
  type: string;
  payload?: JsonObject;
};

export interface EventLogger {
  log(event: LogEvent): void;
}

// =============================================================================
// LOGGERS
// =============================================================================

export class JsonlLogger implements EventLogger {
  private dirReady = false;

  constructor(
    readonly filePath: string,
    private readonly defaults: JsonObject = {},
  ) {}

  log(event: LogEvent): void {
    if (!this.dirReady) {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      this.dirReady = true;
    }

    const line: JsonObject = { ts: isoNow(), type: event.type, ...this.defaults };
    if (event.payload) {
      line.payload = event.payload;
    }
    fs.appendFileSync(this.filePath, `${JSON.stringify(line)}\n`, "utf8");
  }
}

export class MemoryLogger implements EventLogger {
  readonly events: LogEvent[] = [];

  log(event: LogEvent): void {
    this.events.push(event);
  }

  types(): string[] {
    return this.events.map((event) => event.type);
  }
}

export const NOOP_LOGGER: EventLogger = {
  log: () => undefined,
};

export function logEvent(logger: EventLogger, type: string, payload?: JsonObject): void {
  logger.log(payload ? { type, payload } : { type });
}
