import { describe, expect, it } from "vitest";

import type { Connection } from "../model/schema.js";

import { listReferencedComponents, renderScript } from "./script.js";

const NOW = new Date(2024, 0, 2, 3, 4, 5);

const CONNECTIONS: Connection[] = [
  { from_component: "IC1", from_pin: "D13", to_component: "R1", to_pin: "1" },
  { from_component: "R1", from_pin: "2", to_component: "D1", to_pin: "A" },
];

describe("listReferencedComponents", () => {
  it("lists each component once, sorted", () => {
    expect(listReferencedComponents(CONNECTIONS)).toEqual(["D1", "IC1", "R1"]);
  });
});

describe("renderScript", () => {
  it("starts with the header and selection reset", async () => {
    const lines = (await renderScript(CONNECTIONS, NOW)).split("\n");

    expect(lines.slice(0, 3)).toEqual([
      "-- Proteus ISIS Script",
      "-- Generated by wirebridge",
      "-- Date: 2024-01-02 03:04:05",
    ]);
    expect(lines).toContain('COMMAND "SELECT_NONE"');
    expect(lines).toContain('MESSAGE "Starting automated wiring script..."');
  });

  it("renders the verification list and one guarded block per connection", async () => {
    const lines = (await renderScript(CONNECTIONS, NOW)).split("\n");
    const start = lines.indexOf("-- COMPONENT AND PIN VERIFICATION");

    expect(lines.slice(start)).toEqual([
      "-- COMPONENT AND PIN VERIFICATION",
      "-- Please verify the following components and pins exist in your project:",
      "-- Component: D1",
      "-- Component: IC1",
      "-- Component: R1",
      "",
      "-- WIRING CONNECTIONS",
      "",
      "-- Connection 1: IC1.D13 -> R1.1",
      "-- Try to select start and end pins",
      'ASSIGN PIN "IC1" "D13"',
      "IF ERRORLEVEL == 0 THEN",
      '  ASSIGN PIN "R1" "1"',
      "  IF ERRORLEVEL == 0 THEN",
      "    -- Both pins found, create wire",
      '    WIRE "IC1" "D13" "R1" "1"',
      '    MESSAGE "Wired IC1.D13 to R1.1"',
      "  ELSE",
      '    MESSAGE "ERROR: Pin 1 on component R1 not found!"',
      "  ENDIF",
      "ELSE",
      '  MESSAGE "ERROR: Pin D13 on component IC1 not found!"',
      "ENDIF",
      "",
      "-- Connection 2: R1.2 -> D1.A",
      "-- Try to select start and end pins",
      'ASSIGN PIN "R1" "2"',
      "IF ERRORLEVEL == 0 THEN",
      '  ASSIGN PIN "D1" "A"',
      "  IF ERRORLEVEL == 0 THEN",
      "    -- Both pins found, create wire",
      '    WIRE "R1" "2" "D1" "A"',
      '    MESSAGE "Wired R1.2 to D1.A"',
      "  ELSE",
      '    MESSAGE "ERROR: Pin A on component D1 not found!"',
      "  ENDIF",
      "ELSE",
      '  MESSAGE "ERROR: Pin 2 on component R1 not found!"',
      "ENDIF",
      "",
      "-- Script finished",
      'MESSAGE "Automated wiring script complete. Check for any error messages."',
      "",
      "-- End of script",
      "",
    ]);
  });
});
