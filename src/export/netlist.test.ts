import { describe, expect, it } from "vitest";

import type { Connection } from "../model/schema.js";

import { defaultNetName, groupNets, renderNetlist } from "./netlist.js";

const NOW = new Date(2024, 0, 2, 3, 4, 5);

describe("groupNets", () => {
  it("merges connections by net name in first-seen order with sorted members", () => {
    const connections: Connection[] = [
      { from_component: "B", from_pin: "2", to_component: "A", to_pin: "1", net_name: "SIG" },
      { from_component: "C", from_pin: "1", to_component: "A", to_pin: "1", net_name: "SIG" },
      { from_component: "B", from_pin: "1", to_component: "C", to_pin: "2" },
      { from_component: "D", from_pin: "1", to_component: "D", to_pin: "2", net_name: "" },
    ];

    expect(groupNets(connections)).toEqual([
      { name: "SIG", members: ["A.1", "B.2", "C.1"] },
      { name: "NET_003", members: ["B.1", "C.2"] },
      { name: "NET_004", members: ["D.1", "D.2"] },
    ]);
  });

  it("numbers default net names from one", () => {
    expect(defaultNetName(0)).toBe("NET_001");
    expect(defaultNetName(41)).toBe("NET_042");
  });
});

describe("renderNetlist", () => {
  it("renders the header and one block per net", async () => {
    const output = await renderNetlist(
      [
        { from_component: "IC1", from_pin: "D13", to_component: "R1", to_pin: "1", net_name: "SIG" },
        { from_component: "PWR2", from_pin: "OUT", to_component: "D1", to_pin: "K", net_name: null },
      ],
      NOW,
    );

    expect(output).toBe(
      [
        "# Proteus Netlist File",
        "# Generated by wirebridge",
        "# Date: 2024-01-02 03:04:05",
        "#",
        "# This file describes the connections (nets) between component pins.",
        "# It can be used for cross-probing or importing into other EDA tools.",
        "#",
        "# Total connections: 2",
        "",
        '(NET "SIG"',
        '  (PIN "IC1.D13")',
        '  (PIN "R1.1")',
        ")",
        "",
        '(NET "NET_002"',
        '  (PIN "D1.K")',
        '  (PIN "PWR2.OUT")',
        ")",
        "",
        "",
      ].join("\n"),
    );
  });

  it("renders only the header for an empty connection list", async () => {
    const output = await renderNetlist([], NOW);

    expect(output.endsWith("# Total connections: 0\n\n")).toBe(true);
  });
});
