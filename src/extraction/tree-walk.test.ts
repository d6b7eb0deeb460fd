import { describe, expect, it } from "vitest";

import type { Component } from "../model/schema.js";

import { parseMarkup } from "./markup.js";
import { classifyTag, walkMarkupTree } from "./tree-walk.js";

function walk(text: string): Component[] {
  const parsed = parseMarkup(text);
  if (!parsed.ok) throw new Error(parsed.message);
  return walkMarkupTree(parsed.root);
}

describe("classifyTag", () => {
  it("matches component and net vocabularies case-insensitively", () => {
    expect(classifyTag("COMPONENT")?.kind).toBe("component");
    expect(classifyTag("compInst")?.kind).toBe("component");
    expect(classifyTag("sch:PartRef")?.kind).toBe("component");
    expect(classifyTag("PowerRail")?.kind).toBe("power-rail");
    expect(classifyTag("Wire")?.kind).toBe("power-rail");
    expect(classifyTag("SHEET")).toBeUndefined();
    expect(classifyTag("CONNECT")).toBeUndefined();
  });
});

describe("walkMarkupTree", () => {
  it("builds components and power rails with one shared counter", () => {
    const components = walk(
      [
        "<SCHEMATIC>",
        '<COMPONENT refdes="R5" device="RES" value="10k" x="12" y="34"/>',
        '<NET name="GND_NET"/>',
        '<NET name="DATA_BUS"/>',
        "</SCHEMATIC>",
      ].join(""),
    );

    expect(components).toEqual([
      {
        id: "R5",
        name: "R5",
        type: "RES",
        value: "10k",
        pins: [
          { name: "1", net: "", connected_to: "" },
          { name: "2", net: "", connected_to: "" },
        ],
        x: "12",
        y: "34",
      },
      {
        id: "PWR2",
        name: "GND_NET",
        type: "Power Rail",
        value: "0V (Ground)",
        pins: [{ name: "OUT", net: "", connected_to: "" }],
        x: "200",
        y: "50",
      },
    ]);
  });

  it("reads explicit pins, then connect points, with nets and default names", () => {
    const [part] = walk(
      [
        "<DESIGN>",
        '<PART name="U1" type="ATMEGA328">',
        '<PIN NAME="VCC" NET="+5V"/>',
        '<PIN PINNUM="7"/>',
        "<PIN/>",
        '<CONNECT id="XTAL1"/>',
        "</PART>",
        "</DESIGN>",
      ].join(""),
    );

    expect(part?.id).toBe("U1");
    expect(part?.type).toBe("ATMEGA328");
    expect(part?.value).toBe("");
    expect(part?.pins).toEqual([
      { name: "VCC", net: "+5V", connected_to: "" },
      { name: "7", net: "", connected_to: "" },
      { name: "Pin3", net: "", connected_to: "" },
      { name: "XTAL1", net: "", connected_to: "" },
    ]);
    expect([part?.x, part?.y]).toEqual(["100", "100"]);
  });

  it("synthesizes ids and names for components without a reference", () => {
    const components = walk('<ROOT><COMPONENT device="RES"/><DEVICE/></ROOT>');

    expect(components.map((component) => [component.id, component.name, component.type])).toEqual([
      ["U1", "Component_1", "RES"],
      ["U2", "Component_2", "Unknown"],
    ]);
    expect(components[1]?.pins.map((pin) => pin.name)).toEqual(["1", "2"]);
    expect([components[1]?.x, components[1]?.y]).toEqual(["200", "200"]);
  });

  it("treats an Unknown reference as missing", () => {
    const [component] = walk('<ROOT><COMPONENT refdes="Unknown" device="LED"/></ROOT>');

    expect(component?.id).toBe("U1");
    expect(component?.name).toBe("Component_1");
  });

  it("takes a rail name from leading text", () => {
    const [rail] = walk("<ROOT><POWER>VCC</POWER></ROOT>");

    expect(rail?.id).toBe("PWR1");
    expect(rail?.name).toBe("VCC");
    expect(rail?.value).toBe("5V");
  });

  it("decodes character references before classifying names", () => {
    const components = walk('<S><COMPONENT refdes="R&#49;" value="10&#x3A9;"/><NET name="&#71;ND"/></S>');

    expect(components).toEqual([
      {
        id: "R1",
        name: "R1",
        type: "Unknown",
        value: "10\u03A9",
        pins: [
          { name: "1", net: "", connected_to: "" },
          { name: "2", net: "", connected_to: "" },
        ],
        x: "100",
        y: "100",
      },
      {
        id: "PWR2",
        name: "GND",
        type: "Power Rail",
        value: "0V (Ground)",
        pins: [{ name: "OUT", net: "", connected_to: "" }],
        x: "200",
        y: "50",
      },
    ]);
  });

  it("returns nothing for markup without component or rail nodes", () => {
    expect(walk("<ROOT><SHEET/><NET name='DATA'/></ROOT>")).toEqual([]);
  });
});
