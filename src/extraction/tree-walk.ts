/*
 * Markup-tree walk: turns every component-like or power-rail node of a parsed document into a Component.
 * Classification is an ordered table of (predicate, handler) rules; the first matching rule handles a node.
 * One running counter numbers synthesized ids and default coordinates across both rule kinds.
 */

import { createPin, type Component, type Pin } from "../model/schema.js";

import { findDescendants, firstAttribute, iterateNodes, type MarkupNode } from "./markup.js";
import {
  cleanComponentName,
  cleanPinName,
  inferPins,
  isPowerRailName,
  powerRailValue,
} from "./normalize.js";

// =============================================================================
// VOCABULARY
// =============================================================================

export const COMPONENT_TAG_KEYWORDS = [
  "component",
  "part",
  "device",
  "symbol",
  "instance",
  "compinst",
  "element",
] as const;

export const NET_TAG_KEYWORDS = ["power", "rail", "net", "wire"] as const;

const REFERENCE_ATTRIBUTES = ["refdes", "name", "id", "ref", "designator"];
const TYPE_ATTRIBUTES = ["device", "type", "library", "part"];
const VALUE_ATTRIBUTES = ["value", "val", "model", "package"];
const PIN_TAGS = ["PIN", "CONNECT"];
const PIN_NAME_ATTRIBUTES = ["NAME", "PINNAME", "PINNUM", "number", "id"];
const PIN_NET_ATTRIBUTE = "NET";
const NET_NAME_ATTRIBUTES = ["name", "id"];

const DEFAULT_TYPE = "Unknown";
const UNKNOWN_REFERENCE = "Unknown";
const POWER_RAIL_TYPE = "Power Rail";
const POWER_RAIL_PIN = "OUT";
const COORDINATE_STEP = 100;
const POWER_RAIL_Y = "50";

// =============================================================================
// RULE TABLE
// =============================================================================

export type WalkState = {
  // Next number handed to a produced component; starts at 1.
  counter: number;
};

export type NodeRule = {
  kind: "component" | "power-rail";
  matches: (tag: string) => boolean;
  handle: (node: MarkupNode, state: WalkState) => Component | null;
};

export function tagContainsAny(tag: string, keywords: readonly string[]): boolean {
  const lower = tag.toLowerCase();
  return keywords.some((keyword) => lower.includes(keyword));
}

export const NODE_RULES: readonly NodeRule[] = [
  {
    kind: "component",
    matches: (tag) => tagContainsAny(tag, COMPONENT_TAG_KEYWORDS),
    handle: buildComponent,
  },
  {
    kind: "power-rail",
    matches: (tag) => tagContainsAny(tag, NET_TAG_KEYWORDS),
    handle: buildPowerRail,
  },
];

export function classifyTag(tag: string): NodeRule | undefined {
  return NODE_RULES.find((rule) => rule.matches(tag));
}

// =============================================================================
// WALK
// =============================================================================

export function walkMarkupTree(root: MarkupNode): Component[] {
  const state: WalkState = { counter: 1 };
  const components: Component[] = [];

  for (const node of iterateNodes(root)) {
    const component = classifyTag(node.tag)?.handle(node, state);
    if (component) {
      components.push(component);
      state.counter += 1;
    }
  }

  return components;
}

// =============================================================================
// HANDLERS
// =============================================================================

export function buildComponent(node: MarkupNode, state: WalkState): Component {
  const n = state.counter;
  const reference = firstAttribute(node, REFERENCE_ATTRIBUTES);
  const rawType = firstAttribute(node, TYPE_ATTRIBUTES) ?? DEFAULT_TYPE;
  const rawValue = firstAttribute(node, VALUE_ATTRIBUTES) ?? "";

  const pins = discoverPins(node);
  const hasReference = reference !== undefined && reference !== UNKNOWN_REFERENCE;

  return {
    id: hasReference ? reference : `U${n}`,
    name: hasReference ? cleanComponentName(reference) : `Component_${n}`,
    type: cleanComponentName(rawType),
    value: rawValue ? cleanComponentName(rawValue) : "",
    pins: pins.length > 0 ? pins : inferPins(rawType, reference),
    x: node.attributes.x ?? String(n * COORDINATE_STEP),
    y: node.attributes.y ?? String(n * COORDINATE_STEP),
  };
}

export function buildPowerRail(node: MarkupNode, state: WalkState): Component | null {
  const candidate = firstAttribute(node, NET_NAME_ATTRIBUTES) ?? node.text;
  if (!candidate || !isPowerRailName(candidate)) {
    return null;
  }

  const n = state.counter;
  return {
    id: `PWR${n}`,
    name: cleanComponentName(candidate),
    type: POWER_RAIL_TYPE,
    value: powerRailValue(candidate),
    pins: [createPin(POWER_RAIL_PIN)],
    x: String(n * COORDINATE_STEP),
    y: POWER_RAIL_Y,
  };
}

function discoverPins(node: MarkupNode): Pin[] {
  const pins: Pin[] = [];
  for (const tag of PIN_TAGS) {
    for (const pinNode of findDescendants(node, tag)) {
      const name = firstAttribute(pinNode, PIN_NAME_ATTRIBUTES) ?? `Pin${pins.length + 1}`;
      pins.push(createPin(cleanPinName(name), pinNode.attributes[PIN_NET_ATTRIBUTE] ?? ""));
    }
  }
  return pins;
}
