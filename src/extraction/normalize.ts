// Heuristic normalizer: name cleaning and naming-convention inference.
// Pure functions; used by the markup walk and exposed for callers that build components by hand.

import { createPin, type Pin } from "../model/schema.js";

// =============================================================================
// NAME CLEANING
// =============================================================================

export const PLACEHOLDER_COMPONENT_NAME = "Component";
export const PLACEHOLDER_PIN_NAME = "Pin";

const COMPONENT_NAME_LIMIT = 50;
const PIN_NAME_LIMIT = 25;
const MIN_NAME_LENGTH = 2;
const MIN_ALNUM_COUNT = 2;

// Control, format, surrogate, private-use and unassigned code points, line/paragraph
// separators, and every space separator except the plain space.
const NON_PRINTABLE = /[\p{C}\p{Zl}\p{Zp}]|(?! )\p{Zs}/gu;
const ALNUM = /[\p{L}\p{N}]/u;

export function stripNonPrintable(value: string): string {
  return value.replace(NON_PRINTABLE, "");
}

export function cleanComponentName(raw: string | null | undefined): string {
  const cleaned = limitChars(stripNonPrintable(raw ?? "").trim(), COMPONENT_NAME_LIMIT).trimEnd();
  const chars = Array.from(cleaned);

  if (chars.length < MIN_NAME_LENGTH || chars.filter((char) => ALNUM.test(char)).length < MIN_ALNUM_COUNT) {
    return PLACEHOLDER_COMPONENT_NAME;
  }
  return cleaned;
}

export function cleanPinName(raw: string | null | undefined): string {
  const cleaned = limitChars(stripNonPrintable(raw ?? "").trim(), PIN_NAME_LIMIT).trimEnd();
  return cleaned.length > 0 ? cleaned : PLACEHOLDER_PIN_NAME;
}

function limitChars(value: string, limit: number): string {
  const chars = Array.from(value);
  return chars.length > limit ? chars.slice(0, limit).join("") : value;
}

// =============================================================================
// TYPE-TO-PIN-SET INFERENCE
// =============================================================================

const MICROCONTROLLER_PINS = ["VIN", "GND", "5V", "3V3", "D0", "D1", "D2", "D13", "A0", "A1"];

type PinSetRule = {
  prefixes: string[];
  pins: string[];
  typeHint?: string;
};

// First match wins; order matters ("SW" before "S", the typed IC rule before the generic one).
const PIN_SET_RULES: PinSetRule[] = [
  { prefixes: ["IC", "U"], typeHint: "arduino", pins: MICROCONTROLLER_PINS },
  { prefixes: ["IC", "U"], pins: ["VCC", "GND", "1", "2"] },
  { prefixes: ["R"], pins: ["1", "2"] },
  { prefixes: ["D", "LED"], pins: ["A", "K"] },
  { prefixes: ["C"], pins: ["+", "-"] },
  { prefixes: ["SW", "S"], pins: ["1", "2", "3", "4"] },
];

const DEFAULT_PIN_SET = ["1", "2"];

export function inferPinNames(type: string | null | undefined, reference: string | null | undefined): string[] {
  const typeLower = (type ?? "").toLowerCase();
  const referenceUpper = (reference ?? "").toUpperCase();

  const rule = PIN_SET_RULES.find(
    (candidate) =>
      candidate.prefixes.some((prefix) => referenceUpper.startsWith(prefix)) &&
      (candidate.typeHint === undefined || typeLower.includes(candidate.typeHint)),
  );

  return [...(rule?.pins ?? DEFAULT_PIN_SET)];
}

export function inferPins(type: string | null | undefined, reference: string | null | undefined): Pin[] {
  return inferPinNames(type, reference).map((name) => createPin(name));
}

// =============================================================================
// POWER RAILS
// =============================================================================

export const POWER_RAIL_KEYWORDS = ["VCC", "5V", "GND", "GROUND", "VDD", "VSS", "3V3", "12V"];

const VOLTAGE_RULES: Array<{ keywords: string[]; value: string }> = [
  { keywords: ["5V", "VCC"], value: "5V" },
  { keywords: ["3V3", "3.3V"], value: "3.3V" },
  { keywords: ["12V"], value: "12V" },
  { keywords: ["GND", "GROUND", "VSS"], value: "0V (Ground)" },
];

export function isPowerRailName(name: string): boolean {
  const upper = name.toUpperCase();
  return POWER_RAIL_KEYWORDS.some((keyword) => upper.includes(keyword));
}

export function powerRailValue(name: string): string {
  const upper = name.toUpperCase();
  const rule = VOLTAGE_RULES.find((candidate) =>
    candidate.keywords.some((keyword) => upper.includes(keyword)),
  );
  return rule?.value ?? "Power";
}
