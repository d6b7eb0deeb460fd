import { displayTimestamp } from "../core/utils.js";
import type { Connection } from "../model/schema.js";

import { renderExportTemplate } from "./templates.js";

const COMPONENT_COLUMN = 15;
const PIN_COLUMN = 10;

export type GuideGroup = {
  component: string;
  lines: string[];
};

export function formatQuickListLine(connection: Connection, index: number): string {
  const number = String(index + 1).padStart(2, "0");
  const from = `${connection.from_component.padEnd(COMPONENT_COLUMN)} Pin ${connection.from_pin.padEnd(PIN_COLUMN)}`;
  const to = `${connection.to_component.padEnd(COMPONENT_COLUMN)} Pin ${connection.to_pin.padEnd(PIN_COLUMN)}`;
  return `${number}. ${from} ───► ${to}`;
}

/**
 * One group per component touched by any connection, sorted by component.
 * Each connection is listed from both of its ends, so a component that only
 * appears as a target still gets its own wiring lines.
 */
export function groupByComponent(connections: readonly Connection[]): GuideGroup[] {
  const groups = new Map<string, string[]>();
  const add = (component: string, pin: string, target: string, targetPin: string): void => {
    const lines = groups.get(component) ?? [];
    lines.push(`  - Pin ${pin.padEnd(PIN_COLUMN)} → connects to ${target}.${targetPin}`);
    groups.set(component, lines);
  };

  for (const connection of connections) {
    add(connection.from_component, connection.from_pin, connection.to_component, connection.to_pin);
    add(connection.to_component, connection.to_pin, connection.from_component, connection.from_pin);
  }

  return Array.from(groups.keys())
    .sort()
    .map((component) => ({ component, lines: groups.get(component) ?? [] }));
}

export function renderGuide(connections: readonly Connection[], now: Date): Promise<string> {
  return renderExportTemplate("guide", {
    generatedAt: displayTimestamp(now),
    connectionCount: connections.length,
    quickList: connections.map(formatQuickListLine),
    groups: groupByComponent(connections),
  });
}
