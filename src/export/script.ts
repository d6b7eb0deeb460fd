import { displayTimestamp } from "../core/utils.js";
import type { Connection } from "../model/schema.js";

import { renderExportTemplate } from "./templates.js";

export type ScriptConnectionView = {
  number: number;
  fromComponent: string;
  fromPin: string;
  toComponent: string;
  toPin: string;
};

// Every component named by either end of a connection, sorted, once each.
export function listReferencedComponents(connections: readonly Connection[]): string[] {
  const names = new Set<string>();
  for (const connection of connections) {
    names.add(connection.from_component);
    names.add(connection.to_component);
  }
  return Array.from(names).sort();
}

export function toScriptConnectionViews(connections: readonly Connection[]): ScriptConnectionView[] {
  return connections.map((connection, index) => ({
    number: index + 1,
    fromComponent: connection.from_component,
    fromPin: connection.from_pin,
    toComponent: connection.to_component,
    toPin: connection.to_pin,
  }));
}

export function renderScript(connections: readonly Connection[], now: Date): Promise<string> {
  return renderExportTemplate("script", {
    generatedAt: displayTimestamp(now),
    components: listReferencedComponents(connections),
    connections: toScriptConnectionViews(connections),
  });
}
