import { displayTimestamp } from "../core/utils.js";
import { pinReference, type Connection, type Net } from "../model/schema.js";

import { renderExportTemplate } from "./templates.js";

// NET_001, NET_002, ... numbered by the connection's 1-based position.
export function defaultNetName(index: number): string {
  return `NET_${String(index + 1).padStart(3, "0")}`;
}

/**
 * Groups connection endpoints by net name.
 * Nets keep first-seen order; members are de-duplicated and sorted.
 */
export function groupNets(connections: readonly Connection[]): Net[] {
  const nets = new Map<string, Set<string>>();

  connections.forEach((connection, index) => {
    const name = connection.net_name || defaultNetName(index);
    const members = nets.get(name) ?? new Set<string>();
    members.add(pinReference(connection.from_component, connection.from_pin));
    members.add(pinReference(connection.to_component, connection.to_pin));
    nets.set(name, members);
  });

  return Array.from(nets, ([name, members]) => ({ name, members: Array.from(members).sort() }));
}

export function renderNetlist(connections: readonly Connection[], now: Date): Promise<string> {
  return renderExportTemplate("netlist", {
    generatedAt: displayTimestamp(now),
    connectionCount: connections.length,
    nets: groupNets(connections),
  });
}
