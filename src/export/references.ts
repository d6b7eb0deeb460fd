import type { ConnectionReferencePolicy } from "../core/config.js";
import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";
import { NOOP_LOGGER, logEvent, type EventLogger } from "../core/logger.js";
import { pinReference, type Component, type Connection } from "../model/schema.js";

/**
 * Endpoints (`component.pin`) that name a component or pin absent from the list.
 * Each unknown endpoint is reported once, in first-seen order.
 */
export function findUnknownReferences(
  components: readonly Component[],
  connections: readonly Connection[],
): string[] {
  const known = new Set<string>();
  for (const component of components) {
    for (const pin of component.pins) {
      known.add(pinReference(component.id, pin.name));
    }
  }

  const unknown = new Set<string>();
  for (const connection of connections) {
    for (const endpoint of [
      pinReference(connection.from_component, connection.from_pin),
      pinReference(connection.to_component, connection.to_pin),
    ]) {
      if (!known.has(endpoint)) unknown.add(endpoint);
    }
  }
  return Array.from(unknown);
}

export type ReferenceCheckResult = {
  unknown: string[];
};

/**
 * Applies the configured policy to a connection list.
 * Strict mode rejects any unknown endpoint; permissive mode only records them.
 */
export function enforceReferencePolicy(
  policy: ConnectionReferencePolicy,
  components: readonly Component[],
  connections: readonly Connection[],
  log: EventLogger = NOOP_LOGGER,
): ReferenceCheckResult {
  const unknown = findUnknownReferences(components, connections);
  if (unknown.length === 0) {
    return { unknown };
  }

  if (policy === "strict") {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.input,
      title: "Connections reference unknown pins.",
      message: `Unknown connection endpoints: ${unknown.join(", ")}`,
      hint: "Connect only pins listed for the uploaded project, or set connection_references to permissive.",
    });
  }

  logEvent(log, "connections.unknown_references", { policy, endpoints: unknown });
  return { unknown };
}
