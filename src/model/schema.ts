// Component/connection model shared by extraction, sessions and export.
// Field names are snake_case because these records go to the editor as JSON unchanged.

import { z } from "zod";

// =============================================================================
// ARTIFACT CLASSIFICATION
// =============================================================================

export type ContainerKind = "archive" | "legacy-binary" | "legacy-text" | "unknown";

export type ArtifactClassification = {
  size: number;
  file_signature: string;
  container: ContainerKind;
  is_archive: boolean;
  is_structured_text: boolean;
  encoding: string;
  content_preview: string;
  format: string;
  version: string;
};

// =============================================================================
// COMPONENTS
// =============================================================================

export type Pin = {
  name: string;
  net: string;
  connected_to: string;
};

export type Component = {
  id: string;
  name: string;
  type: string;
  value: string;
  pins: Pin[];
  x: string;
  y: string;
};

export function createPin(name: string, net = ""): Pin {
  return { name, net, connected_to: "" };
}

// =============================================================================
// CONNECTIONS
// =============================================================================

export const ConnectionSchema = z.object({
  from_component: z.string().min(1),
  from_pin: z.string().min(1),
  to_component: z.string().min(1),
  to_pin: z.string().min(1),
  net_name: z.string().nullish(),
});

export type Connection = z.infer<typeof ConnectionSchema>;

export const ConnectionListSchema = z.array(ConnectionSchema);

export type Net = {
  name: string;
  members: string[];
};

export function pinReference(component: string, pin: string): string {
  return `${component}.${pin}`;
}
