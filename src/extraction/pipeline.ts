import { NOOP_LOGGER, logEvent, type EventLogger } from "../core/logger.js";
import type { ArtifactClassification, Component } from "../model/schema.js";
import { classifyArtifact } from "../artifact/sniffer.js";

import { extractComponents, type ExtractionStrategy } from "./extractor.js";
import { createFallbackComponents } from "./fallback.js";

export type ComponentSource = ExtractionStrategy | "fallback";

export type LoadedArtifact = {
  classification: ArtifactClassification;
  components: Component[];
  source: ComponentSource;
};

/**
 * Classify, extract, and fall back to the fixed set when extraction yields nothing.
 * The returned component list is never empty.
 */
export async function loadArtifact(
  filePath: string,
  log: EventLogger = NOOP_LOGGER,
): Promise<LoadedArtifact> {
  const classification = await classifyArtifact(filePath, log);
  const outcome = await extractComponents(filePath, classification, log);

  if (outcome.strategy && outcome.components.length > 0) {
    return { classification, components: outcome.components, source: outcome.strategy };
  }

  logEvent(log, "extraction.fallback", { format: classification.format });
  return { classification, components: createFallbackComponents(), source: "fallback" };
}
