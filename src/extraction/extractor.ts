/*
 * Structured-content extractor.
 * Tries each strategy in order and returns the first accepted component list, or [] when none is.
 * Strategy failures (unreadable archive, undecodable member, malformed markup) are logged, never thrown.
 */

import fse from "fs-extra";

import { formatErrorMessage } from "../core/error-format.js";
import { NOOP_LOGGER, logEvent, type EventLogger } from "../core/logger.js";
import type { ArtifactClassification, Component } from "../model/schema.js";
import { openArchive, type ArchiveMember } from "../artifact/archive.js";
import { decodeText } from "../artifact/decode.js";

import { parseMarkup } from "./markup.js";
import { PLACEHOLDER_COMPONENT_NAME } from "./normalize.js";
import { walkMarkupTree } from "./tree-walk.js";

// =============================================================================
// TYPES
// =============================================================================

export type ExtractionStrategy = "archive-member" | "direct-markup";

export type ExtractionOutcome = {
  components: Component[];
  strategy: ExtractionStrategy | null;
  // Archive member the components came from, when strategy is "archive-member".
  member?: string;
};

type StrategyResult = { ok: true; components: Component[]; member?: string } | { ok: false; reason: string };

export const STRUCTURED_MEMBER_EXTENSIONS = [".pdsprj", ".xml", ".dsn", ".pwi"];

// =============================================================================
// PUBLIC API
// =============================================================================

export async function extractComponents(
  filePath: string,
  classification: ArtifactClassification,
  log: EventLogger = NOOP_LOGGER,
): Promise<ExtractionOutcome> {
  if (classification.is_archive) {
    const archive = await runStrategy("archive-member", log, () => scanArchiveMembers(filePath, log));
    if (archive.ok) {
      return { components: archive.components, strategy: "archive-member", member: archive.member };
    }
  }

  const direct = await runStrategy("direct-markup", log, () => parseWholeFile(filePath));
  if (direct.ok) {
    return { components: direct.components, strategy: "direct-markup" };
  }

  return { components: [], strategy: null };
}

export function isStructuredMember(name: string): boolean {
  const lower = name.toLowerCase();
  return STRUCTURED_MEMBER_EXTENSIONS.some((extension) => lower.endsWith(extension));
}

// A walk that only produced placeholder names matched decorative markup, not device data.
export function hasRecognizableComponent(components: Component[]): boolean {
  return components.some((component) => component.name !== PLACEHOLDER_COMPONENT_NAME);
}

// =============================================================================
// STRATEGIES
// =============================================================================

async function runStrategy(
  strategy: ExtractionStrategy,
  log: EventLogger,
  run: () => Promise<StrategyResult>,
): Promise<StrategyResult> {
  let result: StrategyResult;
  try {
    result = await run();
  } catch (err) {
    result = { ok: false, reason: formatErrorMessage(err) };
  }

  if (result.ok) {
    logEvent(log, "extraction.strategy.success", {
      strategy,
      components: result.components.length,
      ...(result.member ? { member: result.member } : {}),
    });
  } else {
    logEvent(log, "extraction.strategy.fail", { strategy, reason: result.reason });
  }
  return result;
}

async function scanArchiveMembers(filePath: string, log: EventLogger): Promise<StrategyResult> {
  const archive = await openArchive(await fse.readFile(filePath));
  if (!archive.ok) {
    return { ok: false, reason: `Archive unreadable: ${archive.message}` };
  }

  const candidates = archive.members.filter((member) => isStructuredMember(member.name));
  for (const member of candidates) {
    const attempt = await extractFromMember(member);
    if (attempt.ok) {
      return attempt;
    }
    logEvent(log, "extraction.member.skip", { member: member.name, reason: attempt.reason });
  }

  return {
    ok: false,
    reason:
      candidates.length === 0
        ? "No structured-data members in archive"
        : `No member of ${candidates.length} candidate(s) yielded components`,
  };
}

async function extractFromMember(member: ArchiveMember): Promise<StrategyResult> {
  const walked = walkDecodedBytes(await member.read());
  if (!walked.ok) {
    return walked;
  }
  if (!hasRecognizableComponent(walked.components)) {
    return { ok: false, reason: "No recognizable components" };
  }
  return { ok: true, components: walked.components, member: member.name };
}

async function parseWholeFile(filePath: string): Promise<StrategyResult> {
  const walked = walkDecodedBytes(await fse.readFile(filePath));
  if (!walked.ok) {
    return walked;
  }
  if (walked.components.length === 0) {
    return { ok: false, reason: "No components found" };
  }
  return walked;
}

function walkDecodedBytes(bytes: Uint8Array): StrategyResult {
  const decoded = decodeText(bytes, { mode: "lossy" });
  if (!decoded.ok) {
    return { ok: false, reason: decoded.message };
  }
  if (!decoded.text.includes("<") || !decoded.text.includes(">")) {
    return { ok: false, reason: "No markup found" };
  }

  const parsed = parseMarkup(decoded.text);
  if (!parsed.ok) {
    return { ok: false, reason: `Markup invalid: ${parsed.message}` };
  }
  return { ok: true, components: walkMarkupTree(parsed.root) };
}
