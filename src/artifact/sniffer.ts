/*
 * Artifact sniffer: classifies an uploaded project file without assuming a schema.
 * Archive detection first, then legacy signature and text probes on a bounded prefix.
 * classifyArtifact never rejects; failures degrade fields to "Unknown" and land in content_preview.
 */

import fse from "fs-extra";

import { formatErrorMessage } from "../core/error-format.js";
import { NOOP_LOGGER, logEvent, type EventLogger } from "../core/logger.js";
import { truncateText } from "../core/utils.js";
import type { ArtifactClassification } from "../model/schema.js";

import { openArchive } from "./archive.js";
import { decodeBestEffort } from "./decode.js";

// =============================================================================
// CONSTANTS
// =============================================================================

export const SIGNATURE_BYTES = 16;
export const PROBE_BYTES = 1000;
export const PREVIEW_CHARS = 200;
export const PREVIEW_MEMBER_COUNT = 5;

export const UNKNOWN = "Unknown";

const FORMAT_ARCHIVE = "ZIP Archive (Proteus 8+)";
const FORMAT_LEGACY_BINARY = "Proteus Binary (Legacy)";
const FORMAT_LEGACY_XML = "Proteus XML (Legacy)";
const FORMAT_XML = "Proteus XML";
const FORMAT_UNRECOGNIZED = "Unknown Proteus Format";

const LEGACY_BINARY_MARKERS = ["ISIS", "ARES"];
const XML_DECLARATION = "<?xml";

// =============================================================================
// PUBLIC API
// =============================================================================

export async function classifyArtifact(
  filePath: string,
  log: EventLogger = NOOP_LOGGER,
): Promise<ArtifactClassification> {
  const info = createEmptyClassification();

  try {
    const stat = await fse.stat(filePath);
    info.size = stat.size;

    const bytes = await fse.readFile(filePath);
    info.file_signature = formatSignature(bytes.subarray(0, SIGNATURE_BYTES));

    const archive = await openArchive(bytes);
    if (archive.ok) {
      applyArchiveGuess(info, archive.members.map((member) => member.name));
    } else {
      applyLegacyGuess(info, bytes.subarray(0, PROBE_BYTES));
    }
  } catch (err) {
    info.content_preview = `Error analyzing file: ${formatErrorMessage(err)}`;
  }

  logEvent(log, "artifact.classified", {
    size: info.size,
    container: info.container,
    format: info.format,
    version: info.version,
  });
  return info;
}

export function formatSignature(bytes: Uint8Array): string {
  return Array.from(bytes, (byte) => byte.toString(16).toUpperCase().padStart(2, "0")).join(" ");
}

// =============================================================================
// INTERNALS
// =============================================================================

function createEmptyClassification(): ArtifactClassification {
  return {
    size: 0,
    file_signature: "",
    container: "unknown",
    is_archive: false,
    is_structured_text: false,
    encoding: UNKNOWN,
    content_preview: "",
    format: UNKNOWN,
    version: UNKNOWN,
  };
}

function applyArchiveGuess(info: ArtifactClassification, memberNames: string[]): void {
  info.is_archive = true;
  info.container = "archive";
  info.format = FORMAT_ARCHIVE;
  info.content_preview = `ZIP contains: ${memberNames.slice(0, PREVIEW_MEMBER_COUNT).join(", ")}`;

  if (memberNames.includes("PROJECT.XML")) {
    info.version = "Proteus 8.x";
  } else if (memberNames.some((name) => name.includes(".dsn"))) {
    info.version = "Proteus 7.x/8.x";
  }
}

function applyLegacyGuess(info: ArtifactClassification, prefix: Uint8Array): void {
  const latin = Buffer.from(prefix).toString("latin1");

  if (LEGACY_BINARY_MARKERS.some((marker) => latin.includes(marker))) {
    info.container = "legacy-binary";
    info.format = FORMAT_LEGACY_BINARY;
    info.version = "Proteus 6.x/7.x";
  } else if (latin.includes(XML_DECLARATION)) {
    info.container = "legacy-text";
    info.format = FORMAT_LEGACY_XML;
    info.version = "Proteus 7.x";
  } else {
    info.format = FORMAT_UNRECOGNIZED;
  }

  const { result, mode } = decodeBestEffort(prefix, { partial: true });
  if (!result.ok) {
    info.content_preview = `Binary data (${prefix.length} bytes)`;
    return;
  }

  info.encoding = mode === "strict" ? "UTF-8" : "UTF-8 (lossy)";
  const preview = truncateText(result.text, PREVIEW_CHARS);
  info.content_preview = preview.truncated ? `${preview.text}...` : preview.text;

  if (result.text.includes("<") && result.text.includes(">")) {
    info.is_structured_text = true;
    if (LEGACY_BINARY_MARKERS.some((marker) => result.text.includes(marker))) {
      info.container = "legacy-text";
      info.format = FORMAT_XML;
    }
  }
}
