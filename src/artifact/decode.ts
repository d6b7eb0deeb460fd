// Fallible byte-to-text decoding. Callers pick strict or lossy mode and get a result,
// never an exception.

export type DecodeMode = "strict" | "lossy";

export type DecodeOptions = {
  mode?: DecodeMode;
  // The bytes are a prefix cut at an arbitrary offset; a split trailing sequence is not an error.
  partial?: boolean;
};

export type DecodeResult =
  | { ok: true; text: string; droppedSequences: number }
  | { ok: false; reason: "invalid-utf8" | "decoder-failure"; message: string };

const REPLACEMENT_CHAR = "\uFFFD";
// U+FFFD as it appears in valid input.
const ENCODED_REPLACEMENT = [0xef, 0xbf, 0xbd] as const;

export function decodeText(bytes: Uint8Array, options: DecodeOptions = {}): DecodeResult {
  const mode = options.mode ?? "strict";
  const stream = options.partial ?? false;

  if (mode === "strict") {
    try {
      const text = new TextDecoder("utf-8", { fatal: true }).decode(bytes, { stream });
      return { ok: true, text, droppedSequences: 0 };
    } catch (err) {
      return {
        ok: false,
        reason: "invalid-utf8",
        message: err instanceof Error ? err.message : String(err),
      };
    }
  }

  try {
    return { ok: true, ...decodeDroppingInvalid(bytes, stream) };
  } catch (err) {
    return {
      ok: false,
      reason: "decoder-failure",
      message: err instanceof Error ? err.message : String(err),
    };
  }
}

// Strict first, lossy second; reports which one produced the text.
export function decodeBestEffort(
  bytes: Uint8Array,
  options: Omit<DecodeOptions, "mode"> = {},
): { result: DecodeResult; mode: DecodeMode } {
  const strict = decodeText(bytes, { ...options, mode: "strict" });
  if (strict.ok) {
    return { result: strict, mode: "strict" };
  }
  return { result: decodeText(bytes, { ...options, mode: "lossy" }), mode: "lossy" };
}

// =============================================================================
// INTERNALS
// =============================================================================

// Encoded U+FFFD always decodes to itself, so splitting on it leaves every decoder-inserted
// replacement inside a segment, where it can be told apart from the ones the input carried.
function decodeDroppingInvalid(
  bytes: Uint8Array,
  stream: boolean,
): { text: string; droppedSequences: number } {
  const segments = splitOnEncodedReplacement(bytes);
  const leading = new TextDecoder("utf-8");
  const following = new TextDecoder("utf-8", { ignoreBOM: true });

  let droppedSequences = 0;
  const texts = segments.map((segment, index) => {
    const decoder = index === 0 ? leading : following;
    const last = index === segments.length - 1;
    const parts = decoder.decode(segment, { stream: stream && last }).split(REPLACEMENT_CHAR);
    droppedSequences += parts.length - 1;
    return parts.join("");
  });

  return { text: texts.join(REPLACEMENT_CHAR), droppedSequences };
}

function splitOnEncodedReplacement(bytes: Uint8Array): Uint8Array[] {
  const [b0, b1, b2] = ENCODED_REPLACEMENT;
  const segments: Uint8Array[] = [];
  let start = 0;
  let index = 0;

  while (index + 2 < bytes.length) {
    if (bytes[index] === b0 && bytes[index + 1] === b1 && bytes[index + 2] === b2) {
      segments.push(bytes.subarray(start, index));
      index += 3;
      start = index;
    } else {
      index += 1;
    }
  }

  segments.push(bytes.subarray(start));
  return segments;
}
