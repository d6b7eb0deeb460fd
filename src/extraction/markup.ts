import { XMLParser, XMLValidator } from "fast-xml-parser";

// =============================================================================
// TYPES
// =============================================================================

export type MarkupNode = {
  tag: string;
  attributes: Record<string, string>;
  // Text that precedes the first child element, if any.
  text: string;
  children: MarkupNode[];
};

export type MarkupParseResult =
  | { ok: true; root: MarkupNode }
  | { ok: false; message: string; line?: number };

// =============================================================================
// PUBLIC API
// =============================================================================

const ATTRIBUTE_PREFIX = "@_";
const ATTRIBUTES_KEY = ":@";
const TEXT_KEY = "#text";

/**
 * Parses a well-formed document with exactly one root element.
 * Malformed markup is reported in the result rather than thrown.
 */
export function parseMarkup(text: string): MarkupParseResult {
  const validation = XMLValidator.validate(text);
  if (validation !== true) {
    return { ok: false, message: validation.err.msg, line: validation.err.line };
  }

  let raw: unknown;
  try {
    raw = new XMLParser({
      ignoreAttributes: false,
      attributeNamePrefix: ATTRIBUTE_PREFIX,
      preserveOrder: true,
      parseTagValue: false,
      parseAttributeValue: false,
      // Decimal and hex character references (&#49;, &#x3A9;) in text and attributes.
      htmlEntities: true,
      ignoreDeclaration: true,
      ignorePiTags: true,
    }).parse(text);
  } catch (err) {
    return { ok: false, message: err instanceof Error ? err.message : String(err) };
  }

  const roots = toMarkupNodes(raw);
  if (roots.length !== 1) {
    return { ok: false, message: `Expected one root element, found ${roots.length}` };
  }
  return { ok: true, root: roots[0] };
}

// Pre-order: the node itself, then its descendants in document order.
export function* iterateNodes(root: MarkupNode): Generator<MarkupNode> {
  yield root;
  for (const child of root.children) {
    yield* iterateNodes(child);
  }
}

export function findDescendants(root: MarkupNode, tag: string): MarkupNode[] {
  const matches: MarkupNode[] = [];
  for (const child of root.children) {
    for (const node of iterateNodes(child)) {
      if (node.tag === tag) matches.push(node);
    }
  }
  return matches;
}

export function firstAttribute(node: MarkupNode, names: readonly string[]): string | undefined {
  for (const name of names) {
    const value = node.attributes[name];
    if (value !== undefined && value.length > 0) return value;
  }
  return undefined;
}

// =============================================================================
// INTERNALS
// =============================================================================

function toMarkupNodes(raw: unknown): MarkupNode[] {
  if (!Array.isArray(raw)) return [];

  const nodes: MarkupNode[] = [];
  for (const entry of raw) {
    const node = toMarkupNode(entry);
    if (node) nodes.push(node);
  }
  return nodes;
}

function toMarkupNode(entry: unknown): MarkupNode | null {
  if (!isRecord(entry)) return null;

  const tag = Object.keys(entry).find((key) => key !== ATTRIBUTES_KEY && key !== TEXT_KEY);
  if (!tag) return null;

  const content = entry[tag];
  const items = Array.isArray(content) ? content : [];

  return {
    tag,
    attributes: readAttributes(entry[ATTRIBUTES_KEY]),
    text: readLeadingText(items),
    children: toMarkupNodes(items),
  };
}

function readAttributes(raw: unknown): Record<string, string> {
  const attributes: Record<string, string> = {};
  if (!isRecord(raw)) return attributes;

  for (const [key, value] of Object.entries(raw)) {
    if (!key.startsWith(ATTRIBUTE_PREFIX)) continue;
    attributes[key.slice(ATTRIBUTE_PREFIX.length)] = String(value);
  }
  return attributes;
}

function readLeadingText(items: unknown[]): string {
  const first = items[0];
  if (isRecord(first) && TEXT_KEY in first) {
    return String(first[TEXT_KEY]);
  }
  return "";
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
