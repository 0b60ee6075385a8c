import { Document, isMap, isScalar, parseDocument, visit } from "yaml";
import { FrontmatterParseError } from "./errors.ts";
import type { Frontmatter, Note, YamlValue } from "./types.ts";

const FENCE = "---";
// Keys YAML reads back as integers; mappings store them as strings.
const INTEGER_KEY_RE = /^(?:0|-?[1-9]\d*)$/;

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

interface FencedBlock {
  yaml: string;
  body: string;
}

/**
 * Locate a leading `---` fenced block. The closing fence must sit alone on its
 * line; one blank line after it is the separator written by serializeNote.
 */
function findFence(raw: string): FencedBlock | undefined {
  if (!raw.startsWith(FENCE + "\n")) return undefined;

  let from = FENCE.length;
  for (;;) {
    const close = raw.indexOf("\n" + FENCE, from);
    if (close === -1) return undefined;

    let pos = close + 1 + FENCE.length;
    if (pos === raw.length || raw[pos] === "\n") {
      if (raw[pos] === "\n") pos++;
      if (raw[pos] === "\n") pos++;
      return { yaml: raw.slice(FENCE.length + 1, Math.max(close, FENCE.length + 1)), body: raw.slice(pos) };
    }
    from = close + 1;
  }
}

/** Narrow a decoded YAML (or JSON) value into the closed YamlValue union. */
export function toYamlValue(value: unknown): YamlValue {
  if (value === null || value === undefined) return null;
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  if (Array.isArray(value)) return value.map(toYamlValue);
  if (value instanceof Map) {
    const mapping: Frontmatter = new Map();
    for (const [k, v] of value) mapping.set(String(k), toYamlValue(v));
    return mapping;
  }
  if (value instanceof Date) return value.toISOString();
  if (typeof value === "object") {
    const mapping: Frontmatter = new Map();
    for (const [k, v] of Object.entries(value)) mapping.set(k, toYamlValue(v));
    return mapping;
  }
  return String(value);
}

/** Build a frontmatter mapping from a plain object, keeping its key order. */
export function frontmatterFromObject(data: Record<string, unknown>): Frontmatter {
  const mapping: Frontmatter = new Map();
  for (const [key, value] of Object.entries(data)) mapping.set(key, toYamlValue(value));
  return mapping;
}

export function toJsonValue(value: YamlValue): JsonValue {
  if (value instanceof Map) return frontmatterToObject(value);
  if (Array.isArray(value)) return value.map(toJsonValue);
  return value;
}

export function frontmatterToObject(frontmatter: Frontmatter): { [key: string]: JsonValue } {
  const out: { [key: string]: JsonValue } = {};
  for (const [key, value] of frontmatter) out[key] = toJsonValue(value);
  return out;
}

/** Split raw note text into frontmatter and body. */
export function parseFrontmatter(raw: string): { frontmatter: Frontmatter; body: string } {
  const block = findFence(raw);
  if (!block) return { frontmatter: new Map(), body: raw };

  const doc = parseDocument(block.yaml);
  const [firstError] = doc.errors;
  if (firstError) throw new FrontmatterParseError(firstError.message);

  if (!isMap(doc.contents)) return { frontmatter: new Map(), body: raw };

  const data: unknown = doc.toJS({ mapAsMap: true });
  const frontmatter = toYamlValue(data);
  if (!(frontmatter instanceof Map)) return { frontmatter: new Map(), body: raw };
  return { frontmatter, body: block.body };
}

export function parseNote(path: string, raw: string): Note {
  return { path, ...parseFrontmatter(raw) };
}

/** Render frontmatter as YAML text without fences. */
export function stringifyFrontmatter(frontmatter: Frontmatter): string {
  if (frontmatter.size === 0) return "";
  const doc = new Document(frontmatter);
  visit(doc, {
    Pair(_, pair) {
      if (isScalar(pair.key) && typeof pair.key.value === "string" && INTEGER_KEY_RE.test(pair.key.value)) {
        pair.key.value = Number(pair.key.value);
      }
    },
  });
  return doc.toString({ lineWidth: 0 }).trimEnd();
}

export function serializeNote(frontmatter: Frontmatter, body: string): string {
  if (frontmatter.size === 0) return body;
  return `${FENCE}\n${stringifyFrontmatter(frontmatter)}\n${FENCE}\n\n${body}`;
}

/**
 * Merge updates into existing frontmatter. Removals apply first; existing keys
 * keep their position, new keys are appended in the order given.
 */
export function mergeFrontmatter(
  existing: Frontmatter,
  updates: Frontmatter,
  removals: Iterable<string> = []
): Frontmatter {
  const merged: Frontmatter = new Map(existing);
  for (const key of removals) merged.delete(key);
  for (const [key, value] of updates) merged.set(key, value);
  return merged;
}
