import { readFile } from "node:fs/promises";
import { InvalidArgumentError } from "commander";
import { frontmatterFromObject, toYamlValue } from "../vault/index.ts";
import type { Frontmatter, RelationCriterion, SearchScope, WriteMode } from "../vault/index.ts";

/** "-" reads stdin, "@file" reads a file, anything else is literal with \n escapes. */
export async function resolveContent(
  arg: string,
  stdin: AsyncIterable<unknown> = process.stdin
): Promise<string> {
  if (arg === "-") {
    const chunks: Buffer[] = [];
    for await (const chunk of stdin) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    }
    return Buffer.concat(chunks).toString("utf-8");
  }
  if (arg.startsWith("@")) return readFile(arg.slice(1).trimStart(), "utf-8");
  return arg.replaceAll("\\n", "\n");
}

export function parseJsonObject(value: string): Frontmatter {
  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch {
    throw new InvalidArgumentError("expected a JSON object");
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new InvalidArgumentError("expected a JSON object");
  }
  return frontmatterFromObject(Object.fromEntries(Object.entries(parsed)));
}

export function parseInteger(value: string): number {
  const n = Number.parseInt(value, 10);
  if (Number.isNaN(n) || n < 0) throw new InvalidArgumentError("expected a non-negative integer");
  return n;
}

export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function parseWriteMode(value: string): WriteMode {
  if (value === "overwrite" || value === "append" || value === "prepend") return value;
  throw new InvalidArgumentError("expected overwrite, append or prepend");
}

export function parseScope(value: string, previous: SearchScope[] = []): SearchScope[] {
  if (value === "content" || value === "filename" || value === "tags") return [...previous, value];
  throw new InvalidArgumentError("expected content, filename or tags");
}

export function parseCriterion(value: string, previous: RelationCriterion[] = []): RelationCriterion[] {
  if (value === "tags" || value === "links") return [...previous, value];
  throw new InvalidArgumentError("expected tags or links");
}

function splitPair(pair: string): [string, string] {
  const eq = pair.indexOf("=");
  if (eq <= 0) throw new InvalidArgumentError(`expected key=value, got '${pair}'`);
  return [pair.slice(0, eq), pair.slice(eq + 1)];
}

/** key=value pairs; values are parsed as JSON when they parse, else kept as strings. */
export function parseAssignments(pairs: string[]): Frontmatter {
  const properties: Frontmatter = new Map();
  for (const pair of pairs) {
    const [key, raw] = splitPair(pair);
    let value: unknown;
    try {
      value = JSON.parse(raw);
    } catch {
      value = raw;
    }
    properties.set(key, toYamlValue(value));
  }
  return properties;
}

/** key=value pairs kept as strings, for template variables. */
export function parseVariables(pairs: string[]): Record<string, string> {
  const variables: Record<string, string> = {};
  for (const pair of pairs) {
    const [key, value] = splitPair(pair);
    variables[key] = value;
  }
  return variables;
}
