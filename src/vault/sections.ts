import {
  AmbiguousSectionError,
  HeaderLevelMismatchError,
  HeaderLevelMissingError,
  InvalidHeaderSpecError,
  SectionNotFoundError,
} from "./errors.ts";
import type { HeaderSpec, HeadingLevel, Section } from "./types.ts";

const HEADING_RE = /^(#{1,6})[ \t]+(.*)$/;
const CODE_FENCE_RE = /^ {0,3}(`{3,}|~{3,})/;

function isHeadingLevel(n: number): n is HeadingLevel {
  return Number.isInteger(n) && n >= 1 && n <= 6;
}

/** Trim and collapse inner whitespace runs to single spaces. */
export function normalizeHeaderText(text: string): string {
  return text.trim().replace(/\s+/g, " ");
}

function parseHeadingLine(line: string): HeaderSpec | undefined {
  const match = HEADING_RE.exec(line.replace(/\r$/, ""));
  if (!match?.[1] || match[2] === undefined) return undefined;
  const level = match[1].length;
  const text = normalizeHeaderText(match[2]);
  if (!isHeadingLevel(level) || text === "") return undefined;
  return { level, text };
}

/** Split a note body into heading-delimited sections, in document order. */
export function parseSections(body: string): Section[] {
  const headings: { spec: HeaderSpec; line: number; start: number; end: number }[] = [];
  let fence: string | undefined;
  let offset = 0;
  let lineNo = 0;

  while (offset < body.length) {
    const newline = body.indexOf("\n", offset);
    const end = newline === -1 ? body.length : newline + 1;
    const line = body.slice(offset, newline === -1 ? body.length : newline);

    const fenceMatch = CODE_FENCE_RE.exec(line);
    if (fenceMatch?.[1]) {
      const marker = fenceMatch[1];
      if (fence === undefined) {
        fence = marker;
      } else if (marker[0] === fence[0] && marker.length >= fence.length) {
        fence = undefined;
      }
    } else if (fence === undefined) {
      const spec = parseHeadingLine(line);
      if (spec) headings.push({ spec, line: lineNo, start: offset, end });
    }

    offset = end;
    lineNo++;
  }

  return headings.map((h, i) => {
    const next = headings.slice(i + 1).find((n) => n.spec.level <= h.spec.level);
    return {
      level: h.spec.level,
      headerText: h.spec.text,
      line: h.line,
      headingRange: { start: h.start, end: h.end },
      bodyRange: { start: h.end, end: next ? next.start : body.length },
    };
  });
}

/** Parse a user-supplied header such as "## Log" into level and normalized text. */
export function parseHeaderSpec(header: string): HeaderSpec {
  const trimmed = header.trim();
  const hashes = /^#+/.exec(trimmed)?.[0] ?? "";
  if (hashes === "") throw new HeaderLevelMissingError(header);

  const level = hashes.length;
  if (!isHeadingLevel(level)) {
    throw new InvalidHeaderSpecError(header, "level must be 1-6 (# to ######)");
  }
  const text = normalizeHeaderText(trimmed.slice(level));
  if (text === "") throw new InvalidHeaderSpecError(header, "header text cannot be empty");
  return { level, text };
}

/**
 * Resolve a header spec to exactly one section. Multiple exact matches are an
 * error, never resolved by position.
 */
export function findSection(sections: Section[], header: string): Section {
  const { level, text } = parseHeaderSpec(header);
  const sameText = sections.filter((s) => s.headerText === text);
  const matches = sameText.filter((s) => s.level === level);

  const [only] = matches;
  if (matches.length === 1 && only) return only;
  if (matches.length > 1) {
    throw new AmbiguousSectionError(level, text, matches.map((s) => s.line));
  }
  if (sameText.length > 0) {
    throw new HeaderLevelMismatchError(
      level,
      text,
      sameText.map((s) => ({ level: s.level, line: s.line }))
    );
  }
  throw new SectionNotFoundError(level, text);
}
