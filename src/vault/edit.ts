import { TargetNotFoundError } from "./errors.ts";
import { findSection, parseSections } from "./sections.ts";
import type { EditOperation } from "./types.ts";

/** Turn literal `\n` escape sequences into real line breaks. */
export function decodeNewlines(text: string): string {
  return text.replaceAll("\\n", "\n");
}

function locate(body: string, target: string): number {
  const index = target === "" ? -1 : body.indexOf(target);
  if (index === -1) throw new TargetNotFoundError(target);
  return index;
}

export function insertAfter(body: string, target: string, content: string, newlineBefore = false): string {
  const end = locate(body, target) + target.length;
  const separate = newlineBefore && !target.endsWith("\n") && !content.startsWith("\n");
  return body.slice(0, end) + (separate ? "\n" : "") + content + body.slice(end);
}

export function insertBefore(body: string, target: string, content: string, newlineBefore = false): string {
  const start = locate(body, target);
  const separate = newlineBefore && !content.endsWith("\n") && !target.startsWith("\n");
  return body.slice(0, start) + content + (separate ? "\n" : "") + body.slice(start);
}

/**
 * Replace literal occurrences of target, left to right. The replacement is
 * inserted verbatim; `$` sequences have no special meaning.
 */
export function replaceText(body: string, target: string, replacement: string, replaceAll = true): string {
  const first = locate(body, target);
  const decoded = decodeNewlines(replacement);
  if (replaceAll) return body.split(target).join(decoded);
  return body.slice(0, first) + decoded + body.slice(first + target.length);
}

const TRAILING_BLANK_LINES_RE = /(?:\n[ \t\r]*)+$/;

/**
 * Append text to the end of a section, one line break after its last
 * non-blank line, which is kept as written. Trailing blank lines and the next heading stay put.
 */
export function appendToSection(body: string, header: string, text: string): string {
  const section = findSection(parseSections(body), header);
  const span = body.slice(section.headingRange.start, section.bodyRange.end);
  const at = section.headingRange.start + span.replace(TRAILING_BLANK_LINES_RE, "").length;
  return body.slice(0, at) + "\n" + decodeNewlines(text) + body.slice(at);
}

export function applyEdit(body: string, operation: EditOperation): string {
  switch (operation.mode) {
    case "insert-after":
      return insertAfter(body, operation.target, operation.content, operation.newlineBefore);
    case "insert-before":
      return insertBefore(body, operation.target, operation.content, operation.newlineBefore);
    case "replace":
      return replaceText(body, operation.target, operation.content, operation.replaceAll);
    case "append-to-section":
      return appendToSection(body, operation.header, operation.text);
  }
}
