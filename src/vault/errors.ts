import type { HeadingLevel } from "./types.ts";

export type VaultErrorCode =
  | "FRONTMATTER_PARSE"
  | "TARGET_NOT_FOUND"
  | "HEADER_LEVEL_MISSING"
  | "INVALID_HEADER_SPEC"
  | "SECTION_NOT_FOUND"
  | "HEADER_LEVEL_MISMATCH"
  | "AMBIGUOUS_SECTION"
  | "PATH_ESCAPE"
  | "NOTE_NOT_FOUND"
  | "NOTE_EXISTS"
  | "INVALID_DATE";

export class VaultError extends Error {
  constructor(
    readonly code: VaultErrorCode,
    message: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class FrontmatterParseError extends VaultError {
  constructor(readonly reason: string) {
    super("FRONTMATTER_PARSE", `Invalid YAML in frontmatter: ${reason}`);
  }
}

export class TargetNotFoundError extends VaultError {
  constructor(readonly target: string) {
    super(
      "TARGET_NOT_FOUND",
      target === "" ? "Target text must not be empty" : `Target text not found: "${target}"`
    );
  }
}

export class HeaderLevelMissingError extends VaultError {
  constructor(readonly header: string) {
    super(
      "HEADER_LEVEL_MISSING",
      `Header level must be specified with # markers (e.g. '## ${header.trim()}')`
    );
  }
}

export class InvalidHeaderSpecError extends VaultError {
  constructor(readonly header: string, reason: string) {
    super("INVALID_HEADER_SPEC", `Invalid section header '${header.trim()}': ${reason}`);
  }
}

function headerLabel(level: HeadingLevel, text: string): string {
  return `${"#".repeat(level)} ${text}`;
}

export class SectionNotFoundError extends VaultError {
  constructor(
    readonly requestedLevel: HeadingLevel,
    readonly text: string,
    code: VaultErrorCode = "SECTION_NOT_FOUND",
    message = `Section not found: no header matching '${headerLabel(requestedLevel, text)}'`
  ) {
    super(code, message);
  }
}

/** The heading text exists, but only at other levels. */
export class HeaderLevelMismatchError extends SectionNotFoundError {
  constructor(
    requestedLevel: HeadingLevel,
    text: string,
    readonly found: { level: HeadingLevel; line: number }[]
  ) {
    const where = found
      .map((f) => `'${"#".repeat(f.level)}' at line ${f.line + 1}`)
      .join(", ");
    super(
      requestedLevel,
      text,
      "HEADER_LEVEL_MISMATCH",
      `Header level mismatch: looking for '${headerLabel(requestedLevel, text)}' but found ${where}`
    );
  }

  get foundLevels(): HeadingLevel[] {
    return this.found.map((f) => f.level);
  }
}

export class AmbiguousSectionError extends VaultError {
  constructor(
    readonly level: HeadingLevel,
    readonly text: string,
    readonly lines: number[]
  ) {
    super(
      "AMBIGUOUS_SECTION",
      `Found ${lines.length} headers matching '${headerLabel(level, text)}' at lines ${lines
        .map((l) => l + 1)
        .join(", ")}. Use a literal text replace for precise targeting.`
    );
  }

  get count(): number {
    return this.lines.length;
  }
}

export class PathEscapeError extends VaultError {
  constructor(readonly path: string) {
    super("PATH_ESCAPE", `Path escapes vault root: ${path}`);
  }
}

export class NoteNotFoundError extends VaultError {
  constructor(readonly path: string) {
    super("NOTE_NOT_FOUND", `Note not found: ${path}`);
  }
}

export class NoteExistsError extends VaultError {
  constructor(readonly path: string) {
    super("NOTE_EXISTS", `Note already exists: ${path}`);
  }
}

export class InvalidDateError extends VaultError {
  constructor(readonly input: string) {
    super("INVALID_DATE", `Date must be 'today', 'yesterday', 'tomorrow' or YYYY-MM-DD, got '${input}'`);
  }
}
