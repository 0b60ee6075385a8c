export type YamlScalar = string | number | boolean | null;

/** Frontmatter values. Mappings keep key order, so they are Maps, not records. */
export type YamlValue = YamlScalar | YamlValue[] | YamlMapping;

export type YamlMapping = Map<string, YamlValue>;

export type Frontmatter = YamlMapping;

export interface Note {
  /** Relative path from vault root */
  path: string;
  frontmatter: Frontmatter;
  /** Raw text after the closing fence, or the whole file without one */
  body: string;
}

export type HeadingLevel = 1 | 2 | 3 | 4 | 5 | 6;

/** Half-open offset range into a note body. */
export interface TextRange {
  start: number;
  end: number;
}

export interface Section {
  level: HeadingLevel;
  /** Heading text, trimmed with inner whitespace collapsed */
  headerText: string;
  /** Zero-based line number of the heading */
  line: number;
  /** The heading line itself, including its line break */
  headingRange: TextRange;
  /** From after the heading line to the next heading of the same or a higher level */
  bodyRange: TextRange;
}

export interface HeaderSpec {
  level: HeadingLevel;
  text: string;
}

export type EditOperation =
  | { mode: "insert-after"; target: string; content: string; newlineBefore?: boolean }
  | { mode: "insert-before"; target: string; content: string; newlineBefore?: boolean }
  | { mode: "replace"; target: string; content: string; replaceAll?: boolean }
  | { mode: "append-to-section"; header: string; text: string };

export type RelationCriterion = "tags" | "links";

export interface RelatedNote {
  path: string;
  /** Tags shared with the source note */
  sharedTags: string[];
  /** Whether the source note links to this one */
  linked: boolean;
}

export type SearchScope = "content" | "filename" | "tags";

export interface SearchQuery {
  text: string;
  scope: SearchScope[];
  /** Only notes whose path starts with this prefix are considered */
  pathFilter?: string;
}

export interface NoteMatch {
  matched: boolean;
  previews: string[];
}

export interface SearchResult {
  path: string;
  previews: string[];
}

export interface VaultEntry {
  /** Relative path from vault root */
  path: string;
  /** File or directory name */
  name: string;
  /** Whether this is a directory */
  isDirectory: boolean;
  /** Size in bytes (files only) */
  size?: number;
}

export type WriteMode = "overwrite" | "append" | "prepend";
