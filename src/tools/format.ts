import { stringifyFrontmatter } from "../vault/index.ts";
import type { Frontmatter, Note } from "../vault/index.ts";

export function formatFrontmatter(frontmatter: Frontmatter): string {
  return `**Frontmatter:**\n\`\`\`yaml\n${stringifyFrontmatter(frontmatter)}\n\`\`\``;
}

/** Frontmatter block (when present) followed by the body. */
export function formatNote(note: Note): string {
  const parts: string[] = [];
  if (note.frontmatter.size > 0) parts.push(formatFrontmatter(note.frontmatter));
  parts.push(note.body);
  return parts.join("\n\n");
}
