import { basename, extname } from "node:path";
import type { Frontmatter, Note, RelatedNote, RelationCriterion } from "./types.ts";

const WIKILINK_RE = /\[\[([^\]]+)\]\]/g;

/** Tags from the `tags` property: a list of strings or a single string. */
export function extractTags(frontmatter: Frontmatter): Set<string> {
  const value = frontmatter.get("tags");
  if (typeof value === "string") return new Set(value.trim() === "" ? [] : [value]);
  if (Array.isArray(value)) {
    return new Set(value.filter((t): t is string => typeof t === "string"));
  }
  return new Set();
}

/** Wikilink targets in a body, without alias or heading anchors. */
export function extractLinks(body: string): Set<string> {
  const links = new Set<string>();
  for (const match of body.matchAll(WIKILINK_RE)) {
    const inner = match[1] ?? "";
    const target = inner.split(/[|#]/, 1)[0]?.trim() ?? "";
    if (target !== "") links.add(target);
  }
  return links;
}

/** Names a wikilink may use to point at the note at this path. */
function linkNames(path: string): string[] {
  const file = basename(path);
  const ext = extname(file);
  const names = [file, basename(file, ext)];
  if (path !== file) names.push(ext ? path.slice(0, -ext.length) : path);
  return names;
}

/**
 * Notes related to source by shared tags or by being link targets of source,
 * in corpus order. The source itself is never returned.
 */
export function findRelated(
  source: Note,
  corpus: Iterable<Note>,
  criteria: Iterable<RelationCriterion>
): RelatedNote[] {
  const on = new Set(criteria);
  const sourceTags = on.has("tags") ? extractTags(source.frontmatter) : new Set<string>();
  const sourceLinks = on.has("links") ? extractLinks(source.body) : new Set<string>();

  const related: RelatedNote[] = [];
  for (const candidate of corpus) {
    if (candidate.path === source.path) continue;

    const sharedTags = [...extractTags(candidate.frontmatter)].filter((t) => sourceTags.has(t));
    const linked = linkNames(candidate.path).some((name) => sourceLinks.has(name));

    if (sharedTags.length > 0 || linked) {
      related.push({ path: candidate.path, sharedTags, linked });
    }
  }
  return related;
}
