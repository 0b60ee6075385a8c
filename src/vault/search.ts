import { extractTags } from "./relations.ts";
import type { Note, NoteMatch, SearchQuery, SearchResult } from "./types.ts";

const PREVIEW_CONTEXT = 50;

function preview(text: string, start: number, end: number): string {
  const from = Math.max(0, start - PREVIEW_CONTEXT);
  const to = Math.min(text.length, end + PREVIEW_CONTEXT);
  const snippet = text.slice(from, to).replace(/\s*\n\s*/g, " ").trim();
  return `${from > 0 ? "…" : ""}${snippet}${to < text.length ? "…" : ""}`;
}

function contentPreviews(body: string, needle: string): string[] {
  const previews: string[] = [];
  let index = body.indexOf(needle);
  while (index !== -1) {
    previews.push(preview(body, index, index + needle.length));
    index = body.indexOf(needle, index + needle.length);
  }
  return previews;
}

/** Check one note against a query. Matching is literal and case-sensitive. */
export function matchNote(note: Note, query: SearchQuery): NoteMatch {
  const noMatch: NoteMatch = { matched: false, previews: [] };
  if (query.text === "") return noMatch;
  if (query.pathFilter && !note.path.startsWith(query.pathFilter)) return noMatch;

  const previews: string[] = [];
  for (const scope of new Set(query.scope)) {
    switch (scope) {
      case "filename":
        if (note.path.includes(query.text)) previews.push(`Filename match: ${note.path}`);
        break;
      case "tags":
        for (const tag of extractTags(note.frontmatter)) {
          if (tag.includes(query.text)) previews.push(`Tag match: ${tag}`);
        }
        break;
      case "content":
        previews.push(...contentPreviews(note.body, query.text));
        break;
    }
  }

  return { matched: previews.length > 0, previews };
}

export function searchNotes(corpus: Iterable<Note>, query: SearchQuery): SearchResult[] {
  const results: SearchResult[] = [];
  for (const note of corpus) {
    const { matched, previews } = matchNote(note, query);
    if (matched) results.push({ path: note.path, previews });
  }
  return results;
}
