import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { Vault } from "../vault/index.ts";

const MAX_PREVIEWS = 3;

export function registerSearchTool(server: McpServer, vault: Vault): void {
  server.tool(
    "search",
    "Search notes for literal text (case-sensitive substring match). Scopes: 'content' (note body), 'filename' (file path), 'tags' (frontmatter tags). Returns matching paths with previews.",
    {
      query: z.string().min(1).describe("Literal text to search for"),
      scope: z
        .array(z.enum(["content", "filename", "tags"]))
        .optional()
        .describe("Fields to search (default content and filename)"),
      path_filter: z.string().optional().describe("Only search notes whose path starts with this prefix"),
    },
    async ({ query, scope, path_filter }) => {
      const results = await vault.search({
        text: query,
        scope: scope ?? ["content", "filename"],
        pathFilter: path_filter,
      });

      if (results.length === 0) {
        return { content: [{ type: "text" as const, text: `No results for "${query}"` }] };
      }

      const text = results
        .map((r) => {
          const matchPreview = r.previews.slice(0, MAX_PREVIEWS).join("\n  ");
          const more =
            r.previews.length > MAX_PREVIEWS ? `\n  ...and ${r.previews.length - MAX_PREVIEWS} more` : "";
          return `**${r.path}**\n  ${matchPreview}${more}`;
        })
        .join("\n\n");

      return { content: [{ type: "text" as const, text }] };
    }
  );
}
