import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { Vault } from "../vault/index.ts";

export function registerRelatedTool(server: McpServer, vault: Vault): void {
  server.tool(
    "related",
    "Find notes related to a source note: notes sharing a frontmatter tag with it, and notes whose file name matches one of its [[wikilinks]]. Use after finding a relevant note to explore its neighborhood.",
    {
      path: z.string().describe("Relative path to the source note"),
      on: z
        .array(z.enum(["tags", "links"]))
        .optional()
        .describe("Relationships to follow (default both)"),
    },
    async ({ path, on }) => {
      const related = await vault.related(path, on ?? ["tags", "links"]);

      if (related.length === 0) {
        return { content: [{ type: "text" as const, text: `No related notes for ${path}` }] };
      }

      const text = related
        .map((r) => {
          const via: string[] = [];
          if (r.linked) via.push("linked");
          if (r.sharedTags.length > 0) via.push(`tags: ${r.sharedTags.join(", ")}`);
          return `**${r.path}** (${via.join("; ")})`;
        })
        .join("\n");

      return { content: [{ type: "text" as const, text }] };
    }
  );
}
