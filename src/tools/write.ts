import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { frontmatterFromObject } from "../vault/index.ts";
import type { Vault } from "../vault/index.ts";

export function registerWriteTool(server: McpServer, vault: Vault): void {
  server.tool(
    "write",
    "Create a note or update an existing one. Modes: 'overwrite' (default) replaces the file, 'append' adds content after the existing body, 'prepend' before it. In append/prepend mode frontmatter is merged: existing keys are updated in place, new keys added. Parent folders are created as needed.",
    {
      path: z.string().describe("Relative path for the note (.md added if missing)"),
      content: z.string().describe("Note body, without frontmatter"),
      frontmatter: z
        .record(z.unknown())
        .optional()
        .describe("Frontmatter properties. Integer-like keys (e.g. \"2024\") come first in a JSON object, so they are not kept in the given order."),
      mode: z.enum(["overwrite", "append", "prepend"]).optional().describe("Write mode (default overwrite)"),
    },
    async ({ path, content, frontmatter, mode }) => {
      const written = await vault.write(path, content, {
        mode,
        frontmatter: frontmatter ? frontmatterFromObject(frontmatter) : undefined,
      });
      return { content: [{ type: "text" as const, text: `Wrote: ${written}` }] };
    }
  );
}
