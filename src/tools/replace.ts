import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { Vault } from "../vault/index.ts";

export function registerReplaceTool(server: McpServer, vault: Vault): void {
  server.tool(
    "replace",
    "Replace literal text in a note body. \\n in the replacement becomes a newline. Fails if the text is not found.",
    {
      path: z.string().describe("Relative path to the note"),
      find: z.string().min(1).describe("Literal text to find"),
      replace: z.string().describe("Replacement text"),
      replace_all: z.boolean().optional().describe("Replace every occurrence (default true) or only the first"),
    },
    async ({ path, find, replace, replace_all }) => {
      const edited = await vault.replaceText(path, find, replace, replace_all ?? true);
      return { content: [{ type: "text" as const, text: `Replaced in: ${edited}` }] };
    }
  );
}
