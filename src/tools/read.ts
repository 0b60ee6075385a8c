import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { Vault } from "../vault/index.ts";
import { formatNote } from "./format.ts";

export function registerReadTool(server: McpServer, vault: Vault): void {
  server.tool(
    "read",
    "Read a markdown note. The .md extension is optional. Returns parsed frontmatter and body.",
    { path: z.string().describe("Relative path to the note from vault root") },
    async ({ path }) => {
      const note = await vault.readNote(path);
      return { content: [{ type: "text" as const, text: formatNote(note) }] };
    }
  );
}
