import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { Vault } from "../vault/index.ts";

export function registerListTool(server: McpServer, vault: Vault): void {
  server.tool(
    "list",
    "List files and folders in a vault directory. With recursive=true, returns only .md files from all subdirectories. Returns an empty listing if the directory doesn't exist.",
    {
      path: z.string().optional().describe("Relative path from vault root. Omit for root."),
      recursive: z.boolean().optional().describe("List markdown files in subdirectories too (default false)"),
      limit: z.number().int().positive().optional().describe("Max entries (default 50)"),
      offset: z.number().int().nonnegative().optional().describe("Entries to skip (default 0)"),
    },
    async ({ path, recursive, limit, offset }) => {
      const entries = await vault.list(path ?? ".", { recursive, limit, offset });
      const text = entries
        .map((e) => `${e.isDirectory ? "📁" : "📄"} ${e.path}${e.size !== undefined ? ` (${e.size} B)` : ""}`)
        .join("\n");
      return { content: [{ type: "text" as const, text: text || "Empty directory" }] };
    }
  );
}
