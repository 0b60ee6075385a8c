import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { Vault } from "../vault/index.ts";

export function registerDeleteTool(server: McpServer, vault: Vault): void {
  server.tool(
    "delete",
    "Delete a note or folder from the vault. Notes may omit the .md extension; folders are deleted recursively.",
    { path: z.string().describe("Relative path to delete") },
    async ({ path }) => {
      const deleted = await vault.delete(path);
      return { content: [{ type: "text" as const, text: `Deleted: ${deleted}` }] };
    }
  );
}
