import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { Vault } from "../vault/index.ts";
import { formatNote } from "./format.ts";

export function registerDailyTool(server: McpServer, vault: Vault): void {
  server.tool(
    "daily",
    "Read the daily note for a date. Looks in the configured daily notes folder, the vault root, 'daily/' and 'Daily Notes/'.",
    {
      date: z
        .string()
        .optional()
        .describe("'today' (default), 'yesterday', 'tomorrow' or YYYY-MM-DD"),
    },
    async ({ date }) => {
      const note = await vault.dailyNote(date ?? "today");
      return { content: [{ type: "text" as const, text: `**${note.path}**\n\n${formatNote(note)}` }] };
    }
  );
}
