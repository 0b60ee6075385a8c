import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { Vault } from "../vault/index.ts";

export function registerAppendSectionTool(server: McpServer, vault: Vault): void {
  server.tool(
    "append-to-section",
    "Append text to the end of a markdown section, before the next header of the same or higher level. The header must include # markers (e.g. '## End day') and match exactly one section; fails on a missing level, a level mismatch, or several matching sections.",
    {
      path: z.string().describe("Relative path to the note"),
      section_header: z.string().describe("Section header with # markers, e.g. '## Log'"),
      text: z.string().describe("Text to append; \\n becomes a newline"),
    },
    async ({ path, section_header, text }) => {
      const edited = await vault.appendToSection(path, section_header, text);
      return { content: [{ type: "text" as const, text: `Appended to ${section_header} in: ${edited}` }] };
    }
  );
}
