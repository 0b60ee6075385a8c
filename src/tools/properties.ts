import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { frontmatterFromObject } from "../vault/index.ts";
import type { Vault } from "../vault/index.ts";
import { formatFrontmatter } from "./format.ts";

export function registerPropertiesTools(server: McpServer, vault: Vault): void {
  server.tool(
    "properties",
    "Update frontmatter properties of a note. Existing keys keep their position and get the new value; new keys are added at the end; keys in 'remove' are deleted. The body is not modified.",
    {
      path: z.string().describe("Relative path to the note"),
      properties: z
        .record(z.unknown())
        .optional()
        .describe("Properties to set. Integer-like keys (e.g. \"2024\") come first in a JSON object, so they are not kept in the given order."),
      remove: z.array(z.string()).optional().describe("Property keys to remove"),
    },
    async ({ path, properties, remove }) => {
      const updated = await vault.updateProperties(
        path,
        frontmatterFromObject(properties ?? {}),
        remove ?? []
      );
      return { content: [{ type: "text" as const, text: `Updated properties: ${updated}` }] };
    }
  );

  server.tool(
    "get-properties",
    "Read a note's frontmatter properties.",
    { path: z.string().describe("Relative path to the note") },
    async ({ path }) => {
      const frontmatter = await vault.getProperties(path);
      const text = frontmatter.size > 0 ? formatFrontmatter(frontmatter) : "No properties";
      return { content: [{ type: "text" as const, text }] };
    }
  );
}
