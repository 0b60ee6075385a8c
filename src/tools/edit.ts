import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { EditOperation, Vault } from "../vault/index.ts";

function buildEditOperation(params: {
  mode: EditOperation["mode"];
  target?: string;
  content?: string;
  header?: string;
  newline_before?: boolean;
  all?: boolean;
}): EditOperation {
  switch (params.mode) {
    case "insert-after":
    case "insert-before":
      if (params.target === undefined || params.content === undefined) {
        throw new Error(`"target" and "content" are required for mode "${params.mode}"`);
      }
      return {
        mode: params.mode,
        target: params.target,
        content: params.content,
        newlineBefore: params.newline_before,
      };

    case "replace":
      if (params.target === undefined || params.content === undefined) {
        throw new Error('"target" and "content" are required for mode "replace"');
      }
      return { mode: "replace", target: params.target, content: params.content, replaceAll: params.all };

    case "append-to-section":
      if (params.header === undefined || params.content === undefined) {
        throw new Error('"header" and "content" are required for mode "append-to-section"');
      }
      return { mode: "append-to-section", header: params.header, text: params.content };
  }
}

export function registerEditTool(server: McpServer, vault: Vault): void {
  server.tool(
    "edit",
    "Edit a note body. Modes: insert-after / insert-before (next to the first literal occurrence of target), replace (literal target, all occurrences unless all=false), append-to-section (header such as '## Log'). Frontmatter is left untouched.",
    {
      path: z.string().describe("Relative path to the note"),
      mode: z.enum(["insert-after", "insert-before", "replace", "append-to-section"]).describe("Edit mode"),
      target: z.string().optional().describe("Literal text to anchor on (insert and replace modes)"),
      content: z.string().optional().describe("Text to insert, replacement text, or text to append"),
      header: z.string().optional().describe("Section header with # markers (append-to-section)"),
      newline_before: z
        .boolean()
        .optional()
        .describe("Keep inserted text on its own line next to the anchor (insert modes)"),
      all: z.boolean().optional().describe("Replace all occurrences (replace mode, default true)"),
    },
    async (params) => {
      const operation = buildEditOperation(params);
      const path = await vault.edit(params.path, operation);
      return { content: [{ type: "text" as const, text: `Edited: ${path}` }] };
    }
  );
}
