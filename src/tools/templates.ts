import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { Vault } from "../vault/index.ts";

export function registerTemplateTools(server: McpServer, vault: Vault): void {
  server.tool(
    "template",
    "Create a note from a template. {{variable}} placeholders are filled from 'variables'; {{title}}, {{date}}, {{time}} and {{date:FORMAT|OFFSET}} (moment-style format, offsets like -7d) are built in. Unknown placeholders are left as written. Template paths starting with '/' are relative to the vault root, others to the templates folder.",
    {
      path: z.string().describe("Destination path for the new note"),
      template_path: z.string().describe("Template to render"),
      variables: z.record(z.string()).optional().describe("Values for {{variable}} placeholders"),
    },
    async ({ path, template_path, variables }) => {
      const created = await vault.createFromTemplate(path, template_path, variables ?? {});
      return { content: [{ type: "text" as const, text: `Created: ${created}` }] };
    }
  );

  server.tool(
    "templates",
    "List markdown templates in the templates folder. Returned paths can be passed to the template tool.",
    {},
    async () => {
      const templates = await vault.listTemplates();
      const text = templates.map((t) => `📄 ${t.path} (${t.size ?? 0} B)`).join("\n");
      return { content: [{ type: "text" as const, text: text || "No templates" }] };
    }
  );
}
