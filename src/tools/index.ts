import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { Vault } from "../vault/index.ts";
import { registerListTool } from "./list.ts";
import { registerReadTool } from "./read.ts";
import { registerDeleteTool } from "./delete.ts";
import { registerWriteTool } from "./write.ts";
import { registerDailyTool } from "./daily.ts";
import { registerSearchTool } from "./search.ts";
import { registerRelatedTool } from "./related.ts";
import { registerEditTool } from "./edit.ts";
import { registerReplaceTool } from "./replace.ts";
import { registerAppendSectionTool } from "./append-section.ts";
import { registerPropertiesTools } from "./properties.ts";
import { registerTemplateTools } from "./templates.ts";

export function registerTools(server: McpServer, vault: Vault): void {
  registerListTool(server, vault);
  registerReadTool(server, vault);
  registerDeleteTool(server, vault);
  registerWriteTool(server, vault);
  registerDailyTool(server, vault);
  registerSearchTool(server, vault);
  registerRelatedTool(server, vault);
  registerEditTool(server, vault);
  registerReplaceTool(server, vault);
  registerAppendSectionTool(server, vault);
  registerPropertiesTools(server, vault);
  registerTemplateTools(server, vault);
}
