import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { registerTools } from "./tools/index.ts";
import type { Vault } from "./vault/index.ts";

export const SERVER_NAME = "folio-mcp";
export const SERVER_VERSION = "0.1.0";

export function createServer(vault: Vault): McpServer {
  const server = new McpServer(
    { name: SERVER_NAME, version: SERVER_VERSION },
    {
      instructions:
        "Read and edit the markdown notes of a vault directly on disk, without the editor running.",
    }
  );
  registerTools(server, vault);
  return server;
}
