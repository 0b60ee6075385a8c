import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfigOrExit } from "./config.ts";
import * as log from "./log.ts";
import { createServer } from "./server.ts";
import { Vault } from "./vault/index.ts";

const config = loadConfigOrExit(
  "Usage: folio-mcp <vault-path> or set FOLIO_VAULT env var",
  process.argv[2]
);

const vault = new Vault(config.vaultPath, {
  dailyNotesPath: config.dailyNotesPath,
  templatesPath: config.templatesPath,
});
const server = createServer(vault);

const transport = new StdioServerTransport();
await server.connect(transport);
log.info(`folio-mcp serving ${config.vaultPath} over stdio`);
