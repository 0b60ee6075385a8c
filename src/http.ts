import { createServer as createHttpServer } from "node:http";
import type { IncomingMessage, ServerResponse } from "node:http";
import { randomUUID } from "node:crypto";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { isInitializeRequest } from "@modelcontextprotocol/sdk/types.js";
import { loadConfigOrExit } from "./config.ts";
import * as log from "./log.ts";
import { createServer } from "./server.ts";
import { Vault } from "./vault/index.ts";

const config = loadConfigOrExit(
  "Usage: FOLIO_VAULT=<vault-path> tsx src/http.ts or tsx src/http.ts <vault-path>",
  process.argv[2]
);

const vault = new Vault(config.vaultPath, {
  dailyNotesPath: config.dailyNotesPath,
  templatesPath: config.templatesPath,
});

// Stateful session management: one transport per session
const sessions = new Map<string, StreamableHTTPServerTransport>();

async function readJson(req: IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  const text = Buffer.concat(chunks).toString("utf-8");
  return text === "" ? undefined : JSON.parse(text);
}

function badRequest(res: ServerResponse, message: string): void {
  res.writeHead(400, { "Content-Type": "application/json" });
  res.end(JSON.stringify({ jsonrpc: "2.0", error: { code: -32000, message }, id: null }));
}

async function handleMcp(req: IncomingMessage, res: ServerResponse): Promise<void> {
  const header = req.headers["mcp-session-id"];
  const sessionId = Array.isArray(header) ? header[0] : header;
  const body = req.method === "POST" ? await readJson(req) : undefined;

  // Existing session: reuse its transport
  const existing = sessionId ? sessions.get(sessionId) : undefined;
  if (existing) {
    await existing.handleRequest(req, res, body);
    return;
  }

  // New initialize request: create transport and server
  if (!sessionId && req.method === "POST" && isInitializeRequest(body)) {
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
      enableJsonResponse: true,
      onsessioninitialized: (id) => {
        sessions.set(id, transport);
        log.info(`Session created: ${id}`);
      },
    });
    transport.onclose = () => {
      if (transport.sessionId && sessions.delete(transport.sessionId)) {
        log.info(`Session closed: ${transport.sessionId}`);
      }
    };

    await createServer(vault).connect(transport);
    await transport.handleRequest(req, res, body);
    return;
  }

  badRequest(res, "Bad Request: no valid session");
}

const httpServer = createHttpServer((req, res) => {
  const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);

  if (url.pathname !== "/mcp") {
    res.writeHead(404).end("Not Found");
    return;
  }

  handleMcp(req, res).catch((err: unknown) => {
    log.error("MCP request failed:", err);
    if (err instanceof SyntaxError && !res.headersSent) {
      badRequest(res, "Parse error: invalid JSON body");
    } else if (!res.headersSent) {
      res.writeHead(500).end("Internal Server Error");
    }
  });
});

httpServer.listen(config.port, () => {
  log.info(`folio-mcp HTTP server listening on http://localhost:${config.port}/mcp`);
  log.info(`Vault: ${config.vaultPath}`);
});
