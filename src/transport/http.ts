/**
 * HTTP transport for the RAG server.
 *
 * Endpoints:
 *  - POST /v1/chat/completions : OpenAI-compatible chat endpoint; the answer
 *                                is streamed back as Server-Sent Events.
 *  - POST /mcp                 : MCP JSON-RPC requests (initialize + subsequent).
 *  - GET  /mcp, DELETE /mcp    : MCP streaming channel / session teardown.
 *  - GET  /health              : Status / readiness (delegates to `statusManager`).
 *
 * MCP session model:
 *  - A client starts with an `initialize` request to POST /mcp WITHOUT an
 *    `mcp-session-id` header; a transport + Server pair is created and the
 *    SDK returns the generated session id in the response headers.
 *  - Every later request for that session carries the same header.
 *  - When the transport or server closes, the session is evicted.
 *
 * Error handling:
 *  - Malformed / out-of-order MCP session usage => 400 with JSON-RPC error (-32000).
 *  - Uncaught internal MCP errors => 500 with JSON-RPC error (-32603).
 *  - Chat endpoint errors are documented in routes/chat.ts.
 */
import express from "express";
import type { Server as HttpServer } from "node:http";
import { randomUUID } from "node:crypto";
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { isInitializeRequest } from "@modelcontextprotocol/sdk/types.js";
import { ChatAnswerer, createChatRouter } from "../routes/chat";
import { StatusManager, statusManager } from "../status";

export interface HttpTransportOptions {
  port: number;
  host: string;
  chat: ChatAnswerer;
  /** Factory producing a fresh, unconnected MCP Server per session. */
  createServer: () => Server;
  /** Explicit host[:port] whitelist for /mcp; unset = local-only defaults. */
  allowedHosts?: string[];
  enableDnsRebindingProtection?: boolean;
  status?: StatusManager;
}

/** Build the express application without binding a port. */
export function createHttpApp(opts: HttpTransportOptions): express.Express {
  const app = express();
  const status = opts.status ?? statusManager;

  app.use("/v1", createChatRouter(opts.chat));

  const defaultAllowedHosts = Array.from(
    new Set<string>([
      "127.0.0.1",
      `127.0.0.1:${opts.port}`,
      "localhost",
      `localhost:${opts.port}`,
      opts.host,
      `${opts.host}:${opts.port}`,
    ]),
  );

  // sessionId -> transport
  const transports: Record<string, StreamableHTTPServerTransport> = {};

  app.post("/mcp", express.json({ limit: "2mb" }), async (req: express.Request, res: express.Response) => {
    try {
      const sessionId = req.header("mcp-session-id");
      let transport: StreamableHTTPServerTransport | undefined = sessionId
        ? transports[sessionId]
        : undefined;

      // Session creation path: only when no header AND the body is a valid initialize request.
      if (!transport && !sessionId && isInitializeRequest(req.body)) {
        const created: StreamableHTTPServerTransport = new StreamableHTTPServerTransport({
          sessionIdGenerator: () => randomUUID(),
          onsessioninitialized: (sid: string) => {
            transports[sid] = created;
          },
          enableDnsRebindingProtection: opts.enableDnsRebindingProtection ?? false,
          allowedHosts: opts.allowedHosts ?? defaultAllowedHosts,
        });
        transport = created;

        const server = opts.createServer();
        let closing = false;
        created.onclose = () => {
          if (closing) return; // server.close() closes the transport again
          closing = true;
          if (created.sessionId) delete transports[created.sessionId];
          created.onclose = undefined;
          server.close().catch((e: unknown) => console.error("[RAG] MCP server close failed:", e));
        };
        await server.connect(created);
      }

      if (!transport) {
        res.status(400).json({
          jsonrpc: "2.0",
          error: { code: -32000, message: "Bad Request: No valid session ID provided" },
          id: null,
        });
        return;
      }

      await transport.handleRequest(req, res, req.body);
    } catch (err) {
      console.error("[RAG] MCP HTTP POST error:", err);
      if (!res.headersSent) {
        res.status(500).json({
          jsonrpc: "2.0",
          error: { code: -32603, message: "Internal server error" },
          id: null,
        });
      }
    }
  });

  // GET /mcp and DELETE /mcp are only valid for an existing session.
  const handleSessionRequest = async (req: express.Request, res: express.Response) => {
    const sessionId = req.header("mcp-session-id");
    const transport = sessionId ? transports[sessionId] : undefined;
    if (!transport) {
      res.status(400).send("Invalid or missing session ID");
      return;
    }
    try {
      await transport.handleRequest(req, res);
    } catch (err) {
      console.error("[RAG] MCP HTTP session error:", err);
      if (!res.headersSent) res.status(500).end();
    }
  };

  app.get("/mcp", handleSessionRequest);
  app.delete("/mcp", handleSessionRequest);

  app.get("/health", (_req, res) => {
    res.json(status.getStatus());
  });

  return app;
}

/**
 * Bind the HTTP application.
 *
 * @returns The listening node server, once bound.
 */
export async function startHttpTransport(opts: HttpTransportOptions): Promise<HttpServer> {
  const app = createHttpApp(opts);
  return new Promise<HttpServer>((resolve, reject) => {
    const server = app.listen(opts.port, opts.host, () => {
      console.error(`[RAG] HTTP listening at http://${opts.host}:${opts.port} (chat: /v1/chat/completions, mcp: /mcp)`);
      resolve(server);
    });
    server.on("error", reject);
  });
}
