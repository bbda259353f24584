/**
 * Streamable HTTP transport.
 *
 * Session model:
 *  - A client starts with a JSON-RPC `initialize` request to POST /mcp without an
 *    `mcp-session-id` header. A new transport + MCP Server pair is created and the SDK
 *    returns the generated session id in the response headers.
 *  - Every later request for that session carries the same `mcp-session-id` header.
 *  - When the transport closes, the session is evicted from the in-memory map.
 *
 * Endpoints:
 *  - POST /mcp    : JSON-RPC requests (initial + subsequent).
 *  - GET  /mcp    : Streaming channel of an existing session.
 *  - DELETE /mcp  : Session teardown.
 *  - GET  /health : Server, indexing and provider status.
 *
 * Security defaults: DNS rebinding protection is on and allowed hosts are limited to
 * localhost plus the bound host/port, unless configured otherwise.
 *
 * Keep this file a thin transport shim; tool logic lives in ../server.
 */
import express from "express";
import type { Server as HttpServer } from "node:http";
import { randomUUID } from "node:crypto";
import type { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { isInitializeRequest } from "@modelcontextprotocol/sdk/types.js";
import type { StatusManager } from "../status";

export interface HttpTransportOptions {
  port: number;
  host: string;
  /** host[:port] allow-list; defaults to localhost and the bound address. */
  allowedHosts?: string[];
  enableDnsRebindingProtection: boolean;
  status: StatusManager;
}

function sessionIdOf(req: express.Request): string | undefined {
  const header = req.headers["mcp-session-id"];
  return typeof header === "string" ? header : undefined;
}

/**
 * Start the Express listener. Each session owns its own MCP Server and transport.
 *
 * @param createServer Factory producing a new, unconnected MCP `Server` per session.
 * @returns The bound HTTP server, for shutdown.
 */
export async function startHttpTransport(
  createServer: () => Server,
  opts: HttpTransportOptions,
): Promise<HttpServer> {
  const { port, host, status } = opts;
  const app = express();
  app.use(express.json({ limit: "2mb" }));

  const allowedHosts =
    opts.allowedHosts ??
    Array.from(
      new Set([
        "127.0.0.1",
        `127.0.0.1:${port}`,
        "localhost",
        `localhost:${port}`,
        host,
        `${host}:${port}`,
      ]),
    );

  /** Active session transports by session id. */
  const transports: Record<string, StreamableHTTPServerTransport> = {};

  app.post("/mcp", async (req: express.Request, res: express.Response) => {
    try {
      const sessionId = sessionIdOf(req);
      let transport: StreamableHTTPServerTransport | undefined = sessionId
        ? transports[sessionId]
        : undefined;

      // New sessions only from an initialize request without a session header.
      if (!transport && !sessionId && isInitializeRequest(req.body)) {
        const created = new StreamableHTTPServerTransport({
          sessionIdGenerator: () => randomUUID(),
          onsessioninitialized: (sid: string) => {
            transports[sid] = created;
          },
          enableDnsRebindingProtection: opts.enableDnsRebindingProtection,
          allowedHosts,
        });

        const server = createServer();
        let closing = false;
        created.onclose = () => {
          if (closing) return;
          closing = true;
          if (created.sessionId) delete transports[created.sessionId];
          // server.close() closes the transport again; detach first.
          created.onclose = undefined;
          server.close().catch((e: unknown) => console.error("[HTTP] Error closing session server:", e));
        };
        await server.connect(created);
        transport = created;
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
      console.error("[HTTP] POST /mcp error:", err);
      if (!res.headersSent) {
        res.status(500).json({
          jsonrpc: "2.0",
          error: { code: -32603, message: "Internal server error" },
          id: null,
        });
      }
    }
  });

  /** GET and DELETE /mcp are only valid for an existing session. */
  const handleSessionRequest = async (req: express.Request, res: express.Response) => {
    const sessionId = sessionIdOf(req);
    const transport = sessionId ? transports[sessionId] : undefined;
    if (!transport) {
      res.status(400).send("Invalid or missing session ID");
      return;
    }
    try {
      await transport.handleRequest(req, res);
    } catch (err) {
      console.error(`[HTTP] ${req.method} /mcp error:`, err);
      if (!res.headersSent) res.status(500).send("Internal server error");
    }
  };

  app.get("/mcp", handleSessionRequest);
  app.delete("/mcp", handleSessionRequest);

  app.get("/health", (_req, res) => {
    res.json(status.getStatus());
  });

  return new Promise<HttpServer>((resolve, reject) => {
    const listener = app.listen(port, host, () => {
      console.error(`[HTTP] Streamable HTTP listening at http://${host}:${port}/mcp`);
      resolve(listener);
    });
    listener.on("error", reject);
  });
}
