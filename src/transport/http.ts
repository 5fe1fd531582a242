/**
 * Streamable HTTP transport for the memory server.
 *
 * Session model:
 *  - A client starts with a JSON-RPC `initialize` request to POST /mcp WITHOUT
 *    an `mcp-session-id` header. A new transport + MCP Server pair is created
 *    and the SDK returns the generated session id (UUID v4) in a header.
 *  - Every later request for that session carries the same `mcp-session-id`.
 *  - When the transport closes, the session is dropped from the in-memory map.
 *
 * Endpoints:
 *  - POST /mcp    : JSON-RPC requests (initial + subsequent).
 *  - GET  /mcp    : Streaming / follow-up channel (delegated to transport).
 *  - DELETE /mcp  : Session teardown.
 *  - GET  /health : Engine status snapshot.
 *
 * Environment variables:
 *  MCP_PORT: Port to bind (default 3000)
 *  HOST: Interface to bind (default 127.0.0.1)
 *  ALLOWED_HOSTS: Comma-separated host[:port] whitelist; defaults to local-only hosts.
 *  ENABLE_DNS_REBINDING_PROTECTION: "false" disables it (NOT recommended).
 *
 * Keep this file a thin transport shim; tool logic lives in tools.ts.
 */
import express from "express";
import { randomUUID } from "node:crypto";
import { Server, StreamableHTTPServerTransport, isInitializeRequest } from "../mcp-sdk";
import type { StatusManager } from "../status";

/**
 * Bind the Express app and wire per-session MCP transports.
 *
 * @param createServer Factory producing a new, unconnected MCP `Server` for each session.
 * @param status Source of the /health payload.
 * @returns Resolves once the HTTP listener is bound.
 */
export async function startHttpTransport(createServer: () => Server, status: StatusManager) {
  status.markTransport("http");
  const app = express();
  app.use(express.json({ limit: "2mb" }));

  const port = Number(process.env.MCP_PORT ?? 3000);
  const host = (process.env.HOST ?? "127.0.0.1").trim();
  const defaultAllowedHosts = Array.from(
    new Set<string>([
      "127.0.0.1",
      `127.0.0.1:${port}`,
      "localhost",
      `localhost:${port}`,
      host,
      `${host}:${port}`,
    ]),
  );
  const allowedHosts = (process.env.ALLOWED_HOSTS ?? defaultAllowedHosts.join(","))
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
  const enableDnsRebindingProtection =
    (process.env.ENABLE_DNS_REBINDING_PROTECTION ?? "true") !== "false";

  /** Active session transports keyed by session id. */
  const transports = new Map<string, StreamableHTTPServerTransport>();

  const sessionIdOf = (req: express.Request): string | undefined => {
    const header = req.headers["mcp-session-id"];
    return typeof header === "string" ? header : undefined;
  };

  app.post("/mcp", async (req, res) => {
    try {
      const sessionId = sessionIdOf(req);
      let transport = sessionId ? transports.get(sessionId) : undefined;

      // Session creation path: only when no header AND the body is an initialize request.
      if (!transport && !sessionId && isInitializeRequest(req.body)) {
        const created: StreamableHTTPServerTransport = new StreamableHTTPServerTransport({
          sessionIdGenerator: () => randomUUID(),
          onsessioninitialized: (sid: string) => {
            transports.set(sid, created);
          },
          enableDnsRebindingProtection,
          allowedHosts,
        });

        const server = createServer();
        let closing = false;
        created.onclose = () => {
          if (closing) return;
          closing = true;
          if (created.sessionId) transports.delete(created.sessionId);
          // server.close() closes the transport again, which would re-enter this handler.
          created.onclose = undefined;
          server.close().catch((e: unknown) => console.error("[memory] Failed to close MCP session:", e));
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
      console.error("[memory] HTTP POST error:", err);
      if (!res.headersSent) {
        res.status(500).json({
          jsonrpc: "2.0",
          error: { code: -32603, message: "Internal server error" },
          id: null,
        });
      }
    }
  });

  /** GET and DELETE /mcp only make sense for an existing session. */
  const handleSessionRequest = async (req: express.Request, res: express.Response) => {
    const sessionId = sessionIdOf(req);
    const transport = sessionId ? transports.get(sessionId) : undefined;
    if (!transport) {
      res.status(400).send("Invalid or missing session ID");
      return;
    }
    await transport.handleRequest(req, res);
  };

  app.get("/mcp", handleSessionRequest);
  app.delete("/mcp", handleSessionRequest);

  app.get("/health", (_req, res) => {
    res.json(status.getStatus());
  });

  await new Promise<void>((resolve) => {
    app.listen(port, host, () => {
      console.error(`[memory] Streamable HTTP listening at http://${host}:${port}/mcp`);
      resolve();
    });
  });
}
