import { APP_VERSION } from "./config";
import type { MemoryEngine } from "./memory-engine";
import { CallToolRequestSchema, ListToolsRequestSchema, Server } from "./mcp-sdk";
import { TOOL_DEFINITIONS, callTool, type ToolDefaults } from "./tools";

/**
 * Build a fresh MCP Server bound to an existing engine. HTTP mode creates one
 * per session; all of them share the same engine, so the index is built once.
 */
export function createServer(engine: MemoryEngine, defaults: ToolDefaults): Server {
  const server = new Server(
    { name: "local-memory-rag", version: APP_VERSION },
    { capabilities: { tools: {} } },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: TOOL_DEFINITIONS }));

  server.setRequestHandler(CallToolRequestSchema, async (req) =>
    callTool(engine, req.params.name, req.params.arguments, defaults),
  );

  return server;
}
