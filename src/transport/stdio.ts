import { Server, StdioServerTransport } from "../mcp-sdk";
import type { StatusManager } from "../status";

/**
 * Start the MCP stdio transport.
 *
 * @param createServer Factory returning a new, unconnected MCP Server instance.
 * @returns Promise resolving once the server is connected over stdio.
 */
export async function startStdioTransport(createServer: () => Server, status: StatusManager) {
  status.markTransport("stdio");
  const server = createServer();
  const transport = new StdioServerTransport();
  await server.connect(transport);
}
