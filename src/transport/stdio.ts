import type { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

/**
 * Serve MCP over stdin/stdout. Anything else written to stdout corrupts the
 * JSON-RPC stream, which is why all logging goes to stderr.
 *
 * @param createServer Factory returning a new, unconnected MCP Server instance.
 * @returns The connected server, for shutdown.
 */
export async function startStdioTransport(createServer: () => Server): Promise<Server> {
  const server = createServer();
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("[MCP] Listening on stdio.");
  return server;
}
