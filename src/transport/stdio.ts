import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

/**
 * Serve the retrieval tool over stdio (no chat endpoint in this mode).
 * Logs go to stderr so stdout carries only JSON-RPC.
 *
 * @param createServer Factory returning a new, unconnected MCP Server instance.
 */
export async function startStdioTransport(createServer: () => Server): Promise<void> {
  const server = createServer();
  await server.connect(new StdioServerTransport());
  console.error("[RAG] MCP stdio transport connected");
}
