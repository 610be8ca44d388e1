import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ErrorCode,
  ListToolsRequestSchema,
  McpError,
} from "@modelcontextprotocol/sdk/types.js";
import { APP_VERSION } from "./config";
import type { Retriever } from "./retrieval";
import { RETRIEVE_TOOL_NAME, handleRetrieveTool, retrieveToolDefinition } from "./tools";

export interface ToolServerOptions {
  retriever: Retriever;
  /** Subject area named in the tool description. */
  topic: string;
}

/**
 * Factory for an MCP Server exposing the retrieval tool.
 *
 * A fresh server instance is created per transport session (streamable HTTP
 * may serve several clients); the corpus and clients behind `retriever` are
 * shared.
 *
 * Tool contract:
 *  retrieve_documents
 *    Input:  { question: string }
 *    Output: text content with the formatted retrieval context
 *    Errors: MethodNotFound for unknown tool names; retrieval failures are
 *            logged and returned as an error-flagged empty result.
 */
export function createToolServer(opts: ToolServerOptions): Server {
  const server = new Server(
    { name: "doc-qa-rag-server", version: APP_VERSION },
    { capabilities: { tools: {} } },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: [retrieveToolDefinition(opts.topic)],
  }));

  server.setRequestHandler(CallToolRequestSchema, async (req) => {
    if (req.params.name !== RETRIEVE_TOOL_NAME) {
      throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${req.params.name}`);
    }
    return handleRetrieveTool(req.params.arguments, opts.retriever);
  });

  return server;
}
