import { z } from "zod";
import { errorMessage } from "./errors";
import { TOOL_QUESTION_DESCRIPTION, toolDescription } from "./prompts";
import type { Retriever } from "./retrieval";

export const RETRIEVE_TOOL_NAME = "retrieve_documents";

const RetrieveArgsSchema = z.object({
  question: z.string().trim().min(1),
});

/** Tool descriptor served by `tools/list`. */
export function retrieveToolDefinition(topic: string) {
  return {
    name: RETRIEVE_TOOL_NAME,
    description: toolDescription(topic),
    inputSchema: {
      type: "object" as const,
      properties: {
        question: {
          type: "string",
          description: TOOL_QUESTION_DESCRIPTION,
        },
      },
      required: ["question"],
    },
  };
}

export type ToolResult = {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
};

/**
 * Tool-call entry point: retrieval only, against a question the calling
 * model has already made standalone. Failures are logged and yield an
 * error-flagged result with no content.
 */
export async function handleRetrieveTool(args: unknown, retriever: Retriever): Promise<ToolResult> {
  const parsed = RetrieveArgsSchema.safeParse(args ?? {});
  if (!parsed.success) {
    console.error(`[RAG] ${RETRIEVE_TOOL_NAME}: invalid arguments: ${parsed.error.message}`);
    return { content: [], isError: true };
  }
  try {
    const context = await retriever.retrieve(parsed.data.question);
    return { content: [{ type: "text", text: context }] };
  } catch (e) {
    console.error(`[RAG] ${RETRIEVE_TOOL_NAME} failed: ${errorMessage(e)}`);
    return { content: [], isError: true };
  }
}
