import { describe, expect, it, jest } from "@jest/globals";
import { UpstreamError } from "./errors";
import type { Retriever } from "./retrieval";
import { RETRIEVE_TOOL_NAME, handleRetrieveTool, retrieveToolDefinition } from "./tools";

describe("retrieveToolDefinition", () => {
  it("names the configured topic and requires a question", () => {
    const def = retrieveToolDefinition("财务");
    expect(def.name).toBe(RETRIEVE_TOOL_NAME);
    expect(def.description).toBe("当用户查询财务问题时调用此函数");
    expect(def.inputSchema.required).toEqual(["question"]);
  });
});

describe("handleRetrieveTool", () => {
  it("returns the formatted context as text content", async () => {
    const retrieve = jest.fn<Retriever["retrieve"]>(async () => "检索到以下1篇文档：\n\n第1篇文档：\n\nx\n\n");

    const result = await handleRetrieveTool({ question: "  报销流程？ " }, { retrieve });

    expect(retrieve).toHaveBeenCalledWith("报销流程？");
    expect(result).toEqual({
      content: [{ type: "text", text: "检索到以下1篇文档：\n\n第1篇文档：\n\nx\n\n" }],
    });
  });

  it("flags missing or blank questions without retrieving", async () => {
    const retrieve = jest.fn<Retriever["retrieve"]>(async () => "unused");

    await expect(handleRetrieveTool(undefined, { retrieve })).resolves.toEqual({ content: [], isError: true });
    await expect(handleRetrieveTool({ question: "   " }, { retrieve })).resolves.toEqual({
      content: [],
      isError: true,
    });
    expect(retrieve).not.toHaveBeenCalled();
  });

  it("flags a retrieval failure with an empty result", async () => {
    const retrieve = jest.fn<Retriever["retrieve"]>(async () => {
      throw new UpstreamError("embedding", "connect ECONNREFUSED");
    });

    await expect(handleRetrieveTool({ question: "q" }, { retrieve })).resolves.toEqual({
      content: [],
      isError: true,
    });
  });
});
