/**
 * Application entry point.
 *
 * High-level flow:
 * 1. Load environment configuration (.env supported).
 * 2. Build the OpenAI-compatible clients for chat, embeddings and rerank.
 * 3. Read the summary / title manifests and every content file, embed all
 *    summaries and build the immutable corpus index (any failure aborts).
 * 4. Wire retrieval + chat orchestration over that index.
 * 5. Serve either:
 *      - HTTP (default): POST /v1/chat/completions (SSE), /mcp, /health.
 *      - STDIO (TRANSPORT=stdio): the MCP retrieval tool only.
 *
 * Environment variables are documented in config.ts and .env.example.
 */
import OpenAI from "openai";
import type { Server as HttpServer } from "node:http";
import { ChatOrchestrator } from "./chat";
import { getConfig } from "./config";
import { loadCorpus } from "./corpus";
import { RemoteEmbeddingClient } from "./embeddings";
import { OpenAIChatModel } from "./llm";
import { createToolServer } from "./mcp-server";
import { HttpRerankClient } from "./rerank";
import { RetrievalOrchestrator } from "./retrieval";
import { statusManager } from "./status";
import { startHttpTransport } from "./transport/http";
import { startStdioTransport } from "./transport/stdio";

async function main(): Promise<HttpServer | undefined> {
  const config = getConfig();

  statusManager.setCorpusDir(config.MARKDOWN_DIR);
  statusManager.setModels({
    embedding: config.MODEL_EMB,
    rerank: config.MODEL_RERANK,
    summarization: config.MODEL_WITHOUT_THINKING,
  });

  const embeddings = new RemoteEmbeddingClient(
    new OpenAI({ apiKey: config.EMB_TOKEN, baseURL: config.EMB_BASE_URL, maxRetries: 0 }).embeddings,
    { model: config.MODEL_EMB, timeoutMs: config.EMB_TIMEOUT_MS },
  );
  const reranker = new HttpRerankClient({
    baseUrl: config.RERANK_BASE_URL,
    token: config.RERANK_TOKEN,
    model: config.MODEL_RERANK,
    timeoutMs: config.RERANK_TIMEOUT_MS,
  });
  const chatModel = new OpenAIChatModel(
    new OpenAI({ apiKey: config.LLM_TOKEN, baseURL: config.LLM_BASE_URL, maxRetries: 0 }),
  );

  // Blocks startup until every summary is embedded; the index is read-only afterwards.
  const corpus = await loadCorpus({
    summaryFile: config.SUMMARY_FILE,
    markdownDir: config.MARKDOWN_DIR,
    titleFile: config.TITLE_FILE,
    embeddings,
    batchSize: config.EMB_BATCH_SIZE,
    verbose: config.VERBOSE,
  });

  const retrieval = new RetrievalOrchestrator({
    corpus,
    embeddings,
    reranker,
    topEmb: config.TOP_EMB,
    topRerank: config.TOP_RERANK,
    verbose: config.VERBOSE,
  });
  const chat = new ChatOrchestrator({
    model: chatModel,
    retriever: retrieval,
    summaryModel: config.MODEL_WITHOUT_THINKING,
    summaryTimeoutMs: config.SUMMARY_TIMEOUT_MS,
    answerTimeoutMs: config.ANSWER_TIMEOUT_MS,
  });
  const createServer = () => createToolServer({ retriever: retrieval, topic: config.TOPIC });

  if (config.TRANSPORT === "stdio") {
    statusManager.markTransport("stdio");
    await startStdioTransport(createServer);
    return undefined;
  }
  statusManager.markTransport("http");
  return startHttpTransport({
    port: config.PORT,
    host: config.HOST,
    chat,
    createServer,
    allowedHosts: config.ALLOWED_HOSTS,
    enableDnsRebindingProtection: config.ENABLE_DNS_REBINDING_PROTECTION,
  });
}

main()
  .then((httpServer) => {
    const shutdown = (signal: string) => {
      console.error(`[RAG] ${signal} received, shutting down...`);
      if (!httpServer) process.exit(0);
      httpServer.close(() => process.exit(0));
    };
    process.on("SIGTERM", () => shutdown("SIGTERM"));
    process.on("SIGINT", () => shutdown("SIGINT"));
  })
  .catch((err: unknown) => {
    console.error("[RAG] Failed to start:", err);
    process.exit(1);
  });
