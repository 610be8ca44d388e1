import dotenv from "dotenv";
import fsSync from "node:fs";
import path from "node:path";
// Version comes straight from package.json (tsconfig "resolveJsonModule": true)
import pkg from "../package.json";

// Centralized single dotenv.config() call.
// Compiled code runs from dist/src/, sources from src/; both look for the
// project-root .env first and otherwise fall back to the working directory.
(() => {
  for (const candidate of [
    path.resolve(__dirname, "../.env"),
    path.resolve(__dirname, "../../.env"),
  ]) {
    if (fsSync.existsSync(candidate)) {
      dotenv.config({ path: candidate });
      return;
    }
  }
  dotenv.config();
})();

/** Application version sourced from package.json. */
export const APP_VERSION: string = pkg.version;

export interface Config {
  PORT: number;
  HOST: string;
  /** 'http' (chat endpoint + MCP + health) or 'stdio' (MCP tool only). */
  TRANSPORT: string;
  LLM_BASE_URL: string;
  LLM_TOKEN: string;
  EMB_BASE_URL: string;
  EMB_TOKEN: string;
  RERANK_BASE_URL: string;
  RERANK_TOKEN: string;
  /** Model used only to condense chat history into a standalone question. */
  MODEL_WITHOUT_THINKING: string;
  MODEL_EMB: string;
  MODEL_RERANK: string;
  /** Candidates kept after cosine ranking. */
  TOP_EMB: number;
  /** Documents kept after reranking. */
  TOP_RERANK: number;
  SUMMARY_FILE: string;
  MARKDOWN_DIR: string;
  TITLE_FILE: string;
  /** Subject area named in the MCP tool description. */
  TOPIC: string;
  EMB_BATCH_SIZE: number;
  SUMMARY_TIMEOUT_MS: number;
  ANSWER_TIMEOUT_MS: number;
  EMB_TIMEOUT_MS: number;
  RERANK_TIMEOUT_MS: number;
  VERBOSE: boolean;
  ALLOWED_HOSTS: string[] | undefined;
  ENABLE_DNS_REBINDING_PROTECTION: boolean;
}

type Env = Record<string, string | undefined>;

function readString(env: Env, name: string, fallback: string): string {
  return env[name]?.trim() || fallback;
}

// Positive integer knob; anything unparsable keeps the default.
function readPositiveInt(env: Env, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const n = Number(raw);
  return Number.isFinite(n) && n > 0 ? Math.floor(n) : fallback;
}

// Tolerant truthy parsing (supports several common forms).
function readFlag(env: Env, name: string, fallback: boolean): boolean {
  const v = (env[name] ?? "").trim().toLowerCase();
  if (!v) return fallback;
  return v === "1" || v === "true" || v === "yes" || v === "on";
}

export function getConfig(env: Env = process.env): Config {
  const EMB_BASE_URL = readString(env, "EMB_BASE_URL", "http://127.0.0.1:8080/v1");
  // Empty tokens are kept as-is.
  const EMB_TOKEN = env.EMB_TOKEN?.trim() ?? "";
  const MARKDOWN_DIR = readString(env, "MARKDOWN_DIR", "./markdown");

  return {
    PORT: readPositiveInt(env, "PORT", 13000),
    HOST: readString(env, "HOST", "0.0.0.0"),
    TRANSPORT: readString(env, "TRANSPORT", "http").toLowerCase(),
    LLM_BASE_URL: readString(env, "LLM_BASE_URL", "http://127.0.0.1:8080/v1"),
    LLM_TOKEN: env.LLM_TOKEN?.trim() ?? "",
    EMB_BASE_URL,
    EMB_TOKEN,
    RERANK_BASE_URL: readString(env, "RERANK_BASE_URL", EMB_BASE_URL),
    RERANK_TOKEN: env.RERANK_TOKEN?.trim() || EMB_TOKEN,
    MODEL_WITHOUT_THINKING: readString(env, "MODEL_WITHOUT_THINKING", "Qwen/Qwen2.5-7B-Instruct"),
    MODEL_EMB: readString(env, "MODEL_EMB", "BAAI/bge-m3"),
    MODEL_RERANK: readString(env, "MODEL_RERANK", "BAAI/bge-reranker-v2-m3"),
    TOP_EMB: readPositiveInt(env, "TOP_EMB", 25),
    TOP_RERANK: readPositiveInt(env, "TOP_RERANK", 5),
    SUMMARY_FILE: readString(env, "SUMMARY_FILE", "./summary.txt"),
    MARKDOWN_DIR,
    TITLE_FILE: readString(env, "TITLE_FILE", path.join(MARKDOWN_DIR, "files.txt")),
    TOPIC: readString(env, "TOPIC", "所有"),
    EMB_BATCH_SIZE: readPositiveInt(env, "EMB_BATCH_SIZE", 32),
    SUMMARY_TIMEOUT_MS: readPositiveInt(env, "SUMMARY_TIMEOUT_MS", 60_000),
    ANSWER_TIMEOUT_MS: readPositiveInt(env, "ANSWER_TIMEOUT_MS", 300_000),
    EMB_TIMEOUT_MS: readPositiveInt(env, "EMB_TIMEOUT_MS", 60_000),
    RERANK_TIMEOUT_MS: readPositiveInt(env, "RERANK_TIMEOUT_MS", 60_000),
    VERBOSE: readFlag(env, "VERBOSE", false),
    // Comma-separated host[:port] whitelist for the /mcp endpoint; unset = local defaults.
    ALLOWED_HOSTS: env.ALLOWED_HOSTS?.split(",")
      .map((s) => s.trim())
      .filter(Boolean),
    ENABLE_DNS_REBINDING_PROTECTION: readFlag(env, "ENABLE_DNS_REBINDING_PROTECTION", false),
  };
}
