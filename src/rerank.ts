import fetch, { FetchError } from "node-fetch";
import { z } from "zod";
import { UpstreamError, UpstreamTimeoutError, errorMessage } from "./errors";
import type { RerankResult } from "./types";

/** Reorders a candidate set by relevance to a query. */
export interface RerankClient {
  /**
   * @returns Up to `topN` results, most relevant first. Each `position`
   * indexes the `documents` argument, not the corpus.
   */
  rerank(query: string, documents: readonly string[], topN: number): Promise<RerankResult[]>;
}

const RerankResponseSchema = z.object({
  results: z.array(
    z.object({
      index: z.number().int().nonnegative(),
      relevance_score: z.number(),
    }),
  ),
});

export interface HttpRerankOptions {
  /** Base URL of the OpenAI-style API; `/rerank` is appended. */
  baseUrl: string;
  token: string;
  model: string;
  /** Per-call deadline in milliseconds (0 disables). */
  timeoutMs?: number;
}

/**
 * Rerank client for the `{model, query, documents, top_n}` →
 * `{results: [{index, relevance_score}]}` protocol served by most
 * embedding servers next to `/embeddings`.
 */
export class HttpRerankClient implements RerankClient {
  private readonly url: string;
  private readonly token: string;
  private readonly modelName: string;
  private readonly timeoutMs: number;

  public constructor(opts: HttpRerankOptions) {
    this.url = `${opts.baseUrl.replace(/\/+$/, "")}/rerank`;
    this.token = opts.token;
    this.modelName = opts.model;
    this.timeoutMs = opts.timeoutMs ?? 0;
  }

  public getModelName(): string {
    return this.modelName;
  }

  public async rerank(
    query: string,
    documents: readonly string[],
    topN: number,
  ): Promise<RerankResult[]> {
    let status: number;
    let statusText: string;
    let body: string;
    try {
      const response = await fetch(this.url, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${this.token}`,
        },
        body: JSON.stringify({
          model: this.modelName,
          query,
          documents,
          top_n: topN,
        }),
        timeout: this.timeoutMs,
      });
      status = response.status;
      statusText = response.statusText;
      body = await response.text();
    } catch (e) {
      // Stalls before the headers and while reading the body.
      if (e instanceof FetchError && (e.type === "request-timeout" || e.type === "body-timeout")) {
        throw new UpstreamTimeoutError("rerank", this.timeoutMs);
      }
      throw new UpstreamError("rerank", errorMessage(e), { cause: e });
    }

    if (status < 200 || status >= 300) {
      throw new UpstreamError("rerank", `${status} ${statusText}`.trim(), { status });
    }

    let json: unknown;
    try {
      json = JSON.parse(body);
    } catch (e) {
      throw new UpstreamError("rerank", "response body is not JSON", { status, cause: e });
    }
    const parsed = RerankResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new UpstreamError("rerank", `malformed response: ${parsed.error.message}`, {
        status,
      });
    }

    return parsed.data.results.map((r) => {
      if (r.index >= documents.length) {
        throw new UpstreamError(
          "rerank",
          `result index ${r.index} out of range for ${documents.length} documents`,
          { status },
        );
      }
      return { position: r.index, relevanceScore: r.relevance_score };
    });
  }
}
