import { APIConnectionTimeoutError } from "openai";
import { DegenerateInputError, UpstreamError, UpstreamTimeoutError, errorMessage } from "./errors";

/** Turns text into fixed-length vectors, one per input, in input order. */
export interface EmbeddingClient {
  embed(texts: readonly string[]): Promise<number[][]>;
}

/**
 * The slice of an OpenAI-style embeddings resource this module calls.
 * `new OpenAI(...).embeddings` satisfies it.
 */
export interface EmbeddingsEndpoint {
  create(
    body: { model: string; input: string[] },
    options?: { timeout?: number; maxRetries?: number },
  ): Promise<{ data: Array<{ embedding: number[]; index: number }> }>;
}

export interface RemoteEmbeddingOptions {
  model: string;
  /** Per-call deadline in milliseconds. */
  timeoutMs?: number;
}

/**
 * Embedding client backed by a remote OpenAI-style `/embeddings` endpoint.
 * A single instance is shared by the corpus loader and every request.
 */
export class RemoteEmbeddingClient implements EmbeddingClient {
  private readonly endpoint: EmbeddingsEndpoint;
  private readonly modelName: string;
  private readonly timeoutMs?: number;

  public constructor(endpoint: EmbeddingsEndpoint, opts: RemoteEmbeddingOptions) {
    this.endpoint = endpoint;
    this.modelName = opts.model;
    this.timeoutMs = opts.timeoutMs;
  }

  /** @returns Embedding model identifier sent with every request. */
  public getModelName(): string {
    return this.modelName;
  }

  /**
   * Embed a batch of texts.
   *
   * Response entries are placed by their `index` field; the endpoint must
   * return exactly one entry per input with indices `0..n-1`, otherwise the
   * call fails instead of silently misaligning vectors and texts.
   *
   * @throws {DegenerateInputError} If `texts` is empty (no request is made).
   * @throws {UpstreamError} On transport failure or a mismatched response.
   */
  public async embed(texts: readonly string[]): Promise<number[][]> {
    if (texts.length === 0) throw new DegenerateInputError("Embedding input is empty");

    let data: Array<{ embedding: number[]; index: number }>;
    try {
      const response = await this.endpoint.create(
        { model: this.modelName, input: [...texts] },
        { timeout: this.timeoutMs, maxRetries: 0 },
      );
      data = response.data;
    } catch (e) {
      if (e instanceof APIConnectionTimeoutError && this.timeoutMs != null) {
        throw new UpstreamTimeoutError("embedding", this.timeoutMs);
      }
      throw new UpstreamError("embedding", errorMessage(e), { cause: e });
    }

    if (data.length !== texts.length) {
      throw new UpstreamError(
        "embedding",
        `embedding length mismatch: sent ${texts.length} inputs, got ${data.length} vectors`,
      );
    }
    const out = new Array<number[] | undefined>(texts.length);
    for (const item of data) {
      if (!Number.isInteger(item.index) || item.index < 0 || item.index >= texts.length) {
        throw new UpstreamError("embedding", `embedding index ${item.index} out of range`);
      }
      if (out[item.index]) {
        throw new UpstreamError("embedding", `duplicate embedding index ${item.index}`);
      }
      out[item.index] = item.embedding;
    }
    return out.map((v, i) => {
      if (!v) throw new UpstreamError("embedding", `missing embedding for input ${i}`);
      return v;
    });
  }
}
