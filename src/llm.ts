import { createParser } from "eventsource-parser";
import fetch from "node-fetch";
import type OpenAI from "openai";
import { APIError } from "openai";
import { UpstreamError, UpstreamTimeoutError, errorMessage } from "./errors";
import type { ChatTurn, SamplingOptions } from "./types";

export interface CompletionRequest {
  model: string;
  messages: ChatTurn[];
  sampling?: SamplingOptions;
}

export interface CallOptions {
  /** Deadline for the whole call, streaming included. */
  timeoutMs?: number;
  /** Caller-side cancellation (e.g. the inbound connection closed). */
  signal?: AbortSignal;
}

/**
 * Generic chat-completion interface so the orchestrator never touches a
 * provider SDK directly.
 */
export interface ChatModel {
  /** Non-streaming completion; resolves with the first choice's text. */
  complete(request: CompletionRequest, options?: CallOptions): Promise<string>;
  /**
   * Streaming completion. Resolves once the upstream has accepted the
   * request; the iterable then yields each raw event payload (one JSON chunk
   * per frame) until the upstream ends the stream.
   */
  stream(request: CompletionRequest, options?: CallOptions): Promise<AsyncIterable<string>>;
}

/**
 * One AbortController per call, fired by either the deadline or the caller's
 * signal. Remembers which one fired so errors can be classified.
 */
class Deadline {
  private readonly controller = new AbortController();
  private readonly timeoutMs?: number;
  private readonly parent?: AbortSignal;
  private readonly timer?: NodeJS.Timeout;
  private expired = false;
  private readonly onParentAbort = () => this.controller.abort();

  public constructor(timeoutMs?: number, parent?: AbortSignal) {
    this.timeoutMs = timeoutMs;
    this.parent = parent;
    if (timeoutMs != null && timeoutMs > 0) {
      this.timer = setTimeout(() => {
        this.expired = true;
        this.controller.abort();
      }, timeoutMs);
    }
    if (parent?.aborted) this.controller.abort();
    else parent?.addEventListener("abort", this.onParentAbort, { once: true });
  }

  public get signal(): AbortSignal {
    return this.controller.signal;
  }

  public clear(): void {
    if (this.timer) clearTimeout(this.timer);
    this.parent?.removeEventListener("abort", this.onParentAbort);
  }

  public toUpstreamError(e: unknown): UpstreamError {
    if (e instanceof UpstreamError) return e;
    if (this.expired && this.timeoutMs != null) return new UpstreamTimeoutError("llm", this.timeoutMs);
    if (this.parent?.aborted) return new UpstreamError("llm", "request aborted by caller", { cause: e });
    const status = e instanceof APIError ? e.status : undefined;
    return new UpstreamError("llm", errorMessage(e), { status, cause: e });
  }
}

function toMessages(turns: ChatTurn[]) {
  return turns.map((t) => ({ role: t.role, content: t.content }));
}

/**
 * Yield each SSE `data:` payload exactly as the upstream sent it, up to the
 * `[DONE]` sentinel or the end of the body.
 */
async function* relayFrames(
  body: NodeJS.ReadableStream,
  deadline: Deadline,
): AsyncGenerator<string> {
  const pending: string[] = [];
  let done = false;
  const parser = createParser((event) => {
    if (event.type !== "event" || done) return;
    if (event.data === "[DONE]") done = true;
    else pending.push(event.data);
  });
  const decoder = new TextDecoder();
  try {
    for await (const chunk of body) {
      parser.feed(typeof chunk === "string" ? chunk : decoder.decode(chunk, { stream: true }));
      yield* pending.splice(0);
      if (done) break;
    }
    if (deadline.signal.aborted) throw new Error("stream aborted");
  } catch (e) {
    throw deadline.toUpstreamError(e);
  } finally {
    deadline.clear();
  }
}

/**
 * {@link ChatModel} over an OpenAI-compatible `/chat/completions` endpoint.
 * SDK retries are disabled per call; failures surface immediately.
 */
export class OpenAIChatModel implements ChatModel {
  private readonly client: OpenAI;

  public constructor(client: OpenAI) {
    this.client = client;
  }

  public async complete(request: CompletionRequest, options: CallOptions = {}): Promise<string> {
    const deadline = new Deadline(options.timeoutMs, options.signal);
    try {
      const response = await this.client.chat.completions.create(
        {
          ...request.sampling,
          model: request.model,
          messages: toMessages(request.messages),
          stream: false,
        },
        { signal: deadline.signal, maxRetries: 0 },
      );
      const content = response.choices[0]?.message?.content;
      if (content == null) throw new UpstreamError("llm", "completion has no message content");
      return content;
    } catch (e) {
      throw deadline.toUpstreamError(e);
    } finally {
      deadline.clear();
    }
  }

  /**
   * Posts to the client's endpoint with its API key, but reads the SSE body
   * itself: the SDK would re-encode each chunk, and frames must pass through
   * byte-for-byte.
   */
  public async stream(
    request: CompletionRequest,
    options: CallOptions = {},
  ): Promise<AsyncIterable<string>> {
    const deadline = new Deadline(options.timeoutMs, options.signal);
    try {
      const response = await fetch(`${this.client.baseURL.replace(/\/+$/, "")}/chat/completions`, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Accept: "text/event-stream",
          Authorization: `Bearer ${this.client.apiKey}`,
        },
        body: JSON.stringify({
          ...request.sampling,
          model: request.model,
          messages: toMessages(request.messages),
          stream: true,
        }),
        signal: deadline.signal,
      });
      if (!response.ok) {
        throw new UpstreamError("llm", `${response.status} ${response.statusText}`, {
          status: response.status,
        });
      }
      return relayFrames(response.body, deadline);
    } catch (e) {
      deadline.clear();
      throw deadline.toUpstreamError(e);
    }
  }
}
