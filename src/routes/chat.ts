import express, { Request, Response, Router } from "express";
import { z } from "zod";
import { AnswerStream, ChatRequest, ChatStageError } from "../chat";
import { UpstreamError, UpstreamTimeoutError, errorMessage } from "../errors";
import type { SamplingOptions } from "../types";

const ChatRequestSchema = z.object({
  model: z.string().min(1),
  messages: z
    .array(
      z.object({
        role: z.enum(["system", "user", "assistant"]),
        content: z.string(),
      }),
    )
    .min(1),
  stream: z.boolean().nullish(),
  temperature: z.number().nullish(),
  top_p: z.number().nullish(),
  max_tokens: z.number().int().positive().nullish(),
  presence_penalty: z.number().nullish(),
  frequency_penalty: z.number().nullish(),
  stop: z.union([z.string(), z.array(z.string())]).nullish(),
  seed: z.number().int().nullish(),
});

type ChatRequestBody = z.infer<typeof ChatRequestSchema>;

/** What the route needs from the orchestrator. */
export interface ChatAnswerer {
  answer(request: ChatRequest, signal?: AbortSignal): Promise<AnswerStream>;
}

/** Minimal writable surface used to relay SSE frames. */
export interface SseSink {
  write(chunk: string): void;
  end(): void;
}

export interface ErrorBody {
  error: { message: string; type: string; stage?: string };
}

// OpenAI clients send explicit nulls for unset knobs; drop them.
function samplingFrom(body: ChatRequestBody): SamplingOptions | undefined {
  const sampling: SamplingOptions = {};
  if (body.temperature != null) sampling.temperature = body.temperature;
  if (body.top_p != null) sampling.top_p = body.top_p;
  if (body.max_tokens != null) sampling.max_tokens = body.max_tokens;
  if (body.presence_penalty != null) sampling.presence_penalty = body.presence_penalty;
  if (body.frequency_penalty != null) sampling.frequency_penalty = body.frequency_penalty;
  if (body.stop != null) sampling.stop = body.stop;
  if (body.seed != null) sampling.seed = body.seed;
  return Object.keys(sampling).length > 0 ? sampling : undefined;
}

function rootCause(err: unknown): unknown {
  return err instanceof ChatStageError ? err.cause : err;
}

/** HTTP status for a failure that happened before any SSE bytes were sent. */
export function statusFor(err: unknown): number {
  const cause = rootCause(err);
  if (cause instanceof UpstreamTimeoutError) return 504;
  if (cause instanceof UpstreamError) return 502;
  return 500;
}

export function errorBody(err: unknown): ErrorBody {
  const cause = rootCause(err);
  return {
    error: {
      message: errorMessage(err),
      type: cause instanceof Error ? cause.name : "Error",
      ...(err instanceof ChatStageError ? { stage: err.stage } : {}),
    },
  };
}

/**
 * Relay upstream payloads as `data: <frame>\n\n`, then `data: [DONE]\n\n`.
 * A failure mid-stream is reported as an `event: error` frame and the stream
 * ends without `[DONE]`.
 */
export async function relaySse(frames: AsyncIterable<string>, sink: SseSink): Promise<void> {
  try {
    for await (const frame of frames) sink.write(`data: ${frame}\n\n`);
    sink.write("data: [DONE]\n\n");
  } catch (e) {
    console.error(`[RAG] answer stream failed: ${errorMessage(e)}`);
    sink.write(`event: error\ndata: ${JSON.stringify(errorBody(e))}\n\n`);
  } finally {
    sink.end();
  }
}

/**
 * OpenAI-compatible `POST /chat/completions`. The answer is always streamed,
 * whatever the request's `stream` flag says.
 */
export function createChatRouter(chat: ChatAnswerer): Router {
  const router = Router();
  router.use(express.json({ limit: "10mb" }));

  router.post("/chat/completions", async (req: Request, res: Response) => {
    const parsed = ChatRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({
        error: { message: parsed.error.message, type: "invalid_request_error" },
      } satisfies ErrorBody);
      return;
    }
    const body = parsed.data;

    // Inbound connection gone before the answer finished: cancel upstream work.
    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableEnded) controller.abort();
    });

    let answer: AnswerStream;
    try {
      answer = await chat.answer(
        { model: body.model, messages: body.messages, stream: true, sampling: samplingFrom(body) },
        controller.signal,
      );
    } catch (e) {
      console.error(`[RAG] chat request failed: ${errorMessage(e)}`);
      if (!res.headersSent && !res.destroyed) res.status(statusFor(e)).json(errorBody(e));
      return;
    }

    res.status(200);
    res.setHeader("Content-Type", "text/event-stream");
    res.setHeader("Cache-Control", "no-cache");
    res.setHeader("Connection", "keep-alive");
    res.flushHeaders();
    await relaySse(answer.frames, {
      write: (chunk) => {
        if (!res.destroyed) res.write(chunk);
      },
      end: () => res.end(),
    });
  });

  return router;
}
