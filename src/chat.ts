import { errorMessage } from "./errors";
import type { ChatModel } from "./llm";
import { SUMMARIZE_HISTORY_INSTRUCTION, answerPrompt } from "./prompts";
import type { Retriever } from "./retrieval";
import type { ChatTurn, SamplingOptions } from "./types";

/** Inbound chat-completion request, already validated by the transport. */
export interface ChatRequest {
  model: string;
  messages: ChatTurn[];
  /** Ignored: the answer is always streamed. */
  stream?: boolean;
  sampling?: SamplingOptions;
}

/**
 * Per-request lifecycle. A request only advances after the previous stage
 * completed successfully.
 */
export type ChatStage = "received" | "summarizing" | "retrieving" | "answering" | "streaming" | "done";

/** Failure of one stage; the remaining stages never run. */
export class ChatStageError extends Error {
  public readonly stage: ChatStage;

  constructor(stage: ChatStage, cause: unknown) {
    super(`${stage} failed: ${errorMessage(cause)}`, { cause });
    this.name = "ChatStageError";
    this.stage = stage;
  }
}

/** Result of the pre-streaming stages, ready to be relayed to the caller. */
export interface AnswerStream {
  /** Standalone question synthesized from the history. */
  question: string;
  /** Formatted retrieval context given to the answering model. */
  context: string;
  /** Raw upstream event payloads; consuming them is the streaming stage. */
  frames: AsyncIterable<string>;
}

export interface ChatOrchestratorOptions {
  model: ChatModel;
  retriever: Retriever;
  /** Non-reasoning model used only for the summarization call. */
  summaryModel: string;
  summaryTimeoutMs: number;
  answerTimeoutMs: number;
}

/**
 * Numbered transcript of every non-system message; the number is the
 * message's index in the original list.
 */
export function buildTranscript(messages: readonly ChatTurn[]): string {
  let out = "";
  messages.forEach((msg, i) => {
    if (msg.role === "system") return;
    out += `${i}. [role=${msg.role}] ${msg.content}\n\n`;
  });
  return out;
}

/**
 * Turns one chat request into: a standalone question (summarization call),
 * a retrieval pass, and a streamed answer from the caller's own model with
 * the caller's own system prompt.
 */
export class ChatOrchestrator {
  private readonly model: ChatModel;
  private readonly retriever: Retriever;
  private readonly summaryModel: string;
  private readonly summaryTimeoutMs: number;
  private readonly answerTimeoutMs: number;

  public constructor(opts: ChatOrchestratorOptions) {
    this.model = opts.model;
    this.retriever = opts.retriever;
    this.summaryModel = opts.summaryModel;
    this.summaryTimeoutMs = opts.summaryTimeoutMs;
    this.answerTimeoutMs = opts.answerTimeoutMs;
  }

  /**
   * Run every stage up to opening the upstream answer stream.
   *
   * @param signal Aborts the in-flight upstream call (summarization or stream).
   * @throws {ChatStageError} Naming the stage that failed.
   */
  public async answer(request: ChatRequest, signal?: AbortSignal): Promise<AnswerStream> {
    const log = (stage: ChatStage, detail = "") =>
      console.error(`[RAG] chat ${stage}${detail ? `: ${detail}` : ""}`);

    log("received", `model=${request.model}, messages=${request.messages.length}`);
    const first = request.messages[0];
    const systemPrompt = first?.role === "system" ? first.content : "";
    const callerModel = request.model;

    log("summarizing", `model=${this.summaryModel}`);
    let question: string;
    try {
      const reply = await this.model.complete(
        {
          model: this.summaryModel,
          messages: [
            { role: "system", content: SUMMARIZE_HISTORY_INSTRUCTION },
            { role: "user", content: buildTranscript(request.messages) },
          ],
          sampling: request.sampling,
        },
        { timeoutMs: this.summaryTimeoutMs, signal },
      );
      question = reply.trim();
      if (!question) throw new Error("summarization produced an empty question");
    } catch (e) {
      throw new ChatStageError("summarizing", e);
    }

    log("retrieving", question);
    let context: string;
    try {
      context = await this.retriever.retrieve(question);
    } catch (e) {
      throw new ChatStageError("retrieving", e);
    }

    log("answering", `model=${callerModel}`);
    let upstream: AsyncIterable<string>;
    try {
      upstream = await this.model.stream(
        {
          model: callerModel,
          messages: [
            { role: "system", content: systemPrompt },
            { role: "user", content: answerPrompt(question, context) },
          ],
          sampling: request.sampling,
        },
        { timeoutMs: this.answerTimeoutMs, signal },
      );
    } catch (e) {
      throw new ChatStageError("answering", e);
    }

    return { question, context, frames: trackStreaming(upstream, log) };
  }
}

async function* trackStreaming(
  upstream: AsyncIterable<string>,
  log: (stage: ChatStage, detail?: string) => void,
): AsyncGenerator<string> {
  log("streaming");
  let frames = 0;
  try {
    for await (const frame of upstream) {
      frames++;
      yield frame;
    }
  } catch (e) {
    throw new ChatStageError("streaming", e);
  }
  log("done", `${frames} frames`);
}
