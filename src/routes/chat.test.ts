import { afterEach, beforeEach, describe, expect, it, jest } from "@jest/globals";
import express from "express";
import fetch from "node-fetch";
import { ChatStageError } from "../chat";
import { UpstreamError, UpstreamTimeoutError } from "../errors";
import { listen, RunningApp } from "../testing/upstream";
import { ChatAnswerer, createChatRouter, errorBody, relaySse, statusFor } from "./chat";

async function* framesOf(...frames: string[]): AsyncGenerator<string> {
  for (const f of frames) yield f;
}

async function* failingAfter(frame: string, err: Error): AsyncGenerator<string> {
  yield frame;
  throw err;
}

function recordingSink() {
  const chunks: string[] = [];
  let ended = 0;
  return {
    chunks,
    ended: () => ended,
    write: (chunk: string) => {
      chunks.push(chunk);
    },
    end: () => {
      ended++;
    },
  };
}

describe("relaySse", () => {
  it("frames each payload and terminates with [DONE]", async () => {
    const sink = recordingSink();
    await relaySse(framesOf('{"a":1}', '{"a":2}'), sink);
    expect(sink.chunks).toEqual(['data: {"a":1}\n\n', 'data: {"a":2}\n\n', "data: [DONE]\n\n"]);
    expect(sink.ended()).toBe(1);
  });

  it("ends with an error event instead of [DONE] when the stream fails", async () => {
    const sink = recordingSink();
    await relaySse(failingAfter("x", new ChatStageError("streaming", new Error("reset"))), sink);
    expect(sink.chunks).toEqual([
      "data: x\n\n",
      'event: error\ndata: {"error":{"message":"streaming failed: reset","type":"Error","stage":"streaming"}}\n\n',
    ]);
    expect(sink.ended()).toBe(1);
  });
});

describe("statusFor / errorBody", () => {
  it("maps upstream failures to gateway statuses", () => {
    expect(statusFor(new ChatStageError("answering", new UpstreamTimeoutError("llm", 10)))).toBe(504);
    expect(statusFor(new ChatStageError("retrieving", new UpstreamError("rerank", "x")))).toBe(502);
    expect(statusFor(new UpstreamError("embedding", "x"))).toBe(502);
    expect(statusFor(new Error("bug"))).toBe(500);
  });

  it("names the failed stage and the root error type", () => {
    expect(errorBody(new ChatStageError("retrieving", new UpstreamError("rerank", "503")))).toEqual({
      error: {
        message: "retrieving failed: rerank upstream: 503",
        type: "UpstreamError",
        stage: "retrieving",
      },
    });
    expect(errorBody("plain")).toEqual({ error: { message: "plain", type: "Error" } });
  });
});

describe("POST /v1/chat/completions", () => {
  let server: RunningApp;
  let answer: jest.Mock<ChatAnswerer["answer"]>;

  beforeEach(async () => {
    answer = jest.fn<ChatAnswerer["answer"]>(async () => ({
      question: "q",
      context: "c",
      frames: framesOf("f1", "f2"),
    }));
    const app = express();
    app.use("/v1", createChatRouter({ answer }));
    server = await listen(app);
  });

  afterEach(async () => {
    await server.close();
  });

  const post = (body: unknown) =>
    fetch(`${server.baseUrl}/v1/chat/completions`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
    });

  it("streams the answer as server-sent events", async () => {
    const res = await post({
      model: "caller-model",
      messages: [{ role: "user", content: "hi" }],
      stream: false,
      temperature: 0.5,
      top_p: null,
    });

    expect(res.status).toBe(200);
    expect(res.headers.get("content-type")).toBe("text/event-stream");
    expect(res.headers.get("cache-control")).toBe("no-cache");
    await expect(res.text()).resolves.toBe("data: f1\n\ndata: f2\n\ndata: [DONE]\n\n");

    expect(answer).toHaveBeenCalledTimes(1);
    const [request, signal] = answer.mock.calls[0];
    expect(request).toEqual({
      model: "caller-model",
      messages: [{ role: "user", content: "hi" }],
      stream: true,
      sampling: { temperature: 0.5 },
    });
    expect(signal).toBeInstanceOf(AbortSignal);
  });

  it("rejects a request without messages", async () => {
    const res = await post({ model: "m", messages: [] });

    expect(res.status).toBe(400);
    const body = await res.json();
    expect(body).toHaveProperty("error.type", "invalid_request_error");
    expect(answer).not.toHaveBeenCalled();
  });

  it("rejects an unknown role", async () => {
    const res = await post({ model: "m", messages: [{ role: "tool", content: "x" }] });
    expect(res.status).toBe(400);
  });

  it("returns 502 naming the stage when an upstream fails before streaming", async () => {
    answer.mockRejectedValueOnce(
      new ChatStageError("retrieving", new UpstreamError("rerank", "503 Service Unavailable", { status: 503 })),
    );

    const res = await post({ model: "m", messages: [{ role: "user", content: "hi" }] });

    expect(res.status).toBe(502);
    await expect(res.json()).resolves.toEqual({
      error: {
        message: "retrieving failed: rerank upstream: 503 Service Unavailable",
        type: "UpstreamError",
        stage: "retrieving",
      },
    });
  });

  it("returns 504 when the summarization call times out", async () => {
    answer.mockRejectedValueOnce(new ChatStageError("summarizing", new UpstreamTimeoutError("llm", 100)));

    const res = await post({ model: "m", messages: [{ role: "user", content: "hi" }] });

    expect(res.status).toBe(504);
    await expect(res.json()).resolves.toHaveProperty("error.stage", "summarizing");
  });

  it("reports a mid-stream failure as an error event", async () => {
    answer.mockResolvedValueOnce({
      question: "q",
      context: "c",
      frames: failingAfter("f1", new ChatStageError("streaming", new UpstreamError("llm", "reset"))),
    });

    const res = await post({ model: "m", messages: [{ role: "user", content: "hi" }] });

    expect(res.status).toBe(200);
    await expect(res.text()).resolves.toBe(
      "data: f1\n\n" +
        'event: error\ndata: {"error":{"message":"streaming failed: llm upstream: reset","type":"UpstreamError","stage":"streaming"}}\n\n',
    );
  });
});
