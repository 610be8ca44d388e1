import { afterEach, beforeEach, describe, expect, it } from "@jest/globals";
import express from "express";
import { UpstreamError, UpstreamTimeoutError } from "./errors";
import { HttpRerankClient } from "./rerank";
import { listen, RunningApp } from "./testing/upstream";

interface Captured {
  body: unknown;
  authorization: string | undefined;
}

describe("HttpRerankClient", () => {
  let upstream: RunningApp;
  let captured: Captured[];
  let reply: { status: number; body: string };
  let stall: "none" | "headers" | "body";

  beforeEach(async () => {
    captured = [];
    reply = { status: 200, body: "{}" };
    stall = "none";
    const app = express();
    app.use(express.json());
    app.post("/v1/rerank", (req, res) => {
      captured.push({ body: req.body, authorization: req.header("authorization") });
      if (stall === "headers") return;
      if (stall === "body") {
        res.status(200).type("application/json");
        res.write('{"results": [');
        return;
      }
      res.status(reply.status).type("application/json").send(reply.body);
    });
    upstream = await listen(app);
  });

  afterEach(async () => {
    await upstream.close();
  });

  const client = () =>
    new HttpRerankClient({
      baseUrl: `${upstream.baseUrl}/v1/`,
      token: "test-token",
      model: "rerank-test",
    });

  it("posts the rerank protocol and maps results to positions", async () => {
    reply.body = JSON.stringify({
      results: [
        { index: 2, relevance_score: 0.91 },
        { index: 0, relevance_score: 0.42 },
      ],
    });

    const results = await client().rerank("which invoice?", ["a", "b", "c"], 2);

    expect(results).toEqual([
      { position: 2, relevanceScore: 0.91 },
      { position: 0, relevanceScore: 0.42 },
    ]);
    expect(captured).toEqual([
      {
        body: { model: "rerank-test", query: "which invoice?", documents: ["a", "b", "c"], top_n: 2 },
        authorization: "Bearer test-token",
      },
    ]);
  });

  it("fails on a non-success status", async () => {
    reply = { status: 503, body: "{}" };

    const err = await client().rerank("q", ["a"], 1).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(UpstreamError);
    expect(err).toHaveProperty("status", 503);
    expect(err).toHaveProperty("message", "rerank upstream: 503 Service Unavailable");
  });

  it("fails on a body that is not JSON", async () => {
    reply.body = "not json";

    await expect(client().rerank("q", ["a"], 1)).rejects.toThrow(
      "rerank upstream: response body is not JSON",
    );
  });

  it("fails on a body that does not match the schema", async () => {
    reply.body = JSON.stringify({ results: [{ index: "0", relevance_score: 1 }] });

    await expect(client().rerank("q", ["a"], 1)).rejects.toThrow("malformed response");
  });

  it("fails on an index outside the submitted documents", async () => {
    reply.body = JSON.stringify({ results: [{ index: 3, relevance_score: 1 }] });

    await expect(client().rerank("q", ["a", "b"], 1)).rejects.toThrow(
      "result index 3 out of range for 2 documents",
    );
  });

  it("reports a stall before the response headers as a timeout", async () => {
    stall = "headers";
    const slow = new HttpRerankClient({
      baseUrl: `${upstream.baseUrl}/v1`,
      token: "test-token",
      model: "rerank-test",
      timeoutMs: 100,
    });

    await expect(slow.rerank("q", ["a"], 1)).rejects.toThrow(UpstreamTimeoutError);
  });

  it("reports a stall while reading the body as a timeout", async () => {
    stall = "body";
    const slow = new HttpRerankClient({
      baseUrl: `${upstream.baseUrl}/v1`,
      token: "test-token",
      model: "rerank-test",
      timeoutMs: 100,
    });

    const err = await slow.rerank("q", ["a"], 1).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(UpstreamTimeoutError);
    expect(err).toHaveProperty("message", "rerank upstream: no complete response within 100ms");
  });
});
