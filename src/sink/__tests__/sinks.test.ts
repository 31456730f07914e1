import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { testConfig } from "../../__tests__/support/fakeBrowser";
import { RunResult } from "../../types";
import { HttpSink } from "../httpSink";
import { createSink } from "../index";
import { LocalJsonlSink } from "../localJsonlSink";
import { NoopSink } from "../baseSink";
import { ArticleSavedEvent } from "../types";

const EVENT: ArticleSavedEvent = {
  runId: "run_test",
  id: "Debtrepayment_0123456789",
  title: "Debt repayment",
  address: "https://kb.test/content/debt",
  wordCount: 6,
  storagePath: "/tmp/corpus/Debtrepayment_0123456789.json",
  indexed: true,
  savedAt: "2024-06-01T08:00:00.000Z",
};

const RESULT: RunResult = {
  runId: "run_test",
  succeeded: 1,
  failed: 0,
  skipped: 0,
  elapsedMs: 12,
  articles: [],
  warnings: [],
  exports: [],
};

function response(status: number, text = "") {
  return { ok: status >= 200 && status < 300, status, text: async () => text };
}

describe("HttpSink", () => {
  it("posts events with an idempotency key and bearer token", async () => {
    const fetchFn = vi.fn(async (_url: string, _init: { headers: Record<string, string>; body: string }) => response(202));
    const sink = new HttpSink({ endpoint: "https://sink.test/events", token: "test-token", fetchFn, retryDelayMs: 0 });

    await sink.publishArticleSaved([EVENT]);

    expect(fetchFn).toHaveBeenCalledTimes(1);
    const [url, init] = fetchFn.mock.calls[0];
    expect(url).toBe("https://sink.test/events");
    expect(init.headers["Idempotency-Key"]).toBe("article_saved:Debtrepayment_0123456789");
    expect(init.headers.Authorization).toBe("Bearer test-token");
    expect(JSON.parse(init.body)).toMatchObject({ event: "article_saved", items: [EVENT] });
  });

  it("retries transient statuses", async () => {
    const fetchFn = vi
      .fn(async () => response(200))
      .mockResolvedValueOnce(response(503, "busy"))
      .mockResolvedValueOnce(response(429, "slow down"));
    const sink = new HttpSink({ endpoint: "https://sink.test/events", fetchFn, retryDelayMs: 0 });

    await sink.publishRunResult(RESULT);

    expect(fetchFn).toHaveBeenCalledTimes(3);
  });

  it("gives up once the retries are spent", async () => {
    const fetchFn = vi.fn(async () => response(503, "busy"));
    const sink = new HttpSink({ endpoint: "https://sink.test/events", fetchFn, maxRetries: 2, retryDelayMs: 0 });

    await expect(sink.publishRunResult(RESULT)).rejects.toThrow(
      "HTTP sink exhausted retries after 3 attempt(s): HTTP sink transient error 503: busy",
    );
    expect(fetchFn).toHaveBeenCalledTimes(3);
  });

  it("retries a request that failed to reach the endpoint", async () => {
    const fetchFn = vi
      .fn(async () => response(200))
      .mockRejectedValueOnce(new Error("socket hang up"));
    const sink = new HttpSink({ endpoint: "https://sink.test/events", fetchFn, retryDelayMs: 0 });

    await sink.publishArticleSaved([EVENT]);

    expect(fetchFn).toHaveBeenCalledTimes(2);
  });

  it("fails at once on a client error", async () => {
    const fetchFn = vi.fn(async () => response(400, "bad payload"));
    const sink = new HttpSink({ endpoint: "https://sink.test/events", fetchFn, retryDelayMs: 0 });

    await expect(sink.publishRunResult(RESULT)).rejects.toThrow("HTTP sink permanent error 400: bad payload");
    expect(fetchFn).toHaveBeenCalledTimes(1);
  });

  it("requires an endpoint", async () => {
    await expect(new HttpSink().publishRunResult(RESULT)).rejects.toThrow("HTTP sink is not configured");
  });
});

describe("LocalJsonlSink", () => {
  let workDir: string;

  beforeEach(() => {
    workDir = fs.mkdtempSync(path.join(os.tmpdir(), "kb-sink-"));
  });

  afterEach(() => {
    fs.rmSync(workDir, { recursive: true, force: true });
  });

  it("appends one JSON line per event", async () => {
    const manifests = path.join(workDir, "manifests");
    const sink = new LocalJsonlSink(testConfig({ outputDirs: { exports: workDir, manifests } }));

    await sink.publishArticleSaved([EVENT]);
    await sink.publishArticleSaved([{ ...EVENT, id: "second" }]);
    await sink.publishRunResult(RESULT);

    const articleLines = fs.readFileSync(path.join(manifests, "articles.jsonl"), "utf-8").trim().split("\n");
    expect(articleLines.map((line) => JSON.parse(line).id)).toEqual(["Debtrepayment_0123456789", "second"]);
    const runLines = fs.readFileSync(path.join(manifests, "runs.jsonl"), "utf-8").trim().split("\n");
    expect(runLines).toHaveLength(1);
    expect(JSON.parse(runLines[0])).toMatchObject({ runId: "run_test", succeeded: 1 });
  });
});

describe("createSink", () => {
  it("selects the sink from SINK_TYPE", () => {
    const config = testConfig({ outputDirs: { exports: os.tmpdir(), manifests: os.tmpdir() } });

    expect(createSink(config, { SINK_TYPE: "none" })).toBeInstanceOf(NoopSink);
    expect(createSink(config, { SINK_TYPE: "http", HTTP_SINK_ENDPOINT: "https://sink.test" })).toBeInstanceOf(HttpSink);
    expect(createSink(config, {})).toBeInstanceOf(LocalJsonlSink);
    expect(() => createSink(config, { SINK_TYPE: "kafka" })).toThrow("Unsupported sink type: kafka");
  });
});
