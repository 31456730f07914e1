import { errorMessage } from "../core/errors";
import { RetryExhaustedError, RetryPolicy, exponentialBackoff, withRetry } from "../core/retry";
import { RunResult } from "../types";
import { BaseSink } from "./baseSink";
import { ArticleSavedEvent } from "./types";

type EventName = "article_saved" | "run_finished";

interface HttpResponseLike {
  ok: boolean;
  status: number;
  text(): Promise<string>;
}

type FetchLike = (
  url: string,
  init: { method: string; headers: Record<string, string>; body: string; signal: AbortSignal },
) => Promise<HttpResponseLike>;

export interface HttpSinkOptions {
  endpoint?: string;
  token?: string;
  fetchFn?: FetchLike;
  timeoutMs?: number;
  maxRetries?: number;
  retryDelayMs?: number;
}

function isRetriableStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

class PermanentHttpSinkError extends Error {}

export class HttpSink extends BaseSink {
  private readonly endpoint?: string;
  private readonly token?: string;
  private readonly fetchFn: FetchLike;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;

  constructor(options: HttpSinkOptions = {}) {
    super();
    this.endpoint = options.endpoint;
    this.token = options.token;
    this.fetchFn = options.fetchFn ?? ((url, init) => fetch(url, init));
    this.timeoutMs = options.timeoutMs ?? 15_000;
    this.maxRetries = options.maxRetries ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 250;
  }

  async publishArticleSaved(events: ArticleSavedEvent[]): Promise<void> {
    if (events.length === 0) {
      return;
    }
    await this.post("article_saved", events, events.map((event) => event.id).join(","));
  }

  async publishRunResult(result: RunResult): Promise<void> {
    await this.post("run_finished", [result], result.runId);
  }

  private async post(event: EventName, items: unknown[], idempotencyKey: string): Promise<void> {
    this.ensureConfigured("HTTP", Boolean(this.endpoint));
    const endpoint = this.endpoint ?? "";

    const body = JSON.stringify({
      event,
      sentAt: new Date().toISOString(),
      items,
    });

    const headers: Record<string, string> = {
      "Content-Type": "application/json",
      "Idempotency-Key": `${event}:${idempotencyKey}`,
    };

    if (this.token) {
      headers.Authorization = `Bearer ${this.token}`;
    }

    const policy: RetryPolicy = {
      ...exponentialBackoff(this.maxRetries + 1, this.retryDelayMs),
      shouldRetry: (error) => !(error instanceof PermanentHttpSinkError),
    };

    try {
      await withRetry(policy, () => this.send(endpoint, headers, body));
    } catch (error) {
      if (error instanceof RetryExhaustedError) {
        throw new Error(`HTTP sink exhausted retries after ${error.attempts} attempt(s): ${errorMessage(error.lastError)}`, {
          cause: error.lastError,
        });
      }
      throw error;
    }
  }

  private async send(endpoint: string, headers: Record<string, string>, body: string): Promise<void> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      const response = await this.fetchFn(endpoint, {
        method: "POST",
        headers,
        body,
        signal: controller.signal,
      });
      if (response.ok) {
        return;
      }

      const responseText = await response.text();
      if (!isRetriableStatus(response.status)) {
        throw new PermanentHttpSinkError(`HTTP sink permanent error ${response.status}: ${responseText}`);
      }
      throw new Error(`HTTP sink transient error ${response.status}: ${responseText}`);
    } finally {
      clearTimeout(timeout);
    }
  }
}
