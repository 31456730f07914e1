import { AppConfig } from "../config";
import { ExtractionError, SessionClosedError, errorMessage } from "../core/errors";
import { RetryExhaustedError, RetryPolicy, fixedDelay, withRetry } from "../core/retry";
import { Logger, MetricsRegistry } from "../observability";
import { BrowserPage } from "../session";
import { Article } from "../types";
import { createArticle } from "./article";
import { parseArticlePage } from "./pageParser";

export interface ExtractorDeps {
  config: AppConfig;
  page: BrowserPage;
  logger: Logger;
  metrics: MetricsRegistry;
  retryPolicy?: RetryPolicy;
  sleepFn?: (ms: number) => Promise<void>;
}

export class ArticleExtractor {
  private readonly config: AppConfig;
  private readonly page: BrowserPage;
  private readonly logger: Logger;
  private readonly metrics: MetricsRegistry;
  private readonly retryPolicy: RetryPolicy;
  private readonly sleepFn?: (ms: number) => Promise<void>;

  constructor(deps: ExtractorDeps) {
    this.config = deps.config;
    this.page = deps.page;
    this.logger = deps.logger;
    this.metrics = deps.metrics;
    this.retryPolicy = deps.retryPolicy ?? {
      ...fixedDelay(deps.config.maxRetries, deps.config.retryDelayMs),
      shouldRetry: (error) => !(error instanceof SessionClosedError),
    };
    this.sleepFn = deps.sleepFn;
  }

  /** Throws `ExtractionError` once retries are exhausted, `SessionClosedError` at once. */
  async extract(address: string): Promise<Article> {
    this.logger.info("extract_start", { address });
    try {
      const article = await withRetry(this.retryPolicy, (attempt) => this.attempt(address, attempt), {
        sleepFn: this.sleepFn,
        onAttemptFailed: (error, attempt, willRetry) => {
          this.logger.warn("extract_attempt_failed", { address, attempt, willRetry, error: errorMessage(error) });
        },
      });
      this.metrics.incrementCounter("extracts_ok");
      return article;
    } catch (error) {
      this.metrics.incrementCounter("extracts_failed");
      if (error instanceof SessionClosedError) {
        throw error;
      }
      const attempts = error instanceof RetryExhaustedError ? error.attempts : 1;
      const cause = error instanceof RetryExhaustedError ? error.lastError : error;
      this.logger.error("extract_failed", { address, attempts, error: errorMessage(cause) });
      throw new ExtractionError(address, attempts, { cause });
    }
  }

  private async attempt(address: string, attempt: number): Promise<Article> {
    const stopTimer = this.metrics.startTimer("extract_ms");
    try {
      await this.page.goto(address, this.config.requestTimeoutMs);
      await this.page.waitForSelector("body", this.config.documentTimeoutMs);
      const html = await this.page.content();
      const parsed = parseArticlePage(html, this.config.selectors);
      const article = createArticle({
        title: parsed.title,
        address,
        body: parsed.body,
        category: parsed.metadata.category,
        tags: parsed.tags,
        metadata: parsed.metadata,
      });
      this.logger.info("extract_ok", {
        address,
        attempt,
        title: article.title,
        wordCount: article.wordCount,
        durationMs: stopTimer(),
      });
      return article;
    } catch (error) {
      stopTimer();
      throw error;
    }
  }
}
