import { AppConfig } from "../config";
import { DiscoveryEngine } from "../discover";
import { exportCsv, exportSpreadsheet } from "../export";
import { ArticleExtractor } from "../extract";
import { Logger, MetricsRegistry } from "../observability";
import { BrowserLauncher, BrowserPage, OperatorConfirmation, SessionManager, withBrowserSession } from "../session";
import { Sink } from "../sink";
import { CorpusStore } from "../store";
import { RunResult } from "../types";
import { BrowserLaunchError, DiscoveryEmptyError, HarvestError, SessionClosedError, errorMessage } from "./errors";
import { sleep } from "./time";

export type Exporter = (store: CorpusStore, outputDir: string) => Promise<string>;

export interface OrchestratorDeps {
  runId: string;
  config: AppConfig;
  launcher: BrowserLauncher;
  operator: OperatorConfirmation;
  store: CorpusStore;
  sink: Sink;
  logger: Logger;
  metrics: MetricsRegistry;
  exporters?: readonly Exporter[];
  sleepFn?: (ms: number) => Promise<void>;
}

export interface RunBatchOptions {
  /** Defaults to `maxArticlesPerRun`. */
  limit?: number;
  expandSynonyms?: boolean;
}

interface Engines {
  discovery: DiscoveryEngine;
  extractor: ArticleExtractor;
}

export function emptyRunResult(runId: string): RunResult {
  return { runId, succeeded: 0, failed: 0, skipped: 0, elapsedMs: 0, articles: [], warnings: [], exports: [] };
}

/**
 * Drives one batch over a single browser session. Items run strictly one after another:
 * the session cannot serve concurrent navigations.
 */
export class BatchOrchestrator {
  private readonly deps: OrchestratorDeps;
  private readonly logger: Logger;
  private readonly sleepFn: (ms: number) => Promise<void>;
  private readonly exporters: readonly Exporter[];

  constructor(deps: OrchestratorDeps) {
    this.deps = deps;
    this.logger = deps.logger;
    this.sleepFn = deps.sleepFn ?? sleep;
    this.exporters = deps.exporters ?? [exportCsv, exportSpreadsheet];
  }

  async runBatch(titles: readonly string[], options: RunBatchOptions = {}): Promise<RunResult> {
    const { config } = this.deps;
    const startedAt = Date.now();
    const result = emptyRunResult(this.deps.runId);
    const limit = Math.max(0, options.limit ?? config.maxArticlesPerRun);
    const requested = titles.slice(0, limit);
    this.logger.info("batch_start", { requested: requested.length, received: titles.length, limit });

    try {
      await withBrowserSession(this.deps.launcher, this.logger, (page) => this.processTitles(page, requested, result, options));
    } catch (error) {
      if (error instanceof SessionClosedError) {
        result.aborted = "session_lost";
      } else if (error instanceof BrowserLaunchError) {
        result.aborted = "launch_failed";
      } else {
        throw error;
      }
      result.warnings.push(error.message);
      this.logger.error("batch_aborted", { reason: result.aborted, error: error.message });
    }

    // A lost session still leaves the articles saved before it on disk.
    if (result.aborted === undefined || result.aborted === "session_lost") {
      await this.runExports(result);
    }
    return this.finalize(result, startedAt);
  }

  private async processTitles(
    page: BrowserPage,
    requested: readonly string[],
    result: RunResult,
    options: RunBatchOptions,
  ): Promise<void> {
    const { config } = this.deps;
    const sessionManager = new SessionManager({
      config,
      page,
      operator: this.deps.operator,
      logger: this.logger.child("session"),
      metrics: this.deps.metrics,
      sleepFn: this.sleepFn,
    });

    if (!(await sessionManager.authenticate())) {
      result.aborted = "authentication_failed";
      this.logger.error("batch_aborted", { reason: result.aborted });
      return;
    }

    const engines = this.createEngines(page);
    const seen = new Set<string>();
    for (const [position, rawTitle] of requested.entries()) {
      const title = rawTitle.trim();
      const key = title.toLowerCase();
      if (!title || seen.has(key)) {
        result.skipped += 1;
        this.logger.info("batch_item_skipped", { position, query: rawTitle, reason: title ? "duplicate" : "blank" });
        continue;
      }
      seen.add(key);

      this.logger.info("batch_item_start", { position: position + 1, of: requested.length, query: title });
      try {
        await this.processTitle(title, engines, result, options);
      } catch (error) {
        result.failed += 1;
        if (error instanceof SessionClosedError) {
          this.logger.error("batch_session_lost", { query: title, error: error.message });
          throw error;
        }
        this.logger.warn("batch_item_failed", {
          query: title,
          kind: error instanceof HarvestError ? error.kind : "unexpected",
          error: errorMessage(error),
        });
      }

      await this.sleepFn(config.requestDelayMs);
    }
  }

  private createEngines(page: BrowserPage): Engines {
    const { config, metrics } = this.deps;
    return {
      discovery: new DiscoveryEngine({ config, page, logger: this.logger.child("discover"), metrics }),
      extractor: new ArticleExtractor({
        config,
        page,
        logger: this.logger.child("extract"),
        metrics,
        sleepFn: this.sleepFn,
      }),
    };
  }

  private async processTitle(title: string, engines: Engines, result: RunResult, options: RunBatchOptions): Promise<void> {
    const candidates = await engines.discovery.discover(title, { expandSynonyms: options.expandSynonyms });
    const candidate = candidates[0];
    if (!candidate) {
      throw new DiscoveryEmptyError(title);
    }

    const article = await engines.extractor.extract(candidate.address);
    const saved = await this.deps.store.save(article);
    if (saved.warning) {
      result.warnings.push(saved.warning);
    }

    result.succeeded += 1;
    result.articles.push({
      title: article.title,
      address: article.address,
      wordCount: article.wordCount,
      storagePath: saved.path,
    });
    this.logger.info("batch_item_ok", { query: title, articleId: saved.id, wordCount: article.wordCount });

    try {
      await this.deps.sink.publishArticleSaved([
        {
          runId: this.deps.runId,
          id: saved.id,
          title: article.title,
          address: article.address,
          wordCount: article.wordCount,
          storagePath: saved.path,
          indexed: saved.indexed,
          savedAt: new Date().toISOString(),
        },
      ]);
    } catch (error) {
      result.warnings.push(`Sink rejected article ${saved.id}: ${errorMessage(error)}`);
      this.logger.warn("sink_publish_failed", { articleId: saved.id, error: errorMessage(error) });
    }
  }

  private async runExports(result: RunResult): Promise<void> {
    const outputDir = this.deps.config.outputDirs.exports;
    for (const exporter of this.exporters) {
      try {
        const written = await exporter(this.deps.store, outputDir);
        result.exports.push(written);
        this.deps.metrics.incrementCounter("exports_ok");
        this.logger.info("export_written", { path: written });
      } catch (error) {
        result.warnings.push(errorMessage(error));
        this.deps.metrics.incrementCounter("exports_failed");
        this.logger.warn("export_failed", { error: errorMessage(error) });
      }
    }
  }

  private async finalize(result: RunResult, startedAt: number): Promise<RunResult> {
    result.elapsedMs = Date.now() - startedAt;
    try {
      await this.deps.sink.publishRunResult(result);
    } catch (error) {
      result.warnings.push(`Sink rejected run result: ${errorMessage(error)}`);
      this.logger.warn("sink_publish_failed", { error: errorMessage(error) });
    }

    const attempted = result.succeeded + result.failed;
    this.logger.info("batch_complete", {
      succeeded: result.succeeded,
      failed: result.failed,
      skipped: result.skipped,
      elapsedMs: result.elapsedMs,
      successRate: attempted > 0 ? Number(((result.succeeded / attempted) * 100).toFixed(1)) : 0,
      aborted: result.aborted,
    });
    return result;
  }
}
