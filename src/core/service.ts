import { AppConfig } from "../config";
import { DiscoveryEngine } from "../discover";
import { exportCsv, exportSpreadsheet } from "../export";
import { Logger, MetricsRegistry, createRunId } from "../observability";
import { BrowserLauncher, OperatorConfirmation, SessionManager, withBrowserSession } from "../session";
import { Sink } from "../sink";
import { CorpusStore } from "../store";
import { CorpusStats, RunResult, SearchCandidate, SearchHit } from "../types";
import { AuthenticationError } from "./errors";
import { JobPool } from "./jobPool";
import { BatchOrchestrator, Exporter, RunBatchOptions } from "./orchestrator";

export interface KnowledgeServiceDeps {
  config: AppConfig;
  store: CorpusStore;
  sink: Sink;
  launcher: BrowserLauncher;
  operator: OperatorConfirmation;
  logger: Logger;
  metrics: MetricsRegistry;
  pool?: JobPool;
  exporters?: readonly Exporter[];
  sleepFn?: (ms: number) => Promise<void>;
  runIdFactory?: () => string;
}

export interface ServiceDiscoverOptions {
  expandSynonyms?: boolean;
}

/**
 * Entry point for front ends. Browser-bound jobs go through the pool; each one gets its own
 * session and run id. Corpus reads go straight to the store.
 */
export class KnowledgeService {
  private readonly deps: KnowledgeServiceDeps;
  private readonly pool: JobPool;
  private readonly runIdFactory: () => string;

  constructor(deps: KnowledgeServiceDeps) {
    this.deps = deps;
    this.pool = deps.pool ?? new JobPool(deps.config.maxConcurrentJobs);
    this.runIdFactory = deps.runIdFactory ?? (() => createRunId());
  }

  runBatch(titles: readonly string[], options: RunBatchOptions = {}): Promise<RunResult> {
    return this.pool.run(() => {
      const runId = this.runIdFactory();
      const orchestrator = new BatchOrchestrator({
        runId,
        config: this.deps.config,
        launcher: this.deps.launcher,
        operator: this.deps.operator,
        store: this.deps.store,
        sink: this.deps.sink,
        logger: this.deps.logger.withRunId(runId).child("batch"),
        metrics: this.deps.metrics,
        exporters: this.deps.exporters,
        sleepFn: this.deps.sleepFn,
      });
      return orchestrator.runBatch(titles, options);
    });
  }

  /** Throws `AuthenticationError` when the session cannot be established. */
  discover(query: string, options: ServiceDiscoverOptions = {}): Promise<SearchCandidate[]> {
    return this.pool.run(() => {
      const logger = this.deps.logger.withRunId(this.runIdFactory()).child("discover");
      return withBrowserSession(this.deps.launcher, logger, async (page) => {
        const session = new SessionManager({
          config: this.deps.config,
          page,
          operator: this.deps.operator,
          logger,
          metrics: this.deps.metrics,
          sleepFn: this.deps.sleepFn,
        });
        if (!(await session.authenticate())) {
          throw new AuthenticationError("Could not establish an authenticated session");
        }
        const engine = new DiscoveryEngine({ config: this.deps.config, page, logger, metrics: this.deps.metrics });
        return engine.discover(query, options);
      });
    });
  }

  search(query: string): Promise<SearchHit[]> {
    return this.deps.store.search(query);
  }

  stats(): Promise<CorpusStats> {
    return this.deps.store.stats();
  }

  exportCsv(outputDir = this.deps.config.outputDirs.exports): Promise<string> {
    return exportCsv(this.deps.store, outputDir);
  }

  exportSpreadsheet(outputDir = this.deps.config.outputDirs.exports): Promise<string> {
    return exportSpreadsheet(this.deps.store, outputDir);
  }

  rebuildIndex(): Promise<number> {
    return this.deps.store.rebuildIndex();
  }
}
