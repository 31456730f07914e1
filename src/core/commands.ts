import fs from "node:fs";
import { AppConfig } from "../config";
import { Logger, MetricsRegistry } from "../observability";
import { Sink } from "../sink";
import { CorpusStore } from "../store";
import { CorpusStats, RunResult, SearchCandidate, SearchHit } from "../types";
import { errorMessage } from "./errors";
import { RunBatchOptions } from "./orchestrator";
import { KnowledgeService } from "./service";

export interface CommandContext {
  runId: string;
  config: AppConfig;
  store: CorpusStore;
  logger: Logger;
  metrics: MetricsRegistry;
  sink: Sink;
  service: KnowledgeService;
}

export type ExportFormat = "csv" | "xlsx" | "all";

/** One title per line; blank lines and `#` comments are dropped. */
export function readTitlesFile(filePath: string): string[] {
  return fs
    .readFileSync(filePath, "utf-8")
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("#"));
}

export async function runBatchCommand(
  ctx: CommandContext,
  titles: readonly string[],
  options: RunBatchOptions = {},
): Promise<RunResult> {
  ctx.logger.info("run_start", { titles: titles.length, limit: options.limit, expandSynonyms: options.expandSynonyms });
  const result = await ctx.service.runBatch(titles, options);
  ctx.logger.info("run_complete", {
    batchRunId: result.runId,
    succeeded: result.succeeded,
    failed: result.failed,
    skipped: result.skipped,
    elapsedMs: result.elapsedMs,
    exports: result.exports,
    warnings: result.warnings,
    aborted: result.aborted,
  });
  return result;
}

export async function runSearchCommand(ctx: CommandContext, query: string): Promise<SearchHit[]> {
  ctx.logger.info("search_start", { query });
  const hits = await ctx.service.search(query);
  for (const hit of hits) {
    ctx.logger.info("search_hit", { query, articleId: hit.id, title: hit.title, address: hit.address });
  }
  ctx.logger.info("search_complete", { query, hits: hits.length });
  return hits;
}

export async function runDiscoverCommand(
  ctx: CommandContext,
  query: string,
  expandSynonyms = false,
): Promise<SearchCandidate[]> {
  ctx.logger.info("discover_command_start", { query, expandSynonyms });
  const candidates = await ctx.service.discover(query, { expandSynonyms });
  for (const candidate of candidates) {
    ctx.logger.info("discover_candidate", { query, title: candidate.title, address: candidate.address });
  }
  ctx.logger.info("discover_command_complete", { query, candidates: candidates.length });
  return candidates;
}

export async function runStatsCommand(ctx: CommandContext): Promise<CorpusStats> {
  ctx.logger.info("stats_start");
  const stats = await ctx.service.stats();
  ctx.logger.info("stats_complete", { stats });
  return stats;
}

/** Writes the requested formats; returns the paths written. Any failing format fails the command. */
export async function runExportCommand(ctx: CommandContext, format: ExportFormat): Promise<string[]> {
  ctx.logger.info("export_start", { format, outputDir: ctx.config.outputDirs.exports });
  const written: string[] = [];
  try {
    if (format === "csv" || format === "all") {
      written.push(await ctx.service.exportCsv());
      ctx.metrics.incrementCounter("exports_ok");
    }
    if (format === "xlsx" || format === "all") {
      written.push(await ctx.service.exportSpreadsheet());
      ctx.metrics.incrementCounter("exports_ok");
    }
  } catch (error) {
    ctx.metrics.incrementCounter("exports_failed");
    ctx.logger.error("export_failed", { format, error: errorMessage(error) });
    throw error;
  }
  ctx.logger.info("export_complete", { written });
  return written;
}

export async function runReindexCommand(ctx: CommandContext): Promise<number> {
  ctx.logger.info("reindex_start", { storageDir: ctx.config.storageDir });
  const records = await ctx.service.rebuildIndex();
  ctx.logger.info("reindex_complete", { records });
  return records;
}
