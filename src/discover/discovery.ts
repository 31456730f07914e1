import { AppConfig } from "../config";
import { SessionClosedError, errorMessage } from "../core/errors";
import { Logger, MetricsRegistry } from "../observability";
import { BrowserPage } from "../session";
import { SearchCandidate } from "../types";
import { ExpansionTable, RELATED_TOPICS, SYNONYMS, relatedPhrases, synonymVariants } from "./expansions";
import { extractMatchingLinks, extractNextPageUrl, extractSearchResults } from "./htmlParser";

export interface DiscoveryDeps {
  config: AppConfig;
  page: BrowserPage;
  logger: Logger;
  metrics: MetricsRegistry;
  synonyms?: ExpansionTable;
  relatedTopics?: ExpansionTable;
}

export interface DiscoverOptions {
  expandSynonyms?: boolean;
}

export type DiscoveryStrategy = "direct" | "synonyms" | "related_topics" | "fallback_scan";

interface DirectSearchOutcome {
  candidates: SearchCandidate[];
  /** Rendered first result page, kept for the fallback link scan. */
  firstPage?: { html: string; url: string };
}

/** Keeps the first title seen for each address, in insertion order. */
export class CandidateSet {
  private readonly byAddress = new Map<string, SearchCandidate>();

  add(candidates: readonly SearchCandidate[]): number {
    let added = 0;
    for (const candidate of candidates) {
      if (!this.byAddress.has(candidate.address)) {
        this.byAddress.set(candidate.address, { title: candidate.title, address: candidate.address });
        added += 1;
      }
    }
    return added;
  }

  get size(): number {
    return this.byAddress.size;
  }

  toArray(): SearchCandidate[] {
    return [...this.byAddress.values()];
  }
}

export function buildSearchUrl(baseUrl: string, searchPath: string, query: string): string {
  const trimmed = baseUrl.endsWith("/") ? baseUrl.slice(0, -1) : baseUrl;
  const pathPart = searchPath.startsWith("/") ? searchPath : `/${searchPath}`;
  return `${trimmed}${pathPart.replace("{query}", encodeURIComponent(query))}`;
}

export class DiscoveryEngine {
  private readonly config: AppConfig;
  private readonly page: BrowserPage;
  private readonly logger: Logger;
  private readonly metrics: MetricsRegistry;
  private readonly synonyms: ExpansionTable;
  private readonly relatedTopics: ExpansionTable;

  constructor(deps: DiscoveryDeps) {
    this.config = deps.config;
    this.page = deps.page;
    this.logger = deps.logger;
    this.metrics = deps.metrics;
    this.synonyms = deps.synonyms ?? SYNONYMS;
    this.relatedTopics = deps.relatedTopics ?? RELATED_TOPICS;
  }

  /**
   * Resolves a free-text query to article candidates. Strategies run in order and each
   * runs only while nothing has been found: direct search, synonym variants (opt-in),
   * related topics, then a scan of the links on the first result page.
   */
  async discover(query: string, options: DiscoverOptions = {}): Promise<SearchCandidate[]> {
    const found = new CandidateSet();
    const direct = await this.directSearch(query);
    found.add(direct.candidates);
    this.logStrategy("direct", query, found.size);

    if (found.size === 0 && options.expandSynonyms) {
      for (const variant of synonymVariants(query, this.synonyms)) {
        found.add((await this.directSearch(variant)).candidates);
      }
      this.logStrategy("synonyms", query, found.size);
    }

    if (found.size === 0) {
      for (const phrase of relatedPhrases(query, this.relatedTopics)) {
        found.add((await this.directSearch(phrase)).candidates);
      }
      this.logStrategy("related_topics", query, found.size);
    }

    if (found.size === 0 && direct.firstPage) {
      found.add(
        extractMatchingLinks(direct.firstPage.html, direct.firstPage.url, query, this.config.contentPathPattern),
      );
      this.logStrategy("fallback_scan", query, found.size);
    }

    const candidates = found.toArray();
    this.metrics.incrementCounter("candidates_found", candidates.length);
    this.logger.info("discover_complete", { query, candidates: candidates.length });
    return candidates;
  }

  /** One site search, following result pagination up to `maxSearchPages`. */
  async directSearch(query: string): Promise<DirectSearchOutcome> {
    this.metrics.incrementCounter("searches_run");
    const stopTimer = this.metrics.startTimer("search_ms");
    const found = new CandidateSet();
    let firstPage: DirectSearchOutcome["firstPage"];
    let pageUrl: string | undefined = buildSearchUrl(this.config.baseUrl, this.config.searchPath, query);
    const visited = new Set<string>();

    try {
      for (let pageIndex = 1; pageUrl && pageIndex <= this.config.maxSearchPages; pageIndex += 1) {
        visited.add(pageUrl);
        const stopFetch = this.metrics.startTimer("page_fetch_ms");
        await this.page.goto(pageUrl, this.config.requestTimeoutMs);
        const html = await this.page.content();
        const currentUrl = this.page.url() || pageUrl;
        stopFetch();

        if (!firstPage) {
          firstPage = { html, url: currentUrl };
        }

        found.add(
          extractSearchResults(html, currentUrl, this.config.selectors.searchResults, this.config.contentPathPattern),
        );
        const next = extractNextPageUrl(html, currentUrl, this.config.selectors.pagination);
        pageUrl = next && !visited.has(next) ? next : undefined;
      }
    } catch (error) {
      if (error instanceof SessionClosedError) {
        throw error;
      }
      this.logger.warn("discover_search_failed", { query, error: errorMessage(error) });
    }

    this.logger.debug("discover_search_complete", { query, candidates: found.size, durationMs: stopTimer() });
    return { candidates: found.toArray(), firstPage };
  }

  private logStrategy(strategy: DiscoveryStrategy, query: string, total: number): void {
    this.logger.debug("discover_strategy_complete", { strategy, query, total });
  }
}
