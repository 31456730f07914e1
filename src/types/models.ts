export interface ArticleMetadata {
  date?: string;
  author?: string;
  category?: string;
}

export interface Article {
  readonly title: string;
  readonly address: string;
  readonly body: string;
  readonly category?: string;
  readonly tags: readonly string[];
  readonly metadata: Readonly<ArticleMetadata>;
  readonly wordCount: number;
  readonly retrievedAt: string;
}

export interface CorpusEntry extends Article {
  readonly id: string;
  readonly persistedAt: string;
}

export interface IndexRecord {
  id: string;
  title: string;
  address: string;
  category: string;
  wordCount: number;
  retrievedAt: string;
}

export interface SearchCandidate {
  title: string;
  address: string;
}

export interface SearchHit {
  id: string;
  title: string;
  address: string;
  excerpt: string;
  wordCount: number;
  retrievedAt: string;
}

export interface CorpusStats {
  totalArticles: number;
  totalWords: number;
  asOf: string;
}

export interface SavedArticleSummary {
  title: string;
  address: string;
  wordCount: number;
  storagePath: string;
}

/** Set when the batch stopped before every title was attempted. */
export type BatchAbortReason = "authentication_failed" | "session_lost" | "launch_failed";

export interface RunResult {
  runId: string;
  succeeded: number;
  failed: number;
  skipped: number;
  elapsedMs: number;
  articles: SavedArticleSummary[];
  warnings: string[];
  exports: string[];
  aborted?: BatchAbortReason;
}
