export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogFields {
  query?: string;
  address?: string;
  articleId?: string;
  attempt?: number;
  [key: string]: unknown;
}

export type MetricCounterName =
  | "auth_attempts"
  | "auth_failures"
  | "searches_run"
  | "candidates_found"
  | "extracts_ok"
  | "extracts_failed"
  | "articles_saved"
  | "index_update_failures"
  | "exports_ok"
  | "exports_failed";

export type MetricTimerName = "page_fetch_ms" | "search_ms" | "extract_ms";
