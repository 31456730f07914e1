import { Article, CorpusEntry, CorpusStats, IndexRecord, SearchHit } from "../types";

export interface SaveResult {
  id: string;
  path: string;
  /** False when the entry was written but the index upsert failed. */
  indexed: boolean;
  warning?: string;
}

export interface CorpusStore {
  save(article: Article): Promise<SaveResult>;
  get(id: string): Promise<CorpusEntry | undefined>;
  listEntries(): Promise<CorpusEntry[]>;
  listIndex(): Promise<IndexRecord[]>;
  search(query: string): Promise<SearchHit[]>;
  stats(): Promise<CorpusStats>;
  rebuildIndex(): Promise<number>;
}
