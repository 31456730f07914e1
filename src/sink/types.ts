import { RunResult } from "../types";

export interface ArticleSavedEvent {
  runId: string;
  id: string;
  title: string;
  address: string;
  wordCount: number;
  storagePath: string;
  indexed: boolean;
  savedAt: string;
}

export interface Sink {
  publishArticleSaved(events: ArticleSavedEvent[]): Promise<void>;
  publishRunResult(result: RunResult): Promise<void>;
}
