import { RunResult } from "../types";
import { ArticleSavedEvent, Sink } from "./types";

export abstract class BaseSink implements Sink {
  abstract publishArticleSaved(events: ArticleSavedEvent[]): Promise<void>;
  abstract publishRunResult(result: RunResult): Promise<void>;

  protected ensureConfigured(name: string, ready: boolean): void {
    if (!ready) {
      throw new Error(`${name} sink is not configured`);
    }
  }
}

export class NoopSink extends BaseSink {
  async publishArticleSaved(_events: ArticleSavedEvent[]): Promise<void> {
    return;
  }

  async publishRunResult(_result: RunResult): Promise<void> {
    return;
  }
}
