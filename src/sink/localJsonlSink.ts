import fs from "node:fs";
import path from "node:path";
import { AppConfig } from "../config";
import { RunResult } from "../types";
import { BaseSink } from "./baseSink";
import { ArticleSavedEvent } from "./types";

export class LocalJsonlSink extends BaseSink {
  private readonly articlesPath: string;
  private readonly runsPath: string;

  constructor(config: AppConfig) {
    super();
    const manifestsDir = path.resolve(config.outputDirs.manifests);
    fs.mkdirSync(manifestsDir, { recursive: true });
    this.articlesPath = path.join(manifestsDir, "articles.jsonl");
    this.runsPath = path.join(manifestsDir, "runs.jsonl");
  }

  async publishArticleSaved(events: ArticleSavedEvent[]): Promise<void> {
    await this.appendLines(this.articlesPath, events);
  }

  async publishRunResult(result: RunResult): Promise<void> {
    await this.appendLines(this.runsPath, [{ ...result, finishedAt: new Date().toISOString() }]);
  }

  private async appendLines(filePath: string, records: unknown[]): Promise<void> {
    if (records.length === 0) {
      return;
    }

    const content = records.map((record) => JSON.stringify(record)).join("\n") + "\n";
    await fs.promises.appendFile(filePath, content, "utf-8");
  }
}
