import fs from "node:fs";
import path from "node:path";
import { Mutex } from "../core/concurrency";
import { PersistenceError, errorMessage } from "../core/errors";
import { articleId } from "../extract/article";
import { Logger, MetricsRegistry } from "../observability";
import { Article, CorpusEntry, CorpusStats, IndexRecord, SearchHit } from "../types";
import { CorpusEntrySchema, IndexSchema } from "./schema";
import { CorpusStore, SaveResult } from "./types";

export const INDEX_FILE_NAME = "articles_index.json";
const EXCERPT_LENGTH = 200;

export interface FileCorpusStoreOptions {
  logger?: Logger;
  metrics?: MetricsRegistry;
}

export function toIndexRecord(entry: CorpusEntry): IndexRecord {
  return {
    id: entry.id,
    title: entry.title,
    address: entry.address,
    category: entry.category ?? "",
    wordCount: entry.wordCount,
    retrievedAt: entry.retrievedAt,
  };
}

export function toSearchHit(entry: CorpusEntry): SearchHit {
  return {
    id: entry.id,
    title: entry.title,
    address: entry.address,
    excerpt: `${entry.body.slice(0, EXCERPT_LENGTH)}…`,
    wordCount: entry.wordCount,
    retrievedAt: entry.retrievedAt,
  };
}

function matchesQuery(entry: CorpusEntry, needle: string): boolean {
  return (
    entry.title.toLowerCase().includes(needle) ||
    entry.body.toLowerCase().includes(needle) ||
    entry.tags.some((tag) => tag.toLowerCase().includes(needle))
  );
}

async function writeJsonAtomic(filePath: string, value: unknown): Promise<void> {
  const tempPath = `${filePath}.part`;
  try {
    await fs.promises.writeFile(tempPath, `${JSON.stringify(value, null, 2)}\n`, "utf-8");
    await fs.promises.rename(tempPath, filePath);
  } catch (error) {
    await fs.promises.rm(tempPath, { force: true });
    throw error;
  }
}

/**
 * One pretty-printed JSON file per entry (`<id>.json`) plus `articles_index.json`, all
 * under one directory. Index writes are serialized per instance; two processes sharing
 * a directory can still lose each other's index updates.
 */
export class FileCorpusStore implements CorpusStore {
  private readonly rootDir: string;
  private readonly indexPath: string;
  private readonly indexLock = new Mutex();
  private readonly logger?: Logger;
  private readonly metrics?: MetricsRegistry;

  constructor(storageDir: string, options: FileCorpusStoreOptions = {}) {
    this.rootDir = path.resolve(storageDir);
    this.indexPath = path.join(this.rootDir, INDEX_FILE_NAME);
    this.logger = options.logger;
    this.metrics = options.metrics;
    fs.mkdirSync(this.rootDir, { recursive: true });
  }

  get directory(): string {
    return this.rootDir;
  }

  async save(article: Article): Promise<SaveResult> {
    const id = articleId(article);
    const entry: CorpusEntry = {
      id,
      title: article.title,
      address: article.address,
      body: article.body,
      category: article.category,
      tags: [...article.tags],
      metadata: { ...article.metadata },
      wordCount: article.wordCount,
      retrievedAt: article.retrievedAt,
      persistedAt: new Date().toISOString(),
    };
    const entryPath = this.entryPath(id);

    try {
      await writeJsonAtomic(entryPath, entry);
    } catch (error) {
      this.logger?.error("store_entry_write_failed", { articleId: id, error: errorMessage(error) });
      throw new PersistenceError(`Failed to write entry ${id}: ${errorMessage(error)}`, { cause: error });
    }
    this.metrics?.incrementCounter("articles_saved");

    try {
      await this.indexLock.runExclusive(() => this.upsertIndexRecord(toIndexRecord(entry)));
    } catch (error) {
      const warning = `Entry ${id} saved but index update failed: ${errorMessage(error)}`;
      this.metrics?.incrementCounter("index_update_failures");
      this.logger?.warn("store_index_update_failed", { articleId: id, error: errorMessage(error) });
      return { id, path: entryPath, indexed: false, warning };
    }

    this.logger?.info("store_entry_saved", { articleId: id, path: entryPath });
    return { id, path: entryPath, indexed: true };
  }

  async get(id: string): Promise<CorpusEntry | undefined> {
    const entryPath = this.entryPath(id);
    if (!fs.existsSync(entryPath)) {
      return undefined;
    }
    return this.readEntry(entryPath);
  }

  /** Every readable entry, ordered by id. Unreadable files are logged and skipped. */
  async listEntries(): Promise<CorpusEntry[]> {
    const names = (await fs.promises.readdir(this.rootDir))
      .filter((name) => name.endsWith(".json") && name !== INDEX_FILE_NAME)
      .sort();

    const entries: CorpusEntry[] = [];
    for (const name of names) {
      try {
        entries.push(await this.readEntry(path.join(this.rootDir, name)));
      } catch (error) {
        this.logger?.warn("store_entry_unreadable", { file: name, error: errorMessage(error) });
      }
    }
    return entries;
  }

  async listIndex(): Promise<IndexRecord[]> {
    return this.readIndex();
  }

  /** Case-insensitive substring match on title, body and tags, ordered by id. A blank query matches every entry. */
  async search(query: string): Promise<SearchHit[]> {
    const needle = query.trim().toLowerCase();
    const entries = await this.listEntries();
    return entries.filter((entry) => matchesQuery(entry, needle)).map(toSearchHit);
  }

  async stats(): Promise<CorpusStats> {
    const index = await this.readIndex();
    return {
      totalArticles: index.length,
      totalWords: index.reduce((total, record) => total + record.wordCount, 0),
      asOf: new Date().toISOString(),
    };
  }

  /** Regenerates the index from the entry files on disk. */
  async rebuildIndex(): Promise<number> {
    return this.indexLock.runExclusive(async () => {
      const records = (await this.listEntries()).map(toIndexRecord);
      await writeJsonAtomic(this.indexPath, records);
      this.logger?.info("store_index_rebuilt", { records: records.length });
      return records.length;
    });
  }

  private entryPath(id: string): string {
    return path.join(this.rootDir, `${id}.json`);
  }

  private async readEntry(entryPath: string): Promise<CorpusEntry> {
    const raw = await fs.promises.readFile(entryPath, "utf-8");
    return CorpusEntrySchema.parse(JSON.parse(raw));
  }

  private async readIndex(): Promise<IndexRecord[]> {
    if (!fs.existsSync(this.indexPath)) {
      return [];
    }
    const raw = await fs.promises.readFile(this.indexPath, "utf-8");
    return IndexSchema.parse(JSON.parse(raw));
  }

  private async upsertIndexRecord(record: IndexRecord): Promise<void> {
    const index = (await this.readIndex()).filter((existing) => existing.id !== record.id);
    index.push(record);
    await writeJsonAtomic(this.indexPath, index);
  }
}
