import { AppConfig } from "../config";
import { Logger, MetricsRegistry } from "../observability";
import { FileCorpusStore } from "./fileCorpusStore";
import { CorpusStore } from "./types";

export function createStore(config: AppConfig, logger?: Logger, metrics?: MetricsRegistry): CorpusStore {
  return new FileCorpusStore(config.storageDir, { logger, metrics });
}

export { FileCorpusStore, INDEX_FILE_NAME, toIndexRecord, toSearchHit } from "./fileCorpusStore";
export type { FileCorpusStoreOptions } from "./fileCorpusStore";
export * from "./types";
