export * from "./types";
export { Logger } from "./logger";
export type { LoggerContext, LoggerOptions } from "./logger";
export { MetricsRegistry } from "./metrics";
export { createRunId } from "./runId";
