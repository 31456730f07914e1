import { AppConfig } from "../config";
import { NoopSink } from "./baseSink";
import { HttpSink } from "./httpSink";
import { LocalJsonlSink } from "./localJsonlSink";
import { Sink } from "./types";

export function createSink(config: AppConfig, env: NodeJS.ProcessEnv = process.env): Sink {
  const sinkType = (env.SINK_TYPE ?? "local_jsonl").toLowerCase();

  switch (sinkType) {
    case "local_jsonl":
      return new LocalJsonlSink(config);
    case "http":
      return new HttpSink({ endpoint: env.HTTP_SINK_ENDPOINT, token: env.HTTP_SINK_TOKEN });
    case "none":
      return new NoopSink();
    default:
      throw new Error(`Unsupported sink type: ${sinkType}`);
  }
}

export { BaseSink, NoopSink } from "./baseSink";
export { HttpSink } from "./httpSink";
export type { HttpSinkOptions } from "./httpSink";
export { LocalJsonlSink } from "./localJsonlSink";
export * from "./types";
