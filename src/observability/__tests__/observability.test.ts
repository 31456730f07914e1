import { afterEach, describe, expect, it, vi } from "vitest";
import { Logger } from "../logger";
import { MetricsRegistry } from "../metrics";
import { createRunId } from "../runId";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("Logger", () => {
  it("writes one JSON line with component, run id and fields", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);

    new Logger({ component: "cli", runId: "run_test" }).child("store").info("store_entry_saved", { articleId: "a_1" });

    expect(log).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(log.mock.calls[0][0]))).toMatchObject({
      level: "info",
      msg: "store_entry_saved",
      component: "store",
      runId: "run_test",
      articleId: "a_1",
    });
  });

  it("drops records below the minimum level and sends errors to stderr", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const logger = new Logger({ component: "test", runId: "run_test" }, { minLevel: "warn" });

    logger.info("ignored");
    logger.error("auth_failed");

    expect(log).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledTimes(1);
  });
});

describe("MetricsRegistry", () => {
  it("accumulates counters and summarizes timers", () => {
    const metrics = new MetricsRegistry();
    metrics.incrementCounter("searches_run");
    metrics.incrementCounter("candidates_found", 4);
    metrics.startTimer("search_ms")();

    expect(metrics.getCounters()).toMatchObject({ searches_run: 1, candidates_found: 4, extracts_ok: 0 });
    expect(metrics.getTimerSummaries().search_ms.count).toBe(1);
    expect(metrics.getTimerSummaries().extract_ms.count).toBe(0);
  });
});

describe("createRunId", () => {
  it("embeds the timestamp without separators that break file names", () => {
    expect(createRunId(new Date("2024-06-01T08:00:00.000Z"))).toMatch(/^run_2024-06-01T08-00-00-000Z_[a-z0-9]{1,6}$/);
  });
});
