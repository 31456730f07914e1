import pLimit from "p-limit";

type Limiter = ReturnType<typeof pLimit>;

/**
 * Bounds how many independent jobs run at once. Each job owns its own browser session,
 * so the bound is also the number of concurrently open browsers.
 */
export class JobPool {
  private readonly limiter: Limiter;

  constructor(readonly concurrency: number) {
    this.limiter = pLimit(Math.max(1, Math.floor(concurrency)));
  }

  run<T>(job: () => Promise<T>): Promise<T> {
    return this.limiter(job);
  }

  get active(): number {
    return this.limiter.activeCount;
  }

  get pending(): number {
    return this.limiter.pendingCount;
  }
}
