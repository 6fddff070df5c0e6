export interface ProgressSnapshot {
  processed: number;
  total: number;
  elapsedMs: number;
  averageMs: number;
  etaMs: number;
  percent: number;
}

/** Linear ETA: average time per processed record times the records left. */
export class ProgressTracker {
  private readonly total: number;
  private readonly now: () => number;
  private readonly startedAt: number;
  private processed = 0;

  constructor(total: number, now: () => number = Date.now) {
    this.total = total;
    this.now = now;
    this.startedAt = now();
  }

  tick(): ProgressSnapshot {
    this.processed += 1;
    const elapsedMs = Math.max(0, this.now() - this.startedAt);
    const averageMs = Math.round(elapsedMs / this.processed);
    const remaining = Math.max(0, this.total - this.processed);

    return {
      processed: this.processed,
      total: this.total,
      elapsedMs,
      averageMs,
      etaMs: averageMs * remaining,
      percent: this.total === 0 ? 100 : Math.round((this.processed / this.total) * 1000) / 10,
    };
  }
}
