import type { DelayRange } from "../config";

export type PoliteService = "wikipedia" | "geocoder";

export interface PolitenessGateOptions {
  delays: Record<PoliteService, DelayRange>;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
  random?: () => number;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function pickDelay(range: DelayRange, random: () => number = Math.random): number {
  const span = Math.max(0, range.maxMs - range.minMs);
  return Math.round(range.minMs + random() * span);
}

/**
 * Spaces out requests to each external service by a randomized delay drawn
 * from that service's range. Requests are serialized by the caller, so the
 * gate only tracks when each service was last contacted.
 */
export class PolitenessGate {
  private readonly delays: Record<PoliteService, DelayRange>;
  private readonly sleepFn: (ms: number) => Promise<void>;
  private readonly now: () => number;
  private readonly random: () => number;
  private readonly lastRequestAt = new Map<PoliteService, number>();

  constructor(options: PolitenessGateOptions) {
    this.delays = options.delays;
    this.sleepFn = options.sleep ?? sleep;
    this.now = options.now ?? Date.now;
    this.random = options.random ?? Math.random;
  }

  /** Waits until `service` may be contacted again; returns the time waited in ms. */
  async acquire(service: PoliteService): Promise<number> {
    const last = this.lastRequestAt.get(service);
    let waitedMs = 0;
    if (last !== undefined) {
      const readyAt = last + pickDelay(this.delays[service], this.random);
      waitedMs = Math.max(0, readyAt - this.now());
      if (waitedMs > 0) {
        await this.sleepFn(waitedMs);
      }
    }

    this.lastRequestAt.set(service, this.now());
    return waitedMs;
  }
}
