import type { AppConfig } from "../config";
import { NetworkError } from "../core/errors";
import { defaultFetch, fetchWithTimeout, getFetchDispatcher } from "../core/fetch";
import type { FetchLike, TimedExchange } from "../core/fetch";
import { PolitenessGate } from "../core/politeness";
import { toErrorMessage } from "../core/values";
import { Logger, MetricsRegistry } from "../observability";

export interface FetchedPage {
  url: string;
  finalUrl: string;
  html: string;
}

export interface PageSource {
  fetchPage(url: string): Promise<FetchedPage>;
}

interface PageFetcherDeps {
  config: Pick<AppConfig, "userAgent" | "ignoreHttpsErrors" | "requestTimeoutMs" | "maxFetchAttempts" | "retryBaseDelayMs">;
  gate: PolitenessGate;
  logger: Logger;
  metrics: MetricsRegistry;
  fetchFn?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function isRetriableStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

export class WikipediaPageFetcher implements PageSource {
  private readonly deps: PageFetcherDeps;
  private readonly fetchFn: FetchLike;
  private readonly sleepFn: (ms: number) => Promise<void>;

  constructor(deps: PageFetcherDeps) {
    this.deps = deps;
    this.fetchFn = deps.fetchFn ?? defaultFetch;
    this.sleepFn = deps.sleep ?? sleep;
  }

  async fetchPage(url: string): Promise<FetchedPage> {
    const { config, gate, logger, metrics } = this.deps;
    let lastError = `no attempt made for ${url}`;
    let lastStatus: number | undefined;

    for (let attempt = 1; attempt <= config.maxFetchAttempts; attempt += 1) {
      await gate.acquire("wikipedia");
      const stopTimer = metrics.startTimer("page_fetch_ms");

      let exchange: TimedExchange<string> | undefined;
      try {
        exchange = await fetchWithTimeout(
          this.fetchFn,
          url,
          {
            method: "GET",
            headers: {
              "user-agent": config.userAgent,
              accept: "text/html,application/xhtml+xml",
            },
            dispatcher: getFetchDispatcher(config.ignoreHttpsErrors),
          },
          config.requestTimeoutMs,
          (response) => response.text(),
        );
      } catch (error) {
        lastError = `request failed for ${url}: ${toErrorMessage(error)}`;
        lastStatus = undefined;
      }

      const response = exchange?.response;
      const html = exchange?.body;
      if (response?.ok && html !== undefined) {
        const durationMs = stopTimer();
        metrics.incrementCounter("pages_fetched", 1);
        logger.debug("page_fetch_ok", { url, attempt, durationMs, bytes: html.length });
        return { url, finalUrl: response.url || url, html };
      }

      stopTimer();
      if (response) {
        lastError = `HTTP ${response.status} while fetching ${url}`;
        lastStatus = response.status;
        if (!isRetriableStatus(response.status)) {
          break;
        }
      }

      if (attempt < config.maxFetchAttempts) {
        const backoffMs = config.retryBaseDelayMs * 2 ** (attempt - 1);
        metrics.incrementCounter("fetch_retries", 1);
        logger.warn("page_fetch_retry", { url, attempt, backoffMs, error: lastError });
        await this.sleepFn(backoffMs);
      }
    }

    metrics.incrementCounter("pages_failed", 1);
    throw new NetworkError(lastError, lastStatus);
  }
}
