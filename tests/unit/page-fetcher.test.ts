import { describe, expect, it, vi } from "vitest";
import { NetworkError } from "../../src/core/errors";
import { PolitenessGate } from "../../src/core/politeness";
import { WikipediaPageFetcher } from "../../src/crawl";
import type { FetchLike } from "../../src/core/fetch";
import { MetricsRegistry } from "../../src/observability";
import { createFetchStub, quietLogger, testConfig, textResponse } from "../helpers";

const PAGE_URL = "https://en.wikipedia.org/wiki/Suomenlinna";
const OTHER_URL = "https://en.wikipedia.org/wiki/Seurasaari";

const createFetcher = (fetchFn: FetchLike) => {
  const sleep = vi.fn(async () => undefined);
  const metrics = new MetricsRegistry();
  const config = testConfig({ maxFetchAttempts: 3, retryBaseDelayMs: 1_000 });
  const fetcher = new WikipediaPageFetcher({
    config,
    gate: new PolitenessGate({ delays: config.delays, sleep }),
    logger: quietLogger(),
    metrics,
    fetchFn,
    sleep,
  });
  return { fetcher, metrics, sleep };
};

describe("WikipediaPageFetcher", () => {
  it("returns the page html and the final url", async () => {
    const fetchFn = createFetchStub(() => textResponse("https://en.wikipedia.org/wiki/Sveaborg", "<p>ok</p>"));
    const { fetcher, metrics } = createFetcher(fetchFn);

    await expect(fetcher.fetchPage(PAGE_URL)).resolves.toEqual({
      url: PAGE_URL,
      finalUrl: "https://en.wikipedia.org/wiki/Sveaborg",
      html: "<p>ok</p>",
    });
    expect(metrics.getCounters().pages_fetched).toBe(1);
  });

  it("retries server errors with exponential backoff", async () => {
    let calls = 0;
    const fetchFn = createFetchStub((url) => {
      calls += 1;
      return calls === 1 ? textResponse(url, "busy", 503) : textResponse(url, "<p>ok</p>");
    });
    const { fetcher, metrics, sleep } = createFetcher(fetchFn);

    await fetcher.fetchPage(PAGE_URL);

    expect(fetchFn).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(1_000);
    expect(metrics.getCounters().fetch_retries).toBe(1);
  });

  it("does not retry a missing page", async () => {
    const fetchFn = createFetchStub((url) => textResponse(url, "missing", 404));
    const { fetcher, metrics } = createFetcher(fetchFn);

    const error = await fetcher.fetchPage(PAGE_URL).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(NetworkError);
    expect(error).toMatchObject({ message: `HTTP 404 while fetching ${PAGE_URL}`, status: 404 });
    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(metrics.getCounters().pages_failed).toBe(1);
  });

  it("gives up after the last attempt of a failing request", async () => {
    const fetchFn = createFetchStub(() => {
      throw new Error("socket hang up");
    });
    const { fetcher, sleep } = createFetcher(fetchFn);

    await expect(fetcher.fetchPage(PAGE_URL)).rejects.toThrow(`request failed for ${PAGE_URL}: socket hang up`);
    expect(fetchFn).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[1_000], [2_000]]);
  });

  it("waits out the politeness delay before the next page request", async () => {
    const events: string[] = [];
    const fetchFn = createFetchStub((url) => {
      events.push(`fetch ${url}`);
      return textResponse(url, "<p>ok</p>");
    });
    const config = testConfig({
      delays: { wikipedia: { minMs: 1_500, maxMs: 1_500 }, geocoder: { minMs: 0, maxMs: 0 } },
    });
    const gate = new PolitenessGate({
      delays: config.delays,
      now: () => 0,
      sleep: async (ms) => {
        events.push(`sleep ${ms}`);
      },
    });
    const fetcher = new WikipediaPageFetcher({ config, gate, logger: quietLogger(), metrics: new MetricsRegistry(), fetchFn });

    await fetcher.fetchPage(PAGE_URL);
    await fetcher.fetchPage(OTHER_URL);

    expect(events).toEqual([`fetch ${PAGE_URL}`, "sleep 1500", `fetch ${OTHER_URL}`]);
  });

  it("aborts a response whose body stops arriving", async () => {
    const fetchFn = createFetchStub((url) => ({
      ok: true,
      status: 200,
      url,
      text: () => new Promise<string>(() => undefined),
    }));
    const config = testConfig({ maxFetchAttempts: 1, requestTimeoutMs: 20 });
    const fetcher = new WikipediaPageFetcher({
      config,
      gate: new PolitenessGate({ delays: config.delays }),
      logger: quietLogger(),
      metrics: new MetricsRegistry(),
      fetchFn,
    });

    await expect(fetcher.fetchPage(PAGE_URL)).rejects.toThrow(`request failed for ${PAGE_URL}: request timed out after 20 ms`);
    expect(fetchFn.mock.calls[0][1].signal?.aborted).toBe(true);
  });
});
