import { vi } from "vitest";
import { DEFAULT_CONFIG } from "../src/config";
import type { AppConfig } from "../src/config";
import { loadArticleDocument } from "../src/crawl";
import type { ArticleDocument, FetchedPage, PageSource } from "../src/crawl";
import type { FetchInit, FetchLike, FetchResponseLike } from "../src/core/fetch";
import { Logger } from "../src/observability";

export const quietLogger = (): Logger => new Logger({ component: "test", runId: "run_test", minLevel: "error" });

export const buildDocument = (html: string, url = "https://en.wikipedia.org/wiki/Test_Place"): ArticleDocument =>
  loadArticleDocument(html, url, "en");

export const infoboxPage = (rows: Array<[string, string]>, extraBody = ""): string => `
<html lang="en">
  <body>
    <table class="infobox">
      ${rows.map(([label, value]) => `<tr><th>${label}</th><td>${value}</td></tr>`).join("\n")}
    </table>
    ${extraBody}
  </body>
</html>`;

export const testConfig = (overrides: Partial<AppConfig> = {}): AppConfig => ({
  ...DEFAULT_CONFIG,
  delays: {
    wikipedia: { minMs: 0, maxMs: 0 },
    geocoder: { minMs: 0, maxMs: 0 },
  },
  ...overrides,
});

export const textResponse = (url: string, body: string, status = 200): FetchResponseLike => ({
  ok: status >= 200 && status < 300,
  status,
  url,
  text: async () => body,
});

export const jsonResponse = (url: string, payload: unknown, status = 200): FetchResponseLike =>
  textResponse(url, JSON.stringify(payload), status);

export const createFetchStub = (handler: (url: string, init: FetchInit) => FetchResponseLike | Promise<FetchResponseLike>) =>
  vi.fn<FetchLike>(async (url, init) => handler(url, init));

/** Page source that serves fixed HTML per URL and records the URLs asked for. */
export class StaticPageSource implements PageSource {
  readonly requested: string[] = [];
  private readonly pages: Map<string, string>;

  constructor(pages: Record<string, string>) {
    this.pages = new Map(Object.entries(pages));
  }

  async fetchPage(url: string): Promise<FetchedPage> {
    this.requested.push(url);
    const html = this.pages.get(url);
    if (html === undefined) {
      throw new Error(`HTTP 404 while fetching ${url}`);
    }
    return { url, finalUrl: url, html };
  }
}
