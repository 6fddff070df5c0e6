import { load } from "cheerio";
import type { Cheerio, CheerioAPI } from "cheerio";
import type { AnyNode } from "domhandler";

export interface ArticleDocument {
  $: CheerioAPI;
  url: string;
  /** Wikipedia language code of the article, e.g. `fi`. */
  language: string;
}

const WIKIPEDIA_HOST = /^([a-z]{2,3}(?:-[a-z0-9]+)*)\.(?:m\.)?wikipedia\.org$/i;

export function sanitizeText(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

/** Text a reader would see: drops inline styles and scripts, keeps line breaks as spaces. */
export function visibleText<T extends AnyNode>(selection: Cheerio<T>): string {
  const copy = selection.clone();
  copy.find("style, script").remove();
  copy.find("br").replaceWith(" ");
  return sanitizeText(copy.text());
}

export function languageFromUrl(pageUrl: string): string | undefined {
  try {
    const match = new URL(pageUrl).hostname.match(WIKIPEDIA_HOST);
    if (!match || match[1].toLowerCase() === "www") {
      return undefined;
    }
    return match[1].toLowerCase();
  } catch {
    return undefined;
  }
}

export function detectArticleLanguage($: CheerioAPI, pageUrl: string, fallbackLanguage: string): string {
  const fromUrl = languageFromUrl(pageUrl);
  if (fromUrl) {
    return fromUrl;
  }

  const htmlLang = $("html").attr("lang")?.trim().toLowerCase();
  if (htmlLang) {
    return htmlLang.split("-")[0];
  }
  return fallbackLanguage;
}

export function loadArticleDocument(html: string, pageUrl: string, fallbackLanguage: string): ArticleDocument {
  const $ = load(html);
  return {
    $,
    url: pageUrl,
    language: detectArticleLanguage($, pageUrl, fallbackLanguage),
  };
}

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

/** Article title from its URL path, e.g. `.../wiki/Helsingin_tuomiokirkko` → `Helsingin tuomiokirkko`. */
export function articleNameFromUrl(pageUrl: string): string {
  let segment: string;
  try {
    segment = new URL(pageUrl).pathname.split("/").pop() ?? "";
  } catch {
    segment = pageUrl.split("/").pop() ?? "";
  }
  return sanitizeText(decodeSegment(segment).replace(/_/g, " ")) || pageUrl;
}
