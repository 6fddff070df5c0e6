import type { Cheerio, CheerioAPI } from "cheerio";
import type { Element } from "domhandler";
import { visibleText } from "../crawl";

export function labelMatches(label: string, terms: readonly string[]): boolean {
  const normalized = label.toLocaleLowerCase();
  return terms.some((term) => normalized.includes(term.toLocaleLowerCase()));
}

/**
 * Value cells of `table.infobox` rows whose label matches one of `terms`, in
 * document order. A label is the row's `th`, or the first of two `td` cells.
 */
export function findInfoboxValues($: CheerioAPI, terms: readonly string[]): Cheerio<Element>[] {
  const values: Cheerio<Element>[] = [];

  for (const element of $("table.infobox tr").toArray()) {
    const row = $(element);
    const header = row.children("th").first();
    const cells = row.children("td");

    let label: Cheerio<Element>;
    let value: Cheerio<Element>;
    if (header.length > 0) {
      label = header;
      value = cells.first();
    } else if (cells.length >= 2) {
      label = cells.first();
      value = cells.eq(1);
    } else {
      continue;
    }

    if (value.length > 0 && labelMatches(visibleText(label), terms)) {
      values.push(value);
    }
  }

  return values;
}
