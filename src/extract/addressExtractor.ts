import { resolveLabelTerms } from "../config";
import type { LabelTermTable } from "../config";
import { visibleText } from "../crawl";
import type { ArticleDocument } from "../crawl";
import { findInfoboxValues } from "./infobox";

export interface AddressSource {
  extract(document: ArticleDocument): string | undefined;
}

/** Raw text of the first non-empty infobox row labelled with an address term. */
export class InfoboxAddressExtractor implements AddressSource {
  private readonly labelTerms: LabelTermTable;
  private readonly fallbackLanguage: string;

  constructor(labelTerms: LabelTermTable, fallbackLanguage: string) {
    this.labelTerms = labelTerms;
    this.fallbackLanguage = fallbackLanguage;
  }

  extract({ $, language }: ArticleDocument): string | undefined {
    const terms = resolveLabelTerms(this.labelTerms, language, this.fallbackLanguage);
    for (const cell of findInfoboxValues($, terms.address)) {
      const text = visibleText(cell);
      if (text) {
        return text;
      }
    }
    return undefined;
  }
}
