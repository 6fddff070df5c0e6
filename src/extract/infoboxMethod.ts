import { resolveLabelTerms } from "../config";
import type { LabelTermTable } from "../config";
import { detectCoordinateText } from "../coordinates";
import type { RawCoordinate } from "../coordinates";
import { visibleText } from "../crawl";
import type { ArticleDocument } from "../crawl";
import type { ExtractionMethodId } from "../types";
import type { CoordinateExtractionMethod } from "./coordinateMethod";
import { findInfoboxValues } from "./infobox";

/** Method 3: the infobox row labelled with a coordinate term of the article's language. */
export class InfoboxMethod implements CoordinateExtractionMethod {
  readonly id: ExtractionMethodId = "method_3";
  readonly description = "infobox coordinate row";
  private readonly labelTerms: LabelTermTable;
  private readonly fallbackLanguage: string;

  constructor(labelTerms: LabelTermTable, fallbackLanguage: string) {
    this.labelTerms = labelTerms;
    this.fallbackLanguage = fallbackLanguage;
  }

  attempt({ $, language }: ArticleDocument): RawCoordinate | undefined {
    const terms = resolveLabelTerms(this.labelTerms, language, this.fallbackLanguage);
    for (const cell of findInfoboxValues($, terms.coordinate)) {
      const raw = detectCoordinateText(visibleText(cell));
      if (raw) {
        return raw;
      }
    }
    return undefined;
  }
}
