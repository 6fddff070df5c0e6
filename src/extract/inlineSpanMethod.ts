import { detectCoordinateText } from "../coordinates";
import type { RawCoordinate } from "../coordinates";
import { visibleText } from "../crawl";
import type { ArticleDocument } from "../crawl";
import type { ExtractionMethodId } from "../types";
import type { CoordinateExtractionMethod } from "./coordinateMethod";

export const COORDINATE_SPAN = "span#coordinatespan, span#coordinates";
export const PAGE_INDICATOR = "div[id^='mw-indicator-'], .mw-indicators";

/** Method 1: the coordinate span in the article body, outside the page indicators. */
export class InlineSpanMethod implements CoordinateExtractionMethod {
  readonly id: ExtractionMethodId = "method_1";
  readonly description = "inline span#coordinatespan";

  attempt({ $ }: ArticleDocument): RawCoordinate | undefined {
    for (const element of $(COORDINATE_SPAN).toArray()) {
      const span = $(element);
      if (span.closest(PAGE_INDICATOR).length > 0) {
        continue;
      }

      const raw = detectCoordinateText(visibleText(span));
      if (raw) {
        return raw;
      }
    }
    return undefined;
  }
}
