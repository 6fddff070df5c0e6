import { detectCoordinateText } from "../coordinates";
import type { RawCoordinate } from "../coordinates";
import { visibleText } from "../crawl";
import type { ArticleDocument } from "../crawl";
import type { ExtractionMethodId } from "../types";
import type { CoordinateExtractionMethod } from "./coordinateMethod";
import { COORDINATE_SPAN, PAGE_INDICATOR } from "./inlineSpanMethod";

/** Method 2: the coordinate span placed in a page indicator such as `#mw-indicator-AA-coordinates`. */
export class IndicatorMethod implements CoordinateExtractionMethod {
  readonly id: ExtractionMethodId = "method_2";
  readonly description = "mw-indicator coordinate span";

  attempt({ $ }: ArticleDocument): RawCoordinate | undefined {
    for (const element of $(COORDINATE_SPAN).toArray()) {
      const span = $(element);
      if (span.closest(PAGE_INDICATOR).length === 0) {
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
