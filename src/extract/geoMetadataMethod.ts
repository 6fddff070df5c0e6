import { isNumericText } from "../coordinates";
import type { RawCoordinate } from "../coordinates";
import { sanitizeText } from "../crawl";
import type { ArticleDocument } from "../crawl";
import type { ExtractionMethodId } from "../types";
import type { CoordinateExtractionMethod } from "./coordinateMethod";

function splitPair(text: string, separator: string): [string, string] | undefined {
  const parts = text.split(separator).map((part) => part.trim());
  if (parts.length !== 2 || !isNumericText(parts[0]) || !isNumericText(parts[1])) {
    return undefined;
  }
  return [parts[0], parts[1]];
}

/**
 * Method 5: geo metadata. `<meta name="geo.position">` and `<meta name="ICBM">`
 * first, then the `geo` microformat with `latitude`/`longitude` children or
 * `lat; lon` text.
 */
export class GeoMetadataMethod implements CoordinateExtractionMethod {
  readonly id: ExtractionMethodId = "method_5";
  readonly description = "geo metadata / microformat";

  attempt({ $ }: ArticleDocument): RawCoordinate | undefined {
    const metaPosition = $("meta[name='geo.position']").attr("content");
    if (metaPosition && splitPair(metaPosition, ";")) {
      return { kind: "decimal", text: metaPosition };
    }

    const icbm = $("meta[name='ICBM']").attr("content");
    if (icbm && splitPair(icbm, ",")) {
      return { kind: "decimal", text: icbm };
    }

    for (const element of $(".geo").toArray()) {
      const geo = $(element);
      const latitude = sanitizeText(geo.find(".latitude").first().text());
      const longitude = sanitizeText(geo.find(".longitude").first().text());
      if (isNumericText(latitude) && isNumericText(longitude)) {
        return { kind: "microformat", latitude, longitude };
      }

      const pair = splitPair(sanitizeText(geo.text()), ";");
      if (pair) {
        return { kind: "microformat", latitude: pair[0], longitude: pair[1] };
      }
    }
    return undefined;
  }
}
