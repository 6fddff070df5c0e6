import { isNumericText } from "../coordinates";
import type { RawCoordinate } from "../coordinates";
import type { ArticleDocument } from "../crawl";
import type { ExtractionMethodId } from "../types";
import type { CoordinateExtractionMethod } from "./coordinateMethod";

// GeoJSON order: [lon, lat]
const KARTOGRAPHER_POSITION = /"coordinates"\s*:\s*\[\s*(-?\d+(?:\.\d+)?)\s*,\s*(-?\d+(?:\.\d+)?)\s*\]/;

/** Method 6: map elements carrying `data-lat`/`data-lon`, then Kartographer live data. */
export class MapDataMethod implements CoordinateExtractionMethod {
  readonly id: ExtractionMethodId = "method_6";
  readonly description = "map element / Kartographer data";

  attempt({ $ }: ArticleDocument): RawCoordinate | undefined {
    for (const element of $("[data-lat][data-lon]").toArray()) {
      const mapElement = $(element);
      const lat = mapElement.attr("data-lat")?.trim();
      const lon = mapElement.attr("data-lon")?.trim();
      if (isNumericText(lat) && isNumericText(lon)) {
        return { kind: "object", label: "map element", lat, lon };
      }
    }

    for (const element of $("script").toArray()) {
      const script = $(element).html() ?? "";
      if (!script.includes("wgKartographerLiveData")) {
        continue;
      }

      const match = script.match(KARTOGRAPHER_POSITION);
      if (match) {
        return { kind: "kartographer", position: [match[1], match[2]] };
      }
    }
    return undefined;
  }
}
