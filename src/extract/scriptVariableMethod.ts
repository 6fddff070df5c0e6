import type { RawCoordinate } from "../coordinates";
import type { ArticleDocument } from "../crawl";
import { isPlainObject } from "../core/values";
import type { ExtractionMethodId } from "../types";
import type { CoordinateExtractionMethod } from "./coordinateMethod";

// "wgCoordinates":{"lat":61.2986,"lon":25.6818}
const WG_COORDINATES = /"wgCoordinates"\s*:\s*(\{[^{}]*\})/;

function parseJsonObject(text: string): Record<string, unknown> | undefined {
  try {
    const parsed: unknown = JSON.parse(text);
    return isPlainObject(parsed) ? parsed : undefined;
  } catch {
    return undefined;
  }
}

/** Method 4: the `wgCoordinates` page variable in the MediaWiki config script. */
export class ScriptVariableMethod implements CoordinateExtractionMethod {
  readonly id: ExtractionMethodId = "method_4";
  readonly description = "wgCoordinates script variable";

  attempt({ $ }: ArticleDocument): RawCoordinate | undefined {
    for (const element of $("script").toArray()) {
      const match = ($(element).html() ?? "").match(WG_COORDINATES);
      if (!match) {
        continue;
      }

      const value = parseJsonObject(match[1]);
      if (value && typeof value.lat === "number" && typeof value.lon === "number") {
        return { kind: "object", label: "wgCoordinates", lat: value.lat, lon: value.lon };
      }
    }
    return undefined;
  }
}
