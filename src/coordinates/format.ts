import type { RawCoordinate, RawCoordinateKind } from "./parser";

export interface CoordinatePair {
  lat: number;
  lon: number;
}

const MILLISECONDS_PER_DEGREE = 3_600_000;

export function formatDmsComponent(value: number, axis: "lat" | "lon"): string {
  let hemisphere: string;
  if (axis === "lat") {
    hemisphere = value < 0 ? "S" : "N";
  } else {
    hemisphere = value < 0 ? "W" : "E";
  }

  // Work in whole milli-arcseconds so rounding never yields 60″ or 60′.
  const total = Math.round(Math.abs(value) * MILLISECONDS_PER_DEGREE);
  const degrees = Math.floor(total / MILLISECONDS_PER_DEGREE);
  const minutes = Math.floor((total % MILLISECONDS_PER_DEGREE) / 60_000);
  const seconds = (total % 60_000) / 1000;
  return `${degrees}°${minutes}′${seconds.toFixed(3)}″${hemisphere}`;
}

export function formatDms(pair: CoordinatePair): string {
  return `${formatDmsComponent(pair.lat, "lat")} ${formatDmsComponent(pair.lon, "lon")}`;
}

/** Renders a decimal pair in the given representation family, for display and reparsing. */
export function formatRawCoordinate(pair: CoordinatePair, kind: RawCoordinateKind): RawCoordinate {
  switch (kind) {
    case "dms":
      return { kind, text: formatDms(pair) };
    case "decimal":
      return { kind, text: `${pair.lat.toFixed(6)}; ${pair.lon.toFixed(6)}` };
    case "microformat":
      return { kind, latitude: pair.lat.toFixed(6), longitude: pair.lon.toFixed(6) };
    case "object":
      return { kind, label: "wgCoordinates", lat: pair.lat, lon: pair.lon };
    case "kartographer":
      return { kind, position: [pair.lon, pair.lat] };
  }
}
