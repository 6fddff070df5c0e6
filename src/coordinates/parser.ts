import type { CoordinateFormat } from "../types";

/**
 * A coordinate as found in a page, before numeric parsing. Extraction methods
 * produce these; {@link parseRawCoordinate} turns them into a validated pair.
 */
export type RawCoordinate =
  | { kind: "dms"; text: string }
  | { kind: "decimal"; text: string }
  | { kind: "microformat"; latitude: string; longitude: string }
  | { kind: "object"; label: string; lat: unknown; lon: unknown }
  | { kind: "kartographer"; position: readonly [unknown, unknown] };

export type RawCoordinateKind = RawCoordinate["kind"];

export interface ParsedCoordinate {
  lat: number;
  lon: number;
  format: CoordinateFormat;
  original: string;
}

export type ParseResult = { ok: true; value: ParsedCoordinate } | { ok: false; reason: string };

type Axis = "lat" | "lon";

interface DmsComponent {
  raw: string;
  axis?: Axis;
  value: number;
  hasMinutes: boolean;
  valid: boolean;
}

const MARK_VARIANTS: ReadonlyArray<readonly [RegExp, string]> = [
  [/[\u00a0\u2007\u2009\u200a\u202f]/g, " "],
  [/\u2212/g, "-"],
  [/[º˚]/g, "°"],
  [/(?:′′|''|’’)/g, "″"],
  [/["“”ʺ]/g, "″"],
  [/['‘’ʹ]/g, "′"],
];

const NUMBER_TEXT = /^[-+]?\d+(?:\.\d+)?$/;

// degrees° [minutes′] [seconds″] [hemisphere]
const DMS_COMPONENT =
  /(-)?\s*(\d{1,3}(?:\.\d+)?)\s*°\s*(?:(\d{1,2}(?:\.\d+)?)\s*′\s*)?(?:(\d{1,2}(?:\.\d+)?)\s*″\s*)?(?:([NSEW])(?![A-Za-z]))?/g;

const DECIMAL_HEMISPHERE =
  /(?<![\d.])(-?\d{1,3}(?:\.\d+)?)\s*°?\s*([NS])(?![A-Za-z])[\s,;/]*(-?\d{1,3}(?:\.\d+)?)\s*°?\s*([EW])(?![A-Za-z])/;

const DECIMAL_PAIR = /(?<![\d.])(-?\d{1,3}(?:\.\d+)?)\s*°?\s*[;,]\s*(-?\d{1,3}(?:\.\d+)?)(?![\d.])/;

const FORMAT_BY_KIND: Record<RawCoordinateKind, CoordinateFormat> = {
  dms: "dms",
  decimal: "decimal",
  microformat: "microformat",
  object: "decimal",
  kartographer: "kartographer",
};

/** Maps the glyph variants different markup sources use onto one set of marks. */
export function normalizeCoordinateText(text: string): string {
  let normalized = text;
  for (const [pattern, replacement] of MARK_VARIANTS) {
    normalized = normalized.replace(pattern, replacement);
  }
  return normalized.replace(/\s+/g, " ").trim();
}

export function toFiniteNumber(value: unknown): number | undefined {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value !== "string") {
    return undefined;
  }

  const text = normalizeCoordinateText(value);
  if (!NUMBER_TEXT.test(text)) {
    return undefined;
  }
  return Number(text);
}

export function isNumericText(value: string | undefined): boolean {
  return value !== undefined && toFiniteNumber(value) !== undefined;
}

export function isValidLatitude(value: number): boolean {
  return Number.isFinite(value) && value >= -90 && value <= 90;
}

export function isValidLongitude(value: number): boolean {
  return Number.isFinite(value) && value >= -180 && value <= 180;
}

function failure(reason: string): ParseResult {
  return { ok: false, reason };
}

function validated(lat: number, lon: number, format: CoordinateFormat, original: string): ParseResult {
  if (!isValidLatitude(lat)) {
    return failure(`latitude out of range: ${lat}`);
  }
  if (!isValidLongitude(lon)) {
    return failure(`longitude out of range: ${lon}`);
  }
  return { ok: true, value: { lat, lon, format, original } };
}

function scanDmsComponents(normalized: string): DmsComponent[] {
  const components: DmsComponent[] = [];
  for (const match of normalized.matchAll(DMS_COMPONENT)) {
    const [raw, minus, degrees, minutes, seconds, hemisphere] = match;
    const minuteValue = minutes === undefined ? 0 : Number(minutes);
    const secondValue = seconds === undefined ? 0 : Number(seconds);
    const magnitude = Number(degrees) + minuteValue / 60 + secondValue / 3600;
    const negative = minus === "-" || hemisphere === "S" || hemisphere === "W";
    let axis: Axis | undefined;
    if (hemisphere === "N" || hemisphere === "S") {
      axis = "lat";
    } else if (hemisphere === "E" || hemisphere === "W") {
      axis = "lon";
    }

    components.push({
      raw: raw.trim(),
      axis,
      value: negative ? -magnitude : magnitude,
      hasMinutes: minutes !== undefined,
      valid: minuteValue < 60 && secondValue < 60,
    });
  }
  return components;
}

function pickDmsPair(components: DmsComponent[]): [DmsComponent, DmsComponent] | undefined {
  const lat = components.find((component) => component.axis === "lat");
  const lon = components.find((component) => component.axis === "lon");
  if (lat && lon) {
    return [lat, lon];
  }
  if (lat || lon) {
    return undefined;
  }

  const unlabelled = components.filter((component) => component.axis === undefined);
  return unlabelled.length >= 2 ? [unlabelled[0], unlabelled[1]] : undefined;
}

export function parseDms(text: string): ParseResult {
  const pair = pickDmsPair(scanDmsComponents(normalizeCoordinateText(text)));
  if (!pair) {
    return failure("no latitude/longitude DMS pair found");
  }

  const [lat, lon] = pair;
  if (!lat.valid || !lon.valid) {
    return failure(`minutes or seconds out of range in "${lat.raw}, ${lon.raw}"`);
  }
  return validated(lat.value, lon.value, "dms", `${lat.raw}, ${lon.raw}`);
}

export function parseDecimal(text: string): ParseResult {
  const normalized = normalizeCoordinateText(text);

  const hemisphereMatch = normalized.match(DECIMAL_HEMISPHERE);
  if (hemisphereMatch) {
    const [matched, latText, latHemisphere, lonText, lonHemisphere] = hemisphereMatch;
    const lat = Math.abs(Number(latText)) * (latHemisphere === "S" ? -1 : 1);
    const lon = Math.abs(Number(lonText)) * (lonHemisphere === "W" ? -1 : 1);
    return validated(lat, lon, "decimal", matched.trim());
  }

  const pairMatch = normalized.match(DECIMAL_PAIR);
  if (pairMatch) {
    const [matched, latText, lonText] = pairMatch;
    return validated(Number(latText), Number(lonText), "decimal", matched.trim());
  }

  return failure("no decimal coordinate pair found");
}

function parseNumericPair(lat: unknown, lon: unknown, format: CoordinateFormat, original: string): ParseResult {
  const latValue = toFiniteNumber(lat);
  const lonValue = toFiniteNumber(lon);
  if (latValue === undefined || lonValue === undefined) {
    return failure(`non-numeric coordinate fields in "${original}"`);
  }
  return validated(latValue, lonValue, format, original);
}

export function parseRawCoordinate(raw: RawCoordinate): ParseResult {
  switch (raw.kind) {
    case "dms":
      return parseDms(raw.text);
    case "decimal":
      return parseDecimal(raw.text);
    case "microformat":
      return parseNumericPair(
        raw.latitude,
        raw.longitude,
        FORMAT_BY_KIND.microformat,
        `${raw.latitude.trim()}; ${raw.longitude.trim()}`,
      );
    case "object":
      return parseNumericPair(raw.lat, raw.lon, FORMAT_BY_KIND.object, `${raw.label}: ${String(raw.lat)}, ${String(raw.lon)}`);
    case "kartographer": {
      const [lon, lat] = raw.position;
      return parseNumericPair(lat, lon, FORMAT_BY_KIND.kartographer, `Kartographer: [${String(lon)}, ${String(lat)}]`);
    }
  }
}

/**
 * Classifies free text (a coordinate span, an infobox cell) as DMS or decimal
 * without parsing numbers. DMS needs a N/S and an E/W component and at least
 * one component with minutes; anything else falls through to decimal forms.
 */
export function detectCoordinateText(text: string): RawCoordinate | undefined {
  const normalized = normalizeCoordinateText(text);
  if (!normalized) {
    return undefined;
  }

  const components = scanDmsComponents(normalized);
  const hasLatitude = components.some((component) => component.axis === "lat");
  const hasLongitude = components.some((component) => component.axis === "lon");
  if (hasLatitude && hasLongitude && components.some((component) => component.hasMinutes)) {
    return { kind: "dms", text };
  }

  if (DECIMAL_HEMISPHERE.test(normalized) || DECIMAL_PAIR.test(normalized)) {
    return { kind: "decimal", text };
  }

  return undefined;
}
