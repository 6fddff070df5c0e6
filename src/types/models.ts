export type ExtractionMethodId = "method_1" | "method_2" | "method_3" | "method_4" | "method_5" | "method_6";

export type CoordinateMethod = ExtractionMethodId | "geocoded";

export type CoordinateFormat = "dms" | "decimal" | "microformat" | "kartographer";

export interface Coordinate {
  lat: number;
  lon: number;
  format: CoordinateFormat;
  original: string;
  method: CoordinateMethod;
}

/**
 * Coordinates already present in an input file. Only the pair is required;
 * files produced by earlier runs carry the full {@link Coordinate} shape.
 */
export interface SeededCoordinates {
  lat: number;
  lon: number;
  [field: string]: unknown;
}

export interface ArticleRecord {
  name: string;
  wikipedia_link: string;
  coordinates?: Coordinate | SeededCoordinates;
  address?: string;
  [field: string]: unknown;
}

export type OutcomeKey = ExtractionMethodId | "geocoded" | "address_only" | "failed";

export type StatisticKey = OutcomeKey | "skipped" | "malformed";

export type RunStatistics = Readonly<Record<StatisticKey, number>>;
