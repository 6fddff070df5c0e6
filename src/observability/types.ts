export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogFields {
  index?: number;
  name?: string;
  url?: string;
  attempt?: number;
  [key: string]: unknown;
}

export type MetricCounterName =
  | "pages_fetched"
  | "pages_failed"
  | "fetch_retries"
  | "coordinates_found"
  | "addresses_found"
  | "geocode_ok"
  | "geocode_failed"
  | "checkpoints_written";

export type MetricTimerName = "page_fetch_ms" | "extract_ms" | "geocode_ms";
