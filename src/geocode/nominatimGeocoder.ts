import { parseRawCoordinate } from "../coordinates";
import { defaultFetch, fetchWithTimeout, getFetchDispatcher } from "../core/fetch";
import type { FetchLike, TimedExchange } from "../core/fetch";
import { PolitenessGate } from "../core/politeness";
import { isPlainObject, toErrorMessage } from "../core/values";
import type { Coordinate } from "../types";

export type GeocodeFailureReason =
  | "http_error"
  | "rate_limited"
  | "request_failed"
  | "invalid_json"
  | "empty_result"
  | "invalid_coordinates";

export type GeocodeOutcome =
  | { ok: true; coordinate: Coordinate; displayName?: string }
  | { ok: false; reason: GeocodeFailureReason; message: string; httpStatus?: number };

export interface Geocoder {
  geocode(address: string, language?: string): Promise<GeocodeOutcome>;
}

export interface NominatimGeocoderOptions {
  baseUrl: string;
  userAgent: string;
  requestTimeoutMs: number;
  fallbackLanguage: string;
  gate: PolitenessGate;
  ignoreHttpsErrors?: boolean;
  fetchFn?: FetchLike;
}

export function buildSearchUrl(baseUrl: string, query: string): string {
  const url = new URL(`${baseUrl.replace(/\/+$/, "")}/search`);
  url.searchParams.set("q", query);
  url.searchParams.set("format", "jsonv2");
  url.searchParams.set("limit", "1");
  return url.toString();
}

function failure(reason: GeocodeFailureReason, message: string, httpStatus?: number): GeocodeOutcome {
  return { ok: false, reason, message, httpStatus };
}

/**
 * Looks up a cleaned address against a Nominatim `/search` endpoint. One
 * request per address, top-ranked row only; every failure is returned, not thrown.
 */
export class NominatimGeocoder implements Geocoder {
  private readonly options: NominatimGeocoderOptions;
  private readonly fetchFn: FetchLike;

  constructor(options: NominatimGeocoderOptions) {
    this.options = options;
    this.fetchFn = options.fetchFn ?? defaultFetch;
  }

  async geocode(address: string, language?: string): Promise<GeocodeOutcome> {
    const { gate, userAgent, requestTimeoutMs, fallbackLanguage } = this.options;
    const url = buildSearchUrl(this.options.baseUrl, address);

    await gate.acquire("geocoder");

    let exchange: TimedExchange<string>;
    try {
      exchange = await fetchWithTimeout(
        this.fetchFn,
        url,
        {
          method: "GET",
          headers: {
            "user-agent": userAgent,
            accept: "application/json",
            "accept-language": language || fallbackLanguage,
          },
          dispatcher: getFetchDispatcher(this.options.ignoreHttpsErrors ?? false),
        },
        requestTimeoutMs,
        (response) => response.text(),
      );
    } catch (error) {
      return failure("request_failed", `geocoding request failed: ${toErrorMessage(error)}`);
    }

    const { response, body } = exchange;

    if (response.status === 429) {
      return failure("rate_limited", "geocoder rate limit reached", 429);
    }
    if (!response.ok) {
      return failure("http_error", `geocoder answered HTTP ${response.status}`, response.status);
    }

    let rows: unknown;
    try {
      rows = JSON.parse(body ?? "");
    } catch (error) {
      return failure("invalid_json", `invalid JSON response: ${toErrorMessage(error)}`);
    }

    const top: unknown = Array.isArray(rows) ? rows[0] : undefined;
    if (!isPlainObject(top) || top.lat === undefined || top.lon === undefined) {
      return failure("empty_result", `no result for "${address}"`);
    }

    const parsed = parseRawCoordinate({ kind: "object", label: "geocoded", lat: top.lat, lon: top.lon });
    if (!parsed.ok) {
      return failure("invalid_coordinates", parsed.reason);
    }

    return {
      ok: true,
      coordinate: { ...parsed.value, method: "geocoded" },
      displayName: typeof top.display_name === "string" ? top.display_name : undefined,
    };
  }
}
