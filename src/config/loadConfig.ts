import fs from "node:fs";
import path from "node:path";
import { DEFAULT_LABEL_TERMS, mergeLabelTerms } from "./labelTerms";
import type { AppConfig, ConfigOverrides, DelayRange, LanguageLabelTerms } from "./types";

const DEFAULT_CONFIG: AppConfig = {
  userAgent: "wiki-coordinate-extractor/0.1 (batch coordinate lookup; contact: maintainer@example.org)",
  ignoreHttpsErrors: false,
  requestTimeoutMs: 20_000,
  maxFetchAttempts: 3,
  retryBaseDelayMs: 1_000,
  checkpointEvery: 10,
  defaultLanguage: "en",
  delays: {
    wikipedia: { minMs: 1_000, maxMs: 3_000 },
    // Nominatim usage policy: at most one request per second.
    geocoder: { minMs: 1_100, maxMs: 2_000 },
  },
  geocoding: {
    enabled: true,
    baseUrl: "https://nominatim.openstreetmap.org",
    minAddressComponents: 2,
    minAddressTokens: 3,
  },
  labelTerms: DEFAULT_LABEL_TERMS,
};

type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function invalidField(field: string, expected: string): Error {
  return new Error(`Config field ${field} must be ${expected}`);
}

function readNumber(source: JsonObject, key: string, field: string): number | undefined {
  const value = source[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw invalidField(field, "a finite number");
  }
  return value;
}

function readString(source: JsonObject, key: string, field: string): string | undefined {
  const value = source[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "string" || !value.trim()) {
    throw invalidField(field, "a non-empty string");
  }
  return value;
}

function readBoolean(source: JsonObject, key: string, field: string): boolean | undefined {
  const value = source[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "boolean") {
    throw invalidField(field, "a boolean");
  }
  return value;
}

function readStringList(source: JsonObject, key: string, field: string): string[] | undefined {
  const value = source[key];
  if (value === undefined) {
    return undefined;
  }
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === "string")) {
    throw invalidField(field, "an array of strings");
  }
  return value;
}

function readSection(source: JsonObject, key: string, field: string): JsonObject | undefined {
  const value = source[key];
  if (value === undefined) {
    return undefined;
  }
  if (!isJsonObject(value)) {
    throw invalidField(field, "an object");
  }
  return value;
}

function readDelayOverride(source: JsonObject | undefined, key: string): Partial<DelayRange> | undefined {
  const section = source ? readSection(source, key, `delays.${key}`) : undefined;
  if (!section) {
    return undefined;
  }
  return {
    minMs: readNumber(section, "minMs", `delays.${key}.minMs`),
    maxMs: readNumber(section, "maxMs", `delays.${key}.maxMs`),
  };
}

function readLabelTermOverrides(source: JsonObject): Record<string, Partial<LanguageLabelTerms>> | undefined {
  const section = readSection(source, "labelTerms", "labelTerms");
  if (!section) {
    return undefined;
  }

  const overrides: Record<string, Partial<LanguageLabelTerms>> = {};
  for (const language of Object.keys(section)) {
    const terms = readSection(section, language, `labelTerms.${language}`);
    if (terms) {
      overrides[language] = {
        coordinate: readStringList(terms, "coordinate", `labelTerms.${language}.coordinate`),
        address: readStringList(terms, "address", `labelTerms.${language}.address`),
      };
    }
  }
  return overrides;
}

/** Checks every known field of a parsed config file; unknown fields are ignored. */
function parseConfigOverrides(source: JsonObject): ConfigOverrides {
  const delays = readSection(source, "delays", "delays");
  const geocoding = readSection(source, "geocoding", "geocoding");

  return {
    userAgent: readString(source, "userAgent", "userAgent"),
    ignoreHttpsErrors: readBoolean(source, "ignoreHttpsErrors", "ignoreHttpsErrors"),
    requestTimeoutMs: readNumber(source, "requestTimeoutMs", "requestTimeoutMs"),
    maxFetchAttempts: readNumber(source, "maxFetchAttempts", "maxFetchAttempts"),
    retryBaseDelayMs: readNumber(source, "retryBaseDelayMs", "retryBaseDelayMs"),
    checkpointEvery: readNumber(source, "checkpointEvery", "checkpointEvery"),
    defaultLanguage: readString(source, "defaultLanguage", "defaultLanguage"),
    delays: {
      wikipedia: readDelayOverride(delays, "wikipedia"),
      geocoder: readDelayOverride(delays, "geocoder"),
    },
    geocoding: geocoding && {
      enabled: readBoolean(geocoding, "enabled", "geocoding.enabled"),
      baseUrl: readString(geocoding, "baseUrl", "geocoding.baseUrl"),
      minAddressComponents: readNumber(geocoding, "minAddressComponents", "geocoding.minAddressComponents"),
      minAddressTokens: readNumber(geocoding, "minAddressTokens", "geocoding.minAddressTokens"),
    },
    labelTerms: readLabelTermOverrides(source),
  };
}

function readConfigFile(configPath?: string): ConfigOverrides {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new Error(`Config file not found: ${absolutePath}`);
  }

  const raw = fs.readFileSync(absolutePath, "utf-8");
  const parsed: unknown = JSON.parse(raw);
  if (!isJsonObject(parsed)) {
    throw new Error(`Config file must contain a JSON object: ${absolutePath}`);
  }
  return parseConfigOverrides(parsed);
}

function toInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toDelayRange(minRaw: string | undefined, maxRaw: string | undefined, fallback: DelayRange): DelayRange {
  const minMs = Math.max(0, toInt(minRaw, fallback.minMs));
  const maxMs = Math.max(minMs, toInt(maxRaw, fallback.maxMs));
  return { minMs, maxMs };
}

function mergeDelay(base: DelayRange, override: Partial<DelayRange> | undefined): DelayRange {
  return {
    minMs: override?.minMs ?? base.minMs,
    maxMs: override?.maxMs ?? base.maxMs,
  };
}

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const fileConfig = readConfigFile(configPath);
  const fileGeocoding = fileConfig.geocoding ?? {};

  const merged: AppConfig = {
    userAgent: fileConfig.userAgent ?? DEFAULT_CONFIG.userAgent,
    ignoreHttpsErrors: fileConfig.ignoreHttpsErrors ?? DEFAULT_CONFIG.ignoreHttpsErrors,
    requestTimeoutMs: fileConfig.requestTimeoutMs ?? DEFAULT_CONFIG.requestTimeoutMs,
    maxFetchAttempts: fileConfig.maxFetchAttempts ?? DEFAULT_CONFIG.maxFetchAttempts,
    retryBaseDelayMs: fileConfig.retryBaseDelayMs ?? DEFAULT_CONFIG.retryBaseDelayMs,
    checkpointEvery: fileConfig.checkpointEvery ?? DEFAULT_CONFIG.checkpointEvery,
    defaultLanguage: fileConfig.defaultLanguage ?? DEFAULT_CONFIG.defaultLanguage,
    delays: {
      wikipedia: mergeDelay(DEFAULT_CONFIG.delays.wikipedia, fileConfig.delays?.wikipedia),
      geocoder: mergeDelay(DEFAULT_CONFIG.delays.geocoder, fileConfig.delays?.geocoder),
    },
    geocoding: {
      enabled: fileGeocoding.enabled ?? DEFAULT_CONFIG.geocoding.enabled,
      baseUrl: fileGeocoding.baseUrl ?? DEFAULT_CONFIG.geocoding.baseUrl,
      minAddressComponents: fileGeocoding.minAddressComponents ?? DEFAULT_CONFIG.geocoding.minAddressComponents,
      minAddressTokens: fileGeocoding.minAddressTokens ?? DEFAULT_CONFIG.geocoding.minAddressTokens,
    },
    labelTerms: mergeLabelTerms(DEFAULT_CONFIG.labelTerms, fileConfig.labelTerms),
  };

  return {
    ...merged,
    checkpointEvery: Math.max(1, Math.floor(merged.checkpointEvery)),
    maxFetchAttempts: Math.max(1, Math.floor(merged.maxFetchAttempts)),
    delays: {
      wikipedia: toDelayRange(env.PAGE_DELAY_MIN_MS, env.PAGE_DELAY_MAX_MS, merged.delays.wikipedia),
      geocoder: toDelayRange(env.GEOCODER_DELAY_MIN_MS, env.GEOCODER_DELAY_MAX_MS, merged.delays.geocoder),
    },
    geocoding: {
      ...merged.geocoding,
      baseUrl: env.GEOCODER_BASE_URL?.trim() || merged.geocoding.baseUrl,
    },
  };
}

export { DEFAULT_CONFIG };
