export interface DelayRange {
  minMs: number;
  maxMs: number;
}

export interface LanguageLabelTerms {
  coordinate: string[];
  address: string[];
}

/** Infobox label terms keyed by article language code. */
export type LabelTermTable = Record<string, LanguageLabelTerms>;

export interface GeocodingSettings {
  enabled: boolean;
  baseUrl: string;
  minAddressComponents: number;
  minAddressTokens: number;
}

export interface AppConfig {
  userAgent: string;
  ignoreHttpsErrors: boolean;
  requestTimeoutMs: number;
  maxFetchAttempts: number;
  retryBaseDelayMs: number;
  checkpointEvery: number;
  defaultLanguage: string;
  delays: {
    wikipedia: DelayRange;
    geocoder: DelayRange;
  };
  geocoding: GeocodingSettings;
  labelTerms: LabelTermTable;
}

export type ConfigOverrides = Partial<Omit<AppConfig, "delays" | "geocoding" | "labelTerms">> & {
  delays?: {
    wikipedia?: Partial<DelayRange>;
    geocoder?: Partial<DelayRange>;
  };
  geocoding?: Partial<GeocodingSettings>;
  labelTerms?: Record<string, Partial<LanguageLabelTerms>>;
};
