import type { LabelTermTable, LanguageLabelTerms } from "./types";

export const DEFAULT_LABEL_TERMS: LabelTermTable = {
  en: {
    coordinate: ["Coordinates"],
    address: ["Address", "Location"],
  },
  fi: {
    coordinate: ["Koordinaatit"],
    address: ["Sijainti", "Osoite"],
  },
};

function unique(values: string[]): string[] {
  return [...new Set(values)];
}

/**
 * Terms for an article language, merged with the fallback language's terms.
 * Unknown languages with no usable fallback get every configured term.
 */
export function resolveLabelTerms(table: LabelTermTable, language: string, fallbackLanguage: string): LanguageLabelTerms {
  let sources = [table[language], table[fallbackLanguage]].filter(
    (terms): terms is LanguageLabelTerms => terms !== undefined,
  );
  if (sources.length === 0) {
    sources = Object.values(table);
  }

  return {
    coordinate: unique(sources.flatMap((terms) => terms.coordinate)),
    address: unique(sources.flatMap((terms) => terms.address)),
  };
}

export function mergeLabelTerms(
  base: LabelTermTable,
  overrides: Record<string, Partial<LanguageLabelTerms>> | undefined,
): LabelTermTable {
  const merged: LabelTermTable = { ...base };
  for (const [language, terms] of Object.entries(overrides ?? {})) {
    const current = merged[language] ?? { coordinate: [], address: [] };
    merged[language] = {
      coordinate: unique([...current.coordinate, ...(terms.coordinate ?? [])]),
      address: unique([...current.address, ...(terms.address ?? [])]),
    };
  }
  return merged;
}
