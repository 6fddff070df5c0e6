import { hasCoordinates, isArticleRecord } from "../store";

export interface RecordSummary {
  total: number;
  malformed: number;
  withCoordinates: number;
  addressOnly: number;
  withoutLocation: number;
  /** Coordinates per provenance; records seeded without a method count as `unspecified`. */
  byMethod: Record<string, number>;
}

export function summarizeRecords(entries: readonly unknown[]): RecordSummary {
  const summary: RecordSummary = {
    total: entries.length,
    malformed: 0,
    withCoordinates: 0,
    addressOnly: 0,
    withoutLocation: 0,
    byMethod: {},
  };

  for (const entry of entries) {
    if (!isArticleRecord(entry)) {
      summary.malformed += 1;
      continue;
    }

    if (hasCoordinates(entry)) {
      summary.withCoordinates += 1;
      const method = entry.coordinates?.method;
      const key = typeof method === "string" ? method : "unspecified";
      summary.byMethod[key] = (summary.byMethod[key] ?? 0) + 1;
    } else if (entry.address) {
      summary.addressOnly += 1;
    } else {
      summary.withoutLocation += 1;
    }
  }

  return summary;
}
