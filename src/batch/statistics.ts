import type { OutcomeKey, RunStatistics, StatisticKey } from "../types";

export const OUTCOME_KEYS: readonly OutcomeKey[] = [
  "method_1",
  "method_2",
  "method_3",
  "method_4",
  "method_5",
  "method_6",
  "geocoded",
  "address_only",
  "failed",
];

export function emptyStatistics(): RunStatistics {
  return {
    method_1: 0,
    method_2: 0,
    method_3: 0,
    method_4: 0,
    method_5: 0,
    method_6: 0,
    geocoded: 0,
    address_only: 0,
    failed: 0,
    skipped: 0,
    malformed: 0,
  };
}

export function incrementStatistic(statistics: RunStatistics, key: StatisticKey, by = 1): RunStatistics {
  return { ...statistics, [key]: statistics[key] + by };
}

/** Records that went through fetch and extraction: one outcome each. */
export function totalProcessed(statistics: RunStatistics): number {
  return OUTCOME_KEYS.reduce((sum, key) => sum + statistics[key], 0);
}
