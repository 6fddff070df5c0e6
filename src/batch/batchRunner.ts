import { toErrorMessage } from "../core/values";
import { loadArticleDocument } from "../crawl";
import type { PageSource } from "../crawl";
import { ExtractionPipeline } from "../extract";
import type { RejectedCandidate } from "../extract";
import type { Geocoder } from "../geocode";
import { Logger, MetricsRegistry } from "../observability";
import type { RecordSink } from "../sink";
import { describeMalformed, hasCoordinates, isArticleRecord } from "../store";
import type { ArticleRecord, OutcomeKey, RunStatistics } from "../types";
import { ProgressTracker } from "./progress";
import { emptyStatistics, incrementStatistic } from "./statistics";

export interface RecordDeps {
  logger: Logger;
  metrics: MetricsRegistry;
  fetcher: PageSource;
  pipeline: ExtractionPipeline;
  /** Absent when geocoding is disabled. */
  geocoder?: Geocoder;
  defaultLanguage: string;
}

export interface BatchDeps extends RecordDeps {
  sink: RecordSink;
  checkpointEvery: number;
  signal?: AbortSignal;
  now?: () => number;
}

export interface RecordResult {
  outcome: OutcomeKey;
  rejected: RejectedCandidate[];
  error?: string;
}

export interface BatchResult {
  entries: unknown[];
  statistics: RunStatistics;
  processed: number;
  interrupted: boolean;
}

/**
 * Fetches one article, runs the extraction pipeline and, for a detailed
 * address, the geocoder. Results are attached to `record` in place. Network
 * and geocoding failures come back as the `failed` outcome.
 */
export async function processRecord(record: ArticleRecord, deps: RecordDeps): Promise<RecordResult> {
  const { logger, metrics, fetcher, pipeline, geocoder } = deps;
  const fields = { name: record.name, url: record.wikipedia_link };

  let html: string;
  let pageUrl: string;
  try {
    const page = await fetcher.fetchPage(record.wikipedia_link);
    html = page.html;
    pageUrl = page.finalUrl;
  } catch (error) {
    const message = toErrorMessage(error);
    logger.warn("record_fetch_failed", { ...fields, error: message });
    return { outcome: "failed", rejected: [], error: message };
  }

  const stopExtract = metrics.startTimer("extract_ms");
  const document = loadArticleDocument(html, pageUrl, deps.defaultLanguage);
  const extraction = pipeline.extract(document);
  stopExtract();

  for (const candidate of extraction.rejected) {
    logger.debug("candidate_rejected", { ...fields, method: candidate.method, reason: candidate.reason });
  }

  if (extraction.kind === "coordinate") {
    record.coordinates = extraction.coordinate;
    metrics.incrementCounter("coordinates_found", 1);
    logger.info("coordinates_found", {
      ...fields,
      method: extraction.coordinate.method,
      lat: extraction.coordinate.lat,
      lon: extraction.coordinate.lon,
    });
    return { outcome: extraction.coordinate.method, rejected: extraction.rejected };
  }

  if (extraction.kind === "not_found") {
    logger.info("nothing_found", fields);
    return { outcome: "failed", rejected: extraction.rejected, error: "no coordinates or address found" };
  }

  record.address = extraction.address;
  metrics.incrementCounter("addresses_found", 1);
  logger.info("address_found", { ...fields, address: extraction.address, detailed: extraction.detailed });

  if (!extraction.detailed || !geocoder) {
    return { outcome: "address_only", rejected: extraction.rejected };
  }

  const stopGeocode = metrics.startTimer("geocode_ms");
  const geocoded = await geocoder.geocode(extraction.address, document.language);
  stopGeocode();

  if (!geocoded.ok) {
    metrics.incrementCounter("geocode_failed", 1);
    logger.warn("geocode_failed", { ...fields, reason: geocoded.reason, error: geocoded.message });
    return { outcome: "failed", rejected: extraction.rejected, error: geocoded.message };
  }

  record.coordinates = geocoded.coordinate;
  metrics.incrementCounter("geocode_ok", 1);
  logger.info("geocode_ok", { ...fields, lat: geocoded.coordinate.lat, lon: geocoded.coordinate.lon });
  return { outcome: "geocoded", rejected: extraction.rejected };
}

function countPending(entries: readonly unknown[]): number {
  return entries.filter((entry) => isArticleRecord(entry) && !hasCoordinates(entry)).length;
}

/**
 * Processes every record without coordinates, strictly one at a time and in
 * input order. Entries are enriched in place; the sink receives the whole
 * array after every `checkpointEvery` processed records and once at the end.
 */
export async function runBatch(entries: unknown[], deps: BatchDeps): Promise<BatchResult> {
  const { logger, metrics, sink, signal } = deps;
  const checkpointEvery = Math.max(1, deps.checkpointEvery);
  const progress = new ProgressTracker(countPending(entries), deps.now);

  let statistics = emptyStatistics();
  let processed = 0;
  let interrupted = false;

  for (const [index, entry] of entries.entries()) {
    if (signal?.aborted) {
      interrupted = true;
      logger.warn("batch_interrupted", { index, processed });
      break;
    }

    if (!isArticleRecord(entry)) {
      statistics = incrementStatistic(statistics, "malformed");
      logger.warn("record_malformed", { index, reason: describeMalformed(entry) });
      continue;
    }

    if (hasCoordinates(entry)) {
      statistics = incrementStatistic(statistics, "skipped");
      logger.debug("record_skipped", { index, name: entry.name });
      continue;
    }

    let result: RecordResult;
    try {
      result = await processRecord(entry, deps);
    } catch (error) {
      logger.error("record_failed", { index, name: entry.name, url: entry.wikipedia_link, error: toErrorMessage(error) });
      result = { outcome: "failed", rejected: [], error: toErrorMessage(error) };
    }

    statistics = incrementStatistic(statistics, result.outcome);
    processed += 1;

    const snapshot = progress.tick();
    logger.info("batch_progress", { index, name: entry.name, outcome: result.outcome, ...snapshot });

    if (processed % checkpointEvery === 0) {
      await sink.writeCheckpoint(entries, processed);
      metrics.incrementCounter("checkpoints_written", 1);
      logger.info("checkpoint_written", { processed });
    }
  }

  await sink.writeFinal(entries);
  return { entries, statistics, processed, interrupted };
}
