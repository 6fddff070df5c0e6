import fs from "node:fs";
import path from "node:path";
import type { AppConfig } from "../config";
import { processRecord, runBatch, summarizeRecords } from "../batch";
import type { BatchResult, RecordDeps, RecordResult, RecordSummary } from "../batch";
import { formatDms } from "../coordinates";
import { articleNameFromUrl, WikipediaPageFetcher } from "../crawl";
import { createExtractionPipeline } from "../extract";
import { NominatimGeocoder } from "../geocode";
import { Logger, MetricsRegistry } from "../observability";
import { createSink } from "../sink";
import { assertWritableTarget, hasCoordinates, isArticleRecord, readRecordFile } from "../store";
import type { ArticleRecord } from "../types";
import type { FetchLike } from "./fetch";
import { PolitenessGate } from "./politeness";
import { isHttpUrl } from "./values";

export interface CommandContext {
  runId: string;
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  fetchFn?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
}

export interface BatchCommandOptions {
  inputPath: string;
  outputPath: string;
  resume: boolean;
  dryRun: boolean;
  signal?: AbortSignal;
}

export interface BatchCommandSummary {
  result: BatchResult;
  summary: RecordSummary;
}

export interface UrlCommandResult {
  record: ArticleRecord;
  result: RecordResult;
}

function createRecordDeps(ctx: CommandContext): RecordDeps {
  const { config, logger, metrics } = ctx;
  const gate = new PolitenessGate({ delays: config.delays, sleep: ctx.sleep });

  const fetcher = new WikipediaPageFetcher({
    config,
    gate,
    logger: logger.child("fetch"),
    metrics,
    fetchFn: ctx.fetchFn,
    sleep: ctx.sleep,
  });

  const pipeline = createExtractionPipeline({
    labelTerms: config.labelTerms,
    defaultLanguage: config.defaultLanguage,
    addressPolicy: {
      minComponents: config.geocoding.minAddressComponents,
      minTokens: config.geocoding.minAddressTokens,
    },
  });

  const geocoder = config.geocoding.enabled
    ? new NominatimGeocoder({
        baseUrl: config.geocoding.baseUrl,
        userAgent: config.userAgent,
        requestTimeoutMs: config.requestTimeoutMs,
        fallbackLanguage: config.defaultLanguage,
        ignoreHttpsErrors: config.ignoreHttpsErrors,
        gate,
        fetchFn: ctx.fetchFn,
      })
    : undefined;

  return { logger, metrics, fetcher, pipeline, geocoder, defaultLanguage: config.defaultLanguage };
}

function countRecords(entries: readonly unknown[]): { coordinated: number; withAddress: number } {
  let coordinated = 0;
  let withAddress = 0;
  for (const entry of entries) {
    if (!isArticleRecord(entry)) {
      continue;
    }
    if (hasCoordinates(entry)) {
      coordinated += 1;
    }
    if (entry.address) {
      withAddress += 1;
    }
  }
  return { coordinated, withAddress };
}

export async function runBatchCommand(ctx: CommandContext, options: BatchCommandOptions): Promise<BatchCommandSummary> {
  const outputPath = path.resolve(options.outputPath);
  let sourcePath = path.resolve(options.inputPath);
  if (options.resume) {
    if (fs.existsSync(outputPath)) {
      sourcePath = outputPath;
    } else {
      ctx.logger.warn("resume_without_output", { outputPath });
    }
  }

  const entries = readRecordFile(sourcePath);
  if (!options.dryRun) {
    assertWritableTarget(outputPath);
  }

  const existing = countRecords(entries);
  ctx.logger.info("batch_start", {
    sourcePath,
    outputPath,
    records: entries.length,
    alreadyCoordinated: existing.coordinated,
    alreadyWithAddress: existing.withAddress,
    geocoding: ctx.config.geocoding.enabled,
    checkpointEvery: ctx.config.checkpointEvery,
    dryRun: options.dryRun,
  });

  const result = await runBatch(entries, {
    ...createRecordDeps(ctx),
    logger: ctx.logger,
    sink: createSink(options.dryRun ? "memory" : "json_file", outputPath),
    checkpointEvery: ctx.config.checkpointEvery,
    signal: options.signal,
  });

  const summary = summarizeRecords(result.entries);
  ctx.logger.info("batch_complete", {
    processed: result.processed,
    interrupted: result.interrupted,
    statistics: result.statistics,
    summary,
  });
  return { result, summary };
}

export async function runUrlCommand(ctx: CommandContext, url: string): Promise<UrlCommandResult> {
  if (!isHttpUrl(url)) {
    throw new Error(`Not an http(s) URL: ${url}`);
  }

  const record: ArticleRecord = { name: articleNameFromUrl(url), wikipedia_link: url };
  const result = await processRecord(record, createRecordDeps(ctx));

  console.log(
    JSON.stringify(
      {
        record,
        outcome: result.outcome,
        dms: record.coordinates ? formatDms(record.coordinates) : undefined,
        rejected: result.rejected,
        error: result.error,
      },
      null,
      2,
    ),
  );
  return { record, result };
}

export async function runStatusCommand(ctx: CommandContext, filePath: string): Promise<RecordSummary> {
  ctx.logger.info("status_start", { filePath });
  const summary = summarizeRecords(readRecordFile(filePath));
  ctx.logger.info("status_complete", { summary });
  console.log(JSON.stringify(summary, null, 2));
  return summary;
}
