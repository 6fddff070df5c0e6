import fs from "node:fs";
import path from "node:path";
import { FatalIoError } from "../core/errors";
import { isPlainObject, toErrorMessage } from "../core/values";
import type { ArticleRecord } from "../types";

/** Why an entry cannot be processed, or `undefined` when it is a usable record. */
export function describeMalformed(value: unknown): string | undefined {
  if (!isPlainObject(value)) {
    return "entry is not an object";
  }
  if (typeof value.name !== "string" || !value.name.trim()) {
    return "missing or non-string name";
  }
  if (typeof value.wikipedia_link !== "string" || !value.wikipedia_link.trim()) {
    return "missing or non-string wikipedia_link";
  }
  if (value.coordinates !== undefined) {
    const coordinates = value.coordinates;
    if (!isPlainObject(coordinates) || typeof coordinates.lat !== "number" || typeof coordinates.lon !== "number") {
      return "coordinates must be an object with numeric lat and lon";
    }
  }
  if (value.address !== undefined && typeof value.address !== "string") {
    return "address must be a string";
  }
  return undefined;
}

export function isArticleRecord(value: unknown): value is ArticleRecord {
  return describeMalformed(value) === undefined;
}

export function hasCoordinates(record: ArticleRecord): boolean {
  return record.coordinates !== undefined;
}

export function serializeRecords(entries: readonly unknown[]): string {
  return `${JSON.stringify(entries, null, 4)}\n`;
}

export function readRecordFile(filePath: string): unknown[] {
  const absolutePath = path.resolve(filePath);
  let raw: string;
  try {
    raw = fs.readFileSync(absolutePath, "utf-8");
  } catch (error) {
    throw new FatalIoError(`cannot read ${absolutePath}: ${toErrorMessage(error)}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new FatalIoError(`${absolutePath} is not valid JSON: ${toErrorMessage(error)}`);
  }

  if (!Array.isArray(parsed)) {
    throw new FatalIoError(`${absolutePath} must contain a JSON array of records`);
  }
  return parsed;
}

/** Creates the output directory when needed and checks that it accepts writes. */
export function assertWritableTarget(filePath: string): void {
  const directory = path.dirname(path.resolve(filePath));
  try {
    fs.mkdirSync(directory, { recursive: true });
    fs.accessSync(directory, fs.constants.W_OK);
  } catch (error) {
    throw new FatalIoError(`output directory ${directory} is not writable: ${toErrorMessage(error)}`);
  }
}
