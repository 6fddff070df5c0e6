import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { runCli } from "../../src/cli";
import { runStatusCommand, runUrlCommand } from "../../src/core/commands";
import { FatalIoError } from "../../src/core/errors";
import { MetricsRegistry } from "../../src/observability";
import { createFetchStub, infoboxPage, jsonResponse, quietLogger, testConfig, textResponse } from "../helpers";

const CATHEDRAL_URL = "https://en.wikipedia.org/wiki/Helsinki_Cathedral";
const MARKET_HALL_URL = "https://en.wikipedia.org/wiki/Old_Market_Hall";
const GEOCODER_BASE_URL = "https://geo.example.test";

const PAGES: Record<string, string> = {
  [CATHEDRAL_URL]: infoboxPage([["Coordinates", "60°10′14″N 24°57′07″E"]]),
  [MARKET_HALL_URL]: infoboxPage([["Address", "Eteläranta, Helsinki[2]"]]),
};

const ENV = {
  PAGE_DELAY_MIN_MS: "0",
  PAGE_DELAY_MAX_MS: "0",
  GEOCODER_DELAY_MIN_MS: "0",
  GEOCODER_DELAY_MAX_MS: "0",
  GEOCODER_BASE_URL,
};

const createSiteStub = () =>
  createFetchStub((url) => {
    if (url.startsWith(`${GEOCODER_BASE_URL}/search`)) {
      return jsonResponse(url, [{ lat: "60.1672", lon: "24.9536", display_name: "Vanha kauppahalli" }]);
    }
    const html = PAGES[url];
    return html === undefined ? textResponse(url, "not found", 404) : textResponse(url, html);
  });

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "wiki-coords-cli-"));
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "error").mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
  fs.rmSync(dir, { recursive: true, force: true });
});

const writeJson = (name: string, value: unknown): string => {
  const filePath = path.join(dir, name);
  fs.writeFileSync(filePath, JSON.stringify(value));
  return filePath;
};

const readJson = (filePath: string): unknown => JSON.parse(fs.readFileSync(filePath, "utf-8"));

describe("batch command", () => {
  it("enriches records from pages and the geocoder and writes the output file", async () => {
    const inputPath = writeJson("input.json", [
      { name: "Helsinki Cathedral", wikipedia_link: CATHEDRAL_URL },
      { name: "Old Market Hall", wikipedia_link: MARKET_HALL_URL },
      { name: "Seeded", wikipedia_link: "https://en.wikipedia.org/wiki/Seeded", coordinates: { lat: 1, lon: 2 } },
      { name: "Broken" },
    ]);
    const outputPath = path.join(dir, "output.json");
    const fetchFn = createSiteStub();

    const exitCode = await runCli(["batch", inputPath, outputPath, "--quiet"], {
      env: ENV,
      fetchFn,
      sleep: async () => undefined,
    });

    expect(exitCode).toBe(0);
    expect(fetchFn).toHaveBeenCalledTimes(3);
    const output = readJson(outputPath);
    expect(output).toEqual([
      {
        name: "Helsinki Cathedral",
        wikipedia_link: CATHEDRAL_URL,
        coordinates: {
          lat: expect.closeTo(60.170556, 5),
          lon: expect.closeTo(24.951944, 5),
          format: "dms",
          original: "60°10′14″N, 24°57′07″E",
          method: "method_3",
        },
      },
      {
        name: "Old Market Hall",
        wikipedia_link: MARKET_HALL_URL,
        address: "Eteläranta, Helsinki",
        coordinates: {
          lat: 60.1672,
          lon: 24.9536,
          format: "decimal",
          original: "geocoded: 60.1672, 24.9536",
          method: "geocoded",
        },
      },
      { name: "Seeded", wikipedia_link: "https://en.wikipedia.org/wiki/Seeded", coordinates: { lat: 1, lon: 2 } },
      { name: "Broken" },
    ]);
  });

  it("resumes from the output file and skips records enriched earlier", async () => {
    const records = [
      { name: "Helsinki Cathedral", wikipedia_link: CATHEDRAL_URL },
      { name: "Old Market Hall", wikipedia_link: MARKET_HALL_URL },
    ];
    const inputPath = writeJson("input.json", records);
    const outputPath = writeJson("output.json", [
      { ...records[0], coordinates: { lat: 60.17, lon: 24.95, format: "decimal", original: "60.17; 24.95", method: "method_1" } },
      records[1],
    ]);
    const fetchFn = createSiteStub();

    await runCli(["batch", inputPath, outputPath, "--resume", "--no-geocode", "--quiet"], {
      env: ENV,
      fetchFn,
      sleep: async () => undefined,
    });

    expect(fetchFn.mock.calls.map(([url]) => url)).toEqual([MARKET_HALL_URL]);
    expect(readJson(outputPath)).toEqual([
      { ...records[0], coordinates: { lat: 60.17, lon: 24.95, format: "decimal", original: "60.17; 24.95", method: "method_1" } },
      { ...records[1], address: "Eteläranta, Helsinki" },
    ]);
  });

  it("writes nothing in dry-run mode", async () => {
    const inputPath = writeJson("input.json", [{ name: "Helsinki Cathedral", wikipedia_link: CATHEDRAL_URL }]);
    const outputPath = path.join(dir, "output.json");

    const exitCode = await runCli(["batch", inputPath, outputPath, "--dry-run", "--quiet"], {
      env: ENV,
      fetchFn: createSiteStub(),
      sleep: async () => undefined,
    });

    expect(exitCode).toBe(0);
    expect(fs.existsSync(outputPath)).toBe(false);
  });

  it("fails before processing when the input file is unreadable", async () => {
    const fetchFn = createSiteStub();

    await expect(
      runCli(["batch", path.join(dir, "missing.json"), path.join(dir, "output.json"), "--quiet"], { env: ENV, fetchFn }),
    ).rejects.toBeInstanceOf(FatalIoError);
    expect(fetchFn).not.toHaveBeenCalled();
  });
});

describe("url and status commands", () => {
  const context = () => ({
    runId: "run_test",
    config: testConfig(),
    logger: quietLogger(),
    metrics: new MetricsRegistry(),
    fetchFn: createSiteStub(),
    sleep: async () => undefined,
  });

  it("prints the enriched record with its DMS rendering", async () => {
    const { record, result } = await runUrlCommand(context(), CATHEDRAL_URL);

    expect(record.name).toBe("Helsinki Cathedral");
    expect(result.outcome).toBe("method_3");
    const printed: unknown = JSON.parse(String(vi.mocked(console.log).mock.calls[0][0]));
    expect(printed).toMatchObject({ outcome: "method_3", dms: "60°10′14.000″N 24°57′7.000″E", rejected: [] });
  });

  it("rejects a URL that is not http(s)", async () => {
    await expect(runUrlCommand(context(), "ftp://example.org/page")).rejects.toThrow("Not an http(s) URL: ftp://example.org/page");
  });

  it("summarizes an output file", async () => {
    const filePath = writeJson("output.json", [
      { name: "A", wikipedia_link: CATHEDRAL_URL, coordinates: { lat: 1, lon: 2, method: "geocoded" } },
      { name: "B", wikipedia_link: MARKET_HALL_URL, address: "Eteläranta, Helsinki" },
    ]);

    await expect(runStatusCommand(context(), filePath)).resolves.toEqual({
      total: 2,
      malformed: 0,
      withCoordinates: 1,
      addressOnly: 1,
      withoutLocation: 0,
      byMethod: { geocoded: 1 },
    });
  });
});
