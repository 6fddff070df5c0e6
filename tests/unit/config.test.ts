import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { DEFAULT_CONFIG, DEFAULT_LABEL_TERMS, loadConfig, resolveLabelTerms } from "../../src/config";

const tempDirs: string[] = [];

const writeConfigFile = (content: unknown): string => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "wiki-coords-config-"));
  tempDirs.push(dir);
  const filePath = path.join(dir, "config.json");
  fs.writeFileSync(filePath, JSON.stringify(content));
  return filePath;
};

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

describe("loadConfig", () => {
  it("returns the defaults without a file or environment", () => {
    expect(loadConfig(undefined, {})).toEqual(DEFAULT_CONFIG);
  });

  it("applies the delay and geocoder environment overrides", () => {
    const config = loadConfig(undefined, {
      PAGE_DELAY_MIN_MS: "0",
      PAGE_DELAY_MAX_MS: "500",
      GEOCODER_DELAY_MIN_MS: "5000",
      GEOCODER_BASE_URL: "http://localhost:8080",
    });

    expect(config.delays.wikipedia).toEqual({ minMs: 0, maxMs: 500 });
    expect(config.delays.geocoder).toEqual({ minMs: 5_000, maxMs: 5_000 });
    expect(config.geocoding.baseUrl).toBe("http://localhost:8080");
  });

  it("merges the config file over the defaults", () => {
    const filePath = writeConfigFile({
      checkpointEvery: 0,
      geocoding: { minAddressTokens: 4 },
      labelTerms: {
        en: { address: ["Street address"] },
        sv: { coordinate: ["Koordinater"], address: ["Adress"] },
      },
    });

    const config = loadConfig(filePath, {});

    expect(config.checkpointEvery).toBe(1);
    expect(config.geocoding).toEqual({ ...DEFAULT_CONFIG.geocoding, minAddressTokens: 4 });
    expect(config.labelTerms.en.address).toEqual(["Address", "Location", "Street address"]);
    expect(config.labelTerms.sv).toEqual({ coordinate: ["Koordinater"], address: ["Adress"] });
  });

  it("keeps the defaults for fields the file leaves out", () => {
    const config = loadConfig(writeConfigFile({ delays: { geocoder: { maxMs: 4_000 } } }), {});

    expect(config.delays).toEqual({
      wikipedia: { minMs: 1_000, maxMs: 3_000 },
      geocoder: { minMs: 1_100, maxMs: 4_000 },
    });
    expect(config.checkpointEvery).toBe(10);
  });

  it("rejects fields of the wrong type", () => {
    expect(() => loadConfig(writeConfigFile({ checkpointEvery: "ten" }), {})).toThrow(
      "Config field checkpointEvery must be a finite number",
    );
    expect(() => loadConfig(writeConfigFile({ labelTerms: { en: { address: "Street address" } } }), {})).toThrow(
      "Config field labelTerms.en.address must be an array of strings",
    );
    expect(() => loadConfig(writeConfigFile({ geocoding: { enabled: "yes" } }), {})).toThrow(
      "Config field geocoding.enabled must be a boolean",
    );
  });

  it("rejects a missing file and a non-object file", () => {
    expect(() => loadConfig(path.join(os.tmpdir(), "wiki-coords-no-such-config.json"), {})).toThrow(/Config file not found/);
    expect(() => loadConfig(writeConfigFile([1, 2]), {})).toThrow(/must contain a JSON object/);
  });
});

describe("resolveLabelTerms", () => {
  it("merges the article language with the fallback language", () => {
    expect(resolveLabelTerms(DEFAULT_LABEL_TERMS, "fi", "en")).toEqual({
      coordinate: ["Koordinaatit", "Coordinates"],
      address: ["Sijainti", "Osoite", "Address", "Location"],
    });
  });

  it("uses every configured term when neither language is known", () => {
    expect(resolveLabelTerms(DEFAULT_LABEL_TERMS, "de", "xx").coordinate).toEqual(["Coordinates", "Koordinaatit"]);
  });
});
