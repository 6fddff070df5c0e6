import { describe, expect, it } from "vitest";
import { DEFAULT_LABEL_TERMS } from "../../src/config";
import {
  createDefaultMethods,
  createExtractionPipeline,
  ExtractionPipeline,
  InfoboxAddressExtractor,
  InlineSpanMethod,
} from "../../src/extract";
import type { CoordinateExtractionMethod } from "../../src/extract";
import { buildDocument, infoboxPage } from "../helpers";

const pipeline = createExtractionPipeline({
  labelTerms: DEFAULT_LABEL_TERMS,
  defaultLanguage: "en",
  addressPolicy: { minComponents: 2, minTokens: 3 },
});

const INLINE_SPAN = `<p><span id="coordinates">60°10′14″N 24°57′07″E</span></p>`;

describe("ExtractionPipeline", () => {
  it("reports method_3 for a page with only an infobox coordinate row", () => {
    const outcome = pipeline.extract(buildDocument(infoboxPage([["Coordinates", "60°10′N 24°56′E"]])));

    expect(outcome.kind).toBe("coordinate");
    if (outcome.kind !== "coordinate") {
      return;
    }
    expect(outcome.coordinate.method).toBe("method_3");
    expect(outcome.coordinate.lat).toBeCloseTo(60.166667, 5);
    expect(outcome.coordinate.lon).toBeCloseTo(24.933333, 5);
    expect(outcome.coordinate.original).toBe("60°10′N, 24°56′E");
  });

  it("prefers method_1 when the inline span and the infobox row are both present", () => {
    const outcome = pipeline.extract(buildDocument(infoboxPage([["Coordinates", "61°N 25°E"]], INLINE_SPAN)));

    expect(outcome.kind === "coordinate" && outcome.coordinate.method).toBe("method_1");
  });

  it("emits coordinate fields in lat, lon, format, original, method order", () => {
    const outcome = pipeline.extract(buildDocument(INLINE_SPAN));

    expect(outcome.kind === "coordinate" && Object.keys(outcome.coordinate)).toEqual([
      "lat",
      "lon",
      "format",
      "original",
      "method",
    ]);
  });

  it("records an unparseable candidate and continues with the next method", () => {
    const outcome = pipeline.extract(
      buildDocument(infoboxPage([["Coordinates", "60.17; 24.93"]], `<span id="coordinates">95°10′N 24°10′E</span>`)),
    );

    expect(outcome.kind === "coordinate" && outcome.coordinate.method).toBe("method_3");
    expect(outcome.rejected).toHaveLength(1);
    expect(outcome.rejected[0].method).toBe("method_1");
    expect(outcome.rejected[0].reason).toMatch(/^latitude out of range/);
  });

  it("records a throwing method as rejected", () => {
    const failing: CoordinateExtractionMethod = {
      id: "method_2",
      description: "always throws",
      attempt: () => {
        throw new Error("boom");
      },
    };
    const custom = new ExtractionPipeline(
      [failing, new InlineSpanMethod()],
      new InfoboxAddressExtractor(DEFAULT_LABEL_TERMS, "en"),
      { minComponents: 2, minTokens: 3 },
    );

    const outcome = custom.extract(buildDocument(INLINE_SPAN));

    expect(outcome.kind === "coordinate" && outcome.coordinate.method).toBe("method_1");
    expect(outcome.rejected).toEqual([{ method: "method_2", reason: "method threw: boom" }]);
  });

  it("runs methods in list order, so reordering the list changes the winner", () => {
    const [inline, , infobox] = createDefaultMethods(DEFAULT_LABEL_TERMS, "en");
    const reordered = new ExtractionPipeline([infobox, inline], new InfoboxAddressExtractor(DEFAULT_LABEL_TERMS, "en"), {
      minComponents: 2,
      minTokens: 3,
    });

    const outcome = reordered.extract(buildDocument(infoboxPage([["Coordinates", "61°N 25°E"]], INLINE_SPAN)));

    expect(reordered.methodIds).toEqual(["method_3", "method_1"]);
    expect(outcome.kind === "coordinate" && outcome.coordinate.method).toBe("method_3");
  });

  it("falls back to the cleaned infobox address", () => {
    const outcome = pipeline.extract(buildDocument(infoboxPage([["Address", "Unioninkatu 29,  Helsinki[1][2]"]])));

    expect(outcome).toEqual({ kind: "address", address: "Unioninkatu 29, Helsinki", detailed: true, rejected: [] });
  });

  it("marks a single-word address as not detailed", () => {
    const outcome = pipeline.extract(buildDocument(infoboxPage([["Location", "Helsinki"]])));

    expect(outcome).toEqual({ kind: "address", address: "Helsinki", detailed: false, rejected: [] });
  });

  it("reports not_found when neither coordinates nor an address exist", () => {
    expect(pipeline.extract(buildDocument("<p>A place without a location.</p>"))).toEqual({
      kind: "not_found",
      rejected: [],
    });
  });
});
