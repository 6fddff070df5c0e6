import { describe, expect, it } from "vitest";
import { createRunId } from "../../src/observability";

describe("createRunId", () => {
  it("stamps the run with a file-safe timestamp", () => {
    const runId = createRunId(new Date("2026-03-04T05:06:07.089Z"));

    expect(runId).toMatch(/^run_2026-03-04T05-06-07-089Z_[a-z0-9]{1,6}$/);
  });
});
