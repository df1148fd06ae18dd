import { describe, expect, it } from "vitest";
import { formatSummary, truncate } from "../../cli/src/utils/format.js";

describe("truncate", () => {
  it("keeps short text", () => {
    expect(truncate("short")).toBe("short");
  });

  it("cuts long text to the limit", () => {
    const text = truncate("x".repeat(60));
    expect(text).toHaveLength(50);
    expect(text.endsWith("...")).toBe(true);
  });
});

describe("formatSummary", () => {
  it("prints the empty marker", () => {
    expect(formatSummary({ status: "empty", message: "No execution history" })).toEqual([
      "No execution history",
    ]);
  });

  it("prints counts and the success rate", () => {
    expect(
      formatSummary({
        status: "ok",
        total: 4,
        successful: 3,
        failed: 1,
        successRate: 0.75,
        byStatus: { success: 3, failed: 1, timeout: 0, error: 0 },
        lastEntry: {
          tool: "runs_record_event",
          args: {},
          status: "success",
          timestamp: "2026-01-01T00:00:00.000Z",
          durationMs: 2,
        },
      }),
    ).toEqual(["Total: 4", "Successful: 3", "Failed: 1", "Success rate: 75.0%"]);
  });
});
