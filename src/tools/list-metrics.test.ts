import { afterEach, describe, expect, it, vi } from "vitest";
import { createListMetricsTool } from "./list-metrics.js";

describe("list_metrics tool", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("lists every metric kind", async () => {
    const result = await createListMetricsTool().handler({});
    const metrics = JSON.parse(result.content[0]?.text ?? "[]");

    expect(metrics).toHaveLength(10);
    expect(metrics[0].kind).toBe("total-count");
  });

  it("filters by kind", async () => {
    const result = await createListMetricsTool().handler({ kind: "date-lag" });

    expect(JSON.parse(result.content[0]?.text ?? "[]")).toEqual([
      {
        kind: "date-lag",
        summary: "Days between the latest date in the column and today",
        parameters: [
          { name: "column", type: "string", required: true },
          { name: "format", type: "string", required: false, default: "%Y-%m-%d" },
        ],
        resultKeys: ["today", "last_day", "lag"],
      },
    ]);
  });

  it("returns an error response for an unknown kind", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const result = await createListMetricsTool().handler({ kind: "mean" });

    expect(result.isError).toBe(true);
    expect(result.content[0]?.text.split("\n")[0]).toBe(
      "Failed to execute tool 'list_metrics': Unknown metric kind: mean"
    );
  });
});
