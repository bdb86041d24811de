import { describe, it, expect } from "vitest";
import { createDistributedTable, createLocalTable } from "../tables/index.js";
import type { Table } from "../tables/index.js";
import { DataQualityError, UnsupportedTableKindError } from "../utils/errors.js";
import { defineMetric, describeLimits, describeMetric, evaluateMetric, METRIC_CATALOG } from "./index.js";

describe("defineMetric", () => {
  it("applies defaults", () => {
    expect(defineMetric({ kind: "null-count", columns: ["a"] }))
      .toEqual({ kind: "null-count", columns: ["a"], aggregation: "any" });
    expect(defineMetric({ kind: "confidence-bound", column: "v" }))
      .toEqual({ kind: "confidence-bound", column: "v", conf: 0.95 });
    expect(defineMetric({ kind: "date-lag", column: "d" }))
      .toEqual({ kind: "date-lag", column: "d", format: "%Y-%m-%d" });
  });

  it("returns a frozen metric", () => {
    expect(Object.isFrozen(defineMetric({ kind: "zero-count", column: "x" }))).toBe(true);
  });

  it("freezes column lists", () => {
    const columns = ["x"];
    const metric = defineMetric({ kind: "duplicate-count", columns });
    columns.push("y");

    expect(metric.kind === "duplicate-count" && Object.isFrozen(metric.columns)).toBe(true);
    expect(describeMetric(metric)).toBe("duplicate-count(columns=[x])");
  });

  it("rejects invalid parameters with a validation error", () => {
    expect(() => defineMetric({ kind: "confidence-bound", column: "v", conf: 1 }))
      .toThrow(DataQualityError);
    expect(() => defineMetric({ kind: "null-count", columns: [] }))
      .toThrow("Validation failed: columns: At least one column is required");
  });

  it("names the metric kind in the suggestions", () => {
    try {
      defineMetric({ kind: "zero-count", column: "" });
      expect.fail("defineMetric should have thrown");
    } catch (error) {
      expect(error).toBeInstanceOf(DataQualityError);
      if (error instanceof DataQualityError) {
        expect(error.suggestions[0]).toBe('Check the arguments for metric="zero-count"');
      }
    }
  });
});

describe("evaluateMetric", () => {
  const metric = defineMetric({ kind: "zero-count", column: "x" });
  const rows = [{ x: 0 }, { x: 1 }];

  it("dispatches on the table kind", () => {
    const expected = { total: 2, count: 1, delta: 0.5 };

    expect(evaluateMetric(metric, createLocalTable("t", rows))).toEqual(expected);
    expect(evaluateMetric(metric, createDistributedTable("t", rows))).toEqual(expected);
  });

  it("runs one job per count on distributed tables", () => {
    const df = createDistributedTable("t", rows);
    evaluateMetric(metric, df);

    expect(df.jobCount).toBe(2);
  });

  it("rejects values that are not tables", () => {
    const parquet = { kind: "parquet" } as unknown as Table;
    const array = [] as unknown as Table;

    expect(() => evaluateMetric(metric, parquet)).toThrow(UnsupportedTableKindError);
    expect(() => evaluateMetric(metric, parquet))
      .toThrow("Unsupported table kind: parquet. Supported kinds: local, distributed");
    expect(() => evaluateMetric(metric, array)).toThrow("Unsupported table kind: object");
  });
});

describe("describeMetric", () => {
  it("lists parameters after the kind", () => {
    expect(describeMetric(defineMetric({ kind: "zero-count", column: "x" }))).toBe("zero-count(column=x)");
    expect(describeMetric(defineMetric({ kind: "total-count" }))).toBe("total-count()");
    expect(describeMetric(defineMetric({ kind: "duplicate-count", columns: ["a", "b"] })))
      .toBe("duplicate-count(columns=[a, b])");
    expect(describeMetric(defineMetric({ kind: "below-threshold-count", column: "v", value: 5 })))
      .toBe("below-threshold-count(column=v, value=5, strict=false)");
  });

  it("quotes string literal values", () => {
    expect(describeMetric(defineMetric({ kind: "exact-value-count", column: "x", value: "5" })))
      .toBe('exact-value-count(column=x, value="5")');
  });
});

describe("describeLimits", () => {
  it("renders each range", () => {
    expect(describeLimits({ delta: [0.5, 1], count: [0, 10] })).toBe("{delta: [0.5, 1], count: [0, 10]}");
    expect(describeLimits({})).toBe("{}");
  });
});

describe("METRIC_CATALOG", () => {
  it("documents every metric kind once", () => {
    const kinds = METRIC_CATALOG.map(entry => entry.kind);

    expect(kinds).toHaveLength(10);
    expect(new Set(kinds).size).toBe(10);
  });
});
