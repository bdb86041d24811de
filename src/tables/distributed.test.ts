import { describe, it, expect } from "vitest";
import { col, createDistributedTable, createLocalTable, partitionRows, toDistributedTable, toLocalTable } from "./index.js";
import { MetricEvaluationError, MissingColumnError } from "../utils/errors.js";

const rows = [
  { id: 1, team: "a", score: 10 },
  { id: 2, team: "b", score: null },
  { id: 3, team: "a", score: 30 },
  { id: 4, team: "c", score: 5 },
  { id: 5, team: "a", score: 20 },
];

describe("partitionRows", () => {
  it("splits rows into contiguous chunks", () => {
    const partitions = partitionRows(rows, 2);

    expect(partitions.map(p => p.map(r => r.id))).toEqual([[1, 2, 3], [4, 5]]);
  });

  it("keeps empty partitions for tiny tables", () => {
    expect(partitionRows([], 3)).toEqual([[], [], []]);
  });
});

describe("DistributedTable", () => {
  it("defers transformations until a terminal operation", () => {
    const df = createDistributedTable("scores", rows, { partitions: 2 });
    const filtered = df.filter(col("team").eq("a")).withColumn("double", col("score").div(0.5));

    expect(df.jobCount).toBe(0);
    expect(filtered.count()).toBe(3);
    expect(df.jobCount).toBe(1);
  });

  it("collects rows across partitions in order", () => {
    const df = createDistributedTable("scores", rows, { partitions: 3 });

    expect(df.select("id").collect()).toEqual([{ id: 1 }, { id: 2 }, { id: 3 }, { id: 4 }, { id: 5 }]);
  });

  it("counts rows per key with groupBy", () => {
    const df = createDistributedTable("scores", rows, { partitions: 2 });
    const counts = df.groupBy("team").count().collect();
    const byTeam = Object.fromEntries(counts.map(row => [String(row.team), row.count]));

    expect(byTeam).toEqual({ a: 3, b: 1, c: 1 });
  });

  it("takes the max and quantiles of a numeric column, skipping nulls", () => {
    const df = createDistributedTable("scores", rows, { partitions: 2 });

    expect(df.max("score")).toBe(30);
    expect(df.quantile("score", [0, 0.5, 1])).toEqual([5, 15, 30]);
    expect(df.filter(col("team").eq("b")).max("score")).toBeNull();
  });

  it("rejects plan steps on unknown columns when they are added", () => {
    const df = createDistributedTable("scores", rows);

    expect(() => df.filter(col("missing").isNull())).toThrow(MissingColumnError);
    expect(df.jobCount).toBe(0);
  });

  it("fails a job on non-numeric aggregation", () => {
    const df = createDistributedTable("scores", rows);

    expect(() => df.max("team")).toThrow(MetricEvaluationError);
  });
});

describe("table conversion", () => {
  it("round-trips rows between backends", () => {
    const local = createLocalTable("scores", rows);
    const distributed = toDistributedTable(local, 3);

    expect(distributed.kind).toBe("distributed");
    expect(distributed.numPartitions).toBe(3);
    expect(toLocalTable(distributed).toRows()).toEqual(rows);
    expect(distributed.jobCount).toBe(1);
  });

  it("returns tables already on the requested backend unchanged", () => {
    const local = createLocalTable("scores", rows);
    const distributed = createDistributedTable("scores", rows);

    expect(toLocalTable(local)).toBe(local);
    expect(toDistributedTable(distributed)).toBe(distributed);
  });
});
