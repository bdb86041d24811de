import { describe, it, expect } from "vitest";
import { allOf, anyOf, col, divide, lessThan, lit, toTimestamp } from "./expressions.js";
import { MetricEvaluationError } from "../utils/errors.js";

describe("column expressions", () => {
  it("tracks the columns an expression reads", () => {
    const expr = col("x").div(col("y")).lt(col("z"));

    expect(expr.references).toEqual(["x", "y", "z"]);
    expect(expr.label).toBe("((x / y) < z)");
  });

  it("compares with SQL null logic", () => {
    const below = col("x").lt(10);

    expect(below.evaluate({ x: 3 })).toBe(true);
    expect(below.evaluate({ x: 10 })).toBe(false);
    expect(below.evaluate({ x: null })).toBeNull();
    expect(below.evaluate({})).toBeNull();
    expect(col("x").le(10).evaluate({ x: 10 })).toBe(true);
  });

  it("uses three-valued AND and OR", () => {
    expect(col("a").and(col("b")).evaluate({ a: true, b: null })).toBeNull();
    expect(col("a").and(col("b")).evaluate({ a: false, b: null })).toBe(false);
    expect(col("a").or(col("b")).evaluate({ a: true, b: null })).toBe(true);
    expect(col("a").or(col("b")).evaluate({ a: false, b: null })).toBeNull();
    expect(col("a").not().evaluate({ a: null })).toBeNull();
  });

  it("flags null, missing and NaN cells", () => {
    const isNull = col("x").isNull();

    expect(isNull.evaluate({ x: null })).toBe(true);
    expect(isNull.evaluate({})).toBe(true);
    expect(isNull.evaluate({ x: NaN })).toBe(true);
    expect(isNull.evaluate({ x: 0 })).toBe(false);
    expect(col("x").isNotNull().evaluate({ x: "" })).toBe(true);
  });

  it("combines lists of conditions", () => {
    const row = { a: 1, b: null };
    const checks = [col("a").isNull(), col("b").isNull()];

    expect(anyOf(checks).evaluate(row)).toBe(true);
    expect(allOf(checks).evaluate(row)).toBe(false);
    expect(allOf([]).evaluate(row)).toBe(true);
    expect(anyOf([]).evaluate(row)).toBe(false);
  });

  it("parses dates into timestamps", () => {
    const parsed = toTimestamp(col("day"), "%Y-%m-%d");

    expect(parsed.evaluate({ day: "2024-01-02" })).toBe(Date.UTC(2024, 0, 2));
    expect(parsed.evaluate({ day: "not a date" })).toBeNull();
  });

  it("compares literal values with eq", () => {
    expect(lit(5).eq(5).evaluate({})).toBe(true);
    expect(col("s").eq("a").evaluate({ s: "a" })).toBe(true);
    expect(col("s").eq("a").evaluate({ s: null })).toBeNull();
  });
});

describe("cell operations", () => {
  it("returns null when dividing by zero", () => {
    expect(divide(1, 0)).toBeNull();
    expect(divide(6, 3)).toBe(2);
    expect(divide(null, 3)).toBeNull();
  });

  it("refuses to order non-numeric values", () => {
    expect(() => lessThan("a", 1, true)).toThrow(MetricEvaluationError);
    expect(() => lessThan("a", 1, true)).toThrow("Cannot apply < to non-numeric value 'a'");
  });
});
