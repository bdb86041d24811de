import { describe, it, expect } from "vitest";
import { loadConfig } from "./config.js";

describe("Config", () => {
  describe("loadConfig", () => {
    it("uses defaults when nothing is set", () => {
      const config = loadConfig({});

      expect(config).toEqual({
        defaultEngine: "local",
        defaultPartitions: 4,
        maxColumnWidth: 40,
        maxRowsPerTable: 100000,
      });
    });

    it("reads DQ_* environment variables", () => {
      const config = loadConfig({
        DQ_DEFAULT_ENGINE: "distributed",
        DQ_DEFAULT_PARTITIONS: "8",
        DQ_MAX_COLUMN_WIDTH: "60",
        DQ_MAX_ROWS_PER_TABLE: "500",
      });

      expect(config.defaultEngine).toBe("distributed");
      expect(config.defaultPartitions).toBe(8);
      expect(config.maxColumnWidth).toBe(60);
      expect(config.maxRowsPerTable).toBe(500);
    });

    it("treats empty variables as unset", () => {
      expect(loadConfig({ DQ_DEFAULT_ENGINE: "" }).defaultEngine).toBe("local");
    });

    it("throws a readable error for an unknown engine", () => {
      expect(() => loadConfig({ DQ_DEFAULT_ENGINE: "spark" }))
        .toThrow(/Configuration error:\n  - defaultEngine:/);
    });

    it("rejects non-positive partition counts", () => {
      expect(() => loadConfig({ DQ_DEFAULT_PARTITIONS: "0" })).toThrow(/DQ_DEFAULT_PARTITIONS=4/);
    });
  });
});
