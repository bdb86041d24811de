import { describe, it, expect } from "vitest";
import { daysBetween, formatDate, parseDate } from "./dates.js";

describe("dates", () => {
  describe("parseDate", () => {
    it("parses ISO dates in UTC", () => {
      expect(parseDate("2024-03-15", "%Y-%m-%d")?.toISOString()).toBe("2024-03-15T00:00:00.000Z");
    });

    it("parses custom formats with time fields", () => {
      expect(parseDate("15/03/2024 08:30:05", "%d/%m/%Y %H:%M:%S")?.toISOString())
        .toBe("2024-03-15T08:30:05.000Z");
    });

    it("treats dots in the format literally", () => {
      expect(parseDate("15.03.2024", "%d.%m.%Y")?.toISOString()).toBe("2024-03-15T00:00:00.000Z");
      expect(parseDate("15x03x2024", "%d.%m.%Y")).toBeNull();
    });

    it("keeps years below 100 as written", () => {
      expect(parseDate("0099-01-01", "%Y-%m-%d")?.toISOString()).toBe("0099-01-01T00:00:00.000Z");
      expect(formatDate(new Date(Date.parse("0099-01-01T00:00:00Z")), "%Y-%m-%d")).toBe("0099-01-01");
    });

    it("rejects impossible dates and other formats", () => {
      expect(parseDate("2024-02-30", "%Y-%m-%d")).toBeNull();
      expect(parseDate("2024-13-01", "%Y-%m-%d")).toBeNull();
      expect(parseDate("03/15/2024", "%Y-%m-%d")).toBeNull();
    });

    it("returns null for values that are not strings", () => {
      expect(parseDate(20240315, "%Y-%m-%d")).toBeNull();
      expect(parseDate(null, "%Y-%m-%d")).toBeNull();
    });
  });

  describe("formatDate", () => {
    it("writes every directive zero-padded", () => {
      const date = new Date(Date.UTC(2024, 0, 5, 7, 8, 9));
      expect(formatDate(date, "%Y-%m-%d")).toBe("2024-01-05");
      expect(formatDate(date, "%d.%m.%Y %H:%M:%S")).toBe("05.01.2024 07:08:09");
      expect(formatDate(date, "100%% on %Y")).toBe("100% on 2024");
    });
  });

  describe("daysBetween", () => {
    it("counts whole days, rounding down", () => {
      const earlier = new Date(Date.UTC(2024, 0, 1));
      expect(daysBetween(earlier, new Date(Date.UTC(2024, 0, 11, 23, 59)))).toBe(10);
      expect(daysBetween(earlier, earlier)).toBe(0);
    });
  });
});
