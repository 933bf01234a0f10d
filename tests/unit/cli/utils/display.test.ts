import { describe, it, expect } from "vitest";

import { formatAgeBand, formatPeriod } from "../../../../src/cli/utils/display.js";

describe("cli/utils/display", () => {
  describe("formatAgeBand", () => {
    it("should print closed bands with an inclusive upper age", () => {
      expect(formatAgeBand(0, 5)).toBe("0-4");
      expect(formatAgeBand(15, 65)).toBe("15-64");
    });

    it("should print open and total bands", () => {
      expect(formatAgeBand(85, null)).toBe("85+");
      expect(formatAgeBand(null, null)).toBe("all");
    });
  });

  describe("formatPeriod", () => {
    it("should print the finest period available", () => {
      expect(formatPeriod({ year: 2023, quarter: null, month: 3 })).toBe("2023-03");
      expect(formatPeriod({ year: 2023, quarter: 2, month: null })).toBe("2023-Q2");
      expect(formatPeriod({ year: 2023, quarter: null, month: null })).toBe("2023");
    });
  });
});
