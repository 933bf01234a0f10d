import { describe, it, expect } from "vitest";

import { parsePagePayload } from "../../../src/source/payload.js";
import {
  DEMO_PJAN_CONFIG,
  PAGED_INDEX_CONFIG,
  descriptor,
} from "../../helpers/upstream.js";

describe("source/payload", () => {
  // ============================================================================
  // JSON pages
  // ============================================================================

  describe("json", () => {
    it("should read an array page as rows", () => {
      const parsed = parsePagePayload(
        descriptor(DEMO_PJAN_CONFIG),
        JSON.stringify([{ region: "DE", year: 2023, value: 1 }])
      );

      expect(parsed).toEqual({
        rows: [{ region: "DE", year: 2023, value: 1 }],
        hasMore: false,
      });
    });

    it("should expect more pages while a page is full", () => {
      const paged = descriptor(PAGED_INDEX_CONFIG);

      const full = parsePagePayload(paged, JSON.stringify([{}, {}]));
      const short = parsePagePayload(paged, JSON.stringify([{}]));
      const empty = parsePagePayload(paged, "[]");

      expect(full.hasMore).toBe(true);
      expect(short.hasMore).toBe(false);
      expect(empty.hasMore).toBe(false);
    });

    it("should follow the next marker of object pages", () => {
      const paged = descriptor({
        ...PAGED_INDEX_CONFIG,
        paging: { pageParam: "page" },
      });

      const more = parsePagePayload(paged, JSON.stringify({ data: [{}], next: "p2" }));
      const last = parsePagePayload(paged, JSON.stringify({ data: [{}], next: null }));
      const missing = parsePagePayload(paged, JSON.stringify({ data: [{}] }));

      expect(more.hasMore).toBe(true);
      expect(last.hasMore).toBe(false);
      expect(missing.hasMore).toBe(false);
    });

    it("should read records from a custom records field", () => {
      const custom = descriptor({ ...DEMO_PJAN_CONFIG, recordsField: "items" });

      const parsed = parsePagePayload(custom, JSON.stringify({ items: [{ a: 1 }] }));

      expect(parsed.rows).toEqual([{ a: 1 }]);
    });

    it("should reject records that are not objects", () => {
      expect(() =>
        parsePagePayload(descriptor(DEMO_PJAN_CONFIG), JSON.stringify([1]))
      ).toThrow("JSON page[0] is not an object");
    });

    it("should reject a page without the records field", () => {
      expect(() =>
        parsePagePayload(descriptor(DEMO_PJAN_CONFIG), JSON.stringify({ rows: [] }))
      ).toThrow('JSON page field "data" is not an array');
    });
  });

  // ============================================================================
  // CSV pages
  // ============================================================================

  describe("csv", () => {
    it("should read a header row and trim cells", () => {
      const csv = descriptor({
        ...DEMO_PJAN_CONFIG,
        format: "csv",
        delimiter: ";",
      });

      const parsed = parsePagePayload(csv, "region;year;value\nDE ; 2023; 12\n\n");

      expect(parsed).toEqual({
        rows: [{ region: "DE", year: "2023", value: "12" }],
        hasMore: false,
      });
    });
  });
});
