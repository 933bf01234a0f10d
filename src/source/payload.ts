/**
 * Page payload parsing per descriptor format
 */

import { parse as parseCsv } from "csv-parse/sync";

import { flattenJsonStat } from "./jsonstat.js";

import type { DatasetDescriptor } from "../datasets/types.js";
import type { RawRow } from "./types.js";

export interface ParsedPage {
  rows: RawRow[];
  /** Upstream indicated that another page follows */
  hasMore: boolean;
}

function isRow(value: unknown): value is RawRow {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toRows(records: unknown, what: string): RawRow[] {
  if (!Array.isArray(records)) {
    throw new Error(`${what} is not an array`);
  }
  return records.map((record, i) => {
    if (!isRow(record)) {
      throw new Error(`${what}[${String(i)}] is not an object`);
    }
    return record;
  });
}

function hasNextMarker(value: unknown): boolean {
  return value !== undefined && value !== null && value !== false && value !== "";
}

/**
 * A page shorter than the configured page size is the last one.
 */
function morePagesExpected(
  descriptor: DatasetDescriptor,
  rowCount: number
): boolean {
  if (descriptor.paging === undefined || rowCount === 0) {
    return false;
  }
  const { pageSize } = descriptor.paging;
  return pageSize === undefined || rowCount >= pageSize;
}

/**
 * Parse a page payload into flat rows. Throws on malformed payloads.
 */
export function parsePagePayload(
  descriptor: DatasetDescriptor,
  payload: string
): ParsedPage {
  switch (descriptor.format) {
    case "jsonstat": {
      const rows = flattenJsonStat(JSON.parse(payload));
      return { rows, hasMore: morePagesExpected(descriptor, rows.length) };
    }

    case "json": {
      const body: unknown = JSON.parse(payload);
      if (Array.isArray(body)) {
        const rows = toRows(body, "JSON page");
        return { rows, hasMore: morePagesExpected(descriptor, rows.length) };
      }
      if (!isRow(body)) {
        throw new Error("JSON page is neither an array nor an object");
      }
      const recordsField = descriptor.recordsField ?? "data";
      const rows = toRows(body[recordsField], `JSON page field "${recordsField}"`);
      const nextField = descriptor.nextField ?? "next";
      // Object pages end when the next marker is missing or empty
      const hasMore =
        descriptor.paging !== undefined &&
        rows.length > 0 &&
        hasNextMarker(body[nextField]);
      return { rows, hasMore };
    }

    case "csv": {
      const records: unknown = parseCsv(payload, {
        columns: true,
        skip_empty_lines: true,
        trim: true,
        delimiter: descriptor.delimiter ?? ",",
      });
      const rows = toRows(records, "CSV page");
      return { rows, hasMore: morePagesExpected(descriptor, rows.length) };
    }
  }
}
