/**
 * Dimension parsers
 *
 * Each parser returns null when the input cannot be read. Totals are
 * reported explicitly so callers can tell "all" apart from "unreadable".
 */

import type { RegionLevel, Sex, TimePeriod } from "../types/facts.js";

export const MIN_YEAR = 1900;
export const MAX_YEAR = 2100;

const TOTAL_CODES = new Set(["T", "TOTAL", "ALL", "BOTH", "BOTH SEXES"]);

export function isMissing(value: unknown): boolean {
  return (
    value === undefined ||
    value === null ||
    (typeof value === "string" && value.trim() === "")
  );
}

export function asText(value: unknown): string | null {
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed === "" ? null : trimmed;
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  return null;
}

// Optional trailing status flags as published by Eurostat ("123.4 p")
const NUMERIC_PATTERN = /^([-+]?\d+(?:\.\d+)?)(?:\s+[a-z]{1,3})?$/i;
// Commas only as thousands separators; "1,5" is a decimal comma, not 15
const GROUPED_PATTERN = /^[-+]?\d{1,3}(?:,\d{3})+(?:\.\d+)?(?:\s+[a-z]{1,3})?$/i;

/**
 * Parse an observation value. Markers such as "N/A" or ":" are unparseable.
 */
export function parseNumericValue(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value !== "string") {
    return null;
  }
  const text = value.trim();
  const match = NUMERIC_PATTERN.exec(
    GROUPED_PATTERN.test(text) ? text.replaceAll(",", "") : text
  );
  if (match?.[1] === undefined) {
    return null;
  }
  return Number(match[1]);
}

function inYearRange(year: number): boolean {
  return Number.isInteger(year) && year >= MIN_YEAR && year <= MAX_YEAR;
}

/**
 * Parse a time code: 2023, "2023", "2023M01", "2023-01", "2023Q2",
 * "2023-Q2", or an ISO date. Years outside 1900-2100 are rejected.
 */
export function parseTimePeriod(value: unknown): TimePeriod | null {
  if (typeof value === "number") {
    return inYearRange(value) ? { year: value, quarter: null, month: null } : null;
  }
  const text = asText(value);
  if (text === null) {
    return null;
  }
  const upper = text.toUpperCase();

  let match = /^(\d{4})$/.exec(upper);
  if (match) {
    const year = Number(match[1]);
    return inYearRange(year) ? { year, quarter: null, month: null } : null;
  }

  match = /^(\d{4})-?Q([1-4])$/.exec(upper);
  if (match) {
    const year = Number(match[1]);
    return inYearRange(year)
      ? { year, quarter: Number(match[2]), month: null }
      : null;
  }

  match = /^(\d{4})(?:M|-)?(\d{2})(?:-\d{2})?$/.exec(upper);
  if (match) {
    const year = Number(match[1]);
    const month = Number(match[2]);
    if (!inYearRange(year) || month < 1 || month > 12) {
      return null;
    }
    return { year, quarter: null, month };
  }

  return null;
}

export type SexCode = Sex | "TOTAL";

/**
 * Normalize a sex code or label. Returns null for unrecognized input.
 */
export function normalizeSex(value: unknown): SexCode | null {
  const text = asText(value);
  if (text === null) {
    return null;
  }
  const upper = text.toUpperCase();
  if (TOTAL_CODES.has(upper)) {
    return "TOTAL";
  }
  switch (upper) {
    case "M":
    case "MALE":
    case "MALES":
    case "MEN":
      return "M";
    case "F":
    case "FEMALE":
    case "FEMALES":
    case "WOMEN":
      return "F";
    case "O":
    case "OTHER":
    case "UNKNOWN":
    case "UNK":
      return "O";
    default:
      return null;
  }
}

export interface AgeBand {
  /** null together with max null means all ages */
  min: number | null;
  /** Exclusive; null for open-ended bands */
  max: number | null;
}

const TOTAL_AGE: AgeBand = { min: null, max: null };

function band(min: number, max: number | null): AgeBand | null {
  if (max !== null && max <= min) {
    return null;
  }
  return { min, max };
}

/**
 * Parse an age code such as `Y0-4`, `Y_GE85`, `Y_LT5`, `Y10`, `TOTAL`,
 * or a plain label such as `0-4`, `65+`, `under 5`.
 */
export function parseAgeCode(value: unknown): AgeBand | null {
  const text = asText(value);
  if (text === null) {
    return null;
  }
  const code = text.toUpperCase();
  if (code === "TOTAL" || code === "T") {
    return TOTAL_AGE;
  }

  const patterns: [RegExp, (m: RegExpExecArray) => AgeBand | null][] = [
    [/^Y_?GE(\d+)$/, (m) => band(Number(m[1]), null)],
    [/^Y_?LT(\d+)$/, (m) => band(0, Number(m[1]))],
    [/^Y(\d+)-(\d+)$/, (m) => band(Number(m[1]), Number(m[2]) + 1)],
    [/^Y(\d+)$/, (m) => band(Number(m[1]), Number(m[1]) + 1)],
    [/^(\d+)\s*(?:-|TO)\s*(\d+)$/, (m) => band(Number(m[1]), Number(m[2]) + 1)],
    [/^(\d+)\s*\+$/, (m) => band(Number(m[1]), null)],
    [/^(?:OVER|ABOVE)\s*(\d+)$/, (m) => band(Number(m[1]), null)],
    [/^UNDER\s*(\d+)$/, (m) => band(0, Number(m[1]))],
    [/^(\d+)$/, (m) => band(Number(m[1]), Number(m[1]) + 1)],
  ];

  for (const [pattern, toBand] of patterns) {
    const match = pattern.exec(code);
    if (match) {
      return toBand(match);
    }
  }
  return null;
}

function asAge(value: unknown): number | null {
  const parsed = parseNumericValue(value);
  return parsed !== null && Number.isInteger(parsed) && parsed >= 0
    ? parsed
    : null;
}

/**
 * Read explicit age bounds. The lower bound is required; a missing upper
 * bound means open-ended.
 */
export function parseAgeBounds(min: unknown, max: unknown): AgeBand | null {
  const lower = asAge(min);
  if (lower === null) {
    return null;
  }
  if (isMissing(max)) {
    return { min: lower, max: null };
  }
  const upper = asAge(max);
  return upper === null ? null : band(lower, upper);
}

/**
 * Normalize an industry classification code (NACE or energy balance):
 * upper-cased, without a `NACE_` prefix.
 */
export function normalizeIndustryCode(value: unknown): string | null {
  const text = asText(value);
  if (text === null) {
    return null;
  }
  const code = text.toUpperCase().replace(/^NACE_?/, "");
  return code === "" ? null : code;
}

const AGGREGATE_PREFIX = /^(?:EU|EA|EEA|EFTA)(?:\d|_|$)/;

export function normalizeRegionCode(value: unknown): string | null {
  const text = asText(value);
  return text === null ? null : text.toUpperCase();
}

/**
 * Level of a NUTS-style code: two letters for a country, one more
 * character per NUTS level. EU/EA/EEA/EFTA codes are aggregates.
 */
export function regionLevelFor(code: string): RegionLevel {
  if (AGGREGATE_PREFIX.test(code)) {
    return "AGGREGATE";
  }
  if (/^[A-Z]{2}$/.test(code)) {
    return "COUNTRY";
  }
  if (/^[A-Z]{2}[0-9A-Z]{1,3}$/.test(code)) {
    switch (code.length) {
      case 3:
        return "NUTS1";
      case 4:
        return "NUTS2";
      default:
        return "NUTS3";
    }
  }
  return "AGGREGATE";
}

export function parentRegionCode(code: string): string | null {
  switch (regionLevelFor(code)) {
    case "NUTS1":
    case "NUTS2":
    case "NUTS3":
      return code.slice(0, -1);
    default:
      return null;
  }
}
