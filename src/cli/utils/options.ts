/**
 * Option parsers shared by CLI commands
 */

import { InvalidArgumentError } from "commander";

import type { PayloadFormat } from "../../datasets/types.js";

const PAYLOAD_FORMATS: readonly PayloadFormat[] = ["jsonstat", "json", "csv"];

export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError(`Not an integer: ${value}`);
  }
  return parsed;
}

export function parsePositiveInteger(value: string): number {
  const parsed = parseInteger(value);
  if (parsed < 1) {
    throw new InvalidArgumentError(`Must be at least 1: ${value}`);
  }
  return parsed;
}

/**
 * Collect repeated `--param key=value` options into one record
 */
export function collectParam(
  value: string,
  previous: Record<string, string>
): Record<string, string> {
  const separator = value.indexOf("=");
  if (separator <= 0) {
    throw new InvalidArgumentError(`Expected key=value, got: ${value}`);
  }
  return {
    ...previous,
    [value.slice(0, separator)]: value.slice(separator + 1),
  };
}

/**
 * Collect repeated `--field-mapping column:field` options
 */
export function collectFieldMapping(
  value: string,
  previous: Record<string, string>
): Record<string, string> {
  const separator = value.indexOf(":");
  const from = value.slice(0, separator).trim();
  const to = value.slice(separator + 1).trim();
  if (separator <= 0 || from === "" || to === "") {
    throw new InvalidArgumentError(`Expected column:field, got: ${value}`);
  }
  return { ...previous, [from]: to };
}

export function parsePayloadFormat(value: string): PayloadFormat {
  const format = PAYLOAD_FORMATS.find((candidate) => candidate === value.toLowerCase());
  if (format === undefined) {
    throw new InvalidArgumentError(
      `Unknown format: ${value} (expected ${PAYLOAD_FORMATS.join(", ")})`
    );
  }
  return format;
}
