/**
 * Natural key hashing for fact rows
 *
 * Nullable dimensions cannot take part in a SQL unique index reliably, so
 * each fact is identified by a SHA-256 over its full natural key.
 */

import { createHash } from "node:crypto";

import type { FactRecord } from "../types/facts.js";

/**
 * Compute the natural key hash for a fact.
 *
 * The key is (family, source, region, year, quarter, month) followed by the
 * family's dimensions: sex and age band, or industry code and unit. It is
 * serialized as a JSON array so a null and the code "N" stay distinct.
 */
export function computeNaturalKeyHash(
  fact: FactRecord,
  sourceId: number,
  regionId: number
): string {
  const dimensions =
    fact.family === "demographic"
      ? [fact.sex, fact.ageMin, fact.ageMax]
      : [fact.industryCode, fact.unit];

  const key = JSON.stringify([
    fact.family,
    sourceId,
    regionId,
    fact.year,
    fact.quarter,
    fact.month,
    ...dimensions,
  ]);

  return createHash("sha256").update(key).digest("hex");
}
