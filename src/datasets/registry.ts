/**
 * DatasetRegistry - immutable catalogue of dataset descriptors
 *
 * Built once at startup from configuration. Descriptors are deep-frozen, so
 * concurrent runs can share them without coordination.
 */

import { readFileSync } from "node:fs";

import { Value } from "@sinclair/typebox/value";

import { UnknownDatasetError } from "../errors.js";
import { DatasetsFileSchema, type DatasetConfig } from "./schema.js";

import type { DatasetDescriptor } from "./types.js";

const DEFAULT_MAX_PAGES = 1000;

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Apply defaults to a validated dataset config and freeze the result.
 */
export function defineDataset(config: DatasetConfig): DatasetDescriptor {
  const descriptor: DatasetDescriptor = {
    id: config.id,
    name: config.name,
    family: config.family,
    format: config.format,
    path: config.path,
    baseUrl: config.baseUrl,
    dimensions: { ...config.dimensions },
    defaultParams: { ...(config.defaultParams ?? {}) },
    valueField: config.valueField ?? "value",
    measure: config.measure,
    paging:
      config.paging === undefined
        ? undefined
        : {
            pageParam: config.paging.pageParam,
            firstPage: config.paging.firstPage ?? 0,
            sizeParam: config.paging.sizeParam,
            pageSize: config.paging.pageSize,
            maxPages: config.paging.maxPages ?? DEFAULT_MAX_PAGES,
          },
    recordsField:
      config.format === "json" ? (config.recordsField ?? "data") : undefined,
    nextField:
      config.format === "json" ? (config.nextField ?? "next") : undefined,
    delimiter: config.format === "csv" ? (config.delimiter ?? ",") : undefined,
  };
  return deepFreeze(descriptor);
}

export class DatasetRegistry {
  private readonly byId: ReadonlyMap<string, DatasetDescriptor>;
  private readonly ordered: readonly DatasetDescriptor[];

  constructor(descriptors: readonly DatasetDescriptor[]) {
    const byId = new Map<string, DatasetDescriptor>();
    for (const descriptor of descriptors) {
      if (byId.has(descriptor.id)) {
        throw new Error(`Duplicate dataset id in configuration: ${descriptor.id}`);
      }
      byId.set(descriptor.id, descriptor);
    }
    this.byId = byId;
    this.ordered = Object.freeze([...descriptors]);
  }

  static fromConfigs(configs: readonly DatasetConfig[]): DatasetRegistry {
    return new DatasetRegistry(configs.map(defineDataset));
  }

  lookup(datasetId: string): DatasetDescriptor {
    const descriptor = this.byId.get(datasetId);
    if (descriptor === undefined) {
      throw new UnknownDatasetError(datasetId);
    }
    return descriptor;
  }

  has(datasetId: string): boolean {
    return this.byId.has(datasetId);
  }

  all(): readonly DatasetDescriptor[] {
    return this.ordered;
  }
}

/**
 * Validate parsed configuration JSON and build a registry from it.
 */
export function parseDatasetsConfig(input: unknown): DatasetRegistry {
  if (!Value.Check(DatasetsFileSchema, input)) {
    const problems = [...Value.Errors(DatasetsFileSchema, input)]
      .slice(0, 5)
      .map((e) => `${e.path || "/"}: ${e.message}`);
    throw new Error(`Invalid dataset configuration: ${problems.join("; ")}`);
  }
  return DatasetRegistry.fromConfigs(input.datasets);
}

export function loadDatasetRegistry(path: string): DatasetRegistry {
  const raw = readFileSync(path, "utf8");
  return parseDatasetsConfig(JSON.parse(raw));
}
