export * from "./types.js";
export {
  DatasetRegistry,
  defineDataset,
  loadDatasetRegistry,
  parseDatasetsConfig,
} from "./registry.js";
export { DatasetConfigSchema, type DatasetConfig } from "./schema.js";
