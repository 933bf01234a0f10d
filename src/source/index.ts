export {
  SourceClient,
  hashPayload,
  type SourceClientOptions,
} from "./client.js";
export { FileSource, detectFileFormat, type FileSourceOptions } from "./file-source.js";
export { flattenJsonStat } from "./jsonstat.js";
export { parsePagePayload } from "./payload.js";
export { HostRateLimiter, sleep, type Sleep } from "./rate-limiter.js";
export type {
  FetchPagesOptions,
  PageSource,
  QueryOverrides,
  RawPage,
  RawRow,
  SourceOrigin,
} from "./types.js";
