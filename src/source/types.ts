import type { DatasetDescriptor } from "../datasets/types.js";
import type { SourceType } from "../types/facts.js";

/** One flat upstream observation: dimension codes, labels and the value */
export type RawRow = Record<string, unknown>;

export interface RawPage {
  datasetId: string;
  pageIndex: number;
  url: string;
  /** Exact query parameters sent, page parameters included */
  params: Record<string, string>;
  /** ISO-8601 retrieval time */
  fetchedAt: string;
  payload: string;
  /** SHA-256 of the payload text */
  contentHash: string;
  rows: RawRow[];
  hasMore: boolean;
}

export type QueryOverrides = Readonly<Record<string, string>>;

export interface FetchPagesOptions {
  /** Page index to start from; earlier pages are not requested */
  startPage?: number;
  /** Checked before each request; an aborted signal ends the sequence */
  signal?: AbortSignal;
}

/** The data source row a page source records its facts under */
export interface SourceOrigin {
  name: string;
  sourceType: SourceType;
  url: string;
}

/**
 * Anything that yields the pages of a dataset: the upstream API client or a
 * local export file.
 */
export interface PageSource {
  origin(descriptor: DatasetDescriptor): SourceOrigin;
  fetchPages(
    descriptor: DatasetDescriptor,
    overrides?: QueryOverrides,
    options?: FetchPagesOptions
  ): AsyncGenerator<RawPage, void, undefined>;
}
