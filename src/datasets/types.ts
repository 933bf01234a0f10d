/**
 * Dataset descriptor types.
 *
 * A descriptor says where a dataset lives upstream, how its payload is shaped
 * and which upstream field carries each unified dimension.
 */

/** Shape family of the upstream payload, decides which fact table it lands in */
export type DatasetFamily = "demographic" | "industrial" | "energy";

export type PayloadFormat = "jsonstat" | "json" | "csv";

/** Age as one banded code field (`Y0-4`) or as explicit bounds */
export type AgeDimension =
  | { readonly field: string }
  | { readonly minField: string; readonly maxField: string };

export interface DimensionMapping {
  readonly geography: string;
  readonly geographyLabel?: string;
  readonly time: string;
  readonly sex?: string;
  readonly age?: AgeDimension;
  readonly industry?: string;
  readonly unit?: string;
}

export interface PagingDescriptor {
  /** Query parameter carrying the page number */
  readonly pageParam: string;
  readonly firstPage: number;
  readonly sizeParam?: string;
  readonly pageSize?: number;
  readonly maxPages: number;
}

export interface DatasetDescriptor {
  readonly id: string;
  readonly name: string;
  readonly family: DatasetFamily;
  readonly format: PayloadFormat;
  /** Upstream path below the base URL, defaults to the id */
  readonly path?: string;
  readonly baseUrl?: string;
  readonly dimensions: DimensionMapping;
  readonly defaultParams: Readonly<Record<string, string>>;
  readonly valueField: string;
  /** What the value measures, e.g. "population" or "index" */
  readonly measure: string;
  readonly paging?: PagingDescriptor;
  /** JSON pages: field holding the record array */
  readonly recordsField?: string;
  /** JSON pages: field signalling that another page exists */
  readonly nextField?: string;
  readonly delimiter?: string;
}
