/**
 * FileSource - a dataset export on local disk, read as one page
 *
 * Feeds the same orchestrator pipeline as the upstream client: the file is
 * archived, normalized against the dataset's descriptor and upserted.
 */

import { readFile } from "node:fs/promises";
import { basename, extname, resolve } from "node:path";
import { pathToFileURL } from "node:url";

import { SourceError, errorMessage } from "../errors.js";
import { sourceLogger } from "../logger.js";
import { hashPayload } from "./client.js";
import { parsePagePayload, type ParsedPage } from "./payload.js";

import type { DatasetDescriptor, PayloadFormat } from "../datasets/types.js";
import type {
  FetchPagesOptions,
  PageSource,
  QueryOverrides,
  RawPage,
  RawRow,
  SourceOrigin,
} from "./types.js";

export interface FileSourceOptions {
  path: string;
  /** Detected from the file extension when omitted */
  format?: PayloadFormat;
  /** CSV field delimiter; defaults to the dataset's, then "," */
  delimiter?: string;
  /** File column → descriptor field, applied to every row */
  fieldMapping?: Readonly<Record<string, string>>;
  /** Data source name; defaults to the file name */
  sourceName?: string;
  now?: () => Date;
}

/**
 * `.csv` files are CSV. Anything else is JSON: JSON-stat when the dataset
 * publishes JSON-stat, otherwise a record array.
 */
export function detectFileFormat(
  path: string,
  descriptor: DatasetDescriptor
): PayloadFormat {
  const extension = extname(path).toLowerCase();
  if (extension === ".csv") {
    return "csv";
  }
  if (extension !== ".json") {
    sourceLogger.warn({ path, extension }, "Unrecognized file extension, reading as JSON");
  }
  return descriptor.format === "jsonstat" ? "jsonstat" : "json";
}

function applyFieldMapping(
  row: RawRow,
  mapping: Readonly<Record<string, string>>
): RawRow {
  const mapped: RawRow = {};
  for (const [key, value] of Object.entries(row)) {
    mapped[mapping[key] ?? key] = value;
  }
  return mapped;
}

export class FileSource implements PageSource {
  private readonly url: string;
  private readonly now: () => Date;

  constructor(private readonly options: FileSourceOptions) {
    this.url = pathToFileURL(resolve(options.path)).href;
    this.now = options.now ?? (() => new Date());
  }

  origin(): SourceOrigin {
    return {
      name: this.options.sourceName ?? basename(this.options.path),
      sourceType: "file",
      url: this.url,
    };
  }

  /**
   * Yield the whole file as page 0. Query overrides do not apply to files,
   * and a start page past 0 yields nothing.
   */
  async *fetchPages(
    descriptor: DatasetDescriptor,
    _overrides: QueryOverrides = {},
    options: FetchPagesOptions = {}
  ): AsyncGenerator<RawPage, void, undefined> {
    if ((options.startPage ?? 0) > 0 || options.signal?.aborted === true) {
      return;
    }
    yield await this.readPage(descriptor);
  }

  async readPage(descriptor: DatasetDescriptor): Promise<RawPage> {
    const { path } = this.options;
    const fetchedAt = this.now().toISOString();

    let payload: string;
    try {
      payload = await readFile(path, "utf8");
    } catch (error) {
      throw new SourceError(`Cannot read ${path}: ${errorMessage(error)}`, {
        datasetId: descriptor.id,
        url: this.url,
        query: {},
        transient: false,
        cause: error,
      });
    }

    const format = this.options.format ?? detectFileFormat(path, descriptor);
    let parsed: ParsedPage;
    try {
      parsed = parsePagePayload(
        {
          ...descriptor,
          format,
          delimiter: this.options.delimiter ?? descriptor.delimiter,
          paging: undefined,
        },
        payload
      );
    } catch (error) {
      throw new SourceError(
        `Malformed ${format} file ${path} for ${descriptor.id}: ${errorMessage(error)}`,
        {
          datasetId: descriptor.id,
          url: this.url,
          query: {},
          transient: false,
          cause: error,
        }
      );
    }

    const { fieldMapping } = this.options;
    const rows =
      fieldMapping === undefined
        ? parsed.rows
        : parsed.rows.map((row) => applyFieldMapping(row, fieldMapping));

    sourceLogger.info(
      { datasetId: descriptor.id, path, format, rows: rows.length },
      "Read dataset file"
    );

    return {
      datasetId: descriptor.id,
      pageIndex: 0,
      url: this.url,
      params: {},
      fetchedAt,
      payload,
      contentHash: hashPayload(payload),
      rows,
      hasMore: false,
    };
  }
}
