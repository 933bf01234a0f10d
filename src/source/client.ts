/**
 * SourceClient - paged, rate-limited access to the upstream statistics API
 */

import { createHash } from "node:crypto";

import { SourceError, errorMessage } from "../errors.js";
import { sourceLogger } from "../logger.js";
import { parsePagePayload, type ParsedPage } from "./payload.js";
import { sleep as defaultSleep, type HostRateLimiter, type Sleep } from "./rate-limiter.js";

import type { DatasetDescriptor } from "../datasets/types.js";
import type {
  FetchPagesOptions,
  PageSource,
  QueryOverrides,
  RawPage,
  SourceOrigin,
} from "./types.js";

export interface SourceClientOptions {
  baseUrl: string;
  timeoutMs: number;
  maxRetries: number;
  retryBackoffMs: number;
  backoffMultiplier?: number;
  rateLimiter: HostRateLimiter;
  fetch?: typeof fetch;
  sleep?: Sleep;
  now?: () => Date;
  userAgent?: string;
}

export function hashPayload(payload: string): string {
  return createHash("sha256").update(payload).digest("hex");
}

function parseRetryAfter(header: string | null): number | undefined {
  if (header === null) {
    return undefined;
  }
  const seconds = Number(header);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : undefined;
}

/**
 * Release the connection behind a response whose body is not needed
 */
async function discardBody(response: Response): Promise<void> {
  try {
    await response.body?.cancel();
  } catch (error) {
    sourceLogger.debug({ error: errorMessage(error) }, "Could not discard response body");
  }
}

interface RequestTarget {
  descriptor: DatasetDescriptor;
  url: string;
  params: Record<string, string>;
  signal: AbortSignal | undefined;
}

export class SourceClient implements PageSource {
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: Sleep;
  private readonly now: () => Date;
  private readonly backoffMultiplier: number;

  constructor(private readonly options: SourceClientOptions) {
    this.fetchImpl = options.fetch ?? fetch;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? (() => new Date());
    this.backoffMultiplier = options.backoffMultiplier ?? 2;
  }

  /** API sources are named after the dataset and record its endpoint */
  origin(descriptor: DatasetDescriptor): SourceOrigin {
    return {
      name: descriptor.id,
      sourceType: "api",
      url: this.buildUrl(descriptor, {}),
    };
  }

  /**
   * Query parameters for one page: descriptor defaults, then caller
   * overrides, then paging parameters.
   */
  buildParams(
    descriptor: DatasetDescriptor,
    overrides: QueryOverrides = {},
    pageIndex = 0
  ): Record<string, string> {
    const params: Record<string, string> = {
      ...descriptor.defaultParams,
      ...overrides,
    };
    const { paging } = descriptor;
    if (paging !== undefined) {
      params[paging.pageParam] = String(paging.firstPage + pageIndex);
      if (paging.sizeParam !== undefined && paging.pageSize !== undefined) {
        params[paging.sizeParam] = String(paging.pageSize);
      }
    }
    return params;
  }

  buildUrl(descriptor: DatasetDescriptor, params: Record<string, string>): string {
    const base = (descriptor.baseUrl ?? this.options.baseUrl).replace(/\/+$/, "");
    const path = encodeURIComponent(descriptor.path ?? descriptor.id);
    let url: URL;
    try {
      url = new URL(`${base}/${path}`);
    } catch (error) {
      throw new SourceError(`Malformed upstream URL for ${descriptor.id}`, {
        datasetId: descriptor.id,
        url: `${base}/${path}`,
        query: params,
        transient: false,
        cause: error,
      });
    }
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.append(key, value);
    }
    return url.toString();
  }

  /**
   * Lazily fetch pages until the upstream signals the end of the data.
   * Restarting with `startPage` re-requests that page only.
   */
  async *fetchPages(
    descriptor: DatasetDescriptor,
    overrides: QueryOverrides = {},
    options: FetchPagesOptions = {}
  ): AsyncGenerator<RawPage, void, undefined> {
    const maxPages = descriptor.paging?.maxPages ?? 1;
    let pageIndex = options.startPage ?? 0;

    while (pageIndex < maxPages) {
      if (options.signal?.aborted === true) {
        return;
      }
      const page = await this.fetchPage(descriptor, overrides, pageIndex, options.signal);
      yield page;
      if (!page.hasMore) {
        return;
      }
      pageIndex++;
    }

    if (descriptor.paging !== undefined) {
      sourceLogger.warn(
        { datasetId: descriptor.id, maxPages },
        "Stopped paging at the configured page limit"
      );
    }
  }

  async fetchPage(
    descriptor: DatasetDescriptor,
    overrides: QueryOverrides,
    pageIndex: number,
    signal?: AbortSignal
  ): Promise<RawPage> {
    const params = this.buildParams(descriptor, overrides, pageIndex);
    const url = this.buildUrl(descriptor, params);
    const fetchedAt = this.now().toISOString();
    const payload = await this.request({ descriptor, url, params, signal });

    let parsed: ParsedPage;
    try {
      parsed = parsePagePayload(descriptor, payload);
    } catch (error) {
      sourceLogger.error(
        { datasetId: descriptor.id, pageIndex, url, error: errorMessage(error) },
        "Malformed page payload"
      );
      throw new SourceError(
        `Malformed ${descriptor.format} payload for ${descriptor.id} page ${String(pageIndex)}: ${errorMessage(error)}`,
        {
          datasetId: descriptor.id,
          url,
          query: params,
          transient: false,
          cause: error,
        }
      );
    }

    sourceLogger.debug(
      {
        datasetId: descriptor.id,
        pageIndex,
        rows: parsed.rows.length,
        hasMore: parsed.hasMore,
      },
      "Fetched page"
    );

    return {
      datasetId: descriptor.id,
      pageIndex,
      url,
      params,
      fetchedAt,
      payload,
      contentHash: hashPayload(payload),
      rows: parsed.rows,
      hasMore: parsed.hasMore,
    };
  }

  private backoffDelay(attempt: number): number {
    return this.options.retryBackoffMs * this.backoffMultiplier ** attempt;
  }

  /**
   * Wait out a retry delay. A cancelled run stops retrying instead of
   * sleeping through the remaining backoff.
   */
  private async backoff(target: RequestTarget, delay: number): Promise<void> {
    this.throwIfCancelled(target);
    await this.sleep(delay);
    this.throwIfCancelled(target);
  }

  private throwIfCancelled({ descriptor, url, params, signal }: RequestTarget): void {
    if (signal?.aborted === true) {
      throw new SourceError(`Request to ${descriptor.id} cancelled while retrying`, {
        datasetId: descriptor.id,
        url,
        query: params,
        transient: true,
        cause: signal.reason,
      });
    }
  }

  private async request(target: RequestTarget): Promise<string> {
    const { descriptor, url, params } = target;
    const { maxRetries, timeoutMs, rateLimiter } = this.options;
    const host = new URL(url).host;
    const attempts = maxRetries + 1;

    for (let attempt = 0; ; attempt++) {
      await rateLimiter.acquire(host);

      const startTime = performance.now();
      let response: Response;
      let body = "";
      try {
        response = await this.fetchImpl(url, {
          headers: {
            Accept: descriptor.format === "csv" ? "text/csv" : "application/json",
            "User-Agent": this.options.userAgent ?? "eurostat-ingest",
          },
          signal: AbortSignal.timeout(timeoutMs),
        });
        // The timeout also covers the body, and a reset can land mid-stream
        if (response.ok) {
          body = await response.text();
        }
      } catch (error) {
        // Connection resets, DNS failures and timeouts
        if (attempt < maxRetries) {
          const delay = this.backoffDelay(attempt);
          sourceLogger.warn(
            {
              datasetId: descriptor.id,
              url,
              attempt: attempt + 1,
              attempts,
              delay,
              error: errorMessage(error),
            },
            "Request failed, retrying"
          );
          await this.backoff(target, delay);
          continue;
        }
        throw new SourceError(
          `Request to ${descriptor.id} failed after ${String(attempts)} attempts: ${errorMessage(error)}`,
          {
            datasetId: descriptor.id,
            url,
            query: params,
            transient: true,
            cause: error,
          }
        );
      }

      const duration = Math.round(performance.now() - startTime);
      sourceLogger.debug(
        { url, status: response.status, duration: `${String(duration)}ms` },
        "Received response"
      );

      if (response.ok) {
        return body;
      }

      await discardBody(response);
      const status = response.status;
      const transient = status >= 500 || status === 429;
      if (!transient) {
        sourceLogger.error(
          { datasetId: descriptor.id, url, status },
          "Upstream rejected request"
        );
        throw new SourceError(
          `Upstream returned HTTP ${String(status)} for ${descriptor.id}`,
          { datasetId: descriptor.id, url, query: params, status, transient: false }
        );
      }

      if (attempt < maxRetries) {
        const delay =
          (status === 429
            ? parseRetryAfter(response.headers.get("retry-after"))
            : undefined) ?? this.backoffDelay(attempt);
        sourceLogger.warn(
          { datasetId: descriptor.id, url, status, attempt: attempt + 1, attempts, delay },
          "Transient upstream status, retrying"
        );
        await this.backoff(target, delay);
        continue;
      }

      throw new SourceError(
        `Upstream returned HTTP ${String(status)} for ${descriptor.id} after ${String(attempts)} attempts`,
        { datasetId: descriptor.id, url, query: params, status, transient: true }
      );
    }
  }
}
