/**
 * Ingestion Orchestrator - drives one dataset from upstream pages to facts
 *
 * Each page is archived, normalized, region-resolved and upserted before
 * the next one is requested, so a failure leaves every earlier page intact
 * and a rerun (optionally from `startPage`) converges on the same rows.
 */

import { randomUUID } from "node:crypto";

import { LockTimeoutError, UnknownDatasetError } from "../errors.js";
import { ingestLogger } from "../logger.js";
import { Normalizer } from "../normalize/normalizer.js";
import { KeyedMutex } from "./keyed-mutex.js";
import { runPool } from "./worker-pool.js";

import type { Logger } from "pino";
import type { DatasetRegistry } from "../datasets/registry.js";
import type { DatasetDescriptor } from "../datasets/types.js";
import type { StatisticsRepository } from "../db/repository.js";
import type { PageSource } from "../source/types.js";

// ============================================================================
// Types
// ============================================================================

export type IngestionState =
  | "PENDING"
  | "FETCHING"
  | "NORMALIZING"
  | "PERSISTING"
  | "COMPLETED"
  | "FAILED"
  | "CANCELLED";

const TERMINAL_STATES: ReadonlySet<IngestionState> = new Set<IngestionState>([
  "COMPLETED",
  "FAILED",
  "CANCELLED",
]);

export function isTerminalState(state: IngestionState): boolean {
  return TERMINAL_STATES.has(state);
}

export interface RunOptions {
  /** Query parameters layered over the descriptor defaults */
  overrides?: Record<string, string>;
  /** Resume at this page index; earlier pages are not requested */
  startPage?: number;
  signal?: AbortSignal;
  /**
   * Replace the source's facts. The old facts are deleted in the same
   * transaction as the first page's upsert, so a run that fails before it
   * has a page leaves them in place.
   */
  replaceExisting?: boolean;
}

export interface RunManyOptions extends Omit<RunOptions, "startPage"> {
  concurrency?: number;
}

export interface RunError {
  name: string;
  message: string;
  /** Upstream HTTP status, when the failure came from the source */
  status?: number;
}

export interface IngestionRunResult {
  runId: string;
  datasetId: string;
  state: IngestionState;
  startedAt: string;
  finishedAt: string;
  pagesPersisted: number;
  lastPersistedPage: number | null;
  recordsFetched: number;
  recordsNormalized: number;
  recordsDropped: number;
  inserted: number;
  updated: number;
  error?: RunError;
}

export interface ProgressEvent {
  runId: string;
  datasetId: string;
  state: IngestionState;
  previousState: IngestionState | null;
  pageIndex: number | null;
  pagesPersisted: number;
}

export type ProgressCallback = (event: ProgressEvent) => void;

export type IngestionStore = Pick<
  StatisticsRepository,
  | "archiveRawSnapshot"
  | "upsertFacts"
  | "getOrCreateRegion"
  | "getOrCreateSource"
  | "markSourceUpdated"
>;

export interface OrchestratorDeps {
  registry: DatasetRegistry;
  client: PageSource;
  repository: IngestionStore;
  /** Shared across orchestrators that must not run one dataset twice */
  mutex?: KeyedMutex;
  lockTimeoutMs?: number;
  concurrency?: number;
  now?: () => Date;
}

const DEFAULT_CONCURRENCY = 3;

// ============================================================================
// Run Tracking
// ============================================================================

class RunTracker {
  readonly result: IngestionRunResult;
  private pageIndex: number | null = null;

  constructor(
    datasetId: string,
    startedAt: string,
    private readonly onProgress: ProgressCallback | undefined
  ) {
    this.result = {
      runId: randomUUID(),
      datasetId,
      state: "PENDING",
      startedAt,
      finishedAt: startedAt,
      pagesPersisted: 0,
      lastPersistedPage: null,
      recordsFetched: 0,
      recordsNormalized: 0,
      recordsDropped: 0,
      inserted: 0,
      updated: 0,
    };
  }

  get state(): IngestionState {
    return this.result.state;
  }

  announce(): void {
    this.emit(null);
  }

  transition(state: IngestionState, pageIndex?: number): void {
    const previous = this.result.state;
    if (isTerminalState(previous)) {
      throw new Error(
        `Run ${this.result.runId} is already ${previous}, cannot move to ${state}`
      );
    }
    if (pageIndex !== undefined) {
      this.pageIndex = pageIndex;
    }
    this.result.state = state;
    this.emit(previous);
  }

  private emit(previousState: IngestionState | null): void {
    if (this.onProgress === undefined) {
      return;
    }
    try {
      this.onProgress({
        runId: this.result.runId,
        datasetId: this.result.datasetId,
        state: this.result.state,
        previousState,
        pageIndex: this.pageIndex,
        pagesPersisted: this.result.pagesPersisted,
      });
    } catch (error) {
      ingestLogger.warn(
        { runId: this.result.runId, error },
        "Progress callback threw"
      );
    }
  }
}

function describeError(error: unknown): RunError {
  if (error instanceof Error) {
    const status =
      "status" in error && typeof error.status === "number"
        ? error.status
        : undefined;
    return status === undefined
      ? { name: error.name, message: error.message }
      : { name: error.name, message: error.message, status };
  }
  return { name: "Error", message: String(error) };
}

// ============================================================================
// Orchestrator
// ============================================================================

export class IngestionOrchestrator {
  private readonly registry: DatasetRegistry;
  private readonly client: PageSource;
  private readonly repository: IngestionStore;
  private readonly normalizer: Normalizer;
  private readonly mutex: KeyedMutex;
  private readonly lockTimeoutMs: number | undefined;
  private readonly concurrency: number;
  private readonly now: () => Date;
  private onProgress?: ProgressCallback;

  constructor(deps: OrchestratorDeps) {
    this.registry = deps.registry;
    this.client = deps.client;
    this.repository = deps.repository;
    this.normalizer = new Normalizer(deps.repository);
    this.mutex = deps.mutex ?? new KeyedMutex();
    this.lockTimeoutMs = deps.lockTimeoutMs;
    this.concurrency = deps.concurrency ?? DEFAULT_CONCURRENCY;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Set a callback that receives every state transition
   */
  setProgressCallback(callback: ProgressCallback | undefined): void {
    this.onProgress = callback;
  }

  /**
   * Ingest one dataset.
   *
   * Throws UnknownDatasetError, or LockTimeoutError when another run of the
   * same dataset holds the lock too long. Every failure after the run has
   * started is reported in the result with state FAILED.
   */
  async run(
    datasetId: string,
    options: RunOptions = {}
  ): Promise<IngestionRunResult> {
    const descriptor = this.registry.lookup(datasetId);
    const release = await this.mutex.acquire(datasetId, this.lockTimeoutMs);
    try {
      return await this.execute(descriptor, options);
    } finally {
      release();
    }
  }

  /**
   * Ingest several datasets through a bounded worker pool. Every id is
   * checked before any run starts; a lock timeout fails only that dataset.
   */
  async runMany(
    datasetIds: readonly string[],
    options: RunManyOptions = {}
  ): Promise<IngestionRunResult[]> {
    const unknown = datasetIds.find((id) => !this.registry.has(id));
    if (unknown !== undefined) {
      throw new UnknownDatasetError(unknown);
    }

    const { concurrency = this.concurrency, ...runOptions } = options;

    ingestLogger.info(
      { datasets: datasetIds.length, concurrency },
      "Starting ingestion batch"
    );

    return runPool(datasetIds, concurrency, async (datasetId) => {
      try {
        return await this.run(datasetId, runOptions);
      } catch (error) {
        if (!(error instanceof LockTimeoutError)) {
          throw error;
        }
        ingestLogger.error({ datasetId, error: error.message }, "Lock timeout");
        const at = this.now().toISOString();
        return {
          runId: randomUUID(),
          datasetId,
          state: "FAILED",
          startedAt: at,
          finishedAt: at,
          pagesPersisted: 0,
          lastPersistedPage: null,
          recordsFetched: 0,
          recordsNormalized: 0,
          recordsDropped: 0,
          inserted: 0,
          updated: 0,
          error: describeError(error),
        } satisfies IngestionRunResult;
      }
    });
  }

  private async execute(
    descriptor: DatasetDescriptor,
    options: RunOptions
  ): Promise<IngestionRunResult> {
    const tracker = new RunTracker(
      descriptor.id,
      this.now().toISOString(),
      this.onProgress
    );
    const { result } = tracker;
    const log = ingestLogger.child({ runId: result.runId, datasetId: descriptor.id });
    const { signal } = options;

    tracker.announce();
    log.info(
      { startPage: options.startPage ?? 0, overrides: options.overrides ?? {} },
      "Ingestion started"
    );

    try {
      if (signal?.aborted === true) {
        tracker.transition("CANCELLED");
        return this.finish(tracker, log);
      }

      const origin = this.client.origin(descriptor);
      const source = await this.repository.getOrCreateSource(
        origin.name,
        origin.sourceType,
        origin.url,
        {
          dataset: descriptor.id,
          name: descriptor.name,
          family: descriptor.family,
          format: descriptor.format,
          measure: descriptor.measure,
        }
      );

      let replacePending = options.replaceExisting === true;

      tracker.transition("FETCHING", options.startPage ?? 0);

      const pages = this.client.fetchPages(descriptor, options.overrides, {
        startPage: options.startPage,
        signal,
      });

      for await (const page of pages) {
        result.recordsFetched += page.rows.length;
        await this.repository.archiveRawSnapshot(page);

        tracker.transition("NORMALIZING", page.pageIndex);
        const batch = this.normalizer.normalizeBatch(page.rows, descriptor);
        result.recordsNormalized += batch.facts.length;
        result.recordsDropped += batch.dropped;

        tracker.transition("PERSISTING", page.pageIndex);
        const resolved = await this.normalizer.resolveRegions(batch.facts);
        const written = await this.repository.upsertFacts(resolved, source.id, {
          replaceSource: replacePending,
        });
        if (replacePending) {
          replacePending = false;
          log.info({ deleted: written.replaced ?? 0 }, "Replaced existing facts");
        }
        result.inserted += written.inserted;
        result.updated += written.updated;
        result.pagesPersisted++;
        result.lastPersistedPage = page.pageIndex;

        log.debug(
          {
            pageIndex: page.pageIndex,
            rows: page.rows.length,
            dropped: batch.dropped,
            ...written,
          },
          "Page persisted"
        );

        if (signal?.aborted) {
          tracker.transition("CANCELLED");
          return this.finish(tracker, log);
        }
        if (page.hasMore) {
          tracker.transition("FETCHING", page.pageIndex + 1);
        }
      }

      if (signal?.aborted) {
        tracker.transition("CANCELLED");
        return this.finish(tracker, log);
      }

      const finishedAt = this.now().toISOString();
      await this.repository.markSourceUpdated(source.id, finishedAt);
      tracker.transition("COMPLETED");
      return this.finish(tracker, log, finishedAt);
    } catch (error) {
      if (signal?.aborted === true && !isTerminalState(tracker.state)) {
        // Aborted while the source was still retrying a request
        log.info({ error: describeError(error) }, "Cancelled during a request");
        tracker.transition("CANCELLED");
        return this.finish(tracker, log);
      }
      result.error = describeError(error);
      if (!isTerminalState(tracker.state)) {
        tracker.transition("FAILED");
      }
      log.error(
        {
          error: result.error,
          pagesPersisted: result.pagesPersisted,
          lastPersistedPage: result.lastPersistedPage,
        },
        "Ingestion failed"
      );
      return this.finish(tracker, log);
    }
  }

  private finish(
    tracker: RunTracker,
    log: Logger,
    finishedAt: string = this.now().toISOString()
  ): IngestionRunResult {
    const { result } = tracker;
    result.finishedAt = finishedAt;
    log.info(
      {
        state: result.state,
        pages: result.pagesPersisted,
        fetched: result.recordsFetched,
        dropped: result.recordsDropped,
        inserted: result.inserted,
        updated: result.updated,
      },
      "Ingestion finished"
    );
    return { ...result };
  }
}
