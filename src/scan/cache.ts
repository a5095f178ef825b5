/**
 * Cache gate for scan snapshots.
 *
 * Holds one snapshot in process. `get()` re-fetches when forced, when nothing
 * is cached yet, or when the cached copy is older than the configured
 * duration. A failed fetch never clears the previous snapshot.
 */

import { DEFAULT_CACHE_DURATION_SECONDS } from '@/core/env';
import { isCacheExpired, toEpochSeconds } from '@/core/time';
import { createChildLogger } from '@/utils/logger';
import { errorMessage } from '@/utils/errors';
import { parseSheetValues } from './parser';
import { SheetSourceError, type SheetSource } from './source';
import type { ScanSnapshot, SheetValues } from '@/types/scan';

const logger = createChildLogger('scan_cache');

export interface ScanFetchFailure {
  kind: 'source_unavailable' | 'malformed_source';
  message: string;
}

export type ScanCacheResult =
  | { status: 'fresh'; snapshot: ScanSnapshot; archived: boolean }
  | { status: 'cached'; snapshot: ScanSnapshot }
  | { status: 'stale'; snapshot: ScanSnapshot; error: ScanFetchFailure }
  | { status: 'unavailable'; error: ScanFetchFailure };

/** Persists a snapshot; resolves false when it could not be written. */
export type SnapshotArchiver = (snapshot: ScanSnapshot, capturedAtMs: number) => Promise<boolean>;

export interface ScanCacheOptions {
  source: SheetSource;
  archiver?: SnapshotArchiver;
  cacheDurationSeconds?: number;
  now?: () => number;
}

type FetchOutcome = { ok: true; snapshot: ScanSnapshot } | { ok: false; error: ScanFetchFailure };

export class ScanCache {
  private snapshot: ScanSnapshot | null = null;
  private fetchedAtMs = 0;
  private lastArchivedScanTime: string | null = null;
  private inflight: Promise<ScanCacheResult> | null = null;

  private readonly source: SheetSource;
  private readonly archiver: SnapshotArchiver | null;
  private readonly cacheDurationSeconds: number;
  private readonly now: () => number;

  constructor(options: ScanCacheOptions) {
    this.source = options.source;
    this.archiver = options.archiver ?? null;
    this.cacheDurationSeconds = options.cacheDurationSeconds ?? DEFAULT_CACHE_DURATION_SECONDS;
    this.now = options.now ?? (() => Date.now());
  }

  /** Current cached snapshot without triggering a fetch. */
  peek(): ScanSnapshot | null {
    return this.snapshot;
  }

  async get(force = false): Promise<ScanCacheResult> {
    if (!force && this.snapshot && !isCacheExpired(this.fetchedAtMs, this.cacheDurationSeconds, this.now())) {
      return { status: 'cached', snapshot: this.snapshot };
    }

    // Concurrent callers share one fetch
    if (!this.inflight) {
      this.inflight = this.refresh().finally(() => {
        this.inflight = null;
      });
    }
    return this.inflight;
  }

  private async refresh(): Promise<ScanCacheResult> {
    const startedAtMs = this.now();
    const outcome = await this.fetchSnapshot(startedAtMs);

    if (!outcome.ok) {
      logger.warn({ kind: outcome.error.kind, message: outcome.error.message }, 'Scan fetch failed');
      if (this.snapshot) {
        return { status: 'stale', snapshot: this.snapshot, error: outcome.error };
      }
      return { status: 'unavailable', error: outcome.error };
    }

    this.snapshot = outcome.snapshot;
    this.fetchedAtMs = startedAtMs;

    const archived = await this.archiveIfNew(outcome.snapshot, startedAtMs);
    logger.info(
      { scanTime: outcome.snapshot.scan_time, stocks: outcome.snapshot.stocks.length, archived },
      'Scan snapshot refreshed'
    );
    return { status: 'fresh', snapshot: outcome.snapshot, archived };
  }

  private async fetchSnapshot(startedAtMs: number): Promise<FetchOutcome> {
    let values: SheetValues;
    try {
      values = await this.source.fetchValues();
    } catch (error) {
      const kind = error instanceof SheetSourceError && error.reason === 'output' ? 'malformed_source' : 'source_unavailable';
      return { ok: false, error: { kind, message: errorMessage(error) } };
    }

    const snapshot = parseSheetValues(values, toEpochSeconds(startedAtMs));
    if (!snapshot) {
      return {
        ok: false,
        error: { kind: 'malformed_source', message: `Sheet returned ${values.length} rows, expected at least 5` },
      };
    }
    return { ok: true, snapshot };
  }

  private async archiveIfNew(snapshot: ScanSnapshot, capturedAtMs: number): Promise<boolean> {
    if (!this.archiver || snapshot.scan_time === this.lastArchivedScanTime) {
      return false;
    }

    let archived = false;
    try {
      archived = await this.archiver(snapshot, capturedAtMs);
    } catch (error) {
      logger.error({ err: error }, 'Snapshot archiver threw');
    }

    if (archived) {
      this.lastArchivedScanTime = snapshot.scan_time;
    }
    return archived;
  }
}
