/**
 * Dataset Cache - LRU cache of decoded tables
 *
 * Keeps decoded tables in memory so repeated queries against the same
 * dataset skip reading and decoding the file again.
 *
 * - Keyed by (datasetId, fingerprint); a new fingerprint for a known dataset
 *   drops the stale entry
 * - Single-flight: concurrent misses for one key share a single loader call
 * - A failed load is handed to every waiter and nothing is cached
 * - Cached tables are frozen; callers keep their reference after eviction
 */

import { LRUCache } from 'lru-cache';
import type { Table } from '../types.js';
import { CACHE_DEFAULTS } from '../constants.js';
import { errorMessage, logDebug, logInfo, logWarn } from './logger.js';

// =============================================================================
// TYPES
// =============================================================================

/**
 * Produces the decoded table for a dataset version
 */
export type TableLoader = (datasetId: string, fingerprint: string) => Promise<Table>;

export interface DatasetCacheOptions {
  /** Maximum decoded tables kept (default: CACHE_DEFAULTS.MAX_DATASETS) */
  maxEntries?: number;
}

export interface DatasetCacheStats {
  size: number;
  maxSize: number;
  inFlight: number;
  /** Datasets with a remembered latest fingerprint */
  trackedDatasets: number;
  hits: number;
  misses: number;
  /** Waiters that joined a load already in progress */
  sharedLoads: number;
  loads: number;
  failedLoads: number;
  evictions: number;
  invalidations: number;
  hitRate: string;
}

// =============================================================================
// DATASET CACHE
// =============================================================================

export class DatasetCache {
  private readonly maxEntries: number;
  private readonly tables: LRUCache<string, Table>;
  private readonly inFlight = new Map<string, Promise<Table>>();
  /** Latest fingerprint requested per dataset */
  private readonly fingerprints = new Map<string, string>();

  private hits = 0;
  private misses = 0;
  private sharedLoads = 0;
  private loads = 0;
  private failedLoads = 0;
  private evictions = 0;
  private invalidations = 0;

  constructor(options: DatasetCacheOptions = {}) {
    this.maxEntries = options.maxEntries ?? CACHE_DEFAULTS.MAX_DATASETS;
    if (!Number.isInteger(this.maxEntries) || this.maxEntries < 1) {
      throw new RangeError(`Dataset cache capacity must be a positive integer, got ${this.maxEntries}`);
    }

    this.tables = new LRUCache<string, Table>({
      max: this.maxEntries,
      dispose: (_table, key, reason) => {
        if (reason !== 'evict') return;
        this.evictions++;
        const { datasetId, fingerprint } = parseKey(key);
        if (this.fingerprints.get(datasetId) === fingerprint && !this.inFlight.has(key)) {
          this.fingerprints.delete(datasetId);
        }
        logDebug('Dataset table evicted', { dataset_id: datasetId, fingerprint });
      },
    });
  }

  /**
   * Return the cached table for (datasetId, fingerprint), loading it at most
   * once however many callers ask concurrently.
   */
  getOrLoad(datasetId: string, fingerprint: string, loader: TableLoader): Promise<Table> {
    this.trackFingerprint(datasetId, fingerprint);
    const key = cacheKey(datasetId, fingerprint);

    const cached = this.tables.get(key);
    if (cached) {
      this.hits++;
      return Promise.resolve(cached);
    }

    const pending = this.inFlight.get(key);
    if (pending) {
      this.sharedLoads++;
      return pending;
    }

    this.misses++;
    const load = this.load(key, datasetId, fingerprint, loader);
    this.inFlight.set(key, load);
    return load;
  }

  /**
   * Drop every cached version of a dataset
   */
  invalidate(datasetId: string): void {
    let removed = 0;
    for (const key of [...this.tables.keys()]) {
      if (parseKey(key).datasetId === datasetId) {
        this.tables.delete(key);
        removed++;
      }
    }
    this.fingerprints.delete(datasetId);
    if (removed > 0) {
      this.invalidations += removed;
      logInfo('Dataset cache entries invalidated', { dataset_id: datasetId, removed });
    }
  }

  /**
   * Clear entire cache. Loads already in progress still resolve for their waiters.
   */
  clear(): void {
    const previousSize = this.tables.size;
    this.tables.clear();
    this.fingerprints.clear();
    logInfo('Dataset cache cleared', { removed: previousSize });
  }

  has(datasetId: string, fingerprint: string): boolean {
    return this.tables.has(cacheKey(datasetId, fingerprint));
  }

  getStats(): DatasetCacheStats {
    const lookups = this.hits + this.misses + this.sharedLoads;
    return {
      size: this.tables.size,
      maxSize: this.maxEntries,
      inFlight: this.inFlight.size,
      trackedDatasets: this.fingerprints.size,
      hits: this.hits,
      misses: this.misses,
      sharedLoads: this.sharedLoads,
      loads: this.loads,
      failedLoads: this.failedLoads,
      evictions: this.evictions,
      invalidations: this.invalidations,
      hitRate: lookups === 0 ? '0.0%' : `${((this.hits / lookups) * 100).toFixed(1)}%`,
    };
  }

  // ===========================================================================
  // INTERNALS
  // ===========================================================================

  private trackFingerprint(datasetId: string, fingerprint: string): void {
    const previous = this.fingerprints.get(datasetId);
    if (previous !== undefined && previous !== fingerprint) {
      if (this.tables.delete(cacheKey(datasetId, previous))) {
        this.invalidations++;
        logInfo('Stale dataset table invalidated', {
          dataset_id: datasetId,
          previous_fingerprint: previous,
          fingerprint,
        });
      }
    }
    this.fingerprints.set(datasetId, fingerprint);
  }

  private async load(
    key: string,
    datasetId: string,
    fingerprint: string,
    loader: TableLoader
  ): Promise<Table> {
    const startTime = Date.now();
    this.loads++;
    try {
      const table = freezeTable(await loader(datasetId, fingerprint));

      // A newer fingerprint may have been requested while this one was loading
      if (this.fingerprints.get(datasetId) === fingerprint) {
        this.tables.set(key, table);
      }

      logInfo('Dataset table loaded', {
        dataset_id: datasetId,
        fingerprint,
        rows: table.rows.length,
        duration_ms: Date.now() - startTime,
      });
      return table;
    } catch (error) {
      this.failedLoads++;
      if (this.fingerprints.get(datasetId) === fingerprint) {
        this.fingerprints.delete(datasetId);
      }
      logWarn('Dataset table load failed', {
        dataset_id: datasetId,
        fingerprint,
        error: errorMessage(error),
        duration_ms: Date.now() - startTime,
      });
      throw error;
    } finally {
      this.inFlight.delete(key);
    }
  }
}

// =============================================================================
// HELPER FUNCTIONS
// =============================================================================

const KEY_SEPARATOR = '::';

function cacheKey(datasetId: string, fingerprint: string): string {
  return `${datasetId}${KEY_SEPARATOR}${fingerprint}`;
}

function parseKey(key: string): { datasetId: string; fingerprint: string } {
  const index = key.indexOf(KEY_SEPARATOR);
  return {
    datasetId: key.slice(0, index),
    fingerprint: key.slice(index + KEY_SEPARATOR.length),
  };
}

/**
 * Freeze a table in place so no holder can mutate the shared instance
 */
function freezeTable(table: Table): Table {
  for (const row of table.rows) {
    Object.freeze(row);
  }
  Object.freeze(table.rows);
  Object.freeze(table.columns);
  return Object.freeze(table);
}
