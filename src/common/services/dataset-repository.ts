/**
 * Dataset Repository
 *
 * Dataset records owned by ingestion. The query engine only reads `status`
 * and `fingerprint`; once a dataset is ready it never changes again.
 */

import type { Dataset, DatasetUpdate } from '../types.js';
import { DatasetImmutableError, DatasetNotFoundError } from '../errors.js';

export interface DatasetRepository {
  create(dataset: Dataset): Promise<Dataset>;
  get(datasetId: string): Promise<Dataset | null>;
  /** Throws DatasetNotFoundError, or DatasetImmutableError for a ready dataset */
  update(datasetId: string, update: DatasetUpdate): Promise<Dataset>;
  /** Newest upload first */
  list(): Promise<Dataset[]>;
}

/**
 * Apply an update, enforcing the immutability of ready datasets
 */
export function applyDatasetUpdate(existing: Dataset, update: DatasetUpdate): Dataset {
  if (existing.status === 'ready') {
    throw new DatasetImmutableError(existing.id);
  }
  return {
    ...existing,
    status: update.status ?? existing.status,
    metadata: update.metadata ?? existing.metadata,
  };
}

export class InMemoryDatasetRepository implements DatasetRepository {
  private readonly datasets = new Map<string, Dataset>();

  async create(dataset: Dataset): Promise<Dataset> {
    this.datasets.set(dataset.id, { ...dataset });
    return { ...dataset };
  }

  async get(datasetId: string): Promise<Dataset | null> {
    const dataset = this.datasets.get(datasetId);
    return dataset ? { ...dataset } : null;
  }

  async update(datasetId: string, update: DatasetUpdate): Promise<Dataset> {
    const existing = this.datasets.get(datasetId);
    if (!existing) {
      throw new DatasetNotFoundError(datasetId);
    }
    const updated = applyDatasetUpdate(existing, update);
    this.datasets.set(datasetId, updated);
    return { ...updated };
  }

  async list(): Promise<Dataset[]> {
    return [...this.datasets.values()]
      .map((dataset) => ({ ...dataset }))
      .sort((a, b) => b.uploadedAt.localeCompare(a.uploadedAt));
  }
}
