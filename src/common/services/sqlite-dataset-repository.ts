/**
 * SQLite-backed dataset repository
 */

import type { Dataset, DatasetUpdate } from '../types.js';
import { DatasetNotFoundError } from '../errors.js';
import { DatasetMetadataSchema, DatasetStatusSchema } from '../schemas/index.js';
import type { SqliteDatabase } from './database.js';
import { applyDatasetUpdate, type DatasetRepository } from './dataset-repository.js';

interface DatasetRow {
  id: string;
  name: string;
  file_name: string;
  fingerprint: string;
  status: string;
  metadata: string;
  uploaded_at: string;
}

const DATASET_COLUMNS = 'id, name, file_name, fingerprint, status, metadata, uploaded_at';

export class SqliteDatasetRepository implements DatasetRepository {
  constructor(private readonly db: SqliteDatabase) {}

  async create(dataset: Dataset): Promise<Dataset> {
    this.db
      .prepare<[string, string, string, string, string, string, string]>(
        `INSERT INTO datasets (${DATASET_COLUMNS}) VALUES (?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        dataset.id,
        dataset.name,
        dataset.fileName,
        dataset.fingerprint,
        dataset.status,
        JSON.stringify(dataset.metadata),
        dataset.uploadedAt
      );
    return dataset;
  }

  async get(datasetId: string): Promise<Dataset | null> {
    const row = this.db
      .prepare<[string], DatasetRow>(`SELECT ${DATASET_COLUMNS} FROM datasets WHERE id = ?`)
      .get(datasetId);
    return row ? toDataset(row) : null;
  }

  async update(datasetId: string, update: DatasetUpdate): Promise<Dataset> {
    const existing = await this.get(datasetId);
    if (!existing) {
      throw new DatasetNotFoundError(datasetId);
    }

    const updated = applyDatasetUpdate(existing, update);
    this.db
      .prepare<[string, string, string]>('UPDATE datasets SET status = ?, metadata = ? WHERE id = ?')
      .run(updated.status, JSON.stringify(updated.metadata), datasetId);
    return updated;
  }

  async list(): Promise<Dataset[]> {
    return this.db
      .prepare<[], DatasetRow>(`SELECT ${DATASET_COLUMNS} FROM datasets ORDER BY uploaded_at DESC`)
      .all()
      .map(toDataset);
  }
}

function toDataset(row: DatasetRow): Dataset {
  return {
    id: row.id,
    name: row.name,
    fileName: row.file_name,
    fingerprint: row.fingerprint,
    status: DatasetStatusSchema.parse(row.status),
    metadata: DatasetMetadataSchema.parse(JSON.parse(row.metadata)),
    uploadedAt: row.uploaded_at,
  };
}
