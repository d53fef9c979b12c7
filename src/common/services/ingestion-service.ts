/**
 * Ingestion Service
 *
 * Accepts an upload, stores its bytes, decodes it and records the dataset's
 * metadata. Status moves pending -> processing -> ready, or to error with
 * the failure kept in metadata. Also provides the loader the dataset cache
 * uses to decode a stored dataset again.
 */

import { createHash, randomUUID } from 'crypto';
import type {
  CellValue,
  ColumnMetadata,
  ColumnType,
  Dataset,
  DatasetMetadata,
  Table,
} from '../types.js';
import { UPLOAD_LIMITS } from '../constants.js';
import { DatasetNotFoundError, UploadRejectedError } from '../errors.js';
import { DatasetUploadSchema } from '../schemas/index.js';
import { checkUploadContent } from '../utils/content-sniff.js';
import type { BlobStore } from './blob-store.js';
import type { DatasetRepository } from './dataset-repository.js';
import type { DecodedTable, TableDecoder } from './xlsx-decoder.js';
import { errorMessage, logInfo, logWarn } from './logger.js';

export interface DatasetUpload {
  name: string;
  fileName: string;
  bytes: Buffer;
}

export class IngestionService {
  constructor(
    private readonly datasets: DatasetRepository,
    private readonly blobs: BlobStore,
    private readonly decoder: TableDecoder
  ) {}

  /**
   * Validate, store and decode an upload.
   *
   * Throws UploadRejectedError when validation fails (nothing is stored).
   * Decoding problems do not throw: the dataset is returned with status 'error'.
   */
  async ingest(upload: DatasetUpload): Promise<Dataset> {
    const parsed = DatasetUploadSchema.safeParse({
      name: upload.name,
      fileName: upload.fileName,
      size: upload.bytes.length,
    });
    if (!parsed.success) {
      throw new UploadRejectedError(parsed.error.issues.map((issue) => issue.message));
    }
    const contentProblem = checkUploadContent(upload.fileName, upload.bytes);
    if (contentProblem !== null) {
      throw new UploadRejectedError([contentProblem]);
    }

    const dataset = await this.datasets.create({
      id: randomUUID(),
      name: parsed.data.name,
      fileName: upload.fileName,
      fingerprint: computeFingerprint(upload.bytes),
      status: 'pending',
      metadata: { parseWarnings: [] },
      uploadedAt: new Date().toISOString(),
    });

    const startTime = Date.now();
    try {
      await this.blobs.put(blobKey(dataset.id), upload.bytes);
      await this.datasets.update(dataset.id, { status: 'processing' });

      const decoded = await this.decoder.decode(upload.bytes, upload.fileName);
      assertNotEmpty(decoded.table);

      const ready = await this.datasets.update(dataset.id, {
        status: 'ready',
        metadata: describeTable(decoded, upload.bytes.length),
      });

      logInfo('Dataset ingested', {
        dataset_id: dataset.id,
        rows: decoded.table.rows.length,
        columns: decoded.table.columns.length,
        duration_ms: Date.now() - startTime,
      });
      return ready;
    } catch (error) {
      const message = errorMessage(error);
      logWarn('Dataset ingestion failed', {
        dataset_id: dataset.id,
        error: message,
        duration_ms: Date.now() - startTime,
      });
      return this.datasets.update(dataset.id, {
        status: 'error',
        metadata: { error: message, parseWarnings: [message] },
      });
    }
  }

  /**
   * Decode a stored dataset. Usable directly as the dataset cache loader.
   */
  readonly load = async (datasetId: string, fingerprint: string): Promise<Table> => {
    const dataset = await this.datasets.get(datasetId);
    if (!dataset) {
      throw new DatasetNotFoundError(datasetId);
    }

    const bytes = await this.blobs.get(blobKey(datasetId));
    if (!bytes) {
      throw new Error(`No stored file for dataset ${datasetId}`);
    }

    const actual = computeFingerprint(bytes);
    if (actual !== fingerprint) {
      throw new Error(`Stored file for dataset ${datasetId} does not match fingerprint ${fingerprint}`);
    }

    const decoded = await this.decoder.decode(bytes, dataset.fileName);
    return decoded.table;
  };
}

// =============================================================================
// HELPER FUNCTIONS
// =============================================================================

/**
 * Content fingerprint: `<sha256 hex>-<byte size>`
 */
export function computeFingerprint(bytes: Buffer): string {
  return `${createHash('sha256').update(bytes).digest('hex')}-${bytes.length}`;
}

export function blobKey(datasetId: string): string {
  return `dataset-${datasetId}`;
}

function assertNotEmpty(table: Table): void {
  if (table.columns.length === 0) {
    throw new Error('File has no columns');
  }
  if (table.rows.length === 0) {
    throw new Error('File has no data rows');
  }
}

const ISO_DATE = /^\d{4}-\d{2}-\d{2}(T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?)?$/;

/**
 * Infer a column type from its non-null values
 */
export function inferColumnType(values: readonly CellValue[]): ColumnType {
  const present = values.filter((value): value is string | number | boolean => value !== null);
  if (present.length === 0) return 'empty';
  if (present.every((value) => typeof value === 'number')) return 'number';
  if (present.every((value) => typeof value === 'boolean')) return 'boolean';
  if (present.every((value) => typeof value === 'string' && ISO_DATE.test(value))) return 'date';
  return 'string';
}

export function describeColumn(table: Table, column: string): ColumnMetadata {
  const values = table.rows.map((row) => row[column] ?? null);
  const samples = new Set<string>();
  for (const value of values) {
    if (samples.size >= UPLOAD_LIMITS.SAMPLE_VALUES_PER_COLUMN) break;
    if (value !== null) samples.add(String(value));
  }

  return {
    name: column,
    dtype: inferColumnType(values),
    nullCount: values.filter((value) => value === null).length,
    sampleValues: [...samples],
  };
}

export function describeTable(decoded: DecodedTable, fileSizeBytes: number): DatasetMetadata {
  const { table } = decoded;
  return {
    rowCount: table.rows.length,
    columnCount: table.columns.length,
    columns: table.columns.map((column) => describeColumn(table, column)),
    fileSizeBytes,
    sheetNames: decoded.sheetNames,
    parseWarnings: decoded.warnings,
  };
}
