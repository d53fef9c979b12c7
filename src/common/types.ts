/**
 * Shared types for tabletalk
 *
 * Datasets and their decoded tables, analysis sessions with their
 * append-only exchange log, and the contract of the LLM analysis
 * collaborator.
 */

// =============================================================================
// TABLES
// =============================================================================

/**
 * A single decoded cell. Dates are normalized to ISO-8601 strings by the decoder.
 */
export type CellValue = string | number | boolean | null;

export type TableRow = Readonly<Record<string, CellValue>>;

/**
 * Decoded in-memory table. Read-only once handed out by the dataset cache.
 */
export interface Table {
  readonly columns: readonly string[];
  readonly rows: readonly TableRow[];
}

/**
 * Arbitrary JSON, used for payloads the engine stores without interpreting
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Structured chart description (a Plotly figure: data + layout).
 * Persisted verbatim and replayed by the presentation layer.
 */
export type VisualizationPayload = { [key: string]: JsonValue };

// =============================================================================
// DATASETS
// =============================================================================

export const DATASET_STATUSES = ['pending', 'processing', 'ready', 'error'] as const;

export type DatasetStatus = (typeof DATASET_STATUSES)[number];

export type ColumnType = 'number' | 'boolean' | 'date' | 'string' | 'empty';

export interface ColumnMetadata {
  name: string;
  dtype: ColumnType;
  nullCount: number;
  /** First five unique non-null values, stringified */
  sampleValues: string[];
}

export interface DatasetMetadata {
  rowCount?: number;
  columnCount?: number;
  columns?: ColumnMetadata[];
  fileSizeBytes?: number;
  sheetNames?: string[];
  parseWarnings: string[];
  /** Set when ingestion failed */
  error?: string;
}

export interface Dataset {
  id: string;
  name: string;
  fileName: string;
  /** `<sha256 hex>-<byte size>` of the uploaded file */
  fingerprint: string;
  status: DatasetStatus;
  metadata: DatasetMetadata;
  uploadedAt: string;
}

export type DatasetUpdate = Partial<Pick<Dataset, 'status' | 'metadata'>>;

// =============================================================================
// SESSIONS & EXCHANGES
// =============================================================================

export interface Session {
  id: string;
  /** Fixed for the lifetime of the session */
  datasetId: string;
  title: string;
  createdAt: string;
  updatedAt: string;
}

export const EXCHANGE_STATUSES = ['success', 'error'] as const;

export type ExchangeStatus = (typeof EXCHANGE_STATUSES)[number];

export const QUERY_ERROR_CATEGORIES = [
  'DataUnavailable',
  'RateLimited',
  'Timeout',
  'ContextTooLarge',
  'MalformedOutput',
  'UpstreamUnavailable',
] as const;

export type QueryErrorCategory = (typeof QUERY_ERROR_CATEGORIES)[number];

/**
 * One prompt and its outcome. Frozen once appended to a session.
 */
export interface Exchange {
  readonly id: string;
  readonly sessionId: string;
  /** 1-based position within the session */
  readonly sequence: number;
  readonly prompt: string;
  readonly responseText: string;
  readonly visualization: VisualizationPayload | null;
  readonly status: ExchangeStatus;
  /** Populated iff status is 'error' */
  readonly errorCategory: QueryErrorCategory | null;
  /** User-facing message, populated iff status is 'error' */
  readonly errorMessage: string | null;
  /** Number of upstream calls made while answering */
  readonly attempts: number;
  readonly durationMs: number;
  readonly createdAt: string;
}

/**
 * Fields the executor supplies; the store assigns identity, ordering and timestamp
 */
export type ExchangeDraft = Omit<Exchange, 'id' | 'sessionId' | 'sequence' | 'createdAt'>;

// =============================================================================
// QUERY EXECUTION
// =============================================================================

export type QueryState =
  | 'received'
  | 'resolving_dataset'
  | 'resolving_context'
  | 'invoking'
  | 'classifying'
  | 'persisted_success'
  | 'persisted_error';

/**
 * Everything the analysis collaborator needs to answer one prompt
 */
export interface AnalysisRequest {
  table: Table;
  /** Bounded window of earlier successful exchanges, oldest first */
  context: readonly Exchange[];
  prompt: string;
  /** Charts must come back as replayable JSON, never as rendered images */
  visualizationFormat: 'plotly-json';
}

export interface AnalysisSuccess {
  success: true;
  text: string;
  visualization: VisualizationPayload | null;
}

export interface AnalysisFailure {
  success: false;
  category: QueryErrorCategory;
  /** Internal detail for logs; never shown to users */
  detail: string;
}

export type AnalysisResult = AnalysisSuccess | AnalysisFailure;

/**
 * The LLM + code-execution collaborator.
 *
 * Implementations may run generated code against the table and must provide
 * their own isolation; callers make no assumption that invocation is free of
 * side effects. `signal` is aborted when the executor gives up on the call.
 */
export interface AnalysisCollaborator<TClient> {
  invoke(client: TClient, request: AnalysisRequest, signal: AbortSignal): Promise<AnalysisResult>;
}
