/**
 * Constants for tabletalk
 */

// =============================================================================
// DATASET CACHE
// =============================================================================

export const CACHE_DEFAULTS = {
  /** Decoded tables kept in memory (small multiple of expected concurrent sessions) */
  MAX_DATASETS: 32,
} as const;

// =============================================================================
// CONTEXT WINDOW
// =============================================================================

export const CONTEXT_DEFAULTS = {
  MAX_ENTRIES: 10,
  /** Upper bound accepted for maxEntries */
  MAX_ENTRIES_LIMIT: 50,
  /** Token budget for prior exchanges injected into a query */
  MAX_CONTEXT_TOKENS: 8000,
} as const;

// =============================================================================
// TOKEN ESTIMATION
// =============================================================================

export const TOKEN_ESTIMATION = {
  /** Rough English-text ratio used by every estimate in the engine */
  CHARS_PER_TOKEN: 4,
} as const;

// =============================================================================
// QUERY EXECUTION
// =============================================================================

export const EXECUTOR_DEFAULTS = {
  /** Per upstream call */
  INVOKE_TIMEOUT_MS: 60_000,
  /** Whole query, retries included; must exceed INVOKE_TIMEOUT_MS */
  QUERY_TIMEOUT_MS: 150_000,
  RETRY_BACKOFF_MS: 2_000,
  /** A query never makes more than this many upstream calls */
  MAX_ATTEMPTS: 2,
} as const;

// =============================================================================
// CLAUDE ANALYST
// =============================================================================

export const ANALYST_DEFAULTS = {
  CLAUDE_MODEL: 'claude-sonnet-4-20250514',
  MAX_RESPONSE_TOKENS: 2000,
  TEMPERATURE: 0,
  /** Estimated prompt tokens above which the call is not attempted */
  MAX_PROMPT_TOKENS: 150_000,
  /** Rows serialized into the prompt; larger tables are truncated */
  MAX_ROWS_IN_PROMPT: 500,
} as const;

// =============================================================================
// UPLOADS & PROMPTS
// =============================================================================

export const UPLOAD_LIMITS = {
  MAX_FILE_BYTES: 100 * 1024 * 1024,
  MAX_NAME_LENGTH: 255,
  ALLOWED_EXTENSIONS: ['.csv', '.xlsx', '.xls'],
  /** Macro-enabled workbooks are always refused */
  BLOCKED_EXTENSIONS: ['.xlsm'],
  SAMPLE_VALUES_PER_COLUMN: 5,
  /** Leading bytes inspected to recognise the file content */
  SNIFF_BYTES: 2048,
} as const;

export const PROMPT_LIMITS = {
  MAX_PROMPT_LENGTH: 2000,
} as const;

// =============================================================================
// STORAGE
// =============================================================================

export const STORAGE_DEFAULTS = {
  DATABASE_PATH: './data/tabletalk.db',
  BLOB_DIRECTORY: './data/uploads',
} as const;
