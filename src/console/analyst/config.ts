/**
 * Analyst Configuration
 *
 * Default configuration values for the query engine.
 * Can be overridden via environment variables or per-instance.
 */

import {
  ANALYST_DEFAULTS,
  CACHE_DEFAULTS,
  CONTEXT_DEFAULTS,
  EXECUTOR_DEFAULTS,
  STORAGE_DEFAULTS,
} from '../../common/constants.js';

export interface AnalystConfig {
  /** Anthropic credential; the client cannot be constructed without it */
  anthropicApiKey: string | undefined;

  claudeModel: string;
  maxResponseTokens: number;

  /** Prior successful exchanges injected into each query */
  contextMaxEntries: number;

  /** Token budget for those exchanges */
  maxContextTokens: number;

  /** Estimated prompt size above which the call is refused as ContextTooLarge */
  maxPromptTokens: number;

  /** Table rows serialized into the prompt */
  maxRowsInPrompt: number;

  /** Decoded tables kept in memory */
  cacheMaxDatasets: number;

  /** Per upstream call; must be shorter than queryTimeoutMs */
  invokeTimeoutMs: number;

  /** Whole query including the retry */
  queryTimeoutMs: number;

  /** Delay before the single retry of a retryable failure */
  retryBackoffMs: number;

  databasePath: string;
  blobDirectory: string;
}

/**
 * Default analyst configuration
 */
export const DEFAULT_ANALYST_CONFIG: AnalystConfig = {
  anthropicApiKey: undefined,
  claudeModel: ANALYST_DEFAULTS.CLAUDE_MODEL,
  maxResponseTokens: ANALYST_DEFAULTS.MAX_RESPONSE_TOKENS,
  contextMaxEntries: CONTEXT_DEFAULTS.MAX_ENTRIES,
  maxContextTokens: CONTEXT_DEFAULTS.MAX_CONTEXT_TOKENS,
  maxPromptTokens: ANALYST_DEFAULTS.MAX_PROMPT_TOKENS,
  maxRowsInPrompt: ANALYST_DEFAULTS.MAX_ROWS_IN_PROMPT,
  cacheMaxDatasets: CACHE_DEFAULTS.MAX_DATASETS,
  invokeTimeoutMs: EXECUTOR_DEFAULTS.INVOKE_TIMEOUT_MS,
  queryTimeoutMs: EXECUTOR_DEFAULTS.QUERY_TIMEOUT_MS,
  retryBackoffMs: EXECUTOR_DEFAULTS.RETRY_BACKOFF_MS,
  databasePath: STORAGE_DEFAULTS.DATABASE_PATH,
  blobDirectory: STORAGE_DEFAULTS.BLOB_DIRECTORY,
};

type NumericConfigKey = {
  [K in keyof AnalystConfig]: AnalystConfig[K] extends number ? K : never;
}[keyof AnalystConfig];

const INTEGER_ENV: Array<[string, NumericConfigKey]> = [
  ['ANALYST_MAX_TOKENS', 'maxResponseTokens'],
  ['ANALYST_CONTEXT_ENTRIES', 'contextMaxEntries'],
  ['ANALYST_CONTEXT_TOKENS', 'maxContextTokens'],
  ['ANALYST_PROMPT_TOKEN_LIMIT', 'maxPromptTokens'],
  ['ANALYST_MAX_PROMPT_ROWS', 'maxRowsInPrompt'],
  ['CACHE_MAX_DATASETS', 'cacheMaxDatasets'],
  ['INVOKE_TIMEOUT_MS', 'invokeTimeoutMs'],
  ['QUERY_TIMEOUT_MS', 'queryTimeoutMs'],
  ['RETRY_BACKOFF_MS', 'retryBackoffMs'],
];

/**
 * Load configuration from environment variables
 */
export function loadAnalystConfig(overrides?: Partial<AnalystConfig>): AnalystConfig {
  const envConfig: Partial<AnalystConfig> = {};
  const numeric: Partial<Record<NumericConfigKey, number>> = {};

  for (const [variable, field] of INTEGER_ENV) {
    const raw = process.env[variable];
    if (raw) {
      numeric[field] = parseInt(raw, 10);
    }
  }

  if (process.env.ANTHROPIC_API_KEY) {
    envConfig.anthropicApiKey = process.env.ANTHROPIC_API_KEY;
  }

  if (process.env.CLAUDE_MODEL) {
    envConfig.claudeModel = process.env.CLAUDE_MODEL;
  }

  if (process.env.TABLETALK_DB_PATH) {
    envConfig.databasePath = process.env.TABLETALK_DB_PATH;
  }

  if (process.env.TABLETALK_BLOB_DIR) {
    envConfig.blobDirectory = process.env.TABLETALK_BLOB_DIR;
  }

  // Merge: defaults < env < overrides
  return {
    ...DEFAULT_ANALYST_CONFIG,
    ...numeric,
    ...envConfig,
    ...overrides,
  };
}

// Singleton config instance
let configInstance: AnalystConfig | null = null;

/**
 * Get the current analyst configuration (singleton)
 */
export function getAnalystConfig(): AnalystConfig {
  if (!configInstance) {
    configInstance = loadAnalystConfig();
  }
  return configInstance;
}

/**
 * Forget the cached configuration (tests, credential rotation)
 */
export function resetAnalystConfig(): void {
  configInstance = null;
}

/**
 * Validate configuration values
 */
export function validateConfig(config: AnalystConfig): string[] {
  const errors: string[] = [];

  if (
    !Number.isInteger(config.contextMaxEntries) ||
    config.contextMaxEntries < 1 ||
    config.contextMaxEntries > CONTEXT_DEFAULTS.MAX_ENTRIES_LIMIT
  ) {
    errors.push(`contextMaxEntries must be between 1 and ${CONTEXT_DEFAULTS.MAX_ENTRIES_LIMIT}`);
  }

  if (!Number.isInteger(config.cacheMaxDatasets) || config.cacheMaxDatasets < 1) {
    errors.push('cacheMaxDatasets must be at least 1');
  }

  if (!(config.invokeTimeoutMs > 0)) {
    errors.push('invokeTimeoutMs must be positive');
  }

  if (!(config.queryTimeoutMs > config.invokeTimeoutMs)) {
    errors.push('queryTimeoutMs must be greater than invokeTimeoutMs');
  }

  if (!(config.retryBackoffMs >= 0) || config.retryBackoffMs >= config.queryTimeoutMs) {
    errors.push('retryBackoffMs must be at least 0 and less than queryTimeoutMs');
  }

  if (!Number.isInteger(config.maxResponseTokens) || config.maxResponseTokens < 1) {
    errors.push('maxResponseTokens must be a positive integer');
  }

  if (!Number.isInteger(config.maxPromptTokens) || config.maxPromptTokens < 1) {
    errors.push('maxPromptTokens must be a positive integer');
  }

  if (!(config.maxContextTokens > 0)) {
    errors.push('maxContextTokens must be positive');
  }

  if (!(config.maxRowsInPrompt > 0)) {
    errors.push('maxRowsInPrompt must be positive');
  }

  return errors;
}
