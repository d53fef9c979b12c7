/**
 * Jest Unit Tests for Analyst Configuration
 *
 * Tests configuration loading, validation, and defaults.
 */

import {
  DEFAULT_ANALYST_CONFIG,
  getAnalystConfig,
  loadAnalystConfig,
  resetAnalystConfig,
  validateConfig,
  type AnalystConfig,
} from '../config.js';

const ENV_VARS = [
  'ANTHROPIC_API_KEY',
  'CLAUDE_MODEL',
  'ANALYST_MAX_TOKENS',
  'ANALYST_CONTEXT_ENTRIES',
  'ANALYST_CONTEXT_TOKENS',
  'ANALYST_PROMPT_TOKEN_LIMIT',
  'ANALYST_MAX_PROMPT_ROWS',
  'CACHE_MAX_DATASETS',
  'INVOKE_TIMEOUT_MS',
  'QUERY_TIMEOUT_MS',
  'RETRY_BACKOFF_MS',
  'TABLETALK_DB_PATH',
  'TABLETALK_BLOB_DIR',
];

describe('Analyst Configuration', () => {
  // Save original env vars
  const originalEnv = { ...process.env };

  beforeEach(() => {
    for (const name of ENV_VARS) {
      delete process.env[name];
    }
    resetAnalystConfig();
  });

  afterAll(() => {
    Object.assign(process.env, originalEnv);
    resetAnalystConfig();
  });

  // ==========================================================================
  // DEFAULT CONFIGURATION
  // ==========================================================================

  describe('Default Configuration', () => {
    test('keeps the last 10 exchanges in context', () => {
      expect(DEFAULT_ANALYST_CONFIG.contextMaxEntries).toBe(10);
    });

    test('nests the per-call timeout inside the query timeout', () => {
      expect(DEFAULT_ANALYST_CONFIG.invokeTimeoutMs).toBe(60000);
      expect(DEFAULT_ANALYST_CONFIG.queryTimeoutMs).toBe(150000);
    });

    test('has a default claudeModel', () => {
      expect(DEFAULT_ANALYST_CONFIG.claudeModel).toContain('claude');
    });

    test('defaults are valid', () => {
      expect(validateConfig(DEFAULT_ANALYST_CONFIG)).toEqual([]);
    });
  });

  // ==========================================================================
  // LOADING CONFIGURATION
  // ==========================================================================

  describe('Loading Configuration', () => {
    test('returns defaults when nothing is set', () => {
      expect(loadAnalystConfig()).toEqual(DEFAULT_ANALYST_CONFIG);
    });

    test('reads environment variables', () => {
      process.env.ANTHROPIC_API_KEY = 'test-secret';
      process.env.ANALYST_CONTEXT_ENTRIES = '4';
      process.env.RETRY_BACKOFF_MS = '250';
      process.env.TABLETALK_DB_PATH = '/tmp/analyst.db';

      const config = loadAnalystConfig();

      expect(config.anthropicApiKey).toBe('test-secret');
      expect(config.contextMaxEntries).toBe(4);
      expect(config.retryBackoffMs).toBe(250);
      expect(config.databasePath).toBe('/tmp/analyst.db');
    });

    test('overrides win over environment variables', () => {
      process.env.CACHE_MAX_DATASETS = '8';

      const config = loadAnalystConfig({ cacheMaxDatasets: 2 });

      expect(config.cacheMaxDatasets).toBe(2);
    });

    test('getAnalystConfig returns a cached instance until reset', () => {
      const first = getAnalystConfig();
      expect(getAnalystConfig()).toBe(first);

      resetAnalystConfig();
      expect(getAnalystConfig()).not.toBe(first);
    });
  });

  // ==========================================================================
  // VALIDATION
  // ==========================================================================

  describe('Validation', () => {
    const valid: AnalystConfig = { ...DEFAULT_ANALYST_CONFIG };

    test('rejects a context window outside 1-50', () => {
      expect(validateConfig({ ...valid, contextMaxEntries: 0 })).toEqual([
        'contextMaxEntries must be between 1 and 50',
      ]);
      expect(validateConfig({ ...valid, contextMaxEntries: 51 })).toEqual([
        'contextMaxEntries must be between 1 and 50',
      ]);
    });

    test('rejects an empty dataset cache', () => {
      expect(validateConfig({ ...valid, cacheMaxDatasets: 0 })).toEqual(['cacheMaxDatasets must be at least 1']);
    });

    test('requires the query timeout to exceed the per-call timeout', () => {
      expect(validateConfig({ ...valid, invokeTimeoutMs: 150000, queryTimeoutMs: 150000 })).toEqual([
        'queryTimeoutMs must be greater than invokeTimeoutMs',
      ]);
    });

    test('rejects a negative backoff', () => {
      expect(validateConfig({ ...valid, retryBackoffMs: -1 })).toEqual([
        'retryBackoffMs must be at least 0 and less than queryTimeoutMs',
      ]);
    });

    test('reports a non-numeric environment value', () => {
      process.env.INVOKE_TIMEOUT_MS = 'soon';

      expect(validateConfig(loadAnalystConfig())).toEqual([
        'invokeTimeoutMs must be positive',
        'queryTimeoutMs must be greater than invokeTimeoutMs',
      ]);
    });

    test('reports non-numeric token limits from the environment', () => {
      process.env.ANALYST_MAX_TOKENS = 'lots';
      process.env.ANALYST_PROMPT_TOKEN_LIMIT = 'unlimited';

      expect(validateConfig(loadAnalystConfig())).toEqual([
        'maxResponseTokens must be a positive integer',
        'maxPromptTokens must be a positive integer',
      ]);
    });

    test('rejects a zero response token limit', () => {
      expect(validateConfig({ ...valid, maxResponseTokens: 0 })).toEqual([
        'maxResponseTokens must be a positive integer',
      ]);
    });
  });
});
