/**
 * tabletalk library entry point
 */

export * from './common/types.js';
export * from './common/errors.js';
export { DatasetCache } from './common/services/dataset-cache.js';
export type { DatasetCacheOptions, DatasetCacheStats, TableLoader } from './common/services/dataset-cache.js';
export { LLMClientRegistry } from './common/services/llm-client-registry.js';
export type { ClientFactory, ClientRegistryStats } from './common/services/llm-client-registry.js';
export { InMemorySessionStore } from './common/services/session-store.js';
export type { NewSession, SessionStore } from './common/services/session-store.js';
export { InMemoryDatasetRepository } from './common/services/dataset-repository.js';
export type { DatasetRepository } from './common/services/dataset-repository.js';
export { SqliteSessionStore } from './common/services/sqlite-session-store.js';
export { SqliteDatasetRepository } from './common/services/sqlite-dataset-repository.js';
export { openDatabase } from './common/services/database.js';
export { InMemoryBlobStore, LocalBlobStore } from './common/services/blob-store.js';
export type { BlobStore } from './common/services/blob-store.js';
export { XlsxTableDecoder } from './common/services/xlsx-decoder.js';
export type { DecodedTable, TableDecoder } from './common/services/xlsx-decoder.js';
export { IngestionService } from './common/services/ingestion-service.js';
export type { DatasetUpload } from './common/services/ingestion-service.js';
export { ContextWindowManager, selectWindow } from './console/analyst/context-window.js';
export { QueryExecutor } from './console/analyst/query-executor.js';
export type { QueryExecutorDeps, QueryExecutorOptions } from './console/analyst/query-executor.js';
export { AnalysisError, classifyError, RETRYABLE_CATEGORIES, USER_MESSAGES } from './console/analyst/errors.js';
export { ClaudeAnalyst, createAnthropicClient } from './console/analyst/claude-analyst.js';
export type { MessageCreator } from './console/analyst/claude-analyst.js';
export { loadAnalystConfig, getAnalystConfig, validateConfig } from './console/analyst/config.js';
export type { AnalystConfig } from './console/analyst/config.js';
export { createAnalystEngine, createDefaultAnalystEngine } from './console/analyst/engine.js';
export type { AnalystService, AnalystStatus, IngestedDataset } from './console/analyst/engine.js';
