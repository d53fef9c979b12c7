/**
 * Analyst Engine
 *
 * Wires stores, ingestion, the dataset cache, the client registry and the
 * query executor behind one service used by the MCP tools and the CLI.
 */

import type { AnalysisCollaborator, Dataset, Exchange, Session } from '../../common/types.js';
import { DatasetNotFoundError, InvalidPromptError } from '../../common/errors.js';
import { QueryPromptSchema } from '../../common/schemas/index.js';
import { LocalBlobStore, type BlobStore } from '../../common/services/blob-store.js';
import { openDatabase } from '../../common/services/database.js';
import { DatasetCache, type DatasetCacheStats } from '../../common/services/dataset-cache.js';
import type { DatasetRepository } from '../../common/services/dataset-repository.js';
import { IngestionService, type DatasetUpload } from '../../common/services/ingestion-service.js';
import { LLMClientRegistry, type ClientRegistryStats } from '../../common/services/llm-client-registry.js';
import type { SessionStore } from '../../common/services/session-store.js';
import { SqliteDatasetRepository } from '../../common/services/sqlite-dataset-repository.js';
import { SqliteSessionStore } from '../../common/services/sqlite-session-store.js';
import { XlsxTableDecoder, type TableDecoder } from '../../common/services/xlsx-decoder.js';
import { logInfo } from '../../common/services/logger.js';
import { ClaudeAnalyst, createAnthropicClient } from './claude-analyst.js';
import { getAnalystConfig, loadAnalystConfig, validateConfig, type AnalystConfig } from './config.js';
import { ContextWindowManager } from './context-window.js';
import { getAnalystMetrics, type AnalystMetrics } from './metrics.js';
import { QueryExecutor } from './query-executor.js';

// =============================================================================
// TYPES
// =============================================================================

export interface AnalystStatus {
  datasets: number;
  sessions: number;
  cache: DatasetCacheStats;
  client: ClientRegistryStats;
  metrics?: AnalystMetrics;
}

export interface IngestedDataset {
  dataset: Dataset;
  /** Null when ingestion ended in error */
  session: Session | null;
}

/**
 * Everything the surfaces can ask of the engine
 */
export interface AnalystService {
  ingestDataset(upload: DatasetUpload): Promise<Dataset>;
  /** Ingest, then open a default-titled session when the dataset is ready */
  ingestAndOpenSession(upload: DatasetUpload): Promise<IngestedDataset>;
  getDataset(datasetId: string): Promise<Dataset>;
  listDatasets(): Promise<Dataset[]>;
  /** Title defaults to "Analysis of <dataset name>" */
  createSession(datasetId: string, title?: string): Promise<Session>;
  listSessions(): Promise<Session[]>;
  submitQuery(sessionId: string, prompt: string): Promise<Exchange>;
  /** Oldest first; `limit` keeps only the most recent exchanges */
  getHistory(sessionId: string, limit?: number): Promise<readonly Exchange[]>;
  getStatus(includeMetrics?: boolean): Promise<AnalystStatus>;
  close(): void;
}

export interface AnalystEngineDeps<TClient> {
  sessions: SessionStore;
  datasets: DatasetRepository;
  blobs: BlobStore;
  decoder: TableDecoder;
  registry: LLMClientRegistry<TClient>;
  collaborator: AnalysisCollaborator<TClient>;
  config?: Partial<AnalystConfig>;
  /** Injected for tests */
  sleep?: (ms: number) => Promise<void>;
  /** Release resources such as the database connection */
  onClose?: () => void;
}

// =============================================================================
// ENGINE
// =============================================================================

export class AnalystEngine<TClient> implements AnalystService {
  private readonly ingestion: IngestionService;
  private readonly cache: DatasetCache;
  private readonly executor: QueryExecutor<TClient>;

  constructor(private readonly deps: AnalystEngineDeps<TClient>) {
    const config = loadAnalystConfig(deps.config);

    this.ingestion = new IngestionService(deps.datasets, deps.blobs, deps.decoder);
    this.cache = new DatasetCache({ maxEntries: config.cacheMaxDatasets });
    const contextWindow = new ContextWindowManager(deps.sessions, {
      defaultMaxEntries: config.contextMaxEntries,
      maxContextTokens: config.maxContextTokens,
    });

    this.executor = new QueryExecutor(
      {
        sessions: deps.sessions,
        datasets: deps.datasets,
        cache: this.cache,
        loader: this.ingestion.load,
        registry: deps.registry,
        contextWindow,
        collaborator: deps.collaborator,
      },
      {
        invokeTimeoutMs: config.invokeTimeoutMs,
        queryTimeoutMs: config.queryTimeoutMs,
        retryBackoffMs: config.retryBackoffMs,
        sleep: deps.sleep,
      }
    );
  }

  ingestDataset(upload: DatasetUpload): Promise<Dataset> {
    return this.ingestion.ingest(upload);
  }

  async ingestAndOpenSession(upload: DatasetUpload): Promise<IngestedDataset> {
    const dataset = await this.ingestion.ingest(upload);
    if (dataset.status !== 'ready') {
      return { dataset, session: null };
    }
    return { dataset, session: await this.createSession(dataset.id) };
  }

  async getDataset(datasetId: string): Promise<Dataset> {
    const dataset = await this.deps.datasets.get(datasetId);
    if (!dataset) {
      throw new DatasetNotFoundError(datasetId);
    }
    return dataset;
  }

  listDatasets(): Promise<Dataset[]> {
    return this.deps.datasets.list();
  }

  async createSession(datasetId: string, title?: string): Promise<Session> {
    const dataset = await this.getDataset(datasetId);
    const trimmed = title?.trim();
    const session = await this.deps.sessions.createSession({
      datasetId: dataset.id,
      title: trimmed ? trimmed : `Analysis of ${dataset.name}`,
    });
    logInfo('Session created', { session_id: session.id, dataset_id: dataset.id });
    return session;
  }

  listSessions(): Promise<Session[]> {
    return this.deps.sessions.listSessions();
  }

  submitQuery(sessionId: string, prompt: string): Promise<Exchange> {
    const parsed = QueryPromptSchema.safeParse(prompt);
    if (!parsed.success) {
      return Promise.reject(new InvalidPromptError(parsed.error.issues.map((issue) => issue.message).join(' ')));
    }
    return this.executor.submitQuery(sessionId, parsed.data);
  }

  async getHistory(sessionId: string, limit?: number): Promise<readonly Exchange[]> {
    const history = await this.executor.getHistory(sessionId);
    if (limit === undefined || limit >= history.length) {
      return history;
    }
    return history.slice(history.length - limit);
  }

  async getStatus(includeMetrics = true): Promise<AnalystStatus> {
    const [datasets, sessions] = await Promise.all([
      this.deps.datasets.list(),
      this.deps.sessions.listSessions(),
    ]);
    return {
      datasets: datasets.length,
      sessions: sessions.length,
      cache: this.cache.getStats(),
      client: this.deps.registry.getStats(),
      ...(includeMetrics ? { metrics: getAnalystMetrics() } : {}),
    };
  }

  close(): void {
    this.cache.clear();
    this.deps.onClose?.();
  }
}

export function createAnalystEngine<TClient>(deps: AnalystEngineDeps<TClient>): AnalystService {
  return new AnalystEngine(deps);
}

/**
 * Production wiring: SQLite stores, files on disk, the Anthropic client
 */
export function createDefaultAnalystEngine(config: AnalystConfig = getAnalystConfig()): AnalystService {
  const problems = validateConfig(config);
  if (problems.length > 0) {
    throw new Error(`Invalid analyst configuration: ${problems.join('; ')}`);
  }

  const db = openDatabase(config.databasePath);
  return createAnalystEngine({
    sessions: new SqliteSessionStore(db),
    datasets: new SqliteDatasetRepository(db),
    blobs: new LocalBlobStore(config.blobDirectory),
    decoder: new XlsxTableDecoder(),
    registry: new LLMClientRegistry('anthropic', () => createAnthropicClient(config)),
    collaborator: new ClaudeAnalyst({
      model: config.claudeModel,
      maxTokens: config.maxResponseTokens,
      maxPromptTokens: config.maxPromptTokens,
      maxRowsInPrompt: config.maxRowsInPrompt,
    }),
    config,
    onClose: () => db.close(),
  });
}
