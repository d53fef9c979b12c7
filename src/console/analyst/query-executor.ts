/**
 * Query Executor
 *
 * Runs one prompt against a session's dataset through the query state machine:
 *
 *   received -> resolving_dataset -> resolving_context -> invoking -> classifying
 *            -> persisted_success | persisted_error
 *
 * Every accepted query ends in a persisted exchange. Failures are classified,
 * retried at most once when the category allows it, and recorded with a
 * user-facing message; they are not thrown to the caller. Only an unknown
 * session (nothing to record against) or a failing store rejects.
 *
 * Table and client handles are acquired first; the upstream call then runs
 * without holding anything shared, so slow queries never block other sessions.
 */

import type {
  AnalysisCollaborator,
  AnalysisFailure,
  AnalysisRequest,
  AnalysisResult,
  Exchange,
  ExchangeDraft,
  QueryErrorCategory,
  QueryState,
  Session,
  Table,
} from '../../common/types.js';
import { EXECUTOR_DEFAULTS } from '../../common/constants.js';
import { SessionNotFoundError } from '../../common/errors.js';
import type { DatasetCache, TableLoader } from '../../common/services/dataset-cache.js';
import type { DatasetRepository } from '../../common/services/dataset-repository.js';
import type { LLMClientRegistry } from '../../common/services/llm-client-registry.js';
import type { SessionStore } from '../../common/services/session-store.js';
import {
  errorMessage,
  generateQueryId,
  logDebug,
  logError,
  logInfo,
  logWarn,
} from '../../common/services/logger.js';
import type { ContextWindowManager } from './context-window.js';
import { classifyError, isRetryable, USER_MESSAGES } from './errors.js';
import { recordQueryOutcome, recordRetry } from './metrics.js';

// =============================================================================
// TYPES
// =============================================================================

export interface QueryExecutorDeps<TClient> {
  sessions: SessionStore;
  datasets: Pick<DatasetRepository, 'get'>;
  cache: DatasetCache;
  /** Decodes a dataset version on a cache miss */
  loader: TableLoader;
  registry: LLMClientRegistry<TClient>;
  contextWindow: ContextWindowManager;
  collaborator: AnalysisCollaborator<TClient>;
}

export interface QueryExecutorOptions {
  contextMaxEntries?: number;
  /** Per upstream call */
  invokeTimeoutMs?: number;
  /** Whole query, retry included */
  queryTimeoutMs?: number;
  retryBackoffMs?: number;
  /** Injected for tests */
  sleep?: (ms: number) => Promise<void>;
}

interface QueryRun {
  queryId: string;
  session: Session;
  prompt: string;
  state: QueryState;
  attempts: number;
  deadline: number;
}

type Deadlined<T> = { done: true; value: T } | { done: false };

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

function failure(category: QueryErrorCategory, detail: string): AnalysisFailure {
  return { success: false, category, detail };
}

// =============================================================================
// QUERY EXECUTOR
// =============================================================================

export class QueryExecutor<TClient> {
  private readonly contextMaxEntries: number | undefined;
  private readonly invokeTimeoutMs: number;
  private readonly queryTimeoutMs: number;
  private readonly retryBackoffMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly deps: QueryExecutorDeps<TClient>,
    options: QueryExecutorOptions = {}
  ) {
    this.contextMaxEntries = options.contextMaxEntries;
    this.invokeTimeoutMs = options.invokeTimeoutMs ?? EXECUTOR_DEFAULTS.INVOKE_TIMEOUT_MS;
    this.queryTimeoutMs = options.queryTimeoutMs ?? EXECUTOR_DEFAULTS.QUERY_TIMEOUT_MS;
    this.retryBackoffMs = options.retryBackoffMs ?? EXECUTOR_DEFAULTS.RETRY_BACKOFF_MS;
    this.sleep = options.sleep ?? defaultSleep;

    if (!(this.queryTimeoutMs > this.invokeTimeoutMs)) {
      throw new RangeError('queryTimeoutMs must be greater than invokeTimeoutMs');
    }
  }

  /**
   * Answer a prompt within a session and record the outcome.
   * Resolves with the persisted exchange, whatever the outcome.
   */
  async submitQuery(sessionId: string, prompt: string): Promise<Exchange> {
    const startTime = Date.now();
    const session = await this.deps.sessions.getSession(sessionId);
    if (!session) {
      throw new SessionNotFoundError(sessionId);
    }

    const run: QueryRun = {
      queryId: generateQueryId(),
      session,
      prompt: prompt.trim(),
      state: 'received',
      attempts: 0,
      deadline: startTime + this.queryTimeoutMs,
    };
    logInfo('Query received', {
      query_id: run.queryId,
      session_id: session.id,
      dataset_id: session.datasetId,
      prompt_length: run.prompt.length,
    });

    let result: AnalysisResult;
    try {
      result = await this.execute(run);
    } catch (error) {
      result = this.unexpectedFailure(run, error);
    }

    return this.persist(run, result, Date.now() - startTime);
  }

  /**
   * Full exchange log of a session, oldest first
   */
  async getHistory(sessionId: string): Promise<readonly Exchange[]> {
    const session = await this.deps.sessions.getSession(sessionId);
    if (!session) {
      throw new SessionNotFoundError(sessionId);
    }
    return this.deps.sessions.listExchanges(sessionId);
  }

  // ===========================================================================
  // STATE MACHINE
  // ===========================================================================

  private async execute(run: QueryRun): Promise<AnalysisResult> {
    this.transition(run, 'resolving_dataset');
    const resolved = await this.beforeDeadline(run, this.resolveTable(run));
    if (!resolved.done) {
      return failure('Timeout', 'Query deadline reached while loading the dataset');
    }
    const table = resolved.value;
    if (!('rows' in table)) {
      return table;
    }

    this.transition(run, 'resolving_context');
    const windowed = await this.beforeDeadline(
      run,
      this.deps.contextWindow.window(run.session.id, this.contextMaxEntries)
    );
    if (!windowed.done) {
      return failure('Timeout', 'Query deadline reached while reading the session history');
    }
    const context = windowed.value;

    let client: TClient;
    try {
      client = await this.deps.registry.getClient();
    } catch (error) {
      return failure('UpstreamUnavailable', `Client construction failed: ${errorMessage(error)}`);
    }

    const request: AnalysisRequest = {
      table,
      context,
      prompt: run.prompt,
      visualizationFormat: 'plotly-json',
    };

    while (true) {
      run.attempts++;
      this.transition(run, 'invoking');
      const result = await this.invokeOnce(run, client, request);

      this.transition(run, 'classifying');
      if (result.success) {
        return result;
      }
      if (run.attempts >= EXECUTOR_DEFAULTS.MAX_ATTEMPTS || !isRetryable(result.category)) {
        return result;
      }
      if (run.deadline - Date.now() <= this.retryBackoffMs) {
        logWarn('Query deadline leaves no room for a retry', {
          query_id: run.queryId,
          category: result.category,
        });
        return result;
      }

      recordRetry(result.category);
      logWarn('Retrying after retryable failure', {
        query_id: run.queryId,
        attempt: run.attempts,
        category: result.category,
        error: result.detail,
        backoff_ms: this.retryBackoffMs,
      });
      await this.sleep(this.retryBackoffMs);
    }
  }

  /**
   * The session's dataset table, or a DataUnavailable failure.
   * Nothing upstream is called when the dataset is not ready.
   */
  private async resolveTable(run: QueryRun): Promise<Table | AnalysisFailure> {
    const dataset = await this.deps.datasets.get(run.session.datasetId);
    if (!dataset) {
      return failure('DataUnavailable', `Dataset ${run.session.datasetId} does not exist`);
    }
    if (dataset.status !== 'ready') {
      return failure('DataUnavailable', `Dataset ${dataset.id} is ${dataset.status}`);
    }

    try {
      return await this.deps.cache.getOrLoad(dataset.id, dataset.fingerprint, this.deps.loader);
    } catch (error) {
      return failure('DataUnavailable', `Dataset load failed: ${errorMessage(error)}`);
    }
  }

  /**
   * Waits for `work` until the query deadline. A late result is dropped.
   */
  private async beforeDeadline<T>(run: QueryRun, work: Promise<T>): Promise<Deadlined<T>> {
    const remaining = Math.max(run.deadline - Date.now(), 0);
    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<Deadlined<T>>((resolve) => {
      timer = setTimeout(() => resolve({ done: false }), remaining);
    });

    try {
      return await Promise.race([work.then((value): Deadlined<T> => ({ done: true, value })), expired]);
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * One upstream call bounded by the per-call timeout and the query deadline.
   * Never rejects: thrown errors come back classified.
   */
  private async invokeOnce(run: QueryRun, client: TClient, request: AnalysisRequest): Promise<AnalysisResult> {
    const budget = Math.min(this.invokeTimeoutMs, run.deadline - Date.now());
    if (budget <= 0) {
      return failure('Timeout', 'Query deadline reached before the upstream call');
    }

    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<AnalysisResult>((resolve) => {
      timer = setTimeout(() => {
        controller.abort();
        resolve(failure('Timeout', `No reply within ${budget}ms`));
      }, budget);
    });

    const invocation = Promise.resolve()
      .then(() => this.deps.collaborator.invoke(client, request, controller.signal))
      .then(validateResult)
      .catch((error: unknown) => this.unexpectedFailure(run, error));

    try {
      return await Promise.race([invocation, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  // ===========================================================================
  // RECORDING
  // ===========================================================================

  private async persist(run: QueryRun, result: AnalysisResult, durationMs: number): Promise<Exchange> {
    const draft: ExchangeDraft = result.success
      ? {
          prompt: run.prompt,
          responseText: result.text,
          visualization: result.visualization,
          status: 'success',
          errorCategory: null,
          errorMessage: null,
          attempts: run.attempts,
          durationMs,
        }
      : {
          prompt: run.prompt,
          responseText: '',
          visualization: null,
          status: 'error',
          errorCategory: result.category,
          errorMessage: USER_MESSAGES[result.category],
          attempts: run.attempts,
          durationMs,
        };

    const exchange = await this.deps.sessions.appendExchange(run.session.id, draft);
    this.transition(run, result.success ? 'persisted_success' : 'persisted_error');
    recordQueryOutcome(exchange.status, exchange.errorCategory, exchange.attempts, durationMs);

    if (result.success) {
      logInfo('Query recorded', {
        query_id: run.queryId,
        session_id: run.session.id,
        sequence: exchange.sequence,
        attempts: run.attempts,
        has_visualization: exchange.visualization !== null,
        duration_ms: durationMs,
      });
    } else {
      logWarn('Query recorded as error', {
        query_id: run.queryId,
        session_id: run.session.id,
        sequence: exchange.sequence,
        attempts: run.attempts,
        category: result.category,
        error: result.detail,
        duration_ms: durationMs,
      });
    }
    return exchange;
  }

  private unexpectedFailure(run: QueryRun, error: unknown): AnalysisFailure {
    const classified = classifyError(error);
    if (classified.unexpected) {
      logError('Unexpected failure during query', {
        query_id: run.queryId,
        state: run.state,
        error: classified.detail,
        stack: error instanceof Error ? error.stack : undefined,
      });
    }
    return failure(classified.category, classified.detail);
  }

  private transition(run: QueryRun, state: QueryState): void {
    logDebug('Query state', { query_id: run.queryId, state, previous: run.state, attempt: run.attempts });
    run.state = state;
  }
}

/**
 * A success without any answer text cannot be shown to the user
 */
function validateResult(result: AnalysisResult): AnalysisResult {
  if (result.success && result.text.trim() === '') {
    return failure('MalformedOutput', 'Collaborator returned an empty answer');
  }
  return result;
}
