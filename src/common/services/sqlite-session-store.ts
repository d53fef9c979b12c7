/**
 * SQLite-backed session store
 *
 * Sessions and their exchanges live in the analysis_sessions and exchanges
 * tables. Appends run in a transaction so sequence numbers and timestamps
 * stay monotonic per session.
 */

import { randomUUID } from 'crypto';
import type { Exchange, ExchangeDraft, Session } from '../types.js';
import { SessionNotFoundError } from '../errors.js';
import {
  ExchangeStatusSchema,
  QueryErrorCategorySchema,
  VisualizationSchema,
} from '../schemas/index.js';
import type { SqliteDatabase } from './database.js';
import {
  buildExchange,
  freezeVisualization,
  nextExchangeTimestamp,
  type NewSession,
  type SessionStore,
} from './session-store.js';

interface SessionRow {
  id: string;
  dataset_id: string;
  title: string;
  created_at: string;
  updated_at: string;
}

interface ExchangeRow {
  id: string;
  session_id: string;
  sequence: number;
  prompt: string;
  response_text: string;
  visualization: string | null;
  status: string;
  error_category: string | null;
  error_message: string | null;
  attempts: number;
  duration_ms: number;
  created_at: string;
}

const SESSION_COLUMNS = 'id, dataset_id, title, created_at, updated_at';

const EXCHANGE_COLUMNS =
  'id, session_id, sequence, prompt, response_text, visualization, status, ' +
  'error_category, error_message, attempts, duration_ms, created_at';

export class SqliteSessionStore implements SessionStore {
  constructor(private readonly db: SqliteDatabase) {}

  async createSession(input: NewSession): Promise<Session> {
    const now = new Date().toISOString();
    const session: Session = {
      id: randomUUID(),
      datasetId: input.datasetId,
      title: input.title,
      createdAt: now,
      updatedAt: now,
    };

    this.db
      .prepare<[string, string, string, string, string]>(
        `INSERT INTO analysis_sessions (${SESSION_COLUMNS}) VALUES (?, ?, ?, ?, ?)`
      )
      .run(session.id, session.datasetId, session.title, session.createdAt, session.updatedAt);

    return session;
  }

  async getSession(sessionId: string): Promise<Session | null> {
    const row = this.db
      .prepare<[string], SessionRow>(`SELECT ${SESSION_COLUMNS} FROM analysis_sessions WHERE id = ?`)
      .get(sessionId);
    return row ? toSession(row) : null;
  }

  async listSessions(): Promise<Session[]> {
    return this.db
      .prepare<[], SessionRow>(
        `SELECT ${SESSION_COLUMNS} FROM analysis_sessions ORDER BY updated_at DESC`
      )
      .all()
      .map(toSession);
  }

  async appendExchange(sessionId: string, draft: ExchangeDraft): Promise<Exchange> {
    const append = this.db.transaction((): Exchange => {
      const session = this.db
        .prepare<[string], { id: string }>('SELECT id FROM analysis_sessions WHERE id = ?')
        .get(sessionId);
      if (!session) {
        throw new SessionNotFoundError(sessionId);
      }

      const last = this.db
        .prepare<[string], { sequence: number; created_at: string }>(
          'SELECT sequence, created_at FROM exchanges WHERE session_id = ? ORDER BY sequence DESC LIMIT 1'
        )
        .get(sessionId);

      const exchange = buildExchange(
        sessionId,
        (last?.sequence ?? 0) + 1,
        nextExchangeTimestamp(last?.created_at),
        draft
      );

      this.db
        .prepare<
          [string, string, number, string, string, string | null, string, string | null, string | null, number, number, string]
        >(`INSERT INTO exchanges (${EXCHANGE_COLUMNS}) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`)
        .run(
          exchange.id,
          exchange.sessionId,
          exchange.sequence,
          exchange.prompt,
          exchange.responseText,
          exchange.visualization === null ? null : JSON.stringify(exchange.visualization),
          exchange.status,
          exchange.errorCategory,
          exchange.errorMessage,
          exchange.attempts,
          exchange.durationMs,
          exchange.createdAt
        );

      this.db
        .prepare<[string, string]>('UPDATE analysis_sessions SET updated_at = ? WHERE id = ?')
        .run(exchange.createdAt, sessionId);

      return exchange;
    });

    return append();
  }

  async listExchanges(sessionId: string): Promise<readonly Exchange[]> {
    return this.db
      .prepare<[string], ExchangeRow>(
        `SELECT ${EXCHANGE_COLUMNS} FROM exchanges WHERE session_id = ? ORDER BY sequence ASC`
      )
      .all(sessionId)
      .map(toExchange);
  }
}

// =============================================================================
// ROW MAPPING
// =============================================================================

function toSession(row: SessionRow): Session {
  return {
    id: row.id,
    datasetId: row.dataset_id,
    title: row.title,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toExchange(row: ExchangeRow): Exchange {
  return Object.freeze({
    id: row.id,
    sessionId: row.session_id,
    sequence: row.sequence,
    prompt: row.prompt,
    responseText: row.response_text,
    visualization:
      row.visualization === null ? null : freezeVisualization(VisualizationSchema.parse(JSON.parse(row.visualization))),
    status: ExchangeStatusSchema.parse(row.status),
    errorCategory: row.error_category === null ? null : QueryErrorCategorySchema.parse(row.error_category),
    errorMessage: row.error_message,
    attempts: row.attempts,
    durationMs: row.duration_ms,
    createdAt: row.created_at,
  });
}
