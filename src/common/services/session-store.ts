/**
 * Session Store
 *
 * Append-only exchange log per analysis session. Exchanges are never edited
 * or deleted; the store assigns each one its id, its 1-based sequence and a
 * creation timestamp that never goes backwards within the session.
 */

import { randomUUID } from 'crypto';
import type { Exchange, ExchangeDraft, JsonValue, Session, VisualizationPayload } from '../types.js';
import { SessionNotFoundError } from '../errors.js';

// =============================================================================
// INTERFACE
// =============================================================================

export interface NewSession {
  datasetId: string;
  title: string;
}

export interface SessionStore {
  createSession(input: NewSession): Promise<Session>;
  getSession(sessionId: string): Promise<Session | null>;
  /** Most recently updated first */
  listSessions(): Promise<Session[]>;
  /** Throws SessionNotFoundError for an unknown session */
  appendExchange(sessionId: string, draft: ExchangeDraft): Promise<Exchange>;
  /** Exchanges in sequence order (oldest first); empty for an unknown session */
  listExchanges(sessionId: string): Promise<readonly Exchange[]>;
}

// =============================================================================
// HELPERS
// =============================================================================

/**
 * Creation timestamp for the next exchange: now, clamped so it is never
 * earlier than the previous exchange of the same session.
 */
export function nextExchangeTimestamp(previous: string | undefined, now: Date = new Date()): string {
  const current = now.toISOString();
  return previous !== undefined && previous > current ? previous : current;
}

export function buildExchange(
  sessionId: string,
  sequence: number,
  createdAt: string,
  draft: ExchangeDraft
): Exchange {
  return Object.freeze({
    id: randomUUID(),
    sessionId,
    sequence,
    prompt: draft.prompt,
    responseText: draft.responseText,
    visualization: draft.visualization === null ? null : frozenCopy(draft.visualization),
    status: draft.status,
    errorCategory: draft.errorCategory,
    errorMessage: draft.errorMessage,
    attempts: draft.attempts,
    durationMs: draft.durationMs,
    createdAt,
  });
}

/**
 * Freezes a visualization payload in place, nested values included
 */
export function freezeVisualization(payload: VisualizationPayload): VisualizationPayload {
  freezeJson(payload);
  return payload;
}

function frozenCopy(payload: VisualizationPayload): VisualizationPayload {
  return freezeVisualization(structuredClone(payload));
}

function freezeJson(value: JsonValue): void {
  if (typeof value !== 'object' || value === null) {
    return;
  }
  for (const child of Object.values(value)) {
    freezeJson(child);
  }
  Object.freeze(value);
}

// =============================================================================
// IN-MEMORY IMPLEMENTATION
// =============================================================================

export class InMemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, Session>();
  private readonly exchanges = new Map<string, Exchange[]>();

  async createSession(input: NewSession): Promise<Session> {
    const now = new Date().toISOString();
    const session: Session = {
      id: randomUUID(),
      datasetId: input.datasetId,
      title: input.title,
      createdAt: now,
      updatedAt: now,
    };
    this.sessions.set(session.id, session);
    this.exchanges.set(session.id, []);
    return { ...session };
  }

  async getSession(sessionId: string): Promise<Session | null> {
    const session = this.sessions.get(sessionId);
    return session ? { ...session } : null;
  }

  async listSessions(): Promise<Session[]> {
    return [...this.sessions.values()]
      .map((session) => ({ ...session }))
      .sort((a, b) => b.updatedAt.localeCompare(a.updatedAt));
  }

  async appendExchange(sessionId: string, draft: ExchangeDraft): Promise<Exchange> {
    const session = this.sessions.get(sessionId);
    const log = this.exchanges.get(sessionId);
    if (!session || !log) {
      throw new SessionNotFoundError(sessionId);
    }

    const previous = log.length > 0 ? log[log.length - 1] : undefined;
    const exchange = buildExchange(
      sessionId,
      log.length + 1,
      nextExchangeTimestamp(previous?.createdAt),
      draft
    );
    log.push(exchange);
    this.sessions.set(sessionId, { ...session, updatedAt: exchange.createdAt });
    return exchange;
  }

  async listExchanges(sessionId: string): Promise<readonly Exchange[]> {
    return [...(this.exchanges.get(sessionId) ?? [])];
  }
}
