/**
 * Context Window Manager
 *
 * Builds the bounded slice of session history injected into each query:
 * the most recent successful exchanges, oldest first. Stateless; the window
 * is recomputed from the append-only log on every call.
 */

import type { Exchange } from '../../common/types.js';
import { CONTEXT_DEFAULTS } from '../../common/constants.js';
import type { SessionStore } from '../../common/services/session-store.js';
import { estimateExchangeTokens } from '../../common/services/token-estimator.js';

export interface ContextWindowOptions {
  defaultMaxEntries?: number;
  /** Drop the oldest entries until the window fits this estimate */
  maxContextTokens?: number;
}

export class ContextWindowManager {
  private readonly defaultMaxEntries: number;
  private readonly maxContextTokens: number | undefined;

  constructor(
    private readonly store: Pick<SessionStore, 'listExchanges'>,
    options: ContextWindowOptions = {}
  ) {
    this.defaultMaxEntries = options.defaultMaxEntries ?? CONTEXT_DEFAULTS.MAX_ENTRIES;
    this.maxContextTokens = options.maxContextTokens;
    assertMaxEntries(this.defaultMaxEntries);
  }

  async window(sessionId: string, maxEntries: number = this.defaultMaxEntries): Promise<Exchange[]> {
    assertMaxEntries(maxEntries);
    const history = await this.store.listExchanges(sessionId);
    return selectWindow(history, maxEntries, this.maxContextTokens);
  }
}

function assertMaxEntries(maxEntries: number): void {
  if (!Number.isInteger(maxEntries) || maxEntries < 1 || maxEntries > CONTEXT_DEFAULTS.MAX_ENTRIES_LIMIT) {
    throw new RangeError(
      `maxEntries must be an integer between 1 and ${CONTEXT_DEFAULTS.MAX_ENTRIES_LIMIT}, got ${maxEntries}`
    );
  }
}

/**
 * Most recent `maxEntries` successful exchanges in chronological order.
 * Error exchanges never enter the window.
 */
export function selectWindow(
  history: readonly Exchange[],
  maxEntries: number,
  maxTokens?: number
): Exchange[] {
  const successful = history
    .filter((exchange) => exchange.status === 'success')
    .sort((a, b) => a.sequence - b.sequence);

  const window = successful.slice(Math.max(0, successful.length - maxEntries));

  if (maxTokens !== undefined) {
    let total = window.reduce((sum, exchange) => sum + estimateExchangeTokens(exchange), 0);
    while (window.length > 0 && total > maxTokens) {
      const dropped = window.shift();
      total -= dropped ? estimateExchangeTokens(dropped) : 0;
    }
  }

  return window;
}
