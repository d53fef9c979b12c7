/**
 * Query failure taxonomy
 *
 * Every failure of an accepted query lands in exactly one category. The
 * category decides whether the executor retries and which message the user
 * sees; upstream error text is only ever logged.
 */

import type { QueryErrorCategory } from '../../common/types.js';
import { errorMessage } from '../../common/services/logger.js';

// =============================================================================
// USER MESSAGES
// =============================================================================

export const USER_MESSAGES: Record<QueryErrorCategory, string> = {
  DataUnavailable:
    'The dataset for this session is not available right now. Check that it finished processing and try again.',
  RateLimited: 'The analysis service is busy. Please wait a moment and ask again.',
  Timeout: 'The analysis took too long to complete. Try a simpler question or ask again.',
  ContextTooLarge:
    'This question plus the conversation so far is too large to analyze. Start a new session or ask a shorter question.',
  MalformedOutput: 'The analysis could not produce a readable answer. Try rephrasing your question.',
  UpstreamUnavailable: 'The analysis service could not be reached. Please try again shortly.',
};

/**
 * Categories retried once before the failure is recorded
 */
export const RETRYABLE_CATEGORIES: ReadonlySet<QueryErrorCategory> = new Set<QueryErrorCategory>([
  'RateLimited',
  'Timeout',
  'UpstreamUnavailable',
]);

export function isRetryable(category: QueryErrorCategory): boolean {
  return RETRYABLE_CATEGORIES.has(category);
}

// =============================================================================
// ERRORS
// =============================================================================

/**
 * Thrown by adapters when they already know the category of a failure
 */
export class AnalysisError extends Error {
  constructor(
    public readonly category: QueryErrorCategory,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'AnalysisError';
  }
}

export interface ClassifiedError {
  category: QueryErrorCategory;
  detail: string;
  /** True when nothing recognized the error; logged with full detail */
  unexpected: boolean;
}

/**
 * Map any thrown value onto the taxonomy
 */
export function classifyError(error: unknown): ClassifiedError {
  if (error instanceof AnalysisError) {
    return { category: error.category, detail: error.message, unexpected: false };
  }

  if (error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')) {
    return { category: 'Timeout', detail: error.message, unexpected: false };
  }

  return { category: 'MalformedOutput', detail: errorMessage(error), unexpected: true };
}
