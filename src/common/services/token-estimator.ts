/**
 * Token Estimator Service
 *
 * Character-based token estimates used to keep the context window and the
 * analyst prompt inside the model's limits without a tokenizer round trip.
 * Accuracy is roughly +/- 20% for English text and CSV.
 *
 * @module services/token-estimator
 */

import { TOKEN_ESTIMATION } from '../constants.js';
import type { Exchange } from '../types.js';

/**
 * Estimate tokens for a block of text
 */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / TOKEN_ESTIMATION.CHARS_PER_TOKEN);
}

/**
 * Estimate what one prior exchange costs when replayed as a user/assistant pair.
 * Visualization payloads are not replayed, so they do not count.
 */
export function estimateExchangeTokens(exchange: Pick<Exchange, 'prompt' | 'responseText'>): number {
  return estimateTokens(exchange.prompt) + estimateTokens(exchange.responseText);
}
