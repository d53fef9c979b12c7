/**
 * Jest Unit Tests for the Context Window Manager
 */

import type { ExchangeDraft } from '../../../common/types.js';
import { InMemorySessionStore } from '../../../common/services/session-store.js';
import { ContextWindowManager } from '../context-window.js';

function draft(prompt: string, status: 'success' | 'error' = 'success', responseText = `answer to ${prompt}`): ExchangeDraft {
  return {
    prompt,
    responseText: status === 'success' ? responseText : '',
    visualization: null,
    status,
    errorCategory: status === 'success' ? null : 'Timeout',
    errorMessage: status === 'success' ? null : 'took too long',
    attempts: 1,
    durationMs: 5,
  };
}

async function sessionWith(drafts: ExchangeDraft[]) {
  const store = new InMemorySessionStore();
  const session = await store.createSession({ datasetId: 'ds-1', title: 't' });
  for (const entry of drafts) {
    await store.appendExchange(session.id, entry);
  }
  return { store, sessionId: session.id };
}

describe('ContextWindowManager', () => {
  test('returns the 10 most recent of 15 successful exchanges, oldest first', async () => {
    const drafts = Array.from({ length: 15 }, (_, i) => draft(`q${i + 1}`));
    const { store, sessionId } = await sessionWith(drafts);
    const manager = new ContextWindowManager(store);

    const window = await manager.window(sessionId, 10);

    expect(window.map((exchange) => exchange.prompt)).toEqual([
      'q6', 'q7', 'q8', 'q9', 'q10', 'q11', 'q12', 'q13', 'q14', 'q15',
    ]);
  });

  test('excludes error exchanges', async () => {
    const { store, sessionId } = await sessionWith([
      draft('q1'),
      draft('q2', 'error'),
      draft('q3'),
      draft('q4', 'error'),
    ]);
    const manager = new ContextWindowManager(store);

    const window = await manager.window(sessionId, 10);

    expect(window.map((exchange) => exchange.prompt)).toEqual(['q1', 'q3']);
  });

  test('is empty when no exchange succeeded', async () => {
    const { store, sessionId } = await sessionWith([draft('q1', 'error'), draft('q2', 'error')]);
    const manager = new ContextWindowManager(store);

    await expect(manager.window(sessionId, 10)).resolves.toEqual([]);
  });

  test('is empty for a fresh session', async () => {
    const { store, sessionId } = await sessionWith([]);
    const manager = new ContextWindowManager(store);

    await expect(manager.window(sessionId)).resolves.toEqual([]);
  });

  test('uses the configured default size', async () => {
    const { store, sessionId } = await sessionWith([draft('q1'), draft('q2'), draft('q3')]);
    const manager = new ContextWindowManager(store, { defaultMaxEntries: 2 });

    const window = await manager.window(sessionId);

    expect(window.map((exchange) => exchange.prompt)).toEqual(['q2', 'q3']);
  });

  test('is deterministic for the same history', async () => {
    const { store, sessionId } = await sessionWith([draft('q1'), draft('q2', 'error'), draft('q3')]);
    const manager = new ContextWindowManager(store);

    const first = await manager.window(sessionId, 5);
    const second = await manager.window(sessionId, 5);

    expect(second).toEqual(first);
  });

  test('drops the oldest entries to fit the token budget', async () => {
    // Each exchange: 4-char prompt (1 token) + 40-char answer (10 tokens) = 11 tokens
    const answer = 'x'.repeat(40);
    const { store, sessionId } = await sessionWith([
      draft('aaaa', 'success', answer),
      draft('bbbb', 'success', answer),
      draft('cccc', 'success', answer),
    ]);
    const manager = new ContextWindowManager(store, { maxContextTokens: 25 });

    const window = await manager.window(sessionId, 10);

    expect(window.map((exchange) => exchange.prompt)).toEqual(['bbbb', 'cccc']);
  });

  test('rejects a window size outside 1-50', async () => {
    const { store, sessionId } = await sessionWith([]);
    const manager = new ContextWindowManager(store);

    await expect(manager.window(sessionId, 0)).rejects.toThrow(RangeError);
    await expect(manager.window(sessionId, 51)).rejects.toThrow(RangeError);
  });
});
