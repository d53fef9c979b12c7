/**
 * Jest Unit Tests for the LLM Client Registry
 *
 * Tests once-only construction, failure recovery and handle swapping.
 */

import { LLMClientRegistry } from '../llm-client-registry.js';

interface FakeClient {
  id: number;
}

function countingFactory(): { factory: jest.Mock<Promise<FakeClient>, []>; built: () => number } {
  let count = 0;
  const factory = jest.fn<Promise<FakeClient>, []>(async () => {
    count++;
    return { id: count };
  });
  return { factory, built: () => count };
}

describe('LLMClientRegistry', () => {
  // ==========================================================================
  // CONSTRUCTION
  // ==========================================================================

  describe('Construction', () => {
    test('concurrent first calls construct exactly once and share the handle', async () => {
      const { factory } = countingFactory();
      const registry = new LLMClientRegistry('test', factory);

      const clients = await Promise.all(Array.from({ length: 10 }, () => registry.getClient()));

      expect(factory).toHaveBeenCalledTimes(1);
      for (const client of clients) {
        expect(client).toBe(clients[0]);
      }
      expect(registry.isInitialized()).toBe(true);
    });

    test('later calls reuse the constructed handle', async () => {
      const { factory } = countingFactory();
      const registry = new LLMClientRegistry('test', factory);

      const first = await registry.getClient();
      const second = await registry.getClient();

      expect(second).toBe(first);
      expect(registry.getStats().constructions).toBe(1);
    });

    test('accepts a synchronous factory', async () => {
      const client: FakeClient = { id: 7 };
      const registry = new LLMClientRegistry('test', () => client);

      await expect(registry.getClient()).resolves.toBe(client);
    });
  });

  // ==========================================================================
  // FAILURES
  // ==========================================================================

  describe('Construction failures', () => {
    test('a failed construction leaves the registry empty and retries next time', async () => {
      const factory = jest
        .fn<Promise<FakeClient>, []>()
        .mockRejectedValueOnce(new Error('missing credentials'))
        .mockResolvedValueOnce({ id: 1 });
      const registry = new LLMClientRegistry('test', factory);

      await expect(registry.getClient()).rejects.toThrow('missing credentials');
      expect(registry.isInitialized()).toBe(false);

      const client = await registry.getClient();
      expect(client).toEqual({ id: 1 });

      const stats = registry.getStats();
      expect(stats.failedConstructions).toBe(1);
      expect(stats.constructions).toBe(1);
      expect(stats.constructing).toBe(false);
    });

    test('concurrent callers all see the same construction failure', async () => {
      const factory = jest.fn<Promise<FakeClient>, []>().mockRejectedValueOnce(new Error('boom'));
      const registry = new LLMClientRegistry('test', factory);

      const results = await Promise.allSettled([registry.getClient(), registry.getClient()]);

      expect(factory).toHaveBeenCalledTimes(1);
      expect(results.map((result) => result.status)).toEqual(['rejected', 'rejected']);
    });
  });

  // ==========================================================================
  // RESET
  // ==========================================================================

  describe('Reset', () => {
    test('swaps in a fresh handle while holders keep the old one', async () => {
      const { factory } = countingFactory();
      const registry = new LLMClientRegistry('test', factory);

      const old = await registry.getClient();
      const fresh = await registry.reset();
      const current = await registry.getClient();

      expect(old).toEqual({ id: 1 });
      expect(fresh).toEqual({ id: 2 });
      expect(current).toBe(fresh);
      expect(current).not.toBe(old);
    });

    test('a failed reset keeps the current handle', async () => {
      const factory = jest
        .fn<Promise<FakeClient>, []>()
        .mockResolvedValueOnce({ id: 1 })
        .mockRejectedValueOnce(new Error('rotation failed'));
      const registry = new LLMClientRegistry('test', factory);

      const original = await registry.getClient();
      await expect(registry.reset()).rejects.toThrow('rotation failed');

      await expect(registry.getClient()).resolves.toBe(original);
    });

    test('a construction started before reset does not overwrite the new handle', async () => {
      let release: (client: FakeClient) => void = () => undefined;
      const slow = new Promise<FakeClient>((resolve) => {
        release = resolve;
      });
      const factory = jest
        .fn<Promise<FakeClient>, []>()
        .mockReturnValueOnce(slow)
        .mockResolvedValueOnce({ id: 2 });
      const registry = new LLMClientRegistry('test', factory);

      const early = registry.getClient();
      const fresh = await registry.reset();
      release({ id: 1 });
      await early;

      await expect(registry.getClient()).resolves.toBe(fresh);
    });
  });
});
