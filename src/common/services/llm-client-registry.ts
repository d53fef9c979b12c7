/**
 * LLM Client Registry
 *
 * Owns the process-wide handle to the LLM client. The first caller triggers
 * construction and concurrent first callers share that one construction;
 * everyone afterwards receives the same handle. Only construction is
 * serialized - calls made through the handle are not.
 *
 * reset() builds a fresh handle and swaps it in (e.g. after a credential
 * rotation). Calls already holding the old handle finish against it.
 */

import { errorMessage, logError, logInfo } from './logger.js';

export type ClientFactory<TClient> = () => TClient | Promise<TClient>;

export interface ClientRegistryStats {
  name: string;
  initialized: boolean;
  constructing: boolean;
  constructions: number;
  failedConstructions: number;
  lastConstructedAt: string | null;
}

export class LLMClientRegistry<TClient> {
  private handle: TClient | null = null;
  private construction: Promise<TClient> | null = null;
  /** Bumped by reset() so an older construction cannot overwrite a newer handle */
  private generation = 0;

  private constructions = 0;
  private failedConstructions = 0;
  private lastConstructedAt: string | null = null;

  constructor(
    private readonly name: string,
    private readonly factory: ClientFactory<TClient>
  ) {}

  /**
   * Get the shared client, constructing it on first use.
   * A failed construction leaves the registry empty so the next call retries.
   */
  getClient(): Promise<TClient> {
    if (this.handle !== null) {
      return Promise.resolve(this.handle);
    }

    if (this.construction === null) {
      const generation = this.generation;
      this.construction = this.build()
        .then((client) => {
          if (this.generation === generation) {
            this.handle = client;
          }
          return client;
        })
        .finally(() => {
          this.construction = null;
        });
    }

    return this.construction;
  }

  /**
   * Construct a fresh client and swap it in atomically.
   * If construction fails the current handle stays in place.
   */
  async reset(): Promise<TClient> {
    const generation = ++this.generation;
    const client = await this.build();
    if (this.generation === generation) {
      this.handle = client;
      logInfo('LLM client handle swapped', { registry: this.name, generation });
    }
    return client;
  }

  isInitialized(): boolean {
    return this.handle !== null;
  }

  getStats(): ClientRegistryStats {
    return {
      name: this.name,
      initialized: this.handle !== null,
      constructing: this.construction !== null,
      constructions: this.constructions,
      failedConstructions: this.failedConstructions,
      lastConstructedAt: this.lastConstructedAt,
    };
  }

  private async build(): Promise<TClient> {
    const startTime = Date.now();
    try {
      const client = await this.factory();
      this.constructions++;
      this.lastConstructedAt = new Date().toISOString();
      logInfo('LLM client constructed', {
        registry: this.name,
        constructions: this.constructions,
        duration_ms: Date.now() - startTime,
      });
      return client;
    } catch (error) {
      this.failedConstructions++;
      logError('LLM client construction failed', {
        registry: this.name,
        error: errorMessage(error),
        duration_ms: Date.now() - startTime,
      });
      throw error;
    }
  }
}
