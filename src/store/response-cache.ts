import { Result } from '../types/result.js';

export interface ResponseCache<V, E> {
  get(key: string): V | undefined;
  put(key: string, value: V): void;
  /**
   * Read-through lookup. Concurrent misses on one key share a single call to
   * `fetcher`; only successful results are stored.
   */
  getOrFetch(key: string, fetcher: () => Promise<Result<V, E>>): Promise<Result<V, E>>;
  readonly size: number;
}

/**
 * Process-local cache. Entries live until the process exits: there is no
 * eviction and no TTL.
 */
export class MemoryResponseCache<V, E> implements ResponseCache<V, E> {
  private entries: Map<string, V> = new Map();
  private inFlight: Map<string, Promise<Result<V, E>>> = new Map();

  get size(): number {
    return this.entries.size;
  }

  get(key: string): V | undefined {
    return this.entries.get(key);
  }

  put(key: string, value: V): void {
    this.entries.set(key, value);
  }

  getOrFetch(key: string, fetcher: () => Promise<Result<V, E>>): Promise<Result<V, E>> {
    const cached = this.entries.get(key);
    if (cached !== undefined) {
      return Promise.resolve({ ok: true, value: cached });
    }

    const pending = this.inFlight.get(key);
    if (pending) {
      return pending;
    }

    const request = this.fetchAndStore(key, fetcher);
    this.inFlight.set(key, request);
    return request;
  }

  private async fetchAndStore(
    key: string,
    fetcher: () => Promise<Result<V, E>>
  ): Promise<Result<V, E>> {
    try {
      const result = await fetcher();
      if (result.ok) {
        this.entries.set(key, result.value);
      }
      return result;
    } finally {
      this.inFlight.delete(key);
    }
  }
}
