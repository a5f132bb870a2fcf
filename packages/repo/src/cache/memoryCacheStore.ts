import { assertStorable } from './format';
import type { CacheStore } from './types';

/**
 * Non-durable CacheStore with the same key/value rules as the file store.
 */
export class MemoryCacheStore implements CacheStore {
  private readonly data: Map<string, string>;

  constructor(initial: Record<string, string> = {}) {
    this.data = new Map(Object.entries(initial));
  }

  get(key: string): string | undefined {
    return this.data.get(key);
  }

  async set(key: string, value: string): Promise<void> {
    assertStorable(key, value);
    this.data.set(key, value);
  }

  async delete(key: string): Promise<void> {
    this.data.delete(key);
  }

  async clear(): Promise<void> {
    this.data.clear();
  }

  entries(): ReadonlyMap<string, string> {
    return new Map(this.data);
  }
}
