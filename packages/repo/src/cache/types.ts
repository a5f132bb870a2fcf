/**
 * Durable string key/value store. Reads are served from memory; every
 * mutation is persisted before its promise resolves.
 *
 * A store file has exactly one owning process. There is no cross-process
 * locking.
 */
export interface CacheStore {
  get(key: string): string | undefined;
  set(key: string, value: string): Promise<void>;
  delete(key: string): Promise<void>;
  clear(): Promise<void>;
  entries(): ReadonlyMap<string, string>;
}
