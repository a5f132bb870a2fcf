import { CacheError, atomicWrite, readTextIfExists } from '@repowarden/shared';
import { assertStorable, parseCacheFile, serializeCacheFile } from './format';
import type { CacheStore } from './types';

/**
 * Cache backed by a flat `key=value` text file. The file is read once when
 * the store is opened; each mutation rewrites the whole file atomically.
 */
export class FileCacheStore implements CacheStore {
  /** Tail of the pending writes; each write starts after the previous one settles */
  private writeQueue: Promise<void> = Promise.resolve();

  private constructor(
    public readonly filePath: string,
    private readonly data: Map<string, string>,
  ) {}

  static async open(filePath: string): Promise<FileCacheStore> {
    let content: string | undefined;
    try {
      content = await readTextIfExists(filePath);
    } catch (error) {
      throw new CacheError(`Failed to read cache file: ${filePath}`, {
        cause: error,
        details: { filePath },
      });
    }
    return new FileCacheStore(filePath, content ? parseCacheFile(content) : new Map());
  }

  get(key: string): string | undefined {
    return this.data.get(key);
  }

  async set(key: string, value: string): Promise<void> {
    assertStorable(key, value);
    const previous = this.data.get(key);
    this.data.set(key, value);
    await this.persist(() => {
      // A later mutation of the same key wins over this rollback.
      if (this.data.get(key) !== value) return;
      if (previous === undefined) {
        this.data.delete(key);
      } else {
        this.data.set(key, previous);
      }
    });
  }

  async delete(key: string): Promise<void> {
    const previous = this.data.get(key);
    if (!this.data.delete(key)) return;
    await this.persist(() => {
      if (previous !== undefined && !this.data.has(key)) this.data.set(key, previous);
    });
  }

  async clear(): Promise<void> {
    const snapshot = new Map(this.data);
    this.data.clear();
    await this.persist(() => {
      for (const [key, value] of snapshot) {
        if (!this.data.has(key)) this.data.set(key, value);
      }
    });
  }

  entries(): ReadonlyMap<string, string> {
    return new Map(this.data);
  }

  /**
   * Queues a write of the map as it stands when the write starts. On failure
   * restores memory so it matches the file.
   */
  private persist(rollback: () => void): Promise<void> {
    const write = this.writeQueue.then(() => this.write(rollback));
    // The caller of this write receives its failure; the queue only needs to move on.
    this.writeQueue = write.catch(() => undefined);
    return write;
  }

  private async write(rollback: () => void): Promise<void> {
    try {
      await atomicWrite(this.filePath, serializeCacheFile(this.data));
    } catch (error) {
      rollback();
      throw new CacheError(`Failed to write cache file: ${this.filePath}`, {
        cause: error,
        details: { filePath: this.filePath },
      });
    }
  }
}
