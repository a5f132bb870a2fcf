import { describe, it, expect } from 'vitest';
import { CacheError } from '@repowarden/shared';
import { MemoryCacheStore } from './memoryCacheStore';

describe('MemoryCacheStore', () => {
  it('supports the CacheStore contract', async () => {
    const store = new MemoryCacheStore({ repos: '/a' });
    expect(store.get('repos')).toBe('/a');

    await store.set('other', 'x=y');
    expect(store.get('other')).toBe('x=y');

    await store.delete('repos');
    expect(store.get('repos')).toBeUndefined();

    await store.clear();
    expect(store.entries().size).toBe(0);
  });

  it('applies the same key rules as the file store', async () => {
    const store = new MemoryCacheStore();
    await expect(store.set('bad=key', 'v')).rejects.toBeInstanceOf(CacheError);
  });
});
