export * from './types';
export * from './format';
export { FileCacheStore } from './fileCacheStore';
export { MemoryCacheStore } from './memoryCacheStore';
