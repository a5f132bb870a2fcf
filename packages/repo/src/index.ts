export const name = '@repowarden/repo';

export * from './git';
export { FakeCommandRunner } from './git/fake';
export type { FakeRepository, FakeCall, FakeOperation } from './git/fake';
export * from './cache';
export * from './scanner';
