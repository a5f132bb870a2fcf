export const name = '@repowarden/shared';

export * from './types/events';
export * from './logger';
export * from './redaction';
export * from './errors';
export * from './result';
export * from './config/schema';
export * from './fs/io';
