import { describe, it, expect } from 'vitest';
import {
  AppError,
  ConfigError,
  UsageError,
  ScanError,
  CacheError,
  GitCommandError,
  SummarizerError,
  toAppError,
  exitCodeFor,
} from './errors';

describe('AppError', () => {
  it('should create an error with code and message', () => {
    const error = new AppError('ConfigError', 'Test message');
    expect(error.code).toBe('ConfigError');
    expect(error.message).toBe('Test message');
    expect(error.name).toBe('AppError');
  });

  it('should accept optional cause and details', () => {
    const cause = new Error('Original error');
    const details = { filePath: '/tmp/cache.txt' };
    const error = new AppError('CacheError', 'Test message', { cause, details });
    expect(error.cause).toBe(cause);
    expect(error.details).toEqual(details);
  });
});

describe('subclasses', () => {
  it('carry their codes and names', () => {
    expect(new ConfigError('x').code).toBe('ConfigError');
    expect(new UsageError('x').code).toBe('UsageError');
    expect(new CacheError('x').code).toBe('CacheError');
    expect(new SummarizerError('x').code).toBe('SummarizerError');
    expect(new CacheError('x').name).toBe('CacheError');
  });

  it('ScanError records the failing path', () => {
    const error = new ScanError('/srv/locked', 'EACCES: permission denied');
    expect(error.code).toBe('ScanError');
    expect(error.path).toBe('/srv/locked');
    expect(error).toBeInstanceOf(AppError);
  });

  it('GitCommandError records command, exit code and stderr', () => {
    const error = new GitCommandError('git push', 'Git command failed: git push', {
      exitCode: 128,
      stderr: 'fatal: no upstream',
    });
    expect(error.code).toBe('GitCommandError');
    expect(error.command).toBe('git push');
    expect(error.exitCode).toBe(128);
    expect(error.stderr).toBe('fatal: no upstream');
  });

  it('GitCommandError defaults exit code and stderr', () => {
    const error = new GitCommandError('git status', 'spawn git ENOENT');
    expect(error.exitCode).toBeNull();
    expect(error.stderr).toBe('');
  });
});

describe('toAppError', () => {
  it('returns AppErrors unchanged', () => {
    const error = new CacheError('disk full');
    expect(toAppError(error)).toBe(error);
  });

  it('wraps plain errors', () => {
    const cause = new Error('boom');
    const wrapped = toAppError(cause);
    expect(wrapped.code).toBe('UnknownError');
    expect(wrapped.message).toBe('boom');
    expect(wrapped.cause).toBe(cause);
  });

  it('wraps non-error values', () => {
    const wrapped = toAppError(42, 'summarizer threw');
    expect(wrapped.message).toBe('summarizer threw');
    expect(wrapped.details).toBe('42');
  });
});

describe('exitCodeFor', () => {
  it('uses 2 for user-correctable errors and 1 otherwise', () => {
    expect(exitCodeFor(new ConfigError('x'))).toBe(2);
    expect(exitCodeFor(new UsageError('x'))).toBe(2);
    expect(exitCodeFor(new CacheError('x'))).toBe(1);
    expect(exitCodeFor(new Error('x'))).toBe(1);
  });
});
