import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { CommanderError } from 'commander';
import nodeFs from 'node:fs/promises';
import * as path from 'path';
import * as os from 'os';
import { ConfigError, GitCommandError, UsageError } from '@repowarden/shared';
import { createProgram, renderError, run } from './program';

describe('createProgram', () => {
  it('registers the commands', () => {
    const program = createProgram();
    expect(program.commands.map((command) => command.name())).toEqual([
      'start',
      'scan',
      'check',
      'cache',
    ]);
    const cache = program.commands.find((command) => command.name() === 'cache');
    expect(cache?.commands.map((command) => command.name())).toEqual(['show', 'clear']);
  });

  it('parses global options', () => {
    const program = createProgram();
    program.parseOptions(['--root', '/srv', '--interval', '5000', '--no-cache', '--json']);

    expect(program.opts()).toEqual({ root: '/srv', interval: 5000, cache: false, json: true });
  });
});

describe('renderError', () => {
  let logSpy: MockInstance<typeof console.log>;
  let errSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('renders an AppError as JSON and exits 2 for config errors', () => {
    const code = renderError(new ConfigError('Root directory does not exist: /nope', { details: 'rootDir' }), {
      json: true,
    });

    expect(code).toBe(2);
    expect(JSON.parse(String(logSpy.mock.calls[0][0]))).toEqual({
      error: { code: 'ConfigError', message: 'Root directory does not exist: /nope', details: 'rootDir' },
    });
  });

  it('renders unknown errors as JSON and exits 1', () => {
    const code = renderError(new Error('disk on fire'), { json: true });

    expect(code).toBe(1);
    expect(JSON.parse(String(logSpy.mock.calls[0][0]))).toEqual({
      error: { code: 'UnknownError', message: 'disk on fire' },
    });
  });

  it('renders human output with the code and a verbose hint', () => {
    const code = renderError(new UsageError('Watchdog manager has already been started'), {});

    expect(code).toBe(2);
    expect(errSpy.mock.calls.map((c) => String(c[0]))).toEqual([
      '❌ Error [UsageError]: Watchdog manager has already been started',
      '\nFor more details, run with the --verbose flag.',
    ]);
  });

  it('prints details and the stack trace when verbose', () => {
    const error = new GitCommandError('git push', 'push rejected', {
      details: { cwd: '/srv/api' },
    });
    const code = renderError(error, { verbose: true });

    expect(code).toBe(1);
    const lines = errSpy.mock.calls.map((c) => String(c[0]));
    expect(lines[0]).toBe('❌ Error [GitCommandError]: push rejected');
    expect(lines[1]).toBe('  Details: {\n  "cwd": "/srv/api"\n}');
    expect(lines[2]).toMatch(/^\nStack Trace:\n/);
  });

  it('maps commander errors to exit codes without printing', () => {
    expect(renderError(new CommanderError(0, 'commander.helpDisplayed', '(outputHelp)'), {})).toBe(0);
    expect(
      renderError(new CommanderError(1, 'commander.unknownOption', "error: unknown option '--x'"), {}),
    ).toBe(2);
    expect(logSpy).not.toHaveBeenCalled();
    expect(errSpy).not.toHaveBeenCalled();
  });
});

describe('run', () => {
  let tmpDir: string;
  let logSpy: MockInstance<typeof console.log>;

  function jsonOutput(): unknown {
    return JSON.parse(String(logSpy.mock.calls[0][0]));
  }

  beforeEach(async () => {
    tmpDir = await nodeFs.mkdtemp(path.join(os.tmpdir(), 'warden-cli-test-'));
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await nodeFs.rm(tmpDir, { recursive: true, force: true });
  });

  it('scans an empty root', async () => {
    const code = await run(['node', 'repowarden', '--root', tmpDir, '--no-cache', '--json', 'scan']);

    expect(code).toBe(0);
    expect(jsonOutput()).toEqual({ repositories: [], warnings: [], fromCache: false });
  });

  it('shows and clears the cache file', async () => {
    const cacheFile = path.join(tmpDir, '.repowarden_cache.txt');
    await nodeFs.writeFile(cacheFile, 'repos=/srv/a;/srv/b\nnote=x=y\n', 'utf8');

    const showCode = await run(['node', 'repowarden', '--root', tmpDir, '--json', 'cache', 'show']);
    expect(showCode).toBe(0);
    expect(jsonOutput()).toEqual({
      cacheFile,
      entries: { repos: '/srv/a;/srv/b', note: 'x=y' },
    });

    logSpy.mockClear();
    const clearCode = await run(['node', 'repowarden', '--root', tmpDir, '--json', 'cache', 'clear']);
    expect(clearCode).toBe(0);
    expect(jsonOutput()).toEqual({ cacheFile, cleared: 2 });
    await expect(nodeFs.readFile(cacheFile, 'utf8')).resolves.toBe('');
  });

  it('exits 2 for a non-positive interval', async () => {
    const code = await run(['node', 'repowarden', '--root', tmpDir, '--interval', '0', '--json', 'scan']);

    expect(code).toBe(2);
    expect(jsonOutput()).toEqual({
      error: {
        code: 'ConfigError',
        message: 'Configuration validation failed:\n- checkIntervalMs: checkIntervalMs must be greater than zero',
      },
    });
  });

  it('exits 2 when the root directory is missing', async () => {
    const missing = path.join(tmpDir, 'missing');
    const code = await run(['node', 'repowarden', '--root', missing, '--json', 'scan']);

    expect(code).toBe(2);
    expect(jsonOutput()).toEqual({
      error: { code: 'ConfigError', message: `Root directory does not exist: ${missing}` },
    });
  });

  it('exits 2 for an unknown option', async () => {
    const code = await run(['node', 'repowarden', '--bogus', 'scan']);
    expect(code).toBe(2);
  });
});
