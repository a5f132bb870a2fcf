import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { atomicWrite, readTextIfExists } from './io';

describe('fs io', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'warden-io-test-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('writes through missing parent directories', async () => {
    const target = path.join(tmpDir, 'nested', 'dir', 'cache.txt');

    await atomicWrite(target, 'repos=/a\n');

    expect(await fs.readFile(target, 'utf8')).toBe('repos=/a\n');
  });

  it('replaces existing content and leaves no temp files behind', async () => {
    const target = path.join(tmpDir, 'cache.txt');
    await atomicWrite(target, 'first');
    await atomicWrite(target, 'second');

    expect(await fs.readFile(target, 'utf8')).toBe('second');
    expect(await fs.readdir(tmpDir)).toEqual(['cache.txt']);
  });

  it('returns undefined for a missing file', async () => {
    await expect(readTextIfExists(path.join(tmpDir, 'absent.txt'))).resolves.toBeUndefined();
  });

  it('rethrows errors other than a missing file', async () => {
    await expect(readTextIfExists(tmpDir)).rejects.toMatchObject({ code: 'EISDIR' });
  });
});
