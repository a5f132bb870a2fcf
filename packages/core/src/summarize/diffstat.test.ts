import { describe, it, expect } from 'vitest';
import { DiffStatSummarizer, FALLBACK_COMMIT_MESSAGE, parseDiffStat } from './diffstat';

function fileDiff(file: string, added: string[], removed: string[] = []): string {
  return [
    `diff --git a/${file} b/${file}`,
    'index 1111111..2222222 100644',
    `--- a/${file}`,
    `+++ b/${file}`,
    '@@ -1,2 +1,2 @@',
    ...removed.map((l) => `-${l}`),
    ...added.map((l) => `+${l}`),
    ' unchanged',
  ].join('\n');
}

describe('parseDiffStat', () => {
  it('counts added and removed lines without the file headers', () => {
    const diff = fileDiff('src/app.ts', ['one', 'two'], ['old']);
    expect(parseDiffStat(diff)).toEqual({ files: ['src/app.ts'], added: 2, removed: 1 });
  });

  it('counts hunk lines that start with --- or +++', () => {
    const diff = fileDiff('notes.md', ['++ added bullet'], ['-- removed rule']);
    expect(parseDiffStat(diff)).toEqual({ files: ['notes.md'], added: 1, removed: 1 });
  });

  it('uses the destination path of a rename', () => {
    const diff = 'diff --git a/old.txt b/new.txt\nsimilarity index 100%\nrename from old.txt\nrename to new.txt';
    expect(parseDiffStat(diff).files).toEqual(['new.txt']);
  });

  it('ignores lines before the first file header', () => {
    expect(parseDiffStat('+stray\n-stray')).toEqual({ files: [], added: 0, removed: 0 });
  });
});

describe('DiffStatSummarizer', () => {
  const summarizer = new DiffStatSummarizer();

  it('summarizes a single file', () => {
    const diff = fileDiff('README.md', ['Intro'], ['Old intro', 'More']);
    expect(summarizer.summarize(diff)).toBe('Update 1 file: README.md (+1 -2)');
  });

  it('lists three paths and counts the rest', () => {
    const diff = [
      fileDiff('a.ts', ['x']),
      fileDiff('b.ts', ['x']),
      fileDiff('c.ts', [], ['y']),
      fileDiff('d.ts', ['x', 'z']),
      fileDiff('e.ts', ['x']),
    ].join('\n');

    expect(summarizer.summarize(diff)).toBe('Update 5 files: a.ts, b.ts, c.ts, and 2 more (+5 -1)');
  });

  it('lists exactly three paths without a remainder', () => {
    const diff = [fileDiff('a', ['1']), fileDiff('b', ['2']), fileDiff('c', ['3'])].join('\n');
    expect(summarizer.summarize(diff)).toBe('Update 3 files: a, b, c (+3 -0)');
  });

  it('falls back when the diff has no file headers', () => {
    expect(summarizer.summarize('')).toBe(FALLBACK_COMMIT_MESSAGE);
    expect(summarizer.summarize('not a diff')).toBe('Automated update: summarized changes');
  });

  it('handles CRLF line endings', () => {
    const diff = fileDiff('win.txt', ['a'], ['b']).replace(/\n/g, '\r\n');
    expect(summarizer.summarize(diff)).toBe('Update 1 file: win.txt (+1 -1)');
  });
});
