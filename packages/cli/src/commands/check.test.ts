import { describe, it, expect } from 'vitest';
import type { TickReport } from '@repowarden/core';
import { exitCodeForReport } from './check';

function report(failures: TickReport['failures']): TickReport {
  return {
    tickNumber: 1,
    processed: 1,
    skipped: 0,
    unchanged: 0,
    committed: [],
    pushed: [],
    failures,
    startedAt: '2026-03-01T10:00:00.000Z',
    finishedAt: '2026-03-01T10:00:01.000Z',
  };
}

describe('exitCodeForReport', () => {
  it('is zero when every repository succeeded', () => {
    expect(exitCodeForReport(report([]))).toBe(0);
  });

  it('is one when any repository failed', () => {
    expect(exitCodeForReport(report([{ path: '/srv/api', step: 'commit', message: 'nothing to commit' }]))).toBe(1);
  });
});
