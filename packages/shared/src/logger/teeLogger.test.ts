import { describe, it, expect, vi, type Mock } from 'vitest';
import { TeeLogger } from './teeLogger';
import type { Logger } from './types';
import type { TickFinished } from '../types/events';

type FakeLogger = { [K in keyof Logger]: Mock };

function fakeLogger(): FakeLogger {
  const logger: FakeLogger = {
    log: vi.fn(),
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: vi.fn(),
  };
  logger.child.mockReturnValue(logger);
  return logger;
}

const event: TickFinished = {
  schemaVersion: 1,
  timestamp: '2026-01-01T00:00:00.000Z',
  runId: 'run-1',
  type: 'TickFinished',
  payload: { tickNumber: 1, committed: 1, pushed: 1, failed: 0, durationMs: 12 },
};

describe('TeeLogger', () => {
  it('sends events to the primary logger and every sink', async () => {
    const primary = fakeLogger();
    const sink = fakeLogger();
    const tee = new TeeLogger(primary, [sink]);

    await tee.log(event);
    await tee.trace(event, 'tick done');

    expect(primary.log).toHaveBeenCalledWith(event);
    expect(primary.trace).toHaveBeenCalledWith(event, 'tick done');
    expect(sink.log).toHaveBeenCalledTimes(2);
    expect(sink.trace).not.toHaveBeenCalled();
  });

  it('sends plain messages to the primary logger only', () => {
    const primary = fakeLogger();
    const sink = fakeLogger();
    const tee = new TeeLogger(primary, [sink]);

    tee.info('hello');
    tee.warn('careful');
    tee.error(new Error('boom'), 'failed');

    expect(primary.info).toHaveBeenCalledWith('hello');
    expect(primary.warn).toHaveBeenCalledWith('careful');
    expect(primary.error).toHaveBeenCalledWith(expect.any(Error), 'failed');
    expect(sink.info).not.toHaveBeenCalled();
  });

  it('derives children from the primary logger', () => {
    const primary = fakeLogger();
    const tee = new TeeLogger(primary, []);

    tee.child({ repo: '/srv/a' }).info('x');

    expect(primary.child).toHaveBeenCalledWith({ repo: '/srv/a' });
    expect(primary.info).toHaveBeenCalledWith('x');
  });
});
