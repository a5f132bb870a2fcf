import {
  AppError,
  Logger,
  MAX_CHECK_INTERVAL_MS,
  MonitorStep,
  Result,
  SummarizerError,
  err,
  eventMeta,
  toAppError,
} from '@repowarden/shared';
import type { RepositoryCommandRunner, RepositoryEntry } from '@repowarden/repo';
import type { Summarizer } from '../summarize';
import { FALLBACK_COMMIT_MESSAGE } from '../summarize';
import type { MonitorStatus, TickCallback, TickReport } from './types';

export interface ChangeMonitorOptions {
  runner: RepositoryCommandRunner;
  summarizer: Summarizer;
  /** Pause between the end of one tick and the start of the next */
  intervalMs: number;
  logger: Logger;
  runId: string;
  /** Called after every scheduled tick; errors are logged and ignored */
  onTick?: TickCallback;
}

/**
 * Resolves after `ms`, or as soon as `signal` aborts. Delays longer than a
 * single timer allows are waited out in several steps.
 */
function waitOrAbort(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const deadline = Date.now() + ms;
    let timeoutId: NodeJS.Timeout | undefined;
    const onAbort = () => {
      clearTimeout(timeoutId);
      resolve();
    };
    const schedule = () => {
      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        signal.removeEventListener('abort', onAbort);
        resolve();
        return;
      }
      timeoutId = setTimeout(schedule, Math.min(remaining, MAX_CHECK_INTERVAL_MS));
    };
    signal.addEventListener('abort', onAbort, { once: true });
    schedule();
  });
}

/** Runs a runner call, turning an unexpected throw into a failed result. */
async function attempt<T>(call: () => Promise<Result<T>>): Promise<Result<T>> {
  try {
    return await call();
  } catch (error) {
    return err(toAppError(error, 'Repository command threw'));
  }
}

/**
 * Periodically commits and pushes pending changes in a fixed list of
 * repositories. Ticks run one at a time; the next one is scheduled
 * `intervalMs` after the previous one finished.
 */
export class ChangeMonitor {
  private readonly repositories: readonly RepositoryEntry[];
  private readonly logger: Logger;
  private state: MonitorStatus = 'stopped';
  private abortController?: AbortController;
  private currentTick?: Promise<TickReport>;
  private tickCount = 0;

  constructor(
    repositories: readonly RepositoryEntry[],
    private readonly options: ChangeMonitorOptions,
  ) {
    this.repositories = Object.freeze([...repositories]);
    this.logger = options.logger;
  }

  get status(): MonitorStatus {
    return this.state;
  }

  /**
   * Runs a tick immediately and keeps ticking until `stop()`.
   * Does nothing when already running.
   */
  start(): void {
    if (this.state === 'running') {
      return;
    }
    this.state = 'running';
    const controller = new AbortController();
    this.abortController = controller;

    this.runLoop(controller.signal).catch((error: unknown) => {
      this.state = 'stopped';
      return this.logger.error(toAppError(error), 'Change monitor stopped unexpectedly');
    });
  }

  /**
   * Cancels the pending wait and resolves once the tick in progress, if any,
   * has finished. Safe to call repeatedly and from inside `onTick`.
   */
  async stop(): Promise<void> {
    this.state = 'stopped';
    this.abortController?.abort();
    this.abortController = undefined;
    if (this.currentTick) {
      await this.currentTick;
    }
  }

  /**
   * Runs a single tick. When another tick is in progress this one starts
   * after it has finished.
   */
  runTick(): Promise<TickReport> {
    const previous = this.currentTick;
    const next = previous
      ? previous.then(
          () => this.tick(),
          () => this.tick(),
        )
      : this.tick();
    this.currentTick = next;
    return next;
  }

  private async runLoop(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      const report = await this.runTick();
      await this.notify(report);
      if (signal.aborted) {
        break;
      }
      await waitOrAbort(this.options.intervalMs, signal);
    }
  }

  private async notify(report: TickReport): Promise<void> {
    if (!this.options.onTick) {
      return;
    }
    try {
      await this.options.onTick(report);
    } catch (error) {
      await this.logger.error(toAppError(error), `Tick ${report.tickNumber} callback failed`);
    }
  }

  private async tick(): Promise<TickReport> {
    const tickNumber = ++this.tickCount;
    const startTime = Date.now();
    const report: TickReport = {
      tickNumber,
      processed: 0,
      skipped: 0,
      unchanged: 0,
      committed: [],
      pushed: [],
      failures: [],
      startedAt: new Date(startTime).toISOString(),
      finishedAt: '',
    };

    await this.logger.log({
      ...eventMeta(this.options.runId),
      type: 'TickStarted',
      payload: { tickNumber, repositoryCount: this.repositories.length },
    });

    for (const entry of this.repositories) {
      report.processed++;
      if (entry.excludedFromChecks) {
        report.skipped++;
        continue;
      }
      await this.checkRepository(entry, report);
    }

    report.finishedAt = new Date().toISOString();
    await this.logger.log({
      ...eventMeta(this.options.runId),
      type: 'TickFinished',
      payload: {
        tickNumber,
        committed: report.committed.length,
        pushed: report.pushed.length,
        failed: report.failures.length,
        durationMs: Date.now() - startTime,
      },
    });

    return report;
  }

  private async checkRepository(entry: RepositoryEntry, report: TickReport): Promise<void> {
    const { runner, summarizer, runId } = this.options;
    const repoLogger = this.logger.child({ repo: entry.path });

    const fail = async (step: MonitorStep, error: AppError): Promise<void> => {
      report.failures.push({ path: entry.path, step, message: error.message });
      await repoLogger.warn(`${step} failed: ${error.message}`);
      await this.logger.log({
        ...eventMeta(runId),
        type: 'RepoFailed',
        payload: { path: entry.path, step, message: error.message },
      });
    };

    const status = await attempt(() => runner.hasChanges(entry.path));
    if (!status.ok) {
      return fail('status', status.error);
    }
    if (!status.value) {
      report.unchanged++;
      await repoLogger.debug('No pending changes');
      return;
    }

    const diff = await attempt(() => runner.diff(entry.path));
    if (!diff.ok) {
      return fail('diff', diff.error);
    }

    let message: string;
    try {
      message = (await summarizer.summarize(diff.value)).trim() || FALLBACK_COMMIT_MESSAGE;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      return fail('summarize', new SummarizerError(`Summarizer failed: ${reason}`, { cause: error }));
    }

    const commit = await attempt(() => runner.commit(entry.path, message));
    if (!commit.ok) {
      return fail('commit', commit.error);
    }
    report.committed.push(entry.path);
    await repoLogger.info(`Committed: ${message}`);
    await this.logger.log({
      ...eventMeta(runId),
      type: 'RepoCommitted',
      payload: { path: entry.path, message },
    });

    const push = await attempt(() => runner.push(entry.path, entry.alternativeRemote));
    if (!push.ok) {
      return fail('push', push.error);
    }
    report.pushed.push(entry.path);
    await repoLogger.info(
      entry.alternativeRemote ? `Pushed to ${entry.alternativeRemote}` : 'Pushed',
    );
    await this.logger.log({
      ...eventMeta(runId),
      type: 'RepoPushed',
      payload: { path: entry.path, remote: entry.alternativeRemote },
    });
  }
}
