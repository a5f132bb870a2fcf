import { randomUUID } from 'crypto';
import {
  ConsoleLogger,
  JsonlLogger,
  Logger,
  ManagerConfig,
  TeeLogger,
  UsageError,
  ensureParentDir,
} from '@repowarden/shared';
import {
  CacheStore,
  FileCacheStore,
  GitService,
  RepositoryCommandRunner,
  RepositoryScanner,
  ScanResult,
} from '@repowarden/repo';
import { Summarizer, createSummarizer } from './summarize';
import { ChangeMonitor, TickCallback, TickReport } from './monitor';

export interface ManagerDependencies {
  cache?: CacheStore;
  runner?: RepositoryCommandRunner;
  summarizer?: Summarizer;
  logger?: Logger;
  runId?: string;
  onTick?: TickCallback;
}

interface ResolvedDependencies {
  cache: CacheStore;
  runner: RepositoryCommandRunner;
  summarizer: Summarizer;
  logger: Logger;
  runId: string;
  onTick?: TickCallback;
}

export interface CheckResult {
  scan: ScanResult;
  report: TickReport;
}

/**
 * Wires the scanner and the change monitor together for one root directory.
 *
 * `start()` scans once and hands the resulting list to a monitor that keeps
 * it until the manager is stopped; a rescan needs a new manager.
 */
export class WatchdogManager {
  readonly scanner: RepositoryScanner;
  private monitor?: ChangeMonitor;
  private started = false;
  private stopRequested = false;
  private starting?: Promise<ScanResult>;

  constructor(
    private readonly config: ManagerConfig,
    private readonly deps: ResolvedDependencies,
  ) {
    this.scanner = new RepositoryScanner(
      {
        rootDir: config.rootDir,
        scanExcludes: config.scanExcludes,
        checkExcludes: config.checkExcludes,
        remotes: config.remotes,
      },
      { cache: deps.cache, runner: deps.runner, logger: deps.logger, runId: deps.runId },
    );
  }

  /**
   * Builds a manager from validated config. Opens the cache file unless a
   * cache is supplied; a cache that cannot be read fails construction.
   */
  static async create(
    config: ManagerConfig,
    deps: ManagerDependencies = {},
  ): Promise<WatchdogManager> {
    const runId = deps.runId ?? randomUUID();
    let logger = deps.logger ?? new ConsoleLogger();
    if (config.eventLog) {
      await ensureParentDir(config.eventLog);
      logger = new TeeLogger(logger, [new JsonlLogger(config.eventLog, { runId })]);
    }

    const cache = deps.cache ?? (await FileCacheStore.open(config.cacheFile));
    const runner = deps.runner ?? new GitService();
    const summarizer = deps.summarizer ?? createSummarizer(config.summarizer, logger);

    return new WatchdogManager(config, {
      cache,
      runner,
      summarizer,
      logger,
      runId,
      onTick: deps.onTick,
    });
  }

  get cache(): CacheStore {
    return this.deps.cache;
  }

  get runId(): string {
    return this.deps.runId;
  }

  /**
   * Scans once and starts monitoring the result. When `stop()` is called
   * during the scan, the monitor is never started.
   * @throws UsageError when called a second time
   */
  async start(): Promise<ScanResult> {
    if (this.started) {
      throw new UsageError('Watchdog manager has already been started');
    }
    this.started = true;
    this.starting = this.scanAndMonitor();
    return this.starting;
  }

  /** Stops the monitor, waiting for a start in progress to settle first. */
  async stop(): Promise<void> {
    this.stopRequested = true;
    if (this.starting) {
      // A failed start is reported to the caller of start().
      await Promise.allSettled([this.starting]);
    }
    await this.monitor?.stop();
  }

  /** Scans without monitoring; `refresh` drops the cached list first. */
  async scan(options: { refresh?: boolean } = {}): Promise<ScanResult> {
    if (options.refresh) {
      await this.scanner.invalidate();
    }
    return this.scanner.scan();
  }

  /** Scans, then runs exactly one tick over the result. */
  async checkOnce(): Promise<CheckResult> {
    const scan = await this.scanner.scan();
    const report = await this.createMonitor(scan).runTick();
    return { scan, report };
  }

  private async scanAndMonitor(): Promise<ScanResult> {
    const result = await this.scanner.scan();
    if (this.stopRequested) {
      await this.deps.logger.info('Stopped before monitoring started');
      return result;
    }
    this.monitor = this.createMonitor(result);
    this.monitor.start();
    await this.deps.logger.info(
      `Watching ${result.repositories.length} repositories every ${this.config.checkIntervalMs}ms`,
    );
    return result;
  }

  private createMonitor(result: ScanResult): ChangeMonitor {
    return new ChangeMonitor(result.repositories, {
      runner: this.deps.runner,
      summarizer: this.deps.summarizer,
      intervalMs: this.config.checkIntervalMs,
      logger: this.deps.logger,
      runId: this.deps.runId,
      onTick: this.deps.onTick,
    });
  }
}
