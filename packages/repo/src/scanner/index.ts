import nodeFs from 'node:fs/promises';
import type { Dirent } from 'node:fs';
import path from 'node:path';
import { randomUUID } from 'node:crypto';
import {
  CacheError,
  Logger,
  ScanError,
  eventMeta,
  logger as defaultLogger,
} from '@repowarden/shared';
import type { CacheStore } from '../cache/types';
import type { RepositoryCommandRunner } from '../git/types';
import type { RepositoryEntry, ScanResult, ScanWarning, ScannerOptions } from './types';

export * from './types';

/** The slice of fs/promises the scanner needs */
export interface ScannerFs {
  readdir(path: string, options: { withFileTypes: true }): Promise<Dirent[]>;
}

export const REPOS_CACHE_KEY = 'repos';
export const REPOS_DELIMITER = ';';

/** True when `repoPath` would split or break the cached `repos` value */
function isUncacheablePath(repoPath: string): boolean {
  return repoPath.includes(REPOS_DELIMITER) || /[\r\n]/.test(repoPath);
}

export interface ScannerDependencies {
  cache: CacheStore;
  runner: RepositoryCommandRunner;
  fs?: ScannerFs;
  logger?: Logger;
  /** Correlates emitted events with the owning manager run */
  runId?: string;
}

interface ScanContext {
  repositories: RepositoryEntry[];
  warnings: ScanWarning[];
}

/**
 * Finds the Git repositories under a root directory.
 *
 * The first scan walks the tree and stores the repository paths in the cache
 * under `repos`; later scans rebuild the list from the cache without touching
 * the filesystem until {@link RepositoryScanner.invalidate} is called.
 *
 * Repositories sitting directly inside another repository are registered as
 * submodules of their parent and are not listed on their own.
 */
export class RepositoryScanner {
  private readonly rootDir: string;
  private readonly fs: ScannerFs;
  private readonly logger: Logger;
  private readonly runId: string;

  constructor(
    private readonly options: ScannerOptions,
    private readonly deps: ScannerDependencies,
  ) {
    this.rootDir = path.resolve(options.rootDir);
    this.fs = deps.fs ?? nodeFs;
    this.logger = deps.logger ?? defaultLogger;
    this.runId = deps.runId ?? randomUUID();
  }

  async scan(): Promise<ScanResult> {
    const startTime = Date.now();
    await this.logger.log({
      ...eventMeta(this.runId),
      type: 'ScanStarted',
      payload: { rootDir: this.rootDir },
    });

    const result = await this.scanOrLoad();

    await this.logger.log({
      ...eventMeta(this.runId),
      type: 'ScanFinished',
      payload: {
        rootDir: this.rootDir,
        repositoryCount: result.repositories.length,
        warningCount: result.warnings.length,
        fromCache: result.fromCache,
        durationMs: Date.now() - startTime,
      },
    });
    return result;
  }

  /** Forgets the cached list so the next scan walks the tree again. */
  async invalidate(): Promise<void> {
    await this.deps.cache.delete(REPOS_CACHE_KEY);
  }

  private async scanOrLoad(): Promise<ScanResult> {
    const cached = this.deps.cache.get(REPOS_CACHE_KEY);
    if (cached !== undefined) {
      const repositories: RepositoryEntry[] = [];
      const warnings: ScanWarning[] = [];
      for (const repoPath of cached.split(REPOS_DELIMITER)) {
        if (repoPath.length === 0) continue;
        if (!path.isAbsolute(repoPath)) {
          this.logger.warn(`Ignoring cached repository path ${repoPath}: not absolute`);
          warnings.push({ path: repoPath, operation: 'cache', message: 'Cached path is not absolute' });
          continue;
        }
        repositories.push(this.toEntry(repoPath));
      }
      this.logger.debug(`Loaded ${repositories.length} repositories from cache`);
      return { repositories: Object.freeze(repositories), warnings, fromCache: true };
    }

    const ctx: ScanContext = { repositories: [], warnings: [] };
    await this.visit(this.rootDir, ctx);

    try {
      await this.deps.cache.set(
        REPOS_CACHE_KEY,
        ctx.repositories.map((repo) => repo.path).join(REPOS_DELIMITER),
      );
    } catch (error) {
      const cacheError =
        error instanceof CacheError
          ? error
          : new CacheError('Failed to persist repository list', { cause: error });
      this.logger.error(cacheError, 'Repository list was not cached; the next run will rescan');
      ctx.warnings.push({ path: this.rootDir, operation: 'cache', message: cacheError.message });
    }

    return { repositories: Object.freeze(ctx.repositories), warnings: ctx.warnings, fromCache: false };
  }

  private async visit(dir: string, ctx: ScanContext): Promise<void> {
    if (this.isScanExcluded(dir)) {
      this.logger.debug(`Pruned ${dir}`);
      return;
    }

    if (await this.deps.runner.isRepository(dir)) {
      if (isUncacheablePath(dir)) {
        const message = `Path contains "${REPOS_DELIMITER}" or a line break`;
        this.logger.warn(`Skipping repository ${JSON.stringify(dir)}: ${message}`);
        ctx.warnings.push({ path: dir, operation: 'path', message });
        return;
      }
      ctx.repositories.push(this.toEntry(dir));
      await this.normalizeNested(dir, ctx);
      return;
    }

    for (const child of await this.childDirectories(dir, ctx)) {
      await this.visit(child, ctx);
    }
  }

  /** Turns every repository directly inside `parent` into a submodule of it. */
  private async normalizeNested(parent: string, ctx: ScanContext): Promise<void> {
    for (const child of await this.childDirectories(parent, ctx)) {
      if (this.isScanExcluded(child)) continue;
      if (!(await this.deps.runner.isRepository(child))) continue;

      const result = await this.deps.runner.addSubmodule(parent, child);
      if (result.ok) {
        this.logger.info(`Registered ${child} as a submodule of ${parent}`);
        await this.logger.log({
          ...eventMeta(this.runId),
          type: 'SubmoduleNormalized',
          payload: { parentPath: parent, childPath: child },
        });
      } else {
        this.logger
          .child({ repo: parent })
          .warn(`Could not add ${child} as a submodule: ${result.error.message}`);
        ctx.warnings.push({
          path: child,
          operation: 'addSubmodule',
          message: result.error.message,
        });
      }
    }
  }

  /** Real subdirectories in name order; symbolic links are not followed. */
  private async childDirectories(dir: string, ctx: ScanContext): Promise<string[]> {
    let entries: Dirent[];
    try {
      entries = await this.fs.readdir(dir, { withFileTypes: true });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      const scanError = new ScanError(dir, `Cannot read directory ${dir}: ${reason}`, {
        cause: error,
      });
      this.logger.warn(`${scanError.message}; skipping it`);
      ctx.warnings.push({ path: dir, operation: 'readdir', message: reason });
      return [];
    }

    return entries
      .filter((entry) => entry.isDirectory())
      .map((entry) => entry.name)
      .sort()
      .map((name) => path.join(dir, name));
  }

  private toEntry(repoPath: string): RepositoryEntry {
    const baseName = path.basename(repoPath);
    const alternativeRemote = this.options.remotes?.[repoPath] ?? this.options.remotes?.[baseName];
    return Object.freeze({
      path: repoPath,
      excludedFromChecks: this.options.checkExcludes.some((exclude) => baseName.includes(exclude)),
      ...(alternativeRemote ? { alternativeRemote } : {}),
    });
  }

  private isScanExcluded(dir: string): boolean {
    const baseName = path.basename(dir);
    return this.options.scanExcludes.some((exclude) => baseName.includes(exclude));
  }
}
