import { GitCommandError, Result, err, ok } from '@repowarden/shared';
import type { RepositoryCommandRunner } from './types';

export type FakeOperation =
  | 'isRepository'
  | 'hasChanges'
  | 'diff'
  | 'commit'
  | 'push'
  | 'addSubmodule';

export interface FakeRepository {
  dirty?: boolean;
  diff?: string;
  /** Operations that return a failure result for this repository */
  failOn?: FakeOperation[];
}

export interface FakeCall {
  operation: FakeOperation;
  path: string;
  args: string[];
}

/**
 * In-memory RepositoryCommandRunner that records every call.
 * Repositories are keyed by absolute path; unknown paths are clean.
 */
export class FakeCommandRunner implements RepositoryCommandRunner {
  readonly calls: FakeCall[] = [];
  private readonly repos: Map<string, FakeRepository>;

  constructor(
    repos: Record<string, FakeRepository> = {},
    private readonly detectRepository?: (path: string) => Promise<boolean>,
  ) {
    this.repos = new Map(Object.entries(repos));
  }

  callsFor(operation: FakeOperation): FakeCall[] {
    return this.calls.filter((call) => call.operation === operation);
  }

  async isRepository(path: string): Promise<boolean> {
    this.record('isRepository', path);
    return this.detectRepository ? this.detectRepository(path) : this.repos.has(path);
  }

  async hasChanges(path: string): Promise<Result<boolean>> {
    const failure = this.record('hasChanges', path);
    if (failure) return failure;
    return ok(this.repos.get(path)?.dirty ?? false);
  }

  async diff(path: string): Promise<Result<string>> {
    const failure = this.record('diff', path);
    if (failure) return failure;
    return ok(this.repos.get(path)?.diff ?? '');
  }

  async commit(path: string, message: string): Promise<Result<void>> {
    const failure = this.record('commit', path, [message]);
    if (failure) return failure;
    const repo = this.repos.get(path);
    if (repo) repo.dirty = false;
    return ok();
  }

  async push(path: string, remote?: string): Promise<Result<void>> {
    const failure = this.record('push', path, remote ? [remote] : []);
    if (failure) return failure;
    return ok();
  }

  async addSubmodule(parentPath: string, childPath: string): Promise<Result<void>> {
    const failure = this.record('addSubmodule', parentPath, [childPath]);
    if (failure) return failure;
    return ok();
  }

  private record(operation: FakeOperation, path: string, args: string[] = []) {
    this.calls.push({ operation, path, args });
    if (!this.repos.get(path)?.failOn?.includes(operation)) return undefined;
    return err(new GitCommandError(`git ${operation}`, `simulated ${operation} failure in ${path}`));
  }
}
