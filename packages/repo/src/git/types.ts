import type { Result } from '@repowarden/shared';

/**
 * Version-control operations the scanner and monitor depend on.
 * Every operation runs against the given working directory and reports
 * failure through its result; none of them throw. "No changes" is a
 * normal result, not a failure.
 */
export interface RepositoryCommandRunner {
  /** True when `path` holds a `.git` directory */
  isRepository(path: string): Promise<boolean>;
  hasChanges(path: string): Promise<Result<boolean>>;
  /**
   * Diff of every pending change, untracked files included. Stages the whole
   * working tree to produce it, so the changes stay staged even when no
   * commit follows.
   */
  diff(path: string): Promise<Result<string>>;
  /** Stages everything and commits it with `message` */
  commit(path: string, message: string): Promise<Result<void>>;
  /** Pushes to `remote`, or to the configured upstream when omitted */
  push(path: string, remote?: string): Promise<Result<void>>;
  /** Registers the existing repository at `childPath` as a submodule of `parentPath` */
  addSubmodule(parentPath: string, childPath: string): Promise<Result<void>>;
}
