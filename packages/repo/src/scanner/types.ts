/**
 * A repository discovered by the scanner. Entries are created only by a scan
 * and never mutated afterwards.
 */
export interface RepositoryEntry {
  /** Absolute path, unique within a run */
  readonly path: string;
  /** Tracked, but the monitor never acts on it */
  readonly excludedFromChecks: boolean;
  /** Remote to push to instead of the repository default */
  readonly alternativeRemote?: string;
}

export interface ScannerOptions {
  rootDir: string;
  /** Directories whose base name contains any of these are pruned */
  scanExcludes: readonly string[];
  /** Repositories whose base name contains any of these are excluded from checks */
  checkExcludes: readonly string[];
  /** Push remote keyed by absolute path or base name; a path key wins */
  remotes?: Readonly<Record<string, string>>;
}

/** `path` marks a repository whose path cannot be stored in the cache */
export type ScanOperation = 'readdir' | 'addSubmodule' | 'path' | 'cache';

/** A non-fatal problem met during a scan */
export interface ScanWarning {
  path: string;
  operation: ScanOperation;
  message: string;
}

export interface ScanResult {
  repositories: readonly RepositoryEntry[];
  warnings: ScanWarning[];
  fromCache: boolean;
}
