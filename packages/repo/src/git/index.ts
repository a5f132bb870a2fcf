import { spawn, type ChildProcessWithoutNullStreams } from 'child_process';
import { stat } from 'fs/promises';
import path from 'path';
import { GitCommandError, Result, err, ok, redactString } from '@repowarden/shared';
import type { RepositoryCommandRunner } from './types';

export * from './types';

export interface GitServiceOptions {
  /** git executable, defaults to `git` on PATH */
  gitBinary?: string;
}

export class GitService implements RepositoryCommandRunner {
  private readonly gitBinary: string;

  constructor(options: GitServiceOptions = {}) {
    this.gitBinary = options.gitBinary ?? 'git';
  }

  private exec(cwd: string, args: string[]): Promise<Result<string, GitCommandError>> {
    const command = `git ${args.join(' ')}`;
    return new Promise((resolve) => {
      let child: ChildProcessWithoutNullStreams;
      try {
        child = spawn(this.gitBinary, args, { cwd });
      } catch (error) {
        // spawn validates its arguments synchronously, e.g. rejecting NUL bytes.
        const reason = error instanceof Error ? error.message : String(error);
        resolve(
          err(
            new GitCommandError(command, `Failed to start git process: ${reason}`, {
              cause: error,
              details: { cwd },
            }),
          ),
        );
        return;
      }
      let stdout = '';
      let stderr = '';

      child.stdout.on('data', (data) => {
        stdout += data.toString();
      });

      child.stderr.on('data', (data) => {
        stderr += data.toString();
      });

      child.on('close', (code) => {
        if (code === 0) {
          resolve(ok(stdout.trim()));
          return;
        }
        const cleanStderr = redactString(stderr.trim()).redacted;
        resolve(
          err(
            new GitCommandError(
              command,
              `Git command failed in ${cwd}: ${command}${cleanStderr ? `\n${cleanStderr}` : ''}`,
              { exitCode: code, stderr: cleanStderr, details: { cwd } },
            ),
          ),
        );
      });

      child.on('error', (error) => {
        resolve(
          err(
            new GitCommandError(command, `Failed to start git process: ${error.message}`, {
              cause: error,
              details: { cwd },
            }),
          ),
        );
      });
    });
  }

  async isRepository(repoPath: string): Promise<boolean> {
    try {
      const stats = await stat(path.join(repoPath, '.git'));
      return stats.isDirectory();
    } catch {
      // Missing or unreadable metadata means this is not a repository root.
      return false;
    }
  }

  async hasChanges(repoPath: string): Promise<Result<boolean>> {
    const status = await this.exec(repoPath, ['status', '--porcelain']);
    if (!status.ok) return status;
    return ok(status.value.length > 0);
  }

  async diff(repoPath: string): Promise<Result<string>> {
    // Staging first lets untracked files show up in the diff; the index stays updated.
    const staged = await this.exec(repoPath, ['add', '-A']);
    if (!staged.ok) return staged;
    return this.exec(repoPath, ['diff', '--cached']);
  }

  async commit(repoPath: string, message: string): Promise<Result<void>> {
    const staged = await this.exec(repoPath, ['add', '-A']);
    if (!staged.ok) return staged;

    const committed = await this.exec(repoPath, ['commit', '-m', message]);
    if (!committed.ok) return committed;
    return ok();
  }

  async push(repoPath: string, remote?: string): Promise<Result<void>> {
    const pushed = await this.exec(repoPath, remote ? ['push', remote] : ['push']);
    if (!pushed.ok) return pushed;
    return ok();
  }

  async addSubmodule(parentPath: string, childPath: string): Promise<Result<void>> {
    const relativePath = path.relative(parentPath, childPath).split(path.sep).join('/');

    // Prefer the child's own origin so the submodule stays clonable elsewhere.
    const origin = await this.exec(childPath, ['remote', 'get-url', 'origin']);
    const url = origin.ok && origin.value ? origin.value : `./${relativePath}`;

    const added = await this.exec(parentPath, ['submodule', 'add', '--', url, relativePath]);
    if (!added.ok) return added;
    return ok();
  }
}
