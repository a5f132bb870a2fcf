import pc from 'picocolors';
import type { ScanResult } from '@repowarden/repo';
import type { CheckResult, TickReport } from '@repowarden/core';

function plural(count: number, singular: string, pluralForm = `${singular}s`): string {
  return `${count} ${count === 1 ? singular : pluralForm}`;
}

export class OutputRenderer {
  constructor(private isJson: boolean) {}

  renderScan(result: ScanResult): void {
    if (this.isJson) {
      console.log(JSON.stringify(result, null, 2));
      return;
    }

    const source = result.fromCache ? pc.gray(' (from cache)') : '';
    console.log(pc.bold(`Found ${plural(result.repositories.length, 'repository', 'repositories')}`) + source);
    for (const repo of result.repositories) {
      const tags: string[] = [];
      if (repo.excludedFromChecks) tags.push('excluded from checks');
      if (repo.alternativeRemote) tags.push(`pushes to ${repo.alternativeRemote}`);
      const suffix = tags.length > 0 ? pc.gray(` (${tags.join(', ')})`) : '';
      console.log(`  - ${repo.path}${suffix}`);
    }

    if (result.warnings.length > 0) {
      console.log(pc.bold('\nWarnings:'));
      for (const warning of result.warnings) {
        console.log(pc.yellow(`  ! ${warning.operation} ${warning.path}: ${warning.message}`));
      }
    }
  }

  renderTick(report: TickReport): void {
    if (this.isJson) {
      // One line per tick so `start --json` output can be streamed
      console.log(JSON.stringify(report));
      return;
    }

    const summary =
      `Tick ${report.tickNumber}: ${report.committed.length} committed, ` +
      `${report.pushed.length} pushed, ${report.failures.length} failed ` +
      `(${report.unchanged} unchanged, ${report.skipped} skipped)`;
    console.log(report.failures.length > 0 ? pc.red(summary) : pc.green(summary));
    for (const failure of report.failures) {
      console.log(`  ${pc.red('✖')} ${failure.path} [${failure.step}] ${failure.message}`);
    }
  }

  renderCheck(result: CheckResult): void {
    if (this.isJson) {
      console.log(JSON.stringify(result, null, 2));
      return;
    }
    this.renderScan(result.scan);
    console.log('');
    this.renderTick(result.report);
  }

  renderCache(entries: ReadonlyMap<string, string>, cacheFile: string): void {
    if (this.isJson) {
      console.log(JSON.stringify({ cacheFile, entries: Object.fromEntries(entries) }, null, 2));
      return;
    }

    console.log(pc.bold(`Cache file: ${cacheFile}`));
    if (entries.size === 0) {
      console.log(pc.gray('  (empty)'));
      return;
    }
    for (const [key, value] of entries) {
      console.log(`  ${key}=${value}`);
    }
  }

  renderCacheCleared(count: number, cacheFile: string): void {
    if (this.isJson) {
      console.log(JSON.stringify({ cacheFile, cleared: count }));
      return;
    }
    console.log(pc.green(`Cleared ${plural(count, 'entry', 'entries')} from ${cacheFile}`));
  }

  log(message: string): void {
    if (this.isJson) {
      // JSON mode should not have logs
    } else {
      console.log(pc.gray(message));
    }
  }}
