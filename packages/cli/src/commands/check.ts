import { Command } from 'commander';
import type { TickReport } from '@repowarden/core';
import { GlobalOptions, openManager } from '../context';
import { OutputRenderer } from '../output/renderer';
import type { CliState } from '../program';

export function exitCodeForReport(report: TickReport): number {
  return report.failures.length > 0 ? 1 : 0;
}

export function registerCheckCommand(program: Command, state: CliState) {
  program
    .command('check')
    .description('Scan, then commit and push pending changes once')
    .action(async () => {
      const globalOpts = program.opts<GlobalOptions>();
      const renderer = new OutputRenderer(Boolean(globalOpts.json));

      const manager = await openManager(globalOpts);
      const result = await manager.checkOnce();
      renderer.renderCheck(result);
      state.exitCode = exitCodeForReport(result.report);
    });
}
