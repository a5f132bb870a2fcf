import { Command } from 'commander';
import { GlobalOptions, openManager } from '../context';
import { OutputRenderer } from '../output/renderer';

export function registerScanCommand(program: Command) {
  program
    .command('scan')
    .description('List the repositories under the root directory')
    .option('--refresh', 'Ignore the cached list and walk the directory tree again')
    .action(async (options: { refresh?: boolean }) => {
      const globalOpts = program.opts<GlobalOptions>();
      const renderer = new OutputRenderer(Boolean(globalOpts.json));

      const manager = await openManager(globalOpts);
      const result = await manager.scan({ refresh: options.refresh });
      renderer.renderScan(result);
    });
}
