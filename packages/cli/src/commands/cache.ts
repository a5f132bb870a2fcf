import { Command } from 'commander';
import { GlobalOptions, openCacheFile } from '../context';
import { OutputRenderer } from '../output/renderer';

export function registerCacheCommand(program: Command) {
  const cacheCommand = program.command('cache').description('Inspect or reset the repository cache');

  cacheCommand
    .command('show')
    .description('Print every cache entry')
    .action(async () => {
      const globalOpts = program.opts<GlobalOptions>();
      const renderer = new OutputRenderer(Boolean(globalOpts.json));

      const store = await openCacheFile(globalOpts);
      renderer.renderCache(store.entries(), store.filePath);
    });

  cacheCommand
    .command('clear')
    .description('Delete every cache entry so the next scan walks the tree')
    .action(async () => {
      const globalOpts = program.opts<GlobalOptions>();
      const renderer = new OutputRenderer(Boolean(globalOpts.json));

      const store = await openCacheFile(globalOpts);
      const count = store.entries().size;
      await store.clear();
      renderer.renderCacheCleared(count, store.filePath);
    });
}
