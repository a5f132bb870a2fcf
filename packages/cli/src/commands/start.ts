import { Command } from 'commander';
import { GlobalOptions, openManager } from '../context';
import { OutputRenderer } from '../output/renderer';

/** Resolves with the first SIGINT or SIGTERM received. */
export function waitForShutdown(): Promise<NodeJS.Signals> {
  return new Promise((resolve) => {
    const onSignal = (signal: NodeJS.Signals) => {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
      resolve(signal);
    };
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
  });
}

export function registerStartCommand(program: Command) {
  program
    .command('start')
    .description('Watch the repositories until interrupted')
    .action(async () => {
      const globalOpts = program.opts<GlobalOptions>();
      const renderer = new OutputRenderer(Boolean(globalOpts.json));

      const manager = await openManager(globalOpts, {
        onTick: (report) => renderer.renderTick(report),
      });
      const shutdown = waitForShutdown();
      const result = await manager.start();
      renderer.renderScan(result);

      const signal = await shutdown;
      renderer.log(`Received ${signal}; finishing the current check before exiting.`);
      await manager.stop();
    });
}
