import { Command, CommanderError } from 'commander';
import { version } from '../package.json';
import { AppError, exitCodeFor } from '@repowarden/shared';
import { registerStartCommand } from './commands/start';
import { registerScanCommand } from './commands/scan';
import { registerCheckCommand } from './commands/check';
import { registerCacheCommand } from './commands/cache';

export const name = '@repowarden/cli';

/** Mutable outcome of a command that finished without throwing */
export interface CliState {
  exitCode: number;
}

export function createProgram(state: CliState = { exitCode: 0 }): Command {
  const program = new Command();

  program
    .name('repowarden')
    .description('Keeps every Git repository under a directory committed and pushed')
    .version(version)
    .option('--config <path>', 'Path to configuration file')
    .option('--root <dir>', 'Directory to scan for repositories')
    .option('--interval <ms>', 'Milliseconds between checks', (value) => Number(value))
    .option('--no-cache', 'Keep the repository list in memory only')
    .option('--json', 'Output results as JSON')
    .option('--verbose', 'Enable verbose logging')
    // Usage errors are thrown instead of exiting so they share the exit codes below
    .exitOverride();

  registerStartCommand(program);
  registerScanCommand(program);
  registerCheckCommand(program, state);
  registerCacheCommand(program);

  return program;
}

/**
 * Prints an error the way the user asked for it and returns the exit code.
 */
export function renderError(e: unknown, opts: { json?: boolean; verbose?: boolean }): number {
  if (e instanceof CommanderError) {
    // Commander has already printed the message, or the help/version text
    return e.exitCode === 0 ? 0 : 2;
  }

  if (opts.json) {
    if (e instanceof AppError) {
      console.log(
        JSON.stringify({
          error: {
            code: e.code,
            message: e.message,
            details: e.details,
          },
        }),
      );
    } else {
      console.log(
        JSON.stringify({
          error: {
            code: 'UnknownError',
            message: e instanceof Error ? e.message : String(e),
          },
        }),
      );
    }
  } else {
    // Human-readable output
    const code = e instanceof AppError ? ` [${e.code}]` : '';
    console.error(`❌ Error${code}: ${(e instanceof Error && e.message) || String(e)}`);
    if (e instanceof AppError && e.details) {
      console.error(
        `  Details: ${typeof e.details === 'string' ? e.details : JSON.stringify(e.details, null, 2)}`,
      );
    }
    if (opts.verbose && e instanceof Error && e.stack) {
      console.error(`\nStack Trace:\n${e.stack}`);
    } else {
      console.error(`\nFor more details, run with the --verbose flag.`);
    }
  }

  return exitCodeFor(e);
}

export async function run(argv: string[]): Promise<number> {
  const state: CliState = { exitCode: 0 };
  const program = createProgram(state);
  try {
    await program.parseAsync(argv);
    return state.exitCode;
  } catch (e) {
    return renderError(e, program.opts());
  }
}
