import { Command, CommanderError } from 'commander';
import { version } from '../package.json';
import { registerOldestCommand } from './commands/oldest';
import { OutputRenderer } from './output';
import type { CliDeps, GlobalOptions } from './types';

import { ConfigError, UsageError } from '@sstable-age/shared';

export function createProgram(deps: CliDeps = {}): Command {
  const program = new Command();

  program
    .name('sstable-age')
    .description('Find the oldest SSTable data file across all namespaces (read-only)')
    .version(version)
    .option('--json', 'Output results as JSON')
    .option('--verbose', 'Enable verbose logging')
    .configureOutput({
      // In JSON mode usage errors are rendered as a JSON error document instead.
      outputError: (str, write) => {
        if (!program.opts<GlobalOptions>().json) write(str);
      },
    })
    .exitOverride();

  registerOldestCommand(program, deps);

  return program;
}

/**
 * User-correctable errors exit with 2, everything else with 1.
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof ConfigError || error instanceof UsageError) {
    return 2;
  }
  return 1;
}

/**
 * Parses `argv`, runs the selected command and returns the process exit code.
 */
export async function run(argv: string[], deps: CliDeps = {}): Promise<number> {
  const program = createProgram(deps);

  try {
    await program.parseAsync(argv);
    return 0;
  } catch (e) {
    const opts = program.opts<GlobalOptions>();

    if (e instanceof CommanderError) {
      if (e.exitCode === 0) return 0;
      if (opts.json) {
        new OutputRenderer(true).renderError(new UsageError(e.message));
      }
      return 2;
    }

    new OutputRenderer(!!opts.json).renderError(e, { verbose: opts.verbose });
    return exitCodeFor(e);
  }
}
