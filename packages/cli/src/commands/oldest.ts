import { Command } from 'commander';
import { ConsoleLogger, UsageError } from '@sstable-age/shared';
import type { LogLevel, ScanConfigInput } from '@sstable-age/shared';
import { ConfigLoader, OldestFileScanner, parseList } from '@sstable-age/scanner';
import { OutputRenderer } from '../output';
import type { CliDeps, GlobalOptions } from '../types';

interface OldestCommandOptions {
  exclude?: string[];
  includeSystem?: boolean;
  target?: string;
}

function logLevelFor(globalOpts: GlobalOptions): LogLevel {
  if (globalOpts.json) return 'silent';
  return globalOpts.verbose ? 'debug' : 'warn';
}

export function registerOldestCommand(program: Command, deps: CliDeps = {}) {
  program
    .command('oldest', { isDefault: true })
    .description('Find the data file with the oldest modification time')
    .argument('[root]', 'Data directory to scan (default: $SSTABLE_AGE_ROOT or /mnt/cassandra)')
    .option(
      '--exclude <names>',
      'Comma-separated namespaces to skip, replacing the reserved defaults',
      parseList,
    )
    .option('--include-system', 'Scan every namespace, including the reserved ones')
    .option('--target <name>', 'Data file name to look for (default: Data.db)')
    .action(async (root: string | undefined, options: OldestCommandOptions) => {
      const globalOpts = program.opts<GlobalOptions>();

      if (options.exclude && options.includeSystem) {
        throw new UsageError('--exclude and --include-system cannot be used together.');
      }

      const flags: ScanConfigInput = {
        root,
        targetFileName: options.target,
        excludedNamespaces: options.includeSystem ? [] : options.exclude,
      };
      const config = ConfigLoader.load({ flags, env: deps.env });

      const renderer = new OutputRenderer(!!globalOpts.json);
      const logger = new ConsoleLogger({ level: logLevelFor(globalOpts) });
      const scanner = deps.scanner ?? new OldestFileScanner();

      renderer.log(`Scanning for the oldest ${config.targetFileName} file under: ${config.root}\n`);

      const controller = new AbortController();
      const onSigint = () => controller.abort();
      process.once('SIGINT', onSigint);
      try {
        const report = await scanner.scan(config.root, {
          excludedNamespaces: config.excludedNamespaces,
          targetFileName: config.targetFileName,
          signal: controller.signal,
          logger,
        });

        renderer.renderReport(report);
        if (globalOpts.verbose) {
          renderer.renderStats(report.stats);
        }
      } finally {
        process.off('SIGINT', onSigint);
      }
    });
}
