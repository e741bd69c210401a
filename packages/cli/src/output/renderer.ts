import picocolors from 'picocolors';
import { AppError, describeError, formatLocalTimestamp } from '@sstable-age/shared';
import type { ScanReport, ScanStats } from '@sstable-age/scanner';
import { printTable } from './table';

type Colors = ReturnType<typeof picocolors.createColors>;

export interface JsonScanReport {
  root: string;
  targetFileName: string;
  excludedNamespaces: string[];
  oldest: {
    path: string;
    mtimeMs: number;
    modifiedAt: string;
    modifiedAtIso: string;
  } | null;
  stats: ScanStats;
}

export function toJsonReport(report: ScanReport): JsonScanReport {
  const { oldest } = report;
  return {
    root: report.root,
    targetFileName: report.targetFileName,
    excludedNamespaces: report.excludedNamespaces,
    oldest: oldest
      ? {
          path: oldest.path,
          mtimeMs: oldest.mtimeMs,
          modifiedAt: formatLocalTimestamp(oldest.mtimeMs),
          modifiedAtIso: new Date(oldest.mtimeMs).toISOString(),
        }
      : null,
    stats: report.stats,
  };
}

export function noneFoundMessage(report: ScanReport): string {
  const exclusions =
    report.excludedNamespaces.length > 0
      ? ` (excluding ${report.excludedNamespaces.join(', ')})`
      : '';
  return `No '${report.targetFileName}' files were found under '${report.root}'${exclusions}.`;
}

export class OutputRenderer {
  constructor(
    private isJson: boolean,
    private pc: Colors = picocolors,
  ) {}

  renderReport(report: ScanReport): void {
    if (this.isJson) {
      console.log(JSON.stringify(toJsonReport(report), null, 2));
      return;
    }

    if (!report.oldest) {
      console.log(this.pc.yellow(noneFoundMessage(report)));
      return;
    }

    console.log(this.pc.bold(`--- Oldest ${report.targetFileName} Found Across All Namespaces ---`));
    console.log(`Path: ${report.oldest.path}`);
    console.log(`Modification Time: ${formatLocalTimestamp(report.oldest.mtimeMs)}`);
  }

  renderStats(stats: ScanStats): void {
    if (this.isJson) return;

    console.log(this.pc.bold('\nScan statistics:'));
    printTable(
      [
        { metric: 'Namespaces scanned', count: stats.namespaces },
        { metric: 'Namespaces excluded', count: stats.excludedNamespaces },
        { metric: 'Tables walked', count: stats.tables },
        { metric: 'Directories listed', count: stats.directories },
        { metric: 'Data files compared', count: stats.candidates },
        { metric: 'Data files skipped', count: stats.skippedFiles },
      ],
      { head: ['Metric', 'Count'] },
    );
  }

  log(message: string): void {
    if (this.isJson) {
      // JSON mode should not have logs
    } else {
      console.log(this.pc.gray(message));
    }
  }

  /**
   * Reports a terminal error. JSON mode writes a single `{ error }` object to stdout.
   */
  renderError(error: unknown, options: { verbose?: boolean } = {}): void {
    const message = describeError(error);
    const cause = error instanceof AppError && error.cause !== undefined ? error.cause : undefined;
    const details = error instanceof AppError ? error.details : undefined;

    if (this.isJson) {
      console.log(
        JSON.stringify({
          error: {
            code: error instanceof AppError ? error.code : 'UnknownError',
            message,
            details,
            cause: cause === undefined ? undefined : describeError(cause),
          },
        }),
      );
      return;
    }

    console.error(this.pc.red(`❌ Error: ${message}`));
    if (cause !== undefined) {
      console.error(`  Cause: ${describeError(cause)}`);
    }
    if (details) {
      console.error(
        `  Details: ${typeof details === 'string' ? details : JSON.stringify(details, null, 2)}`,
      );
    }
    if (options.verbose && error instanceof Error && error.stack) {
      console.error(`\nStack Trace:\n${error.stack}`);
    } else {
      console.error(`\nFor more details, run with the --verbose flag.`);
    }
  }
}
