import nodeFs from 'node:fs/promises';
import type { Dirent, Stats } from 'node:fs';
import path from 'node:path';
import {
  AppError,
  ConfigError,
  PermissionError,
  ScanAbortedError,
  UnexpectedScanError,
  DEFAULT_EXCLUDED_NAMESPACES,
  DEFAULT_TARGET_FILE_NAME,
  describeError,
  getErrorCode,
} from '@sstable-age/shared';
import type { Logger } from '@sstable-age/shared';
import type { CandidateFile, ScanOptions, ScanReport, ScanStats, ScannerFs } from './types';
import {
  MISSING_PATH_ERROR_CODES,
  PERMISSION_ERROR_CODES,
  emptyStats,
  pickOlder,
  sortEntries,
} from './utils';

export * from './types';
export { pickOlder } from './utils';

interface ScanState {
  targetFileName: string;
  signal?: AbortSignal;
  logger?: Logger;
  stats: ScanStats;
  oldest: CandidateFile | undefined;
}

/**
 * Finds the data file with the oldest modification time under a
 * `root/<namespace>/<table>/**` layout.
 *
 * The walk is depth-first and strictly sequential. A target file that cannot
 * be stat'ed (typically removed by compaction after it was listed) is skipped.
 * A directory that cannot be listed aborts the scan, since the answer would
 * otherwise be silently incomplete.
 */
export class OldestFileScanner {
  private fs: ScannerFs;

  constructor(fs: ScannerFs = nodeFs) {
    this.fs = fs;
  }

  async findOldest(
    root: string,
    excluded: Iterable<string>,
    options: Omit<ScanOptions, 'excludedNamespaces'> = {},
  ): Promise<CandidateFile | undefined> {
    const report = await this.scan(root, { ...options, excludedNamespaces: excluded });
    return report.oldest;
  }

  async scan(root: string, options: ScanOptions = {}): Promise<ScanReport> {
    const absRoot = path.resolve(root);
    const excluded = new Set(options.excludedNamespaces ?? DEFAULT_EXCLUDED_NAMESPACES);
    const state: ScanState = {
      targetFileName: options.targetFileName ?? DEFAULT_TARGET_FILE_NAME,
      signal: options.signal,
      logger: options.logger,
      stats: emptyStats(),
      oldest: undefined,
    };

    await this.assertRoot(absRoot, state);

    try {
      await this.scanRoot(absRoot, excluded, state);
    } catch (error) {
      if (error instanceof AppError) throw error;
      throw new UnexpectedScanError(
        `Unexpected error while scanning '${absRoot}': ${describeError(error)}`,
        { cause: error },
      );
    }

    return {
      root: absRoot,
      targetFileName: state.targetFileName,
      excludedNamespaces: [...excluded],
      oldest: state.oldest,
      stats: state.stats,
    };
  }

  private async assertRoot(root: string, state: ScanState): Promise<void> {
    this.checkAborted(state);

    let stats: Stats;
    try {
      stats = await this.fs.stat(root);
    } catch (error) {
      const code = getErrorCode(error);
      if (code !== undefined && MISSING_PATH_ERROR_CODES.has(code)) {
        throw new ConfigError(`Data directory not found at '${root}'`, {
          cause: error,
          details: 'Please ensure you are running this on the correct server.',
        });
      }
      if (code !== undefined && PERMISSION_ERROR_CODES.has(code)) {
        throw new PermissionError(root, `Permission denied: could not access '${root}'`, {
          cause: error,
        });
      }
      throw new UnexpectedScanError(`Could not access '${root}': ${describeError(error)}`, {
        cause: error,
      });
    }

    if (!stats.isDirectory()) {
      throw new ConfigError(`Data directory '${root}' is not a directory`);
    }
  }

  private async scanRoot(root: string, excluded: Set<string>, state: ScanState): Promise<void> {
    for (const entry of await this.listDirectory(root, state)) {
      if (!(await this.resolvesToDirectory(root, entry, state))) continue;

      if (excluded.has(entry.name)) {
        state.stats.excludedNamespaces++;
        state.logger?.debug(`Skipping excluded namespace '${entry.name}'`);
        continue;
      }

      state.stats.namespaces++;
      await this.scanNamespace(path.join(root, entry.name), state);
    }
  }

  private async scanNamespace(namespaceDir: string, state: ScanState): Promise<void> {
    for (const entry of await this.listDirectory(namespaceDir, state)) {
      if (!(await this.resolvesToDirectory(namespaceDir, entry, state))) continue;

      state.stats.tables++;
      await this.walkTable(path.join(namespaceDir, entry.name), state);
    }
  }

  // Namespaces and tables may be symlinks to another volume; a link that
  // cannot be resolved is not a directory.
  private async resolvesToDirectory(
    parent: string,
    entry: Dirent,
    state: ScanState,
  ): Promise<boolean> {
    if (entry.isDirectory()) return true;
    if (!entry.isSymbolicLink()) return false;

    const linkPath = path.join(parent, entry.name);
    try {
      return (await this.fs.stat(linkPath)).isDirectory();
    } catch (error) {
      state.logger?.debug(`Skipping unresolvable link '${linkPath}': ${describeError(error)}`);
      return false;
    }
  }

  // Files of a directory are visited before its subdirectories. Symlinked
  // subdirectories inside a table are not descended.
  private async walkTable(dir: string, state: ScanState): Promise<void> {
    const subdirs: string[] = [];

    for (const entry of await this.listDirectory(dir, state)) {
      const entryPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        subdirs.push(entryPath);
      } else if (
        entry.name === state.targetFileName &&
        (entry.isFile() || entry.isSymbolicLink())
      ) {
        await this.visitTargetFile(entryPath, state);
      }
    }

    for (const subdir of subdirs) {
      await this.walkTable(subdir, state);
    }
  }

  private async visitTargetFile(filePath: string, state: ScanState): Promise<void> {
    this.checkAborted(state);

    let stats: Stats;
    try {
      stats = await this.fs.stat(filePath);
    } catch (error) {
      state.stats.skippedFiles++;
      state.logger?.debug(`Skipping '${filePath}': ${describeError(error)}`);
      return;
    }

    // A link to a directory is not a data file.
    if (stats.isDirectory()) return;

    state.stats.candidates++;
    state.oldest = pickOlder(state.oldest, { path: filePath, mtimeMs: stats.mtimeMs });
  }

  private async listDirectory(dir: string, state: ScanState): Promise<Dirent[]> {
    this.checkAborted(state);

    let entries: Dirent[];
    try {
      entries = await this.fs.readdir(dir, { withFileTypes: true });
    } catch (error) {
      const code = getErrorCode(error);
      if (code !== undefined && PERMISSION_ERROR_CODES.has(code)) {
        throw new PermissionError(
          dir,
          `Permission denied: could not list directory '${dir}'. Please run with appropriate permissions.`,
          { cause: error },
        );
      }
      throw new UnexpectedScanError(`Could not list directory '${dir}': ${describeError(error)}`, {
        cause: error,
      });
    }

    state.stats.directories++;
    return sortEntries(entries);
  }

  private checkAborted(state: ScanState): void {
    if (state.signal?.aborted) {
      throw new ScanAbortedError(undefined, { cause: state.signal.reason });
    }
  }
}

/**
 * Convenience wrapper around {@link OldestFileScanner.findOldest} using the real filesystem.
 */
export function findOldest(
  root: string,
  excluded: Iterable<string>,
  options: Omit<ScanOptions, 'excludedNamespaces'> = {},
): Promise<CandidateFile | undefined> {
  return new OldestFileScanner().findOldest(root, excluded, options);
}
