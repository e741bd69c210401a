import type { Dirent, Stats } from 'node:fs';
import type { Logger } from '@sstable-age/shared';

/**
 * The subset of `fs/promises` the scanner reads through.
 */
export interface ScannerFs {
  stat(path: string): Promise<Stats>;
  readdir(path: string, options: { withFileTypes: true }): Promise<Dirent[]>;
}

export interface ScanOptions {
  /** First-level directory names to skip, with their whole subtree. */
  excludedNamespaces?: Iterable<string>;
  /** File name that marks a data file. Defaults to `Data.db`. */
  targetFileName?: string;
  signal?: AbortSignal;
  logger?: Logger;
}

/**
 * A target file and its modification time in epoch milliseconds.
 */
export interface CandidateFile {
  readonly path: string;
  readonly mtimeMs: number;
}

export interface ScanStats {
  namespaces: number;
  excludedNamespaces: number;
  tables: number;
  directories: number;
  candidates: number;
  skippedFiles: number;
}

export interface ScanReport {
  /** Absolute scan root. */
  root: string;
  targetFileName: string;
  excludedNamespaces: string[];
  /** Oldest target file found, if any. */
  oldest: CandidateFile | undefined;
  stats: ScanStats;
}
