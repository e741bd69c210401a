import type { CandidateFile, ScanStats } from './types';

export const PERMISSION_ERROR_CODES: ReadonlySet<string> = new Set(['EACCES', 'EPERM']);

export const MISSING_PATH_ERROR_CODES: ReadonlySet<string> = new Set(['ENOENT', 'ENOTDIR']);

/**
 * Keeps the running minimum. A candidate replaces the current one only when
 * strictly older, so the first of equal timestamps wins.
 */
export function pickOlder(
  current: CandidateFile | undefined,
  candidate: CandidateFile,
): CandidateFile {
  if (current === undefined || candidate.mtimeMs < current.mtimeMs) {
    return candidate;
  }
  return current;
}

/**
 * Sorts directory entries by name so traversal order (and tie-breaking) is
 * the same on every run.
 */
export function sortEntries<T extends { name: string }>(entries: readonly T[]): T[] {
  return [...entries].sort((a, b) => a.name.localeCompare(b.name));
}

export function emptyStats(): ScanStats {
  return {
    namespaces: 0,
    excludedNamespaces: 0,
    tables: 0,
    directories: 0,
    candidates: 0,
    skippedFiles: 0,
  };
}
