import type { OldestFileScanner } from '@sstable-age/scanner';

export type GlobalOptions = {
  json?: boolean;
  verbose?: boolean;
};

/**
 * Collaborators the commands use. Tests swap these for fakes.
 */
export interface CliDeps {
  scanner?: OldestFileScanner;
  env?: NodeJS.ProcessEnv;
}
