import { ConfigError, ScanConfigSchema } from '@sstable-age/shared';
import type { ScanConfig, ScanConfigInput } from '@sstable-age/shared';

export const ENV_ROOT = 'SSTABLE_AGE_ROOT';
export const ENV_EXCLUDE = 'SSTABLE_AGE_EXCLUDE';
export const ENV_TARGET = 'SSTABLE_AGE_TARGET';

export interface ConfigOptions {
  flags?: ScanConfigInput; // CLI flags
  env?: NodeJS.ProcessEnv; // Environment variables
}

/**
 * Splits a comma-separated list, dropping blanks. An empty string yields an empty list.
 */
export function parseList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export class ConfigLoader {
  static fromEnv(env: NodeJS.ProcessEnv): ScanConfigInput {
    const config: ScanConfigInput = {};

    const root = env[ENV_ROOT];
    if (root) config.root = root;

    // Present-but-empty means "exclude nothing"
    const exclude = env[ENV_EXCLUDE];
    if (exclude !== undefined) config.excludedNamespaces = parseList(exclude);

    const target = env[ENV_TARGET];
    if (target) config.targetFileName = target;

    return config;
  }

  /**
   * Later sources win field by field; arrays replace rather than merge.
   */
  static mergeConfigs(target: ScanConfigInput, source: ScanConfigInput): ScanConfigInput {
    return {
      root: source.root ?? target.root,
      excludedNamespaces: source.excludedNamespaces ?? target.excludedNamespaces,
      targetFileName: source.targetFileName ?? target.targetFileName,
    };
  }

  static load(options: ConfigOptions = {}): ScanConfig {
    const env = options.env || process.env;

    // Merge in order of precedence: flags > env > defaults
    const envConfig = this.fromEnv(env);
    const flagConfig = options.flags || {};
    const mergedConfig = this.mergeConfigs(envConfig, flagConfig);

    // Validate (schema defaults fill whatever is still unset)
    const result = ScanConfigSchema.safeParse(mergedConfig);

    if (!result.success) {
      const issues = result.error.issues
        .map((i) => `- ${i.path.join('.')}: ${i.message}`)
        .join('\n');
      throw new ConfigError(`Configuration validation failed:\n${issues}`);
    }

    return result.data;
  }
}
