import { z } from 'zod';

/** Where the storage engine keeps its data directories on a standard install. */
export const DEFAULT_DATA_ROOT = '/mnt/cassandra';

/** Reserved namespaces that hold engine metadata rather than user tables. */
export const DEFAULT_EXCLUDED_NAMESPACES: readonly string[] = [
  'system',
  'system_schema',
  'system_auth',
  'system_distributed',
  'system_traces',
  'system_views',
];

export const DEFAULT_TARGET_FILE_NAME = 'Data.db';

export const ScanConfigSchema = z.object({
  root: z.string().min(1, 'root must not be empty').default(DEFAULT_DATA_ROOT),
  excludedNamespaces: z
    .array(z.string().min(1, 'namespace names must not be empty'))
    .default(() => [...DEFAULT_EXCLUDED_NAMESPACES]),
  targetFileName: z
    .string()
    .min(1, 'targetFileName must not be empty')
    .refine((name) => !/[\\/]/.test(name), {
      message: 'targetFileName must be a bare file name without path separators',
    })
    .default(DEFAULT_TARGET_FILE_NAME),
});

export type ScanConfig = z.infer<typeof ScanConfigSchema>;
export type ScanConfigInput = z.input<typeof ScanConfigSchema>;
