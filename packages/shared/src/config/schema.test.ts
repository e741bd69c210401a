import { describe, it, expect } from 'vitest';
import {
  ScanConfigSchema,
  DEFAULT_DATA_ROOT,
  DEFAULT_EXCLUDED_NAMESPACES,
  DEFAULT_TARGET_FILE_NAME,
} from './schema';

describe('ScanConfigSchema', () => {
  it('fills every field with defaults', () => {
    const config = ScanConfigSchema.parse({});
    expect(config).toEqual({
      root: DEFAULT_DATA_ROOT,
      excludedNamespaces: [...DEFAULT_EXCLUDED_NAMESPACES],
      targetFileName: DEFAULT_TARGET_FILE_NAME,
    });
  });

  it('keeps explicit values', () => {
    const config = ScanConfigSchema.parse({
      root: '/data',
      excludedNamespaces: [],
      targetFileName: 'Index.db',
    });
    expect(config).toEqual({ root: '/data', excludedNamespaces: [], targetFileName: 'Index.db' });
  });

  it('rejects a target file name containing a path separator', () => {
    const result = ScanConfigSchema.safeParse({ targetFileName: 'a/Data.db' });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].path).toEqual(['targetFileName']);
      expect(result.error.issues[0].message).toBe(
        'targetFileName must be a bare file name without path separators',
      );
    }
  });

  it('rejects empty namespace names', () => {
    const result = ScanConfigSchema.safeParse({ excludedNamespaces: ['system', ''] });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].path).toEqual(['excludedNamespaces', 1]);
    }
  });

  it('does not share the default exclusion array between parses', () => {
    const a = ScanConfigSchema.parse({});
    a.excludedNamespaces.push('mutated');
    const b = ScanConfigSchema.parse({});
    expect(b.excludedNamespaces).not.toContain('mutated');
  });
});
