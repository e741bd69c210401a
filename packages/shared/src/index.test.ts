import { describe, it, expect } from 'vitest';
import { name, ConsoleLogger, ConfigError, formatLocalTimestamp } from './index';

describe('shared package', () => {
  it('exports name', () => {
    expect(name).toBe('@sstable-age/shared');
  });

  it('re-exports the logger, errors and time helpers', () => {
    expect(new ConsoleLogger().level).toBe('info');
    expect(new ConfigError('x').code).toBe('ConfigError');
    expect(typeof formatLocalTimestamp).toBe('function');
  });
});
