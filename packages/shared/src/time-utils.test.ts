import { describe, it, expect } from 'vitest';
import { formatLocalTimestamp } from './time-utils';

describe('formatLocalTimestamp', () => {
  it('renders local date and time with zero padding', () => {
    const ms = new Date(2021, 0, 5, 3, 4, 5).getTime();
    expect(formatLocalTimestamp(ms)).toBe('2021-01-05 03:04:05');
  });

  it('truncates fractional seconds', () => {
    const ms = new Date(2023, 11, 31, 23, 59, 59, 999).getTime();
    expect(formatLocalTimestamp(ms)).toBe('2023-12-31 23:59:59');
  });
});
