import { describe, expect, it } from 'vitest';
import { formatCredits, formatDuration, parseBigInt } from '../../src/lib/utils.js';

describe('formatCredits', () => {
  it('groups thousands', () => {
    expect(formatCredits(1234567)).toBe('💳 1,234,567');
  });
});

describe('formatDuration', () => {
  it('lists the non-zero units', () => {
    expect(formatDuration(90)).toBe('1m 30s');
    expect(formatDuration(3600)).toBe('1h');
    expect(formatDuration(90061)).toBe('1d 1h 1m 1s');
    expect(formatDuration(0)).toBe('0s');
  });
});

describe('parseBigInt', () => {
  it('reads counters stored as text', () => {
    expect(parseBigInt('42')).toBe(42);
    expect(parseBigInt(7)).toBe(7);
    expect(parseBigInt(null)).toBe(0);
  });
});
