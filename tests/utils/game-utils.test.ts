import { afterEach, describe, expect, it, vi } from 'vitest';
import { confirmRow, msUntil } from '../../src/utils/game-utils.js';

describe('confirmRow', () => {
  it('namespaces the button IDs under the prompt prefix', () => {
    expect(confirmRow('sell', 'Sell', 'Keep').toJSON().components).toMatchObject([
      { custom_id: 'sell:confirm', label: 'Sell' },
      { custom_id: 'sell:cancel', label: 'Keep' },
    ]);
  });
});

describe('msUntil', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('counts down to the deadline and stops at zero', () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-01T00:00:00Z'));

    expect(msUntil(new Date('2026-01-01T00:02:00Z'))).toBe(120_000);
    expect(msUntil(new Date('2025-12-31T23:59:00Z'))).toBe(0);
  });
});
