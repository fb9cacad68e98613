import { describe, expect, it } from 'vitest';
import { DailyLimiter } from '../../src/lib/daily-limit.js';
import { DailyLimitError } from '../../src/lib/errors.js';
import { MemoryStore } from '../helpers/memory-store.js';

describe('DailyLimiter', () => {
  const day = new Date('2026-03-14T23:30:00Z');

  it('keys counters by action, user and UTC day', () => {
    const limiter = new DailyLimiter(new MemoryStore(), 'case_open', 5, 'open cases', () => day);
    expect(limiter.key('u1')).toBe('daily:case_open:u1:2026-03-14');
  });

  it('allows exactly the limit and then rejects', async () => {
    const limiter = new DailyLimiter(new MemoryStore(), 'case_open', 2, 'open cases', () => day);

    await limiter.assertAvailable('u1');
    await limiter.record('u1');
    await limiter.assertAvailable('u1');
    await limiter.record('u1');

    await expect(limiter.assertAvailable('u1')).rejects.toThrow(
      'Daily limit reached: you can open cases at most 2 times per day.'
    );
    expect(await limiter.remaining('u1')).toBe(0);
  });

  it('checks multi-unit requests against what is left', async () => {
    const limiter = new DailyLimiter(new MemoryStore(), 'case_buy', 5, 'buy cases', () => day);
    await limiter.record('u1', 3);

    await expect(limiter.assertAvailable('u1', 3)).rejects.toBeInstanceOf(DailyLimitError);
    await expect(limiter.assertAvailable('u1', 2)).resolves.toBeUndefined();
    expect(await limiter.used('u1')).toBe(3);
  });

  it('starts a fresh count on the next UTC day', async () => {
    let now = day;
    const limiter = new DailyLimiter(new MemoryStore(), 'case_open', 1, 'open cases', () => now);
    await limiter.record('u1');

    now = new Date('2026-03-15T00:00:01Z');
    expect(await limiter.remaining('u1')).toBe(1);
  });
});
