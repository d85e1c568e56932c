/**
 * Tests for withTimeout
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { withTimeout } from '../timeout.js';

class SlowCallError extends Error {}

describe('withTimeout', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('resolves with the value when the promise settles first', async () => {
    const result = await withTimeout(Promise.resolve(42), 1000, () => new SlowCallError('late'));
    expect(result).toBe(42);
  });

  it('propagates the original rejection', async () => {
    await expect(
      withTimeout(Promise.reject(new Error('boom')), 1000, () => new SlowCallError('late'))
    ).rejects.toThrow('boom');
  });

  it('rejects with the timeout error when the bound is hit', async () => {
    vi.useFakeTimers();
    const never = new Promise<number>(() => {});

    const pending = withTimeout(never, 500, () => new SlowCallError('took too long'));
    vi.advanceTimersByTime(500);

    await expect(pending).rejects.toBeInstanceOf(SlowCallError);
    await expect(pending).rejects.toThrow('took too long');
  });

  it('clears its timer after settling', async () => {
    vi.useFakeTimers();

    await withTimeout(Promise.resolve('done'), 500, () => new SlowCallError('late'));

    expect(vi.getTimerCount()).toBe(0);
  });

  it('does not bound the wait when the timeout is zero', async () => {
    const onTimeout = vi.fn(() => new SlowCallError('late'));
    const result = await withTimeout(Promise.resolve('ok'), 0, onTimeout);

    expect(result).toBe('ok');
    expect(onTimeout).not.toHaveBeenCalled();
  });
});
