import { describe, it, expect, vi, afterEach } from 'vitest';
import { computeBackoffDelay, sleep } from './backoff.js';

const policy = { baseMs: 1000, capMs: 8000 };

describe('computeBackoffDelay', () => {
  it('doubles per attempt with neutral jitter', () => {
    const neutral = () => 0.5;
    expect(computeBackoffDelay(1, policy, neutral)).toBe(1000);
    expect(computeBackoffDelay(2, policy, neutral)).toBe(2000);
    expect(computeBackoffDelay(3, policy, neutral)).toBe(4000);
    expect(computeBackoffDelay(4, policy, neutral)).toBe(8000);
  });

  it('never exceeds the cap before jitter', () => {
    expect(computeBackoffDelay(10, policy, () => 0.5)).toBe(8000);
  });

  it('scales by a factor between 0.75 and 1.25', () => {
    expect(computeBackoffDelay(2, policy, () => 0)).toBe(1500);
    expect(computeBackoffDelay(2, policy, () => 0.999)).toBe(2499);
  });

  it('stays within bounds for random jitter', () => {
    for (let attempt = 1; attempt <= 6; attempt++) {
      const base = Math.min(1000 * 2 ** (attempt - 1), 8000);
      const delay = computeBackoffDelay(attempt, policy);
      expect(delay).toBeGreaterThanOrEqual(Math.round(base * 0.75));
      expect(delay).toBeLessThanOrEqual(Math.round(base * 1.25));
    }
  });
});

describe('sleep', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('resolves after the delay', async () => {
    vi.useFakeTimers();
    let done = false;
    const pending = sleep(500).then(() => {
      done = true;
    });

    await vi.advanceTimersByTimeAsync(499);
    expect(done).toBe(false);
    await vi.advanceTimersByTimeAsync(1);
    await pending;
    expect(done).toBe(true);
  });

  it('resolves early when the signal aborts', async () => {
    vi.useFakeTimers();
    const controller = new AbortController();
    let done = false;
    const pending = sleep(10_000, controller.signal).then(() => {
      done = true;
    });

    controller.abort();
    await pending;
    expect(done).toBe(true);
    expect(vi.getTimerCount()).toBe(0);
  });

  it('resolves immediately for an already aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(sleep(10_000, controller.signal)).resolves.toBeUndefined();
  });
});
