import { describe, it, expect, vi, afterEach } from 'vitest';
import { sleep } from './sleep.js';

describe('sleep', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('resolves after the delay', async () => {
    vi.useFakeTimers();
    let done = false;

    const pending = sleep(5000).then(() => {
      done = true;
    });

    await vi.advanceTimersByTimeAsync(4999);
    expect(done).toBe(false);

    await vi.advanceTimersByTimeAsync(1);
    await pending;
    expect(done).toBe(true);
  });

  it('resolves early when the signal aborts', async () => {
    vi.useFakeTimers();
    const controller = new AbortController();
    let done = false;

    const pending = sleep(5000, controller.signal).then(() => {
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

    await expect(sleep(60_000, controller.signal)).resolves.toBeUndefined();
  });
});
