import { describe, expect, it, vi } from 'vitest';
import { backoffDelay, withRetry } from '../../src/utils/retry.js';

describe('backoffDelay', () => {
  it('grows by the factor and stops at the cap', () => {
    const policy = { delayMs: 200, factor: 2, maxDelayMs: 1000 };

    expect([1, 2, 3, 4].map((retry) => backoffDelay(retry, policy))).toEqual([200, 400, 800, 1000]);
  });
});

describe('withRetry', () => {
  it('returns the value from a first-try success', async () => {
    const operation = vi.fn(async () => 'ok');

    const result = await withRetry(operation, { attempts: 3, delayMs: 0 });

    expect(result).toEqual({ ok: true, value: 'ok', attempts: 1 });
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('tries again after a transient failure', async () => {
    const operation = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error('socket hang up'))
      .mockResolvedValueOnce('delivered');

    const result = await withRetry(operation, { attempts: 3, delayMs: 0, label: 'send' });

    expect(result).toEqual({ ok: true, value: 'delivered', attempts: 2 });
    expect(operation).toHaveBeenCalledTimes(2);
  });

  it('reports the last error once the attempts run out', async () => {
    const operation = vi.fn(async () => {
      throw new Error('gateway timeout');
    });

    const result = await withRetry(operation, { attempts: 2, delayMs: 0 });

    expect(result).toEqual({ ok: false, error: 'gateway timeout', attempts: 2 });
    expect(operation).toHaveBeenCalledTimes(2);
  });

  it('stops at the first error shouldRetry refuses', async () => {
    const operation = vi.fn(async () => {
      throw new Error('400 Bad Request: chat not found');
    });

    const result = await withRetry(operation, {
      attempts: 5,
      delayMs: 0,
      shouldRetry: (error) => !(error instanceof Error && error.message.startsWith('400')),
    });

    expect(result).toEqual({ ok: false, error: '400 Bad Request: chat not found', attempts: 1 });
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('treats attempts below one as a single try', async () => {
    const operation = vi.fn(async () => {
      throw 'offline';
    });

    const result = await withRetry(operation, { attempts: 0 });

    expect(result).toEqual({ ok: false, error: 'offline', attempts: 1 });
  });

  it('waits between tries with capped exponential backoff', async () => {
    vi.useFakeTimers();
    const timers = vi.spyOn(globalThis, 'setTimeout');
    try {
      const operation = vi
        .fn<() => Promise<string>>()
        .mockRejectedValueOnce(new Error('one'))
        .mockRejectedValueOnce(new Error('two'))
        .mockResolvedValueOnce('three');

      const pending = withRetry(operation, { attempts: 3, delayMs: 100, factor: 3, maxDelayMs: 250 });
      await vi.runAllTimersAsync();

      await expect(pending).resolves.toEqual({ ok: true, value: 'three', attempts: 3 });
      expect(timers.mock.calls.map((call) => call[1])).toEqual([100, 250]);
    } finally {
      timers.mockRestore();
      vi.useRealTimers();
    }
  });
});
