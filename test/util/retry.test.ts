import { afterEach, describe, expect, it, vi } from 'vitest';

import { backoffDelay, exponentialBackoff } from '../../src/util/retry';

describe('backoffDelay', () => {
  it('doubles from the initial delay', () => {
    expect([1, 2, 3].map((attempt) => backoffDelay(attempt, { jitter: false }))).toEqual([500, 1000, 2000]);
  });

  it('caps the delay', () => {
    expect(backoffDelay(10, { jitter: false, maxDelayMs: 1000 })).toBe(1000);
  });

  it('keeps jittered delays between half and the full delay', () => {
    expect(backoffDelay(1, {}, () => 0)).toBe(250);
    expect(backoffDelay(1, {}, () => 1)).toBe(500);
  });
});

describe('exponentialBackoff', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('retries until the action succeeds', async () => {
    const sleep = vi.fn(async (_ms: number) => undefined);
    const action = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new Error('first'))
      .mockRejectedValueOnce(new Error('second'))
      .mockResolvedValue('done');

    await expect(exponentialBackoff(action, { jitter: false, sleep })).resolves.toBe('done');
    expect(action.mock.calls).toEqual([[1], [2], [3]]);
    expect(sleep.mock.calls).toEqual([[500], [1000]]);
  });

  it('gives up after the last attempt with the last error', async () => {
    const action = vi.fn(async (attempt: number): Promise<never> => {
      throw new Error(`failure ${attempt}`);
    });

    await expect(exponentialBackoff(action, { maxAttempts: 3, sleep: async () => undefined })).rejects.toThrow(
      'failure 3',
    );
    expect(action).toHaveBeenCalledTimes(3);
  });

  it('stops when shouldRetry declines', async () => {
    const action = vi.fn(async (): Promise<never> => {
      throw new Error('bad request');
    });

    await expect(
      exponentialBackoff(action, { shouldRetry: () => false, sleep: async () => undefined }),
    ).rejects.toThrow('bad request');
    expect(action).toHaveBeenCalledTimes(1);
  });

  it('keeps retrying when the onRetry hook throws', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const action = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new Error('flaky'))
      .mockResolvedValue('ok');

    const result = await exponentialBackoff(action, {
      sleep: async () => undefined,
      onRetry: () => {
        throw new Error('hook failed');
      },
    });

    expect(result).toBe('ok');
    expect(warn).toHaveBeenCalledTimes(1);
  });
});
