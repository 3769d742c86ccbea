/**
 * Adapter Timeout Tests
 *
 * Proves:
 * - Slow adapter calls fail with AdapterTimeoutError (a transport failure)
 * - Fast calls are unaffected and leave no timer behind
 * - Timeout configuration selects the right budget per operation
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  withTimeout,
  getAdapterTimeout,
  DEFAULT_TIMEOUT_CONFIG,
} from '../../src/execution/timeout.js';
import type { TimeoutConfig } from '../../src/execution/timeout.js';
import { AdapterTimeoutError } from '../../src/boundaries/errors.js';
import { adapterId } from '../../src/boundaries/invariants.js';

const ADAPTER = adapterId('relay-a');

afterEach(() => {
  vi.useRealTimers();
});

describe('withTimeout', () => {
  it('should complete before timeout', async () => {
    const result = await withTimeout(
      async () => {
        await new Promise((r) => setTimeout(r, 10));
        return 'success';
      },
      100,
      ADAPTER,
      'send'
    );

    expect(result).toBe('success');
  });

  it('should throw AdapterTimeoutError on timeout', async () => {
    vi.useFakeTimers();

    const promise = withTimeout(() => new Promise<string>(() => {}), 50, ADAPTER, 'estimate');
    const assertion = expect(promise).rejects.toThrow(AdapterTimeoutError);

    await vi.advanceTimersByTimeAsync(50);
    await assertion;
  });

  it('should include adapter and operation in the error', async () => {
    vi.useFakeTimers();

    const promise = withTimeout(() => new Promise<void>(() => {}), 10, ADAPTER, 'send').catch(
      (e: unknown) => e
    );
    await vi.advanceTimersByTimeAsync(10);
    const err = await promise;

    expect(err).toBeInstanceOf(AdapterTimeoutError);
    if (err instanceof AdapterTimeoutError) {
      expect(err.adapter).toBe('relay-a');
      expect(err.operation).toBe('send');
      expect(err.timeoutMs).toBe(10);
      expect(err.category).toBe('TRANSPORT');
      expect(err.code).toBe('ADAPTER_TIMEOUT');
      expect(err.message).toBe('Adapter relay-a timed out on send after 10ms');
    }
  });

  it('should clear timeout on successful completion', async () => {
    vi.useFakeTimers();

    const result = await withTimeout(async () => 'quick', 1000, ADAPTER, 'send');

    expect(result).toBe('quick');
    expect(vi.getTimerCount()).toBe(0);
  });

  it('should propagate the call error unchanged', async () => {
    const failure = new Error('rpc down');
    await expect(
      withTimeout(async () => {
        throw failure;
      }, 100, ADAPTER, 'send')
    ).rejects.toBe(failure);
  });
});

describe('getAdapterTimeout', () => {
  it('should use the send budget for sends', () => {
    expect(getAdapterTimeout(DEFAULT_TIMEOUT_CONFIG, 'send')).toBe(60_000);
  });

  it('should use the estimate budget for estimates', () => {
    expect(getAdapterTimeout(DEFAULT_TIMEOUT_CONFIG, 'estimate')).toBe(10_000);
  });

  it('should respect custom config', () => {
    const config: TimeoutConfig = { estimateTimeoutMs: 5, sendTimeoutMs: 7 };
    expect(getAdapterTimeout(config, 'send')).toBe(7);
    expect(getAdapterTimeout(config, 'estimate')).toBe(5);
  });
});
