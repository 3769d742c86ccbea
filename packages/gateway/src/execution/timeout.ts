/**
 * Adapter Call Timeout Enforcement
 *
 * HARD CONSTRAINT: a timeout is a transport failure, never a verdict on
 * content. A timed-out send may still reach the remote network; the quorum
 * layer's per-adapter vote de-duplication makes a later resend harmless.
 */

import type { AdapterId } from '../boundaries/invariants.js';
import { AdapterTimeoutError } from '../boundaries/errors.js';

// =============================================================================
// TIMEOUT CONFIG
// =============================================================================

export interface TimeoutConfig {
  /**
   * Timeout for `estimate` calls (ms).
   */
  estimateTimeoutMs: number;

  /**
   * Timeout for `send` calls (ms). Sends usually wait for a transaction
   * to be accepted by the source network, so this is longer.
   */
  sendTimeoutMs: number;
}

export const DEFAULT_TIMEOUT_CONFIG: TimeoutConfig = {
  estimateTimeoutMs: 10_000,
  sendTimeoutMs: 60_000,
};

export type AdapterOperation = 'send' | 'estimate';

export function getAdapterTimeout(config: TimeoutConfig, operation: AdapterOperation): number {
  return operation === 'send' ? config.sendTimeoutMs : config.estimateTimeoutMs;
}

// =============================================================================
// TIMEOUT WRAPPER
// =============================================================================

/**
 * Execute an adapter call with timeout.
 *
 * Does NOT cancel the underlying operation.
 * The operation may still complete after timeout - caller must handle.
 */
export async function withTimeout<T>(
  fn: () => Promise<T>,
  timeoutMs: number,
  adapter: AdapterId,
  operation: AdapterOperation
): Promise<T> {
  let timeoutId: NodeJS.Timeout | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      reject(new AdapterTimeoutError(adapter, operation, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(), timeoutPromise]);
  } finally {
    if (timeoutId) {
      clearTimeout(timeoutId);
    }
  }
}
