/**
 * Failed sub-message bookkeeping.
 *
 * Keyed by (source network, keccak256 of the sub-message). Identical
 * sub-messages from the same source share a counter.
 */

import { keccak256 } from 'ethers';
import type { NetworkId } from '../boundaries/invariants.js';
import type { FailedMessage } from './types.js';

export interface FailedMessageStore {
  /**
   * Count one more failure. Returns the new count.
   */
  record(source: NetworkId, message: Uint8Array, error: string, at: number): Promise<number>;

  get(source: NetworkId, message: Uint8Array): Promise<FailedMessage | null>;

  /**
   * Count one failure as resolved. Returns the remaining count; the entry is
   * dropped when it reaches zero.
   */
  resolve(source: NetworkId, message: Uint8Array): Promise<number>;

  list(): Promise<FailedMessage[]>;
}

export function messageHash(message: Uint8Array): string {
  return keccak256(message);
}

export class InMemoryFailedMessageStore implements FailedMessageStore {
  private failures: Map<string, FailedMessage> = new Map();

  private key(source: NetworkId, message: Uint8Array): string {
    return `${source}:${messageHash(message)}`;
  }

  async record(source: NetworkId, message: Uint8Array, error: string, at: number): Promise<number> {
    const key = this.key(source, message);
    const existing = this.failures.get(key);
    const count = (existing?.count ?? 0) + 1;
    this.failures.set(key, {
      source,
      hash: messageHash(message),
      message: message.slice(),
      count,
      lastError: error,
      lastFailedAt: at,
    });
    return count;
  }

  async get(source: NetworkId, message: Uint8Array): Promise<FailedMessage | null> {
    const failure = this.failures.get(this.key(source, message));
    return failure ? { ...failure, message: failure.message.slice() } : null;
  }

  async resolve(source: NetworkId, message: Uint8Array): Promise<number> {
    const key = this.key(source, message);
    const existing = this.failures.get(key);
    if (!existing) return 0;

    const remaining = existing.count - 1;
    if (remaining <= 0) {
      this.failures.delete(key);
      return 0;
    }
    this.failures.set(key, { ...existing, count: remaining });
    return remaining;
  }

  async list(): Promise<FailedMessage[]> {
    return Array.from(this.failures.values()).map((failure) => ({
      ...failure,
      message: failure.message.slice(),
    }));
  }
}
