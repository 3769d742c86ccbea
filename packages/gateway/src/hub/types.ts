/**
 * Outbound Hub Types
 */

import type { NetworkId, PayloadHash, TenantId } from '../boundaries/invariants.js';
import type { AdapterReceipt } from '../adapters/types.js';
import type { HeldReason } from '../observability/metrics.js';

// =============================================================================
// DOMAIN HANDLER
// =============================================================================

/**
 * Destination-side domain logic. Receives one sub-message at a time, in
 * production order. MUST NOT call back into the inbound path.
 */
export type MessageHandler = (source: NetworkId, message: Uint8Array) => Promise<void>;

// =============================================================================
// BATCHING
// =============================================================================

/**
 * Handed to the `withBatch` callback. Only valid until the callback settles.
 */
export interface BatchScope {
  /**
   * Append a sub-message to the pending batch for (destination, tenant).
   * Throws on an unknown or blocked route and on a gas limit overflow.
   */
  send(destination: NetworkId, tenant: TenantId, message: Uint8Array): void;
}

export interface PendingBatch {
  destination: NetworkId;
  tenant: TenantId;
  messages: Uint8Array[];
  gasLimit: bigint;
}

export interface FlushReceipt {
  destination: NetworkId;
  tenant: TenantId;
  hash: PayloadHash;
  messageCount: number;
  cost: bigint;
  receipts: AdapterReceipt[];
}

export interface BatchResult<T> {
  value: T;
  receipts: FlushReceipt[];
}

// =============================================================================
// HELD BATCHES
// =============================================================================

/**
 * A packed batch that was not sent, parked until an operator releases it.
 */
export interface HeldBatch {
  id: string;
  destination: NetworkId;
  tenant: TenantId;
  batch: Uint8Array;
  messageCount: number;
  gasLimit: bigint;
  reason: HeldReason;
  createdAt: number;
}

// =============================================================================
// FAILED MESSAGES
// =============================================================================

export interface FailedMessage {
  source: NetworkId;
  /** keccak256 of the sub-message */
  hash: string;
  message: Uint8Array;
  count: number;
  lastError: string;
  lastFailedAt: number;
}

export interface RetryResult {
  succeeded: boolean;
  /** Failures still recorded for this sub-message */
  remaining: number;
}
