/**
 * Metrics Interface
 *
 * Write-only signals for observability.
 *
 * HARD CONSTRAINT: the router and the hub must NEVER read metrics or act on
 * them. Metrics are purely for external monitoring.
 *
 * Default implementation is no-op.
 */

import type { AdapterId, NetworkId, TenantId } from '../boundaries/invariants.js';

export type VoteIgnoredReason = 'duplicate' | 'delivered';
export type HeldReason = 'UNDERFUNDED' | 'QUOTE_FAILED' | 'SEND_FAILED';

// =============================================================================
// METRICS INTERFACE
// =============================================================================

/**
 * Write-only metrics sink.
 *
 * All methods are fire-and-forget.
 * Implementations must never throw.
 */
export interface RelayMetrics {
  // =========================================================================
  // Outbound
  // =========================================================================

  /**
   * Sub-message accepted into a pending batch.
   */
  messageQueued(destination: NetworkId): void;

  /**
   * Batch sent through every sending adapter and debited.
   */
  batchSent(destination: NetworkId, messageCount: number, cost: bigint): void;

  /**
   * Batch parked instead of sent.
   */
  batchHeld(destination: NetworkId, reason: HeldReason): void;

  /**
   * Subsidy debited for a sent batch.
   */
  subsidyDebited(tenant: TenantId, amount: bigint): void;

  // =========================================================================
  // Inbound quorum
  // =========================================================================

  /**
   * A new vote from an adapter was recorded.
   */
  voteRecorded(source: NetworkId, adapter: AdapterId): void;

  /**
   * A vote changed nothing.
   */
  voteIgnored(source: NetworkId, reason: VoteIgnoredReason): void;

  /**
   * Payload supplied by an operator.
   */
  payloadRecovered(source: NetworkId): void;

  /**
   * Quorum reached with payload present; batch forwarded.
   */
  batchDelivered(source: NetworkId, messageCount: number, votes: number): void;

  // =========================================================================
  // Dispatch
  // =========================================================================

  /**
   * Domain handler accepted a sub-message.
   */
  messageDispatched(source: NetworkId): void;

  /**
   * Domain handler threw on a sub-message.
   */
  messageFailed(source: NetworkId): void;

  /**
   * Failed sub-message retried.
   */
  messageRetried(source: NetworkId, succeeded: boolean): void;
}

// =============================================================================
// NO-OP IMPLEMENTATION (Default)
// =============================================================================

export class NoOpMetrics implements RelayMetrics {
  messageQueued(_destination: NetworkId): void {}
  batchSent(_destination: NetworkId, _messageCount: number, _cost: bigint): void {}
  batchHeld(_destination: NetworkId, _reason: HeldReason): void {}
  subsidyDebited(_tenant: TenantId, _amount: bigint): void {}

  voteRecorded(_source: NetworkId, _adapter: AdapterId): void {}
  voteIgnored(_source: NetworkId, _reason: VoteIgnoredReason): void {}
  payloadRecovered(_source: NetworkId): void {}
  batchDelivered(_source: NetworkId, _messageCount: number, _votes: number): void {}

  messageDispatched(_source: NetworkId): void {}
  messageFailed(_source: NetworkId): void {}
  messageRetried(_source: NetworkId, _succeeded: boolean): void {}
}

// =============================================================================
// CONSOLE METRICS (for development)
// =============================================================================

/**
 * Console-based metrics for development/debugging.
 * bigint values are written as decimal strings.
 */
export class ConsoleMetrics implements RelayMetrics {
  private log(category: string, event: string, data: Record<string, unknown>): void {
    console.log(JSON.stringify({
      timestamp: new Date().toISOString(),
      category,
      event,
      ...data,
    }, (_key, value: unknown) => (typeof value === 'bigint' ? value.toString() : value)));
  }

  messageQueued(destination: NetworkId): void {
    this.log('outbound', 'message_queued', { destination });
  }

  batchSent(destination: NetworkId, messageCount: number, cost: bigint): void {
    this.log('outbound', 'batch_sent', { destination, messageCount, cost });
  }

  batchHeld(destination: NetworkId, reason: HeldReason): void {
    this.log('outbound', 'batch_held', { destination, reason });
  }

  subsidyDebited(tenant: TenantId, amount: bigint): void {
    this.log('subsidy', 'debited', { tenant, amount });
  }

  voteRecorded(source: NetworkId, adapter: AdapterId): void {
    this.log('quorum', 'vote_recorded', { source, adapter });
  }

  voteIgnored(source: NetworkId, reason: VoteIgnoredReason): void {
    this.log('quorum', 'vote_ignored', { source, reason });
  }

  payloadRecovered(source: NetworkId): void {
    this.log('quorum', 'payload_recovered', { source });
  }

  batchDelivered(source: NetworkId, messageCount: number, votes: number): void {
    this.log('quorum', 'batch_delivered', { source, messageCount, votes });
  }

  messageDispatched(source: NetworkId): void {
    this.log('dispatch', 'message_dispatched', { source });
  }

  messageFailed(source: NetworkId): void {
    this.log('dispatch', 'message_failed', { source });
  }

  messageRetried(source: NetworkId, succeeded: boolean): void {
    this.log('dispatch', 'message_retried', { source, succeeded });
  }
}
