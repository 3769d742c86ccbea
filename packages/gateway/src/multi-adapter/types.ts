/**
 * Quorum Router Types
 */

import type { AdapterId, NetworkId, PayloadHash, TenantId } from '../boundaries/invariants.js';
import type { AdapterReceipt, RelayAdapter } from '../adapters/types.js';

// =============================================================================
// REGISTRATION
// =============================================================================

export const MAX_ADAPTER_COUNT = 8;

export interface RegistrationParams {
  /** Distinct adapters that must agree on a hash before delivery */
  threshold: number;
  /**
   * Adapters at or after this index are recovery-only: they vote but are
   * never used for sending. Defaults to the adapter count.
   */
  recoveryIndex?: number;
  /** Adapter that carries the full batch outbound. Defaults to 0. */
  primaryIndex?: number;
}

export interface AdapterRegistration {
  remote: NetworkId;
  tenant: TenantId;
  adapters: readonly RelayAdapter[];
  threshold: number;
  recoveryIndex: number;
  primaryIndex: number;
  /** Incremented on every replacement of this (remote, tenant) pair */
  sessionId: number;
}

// =============================================================================
// VOTE RECORDS
// =============================================================================

/**
 * Per (source network, hash) tally.
 *
 * pending           below quorum; payload may or may not have arrived
 * awaiting_payload  quorum reached on proofs alone, payload not yet seen
 * delivered         terminal; payload dropped, hash kept for replay detection
 */
export type VoteRecord =
  | {
      status: 'pending';
      hash: PayloadHash;
      voters: AdapterId[];
      payload: Uint8Array | null;
      firstSeenAt: number;
    }
  | {
      status: 'awaiting_payload';
      hash: PayloadHash;
      voters: AdapterId[];
      firstSeenAt: number;
    }
  | {
      status: 'delivered';
      hash: PayloadHash;
      voters: AdapterId[];
      firstSeenAt: number;
      deliveredAt: number;
    };

export type VoteStatus = VoteRecord['status'];

/**
 * Operator view of a vote record.
 */
export interface VoteView {
  source: NetworkId;
  hash: PayloadHash;
  status: VoteStatus;
  voters: AdapterId[];
  /** Voters that belong to the registration the record is judged against */
  countedVotes: number;
  /** null when no registration currently applies */
  threshold: number | null;
  hasPayload: boolean;
  firstSeenAt: number;
  deliveredAt: number | null;
}

// =============================================================================
// INBOUND
// =============================================================================

export type HandleOutcome =
  | { status: 'recorded'; hash: PayloadHash; countedVotes: number }
  | { status: 'duplicate'; hash: PayloadHash }
  | { status: 'delivered'; hash: PayloadHash; messageCount: number }
  | { status: 'already_delivered'; hash: PayloadHash };

/**
 * Receives a quorum-confirmed batch, already split into sub-messages.
 */
export type InboundBatchHandler = (source: NetworkId, messages: Uint8Array[]) => Promise<void>;

/**
 * Picks the tenant whose registration judges an inbound batch.
 */
export type TenantResolver = (source: NetworkId, messages: readonly Uint8Array[]) => TenantId;

// =============================================================================
// OUTBOUND
// =============================================================================

export interface QuoteLeg {
  adapter: RelayAdapter;
  role: 'payload' | 'proof';
  frame: Uint8Array;
  cost: bigint;
}

export interface RelayQuote {
  destination: NetworkId;
  tenant: TenantId;
  hash: PayloadHash;
  gasLimit: bigint;
  sessionId: number;
  legs: QuoteLeg[];
  total: bigint;
}

export interface SendReceipt {
  destination: NetworkId;
  tenant: TenantId;
  hash: PayloadHash;
  cost: bigint;
  receipts: AdapterReceipt[];
}

/**
 * The outbound half of the router, as seen by the hub.
 */
export interface OutboundRouter {
  hasRoute(destination: NetworkId, tenant: TenantId): boolean;
  quote(destination: NetworkId, tenant: TenantId, batch: Uint8Array, gasLimit: bigint): Promise<RelayQuote>;
  sendQuoted(quote: RelayQuote, refund: string): Promise<SendReceipt>;
}
