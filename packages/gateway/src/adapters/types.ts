/**
 * Relay Adapter Interface
 *
 * The capability contract every transport binding satisfies. The quorum
 * router depends only on this interface, never on a transport's SDK.
 *
 * The core assumes nothing about a transport's retries, ordering or latency
 * beyond "eventually delivers at most what was sent, or nothing".
 */

import type { AdapterId, NetworkId } from '../boundaries/invariants.js';

// =============================================================================
// OUTBOUND
// =============================================================================

export interface AdapterSendRequest {
  destination: NetworkId;
  payload: Uint8Array;
  gasLimit: bigint;
  /** Where the transport returns unspent relay cost */
  refund: string;
  /** Native currency forwarded with the send, as quoted by `estimate` */
  payment: bigint;
}

/**
 * Opaque to the core. `reference` is whatever the transport uses to track
 * the send (tx hash, message id).
 */
export interface AdapterReceipt {
  adapter: AdapterId;
  reference: string;
}

// =============================================================================
// INBOUND
// =============================================================================

/**
 * Bound by the router to the adapter's configured identity. A binding calls it
 * whenever its transport delivers bytes from a remote network.
 */
export type InboundReceiver = (source: NetworkId, payload: Uint8Array) => Promise<void>;

// =============================================================================
// ADAPTER
// =============================================================================

export interface RelayAdapter {
  readonly id: AdapterId;

  /**
   * Hand bytes to the transport for delivery to `destination`.
   * Resolves once the transport has accepted them, not once delivered.
   */
  send(request: AdapterSendRequest): Promise<AdapterReceipt>;

  /**
   * Cost in native currency of sending `payload` with `gasLimit`.
   */
  estimate(destination: NetworkId, payload: Uint8Array, gasLimit: bigint): Promise<bigint>;

  /**
   * Install the inbound receiver. Called once by the router that owns the
   * adapter; calling it again replaces the receiver.
   */
  attach(receiver: InboundReceiver): void;
}
