/**
 * Loopback Adapter
 *
 * In-process transport binding for local development and tests. Two
 * loopback adapters on different networks are connected; frames sent by one
 * wait in its outbox until delivered, dropped or corrupted on command, which
 * makes slow, silent and Byzantine transports easy to stage.
 */

import type { AdapterId, NetworkId } from '../boundaries/invariants.js';
import { ConfigurationError } from '../boundaries/errors.js';
import type {
  AdapterReceipt,
  AdapterSendRequest,
  InboundReceiver,
  RelayAdapter,
} from './types.js';

export interface LoopbackPacket {
  sequence: number;
  destination: NetworkId;
  payload: Uint8Array;
  gasLimit: bigint;
  payment: bigint;
}

export class LoopbackAdapter implements RelayAdapter {
  readonly id: AdapterId;
  readonly network: NetworkId;
  private peers: Map<NetworkId, LoopbackAdapter> = new Map();
  private receiver: InboundReceiver | null = null;
  private outbox: LoopbackPacket[] = [];
  private nextSequence: number = 1;
  private baseFee: bigint;
  private perByteFee: bigint;
  private offline: boolean = false;

  constructor(
    id: AdapterId,
    network: NetworkId,
    options?: {
      baseFee?: bigint;
      perByteFee?: bigint;
    }
  ) {
    this.id = id;
    this.network = network;
    this.baseFee = options?.baseFee ?? 0n;
    this.perByteFee = options?.perByteFee ?? 0n;
  }

  /**
   * Connect two loopback adapters in both directions.
   */
  connect(peer: LoopbackAdapter): void {
    if (peer.network === this.network) {
      throw new ConfigurationError('LOOPBACK_SAME_NETWORK', `Cannot connect two adapters on network ${this.network}`);
    }
    this.peers.set(peer.network, peer);
    peer.peers.set(this.network, this);
  }

  async send(request: AdapterSendRequest): Promise<AdapterReceipt> {
    if (this.offline) {
      throw new Error(`Loopback transport ${this.id} is offline`);
    }
    if (!this.peers.has(request.destination)) {
      throw new ConfigurationError(
        'LOOPBACK_NO_PEER',
        `Loopback adapter ${this.id} has no peer on network ${request.destination}`
      );
    }

    const sequence = this.nextSequence++;
    this.outbox.push({
      sequence,
      destination: request.destination,
      payload: request.payload.slice(),
      gasLimit: request.gasLimit,
      payment: request.payment,
    });

    return { adapter: this.id, reference: `loopback:${this.id}:${sequence}` };
  }

  async estimate(_destination: NetworkId, payload: Uint8Array, _gasLimit: bigint): Promise<bigint> {
    return this.baseFee + this.perByteFee * BigInt(payload.length);
  }

  attach(receiver: InboundReceiver): void {
    this.receiver = receiver;
  }

  /**
   * Entry point used by the connected peer.
   */
  async receive(source: NetworkId, payload: Uint8Array): Promise<void> {
    if (!this.receiver) {
      throw new ConfigurationError('ADAPTER_NOT_ATTACHED', `Loopback adapter ${this.id} has no receiver attached`);
    }
    await this.receiver(source, payload);
  }

  // ===========================================================================
  // Transport control (tests and local development)
  // ===========================================================================

  pending(): readonly LoopbackPacket[] {
    return this.outbox;
  }

  /**
   * Deliver the oldest queued frame to its peer.
   * Returns the delivered packet, or null when nothing is queued.
   */
  async deliverNext(): Promise<LoopbackPacket | null> {
    const packet = this.outbox.shift();
    if (!packet) return null;

    const peer = this.peers.get(packet.destination);
    if (!peer) {
      throw new ConfigurationError('LOOPBACK_NO_PEER', `No peer on network ${packet.destination}`);
    }
    await peer.receive(this.network, packet.payload);
    return packet;
  }

  async deliverAll(): Promise<number> {
    let delivered = 0;
    while (await this.deliverNext()) {
      delivered++;
    }
    return delivered;
  }

  /**
   * Silently lose the oldest queued frame.
   */
  drop(): LoopbackPacket | null {
    return this.outbox.shift() ?? null;
  }

  /**
   * Replace the payload of the oldest queued frame.
   */
  corruptNext(mutate: (payload: Uint8Array) => Uint8Array): void {
    const packet = this.outbox[0];
    if (packet) {
      packet.payload = mutate(packet.payload.slice());
    }
  }

  setOffline(offline: boolean): void {
    this.offline = offline;
  }
}
