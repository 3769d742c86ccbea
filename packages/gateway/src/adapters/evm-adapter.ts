/**
 * EVM Relay Adapter - ethers.js implementation
 *
 * Thin binding to a relay endpoint contract deployed on the local network.
 * The endpoint forwards bytes to its counterpart on the destination network
 * through whatever third-party relay network backs it, and emits
 * `MessageReceived` when bytes arrive from a remote network.
 *
 * Does NOT implement:
 * - retries (the quorum layer tolerates a missing leg)
 * - fee heuristics (the endpoint's own `estimate` is authoritative)
 */

import { Contract, JsonRpcProvider, Wallet, getBytes } from 'ethers';
import type { ContractRunner } from 'ethers';
import type { AdapterId, NetworkId } from '../boundaries/invariants.js';
import { networkId } from '../boundaries/invariants.js';
import type { Logger } from '../utils/logger.js';
import { SilentLogger } from '../utils/logger.js';
import type {
  AdapterReceipt,
  AdapterSendRequest,
  InboundReceiver,
  RelayAdapter,
} from './types.js';

// =============================================================================
// RELAY ENDPOINT ABI (minimal, only what we need)
// =============================================================================

const RELAY_ENDPOINT_ABI = [
  'function send(uint16 destination, bytes payload, uint256 gasLimit, address refund) payable returns (bytes32 messageId)',
  'function estimate(uint16 destination, bytes payload, uint256 gasLimit) view returns (uint256)',
  'event MessageReceived(uint16 indexed source, bytes payload)',
];

// =============================================================================
// EVM RELAY ADAPTER
// =============================================================================

export class EvmRelayAdapter implements RelayAdapter {
  readonly id: AdapterId;
  private contract: Contract;
  private logger: Logger;
  private listening: boolean = false;

  constructor(
    id: AdapterId,
    endpointAddress: string,
    runner: ContractRunner,
    logger: Logger = new SilentLogger()
  ) {
    this.id = id;
    this.contract = new Contract(endpointAddress, RELAY_ENDPOINT_ABI, runner);
    this.logger = logger.child({ adapter: id });
  }

  async send(request: AdapterSendRequest): Promise<AdapterReceipt> {
    const tx: unknown = await this.contract.getFunction('send')(
      request.destination,
      request.payload,
      request.gasLimit,
      request.refund,
      { value: request.payment }
    );

    if (typeof tx !== 'object' || tx === null || !('hash' in tx) || typeof tx.hash !== 'string') {
      throw new Error(`Relay endpoint for ${this.id} returned no transaction`);
    }

    return { adapter: this.id, reference: tx.hash };
  }

  async estimate(destination: NetworkId, payload: Uint8Array, gasLimit: bigint): Promise<bigint> {
    const fee: unknown = await this.contract.getFunction('estimate')(destination, payload, gasLimit);
    if (typeof fee !== 'bigint') {
      throw new Error(`Relay endpoint for ${this.id} returned a non-integer estimate`);
    }
    return fee;
  }

  /**
   * Subscribe to `MessageReceived`. Receiver errors are logged; the quorum
   * layer has already rejected the frame and there is no caller to return to.
   */
  attach(receiver: InboundReceiver): void {
    const subscribe = async (): Promise<void> => {
      if (this.listening) {
        await this.contract.removeAllListeners('MessageReceived');
      }
      await this.contract.on('MessageReceived', (source: bigint, payload: string) => {
        Promise.resolve()
          .then(() => receiver(networkId(Number(source)), getBytes(payload)))
          .catch((error: unknown) => {
            this.logger.error({ network: Number(source), error }, 'Inbound frame rejected');
          });
      });
      this.listening = true;
    };

    subscribe().catch((error: unknown) => {
      this.logger.error({ error }, 'Failed to subscribe to relay endpoint');
    });
  }

  async detach(): Promise<void> {
    await this.contract.removeAllListeners('MessageReceived');
    this.listening = false;
  }
}

// =============================================================================
// FACTORY FUNCTION
// =============================================================================

/**
 * Create an EVM relay adapter signing with a private key.
 */
export function createEvmRelayAdapter(
  id: AdapterId,
  rpcUrl: string,
  endpointAddress: string,
  privateKey: string,
  logger?: Logger
): EvmRelayAdapter {
  const provider = new JsonRpcProvider(rpcUrl);
  const wallet = new Wallet(privateKey, provider);
  return new EvmRelayAdapter(id, endpointAddress, wallet, logger);
}
