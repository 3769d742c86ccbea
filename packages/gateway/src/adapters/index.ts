/**
 * Relay Adapters
 *
 * The adapter contract plus the bindings shipped with the core:
 * - EVM relay endpoint (ethers.js)
 * - Loopback (in-process)
 */

// Type-only exports
export type {
  AdapterSendRequest,
  AdapterReceipt,
  InboundReceiver,
  RelayAdapter,
} from './types.js';
export type { LoopbackPacket } from './loopback-adapter.js';

// Value exports
export { EvmRelayAdapter, createEvmRelayAdapter } from './evm-adapter.js';
export { LoopbackAdapter } from './loopback-adapter.js';
