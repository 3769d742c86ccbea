/**
 * Gas bookkeeping for outbound batches.
 *
 * A batch's gas limit is the sum of its sub-messages' gas. This is budget
 * arithmetic only; real execution cost is the transports' concern.
 */

import type { NetworkId } from '../boundaries/invariants.js';
import { messageKind } from '../codec/codec.js';

export interface GasService {
  messageGas(destination: NetworkId, message: Uint8Array): bigint;
}

/**
 * Same base cost for every sub-message, plus an optional per-byte cost.
 */
export class FlatGasService implements GasService {
  constructor(
    private readonly perMessage: bigint,
    private readonly perByte: bigint = 0n
  ) {}

  messageGas(_destination: NetworkId, message: Uint8Array): bigint {
    return this.perMessage + this.perByte * BigInt(message.length);
  }
}

export interface GasTable {
  baseCost: bigint;
  /** Charged for kinds missing from `kinds`. */
  defaultCost: bigint;
  kinds: ReadonlyMap<number, bigint>;
}

/**
 * Base cost plus an amount looked up by the sub-message's kind byte.
 */
export class TableGasService implements GasService {
  constructor(private readonly table: GasTable) {}

  messageGas(_destination: NetworkId, message: Uint8Array): bigint {
    const kind = messageKind(message);
    return this.table.baseCost + (this.table.kinds.get(kind) ?? this.table.defaultCost);
  }
}

export const DEFAULT_MESSAGE_GAS = 200_000n;
export const DEFAULT_MAX_BATCH_GAS_LIMIT = 10_000_000n;
