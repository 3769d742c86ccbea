/**
 * Outbound Hub Module
 */

export type {
  MessageHandler,
  BatchScope,
  PendingBatch,
  FlushReceipt,
  BatchResult,
  HeldBatch,
  FailedMessage,
  RetryResult,
} from './types.js';

export type { GatewayOptions } from './gateway.js';
export { Gateway } from './gateway.js';

export type { SubsidyAccount, SubsidyStore } from './subsidy.js';
export { InMemorySubsidyStore } from './subsidy.js';

export type { GasService, GasTable } from './gas.js';
export { FlatGasService, TableGasService, DEFAULT_MESSAGE_GAS, DEFAULT_MAX_BATCH_GAS_LIMIT } from './gas.js';

export type { HeldBatchStore } from './held.js';
export { InMemoryHeldBatchStore } from './held.js';

export type { FailedMessageStore } from './failures.js';
export { InMemoryFailedMessageStore, messageHash } from './failures.js';
