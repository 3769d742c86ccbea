/**
 * Quorum Router Module
 */

export type {
  RegistrationParams,
  AdapterRegistration,
  VoteRecord,
  VoteStatus,
  VoteView,
  HandleOutcome,
  InboundBatchHandler,
  TenantResolver,
  QuoteLeg,
  RelayQuote,
  SendReceipt,
  OutboundRouter,
} from './types.js';

export { MAX_ADAPTER_COUNT } from './types.js';

export type { VoteStore } from './persistence.js';
export { InMemoryVoteStore } from './persistence.js';

export type { MultiAdapterOptions } from './multi-adapter.js';
export { MultiAdapter } from './multi-adapter.js';
