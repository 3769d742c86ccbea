/**
 * Relay Boundaries Module
 *
 * Exports branded identifiers, the error taxonomy and the ward registry.
 */

// Type-only exports (interfaces don't exist at runtime)
export type {
  NetworkId,
  TenantId,
  AdapterId,
  PayloadHash,
  Caller,
} from './invariants.js';

export type { ErrorCategory, FramingErrorCode } from './errors.js';

// Value exports (exist at runtime)
export {
  // Type constructors
  networkId,
  tenantId,
  adapterId,
  payloadHash,
  caller,
  GLOBAL_TENANT,
  MAX_NETWORK_ID,
  MAX_TENANT_ID,

  // Assertions
  InvariantViolation,
  assertPositiveAmount,
} from './invariants.js';

export {
  RelayError,
  ConfigurationError,
  UnknownDestinationError,
  OutgoingBlockedError,
  BatchGasLimitError,
  UnauthorizedError,
  UnauthorizedAdapterError,
  InsufficientSubsidyError,
  FramingError,
  AdapterSendError,
  AdapterTimeoutError,
  isRelayError,
} from './errors.js';

export { WardRegistry } from './authority.js';
