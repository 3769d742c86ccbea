/**
 * Relay error taxonomy.
 *
 * Every error thrown across a public entry point carries a stable `code` and a
 * `category`. Liveness failures (quorum never reached) are not errors; they are
 * visible only through vote inspection.
 */

import type { AdapterId, NetworkId, TenantId } from './invariants.js';

export type ErrorCategory =
  | 'CONFIGURATION'  // Unknown destination, bad registration, blocked route
  | 'AUTHORIZATION'  // Caller is not a ward, adapter not registered
  | 'FUNDING'        // Subsidy cannot cover the quoted cost
  | 'FRAMING'        // Malformed wire bytes
  | 'TRANSPORT';     // Adapter failed or timed out

export abstract class RelayError extends Error {
  abstract readonly category: ErrorCategory;

  constructor(
    public readonly code: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

// =============================================================================
// CONFIGURATION
// =============================================================================

export class ConfigurationError extends RelayError {
  readonly category = 'CONFIGURATION';
}

export class UnknownDestinationError extends ConfigurationError {
  constructor(
    public readonly destination: NetworkId,
    public readonly tenant: TenantId
  ) {
    super('UNKNOWN_DESTINATION', `No adapters registered for network ${destination} (tenant ${tenant})`);
  }
}

export class OutgoingBlockedError extends ConfigurationError {
  constructor(
    public readonly destination: NetworkId,
    public readonly tenant: TenantId
  ) {
    super('OUTGOING_BLOCKED', `Outgoing messages to network ${destination} are blocked for tenant ${tenant}`);
  }
}

export class BatchGasLimitError extends ConfigurationError {
  constructor(
    public readonly destination: NetworkId,
    public readonly gasLimit: bigint,
    public readonly maxGasLimit: bigint
  ) {
    super(
      'BATCH_GAS_LIMIT_EXCEEDED',
      `Batch for network ${destination} needs ${gasLimit} gas, limit is ${maxGasLimit}`
    );
  }
}

// =============================================================================
// AUTHORIZATION
// =============================================================================

export class UnauthorizedError extends RelayError {
  readonly category = 'AUTHORIZATION';

  constructor(
    public readonly caller: string,
    public readonly action: string
  ) {
    super('NOT_AUTHORIZED', `${caller} is not authorized to ${action}`);
  }
}

export class UnauthorizedAdapterError extends RelayError {
  readonly category = 'AUTHORIZATION';

  constructor(
    public readonly adapter: AdapterId,
    public readonly source: NetworkId
  ) {
    super('UNKNOWN_ADAPTER', `Adapter ${adapter} is not registered for network ${source}`);
  }
}

// =============================================================================
// FUNDING
// =============================================================================

export class InsufficientSubsidyError extends RelayError {
  readonly category = 'FUNDING';

  constructor(
    public readonly tenant: TenantId,
    public readonly required: bigint,
    public readonly available: bigint,
    public readonly heldBatchIds: readonly string[] = []
  ) {
    super(
      'INSUFFICIENT_SUBSIDY',
      `Tenant ${tenant} needs ${required} but has ${available}`
    );
  }
}

// =============================================================================
// FRAMING
// =============================================================================

export type FramingErrorCode =
  | 'EMPTY_BATCH'
  | 'EMPTY_MESSAGE'
  | 'MESSAGE_TOO_LARGE'
  | 'TRUNCATED_PREFIX'
  | 'TRUNCATED_PAYLOAD'
  | 'MALFORMED_PROOF'
  | 'UNEXPECTED_PROOF';

export class FramingError extends RelayError {
  readonly category = 'FRAMING';

  constructor(code: FramingErrorCode, message: string) {
    super(code, message);
  }
}

// =============================================================================
// TRANSPORT
// =============================================================================

export class AdapterSendError extends RelayError {
  readonly category = 'TRANSPORT';

  constructor(
    public readonly adapter: AdapterId,
    public readonly delivered: readonly AdapterId[],
    cause: unknown
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('ADAPTER_SEND_FAILED', `Adapter ${adapter} failed to send: ${reason}`, { cause });
  }
}

export class AdapterTimeoutError extends RelayError {
  readonly category = 'TRANSPORT';

  constructor(
    public readonly adapter: AdapterId,
    public readonly operation: string,
    public readonly timeoutMs: number
  ) {
    super('ADAPTER_TIMEOUT', `Adapter ${adapter} timed out on ${operation} after ${timeoutMs}ms`);
  }
}

export function isRelayError(error: unknown): error is RelayError {
  return error instanceof RelayError;
}
