/**
 * Relay Boundary Invariants
 *
 * Types, guards, and assertions that enforce the relay's hard constraints at
 * compile-time and runtime.
 *
 * These invariants are NON-NEGOTIABLE:
 *
 * 1. Adapters are untrusted for content, trusted-by-configuration for identity
 * 2. Only wards may rewrite adapter registrations or withdraw subsidy
 * 3. A batch is forwarded at most once per (source network, hash)
 * 4. Forwarding requires hash agreement from a quorum of distinct adapters
 * 5. Manual recovery supplies payload, never trust
 */

// =============================================================================
// BRANDED TYPES (Compile-time enforcement)
// =============================================================================

declare const __brand: unique symbol;
type Brand<T, B> = T & { readonly [__brand]: B };

/**
 * Ledger network identifier (uint16 on the wire, 0 is reserved).
 */
export type NetworkId = Brand<number, 'NetworkId'>;

/**
 * Tenant identifier (uint64). Tenant 0 owns the global registration.
 */
export type TenantId = Brand<bigint, 'TenantId'>;

/**
 * Adapter identity as configured by a ward. Never taken from an inbound frame.
 */
export type AdapterId = Brand<string, 'AdapterId'>;

/**
 * keccak256 of a batch, lowercase 0x-prefixed hex.
 */
export type PayloadHash = Brand<string, 'PayloadHash'>;

/**
 * Identity of whoever invokes an authorized entry point.
 */
export type Caller = Brand<string, 'Caller'>;

export const MAX_NETWORK_ID = 0xffff;
export const MAX_TENANT_ID = (1n << 64n) - 1n;

export function networkId(raw: number): NetworkId {
  if (!Number.isInteger(raw) || raw < 1 || raw > MAX_NETWORK_ID) {
    throw new InvariantViolation('NETWORK_ID', `Network id must be an integer in [1, ${MAX_NETWORK_ID}], got ${raw}`);
  }
  return raw as NetworkId;
}

export function tenantId(raw: bigint | number | string): TenantId {
  let value: bigint;
  try {
    value = BigInt(raw);
  } catch {
    throw new InvariantViolation('TENANT_ID', `Tenant id is not an integer: ${String(raw)}`);
  }
  if (value < 0n || value > MAX_TENANT_ID) {
    throw new InvariantViolation('TENANT_ID', `Tenant id must fit in uint64, got ${value}`);
  }
  return value as TenantId;
}

export const GLOBAL_TENANT: TenantId = tenantId(0n);

export function adapterId(raw: string): AdapterId {
  assertNonEmpty(raw, 'Adapter id');
  return raw as AdapterId;
}

export function payloadHash(raw: string): PayloadHash {
  assertNonEmpty(raw, 'Payload hash');
  if (!/^0x[a-fA-F0-9]{64}$/.test(raw)) {
    throw new InvariantViolation('PAYLOAD_HASH', 'Payload hash must be 32 bytes of 0x-prefixed hex');
  }
  return raw.toLowerCase() as PayloadHash;
}

export function caller(raw: string): Caller {
  assertNonEmpty(raw, 'Caller');
  return raw.toLowerCase() as Caller;
}

// =============================================================================
// ASSERTIONS (Runtime enforcement)
// =============================================================================

/**
 * Invariant violation error.
 * If this is thrown, a non-negotiable constraint was violated.
 */
export class InvariantViolation extends Error {
  constructor(
    public readonly invariant: string,
    public readonly details: string
  ) {
    super(`INVARIANT VIOLATION: ${invariant}: ${details}`);
    this.name = 'InvariantViolation';
  }
}

function assertNonEmpty(value: string, name: string): void {
  if (!value || value.trim() === '') {
    throw new InvariantViolation('NON_EMPTY', `${name} must not be empty`);
  }
}

/**
 * Assert that an amount of native currency is strictly positive.
 */
export function assertPositiveAmount(amount: bigint, name: string): void {
  if (amount <= 0n) {
    throw new InvariantViolation('POSITIVE_AMOUNT', `${name} must be greater than zero, got ${amount}`);
  }
}
