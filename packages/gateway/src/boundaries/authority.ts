/**
 * Ward registry.
 *
 * A ward may rely (grant) or deny (revoke) other callers. Registrations,
 * refund addresses, outgoing blocks, withdrawals and manual recovery all go
 * through `requireWard`.
 */

import type { Caller } from './invariants.js';
import { ConfigurationError, UnauthorizedError } from './errors.js';

export class WardRegistry {
  private wards: Set<Caller>;

  constructor(initialWards: Iterable<Caller>) {
    this.wards = new Set(initialWards);
    if (this.wards.size === 0) {
      throw new ConfigurationError('NO_WARDS', 'At least one ward is required');
    }
  }

  isWard(who: Caller): boolean {
    return this.wards.has(who);
  }

  requireWard(who: Caller, action: string): void {
    if (!this.wards.has(who)) {
      throw new UnauthorizedError(who, action);
    }
  }

  rely(by: Caller, who: Caller): void {
    this.requireWard(by, 'rely');
    this.wards.add(who);
  }

  deny(by: Caller, who: Caller): void {
    this.requireWard(by, 'deny');
    if (this.wards.size === 1 && this.wards.has(who)) {
      throw new ConfigurationError('LAST_WARD', 'Cannot deny the last remaining ward');
    }
    this.wards.delete(who);
  }

  list(): Caller[] {
    return Array.from(this.wards);
  }
}
