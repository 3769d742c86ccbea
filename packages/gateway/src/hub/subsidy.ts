/**
 * Subsidy Ledger
 *
 * Per-tenant native-currency budget that pays for relaying.
 *
 * Invariants:
 * - Balances never go negative; `debit` refuses instead
 * - Only the hub debits, and only after a send succeeded
 */

import type { TenantId } from '../boundaries/invariants.js';

export interface SubsidyAccount {
  tenant: TenantId;
  balance: bigint;
  /** Where adapters return unspent relay cost. null = hub default. */
  refund: string | null;
}

// =============================================================================
// PERSISTENCE INTERFACE
// =============================================================================

export interface SubsidyStore {
  /**
   * Account for `tenant`. A tenant never seen has a zero balance.
   */
  account(tenant: TenantId): Promise<SubsidyAccount>;

  /**
   * Add `amount` and return the new balance.
   */
  credit(tenant: TenantId, amount: bigint): Promise<bigint>;

  /**
   * Subtract `amount` if the balance covers it.
   * Returns the new balance, or null (and changes nothing) if it does not.
   */
  debit(tenant: TenantId, amount: bigint): Promise<bigint | null>;

  setRefund(tenant: TenantId, refund: string): Promise<void>;
}

// =============================================================================
// IN-MEMORY IMPLEMENTATION
// =============================================================================

/**
 * WARNING: Balances are lost on restart. Production should use PostgreSQL.
 */
export class InMemorySubsidyStore implements SubsidyStore {
  private accounts: Map<TenantId, SubsidyAccount> = new Map();

  // Every read-modify-write below runs without yielding, so overlapping
  // calls cannot overwrite each other.
  private current(tenant: TenantId): SubsidyAccount {
    let account = this.accounts.get(tenant);
    if (!account) {
      account = { tenant, balance: 0n, refund: null };
      this.accounts.set(tenant, account);
    }
    return account;
  }

  async account(tenant: TenantId): Promise<SubsidyAccount> {
    const account = this.accounts.get(tenant);
    return account ? { ...account } : { tenant, balance: 0n, refund: null };
  }

  async credit(tenant: TenantId, amount: bigint): Promise<bigint> {
    const account = this.current(tenant);
    account.balance += amount;
    return account.balance;
  }

  async debit(tenant: TenantId, amount: bigint): Promise<bigint | null> {
    const account = this.current(tenant);
    if (account.balance < amount) {
      return null;
    }
    account.balance -= amount;
    return account.balance;
  }

  async setRefund(tenant: TenantId, refund: string): Promise<void> {
    this.current(tenant).refund = refund;
  }
}
