/**
 * PostgreSQL subsidy store.
 *
 * `debit` is a single conditional UPDATE, so the balance check and the
 * subtraction cannot interleave with another writer.
 */

import type { TenantId } from '../../boundaries/invariants.js';
import type { SubsidyAccount, SubsidyStore } from '../../hub/subsidy.js';
import type { Queryable } from './schema.js';
import { isRow, readInteger } from './schema.js';

export class PostgresSubsidyStore implements SubsidyStore {
  constructor(private readonly db: Queryable) {}

  async account(tenant: TenantId): Promise<SubsidyAccount> {
    const result = await this.db.query(
      'SELECT balance, refund FROM subsidy_accounts WHERE tenant = $1',
      [tenant.toString()]
    );
    const [row] = result.rows;
    if (row === undefined) {
      return { tenant, balance: 0n, refund: null };
    }
    if (!isRow(row)) {
      throw new Error('Unexpected subsidy_accounts row');
    }
    const refund = row.refund;
    return {
      tenant,
      balance: readInteger(row, 'balance'),
      refund: typeof refund === 'string' ? refund : null,
    };
  }

  async credit(tenant: TenantId, amount: bigint): Promise<bigint> {
    const result = await this.db.query(
      `INSERT INTO subsidy_accounts (tenant, balance) VALUES ($1, $2)
       ON CONFLICT (tenant) DO UPDATE SET balance = subsidy_accounts.balance + EXCLUDED.balance
       RETURNING balance`,
      [tenant.toString(), amount.toString()]
    );
    return balanceOf(result.rows);
  }

  async debit(tenant: TenantId, amount: bigint): Promise<bigint | null> {
    const result = await this.db.query(
      `UPDATE subsidy_accounts SET balance = balance - $2
       WHERE tenant = $1 AND balance >= $2
       RETURNING balance`,
      [tenant.toString(), amount.toString()]
    );
    if (result.rowCount === 0) {
      return null;
    }
    return balanceOf(result.rows);
  }

  async setRefund(tenant: TenantId, refund: string): Promise<void> {
    await this.db.query(
      `INSERT INTO subsidy_accounts (tenant, refund) VALUES ($1, $2)
       ON CONFLICT (tenant) DO UPDATE SET refund = EXCLUDED.refund`,
      [tenant.toString(), refund]
    );
  }
}

function balanceOf(rows: unknown[]): bigint {
  const [row] = rows;
  if (!isRow(row)) {
    throw new Error('Expected a balance row');
  }
  return readInteger(row, 'balance');
}
