/**
 * PostgreSQL schema for vote records and subsidy balances.
 *
 * Amounts are NUMERIC(78, 0) so any uint256 fits; timestamps are epoch
 * milliseconds. pg returns both as strings.
 */

/**
 * The subset of `pg.Pool` / `pg.PoolClient` the stores use.
 */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[]; rowCount: number | null }>;
}

export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS vote_records (
  source        INTEGER      NOT NULL,
  hash          CHAR(66)     NOT NULL,
  status        TEXT         NOT NULL CHECK (status IN ('pending', 'awaiting_payload', 'delivered')),
  voters        TEXT[]       NOT NULL DEFAULT '{}',
  payload       BYTEA,
  first_seen_at BIGINT       NOT NULL,
  delivered_at  BIGINT,
  PRIMARY KEY (source, hash)
);

CREATE INDEX IF NOT EXISTS vote_records_undelivered
  ON vote_records (source, first_seen_at)
  WHERE status <> 'delivered';

CREATE TABLE IF NOT EXISTS subsidy_accounts (
  tenant   NUMERIC(20, 0) PRIMARY KEY,
  balance  NUMERIC(78, 0) NOT NULL DEFAULT 0 CHECK (balance >= 0),
  refund   TEXT
);
`;

export async function ensureSchema(db: Queryable): Promise<void> {
  await db.query(SCHEMA_SQL);
}

// =============================================================================
// ROW HELPERS
// =============================================================================

export function isRow(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

export function readString(row: Record<string, unknown>, column: string): string {
  const value = row[column];
  if (typeof value !== 'string') {
    throw new Error(`Column ${column} is not text`);
  }
  return value;
}

/**
 * BIGINT and NUMERIC columns arrive as strings, INTEGER as number.
 */
export function readInteger(row: Record<string, unknown>, column: string): bigint {
  const value = row[column];
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'bigint') {
    return BigInt(value);
  }
  throw new Error(`Column ${column} is not an integer`);
}

export function readBytes(row: Record<string, unknown>, column: string): Uint8Array | null {
  const value = row[column];
  if (value === null || value === undefined) return null;
  if (value instanceof Uint8Array) {
    return new Uint8Array(value);
  }
  throw new Error(`Column ${column} is not bytea`);
}

export function readStringArray(row: Record<string, unknown>, column: string): string[] {
  const value = row[column];
  if (!Array.isArray(value)) {
    throw new Error(`Column ${column} is not an array`);
  }
  return value.map((item) => {
    if (typeof item !== 'string') {
      throw new Error(`Column ${column} contains a non-text element`);
    }
    return item;
  });
}
