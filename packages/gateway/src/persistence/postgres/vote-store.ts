/**
 * PostgreSQL vote store.
 *
 * Delivered rows keep their hash forever (replay detection) but drop the
 * payload.
 */

import type { NetworkId, PayloadHash } from '../../boundaries/invariants.js';
import { adapterId, payloadHash } from '../../boundaries/invariants.js';
import type { VoteStore } from '../../multi-adapter/persistence.js';
import type { VoteRecord } from '../../multi-adapter/types.js';
import type { Queryable } from './schema.js';
import { isRow, readBytes, readInteger, readString, readStringArray } from './schema.js';

const COLUMNS = 'hash, status, voters, payload, first_seen_at, delivered_at';

export class PostgresVoteStore implements VoteStore {
  constructor(private readonly db: Queryable) {}

  async load(source: NetworkId, hash: PayloadHash): Promise<VoteRecord | null> {
    const result = await this.db.query(
      `SELECT ${COLUMNS} FROM vote_records WHERE source = $1 AND hash = $2`,
      [source, hash]
    );
    const [row] = result.rows;
    return row === undefined ? null : toRecord(row);
  }

  async save(source: NetworkId, record: VoteRecord): Promise<void> {
    const payload = record.status === 'pending' && record.payload ? Buffer.from(record.payload) : null;
    const deliveredAt = record.status === 'delivered' ? record.deliveredAt : null;

    await this.db.query(
      `INSERT INTO vote_records (source, hash, status, voters, payload, first_seen_at, delivered_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7)
       ON CONFLICT (source, hash) DO UPDATE SET
         status = EXCLUDED.status,
         voters = EXCLUDED.voters,
         payload = EXCLUDED.payload,
         delivered_at = EXCLUDED.delivered_at`,
      [source, record.hash, record.status, record.voters, payload, record.firstSeenAt, deliveredAt]
    );
  }

  async findUndelivered(source: NetworkId): Promise<VoteRecord[]> {
    const result = await this.db.query(
      `SELECT ${COLUMNS} FROM vote_records
       WHERE source = $1 AND status <> 'delivered'
       ORDER BY first_seen_at ASC`,
      [source]
    );
    return result.rows.map(toRecord);
  }
}

function toRecord(row: unknown): VoteRecord {
  if (!isRow(row)) {
    throw new Error('Unexpected vote_records row');
  }

  const hash = payloadHash(readString(row, 'hash'));
  const voters = readStringArray(row, 'voters').map(adapterId);
  const firstSeenAt = Number(readInteger(row, 'first_seen_at'));
  const status = readString(row, 'status');

  switch (status) {
    case 'pending':
      return { status, hash, voters, payload: readBytes(row, 'payload'), firstSeenAt };
    case 'awaiting_payload':
      return { status, hash, voters, firstSeenAt };
    case 'delivered':
      return { status, hash, voters, firstSeenAt, deliveredAt: Number(readInteger(row, 'delivered_at')) };
    default:
      throw new Error(`Unknown vote status: ${status}`);
  }
}
