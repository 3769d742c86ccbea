/**
 * Vote Record Persistence
 *
 * Written only by the router's inbound path, always under the per-source
 * serial lock, so implementations need no locking of their own.
 */

import type { NetworkId, PayloadHash } from '../boundaries/invariants.js';
import type { VoteRecord } from './types.js';

// =============================================================================
// PERSISTENCE INTERFACE
// =============================================================================

export interface VoteStore {
  /**
   * Load the record for (source, hash). Returns null if never seen.
   */
  load(source: NetworkId, hash: PayloadHash): Promise<VoteRecord | null>;

  /**
   * Insert or replace the record for (source, record.hash).
   */
  save(source: NetworkId, record: VoteRecord): Promise<void>;

  /**
   * All records for `source` that are not delivered, oldest first.
   */
  findUndelivered(source: NetworkId): Promise<VoteRecord[]>;
}

// =============================================================================
// IN-MEMORY IMPLEMENTATION
// =============================================================================

/**
 * In-memory vote store.
 *
 * WARNING: Data is lost on restart, including delivered hashes, so a replayed
 * batch would be delivered again. Production should use PostgreSQL.
 */
export class InMemoryVoteStore implements VoteStore {
  private records: Map<string, VoteRecord> = new Map();

  private key(source: NetworkId, hash: PayloadHash): string {
    return `${source}:${hash}`;
  }

  async load(source: NetworkId, hash: PayloadHash): Promise<VoteRecord | null> {
    const record = this.records.get(this.key(source, hash));
    // Return clone to prevent external mutation
    return record ? structuredClone(record) : null;
  }

  async save(source: NetworkId, record: VoteRecord): Promise<void> {
    this.records.set(this.key(source, record.hash), structuredClone(record));
  }

  async findUndelivered(source: NetworkId): Promise<VoteRecord[]> {
    const prefix = `${source}:`;
    const results: VoteRecord[] = [];
    for (const [key, record] of this.records) {
      if (key.startsWith(prefix) && record.status !== 'delivered') {
        results.push(structuredClone(record));
      }
    }
    return results.sort((a, b) => a.firstSeenAt - b.firstSeenAt);
  }
}
