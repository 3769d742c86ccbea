/**
 * Held batch storage.
 */

import type { HeldBatch } from './types.js';

export interface HeldBatchStore {
  add(batch: HeldBatch): Promise<void>;
  get(id: string): Promise<HeldBatch | null>;
  remove(id: string): Promise<void>;
  /** Oldest first */
  list(): Promise<HeldBatch[]>;
}

export class InMemoryHeldBatchStore implements HeldBatchStore {
  private batches: Map<string, HeldBatch> = new Map();

  async add(batch: HeldBatch): Promise<void> {
    this.batches.set(batch.id, { ...batch, batch: batch.batch.slice() });
  }

  async get(id: string): Promise<HeldBatch | null> {
    const batch = this.batches.get(id);
    return batch ? { ...batch, batch: batch.batch.slice() } : null;
  }

  async remove(id: string): Promise<void> {
    this.batches.delete(id);
  }

  async list(): Promise<HeldBatch[]> {
    return Array.from(this.batches.values())
      .map((batch) => ({ ...batch, batch: batch.batch.slice() }))
      .sort((a, b) => a.createdAt - b.createdAt);
  }
}
