import { compositeKey } from '../types/asset.types.js';

/**
 * Set of (jobId, id) pairs with an atomic check-and-insert.
 *
 * Entries are grouped by job so a whole job can be dropped at once.
 */
class JobScopedLedger {
  private entries = new Map<string, Set<string>>();

  /**
   * Record the pair; returns true if it was not present before
   */
  markAndCheck(jobId: string, id: string): boolean {
    let ids = this.entries.get(jobId);
    if (!ids) {
      ids = new Set();
      this.entries.set(jobId, ids);
    }
    if (ids.has(id)) {
      return false;
    }
    ids.add(id);
    return true;
  }

  has(jobId: string, id: string): boolean {
    return this.entries.get(jobId)?.has(id) ?? false;
  }

  forget(jobId: string, id: string): void {
    const ids = this.entries.get(jobId);
    if (!ids) return;
    ids.delete(id);
    if (ids.size === 0) {
      this.entries.delete(jobId);
    }
  }

  clearJob(jobId: string): void {
    this.entries.delete(jobId);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    let total = 0;
    for (const ids of this.entries.values()) {
      total += ids.size;
    }
    return total;
  }
}

/**
 * Assets already accepted per job. Guards counting against redelivered
 * item-ready events.
 */
export class ProcessedAssetLedger extends JobScopedLedger {}

/**
 * Batch-announced event ids already accepted per job
 */
export class ProcessedBatchEventLedger extends JobScopedLedger {}

/**
 * Keys for which a completion or batch-transition event has been handed to
 * the bus. Never cleared by per-job cleanup.
 */
export class CompletionEmissionLedger {
  private keys = new Set<string>();

  /**
   * Claim a key; returns false if it was already claimed
   */
  claim(...parts: string[]): boolean {
    const key = compositeKey(...parts);
    if (this.keys.has(key)) {
      return false;
    }
    this.keys.add(key);
    return true;
  }

  has(...parts: string[]): boolean {
    return this.keys.has(compositeKey(...parts));
  }

  /**
   * Give a claim back after the publish it guarded failed
   */
  release(...parts: string[]): void {
    this.keys.delete(compositeKey(...parts));
  }

  clear(): void {
    this.keys.clear();
  }

  get size(): number {
    return this.keys.size;
  }
}
