import { Classification } from '../types/classification.js';

export const DEFAULT_CACHE_CAPACITY = 1000;

/**
 * In-memory classification cache keyed by email id, bounded with FIFO
 * eviction: when full, the oldest-inserted id goes first regardless of how
 * recently it was read.
 *
 * Re-putting an id overwrites its value but keeps its place in the eviction
 * order. Every operation is synchronous, so concurrent batch tasks never see
 * a half-applied eviction; racing puts for one id resolve last-write-wins.
 */
export class ClassificationCache {
  // Map iteration order is insertion order, which is the eviction order
  private readonly entries = new Map<string, Classification>();

  constructor(readonly capacity: number = DEFAULT_CACHE_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Cache capacity must be a positive integer, got ${capacity}`);
    }
  }

  get(emailId: string): Classification | undefined {
    return this.entries.get(emailId);
  }

  has(emailId: string): boolean {
    return this.entries.has(emailId);
  }

  put(emailId: string, classification: Classification): void {
    if (!this.entries.has(emailId) && this.entries.size >= this.capacity) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) {
        this.entries.delete(oldest.value);
      }
    }
    this.entries.set(emailId, classification);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}
