import { Email } from '../types/email.js';
import { Classification } from '../types/classification.js';
import { ClassificationError } from './classifier.js';

export const DEFAULT_BATCH_CONCURRENCY = 5;

// One slot of a batch, in input order
export interface BatchItem {
  email: Email;
  classification: Classification | null;
  error: ClassificationError | null;
  // Answered from the cache without a model call
  cached: boolean;
}

export interface BatchStats {
  total: number;
  successful: number;
  failed: number;
  cached: number;
  categories: Record<string, number>;
  confidenceSum: number;
  averageConfidence: number;
  elapsedMs: number;
}

export interface BatchOutcome {
  items: BatchItem[];
  stats: BatchStats;
}

export interface BatchOptions {
  // Maximum model calls in flight at once
  concurrency?: number;
  // Stops admitting new calls once aborted; in-flight calls run to completion
  signal?: AbortSignal;
}

export interface IBatchClassifier {
  /**
   * Classify every email with bounded concurrency. A failure only empties its
   * own slot; the batch settles once every slot has an outcome.
   */
  classifyBatch(emails: readonly Email[], options?: BatchOptions): Promise<BatchOutcome>;
}
