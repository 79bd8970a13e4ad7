import { randomUUID } from 'crypto';
import { AdmissionGate, Logger, createLogger, createChildLogger, toError } from '@inbox-classifier/utils';
import { Email } from '../../types/email.js';
import { ClassificationCache } from '../../cache/classification-cache.js';
import { ClassificationErrorCode, IClassifierService } from '../classifier.js';
import {
  BatchItem,
  BatchOptions,
  BatchOutcome,
  BatchStats,
  DEFAULT_BATCH_CONCURRENCY,
  IBatchClassifier,
} from '../batch.js';

const logger = createLogger({ service: 'batch-classifier' });

export function summarizeBatch(items: readonly BatchItem[], elapsedMs: number): BatchStats {
  const stats: BatchStats = {
    total: items.length,
    successful: 0,
    failed: 0,
    cached: 0,
    categories: {},
    confidenceSum: 0,
    averageConfidence: 0,
    elapsedMs,
  };

  for (const item of items) {
    if (!item.classification) {
      stats.failed++;
      continue;
    }
    stats.successful++;
    if (item.cached) stats.cached++;
    const { category, confidence } = item.classification;
    stats.categories[category] = (stats.categories[category] ?? 0) + 1;
    stats.confidenceSum += confidence;
  }

  stats.averageConfidence = stats.successful > 0 ? stats.confidenceSum / stats.successful : 0;
  return stats;
}

/**
 * Fans a batch out over the classifier behind a counting admission gate.
 * Consults the cache before spending a model call and stores every success.
 */
export class BatchClassifier implements IBatchClassifier {
  constructor(
    private classifier: IClassifierService,
    private cache: ClassificationCache | null = null,
    private defaultConcurrency: number = DEFAULT_BATCH_CONCURRENCY
  ) {}

  async classifyBatch(emails: readonly Email[], options: BatchOptions = {}): Promise<BatchOutcome> {
    const concurrency = options.concurrency ?? this.defaultConcurrency;
    const log = createChildLogger(logger, { batchId: randomUUID() });
    const gate = new AdmissionGate(concurrency);
    const startTime = performance.now();

    log.info({ count: emails.length, concurrency }, 'Batch classifying emails');

    // One listener per batch; closing the gate settles every waiting slot
    const { signal } = options;
    const onAbort = (): void => gate.close();
    if (signal?.aborted) {
      gate.close();
    } else {
      signal?.addEventListener('abort', onAbort, { once: true });
    }

    let items: BatchItem[];
    try {
      // Each slot settles on its own; results line up with the input by index
      items = await Promise.all(emails.map((email) => this.classifySlot(email, gate, log)));
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }

    const stats = summarizeBatch(items, Math.round(performance.now() - startTime));
    log.info(
      {
        total: stats.total,
        successful: stats.successful,
        failed: stats.failed,
        cached: stats.cached,
        peakConcurrency: gate.getStats().peak,
        durationMs: stats.elapsedMs,
      },
      'Batch classification completed'
    );

    return { items, stats };
  }

  private async classifySlot(email: Email, gate: AdmissionGate, log: Logger): Promise<BatchItem> {
    const cached = this.fromCache(email, log);
    if (cached) {
      return cached;
    }

    try {
      const item = await gate.run(async (): Promise<BatchItem> => {
        // An earlier slot for the same id may have filled the cache while this one waited
        const filled = this.fromCache(email, log);
        if (filled) {
          return filled;
        }

        const result = await this.classifier.classify(email);
        if (!result.ok) {
          return { email, classification: null, error: result.error, cached: false };
        }

        this.cache?.put(email.id, result.value);
        return { email, classification: result.value, error: null, cached: false };
      });

      if (item === null) {
        log.info({ emailId: email.id }, 'Batch aborted, email not classified');
        return {
          email,
          classification: null,
          error: { code: ClassificationErrorCode.CANCELLED, message: 'Batch aborted before classification started' },
          cached: false,
        };
      }

      return item;
    } catch (e) {
      // classify() reports failures as values; a rejection here is a broken contract
      const error = toError(e);
      log.error({ emailId: email.id, err: error }, 'Classifier threw during batch');
      return {
        email,
        classification: null,
        error: { code: ClassificationErrorCode.UNEXPECTED, message: error.message },
        cached: false,
      };
    }
  }

  private fromCache(email: Email, log: Logger): BatchItem | null {
    const classification = this.cache?.get(email.id);
    if (!classification) {
      return null;
    }
    log.debug({ emailId: email.id }, 'Using cached classification');
    return { email, classification, error: null, cached: true };
  }
}

export function createBatchClassifier(
  classifier: IClassifierService,
  cache?: ClassificationCache,
  concurrency?: number
): BatchClassifier {
  return new BatchClassifier(classifier, cache ?? null, concurrency);
}
