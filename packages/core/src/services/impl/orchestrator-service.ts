import { randomUUID } from 'crypto';
import { Result, ok, err, Logger, createLogger, createChildLogger, toError, withTiming } from '@inbox-classifier/utils';
import { Email } from '../../types/email.js';
import { Taxonomy } from '../../types/taxonomy.js';
import { isAlreadyClassified, sanitizeLabels, toLabelName } from '../../labels/label-names.js';
import { BatchItem, BatchStats, IBatchClassifier } from '../batch.js';
import { MailboxFetcher, MailboxLabeler } from '../mailbox.js';
import {
  IClassificationOrchestrator,
  OrchestratorError,
  OrchestratorErrorCode,
  OrchestratorStatus,
  RunOptions,
  RunReport,
} from '../orchestrator.js';

const logger = createLogger({ service: 'orchestrator' });

export interface OrchestratorSettings {
  concurrency: number;
  maxEmailsPerRun: number;
  autoApplyLabels: boolean;
  applyExtraLabels: boolean;
}

interface LabelTally {
  applied: number;
  failed: number;
}

/**
 * One classification run: fetch recent mail, skip what is already labeled,
 * classify the rest as a batch, then write the category labels back.
 */
export class ClassificationOrchestrator implements IClassificationOrchestrator {
  private status: OrchestratorStatus = OrchestratorStatus.IDLE;

  constructor(
    private taxonomy: Taxonomy,
    private batchClassifier: IBatchClassifier,
    private fetcher: MailboxFetcher,
    private labeler: MailboxLabeler,
    private settings: OrchestratorSettings
  ) {}

  getStatus(): OrchestratorStatus {
    return this.status;
  }

  async run(options: RunOptions = {}): Promise<Result<RunReport, OrchestratorError>> {
    const runId = randomUUID();
    const log = createChildLogger(logger, { runId });
    const limit = options.limit ?? this.settings.maxEmailsPerRun;

    this.status = OrchestratorStatus.FETCHING;
    let fetched: Email[];
    try {
      // Over-fetch so that skipping labeled mail still leaves `limit` candidates
      fetched = await withTiming(log, 'fetch emails', () =>
        this.fetcher.fetchRecent(limit * 2, options.filter)
      );
    } catch (e) {
      const error = toError(e);
      this.status = OrchestratorStatus.ERROR;
      return err({
        code: OrchestratorErrorCode.FETCH_ERROR,
        message: `Failed to fetch emails: ${error.message}`,
      });
    }

    const candidates = fetched.filter((email) => !isAlreadyClassified(email, this.taxonomy));
    const toClassify = candidates.slice(0, limit);
    log.info(
      { fetched: fetched.length, alreadyClassified: fetched.length - candidates.length, toClassify: toClassify.length },
      'Selected emails for classification'
    );

    const tally: LabelTally = { applied: 0, failed: 0 };
    let stats: BatchStats;
    try {
      this.status = OrchestratorStatus.CLASSIFYING;
      const outcome = await this.batchClassifier.classifyBatch(toClassify, {
        concurrency: this.settings.concurrency,
        ...(options.signal ? { signal: options.signal } : {}),
      });
      stats = outcome.stats;

      if (this.settings.autoApplyLabels) {
        this.status = OrchestratorStatus.APPLYING;
        await this.applyLabels(outcome.items, tally, log, options.signal);
      }
    } catch (e) {
      // Contract violations (such as an invalid concurrency) still propagate
      this.status = OrchestratorStatus.ERROR;
      log.error({ err: toError(e) }, 'Classification run failed');
      throw e;
    }

    this.status = OrchestratorStatus.COMPLETED;
    const report: RunReport = {
      runId,
      fetched: fetched.length,
      alreadyClassified: fetched.length - candidates.length,
      batch: stats,
      labelsApplied: tally.applied,
      labelFailures: tally.failed,
    };
    log.info(
      {
        classified: stats.successful,
        failed: stats.failed,
        labelsApplied: tally.applied,
        labelFailures: tally.failed,
      },
      'Classification run completed'
    );

    return ok(report);
  }

  // Sequential on purpose: one label write at a time per mailbox
  private async applyLabels(
    items: readonly BatchItem[],
    tally: LabelTally,
    log: Logger,
    signal: AbortSignal | undefined
  ): Promise<void> {
    for (const item of items) {
      if (signal?.aborted) {
        log.info('Run aborted, skipping remaining label writes');
        return;
      }
      if (!item.classification) continue;

      const names = [toLabelName(item.classification.category)];
      if (this.settings.applyExtraLabels) {
        names.push(...sanitizeLabels(item.classification.labels));
      }

      for (const name of names) {
        await this.applyLabel(item.email.id, name, tally, log);
      }
    }
  }

  private async applyLabel(emailId: string, labelName: string, tally: LabelTally, log: Logger): Promise<void> {
    try {
      if (await this.labeler.applyLabel(emailId, labelName)) {
        tally.applied++;
        return;
      }
      log.warn({ emailId, labelName }, 'Mailbox rejected label');
    } catch (e) {
      log.warn({ emailId, labelName, err: toError(e) }, 'Failed to apply label');
    }
    tally.failed++;
  }
}

export function createClassificationOrchestrator(
  taxonomy: Taxonomy,
  batchClassifier: IBatchClassifier,
  fetcher: MailboxFetcher,
  labeler: MailboxLabeler,
  settings: OrchestratorSettings
): ClassificationOrchestrator {
  return new ClassificationOrchestrator(taxonomy, batchClassifier, fetcher, labeler, settings);
}
