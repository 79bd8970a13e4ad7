import { Result } from '@inbox-classifier/utils';
import { BatchStats } from './batch.js';
import { MailboxFilter } from './mailbox.js';

export const OrchestratorStatus = {
  IDLE: 'idle',
  FETCHING: 'fetching',
  CLASSIFYING: 'classifying',
  APPLYING: 'applying',
  COMPLETED: 'completed',
  ERROR: 'error',
} as const;
export type OrchestratorStatus = (typeof OrchestratorStatus)[keyof typeof OrchestratorStatus];

export const OrchestratorErrorCode = {
  FETCH_ERROR: 'FETCH_ERROR',
} as const;
export type OrchestratorErrorCode = (typeof OrchestratorErrorCode)[keyof typeof OrchestratorErrorCode];

export interface OrchestratorError {
  code: OrchestratorErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

export interface RunOptions {
  // Defaults to MAX_EMAILS_PER_RUN
  limit?: number;
  filter?: MailboxFilter;
  signal?: AbortSignal;
}

export interface RunReport {
  runId: string;
  fetched: number;
  // Dropped because they already carry a category label
  alreadyClassified: number;
  batch: BatchStats;
  labelsApplied: number;
  labelFailures: number;
}

export interface IClassificationOrchestrator {
  run(options?: RunOptions): Promise<Result<RunReport, OrchestratorError>>;
  getStatus(): OrchestratorStatus;
}
