import { Result } from '@inbox-classifier/utils';
import { Email } from '../types/email.js';
import { Classification } from '../types/classification.js';

// Classification errors
export const ClassificationErrorCode = {
  TIMEOUT: 'TIMEOUT',
  RATE_LIMITED: 'RATE_LIMITED',
  API_ERROR: 'API_ERROR',
  EMPTY_RESPONSE: 'EMPTY_RESPONSE',
  INCOMPLETE_RESPONSE: 'INCOMPLETE_RESPONSE',
  PARSE_ERROR: 'PARSE_ERROR',
  CANCELLED: 'CANCELLED',
  UNEXPECTED: 'UNEXPECTED',
} as const;
export type ClassificationErrorCode = (typeof ClassificationErrorCode)[keyof typeof ClassificationErrorCode];

export interface ClassificationError {
  code: ClassificationErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

export interface ClassifyOptions {
  // Few-shot example turns; on by default
  includeExamples?: boolean;
}

// Classifier service interface
export interface IClassifierService {
  /**
   * Classify one email against the taxonomy. Never rejects: every failure
   * comes back as an Err value.
   */
  classify(email: Email, options?: ClassifyOptions): Promise<Result<Classification, ClassificationError>>;
}
