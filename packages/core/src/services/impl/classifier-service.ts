import { Result, ok, err, createLogger, toError } from '@inbox-classifier/utils';
import type { OpenAIConfig } from '@inbox-classifier/config';
import { LLMError, LLMErrorCode, ModelTransport } from '@inbox-classifier/integrations';
import { Email } from '../../types/email.js';
import { Classification } from '../../types/classification.js';
import { Taxonomy } from '../../types/taxonomy.js';
import { buildClassificationMessages } from '../../prompts/classification-prompt.js';
import {
  IClassifierService,
  ClassificationError,
  ClassificationErrorCode,
  ClassifyOptions,
} from '../classifier.js';
import { buildModelRequest } from './request-builder.js';
import {
  applyPriorityBoost,
  extractContent,
  parseClassification,
  resolveCategory,
} from './classification-output.js';

const logger = createLogger({ service: 'classifier-service' });

/**
 * Maps transport errors to classification errors
 */
function mapLLMError(error: LLMError): ClassificationError {
  const codeMap: Record<LLMErrorCode, ClassificationErrorCode> = {
    TIMEOUT: ClassificationErrorCode.TIMEOUT,
    RATE_LIMITED: ClassificationErrorCode.RATE_LIMITED,
    CONNECTION_ERROR: ClassificationErrorCode.API_ERROR,
    API_ERROR: ClassificationErrorCode.API_ERROR,
    LLM_ERROR: ClassificationErrorCode.API_ERROR,
  };

  return {
    code: codeMap[error.code],
    message: error.message,
    details: { retryable: error.retryable, ...(error.status !== undefined ? { status: error.status } : {}) },
  };
}

/**
 * Classifies emails through the model API: builds the prompt, shapes the
 * request for the configured model family, validates the structured answer,
 * then applies the category's priority boost and pins the category to the
 * taxonomy.
 */
export class ClassifierService implements IClassifierService {
  constructor(
    private transport: ModelTransport,
    private taxonomy: Taxonomy,
    private openai: OpenAIConfig
  ) {}

  async classify(
    email: Email,
    options: ClassifyOptions = {}
  ): Promise<Result<Classification, ClassificationError>> {
    try {
      return await this.classifyEmail(email, options.includeExamples ?? true);
    } catch (e) {
      const error = toError(e);
      logger.error({ emailId: email.id, err: error }, 'Unexpected error classifying email');
      return err({ code: ClassificationErrorCode.UNEXPECTED, message: error.message });
    }
  }

  private async classifyEmail(
    email: Email,
    includeExamples: boolean
  ): Promise<Result<Classification, ClassificationError>> {
    logger.debug({ emailId: email.id, subject: email.subject }, 'Classifying email');

    const messages = buildClassificationMessages(email, this.taxonomy, includeExamples);
    const request = buildModelRequest(messages, this.openai);

    const response = await this.transport.sendStructuredRequest(request);
    if (!response.ok) {
      return this.fail(email, mapLLMError(response.error));
    }

    const content = extractContent(response.value);
    if (!content.ok) {
      return this.fail(email, content.error);
    }

    const parsed = parseClassification(content.value);
    if (!parsed.ok) {
      return this.fail(email, parsed.error);
    }

    const boosted = applyPriorityBoost(parsed.value, this.taxonomy);
    const { classification, replaced } = resolveCategory(boosted, this.taxonomy);

    if (replaced !== null) {
      logger.warn(
        { emailId: email.id, returned: replaced, substituted: classification.category },
        'Model returned a category outside the taxonomy, using default'
      );
    }

    logger.info(
      {
        emailId: email.id,
        category: classification.category,
        priority: classification.priority,
        confidence: classification.confidence,
      },
      'Email classified successfully'
    );

    return ok(classification);
  }

  private fail(email: Email, error: ClassificationError): Result<Classification, ClassificationError> {
    logger.warn({ emailId: email.id, code: error.code, details: error.details }, `Classification failed: ${error.message}`);
    return err(error);
  }
}

/**
 * Create a classifier service over a shared transport
 */
export function createClassifierService(
  transport: ModelTransport,
  taxonomy: Taxonomy,
  openai: OpenAIConfig
): ClassifierService {
  return new ClassifierService(transport, taxonomy, openai);
}
