import { ok, err, Result, tryCatch } from '@inbox-classifier/utils';
import type { ModelResponse } from '@inbox-classifier/integrations';
import { ModelRequestShape } from '@inbox-classifier/config';
import {
  Classification,
  ModelClassificationSchema,
  MAX_PRIORITY,
  MIN_PRIORITY,
} from '../../types/classification.js';
import type { Taxonomy } from '../../types/taxonomy.js';
import { ClassificationError, ClassificationErrorCode } from '../classifier.js';

const REASONING_COMPLETED = 'completed';

/**
 * Pull the raw text out of a model response. An unfinished reasoning response
 * is rejected outright; none of its partial output is used.
 */
export function extractContent(response: ModelResponse): Result<string, ClassificationError> {
  let content: string | null;

  if (response.shape === ModelRequestShape.REASONING_COMPACT) {
    if (response.status !== REASONING_COMPLETED) {
      return err({
        code: ClassificationErrorCode.INCOMPLETE_RESPONSE,
        message: `Model response incomplete: ${response.incompleteReason ?? 'unknown'}`,
        details: { status: response.status, reason: response.incompleteReason ?? 'unknown' },
      });
    }
    content = response.outputText;
  } else {
    content = response.content;
  }

  if (!content || content.trim().length === 0) {
    return err({
      code: ClassificationErrorCode.EMPTY_RESPONSE,
      message: 'No content in model response',
    });
  }

  return ok(content);
}

export function parseClassification(content: string): Result<Classification, ClassificationError> {
  const json = tryCatch(
    (): unknown => JSON.parse(content),
    (e): ClassificationError => ({
      code: ClassificationErrorCode.PARSE_ERROR,
      message: `Model response is not valid JSON: ${e instanceof Error ? e.message : String(e)}`,
    })
  );
  if (!json.ok) {
    return json;
  }

  const validated = ModelClassificationSchema.safeParse(json.value);
  if (!validated.success) {
    return err({
      code: ClassificationErrorCode.PARSE_ERROR,
      message: 'Model response does not match the classification schema',
      details: {
        issues: validated.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
      },
    });
  }

  return ok(validated.data);
}

export function clampPriority(priority: number): number {
  return Math.max(MIN_PRIORITY, Math.min(MAX_PRIORITY, priority));
}

export function applyPriorityBoost(classification: Classification, taxonomy: Taxonomy): Classification {
  const category = taxonomy.find(classification.category);
  if (!category || category.priorityBoost === 0) {
    return classification;
  }
  return {
    ...classification,
    priority: clampPriority(classification.priority + category.priorityBoost),
  };
}

export interface CategoryResolution {
  classification: Classification;
  // Category named by the model when it was replaced by the default
  replaced: string | null;
}

/**
 * Pin the category to a taxonomy entry: known names take the taxonomy's
 * spelling, unknown names fall back to the default category.
 */
export function resolveCategory(classification: Classification, taxonomy: Taxonomy): CategoryResolution {
  const category = taxonomy.find(classification.category);
  if (category) {
    return {
      classification:
        category.name === classification.category
          ? classification
          : { ...classification, category: category.name },
      replaced: null,
    };
  }

  return {
    classification: { ...classification, category: taxonomy.defaultCategory.name },
    replaced: classification.category,
  };
}
