import { z } from 'zod';

export const Priority = {
  LOW: 1,
  NORMAL: 2,
  MODERATE: 3,
  HIGH: 4,
  CRITICAL: 5,
} as const;
export type Priority = (typeof Priority)[keyof typeof Priority];

export const MIN_PRIORITY = Priority.LOW;
export const MAX_PRIORITY = Priority.CRITICAL;

export const MAX_LABELS = 3;
export const MIN_REASONING_LENGTH = 10;
export const MAX_REASONING_LENGTH = 500;

// Five-field shape the model must return; also bound as the response schema
export const ClassificationSchema = z.object({
  category: z.string().min(1),
  priority: z.number().int().min(MIN_PRIORITY).max(MAX_PRIORITY),
  labels: z.array(z.string()).max(MAX_LABELS),
  reasoning: z.string().min(MIN_REASONING_LENGTH).max(MAX_REASONING_LENGTH),
  confidence: z.number().min(0).max(1),
});

export const DEFAULT_CONFIDENCE = 0.8;

// Accepts answers that leave out labels or confidence; extra labels are cut to the cap
export const ModelClassificationSchema = ClassificationSchema.extend({
  labels: z
    .array(z.string())
    .default([])
    .transform((labels) => labels.slice(0, MAX_LABELS)),
  confidence: z.number().min(0).max(1).default(DEFAULT_CONFIDENCE),
});

export interface Classification {
  readonly category: string;
  readonly priority: number;
  readonly labels: readonly string[];
  readonly reasoning: string;
  readonly confidence: number;
}
