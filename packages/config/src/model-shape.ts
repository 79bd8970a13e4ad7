// Request shapes understood by the model transport
export const ModelRequestShape = {
  STANDARD: 'standard',
  REASONING_COMPACT: 'reasoning_compact',
} as const;
export type ModelRequestShape = (typeof ModelRequestShape)[keyof typeof ModelRequestShape];

// gpt-5 family and the o-series take a single text input and no temperature
const REASONING_MODEL_PATTERN = /^(gpt-5|o\d)/i;

export function resolveRequestShape(model: string): ModelRequestShape {
  return REASONING_MODEL_PATTERN.test(model.trim())
    ? ModelRequestShape.REASONING_COMPACT
    : ModelRequestShape.STANDARD;
}
