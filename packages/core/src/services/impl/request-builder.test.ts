import { describe, it, expect } from 'vitest';
import { ModelRequestShape, resolveRequestShape, type OpenAIConfig } from '@inbox-classifier/config';
import type { ChatMessage } from '@inbox-classifier/integrations';
import { ClassificationSchema } from '../../types/classification.js';
import { RESPONSE_SCHEMA_NAME, buildModelRequest, flattenMessages } from './request-builder.js';

function openaiConfig(model: string): OpenAIConfig {
  return {
    apiKey: 'sk-test',
    model,
    requestShape: resolveRequestShape(model),
    maxTokens: 4000,
    temperature: 0.1,
    timeoutMs: 30000,
    maxRetries: 2,
  };
}

const messages: ChatMessage[] = [
  { role: 'system', content: 'Sort mail.' },
  { role: 'user', content: 'Classify this.' },
];

describe('flattenMessages', () => {
  it('joins role-prefixed turns and asks for a JSON object', () => {
    expect(flattenMessages(messages)).toBe(
      'system: Sort mail.\n\nuser: Classify this.\n\nProvide your response as a valid JSON object.'
    );
  });
});

describe('buildModelRequest', () => {
  it('builds a standard request with temperature and a response schema', () => {
    const request = buildModelRequest(messages, openaiConfig('gpt-4o-mini'));

    expect(request).toEqual({
      shape: ModelRequestShape.STANDARD,
      model: 'gpt-4o-mini',
      messages,
      temperature: 0.1,
      maxTokens: 4000,
      responseSchema: { name: RESPONSE_SCHEMA_NAME, schema: ClassificationSchema },
    });
  });

  it('builds a compact reasoning request without temperature', () => {
    const request = buildModelRequest(messages, openaiConfig('gpt-5-mini'));

    expect(request).toEqual({
      shape: ModelRequestShape.REASONING_COMPACT,
      model: 'gpt-5-mini',
      input: flattenMessages(messages),
      maxOutputTokens: 4000,
      verbosity: 'medium',
      reasoningEffort: 'low',
    });
    expect(request).not.toHaveProperty('temperature');
  });
});
