import { ModelRequestShape, type OpenAIConfig } from '@inbox-classifier/config';
import type { ChatMessage, ModelRequest } from '@inbox-classifier/integrations';
import { ClassificationSchema } from '../../types/classification.js';

export const RESPONSE_SCHEMA_NAME = 'email_classification';

// Reasoning models only honour JSON output when the input asks for it
export const JSON_OBJECT_INSTRUCTION = 'Provide your response as a valid JSON object.';

export function flattenMessages(messages: readonly ChatMessage[]): string {
  const transcript = messages.map((message) => `${message.role}: ${message.content}`).join('\n\n');
  return `${transcript}\n\n${JSON_OBJECT_INSTRUCTION}`;
}

/**
 * Shape the prompt for the configured model family. The shape was fixed when
 * the configuration was loaded.
 */
export function buildModelRequest(messages: readonly ChatMessage[], openai: OpenAIConfig): ModelRequest {
  switch (openai.requestShape) {
    case ModelRequestShape.STANDARD:
      return {
        shape: ModelRequestShape.STANDARD,
        model: openai.model,
        messages: [...messages],
        temperature: openai.temperature,
        maxTokens: openai.maxTokens,
        responseSchema: { name: RESPONSE_SCHEMA_NAME, schema: ClassificationSchema },
      };
    case ModelRequestShape.REASONING_COMPACT:
      return {
        shape: ModelRequestShape.REASONING_COMPACT,
        model: openai.model,
        input: flattenMessages(messages),
        maxOutputTokens: openai.maxTokens,
        verbosity: 'medium',
        reasoningEffort: 'low',
      };
  }
}
