// Transport-level types shared with @inbox-classifier/core

import type { ZodType } from 'zod';
import type { Result } from '@inbox-classifier/utils';
import type { ModelRequestShape } from '@inbox-classifier/config';

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

// Schema the standard request binds the model's output to
export interface ResponseSchema {
  name: string;
  schema: ZodType;
}

export interface StandardModelRequest {
  shape: typeof ModelRequestShape.STANDARD;
  model: string;
  messages: ChatMessage[];
  temperature: number;
  maxTokens: number;
  responseSchema: ResponseSchema;
}

export type Verbosity = 'low' | 'medium' | 'high';
export type ReasoningEffort = 'minimal' | 'low' | 'medium' | 'high';

export interface ReasoningModelRequest {
  shape: typeof ModelRequestShape.REASONING_COMPACT;
  model: string;
  input: string;
  maxOutputTokens: number;
  verbosity: Verbosity;
  reasoningEffort: ReasoningEffort;
}

export type ModelRequest = StandardModelRequest | ReasoningModelRequest;

export interface StandardModelResponse {
  shape: typeof ModelRequestShape.STANDARD;
  content: string | null;
}

export interface ReasoningModelResponse {
  shape: typeof ModelRequestShape.REASONING_COMPACT;
  status: string;
  incompleteReason: string | null;
  outputText: string;
}

export type ModelResponse = StandardModelResponse | ReasoningModelResponse;

// LLM API errors
export const LLMErrorCode = {
  TIMEOUT: 'TIMEOUT',
  RATE_LIMITED: 'RATE_LIMITED',
  CONNECTION_ERROR: 'CONNECTION_ERROR',
  API_ERROR: 'API_ERROR',
  LLM_ERROR: 'LLM_ERROR',
} as const;
export type LLMErrorCode = (typeof LLMErrorCode)[keyof typeof LLMErrorCode];

export interface LLMError {
  code: LLMErrorCode;
  message: string;
  retryable: boolean;
  status?: number;
}

/**
 * A single client instance is shared by every concurrent classification, so
 * implementations must allow overlapping calls.
 */
export interface ModelTransport {
  sendStructuredRequest(request: ModelRequest): Promise<Result<ModelResponse, LLMError>>;
}
