import OpenAI, {
  APIConnectionError,
  APIConnectionTimeoutError,
  APIError,
  RateLimitError,
} from 'openai';
import { zodResponseFormat } from 'openai/helpers/zod';
import type {
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
} from 'openai/resources/chat/completions';
import type { ResponseCreateParamsNonStreaming } from 'openai/resources/responses/responses';
import { Result, createLogger, tryCatchAsync } from '@inbox-classifier/utils';
import { ModelRequestShape, type OpenAIConfig } from '@inbox-classifier/config';
import {
  ChatMessage,
  LLMError,
  LLMErrorCode,
  ModelRequest,
  ModelResponse,
  ModelTransport,
  ReasoningModelRequest,
  StandardModelRequest,
} from '../types.js';

const logger = createLogger({ service: 'openai-client' });

// The slice of the SDK this client calls; lets tests substitute a fake
export interface ChatCompletionLike {
  choices: Array<{ message: { content: string | null } }>;
}

export interface ResponseLike {
  status?: string;
  incomplete_details?: { reason?: string } | null;
  output_text: string;
}

export interface OpenAILike {
  chat: {
    completions: {
      create(body: ChatCompletionCreateParamsNonStreaming): Promise<ChatCompletionLike>;
    };
  };
  responses: {
    create(body: ResponseCreateParamsNonStreaming): Promise<ResponseLike>;
  };
}

/**
 * Map SDK errors to transport errors. Timeout and retry handling already
 * happened inside the SDK by the time an error reaches here.
 */
export function mapOpenAIError(error: unknown): LLMError {
  if (error instanceof APIConnectionTimeoutError) {
    return { code: LLMErrorCode.TIMEOUT, message: error.message, retryable: true };
  }
  if (error instanceof RateLimitError) {
    return { code: LLMErrorCode.RATE_LIMITED, message: error.message, retryable: true, status: 429 };
  }
  if (error instanceof APIConnectionError) {
    return { code: LLMErrorCode.CONNECTION_ERROR, message: error.message, retryable: true };
  }
  if (error instanceof APIError) {
    const status = error.status;
    return {
      code: LLMErrorCode.API_ERROR,
      message: error.message,
      retryable: status === undefined || status >= 500,
      ...(status !== undefined ? { status } : {}),
    };
  }
  return {
    code: LLMErrorCode.LLM_ERROR,
    message: error instanceof Error ? error.message : String(error),
    retryable: false,
  };
}

function toChatParam(message: ChatMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
  }
}

export class OpenAIClient implements ModelTransport {
  private readonly client: OpenAILike;

  constructor(config: OpenAIConfig, client?: OpenAILike) {
    this.client =
      client ??
      new OpenAI({
        apiKey: config.apiKey,
        timeout: config.timeoutMs,
        maxRetries: config.maxRetries,
      });
  }

  async sendStructuredRequest(request: ModelRequest): Promise<Result<ModelResponse, LLMError>> {
    const result = await tryCatchAsync(() => this.dispatch(request), mapOpenAIError);
    if (!result.ok) {
      logger.warn(
        { model: request.model, code: result.error.code, status: result.error.status },
        'Model request failed'
      );
    }
    return result;
  }

  private dispatch(request: ModelRequest): Promise<ModelResponse> {
    switch (request.shape) {
      case ModelRequestShape.STANDARD:
        return this.sendChatCompletion(request);
      case ModelRequestShape.REASONING_COMPACT:
        return this.sendReasoningResponse(request);
    }
  }

  private async sendChatCompletion(request: StandardModelRequest): Promise<ModelResponse> {
    const response = await this.client.chat.completions.create({
      model: request.model,
      messages: request.messages.map(toChatParam),
      temperature: request.temperature,
      max_tokens: request.maxTokens,
      response_format: zodResponseFormat(request.responseSchema.schema, request.responseSchema.name),
    });

    return {
      shape: ModelRequestShape.STANDARD,
      content: response.choices[0]?.message.content ?? null,
    };
  }

  private async sendReasoningResponse(request: ReasoningModelRequest): Promise<ModelResponse> {
    // Reasoning models take no temperature
    const response = await this.client.responses.create({
      model: request.model,
      input: request.input,
      text: {
        format: { type: 'json_object' },
        verbosity: request.verbosity,
      },
      reasoning: { effort: request.reasoningEffort },
      max_output_tokens: request.maxOutputTokens,
    });

    return {
      shape: ModelRequestShape.REASONING_COMPACT,
      status: response.status ?? 'completed',
      incompleteReason: response.incomplete_details?.reason ?? null,
      outputText: response.output_text,
    };
  }
}
