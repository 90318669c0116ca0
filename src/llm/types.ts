import type { ZodType } from 'zod';

export interface LlmMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface ZodSchemaOutputFormat<T> {
  type: 'zod_schema';
  schema: ZodType<T>;
  name?: string;
}

export interface LlmCompletionRequest {
  messages: LlmMessage[];
  temperature?: number;
  maxTokens?: number;
}

export interface LlmStructuredRequest<T> extends LlmCompletionRequest {
  outputFormat: ZodSchemaOutputFormat<T>;
}

export interface LlmCompletionResponse<T = string> {
  content: string | null;
  finishReason: 'stop' | 'length' | 'content_filter' | 'other';
  refusal?: string;
  usage?: {
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
  };
  parsed?: T;
}
