import OpenAI from 'openai';
import { zodResponseFormat } from 'openai/helpers/zod';
import { LlmModel } from './base.js';
import type {
  LlmCompletionResponse,
  LlmMessage,
  LlmStructuredRequest
} from '../types.js';
import type { PlatformConfig } from '../../config/types.js';

const TRANSIENT_STATUSES = new Set([408, 409, 429]);

export class OpenAIModel extends LlmModel {
  private client: OpenAI;

  constructor(config: PlatformConfig, modelName: string, options: { timeoutMs?: number } = {}) {
    super(config, modelName);

    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.apiUrl,
      timeout: options.timeoutMs,
      // Retries are owned by the pipeline
      maxRetries: 0
    });
  }

  async completeStructured<T>(request: LlmStructuredRequest<T>): Promise<LlmCompletionResponse<T>> {
    this.validateRequest(request);
    const { schema, name } = request.outputFormat;

    const completion = await this.client.chat.completions.create({
      model: this.modelName,
      messages: this.convertMessages(request.messages),
      temperature: request.temperature,
      max_tokens: request.maxTokens,
      response_format: zodResponseFormat(schema, name || 'response')
    });

    const response = this.toResponse(completion);
    // Output cut off at the token limit is never valid JSON
    if (!response.content || response.refusal || response.finishReason === 'length') {
      return response;
    }

    let json: unknown;
    try {
      json = JSON.parse(response.content);
    } catch (error) {
      throw new Error(`Model returned malformed JSON (finish reason: ${response.finishReason})`, { cause: error });
    }

    return { ...response, parsed: schema.parse(json) };
  }

  isTransientError(error: unknown): boolean {
    if (error instanceof OpenAI.APIConnectionError) {
      return true;
    }
    if (error instanceof OpenAI.APIError) {
      const status = error.status;
      return status === undefined || TRANSIENT_STATUSES.has(status) || status >= 500;
    }
    return false;
  }

  private toResponse(completion: OpenAI.Chat.Completions.ChatCompletion): LlmCompletionResponse<never> {
    const choice = completion.choices[0];
    if (!choice) {
      throw new Error('No completion choice returned from OpenAI');
    }

    return {
      content: choice.message.content,
      finishReason: this.mapFinishReason(choice.finish_reason),
      refusal: choice.message.refusal ?? undefined,
      usage: completion.usage ? {
        promptTokens: completion.usage.prompt_tokens,
        completionTokens: completion.usage.completion_tokens,
        totalTokens: completion.usage.total_tokens,
      } : undefined
    };
  }

  private convertMessages(messages: LlmMessage[]): OpenAI.Chat.Completions.ChatCompletionMessageParam[] {
    return messages.map(msg => {
      switch (msg.role) {
        case 'system':
          return { role: 'system', content: msg.content };
        case 'user':
          return { role: 'user', content: msg.content };
        case 'assistant':
          return { role: 'assistant', content: msg.content };
      }
    });
  }

  private mapFinishReason(reason: string | null): LlmCompletionResponse['finishReason'] {
    switch (reason) {
      case 'stop':
        return 'stop';
      case 'length':
        return 'length';
      case 'content_filter':
        return 'content_filter';
      default:
        return 'other';
    }
  }
}
