import type {
  LlmCompletionRequest,
  LlmCompletionResponse,
  LlmStructuredRequest
} from '../types.js';
import type { PlatformConfig } from '../../config/types.js';

export abstract class LlmModel {
  protected config: PlatformConfig;
  protected modelName: string;

  constructor(config: PlatformConfig, modelName: string) {
    this.config = config;
    this.modelName = modelName;
  }

  abstract completeStructured<T>(request: LlmStructuredRequest<T>): Promise<LlmCompletionResponse<T>>;

  /** Whether a failed call is worth retrying (rate limits, timeouts, server errors). */
  abstract isTransientError(error: unknown): boolean;

  getModelName(): string {
    return this.modelName;
  }

  protected validateRequest(request: LlmCompletionRequest): void {
    if (!request.messages || request.messages.length === 0) {
      throw new Error('Messages array cannot be empty');
    }

    for (const message of request.messages) {
      if (!['system', 'user', 'assistant'].includes(message.role)) {
        throw new Error(`Invalid message role: ${message.role}`);
      }
      if (typeof message.content !== 'string') {
        throw new Error('Message content must be a string');
      }
    }

    if (request.temperature !== undefined && (request.temperature < 0 || request.temperature > 2)) {
      throw new Error('Temperature must be between 0 and 2');
    }

    if (request.maxTokens !== undefined && request.maxTokens <= 0) {
      throw new Error('Max tokens must be positive');
    }
  }
}
