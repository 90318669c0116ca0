import { LlmModel } from './models/base.js';
import { OpenAIModel } from './models/openai.js';
import type { Config, PlatformConfig } from '../config/types.js';
import { ConfigError } from '../errors.js';

const OLLAMA_URL = 'http://localhost:11434/v1';

export class LlmModelFactory {
  private config: Config;

  constructor(config: Config) {
    this.config = config;
  }

  create(providerModel: string): LlmModel {
    const parsed = this.parseProviderModel(providerModel);
    const providerConfig = this.getProviderConfig(parsed.provider);
    const options = { timeoutMs: this.config.retry.callTimeoutMs };

    switch (parsed.provider.toLowerCase()) {
      case 'openai':
      case 'ollama':
        return new OpenAIModel(providerConfig, parsed.model, options);
      default:
        throw new ConfigError(`Unsupported LLM provider: ${parsed.provider}`);
    }
  }

  private parseProviderModel(providerModel: string): { provider: string; model: string } {
    const firstColon = providerModel.indexOf(':');
    if (firstColon === -1 || firstColon === providerModel.length - 1) {
      throw new ConfigError(
        `Invalid provider:model format: ${providerModel}. Expected format: "provider:model"`
      );
    }

    const provider = providerModel.slice(0, firstColon).trim();
    const model = providerModel.slice(firstColon + 1).trim();

    if (!provider || !model) {
      throw new ConfigError(
        `Invalid provider:model format: ${providerModel}. Both provider and model must be non-empty`
      );
    }

    return { provider, model };
  }

  private getProviderConfig(provider: string): PlatformConfig {
    switch (provider.toLowerCase()) {
      case 'openai': {
        const openai = this.config.platforms.openai;
        if (!openai.apiKey) {
          throw new ConfigError('OPENAI_API_KEY env variable is not configured.');
        }
        return openai;
      }
      case 'ollama':
        // Ollama ignores the key but the client requires one
        return { apiUrl: OLLAMA_URL, apiKey: 'ollama' };
      default:
        throw new ConfigError(`${provider.toUpperCase()}_API_KEY env variable is not configured.`);
    }
  }
}
