import type { Config } from '../../config/index.js';
import { logger } from '../../utils/logger.js';
import type { LLMService } from './LLMService.interface.js';
import { OpenAILLMService } from './OpenAILLMService.js';
import { AnthropicLLMService } from './AnthropicLLMService.js';
import { OpenAIClientFactory } from './OpenAIClientFactory.js';

export class LLMServiceFactory {
  /** Builds a fresh service for the configured `provider:model`; nothing is cached. */
  static createLLMService(settings: Config['llm']): LLMService {
    switch (settings.provider) {
      case 'openai':
      case 'groq':
      case 'openrouter':
        logger.debug({ provider: settings.provider, model: settings.model }, 'Creating OpenAI-compatible LLM service');
        return new OpenAILLMService(OpenAIClientFactory.create(settings), settings.model, settings.provider);
      case 'anthropic':
        logger.debug({ model: settings.model }, 'Creating Anthropic LLM service');
        return new AnthropicLLMService(settings.apiKey, settings.model, settings.timeoutMs);
    }
  }
}
