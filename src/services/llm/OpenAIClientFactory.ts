import OpenAI from 'openai';
import type { Config, LLMProvider } from '../../config/index.js';

const BASE_URLS: Partial<Record<LLMProvider, string>> = {
  groq: 'https://api.groq.com/openai/v1',
  openrouter: 'https://openrouter.ai/api/v1',
};

export class OpenAIClientFactory {
  /** Groq and OpenRouter speak the OpenAI wire format at their own base URLs. */
  static create(settings: Config['llm']): OpenAI {
    return new OpenAI({
      apiKey: settings.apiKey,
      baseURL: BASE_URLS[settings.provider],
      timeout: settings.timeoutMs,
      maxRetries: 0,
    });
  }
}
